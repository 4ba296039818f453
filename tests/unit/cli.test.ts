import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runCli, type CliDeps } from '../../src/cli';
import { adapterOf, createTestContext, type TestContext } from '../_fakes/context';

const UNKNOWN_SCHEDULE = '00000000-0000-4000-8000-000000000000';

describe('conductor CLI', () => {
  let ctx: TestContext;
  let deps: CliDeps;
  let out: string[];
  let err: string[];
  let workDir: string;

  const run = (...argv: string[]) => runCli(argv, deps, { out: (t) => out.push(t), err: (t) => err.push(t) });
  const printed = (index = 0): unknown => JSON.parse(out[index]);

  beforeEach(async () => {
    ctx = await createTestContext();
    deps = { services: ctx.services, ensureIndexes: vi.fn(async () => undefined) };
    out = [];
    err = [];
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'conductor-cli-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('submits the specs in a file and reads the job back', async () => {
    const file = path.join(workDir, 'job.json');
    await fs.writeFile(file, JSON.stringify({ name: 'hello', script: '#!/bin/bash\necho hi' }));

    await expect(run('--token', ctx.tokens.operator, 'create', file)).resolves.toBe(0);
    const [created] = ctx.persistence.state.jobs.values();
    expect(printed()).toEqual([
      expect.objectContaining({ index: 0, ok: true, value: expect.objectContaining({ jobId: created.jobId }) }),
    ]);

    await expect(run('-t', ctx.tokens.viewer, 'get', 'job', created.jobId)).resolves.toBe(0);
    expect(printed(1)).toMatchObject({ jobId: created.jobId, status: 'PENDING', spec: { name: 'hello' } });
  });

  it('places and submits a job in one step', async () => {
    const jobId = await ctx.submitJob();

    await expect(run('-t', ctx.tokens.operator, 'sched', 'add', jobId, '--dispatch')).resolves.toBe(0);

    expect(printed(0)).toMatchObject([{ ok: true, value: { jobId, clusterId: 'alpha', externalJobId: null } }]);
    expect(printed(1)).toMatchObject([{ ok: true, value: { jobId, externalJobId: 'alpha-1' } }]);
    expect(adapterOf(ctx, 'alpha').submitted).toEqual([jobId]);
  });

  it('exits with 1 when any item of a batch fails', async () => {
    await expect(run('-t', ctx.tokens.operator, 'sched', 'dispatch', UNKNOWN_SCHEDULE)).resolves.toBe(1);
    expect(printed()).toEqual([
      { index: 0, ok: false, error: { code: 'SCHEDULE_NOT_FOUND', message: expect.any(String) } },
    ]);
  });

  it('uses the default token and reports refusals on stderr', async () => {
    deps.defaultToken = ctx.tokens.viewer;

    await expect(run('get', 'clusters')).resolves.toBe(0);
    expect(printed()).toEqual([{ clusterId: 'alpha', capabilities: ['cpu'], capacity: { load: 0, limit: 0 } }]);

    await expect(run('cancel', 'job-1')).resolves.toBe(1);
    expect(err).toEqual(['❌ Not authorized to job:cancel']);
  });

  it('builds indexes on db init', async () => {
    await expect(run('db', 'init')).resolves.toBe(0);

    expect(deps.ensureIndexes).toHaveBeenCalledTimes(1);
    expect(printed()).toEqual({ indexes: 'in sync', admin: null });
  });

  it('rejects an unknown command', async () => {
    await expect(run('publish')).resolves.toBe(1);
    expect(err.join('\n')).toContain("unknown command 'publish'");
    expect(out).toEqual([]);
  });
});
