import { describe, expect, it } from 'vitest';
import { SchedulerFactory } from '../../../src/services/SchedulerService';
import { NoEligibleClusterError, NotFoundError } from '../../../src/types/errors';
import { createTestContext } from '../../_fakes/context';

const CLUSTERS = [
  { clusterId: 'cpu-b', capabilities: ['cpu'] },
  { clusterId: 'cpu-a', capabilities: ['cpu'] },
  { clusterId: 'gpu-a', capabilities: ['cpu', 'gpu'], limit: 1 },
];

describe('Scheduler (least-loaded)', () => {
  it('breaks load ties by the lowest cluster id', async () => {
    const ctx = await createTestContext({ clusters: CLUSTERS });
    const jobId = await ctx.submitJob({ requiredCapabilities: ['cpu'] });

    await expect(ctx.services.scheduler.schedule({ jobId })).resolves.toEqual({ jobId, clusterId: 'cpu-a' });
  });

  it('prefers the least loaded eligible cluster', async () => {
    const ctx = await createTestContext({ clusters: CLUSTERS });
    const first = await ctx.submitJob({ requiredCapabilities: ['cpu'] });
    await ctx.services.schedules.create([{ jobId: first, clusterId: 'cpu-a' }], ctx.tokens.operator);

    const second = await ctx.submitJob({ requiredCapabilities: ['cpu'] });
    const placement = await ctx.services.scheduler.schedule({ jobId: second });

    expect(placement.clusterId).toBe('cpu-b');
  });

  it('only considers clusters offering every required capability', async () => {
    const ctx = await createTestContext({ clusters: CLUSTERS });
    const jobId = await ctx.submitJob({ requiredCapabilities: ['gpu'] });

    await expect(ctx.services.scheduler.schedule({ jobId })).resolves.toEqual({ jobId, clusterId: 'gpu-a' });
  });

  it('skips clusters that reached their limit', async () => {
    const ctx = await createTestContext({ clusters: CLUSTERS });
    const first = await ctx.submitJob({ requiredCapabilities: ['gpu'] });
    await ctx.services.schedules.create([{ jobId: first, clusterId: 'gpu-a' }], ctx.tokens.operator);

    const second = await ctx.submitJob({ requiredCapabilities: ['gpu'] });
    await expect(ctx.services.scheduler.schedule({ jobId: second })).rejects.toBeInstanceOf(NoEligibleClusterError);
  });

  it('fails with NoEligibleClusterError and creates nothing when no cluster fits', async () => {
    const ctx = await createTestContext({ clusters: [{ clusterId: 'cpu-a', capabilities: ['cpu'] }] });
    const jobId = await ctx.submitJob({ requiredCapabilities: ['gpu'] });

    const scheduling = ctx.services.scheduler.schedule({ jobId });
    await expect(scheduling).rejects.toBeInstanceOf(NoEligibleClusterError);
    await expect(scheduling).rejects.toMatchObject({ statusCode: 404, code: 'NO_ELIGIBLE_CLUSTER' });
    expect(ctx.persistence.schedulesFor(jobId)).toEqual([]);
    expect(ctx.persistence.job(jobId)?.status).toBe('PENDING');
  });

  it('fails with NotFoundError for an unknown job', async () => {
    const ctx = await createTestContext();
    await expect(
      ctx.services.scheduler.schedule({ jobId: '00000000-0000-4000-8000-000000000000' }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('SchedulerFactory', () => {
  it('builds the first-fit strategy, which ignores load', async () => {
    const ctx = await createTestContext({ clusters: CLUSTERS });
    const scheduler = SchedulerFactory.create('first-fit', {
      persistence: ctx.persistence,
      clusters: ctx.services.clusters,
    });
    const first = await ctx.submitJob({ requiredCapabilities: ['cpu'] });
    await ctx.services.schedules.create([{ jobId: first, clusterId: 'cpu-a' }], ctx.tokens.operator);
    const second = await ctx.submitJob({ requiredCapabilities: ['cpu'] });

    expect(scheduler.strategyName).toBe('first-fit');
    await expect(scheduler.schedule({ jobId: second })).resolves.toEqual({ jobId: second, clusterId: 'cpu-a' });
  });

  it('lists the registered strategies', () => {
    expect(SchedulerFactory.getAvailableStrategies()).toEqual(['least-loaded', 'first-fit']);
  });

  it('selects the strategy named in configuration', async () => {
    const ctx = await createTestContext({ env: { SCHEDULER: 'first-fit' } });
    expect(ctx.services.scheduler.strategyName).toBe('first-fit');
  });
});
