import { describe, expect, it } from 'vitest';
import { StatusSequence } from '../../../src/adapters/cluster/ClusterAdapter';
import { adapterOf, createTestContext, type TestContext } from '../../_fakes/context';
import { hangUntilAborted } from '../../_fakes/FakeClusterAdapter';

/** Submits, schedules and dispatches one job on `alpha`. */
const dispatchedJob = async (ctx: TestContext) => {
  const jobId = await ctx.submitJob();
  const [created] = await ctx.services.schedules.create([{ jobId, clusterId: 'alpha' }], ctx.tokens.operator);
  if (!created.ok) throw new Error(`schedule failed: ${created.error.message}`);
  const [dispatched] = await ctx.services.dispatcher.dispatch([created.value.scheduleId], ctx.tokens.operator);
  if (!dispatched.ok) throw new Error(`dispatch failed: ${dispatched.error.message}`);
  return { jobId, schedule: dispatched.value };
};

describe('ReconciliationService.reconcileOnce', () => {
  it('moves a job forward and withdraws the schedule once it finishes', async () => {
    const ctx = await createTestContext();
    const { jobId, schedule } = await dispatchedJob(ctx);
    const alpha = adapterOf(ctx, 'alpha');

    const running = await ctx.services.reconciliation.reconcileOnce();
    expect(running).toEqual({
      polled: 1,
      updated: 1,
      failed: 0,
      outcomes: [{ scheduleId: schedule.scheduleId, jobId, outcome: 'updated', from: 'SCHEDULED', to: 'RUNNING' }],
    });

    alpha.statuses = ['COMPLETED'];
    const finished = await ctx.services.reconciliation.reconcileOnce();
    expect(finished.outcomes[0]).toMatchObject({ outcome: 'updated', from: 'RUNNING', to: 'SUCCEEDED' });
    expect(ctx.persistence.job(jobId)?.status).toBe('SUCCEEDED');
    expect(ctx.persistence.schedulesFor(jobId)[0].active).toBe(false);

    const idle = await ctx.services.reconciliation.reconcileOnce();
    expect(idle.polled).toBe(0);
    expect(alpha.statusCalls).toBe(2);
  });

  it('ignores schedules that were never dispatched', async () => {
    const ctx = await createTestContext();
    const jobId = await ctx.submitJob();
    await ctx.services.schedules.create([{ jobId, clusterId: 'alpha' }], ctx.tokens.operator);

    const summary = await ctx.services.reconciliation.reconcileOnce();

    expect(summary).toEqual({ polled: 0, updated: 0, failed: 0, outcomes: [] });
    expect(adapterOf(ctx, 'alpha').statusCalls).toBe(0);
  });

  it('records an error message when the cluster reports a failure', async () => {
    const ctx = await createTestContext();
    const { jobId } = await dispatchedJob(ctx);
    adapterOf(ctx, 'alpha').statuses = ['COMPLETED', 'FAILED'];

    await ctx.services.reconciliation.reconcileOnce();

    expect(ctx.persistence.job(jobId)).toMatchObject({
      status: 'FAILED',
      error: 'Cluster alpha reported alpha-1 as failed',
    });
    expect(ctx.persistence.schedulesFor(jobId)[0].active).toBe(false);
  });

  it('keeps the status when the backend vocabulary is unknown', async () => {
    const ctx = await createTestContext();
    const { jobId } = await dispatchedJob(ctx);
    adapterOf(ctx, 'alpha').statuses = ['WHATEVER'];

    const summary = await ctx.services.reconciliation.reconcileOnce();

    expect(summary.outcomes[0]).toMatchObject({ outcome: 'unchanged', status: 'SCHEDULED' });
    expect(ctx.persistence.job(jobId)?.status).toBe('SCHEDULED');
  });

  it('never moves a job backwards', async () => {
    const ctx = await createTestContext();
    const { jobId } = await dispatchedJob(ctx);
    const alpha = adapterOf(ctx, 'alpha');
    await ctx.services.reconciliation.reconcileOnce();

    alpha.statuses = ['PENDING'];
    const summary = await ctx.services.reconciliation.reconcileOnce();

    expect(summary.outcomes[0]).toMatchObject({ outcome: 'unchanged', status: 'RUNNING' });
    expect(ctx.persistence.job(jobId)?.status).toBe('RUNNING');
  });
});

describe('ReconciliationService failure handling', () => {
  it('retries a status call that times out, then reports it without touching the job', async () => {
    const ctx = await createTestContext();
    const { jobId } = await dispatchedJob(ctx);
    const alpha = adapterOf(ctx, 'alpha');
    alpha.statusHandler = hangUntilAborted;

    const summary = await ctx.services.reconciliation.reconcileOnce();

    expect(alpha.statusCalls).toBe(3);
    expect(summary.failed).toBe(1);
    expect(summary.outcomes[0]).toMatchObject({
      outcome: 'failed',
      error: { code: 'TIMEOUT', message: 'status alpha/alpha-1 timed out after 50ms' },
    });
    expect(ctx.persistence.job(jobId)?.status).toBe('SCHEDULED');
  });

  it('does not retry errors that are not transient', async () => {
    const ctx = await createTestContext();
    await dispatchedJob(ctx);
    const alpha = adapterOf(ctx, 'alpha');
    alpha.statusHandler = async () => {
      throw new Error('unexpected payload');
    };

    const summary = await ctx.services.reconciliation.reconcileOnce();

    expect(alpha.statusCalls).toBe(1);
    expect(summary.outcomes[0]).toMatchObject({
      outcome: 'failed',
      error: { code: 'INTERNAL_ERROR', message: 'unexpected payload' },
    });
  });

  it('drops its write when the job is cancelled while the status call is in flight', async () => {
    const ctx = await createTestContext();
    const { jobId } = await dispatchedJob(ctx);
    adapterOf(ctx, 'alpha').statusHandler = async () => {
      await ctx.services.jobs.cancel([jobId], ctx.tokens.operator);
      return StatusSequence.of(['COMPLETED']);
    };

    const summary = await ctx.services.reconciliation.reconcileOnce();

    expect(summary.outcomes[0]).toMatchObject({ outcome: 'skipped', reason: 'cancellation requested' });
    expect(ctx.persistence.job(jobId)?.status).toBe('CANCELLED');
  });

  it('drops its write when the schedule is withdrawn and replaced while the status call is in flight', async () => {
    const ctx = await createTestContext({
      clusters: [
        { clusterId: 'alpha', capabilities: ['cpu'] },
        { clusterId: 'beta', capabilities: ['cpu'] },
      ],
    });
    const { jobId, schedule } = await dispatchedJob(ctx);
    adapterOf(ctx, 'alpha').statusHandler = async () => {
      await ctx.services.schedules.delete([{ scheduleId: schedule.scheduleId }], ctx.tokens.operator);
      await ctx.services.schedules.create([{ jobId, clusterId: 'beta' }], ctx.tokens.operator);
      return StatusSequence.of(['FAILED']);
    };

    const summary = await ctx.services.reconciliation.reconcileOnce();

    expect(summary.outcomes).toEqual([
      { scheduleId: schedule.scheduleId, jobId, outcome: 'skipped', reason: 'schedule withdrawn' },
    ]);
    expect(ctx.persistence.job(jobId)?.status).toBe('SCHEDULED');
    expect(ctx.persistence.job(jobId)?.error).toBeUndefined();
    expect(ctx.persistence.schedulesFor(jobId).filter((s) => s.active).map((s) => s.clusterId)).toEqual(['beta']);
  });

  it('never polls the same job twice at once', async () => {
    const ctx = await createTestContext();
    const { schedule } = await dispatchedJob(ctx);
    const alpha = adapterOf(ctx, 'alpha');
    alpha.statusHandler = async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return StatusSequence.of(['RUNNING']);
    };

    const [first, second] = await Promise.all([
      ctx.services.reconciliation.reconcileSchedule(schedule),
      ctx.services.reconciliation.reconcileSchedule(schedule),
    ]);

    expect(alpha.maxInFlight).toBe(1);
    expect(first).toMatchObject({ outcome: 'updated', to: 'RUNNING' });
    expect(second).toMatchObject({ outcome: 'unchanged', status: 'RUNNING' });
  });

  it('polls different jobs side by side', async () => {
    const ctx = await createTestContext();
    await dispatchedJob(ctx);
    await dispatchedJob(ctx);
    const alpha = adapterOf(ctx, 'alpha');
    alpha.statusHandler = async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return StatusSequence.of(['RUNNING']);
    };

    const summary = await ctx.services.reconciliation.reconcileOnce();

    expect(summary).toMatchObject({ polled: 2, updated: 2, failed: 0 });
    expect(alpha.maxInFlight).toBe(2);
  });
});
