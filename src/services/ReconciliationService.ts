import { PersistenceLayer } from '../repositories/PersistenceLayer';
import { BatchFailure, JobStatus, Schedule } from '../types';
import { aggregateStatuses } from '../adapters/cluster/statusMapping';
import { toBatchFailure } from '../utils/batch';
import { canTransition, isTerminal } from '../utils/jobStateMachine';
import { KeyedLock } from '../utils/KeyedLock';
import { logger } from '../utils/logger';
import { RetryPolicy, sleep, withRetry, withTimeout } from '../utils/retry';
import { ClusterDirectory } from './ClusterRegistry';

interface OutcomeBase {
  scheduleId: string;
  jobId: string;
}

export type ReconcileOutcome =
  | (OutcomeBase & { outcome: 'updated'; from: JobStatus; to: JobStatus })
  | (OutcomeBase & { outcome: 'unchanged'; status: JobStatus })
  | (OutcomeBase & { outcome: 'skipped'; reason: string })
  | (OutcomeBase & { outcome: 'failed'; error: BatchFailure });

export interface ReconciliationOptions {
  timeoutMs: number;
  concurrency: number;
  retry: RetryPolicy;
  /** Delay between retries; tests pass a no-op. */
  wait?: (ms: number) => Promise<void>;
}

export interface ReconcileSummary {
  polled: number;
  updated: number;
  failed: number;
  outcomes: ReconcileOutcome[];
}

/**
 * Polls the clusters for every submitted, still-live job and moves job
 * status forward. One job is never polled twice at the same time.
 */
export class ReconciliationService {
  private readonly locks = new KeyedLock();
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly persistence: PersistenceLayer,
    private readonly clusters: ClusterDirectory,
    private readonly options: ReconciliationOptions,
  ) {
    this.wait = options.wait ?? sleep;
  }

  /**
   * 🔄 One pass over all active, submitted schedules.
   */
  async reconcileOnce(): Promise<ReconcileSummary> {
    const targets = (await this.persistence.repositories.schedules.listActive()).filter(
      (schedule) => schedule.externalJobId !== null,
    );

    const outcomes = new Array<ReconcileOutcome>(targets.length);
    let next = 0;
    const poolSize = Math.max(1, Math.min(this.options.concurrency, targets.length));

    await Promise.all(
      Array.from({ length: poolSize }, async () => {
        while (next < targets.length) {
          const index = next++;
          outcomes[index] = await this.reconcileSchedule(targets[index]);
        }
      }),
    );

    const summary: ReconcileSummary = {
      polled: targets.length,
      updated: outcomes.filter((o) => o.outcome === 'updated').length,
      failed: outcomes.filter((o) => o.outcome === 'failed').length,
      outcomes,
    };

    if (summary.polled > 0) {
      logger.info(`🔄 Reconciled ${summary.polled} schedule(s): ${summary.updated} updated, ${summary.failed} failed`);
    }
    return summary;
  }

  async reconcileSchedule(schedule: Schedule): Promise<ReconcileOutcome> {
    const base: OutcomeBase = { scheduleId: schedule.scheduleId, jobId: schedule.jobId };

    return this.locks.run<ReconcileOutcome>(schedule.jobId, async () => {
      try {
        return await this.poll(schedule, base);
      } catch (error) {
        const failure = toBatchFailure(error);
        logger.warn(`⚠️ Reconciliation of job ${schedule.jobId} failed: ${failure.message}`);
        return { ...base, outcome: 'failed', error: failure };
      }
    });
  }

  private async poll(schedule: Schedule, base: OutcomeBase): Promise<ReconcileOutcome> {
    const { externalJobId } = schedule;
    if (externalJobId === null) return { ...base, outcome: 'skipped', reason: 'not submitted' };

    const job = await this.persistence.repositories.jobs.findById(schedule.jobId);
    if (!job) return { ...base, outcome: 'skipped', reason: 'job not found' };
    if (job.cancelRequested) return { ...base, outcome: 'skipped', reason: 'cancellation requested' };
    if (isTerminal(job.status)) return { ...base, outcome: 'skipped', reason: `job is ${job.status}` };

    const adapter = this.clusters.getAdapter(schedule.clusterId);
    const { timeoutMs, retry } = this.options;
    const label = `status ${adapter.clusterId}/${externalJobId}`;

    const statuses = await withRetry(
      label,
      retry,
      () => withTimeout(label, timeoutMs, (signal) => adapter.getStatus(externalJobId, { timeoutMs, signal })),
      this.wait,
    );
    const observed = aggregateStatuses(adapter.kind, statuses);

    return this.persistence.transaction<ReconcileOutcome>(async ({ jobs, schedules }) => {
      const current = await jobs.findById(schedule.jobId);
      if (!current) return { ...base, outcome: 'skipped', reason: 'job not found' };
      if (current.cancelRequested) return { ...base, outcome: 'skipped', reason: 'cancellation requested' };
      if (isTerminal(current.status)) return { ...base, outcome: 'skipped', reason: `job is ${current.status}` };

      const touched = await schedules.update(schedule.scheduleId, {});
      if (!touched || touched.externalJobId !== externalJobId) {
        return { ...base, outcome: 'skipped', reason: 'schedule withdrawn' };
      }

      if (!observed || observed === current.status || !canTransition(current.status, observed)) {
        if (observed && observed !== current.status) {
          logger.debug(`Ignoring ${observed} for job ${current.jobId}; it is already ${current.status}`);
        }
        return { ...base, outcome: 'unchanged', status: current.status };
      }

      await jobs.update(current.jobId, {
        status: observed,
        ...(observed === 'FAILED' && { error: `Cluster ${adapter.clusterId} reported ${externalJobId} as failed` }),
      });
      if (isTerminal(observed)) await schedules.deactivate(schedule.scheduleId);

      logger.info(`📈 Job ${current.jobId}: ${current.status} → ${observed}`);
      return { ...base, outcome: 'updated', from: current.status, to: observed };
    });
  }
}
