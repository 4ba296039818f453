import { PersistenceLayer } from '../repositories/PersistenceLayer';
import { BatchResult, Job, Schedule, SessionToken } from '../types';
import {
  ConflictError,
  errorMessage,
  NotFoundError,
  PermanentBackendError,
  PreparationError,
  ScheduleNotFoundError,
} from '../types/errors';
import { runBatch } from '../utils/batch';
import { canTransition } from '../utils/jobStateMachine';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/retry';
import { IdentityProvider, requireAuthorization } from './AuthService';
import { ClusterDirectory } from './ClusterRegistry';

/**
 * Hands scheduled jobs to their cluster and records the backend's id. A
 * schedule is claimed in the store before its backend calls, so concurrent
 * dispatches of the same schedule submit it once.
 */
export class DispatchService {
  constructor(
    private readonly persistence: PersistenceLayer,
    private readonly identity: IdentityProvider,
    private readonly clusters: ClusterDirectory,
    private readonly timeoutMs: number,
  ) {}

  async dispatch(scheduleIds: string[], token: SessionToken | undefined): Promise<BatchResult<Schedule>[]> {
    await requireAuthorization(this.identity, token, 'schedule:update');
    return runBatch('dispatch', scheduleIds, (scheduleId) => this.dispatchOne(scheduleId));
  }

  private async dispatchOne(scheduleId: string): Promise<Schedule> {
    const { schedules, jobs } = this.persistence.repositories;

    const schedule = await schedules.findById(scheduleId);
    if (!schedule || !schedule.active) throw new ScheduleNotFoundError(scheduleId);
    if (schedule.externalJobId) {
      throw new ConflictError(
        `Schedule ${scheduleId} was already submitted as ${schedule.externalJobId}`,
        'ALREADY_DISPATCHED',
      );
    }

    const job = await jobs.findById(schedule.jobId);
    if (!job) throw new NotFoundError(`Job ${schedule.jobId}`);
    if (job.cancelRequested) throw new ConflictError(`Job ${job.jobId} was cancelled`, 'JOB_CANCELLED');

    const adapter = this.clusters.getAdapter(schedule.clusterId);
    const label = `${adapter.clusterId}/${job.jobId}`;

    // Prepare and submit are each bounded by timeoutMs; an older claim is stale.
    const staleBefore = new Date(Date.now() - this.timeoutMs * 3);
    if (!(await schedules.claimForDispatch(scheduleId, staleBefore))) {
      throw new ConflictError(`Schedule ${scheduleId} is already being dispatched`, 'ALREADY_DISPATCHED');
    }

    let externalJobId: string;
    try {
      await withTimeout(`prepare ${label}`, this.timeoutMs, (signal) =>
        adapter.prepare(job, { timeoutMs: this.timeoutMs, signal }),
      );
      externalJobId = await withTimeout(`submit ${label}`, this.timeoutMs, (signal) =>
        adapter.submit(job, { timeoutMs: this.timeoutMs, signal, submissionId: scheduleId }),
      );
    } catch (error) {
      if (error instanceof PreparationError || error instanceof PermanentBackendError) {
        await this.failJob(job, schedule, errorMessage(error));
      } else {
        await this.releaseClaim(scheduleId);
      }
      throw error;
    }

    const updated = await schedules.update(scheduleId, { externalJobId, dispatchStartedAt: null });
    if (!updated) {
      logger.warn(`⚠️ Schedule ${scheduleId} was withdrawn while ${externalJobId} was being submitted`);
      throw new ScheduleNotFoundError(scheduleId);
    }

    logger.info(`🚀 Job ${job.jobId} submitted to ${adapter.clusterId} as ${externalJobId}`);
    return updated;
  }

  private async releaseClaim(scheduleId: string): Promise<void> {
    try {
      await this.persistence.repositories.schedules.update(scheduleId, { dispatchStartedAt: null });
    } catch (error) {
      logger.error(`❌ Could not release dispatch claim on ${scheduleId}: ${errorMessage(error)}`);
    }
  }

  private async failJob(job: Job, schedule: Schedule, reason: string): Promise<void> {
    await this.persistence.transaction(async ({ jobs, schedules }) => {
      const current = await jobs.findById(job.jobId);
      if (current && canTransition(current.status, 'FAILED')) {
        await jobs.update(job.jobId, { status: 'FAILED', error: reason });
      }
      await schedules.deactivate(schedule.scheduleId);
    });
    logger.error(`❌ Job ${job.jobId} failed on ${schedule.clusterId}: ${reason}`);
  }
}
