import { v4 as uuidv4 } from 'uuid';
import { PersistenceLayer } from '../repositories/PersistenceLayer';
import {
  BatchResult,
  Schedule,
  ScheduleDelete,
  ScheduleGetQueryParams,
  ScheduledCreateRequest,
  ScheduleUpdate,
  SessionToken,
} from '../types';
import {
  ConflictError,
  DuplicateScheduleError,
  InvalidQueryError,
  NotFoundError,
  ScheduleNotFoundError,
} from '../types/errors';
import { runBatch, succeeded } from '../utils/batch';
import { SCHEDULE_QUERY_FIELDS } from '../utils/constants';
import { isTerminal, transitionJob } from '../utils/jobStateMachine';
import { logger } from '../utils/logger';
import { IdentityProvider, requireAuthorization } from './AuthService';
import { Scheduler } from './SchedulerService';

/** Query as it arrives from a caller; the type is checked here. */
export type ScheduleLookupRequest = Omit<ScheduleGetQueryParams, 'queryType'> & { queryType: string };

const isQueryType = (value: string): value is keyof typeof SCHEDULE_QUERY_FIELDS =>
  Object.prototype.hasOwnProperty.call(SCHEDULE_QUERY_FIELDS, value);

/**
 * Persists schedules and guards the one-active-schedule-per-job rule.
 * Every item of a batch runs in its own transaction and fails on its own.
 */
export class ScheduleService {
  constructor(
    private readonly persistence: PersistenceLayer,
    private readonly identity: IdentityProvider,
  ) {}

  /**
   * 🗓️ Create schedules for jobs the scheduler has already placed
   */
  async create(requests: ScheduledCreateRequest[], token: SessionToken | undefined): Promise<BatchResult<Schedule>[]> {
    const principal = await requireAuthorization(this.identity, token, 'schedule:create');

    return runBatch('schedule-create', requests, (request) =>
      this.persistence.transaction(async ({ jobs, schedules }) => {
        const job = await jobs.findById(request.jobId);
        if (!job) throw new NotFoundError(`Job ${request.jobId}`);
        if (isTerminal(job.status)) {
          throw new ConflictError(`Job ${job.jobId} is already ${job.status}`, 'JOB_TERMINAL');
        }
        if (await schedules.findActiveByJob(job.jobId)) throw new DuplicateScheduleError(job.jobId);

        const now = new Date();
        const schedule = await schedules.insert({
          scheduleId: uuidv4(),
          jobId: job.jobId,
          clusterId: request.clusterId,
          externalJobId: null,
          owner: principal.userId,
          active: true,
          createdAt: now,
          updatedAt: now,
        });

        if (job.status === 'PENDING') {
          await jobs.update(job.jobId, { status: transitionJob(job.status, 'SCHEDULED') });
        }

        logger.info(`🗓️ Schedule ${schedule.scheduleId} created: job ${job.jobId} → ${schedule.clusterId}`);
        return schedule;
      }),
    );
  }

  /**
   * Schedules matching one field. No match is an empty list, not an error.
   */
  async get(query: ScheduleLookupRequest): Promise<Schedule[]> {
    const { queryType } = query;
    if (!isQueryType(queryType)) throw new InvalidQueryError(queryType);

    return this.persistence.repositories.schedules.find({
      field: SCHEDULE_QUERY_FIELDS[queryType],
      value: query.value,
      includeInactive: query.includeInactive,
    });
  }

  async update(updates: ScheduleUpdate[], token: SessionToken | undefined): Promise<BatchResult<Schedule>[]> {
    await requireAuthorization(this.identity, token, 'schedule:update');

    return runBatch('schedule-update', updates, (update) =>
      this.persistence.transaction(async ({ schedules }) => {
        const schedule = await schedules.update(update.scheduleId, { externalJobId: update.externalJobId });
        if (!schedule) throw new ScheduleNotFoundError(update.scheduleId);
        return schedule;
      }),
    );
  }

  /**
   * Soft-deletes schedules. The job keeps its status.
   */
  async delete(
    deletes: ScheduleDelete[],
    token: SessionToken | undefined,
  ): Promise<BatchResult<{ scheduleId: string }>[]> {
    await requireAuthorization(this.identity, token, 'schedule:delete');

    return runBatch('schedule-delete', deletes, (item) =>
      this.persistence.transaction(async ({ schedules }) => {
        const removed = await schedules.deactivate(item.scheduleId);
        if (!removed) throw new ScheduleNotFoundError(item.scheduleId);

        logger.info(`🗑️ Schedule ${removed.scheduleId} withdrawn (job ${removed.jobId})`);
        return { scheduleId: removed.scheduleId };
      }),
    );
  }

  async listActive(): Promise<Schedule[]> {
    return this.persistence.repositories.schedules.listActive();
  }
}

/**
 * Places each job with the scheduler, then stores the placements in one
 * batch. A job the scheduler could not place keeps its failure and its
 * position in the result.
 */
export async function scheduleJobs(
  scheduler: Scheduler,
  store: ScheduleService,
  jobIds: string[],
  token: SessionToken | undefined,
): Promise<BatchResult<Schedule>[]> {
  const placed = await runBatch('schedule-place', jobIds, (jobId) => scheduler.schedule({ jobId }));
  const requests = succeeded(placed);
  const created = requests.length > 0 ? await store.create(requests, token) : [];

  let cursor = 0;
  return placed.map((result): BatchResult<Schedule> => {
    if (!result.ok) return result;
    return { ...created[cursor++], index: result.index };
  });
}
