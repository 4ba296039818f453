import { v4 as uuidv4 } from 'uuid';
import { PersistenceLayer } from '../repositories/PersistenceLayer';
import { BatchResult, Job, JobFilter, JobSpec, SessionToken } from '../types';
import { ConflictError, NotFoundError, UnauthorizedError } from '../types/errors';
import { runBatch } from '../utils/batch';
import { isTerminal, transitionJob } from '../utils/jobStateMachine';
import { logger } from '../utils/logger';
import { IdentityProvider, requireAuthorization } from './AuthService';

export class JobService {
  constructor(
    private readonly persistence: PersistenceLayer,
    private readonly identity: IdentityProvider,
  ) {}

  /**
   * 📥 Submit jobs. Each one starts PENDING and is owned by the caller.
   */
  async submit(specs: JobSpec[], token: SessionToken | undefined): Promise<BatchResult<Job>[]> {
    const principal = await requireAuthorization(this.identity, token, 'job:submit');

    return runBatch('job-submit', specs, async (spec) => {
      const now = new Date();
      const job = await this.persistence.repositories.jobs.insert({
        jobId: uuidv4(),
        status: 'PENDING',
        owner: principal.userId,
        spec,
        cancelRequested: false,
        createdAt: now,
        updatedAt: now,
      });

      logger.info(`📥 Job ${job.jobId} submitted by ${principal.email}`);
      return job;
    });
  }

  async get(jobId: string): Promise<Job> {
    const job = await this.persistence.repositories.jobs.findById(jobId);
    if (!job) throw new NotFoundError(`Job ${jobId}`);
    return job;
  }

  async list(filter: JobFilter = {}): Promise<Job[]> {
    return this.persistence.repositories.jobs.find(filter);
  }

  /**
   * 🛑 Cancel jobs. Flags the job first so a reconciliation pass already in
   * flight drops its write, then moves it to CANCELLED and withdraws its
   * schedule. Operators may only cancel their own jobs.
   */
  async cancel(jobIds: string[], token: SessionToken | undefined): Promise<BatchResult<Job>[]> {
    const principal = await requireAuthorization(this.identity, token, 'job:cancel');

    return runBatch('job-cancel', jobIds, (jobId) =>
      this.persistence.transaction(async ({ jobs, schedules }) => {
        const job = await jobs.findById(jobId);
        if (!job) throw new NotFoundError(`Job ${jobId}`);
        if (principal.role !== 'admin' && job.owner !== principal.userId) {
          throw new UnauthorizedError(`Job ${jobId} belongs to another user`);
        }
        if (isTerminal(job.status)) {
          throw new ConflictError(`Job ${jobId} is already ${job.status}`, 'JOB_TERMINAL');
        }

        const cancelled = await jobs.update(jobId, {
          cancelRequested: true,
          status: transitionJob(job.status, 'CANCELLED'),
        });
        if (!cancelled) throw new NotFoundError(`Job ${jobId}`);

        const schedule = await schedules.findActiveByJob(jobId);
        if (schedule) await schedules.deactivate(schedule.scheduleId);

        logger.info(`🛑 Job ${jobId} cancelled by ${principal.email}`);
        return cancelled;
      }),
    );
  }
}
