import { Job, JobFilter, JobUpdate, Schedule, User } from '../types';

export type ScheduleField = 'scheduleId' | 'jobId' | 'clusterId';

export interface ScheduleLookup {
  field: ScheduleField;
  value: string;
  includeInactive?: boolean;
}

export interface ScheduleChanges {
  externalJobId?: string | null;
  /** null releases the dispatch claim. */
  dispatchStartedAt?: Date | null;
}

export interface JobRepository {
  insert(job: Job): Promise<Job>;
  findById(jobId: string): Promise<Job | null>;
  find(filter: JobFilter): Promise<Job[]>;
  /** Returns the updated job, or null when it does not exist. */
  update(jobId: string, changes: JobUpdate): Promise<Job | null>;
}

export interface ScheduleRepository {
  /** Throws `DuplicateScheduleError` when the job already has an active schedule. */
  insert(schedule: Schedule): Promise<Schedule>;
  findById(scheduleId: string): Promise<Schedule | null>;
  findActiveByJob(jobId: string): Promise<Schedule | null>;
  find(lookup: ScheduleLookup): Promise<Schedule[]>;
  listActive(): Promise<Schedule[]>;
  countActiveByCluster(): Promise<Map<string, number>>;
  /** Applies `changes` and bumps `updatedAt`; null when no active schedule matches. */
  update(scheduleId: string, changes: ScheduleChanges): Promise<Schedule | null>;
  /**
   * Atomically marks an active, unsubmitted schedule as being dispatched.
   * A claim older than `staleBefore` may be taken over. Null when the
   * schedule is gone, already submitted, or claimed by someone else.
   */
  claimForDispatch(scheduleId: string, staleBefore: Date): Promise<Schedule | null>;
  /** Soft delete. Null when no active schedule matches. */
  deactivate(scheduleId: string): Promise<Schedule | null>;
}

export interface UserRepository {
  insert(user: User): Promise<User>;
  /** Includes `passwordHash`. */
  findByEmail(email: string): Promise<User | null>;
  findById(userId: string): Promise<User | null>;
  count(): Promise<number>;
}

export interface Repositories {
  jobs: JobRepository;
  schedules: ScheduleRepository;
  users: UserRepository;
}

/**
 * Handle on the store. `transaction` runs `work` against repositories bound
 * to a single transaction: it commits when `work` resolves, aborts when it
 * throws, and always releases the underlying session. `work` may run more
 * than once when the store retries a transient conflict, so it must only
 * touch the repositories it is given.
 */
export interface PersistenceLayer {
  readonly repositories: Repositories;
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
