import mongoose, { ClientSession, FilterQuery } from 'mongoose';
import { JobModel } from '../models/Job.model';
import { ScheduleModel } from '../models/Schedule.model';
import { UserModel } from '../models/User.model';
import { Job, JobFilter, JobUpdate, Schedule, User } from '../types';
import { DuplicateScheduleError, errorMessage } from '../types/errors';
import { logger } from '../utils/logger';
import {
  JobRepository,
  PersistenceLayer,
  Repositories,
  ScheduleChanges,
  ScheduleLookup,
  ScheduleRepository,
  UserRepository,
} from './PersistenceLayer';

const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;

// --- mappers: strip _id / __v from lean documents ---

const toJob = (doc: Job): Job => ({
  jobId: doc.jobId,
  status: doc.status,
  owner: doc.owner,
  spec: doc.spec,
  cancelRequested: doc.cancelRequested,
  error: doc.error ?? undefined,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toSchedule = (doc: Schedule): Schedule => ({
  scheduleId: doc.scheduleId,
  jobId: doc.jobId,
  clusterId: doc.clusterId,
  externalJobId: doc.externalJobId ?? null,
  owner: doc.owner,
  active: doc.active,
  dispatchStartedAt: doc.dispatchStartedAt ?? undefined,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
  deletedAt: doc.deletedAt ?? undefined,
});

const toUser = (doc: User): User => ({
  userId: doc.userId,
  email: doc.email,
  name: doc.name,
  organisation: doc.organisation ?? undefined,
  role: doc.role,
  passwordHash: doc.passwordHash,
  createdAt: doc.createdAt,
});

class MongoJobRepository implements JobRepository {
  constructor(private readonly session: ClientSession | null) {}

  async insert(job: Job): Promise<Job> {
    const [created] = await JobModel.create([job], { session: this.session });
    return toJob(created.toObject());
  }

  async findById(jobId: string): Promise<Job | null> {
    const doc = await JobModel.findOne({ jobId }).session(this.session).lean<Job>();
    return doc ? toJob(doc) : null;
  }

  async find(filter: JobFilter): Promise<Job[]> {
    const query: FilterQuery<Job> = {};
    if (filter.owner) query.owner = filter.owner;
    if (filter.status) query.status = filter.status;

    const docs = await JobModel.find(query)
      .session(this.session)
      .sort({ createdAt: -1 })
      .limit(500)
      .lean<Job[]>();
    return docs.map(toJob);
  }

  async update(jobId: string, changes: JobUpdate): Promise<Job | null> {
    const $set: Partial<Job> = {};
    if (changes.status !== undefined) $set.status = changes.status;
    if (changes.cancelRequested !== undefined) $set.cancelRequested = changes.cancelRequested;
    if (changes.error !== undefined) $set.error = changes.error;

    const doc = await JobModel.findOneAndUpdate(
      { jobId },
      { $set },
      { new: true, session: this.session },
    ).lean<Job>();
    return doc ? toJob(doc) : null;
  }
}

class MongoScheduleRepository implements ScheduleRepository {
  constructor(private readonly session: ClientSession | null) {}

  async insert(schedule: Schedule): Promise<Schedule> {
    try {
      const [created] = await ScheduleModel.create([schedule], { session: this.session });
      return toSchedule(created.toObject());
    } catch (error) {
      if (isDuplicateKeyError(error)) throw new DuplicateScheduleError(schedule.jobId);
      throw error;
    }
  }

  async findById(scheduleId: string): Promise<Schedule | null> {
    const doc = await ScheduleModel.findOne({ scheduleId }).session(this.session).lean<Schedule>();
    return doc ? toSchedule(doc) : null;
  }

  async findActiveByJob(jobId: string): Promise<Schedule | null> {
    const doc = await ScheduleModel.findOne({ jobId, active: true })
      .session(this.session)
      .lean<Schedule>();
    return doc ? toSchedule(doc) : null;
  }

  async find(lookup: ScheduleLookup): Promise<Schedule[]> {
    const query: FilterQuery<Schedule> = {};
    query[lookup.field] = lookup.value;
    if (!lookup.includeInactive) query.active = true;

    const docs = await ScheduleModel.find(query)
      .session(this.session)
      .sort({ createdAt: -1 })
      .lean<Schedule[]>();
    return docs.map(toSchedule);
  }

  async listActive(): Promise<Schedule[]> {
    const docs = await ScheduleModel.find({ active: true })
      .session(this.session)
      .sort({ updatedAt: 1 })
      .lean<Schedule[]>();
    return docs.map(toSchedule);
  }

  async countActiveByCluster(): Promise<Map<string, number>> {
    const rows = await ScheduleModel.aggregate<{ _id: string; count: number }>([
      { $match: { active: true } },
      { $group: { _id: '$clusterId', count: { $sum: 1 } } },
    ]).session(this.session);
    return new Map(rows.map((row) => [row._id, row.count]));
  }

  async update(scheduleId: string, changes: ScheduleChanges): Promise<Schedule | null> {
    const $set: ScheduleChanges & { updatedAt: Date } = { updatedAt: new Date() };
    if (changes.externalJobId !== undefined) $set.externalJobId = changes.externalJobId;
    if (changes.dispatchStartedAt !== undefined) $set.dispatchStartedAt = changes.dispatchStartedAt;

    const doc = await ScheduleModel.findOneAndUpdate(
      { scheduleId, active: true },
      { $set },
      { new: true, session: this.session, timestamps: false },
    ).lean<Schedule>();
    return doc ? toSchedule(doc) : null;
  }

  async claimForDispatch(scheduleId: string, staleBefore: Date): Promise<Schedule | null> {
    const now = new Date();
    const doc = await ScheduleModel.findOneAndUpdate(
      {
        scheduleId,
        active: true,
        externalJobId: null,
        $or: [{ dispatchStartedAt: null }, { dispatchStartedAt: { $lt: staleBefore } }],
      },
      { $set: { dispatchStartedAt: now, updatedAt: now } },
      { new: true, session: this.session, timestamps: false },
    ).lean<Schedule>();
    return doc ? toSchedule(doc) : null;
  }

  async deactivate(scheduleId: string): Promise<Schedule | null> {
    const now = new Date();
    const doc = await ScheduleModel.findOneAndUpdate(
      { scheduleId, active: true },
      { $set: { active: false, deletedAt: now, updatedAt: now } },
      { new: true, session: this.session, timestamps: false },
    ).lean<Schedule>();
    return doc ? toSchedule(doc) : null;
  }
}

class MongoUserRepository implements UserRepository {
  constructor(private readonly session: ClientSession | null) {}

  async insert(user: User): Promise<User> {
    const [created] = await UserModel.create([user], { session: this.session });
    return toUser(created.toObject());
  }

  async findByEmail(email: string): Promise<User | null> {
    const doc = await UserModel.findOne({ email: email.toLowerCase() })
      .select('+passwordHash')
      .session(this.session)
      .lean<User>();
    return doc ? toUser(doc) : null;
  }

  async findById(userId: string): Promise<User | null> {
    const doc = await UserModel.findOne({ userId }).session(this.session).lean<User>();
    return doc ? toUser(doc) : null;
  }

  async count(): Promise<number> {
    return UserModel.countDocuments().session(this.session);
  }
}

const bindRepositories = (session: ClientSession | null): Repositories => ({
  jobs: new MongoJobRepository(session),
  schedules: new MongoScheduleRepository(session),
  users: new MongoUserRepository(session),
});

/** The part of a driver session that `transaction` relies on. */
export interface TransactionSession {
  /** Runs `fn` in a transaction, retrying transient conflicts and unknown commit results. */
  withTransaction(fn: () => Promise<unknown>): Promise<unknown>;
  endSession(): Promise<void>;
}

/**
 * Runs `work` through the session's managed transaction and ends the
 * session afterwards. The value of the last, committed attempt is returned.
 */
export const runInSession = async <T>(session: TransactionSession, work: () => Promise<T>): Promise<T> => {
  const attempt: { outcome?: { value: T } } = {};
  try {
    await session.withTransaction(async () => {
      attempt.outcome = { value: await work() };
    });
  } catch (error) {
    logger.debug(`↩️ Transaction aborted: ${errorMessage(error)}`);
    throw error;
  } finally {
    await session.endSession();
  }

  if (!attempt.outcome) throw new Error('Transaction committed without running its work');
  return attempt.outcome.value;
};

/**
 * Mongoose-backed persistence. Needs a replica set for multi-document
 * transactions.
 */
export class MongoPersistence implements PersistenceLayer {
  readonly repositories: Repositories = bindRepositories(null);

  async transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const session = await mongoose.startSession();
    return runInSession(session, () => work(bindRepositories(session)));
  }

  /** Builds the indexes the schedule uniqueness invariant relies on. */
  async ensureIndexes(): Promise<void> {
    await Promise.all([JobModel.syncIndexes(), ScheduleModel.syncIndexes(), UserModel.syncIndexes()]);
    logger.info('🗂️ MongoDB indexes in sync');
  }
}
