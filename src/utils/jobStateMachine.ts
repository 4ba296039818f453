import { JobStatus } from '../types';
import { InvalidTransitionError } from '../types/errors';

const RANK: Record<JobStatus, number> = {
  PENDING: 0,
  SCHEDULED: 1,
  RUNNING: 2,
  SUCCEEDED: 3,
  FAILED: 3,
  CANCELLED: 3,
};

const ABSORBING: ReadonlySet<JobStatus> = new Set<JobStatus>(['FAILED', 'CANCELLED']);

export const isTerminal = (status: JobStatus): boolean => RANK[status] === 3;

/**
 * Whether a job may move from `from` to `to`. Status only moves forward,
 * except FAILED and CANCELLED which are reachable from any live state.
 * Nothing leaves a terminal state.
 */
export const canTransition = (from: JobStatus, to: JobStatus): boolean => {
  if (isTerminal(from)) return false;
  if (ABSORBING.has(to)) return true;
  return RANK[to] > RANK[from];
};

/**
 * Returns the status the job ends up in. Writing the current status again is
 * a no-op; anything else that `canTransition` refuses throws.
 */
export const transitionJob = (from: JobStatus, to: JobStatus): JobStatus => {
  if (from === to) return from;
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
  return to;
};
