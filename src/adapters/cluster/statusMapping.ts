import { ClusterBackendKind, JobStatus } from '../../types';

type StatusTable = Readonly<Record<string, JobStatus>>;

const SLURM_STATUS: StatusTable = {
  PENDING: 'SCHEDULED',
  CONFIGURING: 'SCHEDULED',
  REQUEUED: 'SCHEDULED',
  RUNNING: 'RUNNING',
  COMPLETING: 'RUNNING',
  SUSPENDED: 'RUNNING',
  STOPPED: 'RUNNING',
  COMPLETED: 'SUCCEEDED',
  FAILED: 'FAILED',
  TIMEOUT: 'FAILED',
  NODE_FAIL: 'FAILED',
  OUT_OF_MEMORY: 'FAILED',
  BOOT_FAIL: 'FAILED',
  DEADLINE: 'FAILED',
  PREEMPTED: 'FAILED',
  CANCELLED: 'CANCELLED',
};

const KUBERNETES_STATUS: StatusTable = {
  PENDING: 'SCHEDULED',
  ACTIVE: 'RUNNING',
  RUNNING: 'RUNNING',
  SUCCEEDED: 'SUCCEEDED',
  COMPLETE: 'SUCCEEDED',
  FAILED: 'FAILED',
  // A suspended Job has no running pods and may be resumed.
  SUSPENDED: 'SCHEDULED',
};

export const STATUS_TABLES: Readonly<Record<ClusterBackendKind, StatusTable>> = {
  slurm: SLURM_STATUS,
  kubernetes: KUBERNETES_STATUS,
};

/** Maps one backend status string; unknown vocabulary yields undefined. */
export const mapBackendStatus = (kind: ClusterBackendKind, raw: string): JobStatus | undefined =>
  STATUS_TABLES[kind][raw.trim().toUpperCase()];

/**
 * Folds the statuses of every sub-task of one job into a single job status.
 * Any failure fails the job; a cancelled sub-task cancels it; the job has
 * succeeded only when every sub-task has. Returns undefined when nothing in
 * `statuses` is recognised.
 */
export const aggregateStatuses = (
  kind: ClusterBackendKind,
  statuses: Iterable<string>,
): JobStatus | undefined => {
  const mapped: JobStatus[] = [];
  for (const raw of statuses) {
    const status = mapBackendStatus(kind, raw);
    if (status) mapped.push(status);
  }

  if (mapped.length === 0) return undefined;
  if (mapped.includes('FAILED')) return 'FAILED';
  if (mapped.includes('CANCELLED')) return 'CANCELLED';
  if (mapped.every((s) => s === 'SUCCEEDED')) return 'SUCCEEDED';
  if (mapped.some((s) => s === 'RUNNING' || s === 'SUCCEEDED')) return 'RUNNING';
  return 'SCHEDULED';
};
