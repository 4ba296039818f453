// ============================================================================
// Job Types
// ============================================================================

export const JOB_STATUSES = [
  'PENDING',
  'SCHEDULED',
  'RUNNING',
  'SUCCEEDED',
  'FAILED',
  'CANCELLED',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export interface JobResources {
  cpus?: number;
  memoryMb?: number;
  gpus?: number;
  timeLimitMinutes?: number;
}

/**
 * Work description handed to a cluster backend. Only the typed fields are
 * read by the scheduler and the adapters; anything else rides along.
 */
export interface JobSpec {
  requiredCapabilities: string[];
  name?: string;
  script?: string;
  image?: string;
  command?: string[];
  env?: Record<string, string>;
  resources?: JobResources;
  [key: string]: unknown;
}

export interface Job {
  jobId: string;
  status: JobStatus;
  owner: string;
  spec: JobSpec;
  cancelRequested: boolean;
  error?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface JobUpdate {
  status?: JobStatus;
  cancelRequested?: boolean;
  error?: string;
}

export interface JobFilter {
  owner?: string;
  status?: JobStatus;
}

// ============================================================================
// Schedule Types
// ============================================================================

export interface Schedule {
  scheduleId: string;
  jobId: string;
  clusterId: string;
  externalJobId: string | null;
  owner: string;
  active: boolean;
  /** Set while a dispatcher holds the submission claim. */
  dispatchStartedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
  deletedAt?: Date;
}

export interface ScheduleCreate {
  jobId: string;
}

/** A create request the scheduler has already bound to a cluster. */
export interface ScheduledCreateRequest {
  jobId: string;
  clusterId: string;
}

export type ScheduleQueryType = 'schedule_id' | 'job_id' | 'cluster_id';

export interface ScheduleGetQueryParams {
  queryType: ScheduleQueryType;
  value: string;
  includeInactive?: boolean;
}

export interface ScheduleUpdate {
  scheduleId: string;
  externalJobId?: string;
}

export interface ScheduleDelete {
  scheduleId: string;
}

// ============================================================================
// Cluster Types
// ============================================================================

export interface ClusterCapacity {
  load: number;
  /** 0 means unlimited */
  limit: number;
}

export interface Cluster {
  clusterId: string;
  capabilities: string[];
  capacity: ClusterCapacity;
}

export interface SlurmBackendConfig {
  kind: 'slurm';
  baseUrl: string;
  apiVersion: string;
  user: string;
  token: string;
  partition?: string;
  account?: string;
}

export interface KubernetesBackendConfig {
  kind: 'kubernetes';
  baseUrl: string;
  namespace: string;
  token: string;
  serviceAccount?: string;
}

export type ClusterBackendConfig = SlurmBackendConfig | KubernetesBackendConfig;

export type ClusterBackendKind = ClusterBackendConfig['kind'];

export interface ClusterDefinition {
  clusterId: string;
  capabilities: string[];
  limit: number;
  backend: ClusterBackendConfig;
}

// ============================================================================
// User & Auth Types
// ============================================================================

export type UserRole = 'admin' | 'operator' | 'viewer';

export interface User {
  userId: string;
  email: string;
  name: string;
  organisation?: string;
  role: UserRole;
  passwordHash: string;
  createdAt: Date;
}

export interface UserCreate {
  email: string;
  name: string;
  organisation?: string;
  role: UserRole;
  password: string;
}

export interface AuthCredentials {
  email: string;
  password: string;
}

export type SessionToken = string;

export interface Principal {
  userId: string;
  email: string;
  role: UserRole;
}

export type Action =
  | 'job:read'
  | 'job:submit'
  | 'job:cancel'
  | 'schedule:read'
  | 'schedule:create'
  | 'schedule:update'
  | 'schedule:delete'
  | 'cluster:read'
  | 'user:create';

// ============================================================================
// Batch Results
// ============================================================================

export interface BatchFailure {
  code: string;
  message: string;
}

export type BatchResult<T> =
  | { index: number; ok: true; value: T }
  | { index: number; ok: false; error: BatchFailure };

// ============================================================================
// API Response Types
// ============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  message?: string;
  code?: string;
  data?: T;
  errors?: string[];
  error?: string;
}
