import { Action, UserRole } from '../types';

const VIEWER_ACTIONS: Action[] = ['job:read', 'schedule:read', 'cluster:read'];

const OPERATOR_ACTIONS: Action[] = [
  ...VIEWER_ACTIONS,
  'job:submit',
  'job:cancel',
  'schedule:create',
  'schedule:update',
  'schedule:delete',
];

export const ROLE_PERMISSIONS: Readonly<Record<UserRole, ReadonlySet<Action>>> = {
  viewer: new Set(VIEWER_ACTIONS),
  operator: new Set(OPERATOR_ACTIONS),
  admin: new Set<Action>([...OPERATOR_ACTIONS, 'user:create']),
};

export const SCHEDULE_QUERY_FIELDS = {
  schedule_id: 'scheduleId',
  job_id: 'jobId',
  cluster_id: 'clusterId',
} as const;

export const BULLMQ_CONSTANTS = {
  QUEUES: {
    RECONCILIATION: 'reconciliation',
  },
  JOBS: {
    RECONCILE: 'reconcile-schedules',
  },
  REPEAT_KEY: 'reconcile-loop',
};
