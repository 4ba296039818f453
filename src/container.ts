import { ClusterAdapter } from './adapters/cluster/ClusterAdapter';
import { ClusterAdapterFactory } from './adapters/cluster/ClusterAdapterFactory';
import { AppConfig } from './config/app.config';
import { PersistenceLayer } from './repositories/PersistenceLayer';
import { AuthService } from './services/AuthService';
import { ClusterRegistry } from './services/ClusterRegistry';
import { DispatchService } from './services/DispatchService';
import { JobService } from './services/JobService';
import { JWTService } from './services/JWTService';
import { ReconciliationService } from './services/ReconciliationService';
import { Scheduler, SchedulerFactory } from './services/SchedulerService';
import { ScheduleService } from './services/ScheduleService';
import { ClusterDefinition } from './types';

export interface Services {
  auth: AuthService;
  clusters: ClusterRegistry;
  scheduler: Scheduler;
  schedules: ScheduleService;
  jobs: JobService;
  dispatcher: DispatchService;
  reconciliation: ReconciliationService;
}

export interface ContainerOptions {
  /** Builds one adapter per definition; defaults to the HTTP backends. */
  createAdapter?: (definition: ClusterDefinition) => ClusterAdapter;
  wait?: (ms: number) => Promise<void>;
}

/**
 * Wires every service around one persistence handle. Shared by the API
 * server, the reconciliation worker and the tests.
 */
export function buildServices(
  config: AppConfig,
  persistence: PersistenceLayer,
  definitions: readonly ClusterDefinition[],
  options: ContainerOptions = {},
): Services {
  const createAdapter = options.createAdapter ?? ((definition) => ClusterAdapterFactory.create(definition));

  const auth = new AuthService(persistence, new JWTService(config.jwt.secret, config.jwt.expiresInSeconds));
  const clusters = new ClusterRegistry(
    persistence,
    definitions.map((definition) => ({ adapter: createAdapter(definition), limit: definition.limit })),
  );

  return {
    auth,
    clusters,
    scheduler: SchedulerFactory.create(config.scheduler, { persistence, clusters }),
    schedules: new ScheduleService(persistence, auth),
    jobs: new JobService(persistence, auth),
    dispatcher: new DispatchService(persistence, auth, clusters, config.clusterCallTimeoutMs),
    reconciliation: new ReconciliationService(persistence, clusters, {
      timeoutMs: config.clusterCallTimeoutMs,
      concurrency: config.reconcile.concurrency,
      retry: config.reconcile.retry,
      wait: options.wait,
    }),
  };
}
