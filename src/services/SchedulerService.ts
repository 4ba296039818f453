import { PersistenceLayer } from '../repositories/PersistenceLayer';
import { Cluster, Job, ScheduleCreate, ScheduledCreateRequest } from '../types';
import { NoEligibleClusterError, NotFoundError } from '../types/errors';
import { logger } from '../utils/logger';
import { byClusterId, ClusterDirectory } from './ClusterRegistry';

export type SchedulingStrategyName = 'least-loaded' | 'first-fit';

/** Picks one cluster out of a non-empty list of eligible ones. */
export type SchedulingStrategy = (eligible: readonly Cluster[]) => Cluster;

const isFull = ({ capacity }: Cluster): boolean => capacity.limit > 0 && capacity.load >= capacity.limit;

/**
 * Clusters offering every capability the job requires and still below
 * their concurrency limit.
 */
export const eligibleClusters = (job: Job, clusters: readonly Cluster[]): Cluster[] =>
  clusters.filter(
    (cluster) =>
      !isFull(cluster) && job.spec.requiredCapabilities.every((label) => cluster.capabilities.includes(label)),
  );

/** Lowest load wins; equal loads go to the lowest cluster id. */
export const leastLoaded: SchedulingStrategy = (eligible) =>
  [...eligible].sort((a, b) => a.capacity.load - b.capacity.load || byClusterId(a, b))[0];

export const firstFit: SchedulingStrategy = (eligible) => [...eligible].sort(byClusterId)[0];

export interface SchedulerDeps {
  persistence: PersistenceLayer;
  clusters: ClusterDirectory;
}

export class Scheduler {
  constructor(
    readonly strategyName: SchedulingStrategyName,
    private readonly strategy: SchedulingStrategy,
    private readonly deps: SchedulerDeps,
  ) {}

  /**
   * Binds a job to a cluster. Does not check for an existing schedule; the
   * schedule store rejects duplicates.
   */
  async schedule(request: ScheduleCreate): Promise<ScheduledCreateRequest> {
    const job = await this.deps.persistence.repositories.jobs.findById(request.jobId);
    if (!job) throw new NotFoundError(`Job ${request.jobId}`);

    const eligible = eligibleClusters(job, await this.deps.clusters.listClusters());
    if (eligible.length === 0) {
      throw new NoEligibleClusterError(job.jobId, job.spec.requiredCapabilities);
    }

    const chosen = this.strategy(eligible);
    logger.debug(
      `🧭 [${this.strategyName}] job ${job.jobId} → ${chosen.clusterId} (load ${chosen.capacity.load}/${chosen.capacity.limit || '∞'})`,
    );
    return { jobId: job.jobId, clusterId: chosen.clusterId };
  }
}

export class SchedulerFactory {
  static create(name: SchedulingStrategyName, deps: SchedulerDeps): Scheduler {
    switch (name) {
      case 'least-loaded':
        return new Scheduler(name, leastLoaded, deps);
      case 'first-fit':
        return new Scheduler(name, firstFit, deps);
      default: {
        const unknownStrategy: never = name;
        throw new Error(`Unknown scheduling strategy: ${String(unknownStrategy)}`);
      }
    }
  }

  static getAvailableStrategies(): SchedulingStrategyName[] {
    return ['least-loaded', 'first-fit'];
  }
}
