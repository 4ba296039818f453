import { ClusterAdapter } from '../adapters/cluster/ClusterAdapter';
import { PersistenceLayer } from '../repositories/PersistenceLayer';
import { Cluster } from '../types';
import { NotFoundError } from '../types/errors';

/** What the scheduler and the dispatcher need to know about clusters. */
export interface ClusterDirectory {
  getAdapter(clusterId: string): ClusterAdapter;
  listClusters(): Promise<Cluster[]>;
}

/** Orders clusters by id, by code point. */
export const byClusterId = (a: Cluster, b: Cluster): number =>
  a.clusterId < b.clusterId ? -1 : a.clusterId > b.clusterId ? 1 : 0;

export interface RegisteredCluster {
  adapter: ClusterAdapter;
  /** 0 means unlimited */
  limit: number;
}

export class ClusterRegistry implements ClusterDirectory {
  private clusters = new Map<string, RegisteredCluster>();

  constructor(
    private readonly persistence: PersistenceLayer,
    clusters: readonly RegisteredCluster[] = [],
  ) {
    clusters.forEach((cluster) => this.register(cluster.adapter, cluster.limit));
  }

  register(adapter: ClusterAdapter, limit = 0): void {
    if (this.clusters.has(adapter.clusterId)) {
      throw new Error(`Cluster ${adapter.clusterId} is already registered`);
    }
    this.clusters.set(adapter.clusterId, { adapter, limit });
  }

  getAdapter(clusterId: string): ClusterAdapter {
    const cluster = this.clusters.get(clusterId);
    if (!cluster) throw new NotFoundError(`Cluster ${clusterId}`);
    return cluster.adapter;
  }

  /**
   * Every registered cluster with its current load, ordered by id.
   */
  async listClusters(): Promise<Cluster[]> {
    const load = await this.persistence.repositories.schedules.countActiveByCluster();

    return [...this.clusters.values()]
      .map(({ adapter, limit }) => ({
        clusterId: adapter.clusterId,
        capabilities: [...adapter.capabilities],
        capacity: { load: load.get(adapter.clusterId) ?? 0, limit },
      }))
      .sort(byClusterId);
  }
}
