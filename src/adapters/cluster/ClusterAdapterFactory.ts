import { AxiosInstance } from 'axios';
import { ClusterDefinition } from '../../types';
import { logger } from '../../utils/logger';
import { ClusterAdapter } from './ClusterAdapter';
import { KubernetesClusterAdapter } from './KubernetesClusterAdapter';
import { SlurmClusterAdapter } from './SlurmClusterAdapter';

export class ClusterAdapterFactory {
  /**
   * Picks the backend integration from `definition.backend.kind`. `http`
   * overrides the HTTP client the adapter would otherwise build.
   */
  static create(definition: ClusterDefinition, http?: AxiosInstance): ClusterAdapter {
    const { backend } = definition;
    let adapter: ClusterAdapter;

    switch (backend.kind) {
      case 'slurm':
        adapter = new SlurmClusterAdapter({ ...definition, backend }, http);
        break;
      case 'kubernetes':
        adapter = new KubernetesClusterAdapter({ ...definition, backend }, http);
        break;
      default: {
        const unknownBackend: never = backend;
        throw new Error(`Unknown cluster backend: ${JSON.stringify(unknownBackend)}`);
      }
    }

    logger.info(`🔌 Cluster ${definition.clusterId} wired to ${backend.kind} backend at ${backend.baseUrl}`);
    return adapter;
  }
}
