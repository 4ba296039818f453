import { describe, expect, it } from 'vitest';
import { StatusSequence } from '../../../src/adapters/cluster/ClusterAdapter';
import { ClusterAdapterFactory } from '../../../src/adapters/cluster/ClusterAdapterFactory';
import { KubernetesClusterAdapter } from '../../../src/adapters/cluster/KubernetesClusterAdapter';
import { SlurmClusterAdapter } from '../../../src/adapters/cluster/SlurmClusterAdapter';
import { aggregateStatuses, mapBackendStatus } from '../../../src/adapters/cluster/statusMapping';

describe('mapBackendStatus', () => {
  it('maps each backend vocabulary onto job statuses', () => {
    expect(mapBackendStatus('slurm', 'PENDING')).toBe('SCHEDULED');
    expect(mapBackendStatus('slurm', 'COMPLETING')).toBe('RUNNING');
    expect(mapBackendStatus('slurm', 'OUT_OF_MEMORY')).toBe('FAILED');
    expect(mapBackendStatus('kubernetes', 'Succeeded')).toBe('SUCCEEDED');
    expect(mapBackendStatus('kubernetes', ' pending ')).toBe('SCHEDULED');
  });

  it('treats a suspended Kubernetes Job as waiting, not cancelled', () => {
    expect(mapBackendStatus('kubernetes', 'Suspended')).toBe('SCHEDULED');
    expect(aggregateStatuses('kubernetes', ['Suspended'])).toBe('SCHEDULED');
  });

  it('returns undefined for unknown strings', () => {
    expect(mapBackendStatus('slurm', 'WHATEVER')).toBeUndefined();
    expect(mapBackendStatus('kubernetes', 'COMPLETED')).toBeUndefined();
  });
});

describe('aggregateStatuses', () => {
  it('fails the job when any sub-task failed', () => {
    expect(aggregateStatuses('slurm', ['COMPLETED', 'RUNNING', 'FAILED', 'CANCELLED'])).toBe('FAILED');
  });

  it('cancels the job when a sub-task was cancelled and none failed', () => {
    expect(aggregateStatuses('slurm', ['COMPLETED', 'CANCELLED'])).toBe('CANCELLED');
  });

  it('succeeds only when every sub-task succeeded', () => {
    expect(aggregateStatuses('kubernetes', ['Succeeded', 'Succeeded'])).toBe('SUCCEEDED');
    expect(aggregateStatuses('kubernetes', ['Succeeded', 'Pending'])).toBe('RUNNING');
  });

  it('is RUNNING while any sub-task runs, SCHEDULED while all wait', () => {
    expect(aggregateStatuses('slurm', ['PENDING', 'RUNNING'])).toBe('RUNNING');
    expect(aggregateStatuses('slurm', ['PENDING', 'REQUEUED'])).toBe('SCHEDULED');
  });

  it('ignores unknown strings and yields undefined when nothing is recognised', () => {
    expect(aggregateStatuses('slurm', ['??', 'COMPLETED'])).toBe('SUCCEEDED');
    expect(aggregateStatuses('slurm', ['??'])).toBeUndefined();
    expect(aggregateStatuses('slurm', [])).toBeUndefined();
  });

  it('consumes a StatusSequence lazily', () => {
    const pulled: string[] = [];
    const sequence = new StatusSequence(function* () {
      for (const state of ['RUNNING', 'COMPLETED']) {
        pulled.push(state);
        yield state;
      }
    });

    expect(pulled).toEqual([]);
    expect(aggregateStatuses('slurm', sequence)).toBe('RUNNING');
    expect(pulled).toEqual(['RUNNING', 'COMPLETED']);
  });
});

describe('ClusterAdapterFactory', () => {
  it('builds the adapter matching the backend kind', () => {
    const slurm = ClusterAdapterFactory.create({
      clusterId: 'hpc',
      capabilities: ['mpi'],
      limit: 10,
      backend: { kind: 'slurm', baseUrl: 'http://slurm.test', apiVersion: 'v0.0.40', user: 'u', token: 'test-token' },
    });
    const kube = ClusterAdapterFactory.create({
      clusterId: 'k8s',
      capabilities: ['container'],
      limit: 0,
      backend: { kind: 'kubernetes', baseUrl: 'http://kube.test', namespace: 'jobs', token: 'test-token' },
    });

    expect(slurm).toBeInstanceOf(SlurmClusterAdapter);
    expect(slurm.clusterId).toBe('hpc');
    expect(kube).toBeInstanceOf(KubernetesClusterAdapter);
    expect(kube.kind).toBe('kubernetes');
  });
});
