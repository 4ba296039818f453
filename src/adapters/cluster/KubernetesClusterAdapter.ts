import axios, { AxiosInstance } from 'axios';
import { ClusterDefinition, Job, KubernetesBackendConfig } from '../../types';
import { PermanentSubmissionError, PreparationError, SubmissionError } from '../../types/errors';
import { logger } from '../../utils/logger';
import {
  ClusterAdapter,
  ClusterCallOptions,
  StatusSequence,
  SubmitOptions,
  assertCapabilities,
} from './ClusterAdapter';
import { toStatusQueryError, toSubmissionError } from './httpErrors';

const SUBMISSION_LABEL = 'conductor/submission-id';

interface KubeJob {
  metadata?: { name?: string; labels?: Record<string, string> };
  status?: {
    active?: number;
    succeeded?: number;
    failed?: number;
    conditions?: Array<{ type: string; status: string }>;
  };
}

interface KubePodList {
  items?: Array<{ status?: { phase?: string } }>;
}

const jobConditionStatus = (job: KubeJob): string => {
  const conditions = job.status?.conditions ?? [];
  const holds = (type: string) => conditions.some((c) => c.type === type && c.status === 'True');

  if (holds('Failed')) return 'Failed';
  if (holds('Complete')) return 'Complete';
  if (holds('Suspended')) return 'Suspended';
  if ((job.status?.active ?? 0) > 0) return 'Active';
  return 'Pending';
};

/**
 * Container-orchestrator backend over the batch/v1 Jobs API. One Job per
 * submission, never retried by Kubernetes itself, so each pod is one
 * sub-task in the status sequence. The Job name comes from the submission
 * id, so resubmitting the same schedule finds the Job it already created.
 */
export class KubernetesClusterAdapter implements ClusterAdapter {
  readonly kind = 'kubernetes' as const;
  readonly clusterId: string;
  readonly capabilities: readonly string[];
  private readonly backend: KubernetesBackendConfig;
  private readonly http: AxiosInstance;

  constructor(
    definition: ClusterDefinition & { backend: KubernetesBackendConfig },
    http?: AxiosInstance,
  ) {
    this.clusterId = definition.clusterId;
    this.capabilities = definition.capabilities;
    this.backend = definition.backend;
    this.http =
      http ??
      axios.create({
        baseURL: this.backend.baseUrl,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  static jobName(submissionId: string): string {
    return `cj-${submissionId.toLowerCase()}`;
  }

  async prepare(job: Job, _options: ClusterCallOptions): Promise<void> {
    assertCapabilities(job, this);

    if (!job.spec.image) {
      throw new PreparationError(`Job ${job.jobId} needs a container image`);
    }
  }

  async submit(job: Job, options: SubmitOptions): Promise<string> {
    const request = { headers: this.authHeaders(), timeout: options.timeoutMs, signal: options.signal };

    try {
      const response = await this.http.post<KubeJob>(
        `/apis/batch/v1/namespaces/${this.backend.namespace}/jobs`,
        this.buildManifest(job, options.submissionId),
        request,
      );

      const name = response.data.metadata?.name;
      if (!name) {
        throw new SubmissionError(`Kubernetes on ${this.clusterId} returned no name for job ${job.jobId}`);
      }

      logger.info(`📤 Job ${job.jobId} submitted to ${this.clusterId} as ${this.backend.namespace}/${name}`);
      return name;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 409) {
        return this.adoptExisting(job, options.submissionId, request);
      }
      throw toSubmissionError(this.clusterId, error);
    }
  }

  /** A 409 on create: the Job is ours when it carries this submission's label. */
  private async adoptExisting(
    job: Job,
    submissionId: string,
    request: { headers: Record<string, string>; timeout: number; signal?: AbortSignal },
  ): Promise<string> {
    const name = KubernetesClusterAdapter.jobName(submissionId);
    const path = `/apis/batch/v1/namespaces/${this.backend.namespace}/jobs/${encodeURIComponent(name)}`;

    let existing: KubeJob;
    try {
      existing = (await this.http.get<KubeJob>(path, request)).data;
    } catch (error) {
      throw toSubmissionError(this.clusterId, error);
    }

    if (existing.metadata?.labels?.[SUBMISSION_LABEL] !== submissionId) {
      throw new PermanentSubmissionError(
        `Kubernetes job ${this.backend.namespace}/${name} on ${this.clusterId} belongs to another submission`,
      );
    }

    logger.info(`♻️ Job ${job.jobId} already exists on ${this.clusterId} as ${this.backend.namespace}/${name}`);
    return name;
  }

  async getStatus(externalJobId: string, options: ClusterCallOptions): Promise<StatusSequence> {
    const request = { headers: this.authHeaders(), timeout: options.timeoutMs, signal: options.signal };
    const ns = this.backend.namespace;

    try {
      const pods = await this.http.get<KubePodList>(`/api/v1/namespaces/${ns}/pods`, {
        ...request,
        params: { labelSelector: `job-name=${externalJobId}` },
      });

      const phases = (pods.data.items ?? []).flatMap((pod) => (pod.status?.phase ? [pod.status.phase] : []));
      if (phases.length > 0) return StatusSequence.of(phases);

      // No pod yet (or already garbage-collected): fall back to the Job's own conditions.
      const kubeJob = await this.http.get<KubeJob>(
        `/apis/batch/v1/namespaces/${ns}/jobs/${encodeURIComponent(externalJobId)}`,
        request,
      );
      return new StatusSequence(function* () {
        yield jobConditionStatus(kubeJob.data);
      });
    } catch (error) {
      throw toStatusQueryError(this.clusterId, externalJobId, error);
    }
  }

  private buildManifest(job: Job, submissionId: string): Record<string, unknown> {
    const { spec } = job;
    const resources = spec.resources ?? {};
    const limits: Record<string, string> = {};
    if (resources.cpus !== undefined) limits.cpu = String(resources.cpus);
    if (resources.memoryMb !== undefined) limits.memory = `${resources.memoryMb}Mi`;
    if (resources.gpus !== undefined) limits['nvidia.com/gpu'] = String(resources.gpus);

    return {
      apiVersion: 'batch/v1',
      kind: 'Job',
      metadata: {
        name: KubernetesClusterAdapter.jobName(submissionId),
        labels: {
          'app.kubernetes.io/managed-by': 'conductor',
          'conductor/job-id': job.jobId,
          [SUBMISSION_LABEL]: submissionId,
        },
      },
      spec: {
        backoffLimit: 0,
        ...(resources.timeLimitMinutes !== undefined && {
          activeDeadlineSeconds: resources.timeLimitMinutes * 60,
        }),
        template: {
          spec: {
            restartPolicy: 'Never',
            ...(this.backend.serviceAccount !== undefined && { serviceAccountName: this.backend.serviceAccount }),
            containers: [
              {
                name: 'main',
                image: spec.image,
                ...(spec.command && { command: spec.command }),
                env: Object.entries(spec.env ?? {}).map(([name, value]) => ({ name, value })),
                ...(Object.keys(limits).length > 0 && { resources: { limits } }),
              },
            ],
          },
        },
      },
    };
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.backend.token}` };
  }
}
