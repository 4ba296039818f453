import axios, { AxiosInstance } from 'axios';
import { ClusterDefinition, Job, SlurmBackendConfig } from '../../types';
import { PreparationError, SubmissionError } from '../../types/errors';
import { logger } from '../../utils/logger';
import {
  ClusterAdapter,
  ClusterCallOptions,
  StatusSequence,
  SubmitOptions,
  assertCapabilities,
} from './ClusterAdapter';
import { toStatusQueryError, toSubmissionError } from './httpErrors';

interface SlurmSubmitResponse {
  job_id?: number;
  errors?: Array<{ error?: string; description?: string }>;
}

interface SlurmJobsResponse {
  jobs?: Array<{ job_id?: number; job_state?: string | string[] }>;
}

const DEFAULT_ENVIRONMENT = ['PATH=/usr/local/bin:/usr/bin:/bin'];

/**
 * Batch-system backend talking to `slurmrestd`. Array and heterogeneous
 * jobs report one entry per component; each becomes one status in the
 * sequence.
 */
export class SlurmClusterAdapter implements ClusterAdapter {
  readonly kind = 'slurm' as const;
  readonly clusterId: string;
  readonly capabilities: readonly string[];
  private readonly backend: SlurmBackendConfig;
  private readonly http: AxiosInstance;

  constructor(definition: ClusterDefinition & { backend: SlurmBackendConfig }, http?: AxiosInstance) {
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

  async prepare(job: Job, _options: ClusterCallOptions): Promise<void> {
    assertCapabilities(job, this);

    if (!job.spec.script || !job.spec.script.startsWith('#!')) {
      throw new PreparationError(`Job ${job.jobId} needs a batch script starting with a shebang line`);
    }
  }

  async submit(job: Job, options: SubmitOptions): Promise<string> {
    try {
      const response = await this.http.post<SlurmSubmitResponse>(
        `/slurm/${this.backend.apiVersion}/job/submit`,
        { job: this.buildJobDescription(job) },
        { headers: this.authHeaders(), timeout: options.timeoutMs, signal: options.signal },
      );

      const { job_id: slurmJobId, errors = [] } = response.data;
      if (slurmJobId === undefined || errors.length > 0) {
        const reason = errors.map((e) => e.description || e.error).join('; ') || 'no job id returned';
        throw new SubmissionError(`Slurm on ${this.clusterId} rejected job ${job.jobId}: ${reason}`);
      }

      logger.info(`📤 Job ${job.jobId} submitted to ${this.clusterId} as Slurm job ${slurmJobId}`);
      return String(slurmJobId);
    } catch (error) {
      throw toSubmissionError(this.clusterId, error);
    }
  }

  async getStatus(externalJobId: string, options: ClusterCallOptions): Promise<StatusSequence> {
    try {
      const response = await this.http.get<SlurmJobsResponse>(
        `/slurm/${this.backend.apiVersion}/job/${encodeURIComponent(externalJobId)}`,
        { headers: this.authHeaders(), timeout: options.timeoutMs, signal: options.signal },
      );

      const jobs = response.data.jobs ?? [];
      return new StatusSequence(function* () {
        for (const entry of jobs) {
          const state = Array.isArray(entry.job_state) ? entry.job_state[0] : entry.job_state;
          if (state) yield state;
        }
      });
    } catch (error) {
      throw toStatusQueryError(this.clusterId, externalJobId, error);
    }
  }

  private buildJobDescription(job: Job): Record<string, unknown> {
    const { spec } = job;
    const resources = spec.resources ?? {};
    const environment = spec.env
      ? Object.entries(spec.env).map(([key, value]) => `${key}=${value}`)
      : DEFAULT_ENVIRONMENT;

    return {
      name: spec.name ?? `conductor-${job.jobId}`,
      script: spec.script,
      partition: this.backend.partition,
      account: this.backend.account,
      current_working_directory: '/tmp',
      environment,
      ...(resources.cpus !== undefined && { cpus_per_task: resources.cpus }),
      ...(resources.memoryMb !== undefined && {
        memory_per_node: { set: true, number: resources.memoryMb },
      }),
      ...(resources.timeLimitMinutes !== undefined && {
        time_limit: { set: true, number: resources.timeLimitMinutes },
      }),
      ...(resources.gpus !== undefined && { tres_per_job: `gres/gpu:${resources.gpus}` }),
      comment: `conductor:${job.jobId}`,
    };
  }

  private authHeaders(): Record<string, string> {
    return {
      'X-SLURM-USER-NAME': this.backend.user,
      'X-SLURM-USER-TOKEN': this.backend.token,
    };
  }
}
