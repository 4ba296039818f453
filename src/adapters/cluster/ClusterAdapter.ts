import { ClusterBackendKind, Job } from '../../types';
import { PreparationError } from '../../types/errors';

export interface ClusterCallOptions {
  /** Upper bound for the backend call; exceeding it is a transient failure. */
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface SubmitOptions extends ClusterCallOptions {
  /** Identifies this submission (the schedule id); repeating it must not start a second run. */
  submissionId: string;
}

/**
 * Backend status strings for one external job, one per sub-task. Iteration
 * is lazy and every `for...of` starts from the beginning again.
 */
export class StatusSequence implements Iterable<string> {
  constructor(private readonly source: () => Iterable<string>) {}

  [Symbol.iterator](): Iterator<string> {
    return this.source()[Symbol.iterator]();
  }

  static of(statuses: readonly string[]): StatusSequence {
    return new StatusSequence(() => statuses);
  }
}

export interface ClusterAdapter {
  readonly clusterId: string;
  readonly kind: ClusterBackendKind;
  readonly capabilities: readonly string[];

  /** Validates and stages the job. Throws `PreparationError` when it cannot run here. */
  prepare(job: Job, options: ClusterCallOptions): Promise<void>;

  /**
   * Hands a prepared job to the backend and returns the backend's id for it.
   * Throws `SubmissionError` (retryable) or `PermanentSubmissionError`.
   */
  submit(job: Job, options: SubmitOptions): Promise<string>;

  /** Throws `StatusQueryError`, which is always retryable. */
  getStatus(externalJobId: string, options: ClusterCallOptions): Promise<StatusSequence>;
}

export const missingCapabilities = (job: Job, capabilities: readonly string[]): string[] =>
  job.spec.requiredCapabilities.filter((label) => !capabilities.includes(label));

/** Shared part of `prepare`: the cluster must offer every label the job asks for. */
export const assertCapabilities = (job: Job, adapter: ClusterAdapter): void => {
  const missing = missingCapabilities(job, adapter.capabilities);
  if (missing.length > 0) {
    throw new PreparationError(
      `Cluster ${adapter.clusterId} lacks capabilities [${missing.join(', ')}] required by job ${job.jobId}`,
    );
  }
};
