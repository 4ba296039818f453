import axios from 'axios';
import {
  AppError,
  PermanentSubmissionError,
  StatusQueryError,
  SubmissionError,
  errorMessage,
} from '../../types/errors';

const RETRYABLE_STATUS = new Set([408, 425, 429]);

const describeHttpError = (error: unknown): string => {
  if (!axios.isAxiosError(error)) return errorMessage(error);
  if (error.response) return `HTTP ${error.response.status}: ${error.message}`;
  return error.code ? `${error.code}: ${error.message}` : error.message;
};

/**
 * Submission failures: 4xx (except throttling/timeouts) means the backend
 * will never accept this job; everything else may succeed later.
 */
export const toSubmissionError = (clusterId: string, error: unknown): AppError => {
  if (error instanceof SubmissionError || error instanceof PermanentSubmissionError) return error;

  const message = `Submission to ${clusterId} failed (${describeHttpError(error)})`;
  if (axios.isAxiosError(error) && error.response) {
    const { status } = error.response;
    if (status >= 400 && status < 500 && !RETRYABLE_STATUS.has(status)) {
      return new PermanentSubmissionError(message);
    }
  }
  return new SubmissionError(message);
};

export const toStatusQueryError = (
  clusterId: string,
  externalJobId: string,
  error: unknown,
): StatusQueryError => {
  if (error instanceof StatusQueryError) return error;
  return new StatusQueryError(`Status query for ${externalJobId} on ${clusterId} failed (${describeHttpError(error)})`);
};
