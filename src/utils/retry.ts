import { TransientBackendError } from '../types/errors';
import { logger } from './logger';

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Exponential delay before retry number `attempt` (1-based), capped at `maxDelayMs`. */
export const backoffDelay = (attempt: number, policy: RetryPolicy): number =>
  Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);

/**
 * Runs `fn` until it succeeds or the policy is exhausted. Only
 * `TransientBackendError`s are retried; anything else is rethrown at once.
 */
export async function withRetry<T>(
  label: string,
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  wait: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof TransientBackendError) || attempt >= policy.attempts) throw error;

      const delay = backoffDelay(attempt, policy);
      logger.warn(`[${label}] ⚠️ ${error.message}, retrying in ${delay}ms (attempt ${attempt})`);
      await wait(delay);
    }
  }
}

/**
 * Runs `fn` and rejects with a `TransientBackendError` if it has not settled
 * within `timeoutMs`, aborting the signal handed to `fn`. The timer is always
 * cleared.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientBackendError(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT'));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
