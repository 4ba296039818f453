import { BatchFailure, BatchResult } from '../types';
import { AppError, errorMessage } from '../types/errors';
import { logger } from './logger';

export const toBatchFailure = (error: unknown): BatchFailure =>
  error instanceof AppError
    ? { code: error.code, message: error.message }
    : { code: 'INTERNAL_ERROR', message: errorMessage(error) };

/**
 * Runs `fn` for each item in order and collects one result per item. A
 * failing item never aborts the batch; operational errors are reported in
 * place, anything else is logged and reported as INTERNAL_ERROR.
 */
export async function runBatch<I, O>(
  label: string,
  items: readonly I[],
  fn: (item: I, index: number) => Promise<O>,
): Promise<BatchResult<O>[]> {
  const results: BatchResult<O>[] = [];

  for (const [index, item] of items.entries()) {
    try {
      results.push({ index, ok: true, value: await fn(item, index) });
    } catch (error) {
      if (!(error instanceof AppError)) {
        logger.error(`💥 ${label} item #${index} failed unexpectedly: ${errorMessage(error)}`);
      } else {
        logger.warn(`⚠️ ${label} item #${index} rejected: ${error.message}`);
      }
      results.push({ index, ok: false, error: toBatchFailure(error) });
    }
  }

  return results;
}

export const succeeded = <T>(results: BatchResult<T>[]): T[] =>
  results.flatMap((result) => (result.ok ? [result.value] : []));
