import { Worker } from 'bullmq';
import { RedisOptions } from 'ioredis';
import { queueConfig } from '../config/queue';
import { ReconcileSummary, ReconciliationService } from '../services/ReconciliationService';
import { BULLMQ_CONSTANTS } from '../utils/constants';
import { logger } from '../utils/logger';

/**
 * Runs `reconcileOnce` for every tick of the repeatable job. Concurrency is
 * 1 so that two passes never run at the same time in one worker; run a
 * single worker process per deployment.
 */
export const createReconciliationWorker = (
  service: ReconciliationService,
  connection: RedisOptions,
): Worker<Record<string, never>, ReconcileSummary> => {
  const worker = new Worker<Record<string, never>, ReconcileSummary>(
    BULLMQ_CONSTANTS.QUEUES.RECONCILIATION,
    async (job) => {
      logger.debug(`[Job ${job.id ?? 'unknown'}] 🔄 Reconciliation tick`);
      return service.reconcileOnce();
    },
    {
      connection,
      prefix: queueConfig.prefix,
      concurrency: 1,
    },
  );

  worker.on('completed', (job, summary) => {
    if (summary.failed > 0) {
      logger.warn(`[Job ${job.id ?? 'unknown'}] ⚠️ ${summary.failed} of ${summary.polled} schedule(s) could not be polled`);
    }
  });
  worker.on('failed', (job, err) => logger.error(`[Job ${job?.id ?? 'unknown'}] 💀 Failed: ${err.message}`));
  worker.on('stalled', (jobId) => logger.warn(`[Job ${jobId}] 🚧 Stalled, retrying...`));
  worker.on('error', (err) => logger.error(`⚠️ Worker runtime error: ${err.message}`));

  logger.info('🎯 Reconciliation worker ready and waiting for ticks...');
  return worker;
};
