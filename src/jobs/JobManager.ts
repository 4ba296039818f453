import { Queue, QueueOptions } from 'bullmq';
import { RedisOptions } from 'ioredis';
import { queueConfig } from '../config/queue';
import { BULLMQ_CONSTANTS } from '../utils/constants';
import { errorMessage } from '../types/errors';
import { logger } from '../utils/logger';

/**
 * 🧠 JobManager
 * Owns the BullMQ queues. Every queue shares one Redis connection setup and
 * the same prefix.
 */
export class JobManager {
  private queues = new Map<string, Queue>();

  constructor(private readonly connection: RedisOptions) {}

  /**
   * 🏗️ Create or retrieve a queue by name.
   */
  createQueue(name: string, config: Partial<QueueOptions> = {}): Queue {
    const existing = this.queues.get(name);
    if (existing) return existing;

    const queue = new Queue(name, {
      ...queueConfig,
      ...config,
      connection: this.connection,
    });

    this.queues.set(name, queue);
    logger.info(`✅ Queue "${name}" initialized.`);
    return queue;
  }

  /**
   * ⏱️ Install (or move) the repeatable job that drives reconciliation.
   */
  async scheduleReconciliation(intervalMs: number): Promise<void> {
    const queue = this.createQueue(BULLMQ_CONSTANTS.QUEUES.RECONCILIATION);
    await queue.upsertJobScheduler(
      BULLMQ_CONSTANTS.REPEAT_KEY,
      { every: intervalMs },
      {
        name: BULLMQ_CONSTANTS.JOBS.RECONCILE,
        data: {},
        opts: {
          removeOnComplete: { age: 3600, count: 100 },
          removeOnFail: { age: 86400, count: 50 },
        },
      },
    );
    logger.info(`⏱️ Reconciliation scheduled every ${intervalMs}ms`);
  }

  /**
   * 🧹 Close every queue.
   */
  async closeAll(): Promise<void> {
    logger.info('🧹 Closing all BullMQ queues...');
    for (const [name, queue] of this.queues.entries()) {
      try {
        await queue.close();
        logger.info(`✅ Queue "${name}" closed.`);
      } catch (err) {
        logger.error(`💥 Failed to close queue "${name}": ${errorMessage(err)}`);
      }
    }
    this.queues.clear();
  }
}
