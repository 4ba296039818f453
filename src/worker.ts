import { loadAppConfig } from './config/app.config';
import { loadClusterDefinitions } from './config/clusters';
import { closeDatabase, connectDatabase } from './config/database';
import { buildQueueConnection } from './config/queue';
import { buildServices } from './container';
import { JobManager } from './jobs/JobManager';
import { createReconciliationWorker } from './jobs/reconciliationWorker';
import { MongoPersistence } from './repositories/MongoPersistence';
import { closeLogger, logger, registerProcessErrorLogging } from './utils/logger';

/**
 * Reconciliation process: installs the repeatable job and consumes it.
 */
async function main(): Promise<void> {
  registerProcessErrorLogging();
  const config = loadAppConfig();

  await connectDatabase(config.database);
  logger.info('✅ MongoDB connected for Reconciliation Worker');

  const persistence = new MongoPersistence();
  const definitions = await loadClusterDefinitions(config.clustersFile);
  const services = buildServices(config, persistence, definitions);

  const connection = buildQueueConnection(config.redis);
  const jobManager = new JobManager(connection);
  await jobManager.scheduleReconciliation(config.reconcile.intervalMs);
  const worker = createReconciliationWorker(services.reconciliation, connection);

  const shutdownWorker = async (signal: string): Promise<void> => {
    logger.info(`🧹 Received ${signal}, shutting down worker...`);
    try {
      await worker.close();
      await jobManager.closeAll();
      await closeDatabase();
      logger.info('✅ Worker closed gracefully');
      await closeLogger();
      process.exit(0);
    } catch (err) {
      logger.error('💥 Error during worker shutdown:', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdownWorker('SIGINT'));
  process.on('SIGTERM', () => void shutdownWorker('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('❌ Failed to start reconciliation worker:', error);
  process.exit(1);
});
