import mongoose from 'mongoose';
import { AppConfig } from './app.config';
import { logger } from '../utils/logger';
import { errorMessage } from '../types/errors';
import { sleep } from '../utils/retry';

const connectionOptions = {
  maxPoolSize: 10,
  serverSelectionTimeoutMS: 5000,
  socketTimeoutMS: 45000,
  connectTimeoutMS: 10000,
  family: 4,
};

/**
 * 🧩 Connect to MongoDB. Transactions need a replica set (or Atlas).
 * Retries with a growing delay and gives up after `retryCount` attempts.
 */
export async function connectDatabase(config: AppConfig['database'], retryCount = 3): Promise<void> {
  for (let attempt = 1; attempt <= retryCount; attempt++) {
    try {
      await mongoose.connect(config.uri, { ...connectionOptions, dbName: config.dbName });
      logger.info(`✅ MongoDB connected successfully [Attempt ${attempt}]`);
      setupConnectionEvents();
      return;
    } catch (error) {
      logger.error(`💥 MongoDB connection attempt ${attempt} failed: ${errorMessage(error)}`);
      if (attempt >= retryCount) {
        throw new Error(`MongoDB connection failed after ${retryCount} attempts`);
      }
      const delay = attempt * 3000;
      logger.warn(`⏳ Retrying MongoDB connection in ${delay / 1000}s...`);
      await sleep(delay);
    }
  }
}

function setupConnectionEvents(): void {
  const conn = mongoose.connection;

  conn.on('reconnected', () => {
    logger.info('🟢 MongoDB reconnected.');
  });

  conn.on('disconnected', () => {
    logger.warn('🟠 MongoDB disconnected.');
  });

  conn.on('error', (err: Error) => {
    logger.error(`🔴 MongoDB connection error: ${err.message}`);
  });
}

export async function closeDatabase(): Promise<void> {
  await mongoose.connection.close(false);
  logger.info('🔒 MongoDB connection closed gracefully');
}
