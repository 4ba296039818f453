// config/redis.ts
import Redis, { RedisOptions } from 'ioredis';
import { AppConfig } from './app.config';
import { logger } from '../utils/logger';

/**
 * 🧩 Centralized Redis configuration.
 * Shared by the rate limiter and the BullMQ queues.
 */
export const buildRedisOptions = (config: AppConfig['redis']): RedisOptions => ({
  host: config.host,
  port: config.port,
  password: config.password,
  maxRetriesPerRequest: 3,
  connectTimeout: 10_000,
  keepAlive: 30_000,
  enableReadyCheck: true,
  lazyConnect: false,
  retryStrategy: (times: number) => {
    const delay = Math.min(times * 200, 3000);
    logger.warn(`Redis reconnect attempt #${times}, retrying in ${delay}ms`);
    return delay;
  },
});

let redisClient: Redis | null = null;

export const createRedisClient = (config: AppConfig['redis']): Redis => {
  if (redisClient) {
    return redisClient;
  }

  const client = new Redis(buildRedisOptions(config));

  client.on('connect', () => logger.info('✅ Redis connected successfully'));
  client.on('ready', () => logger.info('🔁 Redis connection is ready for use'));
  client.on('reconnecting', (time: number) => logger.warn(`⚠️ Redis reconnecting in ${time}ms`));
  client.on('error', (err: Error) => logger.error(`💥 Redis connection error: ${err.message}`));
  client.on('end', () => logger.warn('🛑 Redis connection closed'));

  redisClient = client;
  return redisClient;
};

/**
 * 🧹 Gracefully close Redis client during shutdown.
 */
export const closeRedisClient = async (): Promise<void> => {
  if (redisClient && redisClient.status !== 'end') {
    await redisClient.quit();
    logger.info('🔒 Redis client closed gracefully');
    redisClient = null;
  }
};
