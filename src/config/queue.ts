import { RedisOptions } from 'ioredis';
import { AppConfig } from './app.config';
import { buildRedisOptions } from './redis';

// BullMQ workers need maxRetriesPerRequest: null.
export const buildQueueConnection = (config: AppConfig['redis']): RedisOptions => ({
  ...buildRedisOptions(config),
  maxRetriesPerRequest: null,
});

export const queueConfig = {
  prefix: 'conductor',
};
