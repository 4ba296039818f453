import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import RedisStore, { RedisReply } from 'rate-limit-redis';
import Redis from 'ioredis';
import { AppConfig } from '../config/app.config';
import { errorMessage } from '../types/errors';
import { logger } from '../utils/logger';

const isScalarReply = (value: unknown): value is boolean | number | string =>
  typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string';

const isRedisReply = (value: unknown): value is RedisReply =>
  isScalarReply(value) || (Array.isArray(value) && value.every(isScalarReply));

/**
 * 🧩 sendCommand bridge so rate-limit-redis can drive an ioredis client
 */
const sendRedisCommand =
  (redis: Redis) =>
  async (...args: string[]): Promise<RedisReply> => {
    const [command, ...rest] = args;
    try {
      const result: unknown = await redis.call(command, ...rest);
      if (!isRedisReply(result)) throw new Error(`Unexpected reply to ${command}`);
      return result;
    } catch (err) {
      logger.error(`Redis sendCommand error: ${errorMessage(err)}`);
      throw err;
    }
  };

export interface RateLimiters {
  standard: RateLimitRequestHandler;
  strict: RateLimitRequestHandler;
}

/**
 * 🚀 Standard and strict (login) limiters. Counters live in Redis when a
 * client is given, in memory otherwise.
 */
export const createRateLimiters = (config: AppConfig['rateLimit'], redis?: Redis): RateLimiters => {
  const store = (prefix: string): RedisStore | undefined =>
    redis ? new RedisStore({ prefix, sendCommand: sendRedisCommand(redis) }) : undefined;

  return {
    standard: rateLimit({
      store: store('rl:'),
      windowMs: config.windowMs,
      limit: config.max,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => {
        logger.warn(`🚫 Rate limit exceeded for IP: ${req.ip}`);
        res.status(429).json({
          success: false,
          code: 'RATE_LIMITED',
          message: 'Too many requests. Please wait before retrying.',
        });
      },
    }),
    strict: rateLimit({
      store: store('rl:strict:'),
      windowMs: config.windowMs,
      limit: config.strictMax,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => {
        logger.warn(`🚫 Strict rate limit exceeded for IP: ${req.ip}`);
        res.status(429).json({
          success: false,
          code: 'RATE_LIMITED',
          message: 'Too many requests, please try again later.',
        });
      },
    }),
  };
};
