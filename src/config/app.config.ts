import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const intFromEnv = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const positiveIntFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: intFromEnv(5000),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  MONGODB_URI: z.string().default('mongodb://127.0.0.1:27017/?replicaSet=rs0'),
  DB_NAME: z.string().default('conductor'),

  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: intFromEnv(6379),
  REDIS_PASSWORD: z.string().optional(),

  JWT_SECRET: z.string().min(1).default('change-me'),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60),
  ADMIN_EMAIL: z.string().email().optional(),
  ADMIN_PASSWORD: z.string().min(8).optional(),

  SCHEDULER: z.enum(['least-loaded', 'first-fit']).default('least-loaded'),
  CLUSTERS_FILE: z.string().default('config/clusters.json'),

  CLUSTER_CALL_TIMEOUT_MS: positiveIntFromEnv(10_000),
  RECONCILE_INTERVAL_MS: positiveIntFromEnv(30_000),
  RECONCILE_CONCURRENCY: positiveIntFromEnv(8),
  // Counts the first call, so at least one retry.
  RETRY_ATTEMPTS: z.coerce.number().int().min(2).default(3),
  RETRY_BASE_DELAY_MS: intFromEnv(500),
  RETRY_MAX_DELAY_MS: intFromEnv(8_000),

  RATE_LIMIT_MAX: intFromEnv(100),
  STRICT_RATE_LIMIT_MAX: intFromEnv(10),
});

export type Env = z.infer<typeof envSchema>;

export const buildAppConfig = (env: Env) => ({
  nodeEnv: env.NODE_ENV,
  port: env.PORT,
  corsOrigin: env.CORS_ORIGIN,
  apiPrefix: '/api/v1',

  database: {
    uri: env.MONGODB_URI,
    dbName: env.DB_NAME,
  },

  redis: {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD || undefined,
  },

  // JWT
  jwt: {
    secret: env.JWT_SECRET,
    expiresInSeconds: env.JWT_EXPIRES_IN_SECONDS,
  },
  bootstrapAdmin:
    env.ADMIN_EMAIL && env.ADMIN_PASSWORD
      ? { email: env.ADMIN_EMAIL, password: env.ADMIN_PASSWORD }
      : undefined,

  // Scheduling
  scheduler: env.SCHEDULER,
  clustersFile: env.CLUSTERS_FILE,
  clusterCallTimeoutMs: env.CLUSTER_CALL_TIMEOUT_MS,

  // Reconciliation
  reconcile: {
    intervalMs: env.RECONCILE_INTERVAL_MS,
    concurrency: env.RECONCILE_CONCURRENCY,
    retry: {
      attempts: env.RETRY_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
    },
  },

  // Rate limiting
  rateLimit: {
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: env.RATE_LIMIT_MAX,
    strictMax: env.STRICT_RATE_LIMIT_MAX,
  },
});

export type AppConfig = ReturnType<typeof buildAppConfig>;

/**
 * Parses `source` (defaults to process.env). Throws with every offending
 * variable listed when the environment is invalid.
 */
export const loadAppConfig = (source: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment configuration:\n  ${issues.join('\n  ')}`);
  }
  return buildAppConfig(parsed.data);
};
