import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import { createServer, Server } from 'http';

// 🧱 Config
import { AppConfig, loadAppConfig } from './config/app.config';
import { loadClusterDefinitions } from './config/clusters';
import { closeDatabase, connectDatabase } from './config/database';
import { closeRedisClient, createRedisClient } from './config/redis';
import { buildServices, Services } from './container';
import { MongoPersistence } from './repositories/MongoPersistence';

// 🧰 Middlewares
import { errorHandler, notFoundHandler } from './middlewares/errorHandler.middleware';
import { createRateLimiters, RateLimiters } from './middlewares/rateLimit.middleware';

// 🚏 Routes
import { createAuthRoutes } from './routes/auth.routes';
import { createClusterRoutes } from './routes/cluster.routes';
import { createJobRoutes } from './routes/job.routes';
import { createScheduleRoutes } from './routes/schedule.routes';

// 🧾 Utils
import { closeLogger, logger, registerProcessErrorLogging } from './utils/logger';

/**
 * Builds the Express application around already wired services.
 */
export function createApp(config: AppConfig, services: Services, limiters: RateLimiters): Application {
  const app = express();

  /** 🧱 Express & Security Middlewares */
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(compression());
  if (config.nodeEnv !== 'test') {
    app.use(morgan('combined', { stream: { write: (message) => logger.info(message.trim()) } }));
  }
  app.use(limiters.standard);

  // Health Check Route
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  /** 🚏 Routes */
  const apiBase = config.apiPrefix;
  app.use(`${apiBase}/auth`, createAuthRoutes(services.auth, limiters));
  app.use(`${apiBase}/jobs`, createJobRoutes(services.jobs, services.auth));
  app.use(
    `${apiBase}/schedules`,
    createScheduleRoutes({
      identity: services.auth,
      scheduler: services.scheduler,
      schedules: services.schedules,
      dispatcher: services.dispatcher,
    }),
  );
  app.use(`${apiBase}/clusters`, createClusterRoutes(services.clusters, services.scheduler, services.auth));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

class ConductorServer {
  private httpServer: Server | null = null;

  constructor(private readonly config: AppConfig) {}

  /** 🚀 Connect, wire and listen */
  async start(): Promise<void> {
    const { config } = this;

    await connectDatabase(config.database);
    const persistence = new MongoPersistence();
    await persistence.ensureIndexes();

    const definitions = await loadClusterDefinitions(config.clustersFile);
    const services = buildServices(config, persistence, definitions);

    if (config.bootstrapAdmin) {
      await services.auth.bootstrapAdmin(config.bootstrapAdmin.email, config.bootstrapAdmin.password);
    }

    const limiters = createRateLimiters(config.rateLimit, createRedisClient(config.redis));
    this.httpServer = createServer(createApp(config, services, limiters));

    this.httpServer.listen(config.port, () => {
      logger.info(`🚀 Conductor API running on port ${config.port}`);
      logger.info(`📊 Environment: ${config.nodeEnv}`);
      logger.info(`🧭 Scheduler: ${services.scheduler.strategyName}, ${definitions.length} cluster(s)`);
      logger.info(`🔗 API Base: http://localhost:${config.port}${config.apiPrefix}`);
    });

    process.on('SIGTERM', () => void this.gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void this.gracefulShutdown('SIGINT'));
  }

  /** 🛑 Graceful Shutdown */
  private async gracefulShutdown(signal: string): Promise<void> {
    logger.info(`🛑 ${signal} received, initiating graceful shutdown...`);

    try {
      const server = this.httpServer;
      if (server) {
        await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
        logger.info('✅ HTTP server closed');
      }

      await closeDatabase();
      await closeRedisClient();

      logger.info('🟢 Shutdown complete. Exiting process...');
      await closeLogger();
      process.exit(0);
    } catch (err) {
      logger.error('💥 Error during shutdown:', err);
      process.exit(1);
    }
  }
}

// 🧠 Initialize & Launch
if (require.main === module) {
  registerProcessErrorLogging();
  new ConductorServer(loadAppConfig()).start().catch((err: unknown) => {
    logger.error('❌ Failed to start server:', err);
    process.exit(1);
  });
}

export default ConductorServer;
