import { Router } from 'express';
import { authMiddleware, requirePermission } from '../middlewares/auth.middleware';
import { IdentityProvider } from '../services/AuthService';
import { ClusterDirectory } from '../services/ClusterRegistry';
import { Scheduler, SchedulerFactory } from '../services/SchedulerService';

export const createClusterRoutes = (
  clusters: ClusterDirectory,
  scheduler: Scheduler,
  identity: IdentityProvider,
): Router => {
  const router = Router();
  router.use(authMiddleware(identity), requirePermission(identity, 'cluster:read'));

  // @route   GET /api/v1/clusters
  // @desc    Clusters with their capabilities and current load
  // @access  Private (cluster:read)
  router.get('/', async (_req, res, next) => {
    try {
      res.json({ success: true, data: await clusters.listClusters() });
    } catch (error) {
      next(error);
    }
  });

  // @route   GET /api/v1/clusters/scheduler
  // @desc    Active scheduling strategy
  // @access  Private (cluster:read)
  router.get('/scheduler', (_req, res) => {
    res.json({
      success: true,
      data: { strategy: scheduler.strategyName, available: SchedulerFactory.getAvailableStrategies() },
    });
  });

  return router;
};
