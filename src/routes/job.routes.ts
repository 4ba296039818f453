import { Router } from 'express';
import { z } from 'zod';
import { authMiddleware, AuthRequest, requirePermission } from '../middlewares/auth.middleware';
import { asBatch, parseQuery, routeSchemas, validate } from '../middlewares/validation.middleware';
import { jobCancelSchema, jobCreateSchema, parseBatch } from '../schemas';
import { IdentityProvider } from '../services/AuthService';
import { JobService } from '../services/JobService';
import { JOB_STATUSES } from '../types';

const jobListQuerySchema = z.object({
  owner: z.string().optional(),
  status: z.enum(JOB_STATUSES).optional(),
  mine: z.enum(['true', 'false']).optional(),
});

export const createJobRoutes = (jobs: JobService, identity: IdentityProvider): Router => {
  const router = Router();
  router.use(authMiddleware(identity));

  // @route   POST /api/v1/jobs
  // @desc    Submit one or more jobs
  // @access  Private (job:submit)
  router.post('/', requirePermission(identity, 'job:submit'), async (req: AuthRequest, res, next) => {
    try {
      const items = parseBatch(jobCreateSchema, asBatch(req.body), 'job');
      const results = await jobs.submit(
        items.map((item) => item.spec),
        req.token,
      );

      res.status(207).json({ success: true, data: results });
    } catch (error) {
      next(error);
    }
  });

  // @route   GET /api/v1/jobs
  // @desc    List jobs, optionally by owner and status
  // @access  Private (job:read)
  router.get('/', requirePermission(identity, 'job:read'), async (req: AuthRequest, res, next) => {
    try {
      const query = parseQuery(jobListQuerySchema, req);
      const owner = query.mine === 'true' ? req.user?.userId : query.owner;
      const data = await jobs.list({ owner, status: query.status });

      res.json({ success: true, data });
    } catch (error) {
      next(error);
    }
  });

  // @route   GET /api/v1/jobs/:id
  // @desc    One job
  // @access  Private (job:read)
  router.get(
    '/:id',
    requirePermission(identity, 'job:read'),
    validate(routeSchemas.idParam),
    async (req, res, next) => {
      try {
        res.json({ success: true, data: await jobs.get(req.params.id) });
      } catch (error) {
        next(error);
      }
    },
  );

  // @route   POST /api/v1/jobs/cancel
  // @desc    Cancel one or more jobs
  // @access  Private (job:cancel)
  router.post('/cancel', requirePermission(identity, 'job:cancel'), async (req: AuthRequest, res, next) => {
    try {
      const items = parseBatch(jobCancelSchema, asBatch(req.body), 'cancel');
      const results = await jobs.cancel(
        items.map((item) => item.jobId),
        req.token,
      );

      res.status(207).json({ success: true, data: results });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
