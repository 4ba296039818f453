import { Router } from 'express';
import { authMiddleware, AuthRequest, requirePermission } from '../middlewares/auth.middleware';
import { asBatch, parseQuery } from '../middlewares/validation.middleware';
import {
  parseBatch,
  scheduleCreateSchema,
  scheduleDeleteSchema,
  scheduleGetQuerySchema,
  scheduleUpdateSchema,
} from '../schemas';
import { IdentityProvider } from '../services/AuthService';
import { DispatchService } from '../services/DispatchService';
import { Scheduler } from '../services/SchedulerService';
import { scheduleJobs, ScheduleService } from '../services/ScheduleService';
import { succeeded } from '../utils/batch';

export interface ScheduleRouteDeps {
  identity: IdentityProvider;
  scheduler: Scheduler;
  schedules: ScheduleService;
  dispatcher: DispatchService;
}

export const createScheduleRoutes = (deps: ScheduleRouteDeps): Router => {
  const { identity, scheduler, schedules, dispatcher } = deps;
  const router = Router();
  router.use(authMiddleware(identity));

  // @route   POST /api/v1/schedules
  // @desc    Schedule one or more jobs; `?dispatch=true` also submits them
  // @access  Private (schedule:create)
  router.post('/', requirePermission(identity, 'schedule:create'), async (req: AuthRequest, res, next) => {
    try {
      const items = parseBatch(scheduleCreateSchema, asBatch(req.body), 'schedule');
      const results = await scheduleJobs(
        scheduler,
        schedules,
        items.map((item) => item.jobId),
        req.token,
      );

      if (req.query.dispatch !== 'true') {
        res.status(207).json({ success: true, data: results });
        return;
      }

      const ids = succeeded(results).map((schedule) => schedule.scheduleId);
      const dispatched = ids.length > 0 ? await dispatcher.dispatch(ids, req.token) : [];
      res.status(207).json({ success: true, data: { schedules: results, dispatched } });
    } catch (error) {
      next(error);
    }
  });

  // @route   GET /api/v1/schedules?queryType=job_id&value=...
  // @desc    Look schedules up by schedule, job or cluster id
  // @access  Private (schedule:read)
  router.get('/', requirePermission(identity, 'schedule:read'), async (req, res, next) => {
    try {
      const data = await schedules.get(parseQuery(scheduleGetQuerySchema, req));
      res.json({ success: true, data });
    } catch (error) {
      next(error);
    }
  });

  // @route   PUT /api/v1/schedules
  // @desc    Record external job ids
  // @access  Private (schedule:update)
  router.put('/', requirePermission(identity, 'schedule:update'), async (req: AuthRequest, res, next) => {
    try {
      const updates = parseBatch(scheduleUpdateSchema, asBatch(req.body), 'schedule update');
      res.status(207).json({ success: true, data: await schedules.update(updates, req.token) });
    } catch (error) {
      next(error);
    }
  });

  // @route   DELETE /api/v1/schedules
  // @desc    Withdraw schedules
  // @access  Private (schedule:delete)
  router.delete('/', requirePermission(identity, 'schedule:delete'), async (req: AuthRequest, res, next) => {
    try {
      const deletes = parseBatch(scheduleDeleteSchema, asBatch(req.body), 'schedule delete');
      res.status(207).json({ success: true, data: await schedules.delete(deletes, req.token) });
    } catch (error) {
      next(error);
    }
  });

  // @route   POST /api/v1/schedules/dispatch
  // @desc    Submit scheduled jobs to their clusters
  // @access  Private (schedule:update)
  router.post('/dispatch', requirePermission(identity, 'schedule:update'), async (req: AuthRequest, res, next) => {
    try {
      const items = parseBatch(scheduleDeleteSchema, asBatch(req.body), 'dispatch');
      const results = await dispatcher.dispatch(
        items.map((item) => item.scheduleId),
        req.token,
      );

      res.status(207).json({ success: true, data: results });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
