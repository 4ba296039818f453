import { Router } from 'express';
import { authMiddleware, AuthRequest, bearerToken } from '../middlewares/auth.middleware';
import { RateLimiters } from '../middlewares/rateLimit.middleware';
import { asBatch, parseBody } from '../middlewares/validation.middleware';
import { credentialsSchema, parseBatch, userCreateSchema } from '../schemas';
import { AuthService } from '../services/AuthService';

export const createAuthRoutes = (auth: AuthService, limiters: RateLimiters): Router => {
  const router = Router();

  // @route   POST /api/v1/auth/login
  // @desc    Exchange credentials for a session token
  // @access  Public
  router.post('/login', limiters.strict, async (req, res, next) => {
    try {
      const { token, principal } = await auth.authenticate(parseBody(credentialsSchema, req));

      res.json({
        success: true,
        message: 'Login successful',
        data: { token, user: principal },
      });
    } catch (error) {
      next(error);
    }
  });

  // @route   POST /api/v1/auth/register
  // @desc    Register one or more users
  // @access  Private (admin)
  router.post('/register', limiters.strict, async (req, res, next) => {
    try {
      const users = parseBatch(userCreateSchema, asBatch(req.body), 'user');
      const results = await auth.register(users, bearerToken(req));

      res.status(207).json({ success: true, data: results });
    } catch (error) {
      next(error);
    }
  });

  // @route   GET /api/v1/auth/me
  // @desc    Current caller
  // @access  Private
  router.get('/me', authMiddleware(auth), (req: AuthRequest, res) => {
    res.json({ success: true, data: req.user });
  });

  return router;
};
