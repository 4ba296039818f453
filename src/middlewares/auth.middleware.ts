import { Request, Response, NextFunction, RequestHandler } from 'express';
import { IdentityProvider, requireAuthorization } from '../services/AuthService';
import { Action, Principal } from '../types';

export interface AuthRequest extends Request {
  token?: string;
  user?: Principal;
}

/** Token from an `Authorization: Bearer <token>` header. */
export const bearerToken = (req: Request): string | undefined => {
  const header = req.headers.authorization;
  if (!header || !header.startsWith('Bearer ')) return undefined;
  return header.slice('Bearer '.length).trim() || undefined;
};

/**
 * 🔐 Authentication Middleware
 * Verifies the session token and attaches the caller to `req.user`. An
 * absent and a bad token both end in 401, with different codes.
 */
export const authMiddleware =
  (identity: IdentityProvider): RequestHandler =>
  async (req: AuthRequest, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = bearerToken(req);
      req.user = await identity.identify(token);
      req.token = token;
      next();
    } catch (error) {
      next(error);
    }
  };

/**
 * 🛡️ Action-Based Authorization Middleware
 * Rejects with 403 unless the caller's role grants `action`.
 */
export const requirePermission =
  (identity: IdentityProvider, action: Action): RequestHandler =>
  async (req: AuthRequest, _res: Response, next: NextFunction): Promise<void> => {
    try {
      req.user = await requireAuthorization(identity, req.token ?? bearerToken(req), action);
      next();
    } catch (error) {
      next(error);
    }
  };
