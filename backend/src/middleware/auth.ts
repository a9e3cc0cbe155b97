import type { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '../utils/errors.js';

export interface AuthenticatedUser {
  id: number;
}

// Extend Express Request type to include the bearer-token user
declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

/**
 * Middleware to ensure user is authenticated
 */
export function ensureAuthenticated(req: Request, res: Response, next: NextFunction): void {
  if (req.user) {
    return next();
  }
  const error = new UnauthorizedError();
  res.status(error.status).json({ error: error.message });
}

export function requireUser(req: Request): AuthenticatedUser {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}
