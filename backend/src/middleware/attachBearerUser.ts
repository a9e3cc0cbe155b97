import type { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import { createLogger } from '../services/calendarSync/logger.js';

const logger = createLogger('Auth');

function getJwtSecret(): string {
  const secret = process.env.AUTH_JWT_SECRET;
  if (!secret) {
    throw new Error('AUTH_JWT_SECRET must be configured');
  }
  return secret;
}

/** `sub` claim to a positive integer user id, or null. */
export function resolveUserId(payload: string | jwt.JwtPayload): number | null {
  if (typeof payload === 'string' || payload.sub === undefined) {
    return null;
  }
  const id = Number(payload.sub);
  return Number.isInteger(id) && id > 0 ? id : null;
}

export function signAccessToken(userId: number, expiresIn: number = 60 * 60): string {
  return jwt.sign({}, getJwtSecret(), { subject: String(userId), algorithm: 'HS256', expiresIn });
}

/**
 * Attaches `req.user` when the request carries a valid HS256 bearer token.
 * Requests without one pass through untouched; routes decide whether a user
 * is required.
 */
export function attachBearerUser(req: Request, _res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return next();
  }

  const token = authHeader.slice(7).trim();
  if (!token) {
    return next();
  }

  try {
    const payload = jwt.verify(token, getJwtSecret(), { algorithms: ['HS256'] });
    const userId = resolveUserId(payload);
    if (userId !== null) {
      req.user = { id: userId };
    } else {
      logger.warn('Bearer token has no usable subject');
    }
  } catch (error) {
    logger.debug('Bearer token rejected', { error: error instanceof Error ? error.message : String(error) });
  }

  next();
}
