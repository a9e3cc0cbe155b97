import type { ErrorRequestHandler, Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { CalendarSyncException } from '../services/calendarSync/errors.js';
import { createLogger } from '../services/calendarSync/logger.js';
import { HttpError } from './errors.js';

const logger = createLogger('Http');

export function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return async (req: Request, res: Response, _next: NextFunction): Promise<void> => {
    try {
      await handler(req, res);
    } catch (error) {
      handleError(error, req, res);
    }
  };
}

export function handleError(error: unknown, req: Request, res: Response): void {
  if (error instanceof HttpError) {
    if (error.status >= 500) {
      logger.error(error.message, { method: req.method, path: req.path, details: error.details });
    }
    res.status(error.status).json({ error: error.message, details: error.details });
    return;
  }

  if (typeof error === 'object' && error !== null && 'type' in error) {
    if (error.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    if (error.type === 'entity.too.large') {
      res.status(413).json({ error: 'Request body too large' });
      return;
    }
  }

  if (error instanceof multer.MulterError) {
    const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    res.status(status).json({ error: error.message, details: { code: error.code.toLowerCase() } });
    return;
  }

  // Provider failures that escape the engine surface as a bad gateway.
  if (error instanceof CalendarSyncException) {
    const status = error.status !== undefined && error.status < 500 && error.status !== 401 ? error.status : 502;
    logger.warn('Calendar provider request failed', {
      method: req.method,
      path: req.path,
      code: error.code ?? null,
      message: error.message
    });
    res.status(status).json({ error: error.message, details: { code: error.code ?? 'provider_error' } });
    return;
  }

  logger.error('Unhandled error in route handler', {
    method: req.method,
    path: req.path,
    error: error instanceof Error ? (error.stack ?? error.message) : String(error)
  });
  res.status(500).json({ error: 'Internal server error' });
}

/** Last middleware in the chain; catches errors raised outside `route()` (body parsing, uploads). */
export const errorMiddleware: ErrorRequestHandler = (error, req, res, _next) => {
  handleError(error, req, res);
};
