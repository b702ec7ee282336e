import { Request, Response, NextFunction } from 'express';
import pino from 'pino';
import { AppError } from '../utils/errors.js';

const log = pino({ name: 'http' });

/**
 * Last middleware in the chain. Operational AppErrors carry their own status
 * code; anything else is a 500 with the details kept in the log.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError && err.isOperational) {
    if (err.statusCode >= 500) {
      log.error({ err, method: req.method, url: req.url }, 'Request failed');
    }
    res.status(err.statusCode).json({ error: err.message, code: err.code });
    return;
  }

  log.error({ err, method: req.method, url: req.url }, 'Unhandled request error');
  res.status(500).json({ error: 'Internal server error' });
}
