import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { asyncLocalStorage } from './log-context';
import { logger } from './logger';

const CORRELATION_HEADERS = ['x-correlation-id', 'x-request-id'] as const;

const incomingCorrelationId = (req: Request): string | undefined => {
  for (const header of CORRELATION_HEADERS) {
    const value = req.headers[header];
    const first = Array.isArray(value) ? value[0] : value;
    if (first) {
      return first;
    }
  }
  return undefined;
};

/**
 * Opens the request's log context under a correlation id taken from the
 * caller or generated, and echoes it back in `x-correlation-id`.
 * The auth middleware adds the principal to the same context later.
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = incomingCorrelationId(req) ?? uuid();
  res.setHeader('x-correlation-id', correlationId);

  asyncLocalStorage.run({ correlationId }, () => {
    const startedAt = Date.now();
    logger.debug({ method: req.method, path: req.path }, 'Request started');

    res.on('finish', () => {
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      logger[level](
        { method: req.method, path: req.path, statusCode: res.statusCode, durationMs: Date.now() - startedAt },
        `${req.method} ${req.path} ${res.statusCode}`
      );
    });

    next();
  });
};
