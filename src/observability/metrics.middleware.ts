import { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDuration } from './metrics';

const ADDRESS_SEGMENT = /0x[0-9a-f]{40}/gi;

/**
 * Label for the request path. Matched routes use their pattern
 * (`/token/balances/:address`); anything else has addresses folded so
 * unknown paths cannot blow up label cardinality.
 */
const pathLabel = (req: Request): string => {
  if (typeof req.route?.path === 'string') {
    return `${req.baseUrl}${req.route.path}`;
  }
  return req.path.replace(ADDRESS_SEGMENT, ':address');
};

export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const stopTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const labels = { method: req.method, path: pathLabel(req), status: String(res.statusCode) };
    httpRequestsTotal.inc(labels);
    stopTimer(labels);
  });

  next();
};
