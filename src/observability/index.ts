// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  addLogContext,
  runWithContext,
} from './log-context';
export type { LogContext } from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  rejectedCallsTotal,
  ledgerEventsTotal,
  tokenTotalSupply,
  tokenPaused,
  exchangePurchasesTotal,
  exchangeSalesTotal,
  exchangeWithdrawalsTotal,
  exchangeTokenReserve,
  exchangeCurrencyReserve,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';
