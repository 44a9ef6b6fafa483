import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'reservemint' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

/**
 * Total HTTP requests counter
 */
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

/**
 * HTTP request duration histogram
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

/**
 * Rejected calls by error code
 */
export const rejectedCallsTotal = new Counter({
  name: 'rejected_calls_total',
  help: 'Calls rejected with an error, by error code',
  labelNames: ['code'] as const,
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Committed notifications by type
 */
export const ledgerEventsTotal = new Counter({
  name: 'ledger_events_total',
  help: 'Committed notifications by event type',
  labelNames: ['event_type'] as const,
  registers: [registry],
});

/**
 * Supply gauges. Gauges are float64, so values are exported in whole tokens.
 */
export const tokenTotalSupply = new Gauge({
  name: 'token_total_supply',
  help: 'Total token supply in whole tokens',
  registers: [registry],
});

export const tokenPaused = new Gauge({
  name: 'token_paused',
  help: '1 while token transfers are paused',
  registers: [registry],
});

// ============================================
// Exchange Metrics
// ============================================

/**
 * Purchases by how they were filled
 */
export const exchangePurchasesTotal = new Counter({
  name: 'exchange_purchases_total',
  help: 'Completed purchases by source (reserve or mint)',
  labelNames: ['source'] as const,
  registers: [registry],
});

export const exchangeSalesTotal = new Counter({
  name: 'exchange_sales_total',
  help: 'Completed sales',
  registers: [registry],
});

export const exchangeWithdrawalsTotal = new Counter({
  name: 'exchange_withdrawals_total',
  help: 'Owner withdrawals by asset',
  labelNames: ['asset'] as const, // currency, token
  registers: [registry],
});

export const exchangeTokenReserve = new Gauge({
  name: 'exchange_token_reserve',
  help: 'Tokens held by the exchange, in whole tokens',
  registers: [registry],
});

export const exchangeCurrencyReserve = new Gauge({
  name: 'exchange_currency_reserve',
  help: 'Settlement currency held by the exchange, in whole units',
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

/**
 * Get content type for metrics response
 */
export const getMetricsContentType = (): string => {
  return registry.contentType;
};
