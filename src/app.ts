import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { errorHandler, notFoundHandler } from './middlewares';
import { createHealthRoutes, HealthOptions } from './routes/health';
import { createEventRoutes } from './routes/events';
import { authRoutes } from './auth';
import { authService } from './auth/auth.service';
import { createLedgerRoutes } from './services/ledger';
import { createPermissionRoutes } from './services/permission';
import { createExchangeRoutes } from './services/exchange';
import { createCurrencyRoutes } from './services/currency';
import type { ReserveMintSystem } from './system';
import { bigintReplacer } from './utils/json';
import {
  correlationMiddleware,
  logger,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
} from './observability';

export interface AppOptions extends HealthOptions {
  faucetEnabled?: boolean;
}

export const createApp = (system: ReserveMintSystem, options: AppOptions = {}): Application => {
  const app = express();

  // The exchange moves its reserve only through buy/sell
  authService.reserve(system.exchange.address);

  // Amounts are bigint; render them as decimal strings
  app.set('json replacer', bigintReplacer);

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', createHealthRoutes(system, options));
  app.use('/auth', authRoutes);
  app.use('/token', createLedgerRoutes(system.ledger));
  app.use('/roles', createPermissionRoutes(system.permissions));
  app.use('/exchange', createExchangeRoutes(system.exchange));
  app.use(
    '/currency',
    createCurrencyRoutes(system.currency, { faucetEnabled: options.faucetEnabled ?? config.currency.faucetEnabled })
  );
  app.use('/events', createEventRoutes(system.events));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'ReserveMint API',
      version: '1.0.0',
      description: 'Supply-capped token ledger with a reserve-first currency exchange',
      token: system.ledger.symbol(),
      exchange: system.exchange.address,
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
