import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { eventBus } from './events/eventBus';
import { startEventRelay } from './events/eventRelay';
import { registerMetricsHandlers } from './events/metrics.handlers';
import { logger } from './observability';
import { createSystem, systemParamsFromConfig } from './system';

const startServer = async (): Promise<void> => {
  try {
    logger.info(getEnvironmentInfo(), 'Starting ReserveMint');

    // Deploy ledger, permission store and exchange
    const system = createSystem(systemParamsFromConfig(config));
    logger.info(
      {
        token: system.ledger.symbol(),
        totalSupply: system.ledger.totalSupply().toString(),
        exchange: system.exchange.address,
      },
      'Ledger deployed'
    );

    const detachMetrics = registerMetricsHandlers(system);

    // Connect to event bus
    let stopRelay: (() => void) | null = null;
    if (config.eventRelay.enabled) {
      await eventBus.connect();
      stopRelay = startEventRelay(system.events, eventBus);
    }

    const app = createApp(system, {
      eventRelay: config.eventRelay.enabled ? () => eventBus.getStatus() : undefined,
    });

    // Start HTTP server
    const server = app.listen(config.port, () => {
      logger.info(`Server running on port ${config.port}`);
      logger.info(`Health check: http://localhost:${config.port}/health`);
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      server.close(() => {
        logger.info('HTTP server closed');

        stopRelay?.();
        detachMetrics();

        eventBus
          .disconnect()
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
