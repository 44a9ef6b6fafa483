import pino from 'pino';

import { config } from '../config';
import { getLogContext } from './log-context';

/**
 * Root logger. JSON in production, pretty printed in development and silent
 * under test. Every line carries the active request and frame context.
 */
export const logger = pino({
  level: config.isTest ? 'silent' : config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'reservemint',
    env: config.nodeEnv,
  },
  mixin: () => ({ ...getLogContext() }),
  redact: ['req.headers.authorization', 'headers.authorization'],
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// One child per component: ledger, exchange, event-bus, ...
export const createServiceLogger = (component: string) => logger.child({ component });
