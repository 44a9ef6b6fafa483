import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

// Import environment-specific configurations
import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  EVENT_RELAY_CONFIG,
  JWT_CONFIG,
  TOKEN_CONFIG,
  EXCHANGE_CONFIG,
  GENESIS_FUNDING,
  FAUCET_ENABLED,
  API_CONFIG,
  LOG_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

// Re-export environment utilities
export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

// Re-export environment-specific configs for direct access
export * from './environments';

// Validate production environment variables on startup
if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * This consolidates all environment-specific settings.
 * Import this for general app configuration needs.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  // JWT Authentication
  jwt: JWT_CONFIG,

  // Ledger deployment
  token: TOKEN_CONFIG,

  // Exchange deployment
  exchange: EXCHANGE_CONFIG,

  // Currency
  currency: {
    genesisFunding: GENESIS_FUNDING,
    faucetEnabled: FAUCET_ENABLED,
  },

  // Redis
  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
  },

  // Event relay
  eventRelay: EVENT_RELAY_CONFIG,

  // Logging
  logging: LOG_CONFIG,
};

export type AppConfig = typeof config;
