/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Amounts are kept as the strings found in the environment; they are parsed
 * into fixed-point integers when the system is assembled.
 *
 * Usage:
 *   import { isProduction, TOKEN_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const DEFAULT_DEPLOYER = '0x1000000000000000000000000000000000000001';
const DEFAULT_EXCHANGE = '0x5e11000000000000000000000000000000000001';

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:5173').split(','),
};

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT Secret - MUST be set in production
 */
export const JWT_SECRET = isProduction
  ? process.env.JWT_SECRET || ''
  : process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production';

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  expiresIn: process.env.JWT_EXPIRES_IN || (isProduction ? '15m' : '1h'),
  issuer: process.env.JWT_ISSUER || 'reservemint',
};

// =============================================================================
// TOKEN (LEDGER) CONFIGURATION
// =============================================================================

/**
 * Deployment parameters of the ledger and its permission store.
 * Supply values are whole tokens ("1000000" means 1,000,000 * 10^18 units).
 */
export const TOKEN_CONFIG = {
  name: process.env.TOKEN_NAME || 'ReserveMint Token',
  symbol: process.env.TOKEN_SYMBOL || 'RMT',
  maxSupply: process.env.TOKEN_MAX_SUPPLY || '1000000',
  initialMint: process.env.TOKEN_INITIAL_MINT || '10000',
  initialMinter: process.env.TOKEN_INITIAL_MINTER || DEFAULT_DEPLOYER,
  admin: process.env.TOKEN_ADMIN || DEFAULT_DEPLOYER,
  adminDelaySeconds: parseInt(process.env.TOKEN_ADMIN_DELAY_SECONDS || (isProduction ? '86400' : '0'), 10),
};

// =============================================================================
// EXCHANGE CONFIGURATION
// =============================================================================

/**
 * Prices are settlement currency per whole token ("0.001").
 */
export const EXCHANGE_CONFIG = {
  address: process.env.EXCHANGE_ADDRESS || DEFAULT_EXCHANGE,
  owner: process.env.EXCHANGE_OWNER || DEFAULT_DEPLOYER,
  buyPrice: process.env.EXCHANGE_BUY_PRICE || '0.001',
  sellPrice: process.env.EXCHANGE_SELL_PRICE || '0.0005',
  grantMinter: process.env.EXCHANGE_GRANT_MINTER !== 'false',
};

/**
 * Genesis currency funding, "address=amount" pairs separated by commas.
 * Amounts are whole currency units.
 */
export const GENESIS_FUNDING = process.env.GENESIS_FUNDING || (isProduction ? '' : `${DEFAULT_DEPLOYER}=100`);

/**
 * The currency faucet route exists only outside production
 */
export const FAUCET_ENABLED = !isProduction && process.env.FAUCET_ENABLED !== 'false';

// =============================================================================
// REDIS / EVENT RELAY CONFIGURATION
// =============================================================================

export const REDIS_HOST = process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(process.env.REDIS_PORT || '6379', 10);

export const REDIS_PASSWORD = process.env.REDIS_PASSWORD || undefined;

/**
 * Committed notifications are published to Redis channels when enabled
 */
export const EVENT_RELAY_CONFIG = {
  enabled: process.env.EVENT_RELAY_ENABLED === 'true',
  channelPrefix: process.env.EVENT_RELAY_CHANNEL_PREFIX || 'reservemint:',
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

/**
 * Logging configuration by environment
 */
export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'error' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = [
    'JWT_SECRET',
    'TOKEN_INITIAL_MINTER',
    'TOKEN_ADMIN',
    'EXCHANGE_ADDRESS',
    'EXCHANGE_OWNER',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  token: TOKEN_CONFIG.symbol,
  exchange: EXCHANGE_CONFIG.address,
  eventRelay: EVENT_RELAY_CONFIG.enabled,
  redisHost: REDIS_HOST,
});
