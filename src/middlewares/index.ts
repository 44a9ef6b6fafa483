/**
 * Middleware Exports
 *
 * Central export point for all middleware modules.
 */

// Error handling
export {
  errorHandler,
  notFoundHandler,
  ApiError,
  isApiError,
} from './errorHandler';
export type { AppError } from './errorHandler';

// Request validation
export { validateRequest } from './validateRequest';
export {
  addressBody,
  optionalAddressBody,
  addressParam,
  amountBody,
  amountQuery,
} from './validators';
