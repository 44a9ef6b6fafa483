/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId, rejectedCallsTotal } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  // Body parser failures arrive as plain errors carrying an HTTP status
  const errorCode =
    err.errorCode || (err.statusCode && err.statusCode < 500 ? ErrorCode.INVALID_INPUT : ErrorCode.INTERNAL_ERROR);
  const statusCode = err.statusCode || errorCodeToStatus[errorCode] || 500;

  rejectedCallsTotal.inc({ code: ErrorCode[errorCode] });

  const logPayload = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logPayload, `Error: ${err.message}`);
  } else {
    logger.warn(logPayload, `Rejected: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      name: ErrorCode[errorCode],
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      name: ErrorCode[ErrorCode.RESOURCE_NOT_FOUND],
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 *
 * Every rejection raised by the ledger, permission store and exchange is an
 * ApiError, so a reverted call carries the same code in-process and over HTTP.
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode || errorCodeToStatus[errorCode] || 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Factory methods for common errors
   */
  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidAmount(message = 'Invalid amount'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static invalidInput(message = 'Invalid input'): ApiError {
    return new ApiError(ErrorCode.INVALID_INPUT, message);
  }

  static zeroAmount(message = 'Amount must be greater than zero'): ApiError {
    return new ApiError(ErrorCode.ZERO_AMOUNT, message);
  }

  static zeroAddress(message = 'Address must not be the zero address'): ApiError {
    return new ApiError(ErrorCode.ZERO_ADDRESS, message);
  }

  static unsupportedCall(message = 'Direct calls not allowed'): ApiError {
    return new ApiError(ErrorCode.UNSUPPORTED_CALL, message);
  }

  static insufficientBalance(message = 'Insufficient balance'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_BALANCE, message);
  }

  static insufficientAllowance(message = 'Insufficient allowance'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_ALLOWANCE, message);
  }

  static insufficientReserve(message = 'Insufficient reserve'): ApiError {
    return new ApiError(ErrorCode.INSUFFICIENT_RESERVE, message);
  }

  static maxSupplyReached(message = 'Max supply reached'): ApiError {
    return new ApiError(ErrorCode.MAX_SUPPLY_REACHED, message);
  }

  static paused(message = 'Token transfers are paused'): ApiError {
    return new ApiError(ErrorCode.PAUSED, message);
  }

  static notPaused(message = 'Token transfers are not paused'): ApiError {
    return new ApiError(ErrorCode.NOT_PAUSED, message);
  }

  static tooEarly(message = 'Transfer cannot be accepted yet'): ApiError {
    return new ApiError(ErrorCode.TOO_EARLY, message);
  }

  static noPendingTransfer(message = 'No pending transfer'): ApiError {
    return new ApiError(ErrorCode.NO_PENDING_TRANSFER, message);
  }

  static reentrantCall(message = 'Reentrant call'): ApiError {
    return new ApiError(ErrorCode.REENTRANT_CALL, message);
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }
}

/**
 * Type guard for rejections raised with a specific code
 */
export const isApiError = (error: unknown, code?: ErrorCode): error is ApiError =>
  error instanceof ApiError && (code === undefined || error.errorCode === code);
