/**
 * Error Codes for the ReserveMint API
 *
 * Categorized by error type:
 * - 1xxx: Authentication and authorization errors
 * - 2xxx: Validation errors (bad arguments, nothing was attempted)
 * - 3xxx: Business rule rejections (the call was attempted and reverted)
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,
  ZERO_AMOUNT = 2004,
  ZERO_ADDRESS = 2005,
  UNSUPPORTED_CALL = 2006,

  // Business errors (3xxx)
  INSUFFICIENT_BALANCE = 3001,
  INSUFFICIENT_ALLOWANCE = 3002,
  INSUFFICIENT_RESERVE = 3003,
  MAX_SUPPLY_REACHED = 3004,
  PAUSED = 3005,
  NOT_PAUSED = 3006,
  TOO_EARLY = 3007,
  NO_PENDING_TRANSFER = 3008,
  REENTRANT_CALL = 3009,
  RESOURCE_NOT_FOUND = 3010,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401/403
  [ErrorCode.UNAUTHORIZED]: 403,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,

  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.ZERO_AMOUNT]: 400,
  [ErrorCode.ZERO_ADDRESS]: 400,
  [ErrorCode.UNSUPPORTED_CALL]: 400,

  // Business errors -> 404/409/422/425
  [ErrorCode.INSUFFICIENT_BALANCE]: 422,
  [ErrorCode.INSUFFICIENT_ALLOWANCE]: 422,
  [ErrorCode.INSUFFICIENT_RESERVE]: 422,
  [ErrorCode.MAX_SUPPLY_REACHED]: 422,
  [ErrorCode.PAUSED]: 409,
  [ErrorCode.NOT_PAUSED]: 409,
  [ErrorCode.TOO_EARLY]: 425,
  [ErrorCode.NO_PENDING_TRANSFER]: 409,
  [ErrorCode.REENTRANT_CALL]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    name: string;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}
