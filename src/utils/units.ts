import { ApiError } from '../middlewares/errorHandler';

/**
 * Fixed-point helpers. Every quantity in the system is an unsigned bigint
 * scaled by 10^18; there is no floating point anywhere.
 */

export const DECIMALS = 18;
export const SCALE = 10n ** BigInt(DECIMALS);
export const MAX_UINT256 = 2n ** 256n - 1n;

const UINT_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Reject negative or oversize amounts.
 */
export const assertUint = (value: bigint, field = 'amount'): void => {
  if (value < 0n || value > MAX_UINT256) {
    throw ApiError.invalidAmount(`${field} must be an unsigned 256-bit integer`);
  }
};

export const isUintString = (value: unknown): value is string =>
  typeof value === 'string' && UINT_PATTERN.test(value) && BigInt(value) <= MAX_UINT256;

/**
 * Parse a base-unit integer string ("1500000000000000000").
 */
export const parseUint = (value: string, field = 'amount'): bigint => {
  if (!isUintString(value)) {
    throw ApiError.invalidAmount(`${field} must be a non-negative integer string`);
  }
  return BigInt(value);
};

/**
 * Parse a human decimal ("1.5") into base units.
 */
export const parseUnits = (value: string, decimals = DECIMALS): bigint => {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw ApiError.invalidAmount(`Cannot parse "${value}" as a decimal amount`);
  }

  const [, whole, fraction = ''] = match;
  if (fraction.length > decimals) {
    throw ApiError.invalidAmount(`"${value}" has more than ${decimals} decimal places`);
  }

  const result = BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction.padEnd(decimals, '0') || '0');
  assertUint(result);
  return result;
};

/**
 * Format base units as a human decimal, trimming trailing zeros.
 */
export const formatUnits = (value: bigint, decimals = DECIMALS): string => {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const base = 10n ** BigInt(decimals);
  const whole = abs / base;
  const fraction = (abs % base).toString().padStart(decimals, '0').replace(/0+$/, '');
  const formatted = fraction ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${formatted}` : formatted;
};
