import { ApiError } from '../middlewares/errorHandler';

/**
 * A principal is any account able to hold balances and be authorized:
 * `0x` followed by 40 hex digits, always handled in lower case.
 */
export type Principal = string;

export const ZERO_ADDRESS: Principal = '0x0000000000000000000000000000000000000000';

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

export const isAddress = (value: unknown): value is string =>
  typeof value === 'string' && ADDRESS_PATTERN.test(value);

export const isZeroAddress = (value: Principal): boolean => value.toLowerCase() === ZERO_ADDRESS;

/**
 * Normalize an address for use as a map key.
 * Throws INVALID_INPUT for anything that is not address-shaped.
 */
export const normalizeAddress = (value: string, field = 'address'): Principal => {
  if (!isAddress(value)) {
    throw ApiError.invalidInput(`${field} must be a 0x-prefixed 20-byte hex address`);
  }
  return value.toLowerCase();
};
