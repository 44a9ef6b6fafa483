/**
 * Unit tests for fixed-point helpers
 */

import {
  MAX_UINT256,
  SCALE,
  assertUint,
  formatUnits,
  isUintString,
  parseUint,
  parseUnits,
} from '../../../src/utils/units';
import { ErrorCode } from '../../../src/types/errors';
import { rejectionCode } from '../../helpers';

describe('units', () => {
  describe('parseUnits', () => {
    it('should scale whole numbers by 10^18', () => {
      expect(parseUnits('10000')).toBe(10000n * SCALE);
    });

    it('should parse fractional prices exactly', () => {
      expect(parseUnits('0.001')).toBe(1_000_000_000_000_000n);
      expect(parseUnits('1.5')).toBe(1_500_000_000_000_000_000n);
    });

    it('should honour a custom number of decimals', () => {
      expect(parseUnits('2.25', 2)).toBe(225n);
    });

    it('should reject more decimal places than the scale holds', () => {
      expect(rejectionCode(() => parseUnits('0.0000000000000000001'))).toBe(ErrorCode.INVALID_AMOUNT);
    });

    it('should reject negative and malformed input', () => {
      expect(rejectionCode(() => parseUnits('-1'))).toBe(ErrorCode.INVALID_AMOUNT);
      expect(rejectionCode(() => parseUnits('1e18'))).toBe(ErrorCode.INVALID_AMOUNT);
      expect(rejectionCode(() => parseUnits(''))).toBe(ErrorCode.INVALID_AMOUNT);
    });
  });

  describe('formatUnits', () => {
    it('should trim trailing zeros', () => {
      expect(formatUnits(1_500_000_000_000_000_000n)).toBe('1.5');
      expect(formatUnits(12_000n * SCALE)).toBe('12000');
      expect(formatUnits(0n)).toBe('0');
    });

    it('should keep the smallest unit', () => {
      expect(formatUnits(1n)).toBe('0.000000000000000001');
    });
  });

  describe('parseUint', () => {
    it('should parse base-unit strings', () => {
      expect(parseUint('1500000000000000000')).toBe(1_500_000_000_000_000_000n);
      expect(parseUint('0')).toBe(0n);
    });

    it('should reject signs, decimals and overflow', () => {
      expect(rejectionCode(() => parseUint('-1'))).toBe(ErrorCode.INVALID_AMOUNT);
      expect(rejectionCode(() => parseUint('1.5'))).toBe(ErrorCode.INVALID_AMOUNT);
      expect(rejectionCode(() => parseUint((MAX_UINT256 + 1n).toString()))).toBe(ErrorCode.INVALID_AMOUNT);
    });
  });

  describe('isUintString', () => {
    it('should accept the largest 256-bit value', () => {
      expect(isUintString(MAX_UINT256.toString())).toBe(true);
    });

    it('should reject non-strings', () => {
      expect(isUintString(5)).toBe(false);
      expect(isUintString(undefined)).toBe(false);
    });
  });

  describe('assertUint', () => {
    it('should reject negative amounts', () => {
      expect(rejectionCode(() => assertUint(-1n))).toBe(ErrorCode.INVALID_AMOUNT);
    });

    it('should accept zero and the maximum', () => {
      expect(() => assertUint(0n)).not.toThrow();
      expect(() => assertUint(MAX_UINT256)).not.toThrow();
    });
  });
});
