import {
  BIT_WIDTHS,
  assertBitWidth,
  assertStatusValue,
  isBitWidth,
  maxStatusValue,
  statusesPerByte,
} from '../src/BitWidth';
import { expectStatusListError } from './support/errors';

describe('BitWidth', () => {
  it('lists the four allowed widths', () => {
    expect(BIT_WIDTHS).toEqual([1, 2, 4, 8]);
  });

  describe('isBitWidth', () => {
    it('accepts 1, 2, 4 and 8', () => {
      expect(BIT_WIDTHS.every(isBitWidth)).toBe(true);
    });

    it('rejects everything else', () => {
      for (const value of [0, 3, 5, 6, 7, 9, 16, -1, 1.5, '1', null, undefined]) {
        expect(isBitWidth(value)).toBe(false);
      }
    });
  });

  describe('assertBitWidth', () => {
    it('returns a valid width unchanged', () => {
      expect(assertBitWidth(4)).toBe(4);
    });

    it.each([[0], [3], [5], [6], [7], [9], [16]])('throws INVALID_BIT_WIDTH for %i', (bits: number) => {
      const err = expectStatusListError(() => assertBitWidth(bits), 'INVALID_BIT_WIDTH');
      expect(err.message).toBe(`Invalid bits per status value: ${bits}. Must be 1, 2, 4, or 8`);
      expect(err.context).toEqual({ bits: String(bits) });
    });

    it('does not coerce numeric strings', () => {
      expectStatusListError(() => assertBitWidth('2'), 'INVALID_BIT_WIDTH');
    });
  });

  describe('derived quantities', () => {
    it('computes the largest code per width', () => {
      expect(BIT_WIDTHS.map(maxStatusValue)).toEqual([1, 3, 15, 255]);
    });

    it('computes statuses per byte', () => {
      expect(BIT_WIDTHS.map(statusesPerByte)).toEqual([8, 4, 2, 1]);
    });
  });

  describe('assertStatusValue', () => {
    it('accepts the full range for a width', () => {
      expect(assertStatusValue(0, 2)).toBe(0);
      expect(assertStatusValue(3, 2)).toBe(3);
      expect(assertStatusValue(255, 8)).toBe(255);
    });

    it('rejects values above the width', () => {
      const err = expectStatusListError(() => assertStatusValue(4, 2), 'VALUE_OUT_OF_RANGE');
      expect(err.message).toBe('Status value 4 out of range [0, 3] for 2-bit statuses');
    });

    it('rejects negatives and non-integers', () => {
      expectStatusListError(() => assertStatusValue(-1, 8), 'VALUE_OUT_OF_RANGE');
      expectStatusListError(() => assertStatusValue(0.5, 8), 'VALUE_OUT_OF_RANGE');
      expectStatusListError(() => assertStatusValue(Infinity, 8), 'VALUE_OUT_OF_RANGE');
    });
  });
});
