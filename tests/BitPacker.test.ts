import { capacity, pack, packedLength, unpackAll, unpackOne } from '../src/BitPacker';
import { BIT_WIDTHS, BitWidth, maxStatusValue } from '../src/BitWidth';
import { expectStatusListError } from './support/errors';

const SPEC_1BIT = [1, 0, 0, 1, 1, 1, 0, 1, 1, 1, 0, 0, 0, 1, 0, 1];

describe('BitPacker', () => {
  describe('pack', () => {
    it('packs one-bit statuses LSB-first', () => {
      expect(pack(SPEC_1BIT, 1)).toEqual(new Uint8Array([0xb9, 0xa3]));
    });

    it('packs two-bit statuses LSB-first', () => {
      // 11 10 01 00
      expect(pack([0, 1, 2, 3], 2)).toEqual(new Uint8Array([0xe4]));
    });

    it('packs four-bit statuses low nibble first', () => {
      expect(pack([0x1, 0xf, 0x2], 4)).toEqual(new Uint8Array([0xf1, 0x02]));
    });

    it('packs eight-bit statuses one per byte', () => {
      expect(pack([1, 2, 0, 3, 255, 16], 8)).toEqual(new Uint8Array([1, 2, 0, 3, 255, 16]));
    });

    it('places the second status in bit 1 for width 1', () => {
      expect(pack([0, 1], 1)).toEqual(new Uint8Array([0x02]));
    });

    it('zero-pads the unused high bits of the last byte', () => {
      expect(pack([1, 1, 1], 1)).toEqual(new Uint8Array([0x07]));
      expect(pack([3], 2)).toEqual(new Uint8Array([0x03]));
      expect(pack([1, 0, 0, 0, 0, 0, 0, 0, 1], 1)).toEqual(new Uint8Array([0x01, 0x01]));
    });

    it('returns an empty buffer for no statuses', () => {
      for (const width of BIT_WIDTHS) {
        expect(pack([], width)).toEqual(new Uint8Array(0));
      }
    });

    it('is deterministic', () => {
      expect(pack(SPEC_1BIT, 1)).toEqual(pack(SPEC_1BIT, 1));
    });

    it('rejects codes wider than the bit width', () => {
      expectStatusListError(() => pack([0, 2], 1), 'VALUE_OUT_OF_RANGE');
      expectStatusListError(() => pack([4], 2), 'VALUE_OUT_OF_RANGE');
      expectStatusListError(() => pack([16], 4), 'VALUE_OUT_OF_RANGE');
      expectStatusListError(() => pack([256], 8), 'VALUE_OUT_OF_RANGE');
    });

    it('rejects negative and fractional codes', () => {
      expectStatusListError(() => pack([-1], 8), 'VALUE_OUT_OF_RANGE');
      expectStatusListError(() => pack([1.5], 8), 'VALUE_OUT_OF_RANGE');
      expectStatusListError(() => pack([NaN], 8), 'VALUE_OUT_OF_RANGE');
    });
  });

  describe('unpackOne', () => {
    it('reads every status of the one-bit vector', () => {
      const buffer = new Uint8Array([0xb9, 0xa3]);
      SPEC_1BIT.forEach((code, i) => {
        expect(unpackOne(buffer, 1, i)).toBe(code);
      });
    });

    it('reads two-bit statuses', () => {
      const buffer = new Uint8Array([0xe4]);
      expect([0, 1, 2, 3].map(i => unpackOne(buffer, 2, i))).toEqual([0, 1, 2, 3]);
    });

    it('reads four-bit statuses from low then high nibble', () => {
      const buffer = new Uint8Array([0xf1, 0x02]);
      expect(unpackOne(buffer, 4, 0)).toBe(1);
      expect(unpackOne(buffer, 4, 1)).toBe(15);
      expect(unpackOne(buffer, 4, 2)).toBe(2);
      expect(unpackOne(buffer, 4, 3)).toBe(0);
    });

    it('reads eight-bit statuses as whole bytes', () => {
      expect(unpackOne(new Uint8Array([7, 200]), 8, 1)).toBe(200);
    });

    it('reads padding bits as zero', () => {
      expect(unpackOne(new Uint8Array([0x07]), 1, 7)).toBe(0);
    });

    it('accepts the last index and rejects the one after it', () => {
      const buffer = new Uint8Array([0xff, 0xff]);
      expect(unpackOne(buffer, 2, 7)).toBe(3);
      expectStatusListError(() => unpackOne(buffer, 2, 8), 'INDEX_OUT_OF_BOUNDS');
    });

    it('rejects negative and fractional indices', () => {
      const buffer = new Uint8Array([0xff]);
      expectStatusListError(() => unpackOne(buffer, 1, -1), 'INDEX_OUT_OF_BOUNDS');
      expectStatusListError(() => unpackOne(buffer, 1, 0.5), 'INDEX_OUT_OF_BOUNDS');
    });

    it('rejects any index into an empty buffer', () => {
      expectStatusListError(() => unpackOne(new Uint8Array(0), 8, 0), 'INDEX_OUT_OF_BOUNDS');
    });
  });

  describe('round trip', () => {
    it.each(BIT_WIDTHS.map(w => [w]))('unpacks what was packed at width %i', (width: BitWidth) => {
      const max = maxStatusValue(width);
      const codes = Array.from({ length: 37 }, (_, i) => (i * 7 + 3) % (max + 1));
      const buffer = pack(codes, width);
      expect(buffer.length).toBe(packedLength(codes.length, width));
      codes.forEach((code, i) => {
        expect(unpackOne(buffer, width, i)).toBe(code);
      });
    });
  });

  describe('packedLength / capacity', () => {
    it('computes ceil(count * width / 8)', () => {
      expect(packedLength(0, 1)).toBe(0);
      expect(packedLength(1, 1)).toBe(1);
      expect(packedLength(8, 1)).toBe(1);
      expect(packedLength(9, 1)).toBe(2);
      expect(packedLength(3, 2)).toBe(1);
      expect(packedLength(3, 4)).toBe(2);
      expect(packedLength(3, 8)).toBe(3);
    });

    it('computes floor(bytes * 8 / width)', () => {
      expect(capacity(0, 8)).toBe(0);
      expect(capacity(2, 1)).toBe(16);
      expect(capacity(2, 2)).toBe(8);
      expect(capacity(2, 4)).toBe(4);
      expect(capacity(2, 8)).toBe(2);
    });
  });

  describe('unpackAll', () => {
    it('returns every addressable status including padding', () => {
      expect(unpackAll(new Uint8Array([0x24]), 2)).toEqual([0, 1, 2, 0]);
    });
  });
});
