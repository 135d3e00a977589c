import { StatusListError } from './errors';

/** Number of bits allocated to each status in a packed buffer. */
export type BitWidth = 1 | 2 | 4 | 8;

export const BIT_WIDTHS: readonly BitWidth[] = [1, 2, 4, 8];

/** Type guard: checks if a value is one of the four allowed bit widths. */
export function isBitWidth(value: unknown): value is BitWidth {
  return value === 1 || value === 2 || value === 4 || value === 8;
}

/**
 * Validate an untrusted bit width.
 * Throws INVALID_BIT_WIDTH for anything other than 1, 2, 4 or 8.
 */
export function assertBitWidth(value: unknown): BitWidth {
  if (!isBitWidth(value)) {
    throw new StatusListError(
      'INVALID_BIT_WIDTH',
      `Invalid bits per status value: ${String(value)}. Must be 1, 2, 4, or 8`,
      { context: { bits: String(value) } },
    );
  }
  return value;
}

/** Largest status code representable at the given width (2^width - 1). */
export function maxStatusValue(width: BitWidth): number {
  return (1 << width) - 1;
}

/** How many statuses share a single byte. */
export function statusesPerByte(width: BitWidth): number {
  return 8 / width;
}

/**
 * Validate a status code against a width.
 * Non-integers and negatives are out of range too; nothing is clamped.
 */
export function assertStatusValue(code: number, width: BitWidth): number {
  if (!Number.isInteger(code) || code < 0 || code > maxStatusValue(width)) {
    throw new StatusListError(
      'VALUE_OUT_OF_RANGE',
      `Status value ${code} out of range [0, ${maxStatusValue(width)}] for ${width}-bit statuses`,
      { context: { value: String(code), bits: String(width) } },
    );
  }
  return code;
}
