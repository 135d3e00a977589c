import { BitWidth, assertStatusValue, maxStatusValue } from './BitWidth';
import { StatusListError } from './errors';

/**
 * Bit packing for status lists.
 *
 * Statuses are stored LSB-first: status 0 occupies the least significant
 * `width` bits of byte 0, status 1 the next `width` bits, and so on before
 * rolling over into byte 1. Unused high bits of the final byte are zero.
 *
 *   width=2, codes [0, 1, 2, 3]  ->  0b11_10_01_00 = 0xe4
 */

/** Number of bytes needed for `count` statuses: ceil(count * width / 8). */
export function packedLength(count: number, width: BitWidth): number {
  return Math.ceil((count * width) / 8);
}

/** Number of addressable statuses in `byteLength` bytes: floor(byteLength * 8 / width). */
export function capacity(byteLength: number, width: BitWidth): number {
  return Math.floor((byteLength * 8) / width);
}

/**
 * Pack status codes into a byte buffer.
 * Every code is validated before anything is written.
 * @throws StatusListError VALUE_OUT_OF_RANGE
 */
export function pack(codes: readonly number[], width: BitWidth): Uint8Array {
  for (const code of codes) {
    assertStatusValue(code, width);
  }

  const bytes = new Uint8Array(packedLength(codes.length, width));
  if (width === 8) {
    bytes.set(codes);
    return bytes;
  }

  for (let i = 0; i < codes.length; i++) {
    const bitOffset = i * width;
    bytes[bitOffset >> 3] |= codes[i] << (bitOffset & 7);
  }
  return bytes;
}

/**
 * Read the status at `index` without unpacking the rest of the buffer.
 * @throws StatusListError INDEX_OUT_OF_BOUNDS
 */
export function unpackOne(buffer: Uint8Array, width: BitWidth, index: number): number {
  const size = capacity(buffer.length, width);
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new StatusListError(
      'INDEX_OUT_OF_BOUNDS',
      `Status index ${index} out of bounds [0, ${size})`,
      { context: { index: String(index), length: String(size) } },
    );
  }

  const bitOffset = index * width;
  // width divides 8, so a status never straddles two bytes
  return (buffer[bitOffset >> 3] >> (bitOffset & 7)) & maxStatusValue(width);
}

/** Unpack every addressable status, padding included. */
export function unpackAll(buffer: Uint8Array, width: BitWidth): number[] {
  const size = capacity(buffer.length, width);
  const result: number[] = new Array<number>(size);
  for (let i = 0; i < size; i++) {
    result[i] = unpackOne(buffer, width, i);
  }
  return result;
}
