/**
 * Mutation strategies for byte- and text-based fuzzing.
 *
 * Takes a valid compressed payload, CBOR encoding or JSON document and
 * applies random damage to exercise the decoders' error handling.
 */

import { Rng } from './status-generator';

/** A mutation function that transforms a byte array. */
export type ByteMutator = (input: Uint8Array, rng: Rng) => Uint8Array;

/** A mutation function that transforms a string. */
export type TextMutator = (input: string, rng: Rng) => string;

function splice(input: Uint8Array, start: number, deleteCount: number, insert: number[] = []): Uint8Array {
  const bytes = Array.from(input);
  bytes.splice(start, deleteCount, ...insert);
  return new Uint8Array(bytes);
}

// -- Byte-level mutations --

/** Flip a random bit in a random byte. */
export function bitFlip(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = new Uint8Array(input);
  out[rng.int(0, out.length - 1)] ^= 1 << rng.int(0, 7);
  return out;
}

/** Insert a random byte at a random position. */
export function byteInsert(input: Uint8Array, rng: Rng): Uint8Array {
  return splice(input, rng.int(0, input.length), 0, [rng.int(0, 255)]);
}

/** Delete a random byte. */
export function byteDelete(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  return splice(input, rng.int(0, input.length - 1), 1);
}

/** Replace a random byte with another. */
export function byteReplace(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = new Uint8Array(input);
  out[rng.int(0, out.length - 1)] = rng.int(0, 255);
  return out;
}

/** Insert a block of repeated bytes. */
export function blockInsert(input: Uint8Array, rng: Rng): Uint8Array {
  const block = new Array<number>(rng.int(1, 20)).fill(rng.int(0, 255));
  return splice(input, rng.int(0, input.length), 0, block);
}

/** Truncate at a random position. */
export function truncate(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

/** Append random trailing bytes. */
export function appendGarbage(input: Uint8Array, rng: Rng): Uint8Array {
  const tail = Array.from(rng.bytes(rng.int(1, 8)));
  return splice(input, input.length, 0, tail);
}

/** Overwrite the zlib header or a CBOR major-type byte with a boundary value. */
export function headerBoundary(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = new Uint8Array(input);
  out[rng.int(0, Math.min(2, out.length - 1))] = rng.pick([0x00, 0x01, 0x18, 0x1f, 0x40, 0x78, 0x9c, 0xa2, 0xda, 0xff]);
  return out;
}

/** All byte mutators. */
export const BYTE_MUTATORS: ByteMutator[] = [
  bitFlip,
  byteInsert,
  byteDelete,
  byteReplace,
  blockInsert,
  truncate,
  appendGarbage,
  headerBoundary,
];

// -- Text-level mutations (JSON wire form) --

const BOUNDARY_VALUES = ['0', '-1', '3', '16', '"1"', '"8"', '1.5', 'null', 'true', '[]', '{}', '""', '"="'];

/** Replace a JSON value with a boundary value. */
export function valueBoundary(input: string, rng: Rng): string {
  const matches = [...input.matchAll(/:\s*("[^"]*"|-?\d+(?:\.\d+)?|true|false|null)/g)];
  if (matches.length === 0) return input;
  const match = rng.pick(matches);
  const start = (match.index ?? 0) + match[0].indexOf(match[1]);
  return input.slice(0, start) + rng.pick(BOUNDARY_VALUES) + input.slice(start + match[1].length);
}

/** Rename or drop one of the known keys. */
export function keyDamage(input: string, rng: Rng): string {
  const key = rng.pick(['"bits"', '"lst"', '"aggregation_uri"']);
  const replacement = rng.pick(['"bit"', '"LST"', '""', '']);
  return input.replace(key, replacement);
}

/** Inject a character outside the base64url alphabet. */
export function alphabetDamage(input: string, rng: Rng): string {
  const pos = rng.int(0, input.length);
  return input.slice(0, pos) + rng.pick(['+', '/', '=', '!', ' ', 'é']) + input.slice(pos);
}

/** Remove a random structural character. */
export function removeDelimiter(input: string, rng: Rng): string {
  const positions: number[] = [];
  for (let i = 0; i < input.length; i++) {
    if ('{}:,"'.includes(input[i])) positions.push(i);
  }
  if (positions.length === 0) return input;
  const pos = rng.pick(positions);
  return input.slice(0, pos) + input.slice(pos + 1);
}

/** Truncate the text at a random position. */
export function truncateText(input: string, rng: Rng): string {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

/** All text mutators. */
export const TEXT_MUTATORS: TextMutator[] = [
  valueBoundary,
  keyDamage,
  alphabetDamage,
  removeDelimiter,
  truncateText,
];

/**
 * Apply 1-N random byte mutations.
 * @param count - Number of mutations to apply (default: 1-3)
 */
export function mutateBytes(input: Uint8Array, rng: Rng, count?: number): Uint8Array {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    result = rng.pick(BYTE_MUTATORS)(result, rng);
  }
  return result;
}

/**
 * Apply 1-N random text mutations.
 * @param count - Number of mutations to apply (default: 1-3)
 */
export function mutateText(input: string, rng: Rng, count?: number): string {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    result = rng.pick(TEXT_MUTATORS)(result, rng);
  }
  return result;
}
