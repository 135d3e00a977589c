/**
 * Seeded generators for status lists.
 *
 * Everything is driven by a small xorshift PRNG so that any failing
 * iteration can be replayed from its seed.
 */

import { BIT_WIDTHS, BitWidth, maxStatusValue } from '../../src/BitWidth';

/** Deterministic PRNG (xorshift32). */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift never leaves an all-zero state
    this.state = (seed | 0) || 0x9e3779b9;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state ^= this.state << 13;
    this.state ^= this.state >> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }

  /** Returns `length` random bytes. */
  bytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) out[i] = this.int(0, 255);
    return out;
  }
}

export interface StatusGeneratorOptions {
  /** Maximum number of statuses (default: 300). */
  maxLength?: number;
  /** Probability that a status is VALID, giving compressible runs (default: 0.6). */
  validProbability?: number;
}

const DEFAULTS: Required<StatusGeneratorOptions> = {
  maxLength: 300,
  validProbability: 0.6,
};

export interface GeneratedStatusList {
  bits: BitWidth;
  codes: number[];
}

/** Generate a random in-range status list for a random width. */
export function generateStatusList(
  rng: Rng,
  options?: StatusGeneratorOptions,
): GeneratedStatusList {
  const opts = { ...DEFAULTS, ...options };
  const bits = rng.pick(BIT_WIDTHS);
  const max = maxStatusValue(bits);
  const length = rng.int(0, opts.maxLength);
  const codes: number[] = [];
  for (let i = 0; i < length; i++) {
    codes.push(rng.chance(opts.validProbability) ? 0 : rng.int(0, max));
  }
  return { bits, codes };
}

/** A code that may or may not fit the width: boundary values, negatives, fractions. */
export function generateAnyCode(rng: Rng, bits: BitWidth): number {
  const max = maxStatusValue(bits);
  return rng.pick([0, max, max + 1, -1, 0.5, 256, rng.int(0, max), rng.int(0, 300)]);
}
