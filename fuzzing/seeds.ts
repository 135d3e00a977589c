/**
 * Seed corpus for mutation-based fuzzing.
 * Each seed exercises a different width or wire feature.
 */

import type { BitWidth } from '../src/BitWidth';

/** 16 one-bit statuses, bytes b9 a3. */
export const SEED_ONE_BIT = '{"bits":1,"lst":"eNrbuRgAAhcBXQ"}';

/** Same list with `bits` as a decimal string. */
export const SEED_STRING_BITS = '{"bits":"1","lst":"eNrbuRgAAhcBXQ"}';

/** Empty list: a zlib stream of zero bytes. */
export const SEED_EMPTY = '{"bits":8,"lst":"eNoDAAAAAAE"}';

/** Optional aggregation endpoint. */
export const SEED_AGGREGATION = '{"bits":1,"lst":"eNrbuRgAAhcBXQ","aggregation_uri":"https://example.com/statuslists"}';

export const JSON_SEEDS: readonly string[] = [
  SEED_ONE_BIT,
  SEED_STRING_BITS,
  SEED_EMPTY,
  SEED_AGGREGATION,
];

/** Status lists encoded at startup to seed the CBOR and payload targets. */
export const CODE_SEEDS: ReadonlyArray<{ bits: BitWidth; codes: number[] }> = [
  { bits: 1, codes: [1, 0, 0, 1, 1, 1, 0, 1, 1, 1, 0, 0, 0, 1, 0, 1] },
  { bits: 2, codes: [0, 1, 2, 3, 0, 0, 0, 1] },
  { bits: 4, codes: [0, 15, 2, 11, 12, 13, 14, 3] },
  { bits: 8, codes: [1, 2, 0, 3, 0, 1, 2, 3, 255, 16] },
  { bits: 1, codes: new Array<number>(4096).fill(0) },
];
