/**
 * Fuzz targets shared by the standalone runner and the Jest suites.
 *
 * A target returns 'ok' when the input was accepted and every invariant held,
 * 'rejected' when the library refused it with a StatusListError. Anything
 * else (a foreign exception or a broken invariant) throws FuzzFailure.
 */

import { capacity, pack, unpackOne, packedLength } from '../src/BitPacker';
import { compress } from '../src/compression/CompressionCodec';
import { StatusList } from '../src/StatusList';
import { StatusListBuilder } from '../src/StatusListBuilder';
import { StatusListDecoder } from '../src/StatusListDecoder';
import { isStatusListError } from '../src/errors';
import { fromCbor, toCbor } from '../src/serialization/CborSerializer';
import { fromJson, toJson } from '../src/serialization/JsonSerializer';
import { Rng, generateAnyCode, generateStatusList } from './generators/status-generator';
import { mutateBytes, mutateText } from './generators/mutator';
import { CODE_SEEDS, JSON_SEEDS } from './seeds';

export type FuzzOutcome = 'ok' | 'rejected';

export type FuzzTargetName = 'packer' | 'builder' | 'decoder' | 'json' | 'cbor';

/** Fail a fuzz case with the seed needed to replay it. */
export class FuzzFailure extends Error {
  constructor(
    readonly target: FuzzTargetName,
    readonly seed: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${target} seed=${seed}] ${message}`, options);
    this.name = 'FuzzFailure';
  }
}

/** Small decompression ceiling so amplification is exercised quickly. */
const FUZZ_DECOMPRESSION_LIMIT = 64 * 1024;

function guard(target: FuzzTargetName, seed: number, fn: () => void): FuzzOutcome {
  try {
    fn();
    return 'ok';
  } catch (err) {
    if (err instanceof FuzzFailure) throw err;
    if (isStatusListError(err)) return 'rejected';
    throw new FuzzFailure(target, seed, `unexpected ${String(err)}`, { cause: err });
  }
}

function check(target: FuzzTargetName, seed: number, condition: boolean, message: string): void {
  if (!condition) throw new FuzzFailure(target, seed, message);
}

/** Read every addressable status; lookups on a decoded list must never fail. */
function readAll(target: FuzzTargetName, seed: number, decoder: StatusListDecoder): number[] {
  const codes: number[] = [];
  for (let i = 0; i < decoder.length; i++) {
    const code = decoder.getStatus(i);
    check(target, seed, code >= 0 && code < 1 << decoder.bitsPerStatus, `status ${i} out of range`);
    codes.push(code);
  }
  return codes;
}

/** Random codes, some out of range, through pack/unpackOne. */
export function fuzzPacker(seed: number): FuzzOutcome {
  const rng = new Rng(seed);
  const { bits, codes } = generateStatusList(rng, { maxLength: 64 });
  if (rng.chance(0.3) && codes.length > 0) {
    codes[rng.int(0, codes.length - 1)] = generateAnyCode(rng, bits);
  }
  return guard('packer', seed, () => {
    const buffer = pack(codes, bits);
    check('packer', seed, buffer.length === packedLength(codes.length, bits), 'wrong packed length');
    codes.forEach((code, i) => {
      check('packer', seed, unpackOne(buffer, bits, i) === code, `round trip failed at ${i}`);
    });
    for (let i = codes.length; i < capacity(buffer.length, bits); i++) {
      check('packer', seed, unpackOne(buffer, bits, i) === 0, `padding not zero at ${i}`);
    }
  });
}

/** Random append sequences, then build and decode. */
export function fuzzBuilder(seed: number): FuzzOutcome {
  const rng = new Rng(seed);
  const { bits, codes } = generateStatusList(rng);
  return guard('builder', seed, () => {
    const builder = new StatusListBuilder(bits);
    const accepted: number[] = [];
    for (const code of codes) {
      const candidate = rng.chance(0.05) ? generateAnyCode(rng, bits) : code;
      try {
        builder.addStatus(candidate);
        accepted.push(candidate);
      } catch (err) {
        if (!isStatusListError(err, 'VALUE_OUT_OF_RANGE')) throw err;
        check('builder', seed, builder.length === accepted.length, 'rejected append changed length');
      }
    }
    const decoder = new StatusListDecoder(builder.build());
    const decoded = readAll('builder', seed, decoder);
    check('builder', seed, decoder.length >= accepted.length, 'decoder shorter than input');
    accepted.forEach((code, i) => {
      check('builder', seed, decoded[i] === code, `status ${i} decoded as ${decoded[i]}`);
    });
  });
}

/** Mutated compressed payloads straight into the decoder. */
export function fuzzDecoder(seed: number): FuzzOutcome {
  const rng = new Rng(seed);
  const base = rng.pick(CODE_SEEDS);
  const payload = rng.chance(0.1)
    ? rng.bytes(rng.int(0, 64))
    : mutateBytes(compress(pack(base.codes, base.bits)), rng);
  return guard('decoder', seed, () => {
    const decoder = new StatusListDecoder(
      { bits: base.bits, lst: payload },
      { maxDecompressedBytes: FUZZ_DECOMPRESSION_LIMIT },
    );
    check('decoder', seed, decoder.rawBytes.length <= FUZZ_DECOMPRESSION_LIMIT, 'limit not enforced');
    readAll('decoder', seed, decoder);
  });
}

/** Mutated JSON documents; anything accepted must re-serialize identically. */
export function fuzzJson(seed: number): FuzzOutcome {
  const rng = new Rng(seed);
  const input = mutateText(rng.pick(JSON_SEEDS), rng);
  return guard('json', seed, () => {
    const list = fromJson(input);
    check('json', seed, fromJson(toJson(list)).equals(list), 'JSON round trip changed the list');
  });
}

/** Mutated CBOR encodings; anything accepted must re-serialize identically. */
export function fuzzCbor(seed: number): FuzzOutcome {
  const rng = new Rng(seed);
  const base = rng.pick(CODE_SEEDS);
  const list = new StatusList(base.bits, compress(pack(base.codes, base.bits)));
  const input = mutateBytes(toCbor(list), rng);
  return guard('cbor', seed, () => {
    const decoded = fromCbor(input);
    check('cbor', seed, fromCbor(toCbor(decoded)).equals(decoded), 'CBOR round trip changed the list');
  });
}

export const FUZZ_TARGETS: Record<FuzzTargetName, (seed: number) => FuzzOutcome> = {
  packer: fuzzPacker,
  builder: fuzzBuilder,
  decoder: fuzzDecoder,
  json: fuzzJson,
  cbor: fuzzCbor,
};
