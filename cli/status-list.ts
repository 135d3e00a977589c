#!/usr/bin/env node
/**
 * CLI for building, decoding and inspecting token status lists.
 *
 * Usage:
 *   npx tsx cli/status-list.ts encode --bits 2 [--format json|cbor] [--aggregation-uri URI] 0 1 2 0x03
 *   npx tsx cli/status-list.ts decode [--format json|cbor] [--max-bytes N] <input> [index ...]
 *   npx tsx cli/status-list.ts inspect [--format json|cbor] [--max-bytes N] <input>
 *
 * <input> is JSON text (json) or hex (cbor), or `@path` to read it from a file.
 */

import * as fs from 'fs';
import { StatusListBuilder } from '../src/StatusListBuilder';
import { StatusListDecoder } from '../src/StatusListDecoder';
import { StatusList } from '../src/StatusList';
import { unpackAll } from '../src/BitPacker';
import { statusTypeName } from '../src/StatusType';
import { isStatusListError } from '../src/errors';
import type { DecompressionOptions } from '../src/compression/CompressionCodec';
import { fromJson, toJson } from '../src/serialization/JsonSerializer';
import { fromCborHex, toCborHex } from '../src/serialization/CborSerializer';

export type WireFormat = 'json' | 'cbor';

interface ParsedArgs {
  command: string | undefined;
  flags: Map<string, string>;
  positionals: string[];
}

const VALUE_FLAGS = new Set(['--bits', '--format', '--aggregation-uri', '--max-bytes']);

/** Thrown for bad command lines; printed with the usage text. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = [
  'Usage:',
  '  status-list encode --bits <1|2|4|8> [--format json|cbor] [--aggregation-uri <uri>] <code ...>',
  '  status-list decode [--format json|cbor] [--max-bytes <n>] <input> [index ...]',
  '  status-list inspect [--format json|cbor] [--max-bytes <n>] <input>',
].join('\n');

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

function parseArgs(args: readonly string[]): ParsedArgs {
  const flags = new Map<string, string>();
  const positionals: string[] = [];
  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined) throw new UsageError(`Missing value for ${arg}`);
      flags.set(arg, value);
      i++;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }
  return { command: args[0], flags, positionals };
}

function parseFormat(flags: Map<string, string>): WireFormat {
  const format = flags.get('--format') ?? 'json';
  if (format !== 'json' && format !== 'cbor') {
    throw new UsageError(`Unknown format "${format}" (expected json or cbor)`);
  }
  return format;
}

/** Parse a decimal or 0x-prefixed hex integer. */
function parseInteger(text: string, what: string): number {
  if (/^0x[0-9a-f]+$/i.test(text)) return parseInt(text.slice(2), 16);
  if (/^\d+$/.test(text)) return parseInt(text, 10);
  throw new UsageError(`Invalid ${what}: "${text}"`);
}

function readInput(arg: string | undefined): string {
  if (arg === undefined) throw new UsageError('Missing <input>');
  return arg.startsWith('@') ? fs.readFileSync(arg.slice(1), 'utf-8').trim() : arg;
}

function parseStatusList(input: string, format: WireFormat): StatusList {
  return format === 'json' ? fromJson(input) : fromCborHex(input);
}

function decompressionOptions(flags: Map<string, string>): DecompressionOptions | undefined {
  const maxBytes = flags.get('--max-bytes');
  if (maxBytes === undefined) return undefined;
  const maxDecompressedBytes = parseInteger(maxBytes, 'byte limit');
  if (maxDecompressedBytes === 0 || !Number.isSafeInteger(maxDecompressedBytes)) {
    throw new UsageError('--max-bytes must be a positive safe integer');
  }
  return { maxDecompressedBytes };
}

function formatStatus(index: number, code: number): string {
  const name = statusTypeName(code);
  return name === undefined ? `${index}: ${code}` : `${index}: ${code} (${name})`;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function encodeCommand({ flags, positionals }: ParsedArgs): string {
  const bits = flags.get('--bits');
  if (bits === undefined) throw new UsageError('encode requires --bits');
  const codes = positionals.map(p => parseInteger(p, 'status code'));
  const aggregationUri = flags.get('--aggregation-uri');

  const list = StatusListBuilder.fromStatuses(codes, parseInteger(bits, 'bit width'))
    .build(aggregationUri === undefined ? undefined : { aggregationUri });
  return parseFormat(flags) === 'json' ? toJson(list) : toCborHex(list);
}

function decodeCommand({ flags, positionals }: ParsedArgs): string {
  const [input, ...indices] = positionals;
  const list = parseStatusList(readInput(input), parseFormat(flags));
  const decoder = new StatusListDecoder(list, decompressionOptions(flags));

  if (indices.length === 0) {
    return unpackAll(decoder.rawBytes, decoder.bitsPerStatus)
      .map((code, i) => formatStatus(i, code))
      .join('\n');
  }
  return indices
    .map(i => parseInteger(i, 'index'))
    .map(i => formatStatus(i, decoder.getStatus(i)))
    .join('\n');
}

function inspectCommand({ flags, positionals }: ParsedArgs): string {
  const list = parseStatusList(readInput(positionals[0]), parseFormat(flags));
  const decoder = new StatusListDecoder(list, decompressionOptions(flags));
  const lines = [
    `bits: ${list.bits}`,
    `compressed: ${list.byteLength} bytes`,
    `decompressed: ${decoder.rawBytes.length} bytes`,
    `capacity: ${decoder.length} statuses`,
  ];
  if (list.aggregationUri !== undefined) lines.push(`aggregation_uri: ${list.aggregationUri}`);
  return lines.join('\n');
}

/** Run one command line and return what it prints. */
export function runCli(args: readonly string[]): string {
  const parsed = parseArgs(args);
  switch (parsed.command) {
    case 'encode':
      return encodeCommand(parsed);
    case 'decode':
      return decodeCommand(parsed);
    case 'inspect':
      return inspectCommand(parsed);
    case undefined:
      throw new UsageError('Missing command');
    default:
      throw new UsageError(`Unknown command: ${parsed.command}`);
  }
}

function main(): void {
  try {
    console.log(runCli(process.argv.slice(2)));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`error: ${err.message}\n\n${USAGE}`);
    } else if (isStatusListError(err)) {
      console.error(`error [${err.code}]: ${err.message}`);
    } else {
      throw err;
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}
