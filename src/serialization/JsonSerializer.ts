import { StatusList } from '../StatusList';
import { StatusListError } from '../errors';
import { decodeBase64Url, encodeBase64Url } from './base64url';

/** JSON wire form of a status list. */
export interface JsonStatusList {
  bits: number;
  /** base64url (no padding) of the compressed packed statuses. */
  lst: string;
  aggregation_uri?: string;
}

/** JSON text, or an already-parsed object. */
export type JsonStatusListInput = string | object;

export function toJsonObject(list: StatusList): JsonStatusList {
  const json: JsonStatusList = { bits: list.bits, lst: encodeBase64Url(list.lst) };
  if (list.aggregationUri !== undefined) json.aggregation_uri = list.aggregationUri;
  return json;
}

/** Compact JSON text, e.g. `{"bits":1,"lst":"eNrbuRgAAhcBXQ"}`. */
export function toJson(list: StatusList): string {
  return JSON.stringify(toJsonObject(list));
}

/**
 * Parse the JSON wire form. `bits` may be an integer or a decimal string.
 * @throws StatusListError MALFORMED_ENCODING for structural problems
 * @throws StatusListError INVALID_BIT_WIDTH for a well-formed but unsupported width
 */
export function fromJson(input: JsonStatusListInput): StatusList {
  const value = typeof input === 'string' ? parseText(input) : input;
  if (!isRecord(value)) {
    throw malformed('Status list JSON must be an object');
  }

  const bits = parseBits(value.bits);
  if (typeof value.lst !== 'string') {
    throw malformed('Status list JSON "lst" must be a string');
  }
  const lst = decodeBase64Url(value.lst);

  const aggregationUri = value.aggregation_uri;
  if (aggregationUri !== undefined && typeof aggregationUri !== 'string') {
    throw malformed('Status list JSON "aggregation_uri" must be a string');
  }
  return new StatusList(bits, lst, aggregationUri);
}

function parseText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new StatusListError('MALFORMED_ENCODING', 'Status list is not valid JSON', {
      cause: err,
    });
  }
}

function parseBits(bits: unknown): number {
  if (typeof bits === 'number' && Number.isInteger(bits)) return bits;
  if (typeof bits === 'string' && /^\d+$/.test(bits)) return Number(bits);
  if (bits === undefined) throw malformed('Status list JSON is missing "bits"');
  throw malformed('Status list JSON "bits" must be an integer or a decimal string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(message: string): StatusListError {
  return new StatusListError('MALFORMED_ENCODING', message);
}
