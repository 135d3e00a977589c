import { type CBORType, decodeCBOR, encodeCBOR } from '@levischuck/tiny-cbor';
import { StatusList } from '../StatusList';
import { StatusListError } from '../errors';
import { fromHex, toHex } from './hex';

/**
 * Encode as a CBOR map: `bits` (unsigned int), `lst` (byte string) and,
 * when present, `aggregation_uri` (text string). Keys are written in that order.
 */
export function toCbor(list: StatusList): Uint8Array {
  const map = new Map<string | number, CBORType>();
  map.set('bits', list.bits);
  map.set('lst', list.lst);
  if (list.aggregationUri !== undefined) map.set('aggregation_uri', list.aggregationUri);
  return encodeCBOR(map);
}

/** CBOR encoding as lowercase hex. */
export function toCborHex(list: StatusList): string {
  return toHex(toCbor(list));
}

/**
 * Decode the CBOR wire form.
 * @throws StatusListError MALFORMED_ENCODING for invalid CBOR or wrong field types
 * @throws StatusListError INVALID_BIT_WIDTH for a well-formed but unsupported width
 */
export function fromCbor(bytes: Uint8Array): StatusList {
  let decoded: CBORType;
  try {
    decoded = decodeCBOR(bytes);
  } catch (err) {
    throw new StatusListError('MALFORMED_ENCODING', 'Status list is not valid CBOR', {
      cause: err,
    });
  }

  if (!(decoded instanceof Map)) {
    throw malformed('Status list CBOR must be a map');
  }

  const bits = decoded.get('bits');
  if (typeof bits !== 'number' || !Number.isInteger(bits)) {
    throw malformed('Status list CBOR "bits" must be an unsigned integer');
  }
  const lst = decoded.get('lst');
  if (!(lst instanceof Uint8Array)) {
    throw malformed('Status list CBOR "lst" must be a byte string');
  }
  const aggregationUri = decoded.get('aggregation_uri');
  if (aggregationUri !== undefined && typeof aggregationUri !== 'string') {
    throw malformed('Status list CBOR "aggregation_uri" must be a text string');
  }
  return new StatusList(bits, lst, aggregationUri);
}

/** Decode the CBOR wire form from hex. */
export function fromCborHex(hex: string): StatusList {
  return fromCbor(fromHex(hex));
}

function malformed(message: string): StatusListError {
  return new StatusListError('MALFORMED_ENCODING', message);
}
