import { BitWidth, assertBitWidth } from './BitWidth';
import { StatusListError } from './errors';

/** Plain `{ bits, lst }` shape as it appears once a wire form is unwrapped. */
export interface StatusListFields {
  bits: unknown;
  lst: Uint8Array;
  aggregationUri?: string;
}

/**
 * Immutable status list value: a bit width plus the compressed packed statuses.
 * Byte arrays are copied in and out, so nothing outside can alter `lst`.
 */
export class StatusList {
  readonly bits: BitWidth;
  /** URI of the aggregation endpoint listing related status lists, if any. */
  readonly aggregationUri?: string;
  private readonly _lst: Uint8Array;

  constructor(bits: unknown, lst: Uint8Array, aggregationUri?: string) {
    this.bits = assertBitWidth(bits);
    if (!(lst instanceof Uint8Array)) {
      throw new StatusListError('MALFORMED_ENCODING', 'Status list "lst" must be a byte array');
    }
    this._lst = new Uint8Array(lst);
    if (aggregationUri !== undefined) this.aggregationUri = aggregationUri;
    Object.freeze(this);
  }

  /** Build from an unwrapped record, validating the width. */
  static from(fields: StatusListFields): StatusList {
    return new StatusList(fields.bits, fields.lst, fields.aggregationUri);
  }

  /** Compressed, packed statuses (a copy). */
  get lst(): Uint8Array {
    return new Uint8Array(this._lst);
  }

  /** Size of the compressed payload in bytes. */
  get byteLength(): number {
    return this._lst.length;
  }

  equals(other: StatusList): boolean {
    if (this.bits !== other.bits || this.aggregationUri !== other.aggregationUri) return false;
    if (this._lst.length !== other._lst.length) return false;
    return this._lst.every((byte, i) => byte === other._lst[i]);
  }
}
