import { BitWidth } from './BitWidth';
import { capacity, unpackOne } from './BitPacker';
import { DecompressionOptions, decompress } from './compression/CompressionCodec';
import { StatusList, StatusListFields } from './StatusList';
import { StatusType, statusTypeFromCode } from './StatusType';
import { JsonStatusListInput, fromJson } from './serialization/JsonSerializer';
import { fromCbor } from './serialization/CborSerializer';

/**
 * Random-access reader over a status list.
 *
 * The payload is inflated once, at construction; lookups afterwards only
 * shift and mask. A decoder never mutates its buffer and can be shared.
 *
 * `length` is a capacity bound: the wire format stores no count, so padding
 * bits in the last byte read back as zero-valued statuses.
 */
export class StatusListDecoder {
  readonly bitsPerStatus: BitWidth;
  readonly aggregationUri?: string;
  private readonly bytes: Uint8Array;

  constructor(statusList: StatusList | StatusListFields, options?: DecompressionOptions) {
    const list = statusList instanceof StatusList ? statusList : StatusList.from(statusList);
    this.bitsPerStatus = list.bits;
    if (list.aggregationUri !== undefined) this.aggregationUri = list.aggregationUri;
    this.bytes = decompress(list.lst, options);
  }

  /** Decode the JSON wire form (text or parsed object). */
  static fromJson(input: JsonStatusListInput, options?: DecompressionOptions): StatusListDecoder {
    return new StatusListDecoder(fromJson(input), options);
  }

  /** Decode the CBOR wire form. */
  static fromCbor(bytes: Uint8Array, options?: DecompressionOptions): StatusListDecoder {
    return new StatusListDecoder(fromCbor(bytes), options);
  }

  /** Number of addressable statuses. */
  get length(): number {
    return capacity(this.bytes.length, this.bitsPerStatus);
  }

  get isEmpty(): boolean {
    return this.bytes.length === 0;
  }

  /** The decompressed packed buffer (a copy). */
  get rawBytes(): Uint8Array {
    return new Uint8Array(this.bytes);
  }

  /**
   * Status code at `index`. Unnamed codes are returned unchanged.
   * @throws StatusListError INDEX_OUT_OF_BOUNDS
   */
  getStatus(index: number): number {
    return unpackOne(this.bytes, this.bitsPerStatus, index);
  }

  /** Named status at `index`, or undefined when the code has no name. */
  getStatusType(index: number): StatusType | undefined {
    return statusTypeFromCode(this.getStatus(index));
  }
}
