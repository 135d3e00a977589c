export { BIT_WIDTHS, isBitWidth, assertBitWidth, assertStatusValue, maxStatusValue, statusesPerByte } from './BitWidth';
export type { BitWidth } from './BitWidth';
export { StatusType, isStatusType, statusTypeFromCode, statusTypeName, isReservedStatusCode } from './StatusType';
export type { StatusTypeName } from './StatusType';
export { StatusListError, isStatusListError } from './errors';
export type { StatusListErrorCode, StatusListErrorOptions } from './errors';
export { pack, unpackOne, unpackAll, packedLength, capacity } from './BitPacker';
export {
  compress,
  decompress,
  resolveDecompressionOptions,
  COMPRESSION_LEVEL,
  DEFAULT_DECOMPRESSION_OPTIONS,
} from './compression/CompressionCodec';
export type { DecompressionOptions } from './compression/CompressionCodec';
export { StatusList } from './StatusList';
export type { StatusListFields } from './StatusList';
export { StatusListBuilder } from './StatusListBuilder';
export type { BuildOptions } from './StatusListBuilder';
export { StatusListDecoder } from './StatusListDecoder';
export { toJson, toJsonObject, fromJson } from './serialization/JsonSerializer';
export type { JsonStatusList, JsonStatusListInput } from './serialization/JsonSerializer';
export { toCbor, toCborHex, fromCbor, fromCborHex } from './serialization/CborSerializer';
export { encodeBase64Url, decodeBase64Url } from './serialization/base64url';
export { toHex, fromHex } from './serialization/hex';
