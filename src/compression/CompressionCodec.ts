import pako from 'pako';
import { StatusListError, isStatusListError } from '../errors';

/** zlib level used for every status list; 9 matches the reference vectors. */
export const COMPRESSION_LEVEL = 9;

const INFLATE_CHUNK_SIZE = 16 * 1024;

/** zlib "no progress possible": pako 2.2 reports input that ends mid-stream this way. */
const Z_BUF_ERROR = -5;

export interface DecompressionOptions {
  /** Largest decompressed buffer accepted, in bytes (default: 16 MiB). */
  maxDecompressedBytes?: number;
}

export const DEFAULT_DECOMPRESSION_OPTIONS: Required<DecompressionOptions> = Object.freeze({
  maxDecompressedBytes: 16 * 1024 * 1024,
});

/** Merge caller options over the defaults and check them. */
export function resolveDecompressionOptions(
  options?: DecompressionOptions,
): Required<DecompressionOptions> {
  const maxDecompressedBytes =
    options?.maxDecompressedBytes ?? DEFAULT_DECOMPRESSION_OPTIONS.maxDecompressedBytes;
  if (!Number.isSafeInteger(maxDecompressedBytes) || maxDecompressedBytes <= 0) {
    throw new RangeError(
      `maxDecompressedBytes must be a positive integer, got ${maxDecompressedBytes}`,
    );
  }
  return { maxDecompressedBytes };
}

/**
 * Compress a packed buffer into a zlib stream (RFC 1950 wrapping DEFLATE).
 * Output is deterministic for a given pako release; other zlib
 * implementations may produce different, equally valid bytes.
 */
export function compress(buffer: Uint8Array): Uint8Array {
  return pako.deflate(buffer, { level: COMPRESSION_LEVEL });
}

/**
 * Inflate a zlib stream back into the packed buffer.
 *
 * Output is collected chunk by chunk so an oversized payload is rejected
 * as soon as it crosses `maxDecompressedBytes`, before it is buffered.
 *
 * @throws StatusListError CORRUPT_DATA for empty, truncated or malformed input, or bytes after the stream
 * @throws StatusListError DECOMPRESSION_LIMIT_EXCEEDED
 */
export function decompress(buffer: Uint8Array, options?: DecompressionOptions): Uint8Array {
  const { maxDecompressedBytes } = resolveDecompressionOptions(options);
  if (buffer.length === 0) {
    throw new StatusListError('CORRUPT_DATA', 'Compressed status list is empty');
  }

  const inflator = new pako.Inflate({ chunkSize: INFLATE_CHUNK_SIZE });
  const chunks: Uint8Array[] = [];
  let total = 0;
  let ended = false;

  inflator.onData = (chunk) => {
    const bytes = chunk instanceof Uint8Array ? chunk : new Uint8Array(chunk);
    total += bytes.length;
    if (total > maxDecompressedBytes) {
      throw new StatusListError(
        'DECOMPRESSION_LIMIT_EXCEEDED',
        `Decompressed status list exceeds ${maxDecompressedBytes} bytes`,
        { context: { limit: String(maxDecompressedBytes) } },
      );
    }
    chunks.push(bytes);
  };
  const finish = inflator.onEnd.bind(inflator);
  inflator.onEnd = (status) => {
    ended = true;
    finish(status);
  };

  try {
    inflator.push(buffer, true);
  } catch (err) {
    if (isStatusListError(err)) throw err;
    throw new StatusListError('CORRUPT_DATA', 'Failed to inflate status list', { cause: err });
  }

  if (inflator.err === Z_BUF_ERROR || (!inflator.err && !ended)) {
    throw new StatusListError('CORRUPT_DATA', 'Compressed status list is truncated');
  }
  if (inflator.err) {
    throw new StatusListError(
      'CORRUPT_DATA',
      `Failed to inflate status list: ${inflator.msg || `zlib status ${inflator.err}`}`,
      { context: { status: String(inflator.err) } },
    );
  }
  const trailing = unconsumedInput(inflator);
  if (trailing > 0) {
    throw new StatusListError(
      'CORRUPT_DATA',
      `Compressed status list has ${trailing} trailing bytes after the zlib stream`,
      { context: { trailing: String(trailing) } },
    );
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/** Input bytes the inflater left unread once the stream ended. */
function unconsumedInput(inflator: InstanceType<typeof pako.Inflate>): number {
  const strm: unknown = Reflect.get(inflator, 'strm');
  if (typeof strm === 'object' && strm !== null && 'avail_in' in strm && typeof strm.avail_in === 'number') {
    return strm.avail_in;
  }
  return 0;
}
