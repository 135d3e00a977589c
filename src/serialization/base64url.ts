import { StatusListError } from '../errors';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/** URL-safe base64 without padding (RFC 4648 §5). */
export function encodeBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}

/**
 * Strict base64url decoding: only the URL-safe alphabet, no '=' padding,
 * no length that cannot come from whole bytes, and zero unused trailing bits.
 */
export function decodeBase64Url(text: string): Uint8Array {
  if (!BASE64URL_PATTERN.test(text) || text.length % 4 === 1) {
    throw invalid(text);
  }
  const bytes = new Uint8Array(Buffer.from(text, 'base64url'));
  // Buffer ignores set bits past the last whole byte; only the canonical spelling is accepted
  if (encodeBase64Url(bytes) !== text) {
    throw invalid(text);
  }
  return bytes;
}

function invalid(text: string): StatusListError {
  return new StatusListError('MALFORMED_ENCODING', 'Invalid base64url string', {
    context: { length: String(text.length) },
  });
}
