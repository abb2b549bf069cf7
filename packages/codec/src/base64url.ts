/**
 * base64url transport encoding (RFC 4648 §5, no padding)
 */

import { CodecError } from './errors.js';

const BASE64URL_ALPHABET = /^[A-Za-z0-9_-]*$/;

/**
 * Encode bytes as unpadded base64url
 */
export function base64UrlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}

/**
 * Decode unpadded base64url text.
 *
 * Node's decoder silently skips characters it does not know and ignores
 * trailing bits, so the alphabet, length and encoding are all checked.
 */
export function base64UrlDecode(text: string): Uint8Array {
  if (!BASE64URL_ALPHABET.test(text)) {
    throw new CodecError('Invalid base64url: unexpected character');
  }

  // A single trailing character can never carry a whole byte
  if (text.length % 4 === 1) {
    throw new CodecError(`Invalid base64url: bad length ${text.length}`);
  }

  const bytes = new Uint8Array(Buffer.from(text, 'base64url'));

  // Unused trailing bits must be zero, so each byte string has one encoding
  if (base64UrlEncode(bytes) !== text) {
    throw new CodecError('Invalid base64url: non-zero trailing bits');
  }

  return bytes;
}
