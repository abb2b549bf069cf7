/**
 * @jwsign/codec
 *
 * Canonical JSON and base64url encoding for JWS signing input.
 * Used by @jwsign/jws.
 */

import { base64UrlDecode, base64UrlEncode } from './base64url.js';
import { canonicalize } from './canonical.js';
import { parseJsonObject } from './json.js';
import type { Codec } from './types.js';

export * from './base64url.js';
export * from './canonical.js';
export * from './errors.js';
export * from './json.js';
export * from './types.js';

export const defaultCodec: Codec = {
  canonicalize,
  encode: base64UrlEncode,
  decode: base64UrlDecode,
  parse: parseJsonObject,
};
