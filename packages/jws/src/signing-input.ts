import { defaultCodec, type Codec, type JsonObject } from '@jwsign/codec';
import type { JwsHeader } from './types.js';

const encoder = new TextEncoder();

export interface EncodedParts {
  header: string;
  payload: string;
}

/**
 * base64url(canonical(...)) of header and payload
 */
export function encodeParts(
  header: JwsHeader,
  payload: JsonObject,
  codec: Codec = defaultCodec
): EncodedParts {
  return {
    header: codec.encode(codec.canonicalize(header)),
    payload: codec.encode(codec.canonicalize(payload)),
  };
}

export function signingInputFromParts(parts: EncodedParts): Uint8Array {
  return encoder.encode(`${parts.header}.${parts.payload}`);
}

/**
 * Build the bytes that get signed:
 *   base64url(canonical(header)) "." base64url(canonical(payload))
 *
 * Codec errors for unserializable values propagate as they are.
 */
export function buildSigningInput(
  header: JwsHeader,
  payload: JsonObject,
  codec: Codec = defaultCodec
): Uint8Array {
  return signingInputFromParts(encodeParts(header, payload, codec));
}
