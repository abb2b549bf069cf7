/**
 * Compact serialization: header "." payload "." signature, each base64url
 */

import { MalformedTokenError } from './errors.js';

export interface CompactParts {
  header: string;
  payload: string;
  signature: string;
}

export function splitCompact(token: string): CompactParts {
  const parts = token.split('.');
  if (parts.length !== 3) {
    throw new MalformedTokenError(`Compact JWS must have 3 segments, got ${parts.length}`);
  }

  const [header, payload, signature] = parts;
  if (!header || !payload || !signature) {
    throw new MalformedTokenError('Compact JWS has an empty segment');
  }

  return { header, payload, signature };
}

export function joinCompact(parts: CompactParts): string {
  return `${parts.header}.${parts.payload}.${parts.signature}`;
}
