/**
 * Key normalization
 *
 * Turns the key formats callers hand in into KeyObjects or secret bytes.
 * Keys are never generated or stored here.
 */

import { KeyObject, createPrivateKey, createPublicKey, type JsonWebKey } from 'node:crypto';
import { base64UrlDecode } from '@jwsign/codec';
import { InvalidKeyError } from './errors.js';
import type { KeyInput } from './types.js';

const PEM_MARKER = '-----BEGIN';

function read<T>(what: string, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof InvalidKeyError) {
      throw error;
    }
    throw new InvalidKeyError(`Could not read ${what}`, error);
  }
}

function looksLikePem(bytes: Uint8Array): boolean {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    .subarray(0, PEM_MARKER.length)
    .toString('latin1') === PEM_MARKER;
}

/**
 * Private key for signing with RSA or ECDSA
 */
export function toPrivateKey(key: KeyInput): KeyObject {
  return read('private key', () => {
    if (key instanceof KeyObject) {
      if (key.type !== 'private') {
        throw new InvalidKeyError(`Expected a private key, got a ${key.type} key`);
      }
      return key;
    }
    if (typeof key === 'string') {
      return createPrivateKey(key);
    }
    if (key instanceof Uint8Array) {
      return createPrivateKey({ key: Buffer.from(key), format: 'der', type: 'pkcs8' });
    }
    return createPrivateKey({ key, format: 'jwk' });
  });
}

/**
 * Public key for verifying with RSA or ECDSA. A private key is accepted and
 * its public half is used.
 */
export function toPublicKey(key: KeyInput): KeyObject {
  return read('public key', () => {
    if (key instanceof KeyObject) {
      if (key.type === 'secret') {
        throw new InvalidKeyError('Expected a public key, got a secret key');
      }
      return key.type === 'public' ? key : createPublicKey(key);
    }
    if (typeof key === 'string') {
      return createPublicKey(key);
    }
    if (key instanceof Uint8Array) {
      return createPublicKey({ key: Buffer.from(key), format: 'der', type: 'spki' });
    }
    return createPublicKey({ key, format: 'jwk' });
  });
}

function secretFromJwk(jwk: JsonWebKey): Uint8Array {
  if (jwk.kty !== 'oct' || typeof jwk.k !== 'string') {
    throw new InvalidKeyError(`Expected an oct JWK for HMAC, got kty ${String(jwk.kty)}`);
  }
  return base64UrlDecode(jwk.k);
}

/**
 * Shared secret bytes for HMAC.
 *
 * Asymmetric keys and PEM text are refused so that a public key can never
 * be replayed as an HMAC secret.
 */
export function toSecret(key: KeyInput): Uint8Array {
  const secret = read('HMAC secret', () => {
    if (key instanceof KeyObject) {
      if (key.type !== 'secret') {
        throw new InvalidKeyError(`Expected a secret key for HMAC, got a ${key.type} key`);
      }
      return new Uint8Array(key.export());
    }
    if (typeof key === 'string') {
      if (key.includes(PEM_MARKER)) {
        throw new InvalidKeyError('PEM key material cannot be used as an HMAC secret');
      }
      return new TextEncoder().encode(key);
    }
    if (key instanceof Uint8Array) {
      if (looksLikePem(key)) {
        throw new InvalidKeyError('PEM key material cannot be used as an HMAC secret');
      }
      return key;
    }
    return secretFromJwk(key);
  });

  if (secret.byteLength === 0) {
    throw new InvalidKeyError('HMAC secret must not be empty');
  }

  return secret;
}
