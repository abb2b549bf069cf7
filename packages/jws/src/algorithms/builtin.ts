/**
 * Built-in algorithm table
 *
 * A closed set of identifiers, each bound to one implementation and its
 * hash (and curve) parameters. Curve/hash pairings are fixed here, so a
 * mismatched pairing cannot be requested.
 */

import type { BuiltinAlgorithmSpec, RegistryOptions, SigningAlgorithm } from '../types.js';
import { EcdsaAlgorithm } from './ecdsa.js';
import { HmacAlgorithm } from './hmac.js';
import { RsaAlgorithm } from './rsa.js';

export const BUILTIN_ALGORITHMS = {
  HS256: { kind: 'hmac', hash: 'sha256' },
  HS384: { kind: 'hmac', hash: 'sha384' },
  HS512: { kind: 'hmac', hash: 'sha512' },
  RS256: { kind: 'rsa', hash: 'sha256' },
  RS384: { kind: 'rsa', hash: 'sha384' },
  RS512: { kind: 'rsa', hash: 'sha512' },
  ES256: { kind: 'ecdsa', hash: 'sha256', curve: 'P-256' },
  ES384: { kind: 'ecdsa', hash: 'sha384', curve: 'P-384' },
  ES512: { kind: 'ecdsa', hash: 'sha512', curve: 'P-521' },
} as const satisfies Record<string, BuiltinAlgorithmSpec>;

export type BuiltinAlgorithmId = keyof typeof BUILTIN_ALGORITHMS;

export function isBuiltinAlgorithm(identifier: string): identifier is BuiltinAlgorithmId {
  return Object.prototype.hasOwnProperty.call(BUILTIN_ALGORITHMS, identifier);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled algorithm spec: ${JSON.stringify(value)}`);
}

export function createBuiltinAlgorithm(
  id: BuiltinAlgorithmId,
  options: RegistryOptions = {}
): SigningAlgorithm {
  const spec: BuiltinAlgorithmSpec = BUILTIN_ALGORITHMS[id];

  switch (spec.kind) {
    case 'hmac':
      return new HmacAlgorithm(id, spec.hash);
    case 'rsa':
      return new RsaAlgorithm(id, spec.hash, options.minRsaModulusBits);
    case 'ecdsa':
      return new EcdsaAlgorithm(id, spec.hash, spec.curve);
    default:
      return assertNever(spec);
  }
}
