/**
 * Type definitions for JWS signing and algorithm dispatch
 */

import type { JsonWebKey, KeyObject } from 'node:crypto';
import type { AlgorithmRegistry } from './registry.js';
import type { Codec, JsonObject } from '@jwsign/codec';

export type HashAlgorithm = 'sha256' | 'sha384' | 'sha512';

export type NamedCurve = 'P-256' | 'P-384' | 'P-521';

/**
 * Key material accepted by the built-in algorithms.
 *
 * Strings are PEM for RSA/ECDSA and UTF-8 secrets for HMAC. Bytes are DER
 * (PKCS#8 private, SPKI public) for RSA/ECDSA and raw secrets for HMAC.
 */
export type KeyInput = KeyObject | string | Uint8Array | JsonWebKey;

export interface JwsHeader extends JsonObject {
  alg: string;
  typ?: string;
  cty?: string;
  kid?: string;
  jku?: string;
  x5u?: string;
  x5t?: string;
}

/**
 * Capability set every algorithm implementation provides
 */
export interface SigningAlgorithm {
  sign(message: Uint8Array, key: KeyInput): Uint8Array;
  /**
   * Throws SignatureError when the signature does not check out. Returning
   * the literal `false` is also treated as a failure.
   */
  verify(message: Uint8Array, signature: Uint8Array, key: KeyInput): void | boolean;
}

/** Named capture groups of the pattern that matched the identifier */
export type AlgorithmParams = Readonly<Record<string, string>>;

export type AlgorithmFactory = (params: AlgorithmParams) => SigningAlgorithm;

/** Exact identifier, or a regex that must match the whole identifier */
export type AlgorithmPattern = string | RegExp;

export interface AlgorithmBinding {
  readonly pattern: AlgorithmPattern;
  readonly factory: AlgorithmFactory;
}

export type BuiltinAlgorithmSpec =
  | { kind: 'hmac'; hash: HashAlgorithm }
  | { kind: 'rsa'; hash: HashAlgorithm }
  | { kind: 'ecdsa'; hash: HashAlgorithm; curve: NamedCurve };

export interface RegistryOptions {
  /**
   * Smallest RSA modulus the RS* algorithms accept
   * @default 2048
   */
  minRsaModulusBits?: number;
}

export interface JwsEngineOptions {
  /** @default the process-wide registry */
  registry?: AlgorithmRegistry;
  codec?: Codec;
  /** Identifiers the engine will accept; anything else is refused before resolution */
  algorithms?: readonly string[];
  /** Log algorithm resolution with console.debug */
  debug?: boolean;
}

export interface VerifiedMessage {
  header: JwsHeader;
  payload: JsonObject;
}

export interface JwsConfig {
  allowedAlgorithms?: string[];
  minRsaModulusBits: number;
  debug: boolean;
}
