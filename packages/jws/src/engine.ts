/**
 * JWS engine
 *
 * Resolves the algorithm named by the header, builds the signing input and
 * delegates to the implementation. Verification failures always surface as
 * SignatureError, never as a false return value.
 */

import { defaultCodec, type Codec, type JsonObject } from '@jwsign/codec';
import { joinCompact, splitCompact } from './compact.js';
import { AlgorithmNotAllowedError, SignatureError } from './errors.js';
import { parseHeader } from './header.js';
import { defaultRegistry, type AlgorithmRegistry } from './registry.js';
import { buildSigningInput, encodeParts, signingInputFromParts } from './signing-input.js';
import type {
  AlgorithmFactory,
  AlgorithmPattern,
  JwsEngineOptions,
  JwsHeader,
  KeyInput,
  SigningAlgorithm,
  VerifiedMessage,
} from './types.js';

export class JwsEngine {
  readonly registry: AlgorithmRegistry;
  private readonly codec: Codec;
  private readonly allowed?: ReadonlySet<string>;
  private readonly debug: boolean;

  constructor(options: JwsEngineOptions = {}) {
    this.registry = options.registry ?? defaultRegistry;
    this.codec = options.codec ?? defaultCodec;
    this.allowed = options.algorithms ? new Set(options.algorithms) : undefined;
    this.debug = options.debug ?? false;
  }

  /**
   * Sign header and payload, returning the raw signature bytes
   */
  sign(header: JwsHeader, payload: JsonObject, key: KeyInput): Uint8Array {
    const checked = parseHeader(header);
    const algorithm = this.resolve(checked.alg);
    return algorithm.sign(buildSigningInput(checked, payload, this.codec), key);
  }

  /**
   * Verify a raw signature over header and payload.
   * Returns nothing on success and throws SignatureError otherwise.
   */
  verify(header: JwsHeader, payload: JsonObject, signature: Uint8Array, key: KeyInput): void {
    const checked = parseHeader(header);
    const algorithm = this.resolve(checked.alg);
    this.verifyInput(algorithm, checked.alg, buildSigningInput(checked, payload, this.codec), signature, key);
  }

  /**
   * Sign and assemble the compact form header.payload.signature
   */
  signCompact(header: JwsHeader, payload: JsonObject, key: KeyInput): string {
    const checked = parseHeader(header);
    const algorithm = this.resolve(checked.alg);

    const parts = encodeParts(checked, payload, this.codec);
    const signature = algorithm.sign(signingInputFromParts(parts), key);

    return joinCompact({ ...parts, signature: this.codec.encode(signature) });
  }

  /**
   * Verify a compact JWS and return its decoded header and payload.
   *
   * The signature is checked over the segments exactly as received; the
   * payload is only decoded once the signature holds.
   */
  verifyCompact(token: string, key: KeyInput): VerifiedMessage {
    const parts = splitCompact(token);
    const header = parseHeader(this.codec.parse(this.codec.decode(parts.header)));
    const algorithm = this.resolve(header.alg);
    const signature = this.codec.decode(parts.signature);

    this.verifyInput(algorithm, header.alg, signingInputFromParts(parts), signature, key);

    return {
      header,
      payload: this.codec.parse(this.codec.decode(parts.payload)),
    };
  }

  private resolve(identifier: string): SigningAlgorithm {
    if (this.allowed && !this.allowed.has(identifier)) {
      throw new AlgorithmNotAllowedError(identifier);
    }

    const algorithm = this.registry.resolve(identifier);
    if (this.debug) {
      console.debug(`[jws] resolved ${identifier} -> ${algorithm.constructor.name}`);
    }
    return algorithm;
  }

  private verifyInput(
    algorithm: SigningAlgorithm,
    identifier: string,
    input: Uint8Array,
    signature: Uint8Array,
    key: KeyInput
  ): void {
    let result: void | boolean;
    try {
      result = algorithm.verify(input, signature, key);
    } catch (error) {
      if (error instanceof SignatureError) {
        throw error;
      }
      // Custom algorithms own their failure modes; anything they throw means unverified
      const reason = error instanceof Error ? error.message : String(error);
      throw new SignatureError(`${identifier} verifier failed: ${reason}`, error);
    }

    if (result === false) {
      throw new SignatureError(`${identifier} verifier rejected the signature`);
    }
  }
}

const defaultEngine = new JwsEngine();

export function sign(header: JwsHeader, payload: JsonObject, key: KeyInput): Uint8Array {
  return defaultEngine.sign(header, payload, key);
}

export function verify(header: JwsHeader, payload: JsonObject, signature: Uint8Array, key: KeyInput): void {
  defaultEngine.verify(header, payload, signature, key);
}

export function signCompact(header: JwsHeader, payload: JsonObject, key: KeyInput): string {
  return defaultEngine.signCompact(header, payload, key);
}

export function verifyCompact(token: string, key: KeyInput): VerifiedMessage {
  return defaultEngine.verifyCompact(token, key);
}

/**
 * Register a custom algorithm with the process-wide registry
 */
export function register(pattern: AlgorithmPattern, factory: AlgorithmFactory): void {
  defaultRegistry.register(pattern, factory);
}
