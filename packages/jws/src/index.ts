/**
 * @jwsign/jws
 *
 * Sign and verify JWS messages with HMAC, RSA and ECDSA, plus custom
 * algorithms registered by pattern.
 */

// Engine
export { JwsEngine, sign, verify, signCompact, verifyCompact, register } from './engine.js';

// Registry
export { AlgorithmRegistry, createRegistry, defaultRegistry } from './registry.js';

// Algorithms
export {
  BUILTIN_ALGORITHMS,
  DEFAULT_MIN_RSA_MODULUS_BITS,
  EcdsaAlgorithm,
  HmacAlgorithm,
  RsaAlgorithm,
  constantTimeEqual,
  createBuiltinAlgorithm,
  isBuiltinAlgorithm,
} from './algorithms/index.js';
export type { BuiltinAlgorithmId } from './algorithms/index.js';

// Signing input, header and compact form
export { buildSigningInput, encodeParts, signingInputFromParts } from './signing-input.js';
export type { EncodedParts } from './signing-input.js';
export { parseHeader, RESERVED_HEADER_PARAMETERS } from './header.js';
export { splitCompact, joinCompact } from './compact.js';
export type { CompactParts } from './compact.js';

// Keys
export { toPrivateKey, toPublicKey, toSecret } from './keys.js';

// Configuration
export { loadConfig, createEngineFromEnv } from './config.js';

// Errors
export {
  JwsError,
  AlgorithmNotImplementedError,
  AlgorithmNotAllowedError,
  SignatureError,
  InvalidHeaderError,
  InvalidKeyError,
  MalformedTokenError,
  RegistryFrozenError,
} from './errors.js';
export type { JwsErrorCode } from './errors.js';

// Types
export type {
  AlgorithmBinding,
  AlgorithmFactory,
  AlgorithmParams,
  AlgorithmPattern,
  BuiltinAlgorithmSpec,
  HashAlgorithm,
  JwsConfig,
  JwsEngineOptions,
  JwsHeader,
  KeyInput,
  NamedCurve,
  RegistryOptions,
  SigningAlgorithm,
  VerifiedMessage,
} from './types.js';
