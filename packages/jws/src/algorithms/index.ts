export { BUILTIN_ALGORITHMS, createBuiltinAlgorithm, isBuiltinAlgorithm } from './builtin.js';
export type { BuiltinAlgorithmId } from './builtin.js';
export { EcdsaAlgorithm } from './ecdsa.js';
export { HmacAlgorithm } from './hmac.js';
export { DEFAULT_MIN_RSA_MODULUS_BITS, RsaAlgorithm } from './rsa.js';
export { constantTimeEqual } from './shared.js';
