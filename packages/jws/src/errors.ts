/**
 * Error taxonomy for signing and verification
 */

export type JwsErrorCode =
  | 'ALG_NOT_IMPLEMENTED'
  | 'ALG_NOT_ALLOWED'
  | 'SIGNATURE_INVALID'
  | 'INVALID_HEADER'
  | 'INVALID_KEY'
  | 'MALFORMED_TOKEN'
  | 'REGISTRY_FROZEN';

export class JwsError extends Error {
  constructor(
    message: string,
    public readonly code: JwsErrorCode,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'JwsError';
  }
}

/**
 * No registry binding matches the identifier
 */
export class AlgorithmNotImplementedError extends JwsError {
  constructor(public readonly identifier: string) {
    super(`Algorithm not implemented: ${identifier}`, 'ALG_NOT_IMPLEMENTED');
    this.name = 'AlgorithmNotImplementedError';
  }
}

/**
 * The identifier is outside the engine's allowlist
 */
export class AlgorithmNotAllowedError extends JwsError {
  constructor(public readonly identifier: string) {
    super(`Algorithm not allowed: ${identifier}`, 'ALG_NOT_ALLOWED');
    this.name = 'AlgorithmNotAllowedError';
  }
}

/**
 * The signature could not be verified. Never a soft warning: the message
 * must not be trusted.
 */
export class SignatureError extends JwsError {
  constructor(
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Signature verification failed: ${reason}`, 'SIGNATURE_INVALID', cause);
    this.name = 'SignatureError';
  }
}

export class InvalidHeaderError extends JwsError {
  constructor(message: string) {
    super(message, 'INVALID_HEADER');
    this.name = 'InvalidHeaderError';
  }
}

export class InvalidKeyError extends JwsError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVALID_KEY', cause);
    this.name = 'InvalidKeyError';
  }
}

export class MalformedTokenError extends JwsError {
  constructor(message: string) {
    super(message, 'MALFORMED_TOKEN');
    this.name = 'MalformedTokenError';
  }
}

export class RegistryFrozenError extends JwsError {
  constructor() {
    super('Algorithm registry is frozen; register algorithms before first use', 'REGISTRY_FROZEN');
    this.name = 'RegistryFrozenError';
  }
}
