/**
 * ECDSA over NIST curves (ES256, ES384, ES512)
 *
 * Signatures are the fixed-width r || s concatenation JWS uses (IEEE P1363),
 * not DER. Signing draws a fresh random nonce from OpenSSL for every
 * signature, so signing the same input twice gives different bytes.
 */

import { sign, verify, type KeyObject } from 'node:crypto';
import { InvalidKeyError, SignatureError } from '../errors.js';
import { toPrivateKey, toPublicKey } from '../keys.js';
import type { HashAlgorithm, KeyInput, NamedCurve, SigningAlgorithm } from '../types.js';
import { keyForVerify } from './shared.js';

const CURVES: Record<NamedCurve, { opensslName: string; signatureLength: number }> = {
  'P-256': { opensslName: 'prime256v1', signatureLength: 64 },
  'P-384': { opensslName: 'secp384r1', signatureLength: 96 },
  'P-521': { opensslName: 'secp521r1', signatureLength: 132 },
};

export class EcdsaAlgorithm implements SigningAlgorithm {
  constructor(
    readonly name: string,
    readonly hash: HashAlgorithm,
    readonly curve: NamedCurve
  ) {}

  get signatureLength(): number {
    return CURVES[this.curve].signatureLength;
  }

  sign(message: Uint8Array, key: KeyInput): Uint8Array {
    const privateKey = this.checkKey(toPrivateKey(key));
    return sign(this.hash, message, { key: privateKey, dsaEncoding: 'ieee-p1363' });
  }

  verify(message: Uint8Array, signature: Uint8Array, key: KeyInput): void {
    const publicKey = keyForVerify(() => this.checkKey(toPublicKey(key)));

    if (signature.byteLength !== this.signatureLength) {
      throw new SignatureError(
        `${this.name} signature must be ${this.signatureLength} bytes, got ${signature.byteLength}`
      );
    }

    let valid: boolean;
    try {
      valid = verify(this.hash, message, { key: publicKey, dsaEncoding: 'ieee-p1363' }, signature);
    } catch (error) {
      throw new SignatureError(`${this.name} signature is malformed`, error);
    }

    if (!valid) {
      throw new SignatureError(`${this.name} signature does not match`);
    }
  }

  private checkKey(key: KeyObject): KeyObject {
    if (key.asymmetricKeyType !== 'ec') {
      throw new InvalidKeyError(`${this.name} requires an EC key, got ${key.asymmetricKeyType ?? key.type}`);
    }

    const expected = CURVES[this.curve].opensslName;
    const actual = key.asymmetricKeyDetails?.namedCurve;
    if (actual !== expected) {
      throw new InvalidKeyError(`${this.name} requires a ${this.curve} key, got ${actual ?? 'unknown curve'}`);
    }

    return key;
  }
}
