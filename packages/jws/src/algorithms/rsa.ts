/**
 * RSASSA-PKCS1-v1_5 with SHA-2 (RS256, RS384, RS512)
 */

import { constants, sign, verify, type KeyObject } from 'node:crypto';
import { InvalidKeyError, SignatureError } from '../errors.js';
import { toPrivateKey, toPublicKey } from '../keys.js';
import type { HashAlgorithm, KeyInput, SigningAlgorithm } from '../types.js';
import { keyForVerify } from './shared.js';

export const DEFAULT_MIN_RSA_MODULUS_BITS = 2048;

export class RsaAlgorithm implements SigningAlgorithm {
  constructor(
    readonly name: string,
    readonly hash: HashAlgorithm,
    readonly minModulusBits: number = DEFAULT_MIN_RSA_MODULUS_BITS
  ) {}

  sign(message: Uint8Array, key: KeyInput): Uint8Array {
    const privateKey = this.checkKey(toPrivateKey(key));
    return sign(this.hash, message, {
      key: privateKey,
      padding: constants.RSA_PKCS1_PADDING,
    });
  }

  verify(message: Uint8Array, signature: Uint8Array, key: KeyInput): void {
    const publicKey = keyForVerify(() => this.checkKey(toPublicKey(key)));

    let valid: boolean;
    try {
      valid = verify(
        this.hash,
        message,
        { key: publicKey, padding: constants.RSA_PKCS1_PADDING },
        signature
      );
    } catch (error) {
      throw new SignatureError(`${this.name} signature is malformed`, error);
    }

    if (!valid) {
      throw new SignatureError(`${this.name} signature does not match`);
    }
  }

  private checkKey(key: KeyObject): KeyObject {
    // rsa-pss keys carry their own padding parameters and are not PKCS#1 v1.5 keys
    if (key.asymmetricKeyType !== 'rsa') {
      throw new InvalidKeyError(`${this.name} requires an RSA key, got ${key.asymmetricKeyType ?? key.type}`);
    }

    const bits = key.asymmetricKeyDetails?.modulusLength ?? 0;
    if (bits < this.minModulusBits) {
      throw new InvalidKeyError(`RSA key too small: ${bits} bits, need at least ${this.minModulusBits}`);
    }

    return key;
  }
}
