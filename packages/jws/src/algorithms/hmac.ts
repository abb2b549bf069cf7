/**
 * HMAC with SHA-2 (HS256, HS384, HS512)
 */

import { createHmac } from 'node:crypto';
import { SignatureError } from '../errors.js';
import { toSecret } from '../keys.js';
import type { HashAlgorithm, KeyInput, SigningAlgorithm } from '../types.js';
import { constantTimeEqual, keyForVerify } from './shared.js';

export class HmacAlgorithm implements SigningAlgorithm {
  constructor(
    readonly name: string,
    readonly hash: HashAlgorithm
  ) {}

  sign(message: Uint8Array, key: KeyInput): Uint8Array {
    return this.mac(message, toSecret(key));
  }

  /**
   * Recompute the MAC and compare in constant time
   */
  verify(message: Uint8Array, signature: Uint8Array, key: KeyInput): void {
    const secret = keyForVerify(() => toSecret(key));
    const expected = this.mac(message, secret);

    if (!constantTimeEqual(expected, signature)) {
      throw new SignatureError(`${this.name} MAC does not match`);
    }
  }

  private mac(message: Uint8Array, secret: Uint8Array): Uint8Array {
    return createHmac(this.hash, secret).update(message).digest();
  }
}
