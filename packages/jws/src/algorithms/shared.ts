import { timingSafeEqual } from 'node:crypto';
import { InvalidKeyError, SignatureError } from '../errors.js';

/**
 * Compare two byte strings in time that depends only on their length.
 *
 * Lengths are public (they follow from the algorithm), so a length mismatch
 * returns early.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) {
    return false;
  }
  return timingSafeEqual(a, b);
}

/**
 * Read a verification key; an unusable key is a failed verification
 */
export function keyForVerify<T>(read: () => T): T {
  try {
    return read();
  } catch (error) {
    if (error instanceof InvalidKeyError) {
      throw new SignatureError(error.message, error);
    }
    throw error;
  }
}
