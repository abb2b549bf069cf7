/**
 * Throwaway key pairs for tests, generated once per test file
 */

import { generateKeyPairSync, type KeyObject } from 'node:crypto';
import type { NamedCurve } from '../types.js';

export interface TestKeyPair {
  publicKey: KeyObject;
  privateKey: KeyObject;
}

const cache = new Map<string, TestKeyPair>();

function cached(id: string, generate: () => TestKeyPair): TestKeyPair {
  const existing = cache.get(id);
  if (existing) {
    return existing;
  }
  const pair = generate();
  cache.set(id, pair);
  return pair;
}

export function rsaKeyPair(label = 'a', modulusLength = 2048): TestKeyPair {
  return cached(`rsa-${modulusLength}-${label}`, () => generateKeyPairSync('rsa', { modulusLength }));
}

export function ecKeyPair(curve: NamedCurve, label = 'a'): TestKeyPair {
  return cached(`ec-${curve}-${label}`, () => generateKeyPairSync('ec', { namedCurve: curve }));
}
