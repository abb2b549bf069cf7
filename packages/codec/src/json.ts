import { CodecError } from './errors.js';
import type { JsonObject } from './types.js';

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * JSON.parse only ever yields JSON values, so a non-array object is a JsonObject
 */
function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse UTF-8 encoded JSON that must hold an object
 */
export function parseJsonObject(bytes: Uint8Array): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(bytes));
  } catch (error) {
    throw new CodecError('Invalid JSON', error);
  }

  if (!isJsonObject(parsed)) {
    throw new CodecError('Expected a JSON object');
  }

  return parsed;
}
