/**
 * Canonical JSON serialization
 *
 * Compact JSON with object members sorted by key (UTF-16 code unit order,
 * as in RFC 8785) at every nesting level. Array order is preserved and
 * `undefined` object members are omitted, so two equal mappings always
 * serialize to the same bytes regardless of insertion order.
 */

import { CodecError } from './errors.js';

const encoder = new TextEncoder();

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function write(value: unknown, path: string, seen: Set<object>): string {
  if (value === null) {
    return 'null';
  }

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new CodecError(`Cannot serialize non-finite number at ${path}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value !== 'object') {
    throw new CodecError(`Cannot serialize ${typeof value} at ${path}`);
  }

  if (seen.has(value)) {
    throw new CodecError(`Cannot serialize circular reference at ${path}`);
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      return `[${items
        .map((item, i) => (item === undefined ? 'null' : write(item, `${path}[${i}]`, seen)))
        .join(',')}]`;
    }

    if (!isPlainObject(value)) {
      const kind = value.constructor?.name ?? 'object';
      throw new CodecError(`Cannot serialize ${kind} at ${path}`);
    }

    const entries: Array<[string, unknown]> = Object.entries(value);
    const members = entries
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([key, member]) => `${JSON.stringify(key)}:${write(member, `${path}.${key}`, seen)}`);

    return `{${members.join(',')}}`;
  } finally {
    seen.delete(value);
  }
}

/**
 * Serialize a value to its canonical JSON text
 */
export function canonicalString(value: unknown): string {
  return write(value, '$', new Set());
}

/**
 * Serialize a value to canonical JSON as UTF-8 bytes
 */
export function canonicalize(value: unknown): Uint8Array {
  return encoder.encode(canonicalString(value));
}
