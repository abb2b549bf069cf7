/**
 * JWS header validation
 */

import { z } from 'zod';
import type { JsonValue } from '@jwsign/codec';
import { InvalidHeaderError } from './errors.js';
import type { JwsHeader } from './types.js';

/**
 * Registered header parameters understood by this library
 */
export const RESERVED_HEADER_PARAMETERS = ['alg', 'typ', 'cty', 'kid', 'jku', 'x5u', 'x5t'] as const;

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema.optional()),
  ])
);

const stringParam = () => z.string({ invalid_type_error: 'must be a string' });

const HeaderSchema = z
  .object({
    alg: stringParam().min(1, 'must not be empty'),
    typ: stringParam().optional(),
    cty: stringParam().optional(),
    kid: stringParam().optional(),
    jku: stringParam().optional(),
    x5u: stringParam().optional(),
    x5t: stringParam().optional(),
  })
  .catchall(JsonValueSchema.optional());

/**
 * Validate a header and return it typed. The input is not modified.
 */
export function parseHeader(value: unknown): JwsHeader {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new InvalidHeaderError('JWS header must be an object');
  }

  if (!('alg' in value)) {
    throw new InvalidHeaderError('JWS header must have an alg parameter');
  }

  const result = HeaderSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidHeaderError(`Invalid header parameter "${issue.path.join('.')}": ${issue.message}`);
  }

  return result.data;
}
