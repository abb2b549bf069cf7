/**
 * Configuration from environment variables
 */

import { z } from 'zod';
import { JwsEngine } from './engine.js';
import { createRegistry, type AlgorithmRegistry } from './registry.js';
import type { JwsConfig } from './types.js';

const EnvSchema = z.object({
  JWS_ALLOWED_ALGORITHMS: z.string().optional(),
  JWS_MIN_RSA_BITS: z
    .string()
    .regex(/^\d+$/, 'must be a whole number')
    .default('2048')
    .transform(Number)
    .pipe(z.number().min(1024, 'must be at least 1024')),
  JWS_DEBUG: z.enum(['true', 'false']).default('false'),
});

/**
 * Load configuration from environment variables
 */
export function loadConfig(): JwsConfig {
  const result = EnvSchema.safeParse({
    JWS_ALLOWED_ALGORITHMS: process.env.JWS_ALLOWED_ALGORITHMS,
    JWS_MIN_RSA_BITS: process.env.JWS_MIN_RSA_BITS || undefined,
    JWS_DEBUG: process.env.JWS_DEBUG || undefined,
  });

  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
    throw new Error(`Invalid JWS configuration: ${problems.join('; ')}`);
  }

  const env = result.data;
  const allowed = (env.JWS_ALLOWED_ALGORITHMS ?? '')
    .split(',')
    .map(alg => alg.trim())
    .filter(Boolean);

  return {
    allowedAlgorithms: allowed.length > 0 ? allowed : undefined,
    minRsaModulusBits: env.JWS_MIN_RSA_BITS,
    debug: env.JWS_DEBUG === 'true',
  };
}

/**
 * Build an engine from the environment.
 *
 * `setup` registers custom algorithms; the registry is frozen afterwards.
 */
export function createEngineFromEnv(setup?: (registry: AlgorithmRegistry) => void): JwsEngine {
  const config = loadConfig();
  const registry = createRegistry({ minRsaModulusBits: config.minRsaModulusBits });

  setup?.(registry);
  registry.freeze();

  const unknown = (config.allowedAlgorithms ?? []).filter(alg => !registry.supports(alg));
  if (unknown.length > 0) {
    console.warn('Configuration warnings:');
    unknown.forEach(alg => console.warn(`  - JWS_ALLOWED_ALGORITHMS names ${alg}, which no algorithm implements`));
  }

  return new JwsEngine({
    registry,
    algorithms: config.allowedAlgorithms,
    debug: config.debug,
  });
}
