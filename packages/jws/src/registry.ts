/**
 * Algorithm registry
 *
 * Resolves an algorithm identifier to an implementation. Built-in
 * identifiers are looked up in a static table and always win; custom
 * bindings are tried afterwards in registration order, first match wins.
 *
 * Registration is single-writer: register everything during start-up,
 * then freeze() before sign/verify traffic begins.
 */

import { createBuiltinAlgorithm, isBuiltinAlgorithm, BUILTIN_ALGORITHMS, type BuiltinAlgorithmId } from './algorithms/index.js';
import { AlgorithmNotImplementedError, RegistryFrozenError } from './errors.js';
import type {
  AlgorithmBinding,
  AlgorithmFactory,
  AlgorithmParams,
  AlgorithmPattern,
  RegistryOptions,
  SigningAlgorithm,
} from './types.js';

const NO_PARAMS: AlgorithmParams = Object.freeze({});

/**
 * Anchor a pattern so it has to match the whole identifier. Stateful
 * flags (g, y) are dropped so repeated lookups behave the same, and m is
 * dropped so the anchors cannot match at a line break.
 */
function compilePattern(pattern: AlgorithmPattern): AlgorithmPattern {
  if (typeof pattern === 'string') {
    return pattern;
  }
  return new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gmy]/g, ''));
}

function matchPattern(pattern: AlgorithmPattern, identifier: string): AlgorithmParams | null {
  if (typeof pattern === 'string') {
    return pattern === identifier ? NO_PARAMS : null;
  }

  const match = pattern.exec(identifier);
  if (!match) {
    return null;
  }

  const params: Record<string, string> = {};
  for (const [name, value] of Object.entries(match.groups ?? {})) {
    // Groups that did not take part in the match come back undefined
    if (value !== undefined) {
      params[name] = value;
    }
  }
  return Object.freeze(params);
}

export class AlgorithmRegistry {
  private readonly bindings: AlgorithmBinding[] = [];
  private frozen = false;

  constructor(private readonly options: RegistryOptions = {}) {}

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Add a custom binding after all built-ins and earlier registrations
   */
  register(pattern: AlgorithmPattern, factory: AlgorithmFactory): this {
    if (this.frozen) {
      throw new RegistryFrozenError();
    }

    this.bindings.push(Object.freeze({ pattern: compilePattern(pattern), factory }));
    return this;
  }

  /**
   * Close the registry for registration
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  resolve(identifier: string): SigningAlgorithm {
    if (isBuiltinAlgorithm(identifier)) {
      return createBuiltinAlgorithm(identifier, this.options);
    }

    for (const binding of this.bindings) {
      const params = matchPattern(binding.pattern, identifier);
      if (params) {
        return binding.factory(params);
      }
    }

    throw new AlgorithmNotImplementedError(identifier);
  }

  supports(identifier: string): boolean {
    return (
      isBuiltinAlgorithm(identifier) ||
      this.bindings.some(binding => matchPattern(binding.pattern, identifier) !== null)
    );
  }

  builtinIdentifiers(): BuiltinAlgorithmId[] {
    return Object.keys(BUILTIN_ALGORITHMS).filter(isBuiltinAlgorithm);
  }
}

export function createRegistry(options: RegistryOptions = {}): AlgorithmRegistry {
  return new AlgorithmRegistry(options);
}

/**
 * Process-wide registry behind the module-level sign/verify/register
 */
export const defaultRegistry = new AlgorithmRegistry();
