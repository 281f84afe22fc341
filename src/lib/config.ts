/**
 * Environment configuration
 *
 * Reads engine defaults from environment variables. Unset or empty
 * variables leave the built-in defaults in place.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { CacheConfig } from '../context/cache.js';
import type { ConstraintsInput } from '../context/constraints.js';
import { SELECTION_STRATEGIES } from '../context/types.js';

const envSchema = z.object({
  CONTEXT_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  CONTEXT_MAX_FILES: z.coerce.number().int().positive().optional(),
  CONTEXT_STRATEGY: z.enum(SELECTION_STRATEGIES).optional(),
  CONTEXT_CACHE_SIZE: z.coerce.number().int().positive().optional(),
  CONTEXT_CACHE_TTL_MS: z.coerce.number().int().min(0).optional(),
  DEBUG_CONTEXT_ENGINE: z.enum(['true', 'false']).optional(),
});

export interface EnvEngineConfig {
  constraints: ConstraintsInput;
  cache: Partial<CacheConfig>;
  verbose: boolean;
}

/**
 * @throws ConfigurationError when a variable is set to an invalid value
 */
export function loadEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvEngineConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw ConfigurationError.fromZod('environment', parsed.error);
  }

  const vars = parsed.data;
  return {
    constraints: {
      maxTokens: vars.CONTEXT_MAX_TOKENS,
      maxFiles: vars.CONTEXT_MAX_FILES,
      strategy: vars.CONTEXT_STRATEGY,
    },
    cache: {
      ...(vars.CONTEXT_CACHE_SIZE !== undefined ? { maxEntries: vars.CONTEXT_CACHE_SIZE } : {}),
      ...(vars.CONTEXT_CACHE_TTL_MS !== undefined ? { ttlMs: vars.CONTEXT_CACHE_TTL_MS } : {}),
    },
    verbose: vars.DEBUG_CONTEXT_ENGINE === 'true',
  };
}
