/**
 * Configuration Module
 *
 * Loads and validates environment variables for the job ranker CLI.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * The ranking library never reads this module; BM25 parameters reach
 * `rank()` explicitly through its options.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { DEFAULT_BM25_PARAMS } from '../ranking/params.js';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // BM25 tuning
  JOBRANK_BM25_K1: z.coerce.number().finite().nonnegative().default(DEFAULT_BM25_PARAMS.k1),
  JOBRANK_BM25_B: z.coerce.number().min(0).max(1).default(DEFAULT_BM25_PARAMS.b),

  // Default result limit (unset = return every job)
  JOBRANK_TOP_K: z.coerce.number().int().positive().optional(),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Raised when environment variables fail validation.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[] | undefined>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

function buildConfig(env: Env) {
  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    // Ranking defaults
    ranking: {
      k1: env.JOBRANK_BM25_K1,
      b: env.JOBRANK_BM25_B,
      topK: env.JOBRANK_TOP_K,
    },
  } as const;
}

export type Config = ReturnType<typeof buildConfig>;

/**
 * Parse a set of environment variables into configuration.
 * Empty strings are treated as unset.
 *
 * @param env - Variables to read (defaults to process.env)
 * @throws ConfigValidationError if any variable is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parseResult = envSchema.safeParse(present);
  if (!parseResult.success) {
    const fieldErrors = parseResult.error.flatten().fieldErrors;
    const names = Object.keys(fieldErrors).join(', ');
    throw new ConfigValidationError(`Invalid environment variables: ${names}`, fieldErrors);
  }

  return buildConfig(parseResult.data);
}

function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(error.message);
      console.error(error.fieldErrors);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Application configuration singleton
 */
export const config: Config = loadConfigOrExit();
