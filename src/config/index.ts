/**
 * Configuration Module
 *
 * Loads and validates environment variables for the harvest pipeline.
 * Environment values override the data directory's config.json.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { getDataDir } from '../storage/paths.js';
import type { GlobalConfig } from '../storage/config.js';
import { DEFAULT_CONCURRENCY } from '../pipeline/scheduler.js';
import { MAX_TIMEOUT_MS } from '../schemas/common.js';

// dotenv leaves unset keys from .env as empty strings
const blankToUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const optionalCount = (minimum: number, maximum = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(minimum).max(maximum).optional());

const envSchema = z.object({
  HARVEST_DATA_DIR: z.preprocess(blankToUndefined, z.string().optional()),

  // Build defaults
  HARVEST_CONCURRENCY: optionalCount(1),
  /** 0 = no timeout */
  HARVEST_TIMEOUT_MS: optionalCount(0, MAX_TIMEOUT_MS),
  HARVEST_CACHE_TTL_MS: optionalCount(0),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env: Env = parseResult.data;

/**
 * Application configuration singleton
 */
export const config = {
  // Environment
  nodeEnv: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  isDevelopment: env.NODE_ENV === 'development',
  isTest: env.NODE_ENV === 'test',

  dataDir: getDataDir(),

  build: {
    concurrency: env.HARVEST_CONCURRENCY,
    timeoutMs: env.HARVEST_TIMEOUT_MS === 0 ? undefined : env.HARVEST_TIMEOUT_MS,
    cacheTtlMs: env.HARVEST_CACHE_TTL_MS,
  },
} as const;

export type Config = typeof config;
export type BuildOverrides = Config['build'];

export interface BuildDefaults {
  concurrency: number;
  /** Undefined = no timeout */
  timeoutMs: number | undefined;
  /** null = cached fetches never expire */
  cacheTtlMs: number | null;
}

/**
 * Merge build settings: environment, then config.json, then built-in defaults
 *
 * @example
 * ```typescript
 * const defaults = resolveBuildDefaults(await loadGlobalConfig(dataDir));
 * await runBuild({ dataDir, stages, ...defaults });
 * ```
 */
export function resolveBuildDefaults(
  globalConfig: GlobalConfig,
  overrides: BuildOverrides = config.build
): BuildDefaults {
  return {
    concurrency: overrides.concurrency ?? globalConfig.concurrency ?? DEFAULT_CONCURRENCY,
    timeoutMs: overrides.timeoutMs ?? globalConfig.timeoutMs,
    cacheTtlMs: overrides.cacheTtlMs ?? globalConfig.cacheTtlMs ?? null,
  };
}
