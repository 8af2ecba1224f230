/**
 * Global Config Storage
 *
 * Global configuration stored at <dataDir>/config.json.
 * Lists the feeds the reference stages collect and default build settings.
 *
 * @module storage/config
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../schemas/common.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { atomicWriteJson, migrateSchema } from '../schemas/migrations/index.js';
import { isErrnoException } from './atomic.js';
import { getGlobalConfigPath } from './paths.js';

/**
 * One syndication feed (JSON Feed format) to collect postings from
 */
export const FeedSourceSchema = z.object({
  /** Stable identifier, used in natural keys */
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'Feed id must be a lowercase slug'),
  url: z.string().url(),
  /** Company name used when entries carry no author */
  company: z.string().optional(),
});

export type FeedSource = z.infer<typeof FeedSourceSchema>;

/**
 * Global configuration schema
 */
export const GlobalConfigSchema = z.object({
  /** Schema version for forward compatibility */
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.globalConfig),

  feeds: z.array(FeedSourceSchema).default([]),

  /** Default TTL for cached fetches */
  cacheTtlMs: z.number().int().nonnegative().optional(),

  /** Default number of stages run at once */
  concurrency: z.number().int().positive().optional(),

  /** Default build timeout */
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
});

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

/**
 * Default configuration when no config file exists
 */
export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = {
  schemaVersion: SCHEMA_VERSIONS.globalConfig,
  feeds: [],
};

/**
 * Save global config to disk
 */
export async function saveGlobalConfig(dataDir: string, config: GlobalConfig): Promise<void> {
  const validated = GlobalConfigSchema.parse(config);
  await atomicWriteJson(getGlobalConfigPath(dataDir), validated);
}

/**
 * Load global config from disk
 *
 * Returns default config if file doesn't exist.
 *
 * @throws Error if config file exists but is invalid
 */
export async function loadGlobalConfig(dataDir: string): Promise<GlobalConfig> {
  const filePath = getGlobalConfigPath(dataDir);

  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const data: unknown = JSON.parse(content);
    return GlobalConfigSchema.parse(migrateSchema(data, 'globalConfig'));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return DEFAULT_GLOBAL_CONFIG;
    }
    throw error;
  }
}
