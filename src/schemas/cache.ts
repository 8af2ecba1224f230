/**
 * Cache Entry Schema
 *
 * One file per entry under <dataDir>/cache/<key[0..2]>/<key>.json.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { FingerprintSchema, ISO8601TimestampSchema } from './common.js';

export const CacheEntrySchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.cacheEntry),
  key: FingerprintSchema,
  /** Raw fetched payload */
  payload: z.string(),
  contentType: z.string().default('application/octet-stream'),
  sizeBytes: z.number().int().nonnegative(),
  fetchedAt: ISO8601TimestampSchema,
  /** null = never expires */
  expiresAt: ISO8601TimestampSchema.nullable(),
  /** Writing stage, used for bulk eviction */
  tag: z.string().nullable().default(null),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;
