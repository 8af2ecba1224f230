/**
 * Common Zod Schemas - Shared types used across the pipeline
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

/**
 * Calendar date (YYYY-MM-DD)
 */
export const ISODateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

// ============================================
// Identifiers
// ============================================

/**
 * Stage names are snake_case identifiers, e.g. "fetch_feeds".
 * They double as file names under the history directory.
 */
export const STAGE_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export const StageNameSchema = z
  .string()
  .regex(STAGE_NAME_PATTERN, 'Stage name must be snake_case (e.g., "fetch_feeds")');

export type StageName = z.infer<typeof StageNameSchema>;

/**
 * SHA-256 hex digest used for cache keys and input/output fingerprints
 */
export const FingerprintSchema = z.string().regex(/^[a-f0-9]{64}$/, 'Must be a valid SHA-256 hash');

export type Fingerprint = z.infer<typeof FingerprintSchema>;

/**
 * Build identifier (format: YYYYMMDD-HHMMSS-xxxx)
 */
export const BUILD_ID_PATTERN = /^\d{8}-\d{6}-[a-z0-9]{4}$/;

export const BuildIdSchema = z
  .string()
  .regex(BUILD_ID_PATTERN, 'Build ID must match YYYYMMDD-HHMMSS-xxxx');

export type BuildId = z.infer<typeof BuildIdSchema>;

/** Longest delay a Node timer holds; larger values fire at once */
export const MAX_TIMEOUT_MS = 2_147_483_647;
