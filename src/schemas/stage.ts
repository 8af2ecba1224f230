/**
 * Stage Run Schemas
 *
 * Every stage execution produces one immutable StageRun. Runs are kept
 * per stage as a bounded history file, which the scheduler reads back
 * to decide staleness on the next build.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import {
  BuildIdSchema,
  FingerprintSchema,
  ISO8601TimestampSchema,
  StageNameSchema,
} from './common.js';

// ============================================================================
// Outcome & Error
// ============================================================================

/**
 * Terminal outcome of a stage within one build.
 * - success: ran and committed its transaction
 * - failed: returned an error, threw, or its commit failed
 * - skipped-cached: not stale, previous records kept untouched
 * - blocked: an upstream stage failed or was blocked
 * - cancelled: the build was aborted before the stage was scheduled
 */
export const StageOutcomeSchema = z.enum([
  'success',
  'failed',
  'skipped-cached',
  'blocked',
  'cancelled',
]);

export type StageOutcome = z.infer<typeof StageOutcomeSchema>;

/**
 * Stage error kinds. `blocked` and `cancelled` describe why a stage never ran.
 */
export const StageErrorKindSchema = z.enum([
  'fetch',
  'transform',
  'ownership-conflict',
  'validation',
  'store',
  'blocked',
  'cancelled',
]);

export type StageErrorKind = z.infer<typeof StageErrorKindSchema>;

export const StageRunErrorSchema = z.object({
  kind: StageErrorKindSchema,
  message: z.string(),
});

export type StageRunError = z.infer<typeof StageRunErrorSchema>;

/**
 * Free-form counters reported by a stage (e.g. { fetched: 2, cacheHits: 1 })
 */
export const RunStatsSchema = z.record(z.string(), z.number());

export type RunStats = z.infer<typeof RunStatsSchema>;

// ============================================================================
// StageRun
// ============================================================================

export const StageRunSchema = z.object({
  buildId: BuildIdSchema,
  stage: StageNameSchema,
  version: z.string().min(1),
  outcome: StageOutcomeSchema,
  startedAt: ISO8601TimestampSchema,
  completedAt: ISO8601TimestampSchema,
  durationMs: z.number().nonnegative(),

  /** Hash of own version + upstream output fingerprints */
  inputFingerprint: FingerprintSchema,

  /**
   * Hash of the records this run wrote or affirmed. Skipped stages carry
   * the previous value forward; stages that never produced output have null.
   */
  outputFingerprint: FingerprintSchema.nullable(),

  error: StageRunErrorSchema.optional(),
  stats: RunStatsSchema.default({}),
});

export type StageRun = z.infer<typeof StageRunSchema>;

// ============================================================================
// StageHistory (one file per stage)
// ============================================================================

/** Number of runs retained per stage */
export const MAX_STAGE_HISTORY = 50;

export const StageHistorySchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.stageHistory),
  stage: StageNameSchema,
  /** Oldest first */
  runs: z.array(StageRunSchema),
});

export type StageHistory = z.infer<typeof StageHistorySchema>;

/**
 * Create an empty history document for a stage
 */
export function createEmptyStageHistory(stage: string): StageHistory {
  return {
    schemaVersion: SCHEMA_VERSIONS.stageHistory,
    stage,
    runs: [],
  };
}
