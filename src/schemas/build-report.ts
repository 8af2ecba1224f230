/**
 * Build Report Schema
 *
 * Written to <dataDir>/builds/<buildId>/report.json after every build.
 * Dry runs only return their report (with the plan) to the caller.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import {
  BuildIdSchema,
  FingerprintSchema,
  ISO8601TimestampSchema,
  StageNameSchema,
} from './common.js';
import { StageErrorKindSchema, StageRunSchema } from './stage.js';
import { VariantNameSchema } from './variants.js';

/**
 * Why a stage is (or is not) considered stale
 */
export const StalenessReasonSchema = z.enum([
  'never-succeeded',
  'version-changed',
  'input-changed',
  'forced',
  'max-age-expired',
  'up-to-date',
]);

export type StalenessReason = z.infer<typeof StalenessReasonSchema>;

/**
 * Dry-run decision. `conditional` marks a stage that is up to date now
 * but sits below a stage that will run, so it reruns only if that
 * upstream output changes.
 */
export const PlanDecisionSchema = z.enum(['run', 'skip', 'conditional']);

export type PlanDecision = z.infer<typeof PlanDecisionSchema>;

export const PlanEntrySchema = z.object({
  stage: StageNameSchema,
  decision: PlanDecisionSchema,
  reason: StalenessReasonSchema,
});

export type PlanEntry = z.infer<typeof PlanEntrySchema>;

export const BuildErrorSchema = z.object({
  stage: StageNameSchema,
  kind: StageErrorKindSchema,
  message: z.string(),
  inputFingerprint: FingerprintSchema.optional(),
});

export type BuildError = z.infer<typeof BuildErrorSchema>;

export const BuildReportSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.buildReport),
  buildId: BuildIdSchema,
  startedAt: ISO8601TimestampSchema,
  completedAt: ISO8601TimestampSchema,
  durationMs: z.number().nonnegative(),
  success: z.boolean(),
  dryRun: z.boolean(),
  cancelled: z.boolean(),
  /** One run per stage, in topological order */
  stages: z.array(StageRunSchema),
  errors: z.array(BuildErrorSchema),
  /** Number of records pruned per variant */
  pruned: z.record(z.string(), z.number().int().nonnegative()),
  /** Variants whose pruning was suppressed because their owner did not succeed */
  pruneSuppressed: z.array(VariantNameSchema),
  plan: z.array(PlanEntrySchema).default([]),
});

export type BuildReport = z.infer<typeof BuildReportSchema>;
