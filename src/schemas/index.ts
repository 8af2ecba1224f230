/**
 * Zod Schemas for All Persisted Documents
 *
 * Central export point for the schema definitions used by the cache,
 * the content store and the scheduler.
 */

// ============================================================================
// Version Registry
// ============================================================================

export { SCHEMA_VERSIONS, getCurrentVersion, isCurrentVersion, type SchemaType } from './versions.js';

// ============================================================================
// Common Types
// ============================================================================

export {
  ISO8601TimestampSchema,
  ISODateSchema,
  STAGE_NAME_PATTERN,
  StageNameSchema,
  FingerprintSchema,
  BUILD_ID_PATTERN,
  MAX_TIMEOUT_MS,
  BuildIdSchema,
  type ISO8601Timestamp,
  type StageName,
  type Fingerprint,
  type BuildId,
} from './common.js';

// ============================================================================
// Stage Runs
// ============================================================================

export {
  StageOutcomeSchema,
  StageErrorKindSchema,
  StageRunErrorSchema,
  RunStatsSchema,
  StageRunSchema,
  StageHistorySchema,
  MAX_STAGE_HISTORY,
  createEmptyStageHistory,
  type StageOutcome,
  type StageErrorKind,
  type StageRunError,
  type RunStats,
  type StageRun,
  type StageHistory,
} from './stage.js';

// ============================================================================
// Cache
// ============================================================================

export { CacheEntrySchema, type CacheEntry } from './cache.js';

// ============================================================================
// Content Store
// ============================================================================

export {
  OrganizationAttributesSchema,
  PostingAttributesSchema,
  EventAttributesSchema,
  MemberAttributesSchema,
  SubscriptionTypeSchema,
  SubscriptionIntervalSchema,
  SubscriptionActivityTypeSchema,
  SubscriptionAttributesSchema,
  FeedEntryAttributesSchema,
  VariantNameSchema,
  VARIANT_NAMES,
  VARIANT_SCHEMAS,
  isVariantName,
  parseVariantAttributes,
  type OrganizationAttributes,
  type PostingAttributes,
  type EventAttributes,
  type MemberAttributes,
  type SubscriptionAttributes,
  type FeedEntryAttributes,
  type VariantName,
  type VariantAttributes,
} from './variants.js';

export {
  ContentRecordSchema,
  RecordSetSchema,
  type ContentRecord,
  type RecordSet,
} from './record.js';

// ============================================================================
// Build Report
// ============================================================================

export {
  StalenessReasonSchema,
  PlanDecisionSchema,
  PlanEntrySchema,
  BuildErrorSchema,
  BuildReportSchema,
  type StalenessReason,
  type PlanDecision,
  type PlanEntry,
  type BuildError,
  type BuildReport,
} from './build-report.js';

// ============================================================================
// Migrations
// ============================================================================

export {
  migrateSchema,
  registerMigration,
  atomicWriteJson,
} from './migrations/index.js';
