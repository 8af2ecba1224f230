/**
 * Content Record Schemas
 *
 * A ContentRecord is one normalized entity in the store. Each variant is
 * persisted as a single RecordSet document under <dataDir>/store/.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { BuildIdSchema, ISO8601TimestampSchema, StageNameSchema } from './common.js';
import { VariantNameSchema } from './variants.js';

export const ContentRecordSchema = z.object({
  variant: VariantNameSchema,
  /** Unique within the variant */
  naturalKey: z.string().min(1),
  attributes: z.record(z.string(), z.unknown()),
  /** Stage that last wrote or affirmed this record */
  sourceStage: StageNameSchema,
  firstSeenAt: ISO8601TimestampSchema,
  lastSeenAt: ISO8601TimestampSchema,
  /** Last time the attributes actually changed */
  updatedAt: ISO8601TimestampSchema,
  lastSeenBuild: BuildIdSchema.nullable(),
});

export type ContentRecord = z.infer<typeof ContentRecordSchema>;

export const RecordSetSchema = z.object({
  schemaVersion: z.number().int().positive().default(SCHEMA_VERSIONS.recordSet),
  variant: VariantNameSchema,
  updatedAt: ISO8601TimestampSchema,
  /** The last build could not refresh this variant; data is last-known-good */
  partialFailure: z.boolean().default(false),
  /** Sorted by natural key */
  records: z.array(ContentRecordSchema),
});

export type RecordSet = z.infer<typeof RecordSetSchema>;
