/**
 * Content Store Type Definitions
 *
 * @module store/types
 */

import type { ContentRecord } from '../schemas/record.js';
import type { VariantName } from '../schemas/variants.js';

export type RecordPredicate = (record: ContentRecord) => boolean;

/**
 * Read surface shared by stages and the site generator
 */
export interface StoreReader {
  /** Committed records of a variant, sorted by natural key */
  query(variant: VariantName, predicate?: RecordPredicate): ContentRecord[];
  get(variant: VariantName, naturalKey: string): ContentRecord | undefined;
  status(): VariantStatus[];
  /** Every variant with its committed records */
  exportSnapshot(): StoreSnapshot;
}

/**
 * Buffered writes of one stage. Variants arrive as plain strings from
 * plugins and are validated on write.
 */
export interface StoreWriter {
  upsert(variant: string, naturalKey: string, attributes: unknown): void;
  markSeen(variant: string, naturalKey: string): void;
}

export type TransactionState = 'open' | 'committed' | 'rolled-back';

export interface StoreTransaction extends StoreWriter {
  readonly stage: string;
  readonly state: TransactionState;
  /** Number of buffered operations */
  readonly size: number;
  /** Apply every buffered write, or none of them */
  commit(): Promise<CommitSummary>;
  rollback(): void;
}

/**
 * Store handle given to a running stage
 */
export type StageStore = StoreReader & StoreWriter;

export interface CommitSummary {
  stage: string;
  variants: VariantName[];
  inserted: number;
  updated: number;
  unchanged: number;
  affirmed: number;
  /** Hash of every record written or affirmed, sorted by variant and key */
  outputFingerprint: string;
}

export interface VariantStatus {
  variant: VariantName;
  count: number;
  owner: string | null;
  /** Last build could not refresh this variant */
  partialFailure: boolean;
  lastUpdatedAt: string | null;
}

export interface SnapshotRecord {
  naturalKey: string;
  attributes: Record<string, unknown>;
  sourceStage: string;
  firstSeenAt: string;
  updatedAt: string;
}

export interface SnapshotVariant {
  partialFailure: boolean;
  records: SnapshotRecord[];
}

export interface StoreSnapshot {
  exportedAt: string;
  buildId: string | null;
  variants: Partial<Record<VariantName, SnapshotVariant>>;
}
