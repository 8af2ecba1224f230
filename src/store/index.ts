/**
 * Content Store
 *
 * @module store
 */

export { ContentStore, type ContentStoreOptions } from './content-store.js';
export { Transaction, type PendingOperation, type PendingWrites } from './transaction.js';
export { StoreError, type StoreErrorCode } from './errors.js';
export type {
  RecordPredicate,
  StoreReader,
  StoreWriter,
  StoreTransaction,
  TransactionState,
  StageStore,
  CommitSummary,
  VariantStatus,
  SnapshotRecord,
  SnapshotVariant,
  StoreSnapshot,
} from './types.js';
