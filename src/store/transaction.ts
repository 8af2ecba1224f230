/**
 * Per-stage store transaction
 *
 * Writes are validated as they are buffered and applied together on
 * commit. Repeated writes to one natural key collapse into one operation.
 *
 * @module store/transaction
 */

import { parseVariantAttributes, type VariantName } from '../schemas/variants.js';
import { StoreError } from './errors.js';
import type { CommitSummary, StoreTransaction, TransactionState } from './types.js';

export type PendingOperation =
  | { type: 'upsert'; attributes: Record<string, unknown> }
  | { type: 'seen' };

export type PendingWrites = Map<VariantName, Map<string, PendingOperation>>;

/**
 * What a transaction needs from its store
 */
export interface TransactionHost {
  /** Resolve the variant and check the stage may write it */
  checkWrite(stage: string, variant: string): VariantName;
  commitTransaction(stage: string, writes: PendingWrites): Promise<CommitSummary>;
}

export class Transaction implements StoreTransaction {
  private writes: PendingWrites = new Map();
  private currentState: TransactionState = 'open';

  constructor(
    readonly stage: string,
    private readonly host: TransactionHost
  ) {}

  get state(): TransactionState {
    return this.currentState;
  }

  get size(): number {
    let size = 0;
    for (const ops of this.writes.values()) {
      size += ops.size;
    }
    return size;
  }

  upsert(variant: string, naturalKey: string, attributes: unknown): void {
    const { name, ops } = this.prepare(variant, naturalKey);
    const parsed = parseVariantAttributes(name, attributes);

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new StoreError(
        'invalid-attributes',
        `Invalid ${name} attributes for "${naturalKey}": ${issues}`,
        { cause: parsed.error }
      );
    }

    ops.set(naturalKey, { type: 'upsert', attributes: parsed.data });
  }

  markSeen(variant: string, naturalKey: string): void {
    const { ops } = this.prepare(variant, naturalKey);
    // An upsert already affirms the record
    if (ops.get(naturalKey)?.type !== 'upsert') {
      ops.set(naturalKey, { type: 'seen' });
    }
  }

  async commit(): Promise<CommitSummary> {
    this.assertOpen();
    try {
      const summary = await this.host.commitTransaction(this.stage, this.writes);
      this.currentState = 'committed';
      return summary;
    } catch (error) {
      this.rollback();
      throw error;
    }
  }

  rollback(): void {
    this.writes = new Map();
    this.currentState = 'rolled-back';
  }

  private prepare(
    variant: string,
    naturalKey: string
  ): { name: VariantName; ops: Map<string, PendingOperation> } {
    this.assertOpen();
    if (naturalKey.trim() === '') {
      throw new StoreError('invalid-attributes', `Empty natural key for ${variant}`);
    }

    const name = this.host.checkWrite(this.stage, variant);
    let ops = this.writes.get(name);
    if (!ops) {
      ops = new Map();
      this.writes.set(name, ops);
    }
    return { name, ops };
  }

  private assertOpen(): void {
    if (this.currentState !== 'open') {
      throw new StoreError(
        'transaction-closed',
        `Transaction for stage "${this.stage}" is already ${this.currentState}`
      );
    }
  }
}
