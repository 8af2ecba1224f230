/**
 * Content Store
 *
 * The normalized local database of domain entities. Each variant is held
 * in memory and persisted as one record set document at
 * <dataDir>/store/<variant>.json.
 *
 * Consistency rules:
 * - stages write through a transaction that commits all-or-nothing
 * - a variant may only be written by its owning stage (when owners are set)
 * - a natural key affirmed by one stage in a build cannot be written by
 *   another stage in the same build
 * - commits touching the same variant are serialized
 *
 * @module store/content-store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { RecordSetSchema, type ContentRecord, type RecordSet } from '../schemas/record.js';
import { VARIANT_NAMES, isVariantName, type VariantName } from '../schemas/variants.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { migrateSchema, tempPathFor } from '../schemas/migrations/index.js';
import { readJsonIfExists } from '../storage/atomic.js';
import { getRecordSetPath } from '../storage/paths.js';
import { KeyedLock } from '../storage/keyed-lock.js';
import { canonicalJson, fingerprint } from '../cache/fingerprint.js';
import { silentLogger, type Logger } from '../pipeline/types.js';
import { StoreError } from './errors.js';
import { Transaction, type PendingWrites, type TransactionHost } from './transaction.js';
import type {
  CommitSummary,
  RecordPredicate,
  SnapshotVariant,
  StoreReader,
  StoreSnapshot,
  StoreTransaction,
  VariantStatus,
} from './types.js';

export interface ContentStoreOptions {
  logger?: Logger;
  /** Clock used for record timestamps */
  now?: () => Date;
}

interface VariantState {
  records: Map<string, ContentRecord>;
  partialFailure: boolean;
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class ContentStore implements StoreReader, TransactionHost {
  private readonly variants = new Map<VariantName, VariantState>();
  private readonly lock = new KeyedLock();
  private readonly logger: Logger;
  private readonly now: () => Date;

  private owners: ReadonlyMap<VariantName, string> | null = null;
  private buildId: string | null = null;
  /** variant -> natural key -> stage that affirmed it in the current build */
  private affirmedBy = new Map<VariantName, Map<string, string>>();

  private constructor(
    private readonly dataDir: string,
    options: ContentStoreOptions
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Open the store, loading (and migrating) every persisted variant
   */
  static async open(dataDir: string, options: ContentStoreOptions = {}): Promise<ContentStore> {
    const store = new ContentStore(dataDir, options);
    await store.load();
    return store;
  }

  // ==========================================================================
  // Build lifecycle
  // ==========================================================================

  /**
   * Declare which stage owns which variant. Writes by any other stage
   * fail with an ownership conflict. Pass null to lift the restriction.
   */
  setOwners(owners: ReadonlyMap<VariantName, string> | null): void {
    this.owners = owners;
  }

  /**
   * Begin a build: records affirmed from now on are stamped with buildId
   */
  startBuild(buildId: string): void {
    this.buildId = buildId;
    this.affirmedBy = new Map();
  }

  get currentBuild(): string | null {
    return this.buildId;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  begin(stage: string): StoreTransaction {
    return new Transaction(stage, this);
  }

  /**
   * Upsert a single record in its own transaction
   */
  async upsert(
    variant: string,
    naturalKey: string,
    attributes: unknown,
    sourceStage: string
  ): Promise<ContentRecord> {
    const tx = this.begin(sourceStage);
    tx.upsert(variant, naturalKey, attributes);
    await tx.commit();
    return this.require(this.resolveVariant(variant), naturalKey);
  }

  /**
   * Affirm an existing record in the current build without changing it
   */
  async markSeen(variant: string, naturalKey: string): Promise<ContentRecord> {
    const name = this.resolveVariant(variant);
    const record = this.require(name, naturalKey);
    const tx = this.begin(record.sourceStage);
    tx.markSeen(name, naturalKey);
    await tx.commit();
    return this.require(name, naturalKey);
  }

  /**
   * Remove records of the variant not affirmed in the current build
   *
   * @returns Removed natural keys, sorted
   */
  async pruneUnseen(variant: VariantName): Promise<string[]> {
    const buildId = this.requireBuild();

    return this.lock.run(variant, async () => {
      const state = this.stateOf(variant);
      const kept = new Map<string, ContentRecord>();
      const removed: string[] = [];

      for (const [key, record] of state.records) {
        if (record.lastSeenBuild === buildId) {
          kept.set(key, record);
        } else {
          removed.push(key);
        }
      }

      if (removed.length > 0) {
        const next: VariantState = { records: kept, partialFailure: state.partialFailure };
        await this.persist(new Map([[variant, next]]));
        this.variants.set(variant, next);
        this.logger.debug(`Pruned ${removed.length} ${variant} record(s)`);
      }

      return removed.sort(compareKeys);
    });
  }

  /**
   * Flag a variant as holding last-known-good data after a failed refresh
   */
  async setPartialFailure(variant: VariantName, partialFailure: boolean): Promise<void> {
    await this.lock.run(variant, async () => {
      const state = this.stateOf(variant);
      if (state.partialFailure === partialFailure) {
        return;
      }
      const next: VariantState = { records: state.records, partialFailure };
      await this.persist(new Map([[variant, next]]));
      this.variants.set(variant, next);
    });
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  query(variant: VariantName, predicate?: RecordPredicate): ContentRecord[] {
    const records = [...this.stateOf(variant).records.values()]
      .filter((record) => !predicate || predicate(record))
      .sort((a, b) => compareKeys(a.naturalKey, b.naturalKey));
    return structuredClone(records);
  }

  get(variant: VariantName, naturalKey: string): ContentRecord | undefined {
    const record = this.stateOf(variant).records.get(naturalKey);
    return record ? structuredClone(record) : undefined;
  }

  status(): VariantStatus[] {
    return VARIANT_NAMES.map((variant) => {
      const state = this.stateOf(variant);
      let lastUpdatedAt: string | null = null;
      for (const record of state.records.values()) {
        if (lastUpdatedAt === null || record.updatedAt > lastUpdatedAt) {
          lastUpdatedAt = record.updatedAt;
        }
      }
      return {
        variant,
        count: state.records.size,
        owner: this.owners?.get(variant) ?? null,
        partialFailure: state.partialFailure,
        lastUpdatedAt,
      };
    });
  }

  /**
   * Every variant with its records, for publishing to the site generator
   */
  exportSnapshot(): StoreSnapshot {
    const variants: Partial<Record<VariantName, SnapshotVariant>> = {};

    for (const variant of VARIANT_NAMES) {
      variants[variant] = {
        partialFailure: this.stateOf(variant).partialFailure,
        records: this.query(variant).map((record) => ({
          naturalKey: record.naturalKey,
          attributes: record.attributes,
          sourceStage: record.sourceStage,
          firstSeenAt: record.firstSeenAt,
          updatedAt: record.updatedAt,
        })),
      };
    }

    return {
      exportedAt: this.now().toISOString(),
      buildId: this.buildId,
      variants,
    };
  }

  // ==========================================================================
  // TransactionHost
  // ==========================================================================

  checkWrite(stage: string, variant: string): VariantName {
    const name = this.resolveVariant(variant);
    if (this.owners) {
      const owner = this.owners.get(name);
      if (owner !== stage) {
        const ownedBy = owner ? ` (owned by "${owner}")` : '';
        throw new StoreError(
          'ownership-conflict',
          `Stage "${stage}" may not write variant "${name}"${ownedBy}`
        );
      }
    }
    return name;
  }

  async commitTransaction(stage: string, writes: PendingWrites): Promise<CommitSummary> {
    const buildId = this.requireBuild();
    const variants = [...writes.keys()].filter((v) => (writes.get(v)?.size ?? 0) > 0).sort();

    return this.lock.runAll(variants, async () => {
      const timestamp = this.now().toISOString();
      const next = new Map<VariantName, VariantState>();
      const written: ContentRecord[] = [];
      const summary: CommitSummary = {
        stage,
        variants,
        inserted: 0,
        updated: 0,
        unchanged: 0,
        affirmed: 0,
        outputFingerprint: '',
      };

      for (const variant of variants) {
        const state = this.stateOf(variant);
        const records = new Map(state.records);
        const affirmed = this.affirmedBy.get(variant);
        const ops = [...(writes.get(variant)?.entries() ?? [])].sort(([a], [b]) =>
          compareKeys(a, b)
        );

        for (const [naturalKey, op] of ops) {
          const previousStage = affirmed?.get(naturalKey);
          if (previousStage !== undefined && previousStage !== stage) {
            throw new StoreError(
              'ownership-conflict',
              `Record ${variant}/${naturalKey} was already written by "${previousStage}" in this build`
            );
          }

          const existing = records.get(naturalKey);
          let record: ContentRecord;

          if (op.type === 'seen') {
            if (!existing) {
              throw new StoreError('not-found', `Cannot affirm missing record ${variant}/${naturalKey}`);
            }
            record = { ...existing, sourceStage: stage, lastSeenAt: timestamp, lastSeenBuild: buildId };
            summary.affirmed++;
          } else if (existing) {
            const same = canonicalJson(existing.attributes) === canonicalJson(op.attributes);
            record = {
              ...existing,
              attributes: op.attributes,
              sourceStage: stage,
              lastSeenAt: timestamp,
              lastSeenBuild: buildId,
              updatedAt: same ? existing.updatedAt : timestamp,
            };
            if (same) {
              summary.unchanged++;
            } else {
              summary.updated++;
            }
          } else {
            record = {
              variant,
              naturalKey,
              attributes: op.attributes,
              sourceStage: stage,
              firstSeenAt: timestamp,
              lastSeenAt: timestamp,
              updatedAt: timestamp,
              lastSeenBuild: buildId,
            };
            summary.inserted++;
          }

          records.set(naturalKey, record);
          written.push(record);
        }

        next.set(variant, { records, partialFailure: state.partialFailure });
      }

      await this.persist(next);

      // Commit point: disk is updated, now publish in memory
      for (const [variant, state] of next) {
        this.variants.set(variant, state);
        let affirmedKeys = this.affirmedBy.get(variant);
        if (!affirmedKeys) {
          affirmedKeys = new Map();
          this.affirmedBy.set(variant, affirmedKeys);
        }
        for (const key of writes.get(variant)?.keys() ?? []) {
          affirmedKeys.set(key, stage);
        }
      }

      summary.outputFingerprint = fingerprint(
        written.map((record) => ({
          variant: record.variant,
          naturalKey: record.naturalKey,
          attributes: record.attributes,
        }))
      );
      return summary;
    });
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  private async load(): Promise<void> {
    for (const variant of VARIANT_NAMES) {
      const filePath = getRecordSetPath(this.dataDir, variant);
      let data: unknown;

      try {
        data = await readJsonIfExists(filePath);
      } catch (error) {
        throw new StoreError('read-failed', `Cannot read ${filePath}`, { cause: error });
      }

      if (data === null) {
        this.variants.set(variant, { records: new Map(), partialFailure: false });
        continue;
      }

      const parsed = RecordSetSchema.safeParse(migrateSchema(data, 'recordSet'));
      if (!parsed.success || parsed.data.variant !== variant) {
        throw new StoreError('read-failed', `Invalid record set in ${filePath}`, {
          cause: parsed.success ? undefined : parsed.error,
        });
      }

      this.variants.set(variant, {
        records: new Map(parsed.data.records.map((record) => [record.naturalKey, record])),
        partialFailure: parsed.data.partialFailure,
      });
    }
  }

  /**
   * Write every given variant to a temp file first, then rename them all
   * into place. A failure before the renames leaves disk untouched.
   */
  private async persist(next: Map<VariantName, VariantState>): Promise<void> {
    const staged: Array<{ filePath: string; tempPath: string }> = [];
    const updatedAt = this.now().toISOString();

    try {
      for (const [variant, state] of next) {
        const filePath = getRecordSetPath(this.dataDir, variant);
        const tempPath = tempPathFor(filePath);
        staged.push({ filePath, tempPath });

        const doc: RecordSet = {
          schemaVersion: SCHEMA_VERSIONS.recordSet,
          variant,
          updatedAt,
          partialFailure: state.partialFailure,
          records: [...state.records.values()].sort((a, b) =>
            compareKeys(a.naturalKey, b.naturalKey)
          ),
        };

        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(tempPath, JSON.stringify(doc, null, 2), 'utf-8');
      }
    } catch (error) {
      await Promise.all(staged.map(({ tempPath }) => fs.rm(tempPath, { force: true })));
      throw new StoreError('write-failed', `Failed to write record sets: ${messageOf(error)}`, {
        cause: error,
      });
    }

    try {
      for (const { tempPath, filePath } of staged) {
        await fs.rename(tempPath, filePath);
      }
    } catch (error) {
      throw new StoreError('write-failed', `Failed to commit record sets: ${messageOf(error)}`, {
        cause: error,
      });
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private resolveVariant(variant: string): VariantName {
    if (!isVariantName(variant)) {
      throw new StoreError('unknown-variant', `Unknown variant "${variant}"`);
    }
    return variant;
  }

  private stateOf(variant: VariantName): VariantState {
    let state = this.variants.get(variant);
    if (!state) {
      state = { records: new Map(), partialFailure: false };
      this.variants.set(variant, state);
    }
    return state;
  }

  private require(variant: VariantName, naturalKey: string): ContentRecord {
    const record = this.get(variant, naturalKey);
    if (!record) {
      throw new StoreError('not-found', `No ${variant} record "${naturalKey}"`);
    }
    return record;
  }

  private requireBuild(): string {
    if (this.buildId === null) {
      throw new StoreError('no-build', 'No build in progress; call startBuild() first');
    }
    return this.buildId;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
