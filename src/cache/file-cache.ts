/**
 * File-backed content-addressed cache
 *
 * Entries live at <dataDir>/cache/<key[0..2]>/<key>.json. Puts are atomic
 * (temp file + rename) and serialized per key; unrelated keys proceed in
 * parallel. Any storage failure is reported as a CacheError through the
 * logger and then treated as a miss (reads) or a no-op (writes).
 *
 * @module cache/file-cache
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CacheEntrySchema, type CacheEntry } from '../schemas/cache.js';
import { FingerprintSchema } from '../schemas/common.js';
import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import { atomicWriteJson, migrateSchema } from '../schemas/migrations/index.js';
import { isErrnoException, readJsonIfExists } from '../storage/atomic.js';
import { getCacheDir, getCacheEntryPath } from '../storage/paths.js';
import { KeyedLock } from '../storage/keyed-lock.js';
import { silentLogger, type Logger } from '../pipeline/types.js';
import { CacheError, type CacheOperation } from './errors.js';
import type {
  Cache,
  CacheLookup,
  CachePutOptions,
  CacheStats,
  CachedResult,
  FetchedPayload,
} from './types.js';

const ENTRY_FILE_PATTERN = /^[a-f0-9]{64}\.json$/;

export interface FileCacheOptions {
  logger?: Logger;
  /** Clock used for fetchedAt and expiry checks */
  now?: () => Date;
  /** TTL applied when a put gives none; null = no expiry */
  defaultTtlMs?: number | null;
}

interface ScannedEntry {
  key: string;
  filePath: string;
  /** null when the file could not be parsed */
  entry: CacheEntry | null;
}

export class FileCache implements Cache {
  private readonly lock = new KeyedLock();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly defaultTtlMs: number | null;

  constructor(
    private readonly dataDir: string,
    options: FileCacheOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.defaultTtlMs = options.defaultTtlMs ?? null;
  }

  // ==========================================================================
  // Point operations
  // ==========================================================================

  async get(key: string): Promise<CacheLookup> {
    try {
      const filePath = this.entryPath(key, 'read');
      const entry = await this.readEntry(key, filePath);

      if (!entry || this.isExpired(entry)) {
        return { hit: false, key };
      }
      return { hit: true, entry };
    } catch (error) {
      this.report(toCacheError('read', key, error));
      return { hit: false, key };
    }
  }

  async put(key: string, payload: string, options: CachePutOptions = {}): Promise<void> {
    try {
      const filePath = this.entryPath(key, 'write');
      const fetchedAt = this.now();
      const ttlMs = options.ttlMs === undefined ? this.defaultTtlMs : options.ttlMs;

      const entry: CacheEntry = {
        schemaVersion: SCHEMA_VERSIONS.cacheEntry,
        key,
        payload,
        contentType: options.contentType ?? 'application/octet-stream',
        sizeBytes: Buffer.byteLength(payload, 'utf-8'),
        fetchedAt: fetchedAt.toISOString(),
        expiresAt: ttlMs === null ? null : new Date(fetchedAt.getTime() + ttlMs).toISOString(),
        tag: options.tag ?? null,
      };

      await this.lock.run(key, () => atomicWriteJson(filePath, entry));
    } catch (error) {
      this.report(toCacheError('write', key, error));
    }
  }

  async invalidate(key: string): Promise<void> {
    try {
      const filePath = this.entryPath(key, 'delete');
      await this.lock.run(key, () => fs.rm(filePath, { force: true }));
    } catch (error) {
      this.report(toCacheError('delete', key, error));
    }
  }

  async cached(
    key: string,
    fetch: () => Promise<FetchedPayload>,
    options: CachePutOptions = {}
  ): Promise<CachedResult> {
    const lookup = await this.get(key);
    if (lookup.hit) {
      return {
        payload: lookup.entry.payload,
        contentType: lookup.entry.contentType,
        hit: true,
      };
    }

    // Fetch failures belong to the caller
    const fetched = await fetch();
    const contentType = fetched.contentType ?? options.contentType ?? 'application/octet-stream';
    await this.put(key, fetched.payload, { ...options, contentType });

    return { payload: fetched.payload, contentType, hit: false };
  }

  // ==========================================================================
  // Bulk operations
  // ==========================================================================

  async evictTag(tag: string): Promise<number> {
    return this.removeWhere((scanned) => scanned.entry?.tag === tag);
  }

  async prune(): Promise<number> {
    return this.removeWhere((scanned) => scanned.entry === null || this.isExpired(scanned.entry));
  }

  async clear(): Promise<number> {
    try {
      const entries = await this.scan();
      await fs.rm(getCacheDir(this.dataDir), { recursive: true, force: true });
      return entries.length;
    } catch (error) {
      this.report(toCacheError('delete', null, error));
      return 0;
    }
  }

  async stats(): Promise<CacheStats> {
    const stats: CacheStats = { entries: 0, totalBytes: 0, expired: 0, byTag: {} };

    try {
      for (const { entry } of await this.scan()) {
        if (!entry) continue;
        stats.entries++;
        stats.totalBytes += entry.sizeBytes;
        if (this.isExpired(entry)) {
          stats.expired++;
        }
        const tag = entry.tag ?? 'untagged';
        stats.byTag[tag] = (stats.byTag[tag] ?? 0) + 1;
      }
    } catch (error) {
      this.report(toCacheError('scan', null, error));
    }

    return stats;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private entryPath(key: string, operation: CacheOperation): string {
    if (!FingerprintSchema.safeParse(key).success) {
      throw new CacheError(operation, key, `Invalid cache key "${key}"`);
    }
    return getCacheEntryPath(this.dataDir, key);
  }

  private async readEntry(key: string, filePath: string): Promise<CacheEntry | null> {
    const data = await readJsonIfExists(filePath);
    if (data === null) {
      return null;
    }

    const parsed = CacheEntrySchema.safeParse(migrateSchema(data, 'cacheEntry'));
    if (!parsed.success || parsed.data.key !== key) {
      throw new CacheError('read', key, `Corrupt cache entry at ${filePath}`);
    }
    return parsed.data;
  }

  private isExpired(entry: CacheEntry): boolean {
    if (entry.expiresAt === null) {
      return false;
    }
    return Date.parse(entry.expiresAt) <= this.now().getTime();
  }

  private async scan(): Promise<ScannedEntry[]> {
    const cacheDir = getCacheDir(this.dataDir);
    let shards: string[];

    try {
      shards = await fs.readdir(cacheDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const scanned: ScannedEntry[] = [];
    for (const shard of shards.sort()) {
      const shardDir = path.join(cacheDir, shard);
      const files = await fs.readdir(shardDir);

      for (const file of files.sort()) {
        if (!ENTRY_FILE_PATTERN.test(file)) continue;
        const key = file.slice(0, -'.json'.length);
        const filePath = path.join(shardDir, file);

        try {
          scanned.push({ key, filePath, entry: await this.readEntry(key, filePath) });
        } catch (error) {
          this.report(toCacheError('read', key, error));
          scanned.push({ key, filePath, entry: null });
        }
      }
    }
    return scanned;
  }

  private async removeWhere(predicate: (scanned: ScannedEntry) => boolean): Promise<number> {
    let removed = 0;

    try {
      for (const scanned of await this.scan()) {
        if (!predicate(scanned)) continue;
        await this.lock.run(scanned.key, () => fs.rm(scanned.filePath, { force: true }));
        removed++;
      }
    } catch (error) {
      this.report(toCacheError('delete', null, error));
    }

    return removed;
  }

  private report(error: CacheError): void {
    const target = error.key ? ` for ${error.key.slice(0, 12)}` : '';
    this.logger.warn(`Cache ${error.operation} failed${target}: ${error.message}`);
  }
}

function toCacheError(operation: CacheOperation, key: string | null, error: unknown): CacheError {
  if (error instanceof CacheError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CacheError(operation, key, message, { cause: error });
}
