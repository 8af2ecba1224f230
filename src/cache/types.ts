/**
 * Cache Type Definitions
 *
 * @module cache/types
 */

import type { CacheEntry } from '../schemas/cache.js';

export interface CacheHit {
  hit: true;
  entry: CacheEntry;
}

export interface CacheMiss {
  hit: false;
  key: string;
}

export type CacheLookup = CacheHit | CacheMiss;

export interface CachePutOptions {
  /** Time to live; null or undefined = no expiry */
  ttlMs?: number | null;
  contentType?: string;
  /** Group for bulk eviction, normally the writing stage */
  tag?: string;
}

/**
 * What a fetch function hands back to `cached()`
 */
export interface FetchedPayload {
  payload: string;
  contentType?: string;
}

export interface CachedResult {
  payload: string;
  contentType: string;
  /** true when served from the cache */
  hit: boolean;
}

export interface CacheStats {
  entries: number;
  totalBytes: number;
  expired: number;
  byTag: Record<string, number>;
}

/**
 * Content-addressed store of fetched payloads
 */
export interface Cache {
  get(key: string): Promise<CacheLookup>;
  put(key: string, payload: string, options?: CachePutOptions): Promise<void>;
  invalidate(key: string): Promise<void>;
  /** Remove every entry with the tag; returns the number removed */
  evictTag(tag: string): Promise<number>;
  clear(): Promise<number>;
  stats(): Promise<CacheStats>;
  /** Remove expired entries; returns the number removed */
  prune(): Promise<number>;
  /** get, else fetch and put */
  cached(
    key: string,
    fetch: () => Promise<FetchedPayload>,
    options?: CachePutOptions
  ): Promise<CachedResult>;
}

/**
 * Cache handle given to a stage. Requests are arbitrary JSON values and are
 * keyed with the stage name and version; entries are tagged with the stage.
 */
export interface StageCache {
  keyFor(request: unknown): string;
  get(request: unknown): Promise<CacheLookup>;
  put(request: unknown, payload: string, options?: Omit<CachePutOptions, 'tag'>): Promise<void>;
  invalidate(request: unknown): Promise<void>;
  cached(
    request: unknown,
    fetch: () => Promise<FetchedPayload>,
    options?: Omit<CachePutOptions, 'tag'>
  ): Promise<CachedResult>;
}
