/**
 * Content-addressed fetch cache
 *
 * @module cache
 */

export { FileCache, type FileCacheOptions } from './file-cache.js';
export { scopeCache } from './scoped.js';
export { CacheError, type CacheOperation } from './errors.js';
export { canonicalJson, sha256, fingerprint, cacheKey } from './fingerprint.js';
export type {
  Cache,
  CacheHit,
  CacheMiss,
  CacheLookup,
  CachePutOptions,
  CacheStats,
  CachedResult,
  FetchedPayload,
  StageCache,
} from './types.js';
