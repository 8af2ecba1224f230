/**
 * Stage-scoped cache handle
 *
 * @module cache/scoped
 */

import { cacheKey } from './fingerprint.js';
import type { Cache, StageCache } from './types.js';

/**
 * Bind a cache to one stage: keys include the stage name and version, and
 * every entry is tagged with the stage for bulk eviction.
 */
export function scopeCache(cache: Cache, stage: string, version: string): StageCache {
  const keyFor = (request: unknown): string => cacheKey(stage, version, request);

  return {
    keyFor,
    get: (request) => cache.get(keyFor(request)),
    put: (request, payload, options = {}) =>
      cache.put(keyFor(request), payload, { ...options, tag: stage }),
    invalidate: (request) => cache.invalidate(keyFor(request)),
    cached: (request, fetch, options = {}) =>
      cache.cached(keyFor(request), fetch, { ...options, tag: stage }),
  };
}
