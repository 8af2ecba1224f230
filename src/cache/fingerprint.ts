/**
 * Deterministic fingerprints
 *
 * Cache keys and stage input/output fingerprints are SHA-256 digests of a
 * canonical JSON serialization (object keys sorted at every depth), so two
 * structurally equal values always hash the same regardless of key order.
 *
 * @module cache/fingerprint
 */

import { createHash } from 'node:crypto';

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Serialize a value to JSON with object keys sorted
 *
 * @example
 * ```typescript
 * canonicalJson({ b: 1, a: [{ d: 2, c: 3 }] });
 * // '{"a":[{"c":3,"d":2}],"b":1}'
 * ```
 */
export function canonicalJson(value: unknown): string {
  const json = JSON.stringify(value, (_key, current: unknown) => {
    if (current !== null && typeof current === 'object' && !Array.isArray(current)) {
      return Object.fromEntries(
        Object.entries(current).sort(([a], [b]) => compareKeys(a, b))
      );
    }
    return current;
  });
  // JSON.stringify returns undefined for undefined and functions
  return json ?? 'null';
}

/**
 * SHA-256 hex digest of a string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf-8').digest('hex');
}

/**
 * Fingerprint any JSON-compatible value
 *
 * @example
 * ```typescript
 * fingerprint({ stage: 'fetch_feeds', version: '2', request: { url } });
 * ```
 */
export function fingerprint(value: unknown): string {
  return sha256(canonicalJson(value));
}

/**
 * Cache key for a stage request. Including the stage version means a
 * version bump addresses fresh entries without explicit invalidation.
 */
export function cacheKey(stage: string, version: string, request: unknown): string {
  return fingerprint({ stage, version, request });
}
