/**
 * @module cache/errors
 */

export type CacheOperation = 'read' | 'write' | 'delete' | 'scan';

/**
 * Storage failure inside the cache. Never fatal: reads degrade to a miss,
 * writes and deletes to a no-op.
 */
export class CacheError extends Error {
  readonly operation: CacheOperation;
  readonly key: string | null;

  constructor(
    operation: CacheOperation,
    key: string | null,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CacheError';
    this.operation = operation;
    this.key = key;
  }
}
