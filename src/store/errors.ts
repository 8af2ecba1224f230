/**
 * @module store/errors
 */

export type StoreErrorCode =
  | 'unknown-variant'
  | 'invalid-attributes'
  | 'not-found'
  | 'ownership-conflict'
  | 'no-build'
  | 'transaction-closed'
  | 'read-failed'
  | 'write-failed';

/**
 * Content store failure. Fails the commit of the stage that caused it;
 * the store itself is left unchanged.
 */
export class StoreError extends Error {
  readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
  }
}
