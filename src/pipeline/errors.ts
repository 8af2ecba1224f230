/**
 * Pipeline Error Taxonomy
 *
 * - GraphError: invalid stage set, fatal before any stage runs
 * - StageError: one stage failed; recorded, dependents blocked
 *
 * Store and cache failures live with their modules (StoreError, CacheError)
 * and are mapped to stage error kinds by the scheduler.
 *
 * @module pipeline/errors
 */

import type { StageErrorKind } from '../schemas/stage.js';
import type { VariantName } from '../schemas/variants.js';
import { StoreError } from '../store/errors.js';

// ============================================================================
// Graph Errors
// ============================================================================

export type GraphErrorCode =
  | 'DuplicateStage'
  | 'InvalidStage'
  | 'UnknownDependency'
  | 'UnknownStage'
  | 'CycleDetected'
  | 'OwnershipConflict'
  | 'GraphFrozen'
  | 'GraphNotValidated';

export class GraphError extends Error {
  readonly code: GraphErrorCode;

  constructor(code: GraphErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GraphError';
    this.code = code;
  }
}

export class DuplicateStageError extends GraphError {
  constructor(readonly stage: string) {
    super('DuplicateStage', `Stage "${stage}" is already registered`);
  }
}

export class UnknownDependencyError extends GraphError {
  constructor(
    readonly stage: string,
    readonly dependency: string
  ) {
    super(
      'UnknownDependency',
      `Stage "${stage}" depends on unregistered stage "${dependency}"`
    );
  }
}

export class UnknownStageError extends GraphError {
  constructor(readonly stage: string) {
    super('UnknownStage', `Unknown stage "${stage}"`);
  }
}

export class CycleDetectedError extends GraphError {
  /** Stage names along the cycle; first and last are the same stage */
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super('CycleDetected', `Cycle detected: ${cycle.join(' -> ')}`);
    this.cycle = cycle;
  }
}

export class OwnershipConflictError extends GraphError {
  constructor(
    readonly variant: VariantName,
    readonly owners: [string, string]
  ) {
    super(
      'OwnershipConflict',
      `Variant "${variant}" is owned by both "${owners[0]}" and "${owners[1]}"`
    );
  }
}

// ============================================================================
// Stage Errors
// ============================================================================

/**
 * Failure kinds a stage can report itself
 */
export type StageFailureKind = Extract<
  StageErrorKind,
  'fetch' | 'transform' | 'ownership-conflict' | 'validation'
>;

/**
 * Failure returned by a stage as `err(new StageError(...))`
 */
export class StageError extends Error {
  readonly kind: StageFailureKind;

  constructor(kind: StageFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StageError';
    this.kind = kind;
  }
}

/**
 * Classify anything a stage threw or returned into a recorded error kind
 */
export function toStageErrorKind(error: unknown): StageErrorKind {
  if (error instanceof StageError) {
    return error.kind;
  }
  if (error instanceof StoreError) {
    switch (error.code) {
      case 'ownership-conflict':
        return 'ownership-conflict';
      case 'unknown-variant':
      case 'invalid-attributes':
      case 'not-found':
        return 'validation';
      default:
        return 'store';
    }
  }
  return 'transform';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
