/**
 * Pipeline Type Definitions
 *
 * Core interfaces for the stage plugin contract, the execution context
 * handed to each stage, and the scheduler's options and callbacks.
 *
 * @module pipeline/types
 */

import type { RunStats, StageRun } from '../schemas/stage.js';
import type { BuildError, PlanEntry } from '../schemas/build-report.js';
import type { VariantName } from '../schemas/variants.js';
import type { StageCache } from '../cache/types.js';
import type { StageStore } from '../store/types.js';
import type { Result } from './result.js';
import type { StageError } from './errors.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything. Default for library use and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// Stage Descriptor & Plugin
// ============================================================================

/**
 * Static metadata of a stage
 */
export interface StageDescriptor {
  /** Unique snake_case name */
  name: string;

  /** Bump when the stage logic changes; forces a rerun and new cache keys */
  version: string;

  /** Upstream stage names */
  dependencies: readonly string[];

  /** Variants this stage is the single designated writer of */
  owns?: readonly VariantName[];

  /**
   * Refresh interval for stages that read external sources. The stage is
   * stale once its last success is older than this; 0 = every build.
   */
  maxAgeMs?: number;

  description?: string;
}

/**
 * A stage plugin: metadata plus its run function
 */
export interface Stage extends StageDescriptor {
  run(ctx: StageContext): Promise<Result<RunStats, StageError>>;
}

// ============================================================================
// Stage Context
// ============================================================================

/**
 * Runtime context passed to each stage during execution
 */
export interface StageContext {
  /** Build identifier (format: YYYYMMDD-HHMMSS-xxxx) */
  buildId: string;

  /** Name of the running stage */
  stage: string;

  /** Cache scoped to this stage and version */
  cache: StageCache;

  /** Committed records only; this stage's own writes are visible after commit */
  store: StageStore;

  logger: Logger;

  /** Aborted on build cancellation or timeout */
  signal: AbortSignal;

  /** Last successful run of this stage, if any */
  previousRun: StageRun | null;

  /** Base data directory (e.g., ~/.harvest) */
  dataDir: string;
}

// ============================================================================
// Scheduler
// ============================================================================

/**
 * Callbacks for stage lifecycle events
 */
export interface SchedulerCallbacks {
  /** Called when a stale stage starts running */
  onStageStart?: (stage: string) => void;
  /** Called when a stage ran and committed */
  onStageComplete?: (run: StageRun) => void;
  /** Called when a stage failed */
  onStageError?: (run: StageRun, error: Error) => void;
  /** Called for skipped-cached, blocked and cancelled stages */
  onStageSkip?: (run: StageRun) => void;
}

export interface RunOptions {
  buildId: string;

  /** Stages to rerun regardless of staleness */
  force?: readonly string[];

  /** Rerun every stage */
  forceAll?: boolean;

  /** Compute the plan without running anything */
  dryRun?: boolean;

  /** Maximum stages run at once (default: 3) */
  concurrency?: number;

  /** Stop scheduling new stages after this long */
  timeoutMs?: number;

  /** External cancellation */
  signal?: AbortSignal;
}

/**
 * Outcome of one scheduler pass
 */
export interface SchedulerResult {
  /** One run per stage, in topological order (empty for dry runs) */
  runs: StageRun[];
  plan: PlanEntry[];
  pruned: Record<string, number>;
  pruneSuppressed: VariantName[];
  /** Failed, blocked and cancelled stages plus pruning failures */
  errors: BuildError[];
  cancelled: boolean;
}
