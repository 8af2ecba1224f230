/**
 * Pipeline Orchestration
 *
 * Stage plugin contract, dependency graph, incremental scheduler and the
 * build entry point.
 *
 * @module pipeline
 */

export {
  silentLogger,
  type Logger,
  type Stage,
  type StageDescriptor,
  type StageContext,
  type SchedulerCallbacks,
  type RunOptions,
  type SchedulerResult,
} from './types.js';

export { ok, err, type Result } from './result.js';

export {
  GraphError,
  DuplicateStageError,
  UnknownDependencyError,
  UnknownStageError,
  CycleDetectedError,
  OwnershipConflictError,
  StageError,
  toStageErrorKind,
  errorMessage,
  type GraphErrorCode,
  type StageFailureKind,
} from './errors.js';

export { DependencyGraph } from './graph.js';
export { ConcurrencyLimiter } from './concurrency.js';
export { StageHistoryStore } from './history.js';
export {
  assessStaleness,
  computeInputFingerprint,
  type StalenessInput,
  type StalenessVerdict,
} from './staleness.js';
export { generateBuildId } from './build-id.js';
export { Scheduler, type SchedulerDependencies } from './scheduler.js';
export {
  runBuild,
  exitCodeFor,
  EXIT_CODES,
  type BuildOptions,
  type BuildOutcome,
  type ExitCode,
} from './build.js';
