/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  BuildProgressDisplay,
  createSpinner,
  formatDuration,
  type StageStatus,
  type StageDisplay,
  type SpinnerOptions,
  type BuildProgressOptions,
} from './progress.js';

// Build summary formatters
export {
  formatBuildSummary,
  formatOutcomeCounts,
  formatErrorSummary,
  formatPlan,
} from './build-summary.js';
