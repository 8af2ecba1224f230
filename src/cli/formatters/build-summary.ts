/**
 * Build Summary Formatters
 *
 * CLI output for build reports, dry-run plans and per-stage errors.
 *
 * @module cli/formatters/build-summary
 */

import chalk from 'chalk';
import type { BuildError, BuildReport, PlanEntry } from '../../schemas/build-report.js';
import type { StageOutcome } from '../../schemas/stage.js';
import { formatDuration } from './progress.js';

/**
 * Format a complete build summary.
 *
 * @example
 * ```
 * === Build Failed ===
 * Build:    20260301-100000-a1b2
 * Status:   FAILED
 * Duration: 2.4s
 * Stages:   1 ran, 1 cached, 1 failed, 1 blocked
 *
 * Kept last-known-good: posting
 *
 * Errors:
 *   fetch_feeds [fetch] Feed "acme" failed: HTTP 503 from https://jobs.example.com/feed.json
 *   normalize_postings [blocked] Upstream stage "fetch_feeds" failed
 * ```
 */
export function formatBuildSummary(report: BuildReport): string {
  const lines: string[] = [];

  const title = report.cancelled
    ? 'Build Cancelled'
    : report.success
      ? 'Build Complete'
      : 'Build Failed';
  lines.push(chalk.bold(`=== ${title} ===`));
  lines.push(`Build:    ${chalk.cyan(report.buildId)}`);

  const status = report.cancelled
    ? chalk.yellow('CANCELLED')
    : report.success
      ? chalk.green('SUCCESS')
      : chalk.red('FAILED');
  lines.push(`Status:   ${status}`);
  lines.push(`Duration: ${formatDuration(report.durationMs)}`);
  lines.push(`Stages:   ${formatOutcomeCounts(report.stages.map((run) => run.outcome))}`);

  const pruned = Object.entries(report.pruned)
    .filter(([, count]) => count > 0)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (pruned.length > 0) {
    lines.push('');
    lines.push('Pruned:');
    for (const [variant, count] of pruned) {
      lines.push(`  ${variant}: ${count}`);
    }
  }

  if (report.pruneSuppressed.length > 0) {
    lines.push('');
    lines.push(chalk.yellow(`Kept last-known-good: ${report.pruneSuppressed.join(', ')}`));
  }

  if (report.errors.length > 0) {
    lines.push('');
    lines.push(formatErrorSummary(report.errors));
  }

  return lines.join('\n');
}

const OUTCOME_LABELS: ReadonlyArray<[StageOutcome, string]> = [
  ['success', 'ran'],
  ['skipped-cached', 'cached'],
  ['failed', 'failed'],
  ['blocked', 'blocked'],
  ['cancelled', 'cancelled'],
];

/**
 * Count outcomes, listing only the ones that occurred (ran first)
 */
export function formatOutcomeCounts(outcomes: readonly StageOutcome[]): string {
  return OUTCOME_LABELS.map(([outcome, label]) => ({
    label,
    count: outcomes.filter((o) => o === outcome).length,
  }))
    .filter(({ label, count }) => count > 0 || label === 'ran')
    .map(({ label, count }) => `${count} ${label}`)
    .join(', ');
}

/**
 * One line per error, with its stage and kind
 */
export function formatErrorSummary(errors: readonly BuildError[]): string {
  const lines = [chalk.red('Errors:')];
  for (const error of errors) {
    lines.push(`  ${error.stage} ${chalk.dim(`[${error.kind}]`)} ${error.message}`);
  }
  return lines.join('\n');
}

/**
 * Format a dry-run plan.
 *
 * @example
 * ```
 * === Build Plan ===
 *   run          fetch_feeds         max-age-expired
 *   conditional  normalize_postings  up-to-date
 *   conditional  publish_site_data   up-to-date
 *
 * 1 to run, 2 conditional, 0 up to date
 * ```
 */
export function formatPlan(plan: readonly PlanEntry[]): string {
  const lines = [chalk.bold('=== Build Plan ===')];
  const width = Math.max(0, ...plan.map((entry) => entry.stage.length));

  for (const entry of plan) {
    const decision = entry.decision.padEnd(11);
    const colored =
      entry.decision === 'run'
        ? chalk.green(decision)
        : entry.decision === 'conditional'
          ? chalk.yellow(decision)
          : chalk.dim(decision);
    lines.push(`  ${colored}  ${entry.stage.padEnd(width)}  ${chalk.dim(entry.reason)}`);
  }

  const count = (decision: PlanEntry['decision']) =>
    plan.filter((entry) => entry.decision === decision).length;
  lines.push('');
  lines.push(
    `${count('run')} to run, ${count('conditional')} conditional, ${count('skip')} up to date`
  );

  return lines.join('\n');
}
