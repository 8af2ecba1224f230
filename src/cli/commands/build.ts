/**
 * Build and Plan Commands
 *
 * `harvest build [targets...]` runs the incremental pipeline;
 * `harvest plan [targets...]` prints what a build would do without
 * running anything. Ctrl+C stops scheduling new stages and lets running
 * stages finish and commit.
 *
 * @module cli/commands/build
 */

import type { Command } from 'commander';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { BuildProgressDisplay } from '../formatters/progress.js';
import { formatBuildSummary, formatPlan } from '../formatters/build-summary.js';
import { resolveBuildDefaults } from '../../config/index.js';
import { runBuild } from '../../pipeline/build.js';
import { MAX_TIMEOUT_MS } from '../../schemas/common.js';
import {
  collectList,
  defaultStageFactory,
  loadStageGraph,
  parseInteger,
  runAction,
  type StageFactory,
} from './shared.js';

// ============================================================================
// Types
// ============================================================================

export interface BuildCommandOptions {
  /** Stages to rerun even when up to date */
  force?: string[];
  forceAll?: boolean;
  dryRun?: boolean;
  concurrency?: string;
  /** Global timeout in milliseconds */
  timeout?: string;
  /** true = whole cache; list = those stages' entries */
  clearCache?: string[] | boolean;
  /** Print the report as JSON */
  json?: boolean;
}

export interface BuildHandlerDependencies {
  createStages?: StageFactory;
  /** Cancels the build; defaults to SIGINT */
  signal?: AbortSignal;
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerBuildCommand(program: Command): void {
  program
    .command('build [targets...]')
    .description('Build stale stages (targets and everything they depend on)')
    .option('-f, --force <stages>', 'Rerun these stages (comma-separated, repeatable)', collectList)
    .option('-F, --force-all', 'Rerun every stage')
    .option('-n, --dry-run', 'Show what would run without running it')
    .option('-c, --concurrency <count>', 'Maximum stages running at once')
    .option('-t, --timeout <ms>', 'Stop starting new stages after this many milliseconds')
    .option('--clear-cache [stage]', 'Clear the cache (or one stage\'s entries) first', collectList)
    .option('--json', 'Print the build report as JSON')
    .action(async (targets: string[], options: BuildCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleBuild(targets, options, base));
    });
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan [targets...]')
    .description('Show which stages a build would run, skip or conditionally rerun')
    .option('-f, --force <stages>', 'Treat these stages as forced', collectList)
    .option('-F, --force-all', 'Treat every stage as forced')
    .option('--json', 'Print the plan as JSON')
    .action(async (targets: string[], options: BuildCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleBuild(targets, { ...options, dryRun: true }, base));
    });
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Run (or plan) a build and print its outcome.
 *
 * @returns Exit code: 0 success, 1 build failed, 130 cancelled
 * @throws UsageError or GraphError for bad flags and invalid stage sets
 */
export async function handleBuild(
  targets: string[],
  options: BuildCommandOptions,
  base: BaseCommand,
  dependencies: BuildHandlerDependencies = {}
): Promise<ExitCode> {
  const { config, stages } = await loadStageGraph(
    base.dataDir,
    dependencies.createStages ?? defaultStageFactory
  );
  const defaults = resolveBuildDefaults(config);

  const concurrency = options.concurrency
    ? parseInteger(options.concurrency, '--concurrency')
    : defaults.concurrency;
  const timeoutMs = options.timeout
    ? parseInteger(options.timeout, '--timeout', 1, MAX_TIMEOUT_MS)
    : defaults.timeoutMs;

  const dryRun = options.dryRun === true;
  const progress = new BuildProgressDisplay([], {
    quiet: base.isQuiet() || options.json === true || dryRun,
  });

  base.debug(`Data directory: ${base.dataDir}`);

  const controller = new AbortController();
  const onSigint = (): void => {
    base.warn('Cancelling build; running stages will finish');
    controller.abort();
  };
  const external = dependencies.signal;
  if (external) {
    if (external.aborted) controller.abort();
    external.addEventListener('abort', () => controller.abort(), { once: true });
  } else {
    process.once('SIGINT', onSigint);
  }

  try {
    const { report, exitCode } = await runBuild({
      dataDir: base.dataDir,
      stages,
      targets,
      force: options.force,
      forceAll: options.forceAll,
      dryRun,
      concurrency,
      timeoutMs,
      clearCache: options.clearCache,
      cacheTtlMs: defaults.cacheTtlMs,
      signal: controller.signal,
      logger: base.logger,
      callbacks: progress.callbacks(),
    });

    if (options.json) {
      base.json(dryRun ? report.plan : report);
    } else if (dryRun) {
      console.log(formatPlan(report.plan));
    } else if (!base.isQuiet() || exitCode !== EXIT_CODES.SUCCESS) {
      base.blank();
      console.log(formatBuildSummary(report));
    }

    return exitCode;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
