/**
 * Build entry point
 *
 * Assembles the graph, opens the cache, store and history under the data
 * directory, runs the scheduler once and turns the result into a
 * BuildReport and a process exit code.
 *
 * @module pipeline/build
 */

import { SCHEMA_VERSIONS } from '../schemas/versions.js';
import type { BuildReport } from '../schemas/build-report.js';
import { FileCache } from '../cache/file-cache.js';
import { ContentStore } from '../store/content-store.js';
import { saveBuildReport } from '../storage/builds.js';
import { generateBuildId } from './build-id.js';
import { DependencyGraph } from './graph.js';
import { StageHistoryStore } from './history.js';
import { Scheduler, assertRunOptions } from './scheduler.js';
import { silentLogger, type Logger, type SchedulerCallbacks, type Stage } from './types.js';

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  BUILD_FAILED: 1,
  USAGE_ERROR: 2,
  NOT_FOUND: 3,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface BuildOptions {
  dataDir: string;
  stages: readonly Stage[];
  /** Build only these stages and what they depend on */
  targets?: readonly string[];
  force?: readonly string[];
  forceAll?: boolean;
  dryRun?: boolean;
  concurrency?: number;
  timeoutMs?: number;
  /** true clears the whole cache; a list evicts those stages' entries */
  clearCache?: boolean | readonly string[];
  /** Default TTL for cache entries; null = no expiry */
  cacheTtlMs?: number | null;
  signal?: AbortSignal;
  logger?: Logger;
  callbacks?: SchedulerCallbacks;
  now?: () => Date;
  buildId?: string;
}

export interface BuildOutcome {
  report: BuildReport;
  exitCode: ExitCode;
}

/**
 * Run one build.
 *
 * @throws GraphError when the stage set is invalid (nothing runs)
 * @throws RangeError for a malformed build id or an out-of-range timeout
 *
 * @example
 * ```typescript
 * const { report, exitCode } = await runBuild({
 *   dataDir: getDataDir(),
 *   stages: createDefaultStages(config),
 *   force: ['fetch_feeds'],
 * });
 * ```
 */
export async function runBuild(options: BuildOptions): Promise<BuildOutcome> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const buildId = options.buildId ?? generateBuildId(startedAt);
  assertRunOptions({ buildId, timeoutMs: options.timeoutMs });

  const fullGraph = new DependencyGraph<Stage>().registerAll(options.stages).validate();
  const graph =
    options.targets && options.targets.length > 0 ? fullGraph.select(options.targets) : fullGraph;

  const cache = new FileCache(options.dataDir, {
    logger,
    now,
    defaultTtlMs: options.cacheTtlMs ?? null,
  });

  if (!options.dryRun) {
    if (options.clearCache === true) {
      const removed = await cache.clear();
      logger.info(`Cleared ${removed} cache entries`);
    } else if (Array.isArray(options.clearCache)) {
      for (const stage of options.clearCache) {
        fullGraph.require(stage);
        const removed = await cache.evictTag(stage);
        logger.info(`Evicted ${removed} cache entries of ${stage}`);
      }
    }
  }

  const store = await ContentStore.open(options.dataDir, { logger, now });
  const history = new StageHistoryStore(options.dataDir);
  const scheduler = new Scheduler({ cache, store, history, dataDir: options.dataDir, logger, now });
  if (options.callbacks) {
    scheduler.setCallbacks(options.callbacks);
  }

  logger.debug(`Build ${buildId}: ${graph.topologicalOrder().join(' -> ')}`);

  const result = await scheduler.run(graph, {
    buildId,
    force: options.force,
    forceAll: options.forceAll,
    dryRun: options.dryRun,
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs,
    signal: options.signal,
  });

  const completedAt = now();
  const dryRun = options.dryRun === true;
  const success =
    dryRun ||
    (!result.cancelled &&
      result.errors.length === 0 &&
      result.runs.every((run) => run.outcome === 'success' || run.outcome === 'skipped-cached'));

  const report: BuildReport = {
    schemaVersion: SCHEMA_VERSIONS.buildReport,
    buildId,
    startedAt: startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
    durationMs: Math.max(0, completedAt.getTime() - startedAt.getTime()),
    success,
    dryRun,
    cancelled: result.cancelled,
    stages: result.runs,
    errors: result.errors,
    pruned: result.pruned,
    pruneSuppressed: result.pruneSuppressed,
    plan: result.plan,
  };

  if (!dryRun) {
    await saveBuildReport(options.dataDir, report);
  }

  return { report, exitCode: exitCodeFor(report) };
}

export function exitCodeFor(report: BuildReport): ExitCode {
  if (report.cancelled) {
    return EXIT_CODES.CANCELLED;
  }
  return report.success ? EXIT_CODES.SUCCESS : EXIT_CODES.BUILD_FAILED;
}
