/**
 * Incremental Scheduler
 *
 * Walks a validated dependency graph level by level. Stages of one level
 * run concurrently through a ConcurrencyLimiter; a level starts only after
 * every stage of the previous level has committed. Each stage is either
 * skipped (not stale), run and committed, or marked failed, blocked or
 * cancelled. The walk always covers the whole graph.
 *
 * A variant is pruned of records the build did not affirm as soon as its
 * owner commits, so dependents read the refreshed set. After the walk,
 * variants whose owner failed, was blocked or was cancelled keep their data
 * and are flagged as partial.
 *
 * @module pipeline/scheduler
 */

import { BuildIdSchema, MAX_TIMEOUT_MS } from '../schemas/common.js';
import type { BuildError, PlanDecision, PlanEntry } from '../schemas/build-report.js';
import type { RunStats, StageRun, StageRunError } from '../schemas/stage.js';
import type { VariantName } from '../schemas/variants.js';
import type { Cache } from '../cache/types.js';
import { scopeCache } from '../cache/scoped.js';
import type { ContentStore } from '../store/content-store.js';
import type { StageStore, StoreTransaction } from '../store/types.js';
import { ConcurrencyLimiter } from './concurrency.js';
import { errorMessage, toStageErrorKind } from './errors.js';
import type { DependencyGraph } from './graph.js';
import type { StageHistoryStore } from './history.js';
import { assessStaleness, computeInputFingerprint } from './staleness.js';
import {
  silentLogger,
  type Logger,
  type RunOptions,
  type SchedulerCallbacks,
  type SchedulerResult,
  type Stage,
  type StageContext,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface SchedulerDependencies {
  cache: Cache;
  store: ContentStore;
  history: StageHistoryStore;
  dataDir: string;
  logger?: Logger;
  /** Clock for run timestamps and max-age checks */
  now?: () => Date;
}

/**
 * State shared by the stages of one build
 */
interface BuildState {
  options: RunOptions;
  signal: AbortSignal;
  runs: Map<string, StageRun>;
  outputs: Map<string, string | null>;
  lastSuccess: Map<string, StageRun | null>;
  /** Records pruned per variant */
  pruned: Record<string, number>;
  pruneErrors: BuildError[];
}

export const DEFAULT_CONCURRENCY = 3;

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ============================================================================
// Scheduler
// ============================================================================

/**
 * @example
 * ```typescript
 * const scheduler = new Scheduler({ cache, store, history, dataDir });
 * scheduler.setCallbacks({ onStageStart: (name) => spinner.start(name) });
 *
 * const result = await scheduler.run(graph, { buildId, force: ['fetch_feeds'] });
 * ```
 */
export class Scheduler {
  private callbacks: SchedulerCallbacks = {};
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: SchedulerDependencies) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Set event callbacks for stage lifecycle.
   */
  setCallbacks(callbacks: SchedulerCallbacks): void {
    this.callbacks = callbacks;
  }

  /**
   * Run (or, with dryRun, plan) one build over the graph.
   *
   * @throws GraphError if the graph is invalid or a forced stage is unknown
   * @throws RangeError for a malformed build id or an out-of-range timeout
   */
  async run(graph: DependencyGraph<Stage>, options: RunOptions): Promise<SchedulerResult> {
    assertRunOptions(options);
    graph.validate();
    for (const name of options.force ?? []) {
      graph.require(name);
    }

    const order = graph.topologicalOrder();
    const lastSuccess = new Map<string, StageRun | null>();
    for (const name of order) {
      lastSuccess.set(name, await this.deps.history.lastSuccess(name));
    }

    if (options.dryRun) {
      return {
        runs: [],
        plan: this.plan(graph, lastSuccess, options),
        pruned: {},
        pruneSuppressed: [],
        errors: [],
        cancelled: false,
      };
    }

    this.deps.store.setOwners(graph.ownership());
    this.deps.store.startBuild(options.buildId);

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }

    let timer: NodeJS.Timeout | undefined;
    if (options.timeoutMs !== undefined) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => {
        this.logger.warn(`Build timed out after ${timeoutMs}ms; no new stages will start`);
        controller.abort();
      }, timeoutMs);
    }

    const state: BuildState = {
      options,
      signal: controller.signal,
      runs: new Map(),
      outputs: new Map(),
      lastSuccess,
      pruned: {},
      pruneErrors: [],
    };
    const limiter = new ConcurrencyLimiter(options.concurrency ?? DEFAULT_CONCURRENCY);

    try {
      for (const level of graph.levels()) {
        await Promise.all(
          level.map((name) =>
            limiter.run(async () => {
              const run = await this.processStage(graph.require(name), state);
              state.runs.set(name, run);
              state.outputs.set(name, run.outputFingerprint);
              await this.record(run);
            })
          )
        );
      }
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      options.signal?.removeEventListener('abort', onAbort);
    }

    const runs = order.flatMap((name) => {
      const run = state.runs.get(name);
      return run ? [run] : [];
    });
    const errors: BuildError[] = runs.flatMap((run) =>
      run.error
        ? [
            {
              stage: run.stage,
              kind: run.error.kind,
              message: run.error.message,
              inputFingerprint: run.inputFingerprint,
            },
          ]
        : []
    );
    errors.push(...state.pruneErrors);
    const suppressed = await this.settleVariants(graph, state.runs, errors);

    return {
      runs,
      plan: [],
      pruned: state.pruned,
      pruneSuppressed: suppressed,
      errors,
      cancelled: controller.signal.aborted,
    };
  }

  // ==========================================================================
  // Per-stage decisions
  // ==========================================================================

  private async processStage(stage: Stage, state: BuildState): Promise<StageRun> {
    const startedAt = this.now();
    const upstream = stage.dependencies.flatMap((name) => {
      const run = state.runs.get(name);
      return run ? [run] : [];
    });
    const inputFingerprint = computeInputFingerprint(stage, state.outputs);
    const lastSuccess = state.lastSuccess.get(stage.name) ?? null;

    const unfinished = upstream.find((run) => run.outcome === 'failed' || run.outcome === 'blocked');
    if (unfinished) {
      const run = this.createRun(stage, state, startedAt, inputFingerprint, {
        outcome: 'blocked',
        error: {
          kind: 'blocked',
          message: `Upstream stage "${unfinished.stage}" ${unfinished.outcome}`,
        },
      });
      this.logger.warn(`Stage ${stage.name} blocked by ${unfinished.stage}`);
      this.notify('onStageSkip', () => this.callbacks.onStageSkip?.(run));
      return run;
    }

    if (state.signal.aborted || upstream.some((run) => run.outcome === 'cancelled')) {
      const run = this.createRun(stage, state, startedAt, inputFingerprint, {
        outcome: 'cancelled',
        error: { kind: 'cancelled', message: 'Build cancelled before the stage started' },
      });
      this.notify('onStageSkip', () => this.callbacks.onStageSkip?.(run));
      return run;
    }

    const forced =
      state.options.forceAll === true || (state.options.force ?? []).includes(stage.name);
    const verdict = assessStaleness({
      stage,
      lastSuccess,
      inputFingerprint,
      forced,
      now: startedAt,
    });

    if (!verdict.stale) {
      const run = this.createRun(stage, state, startedAt, inputFingerprint, {
        outcome: 'skipped-cached',
        outputFingerprint: lastSuccess?.outputFingerprint ?? null,
      });
      this.logger.debug(`Stage ${stage.name} is up to date`);
      this.notify('onStageSkip', () => this.callbacks.onStageSkip?.(run));
      return run;
    }

    this.logger.debug(`Running ${stage.name} (${verdict.reason})`);
    return this.execute(stage, state, startedAt, inputFingerprint, lastSuccess);
  }

  private async execute(
    stage: Stage,
    state: BuildState,
    startedAt: Date,
    inputFingerprint: string,
    lastSuccess: StageRun | null
  ): Promise<StageRun> {
    this.notify('onStageStart', () => this.callbacks.onStageStart?.(stage.name));

    const tx = this.deps.store.begin(stage.name);
    const ctx: StageContext = {
      buildId: state.options.buildId,
      stage: stage.name,
      cache: scopeCache(this.deps.cache, stage.name, stage.version),
      store: this.storeView(tx),
      logger: this.logger,
      signal: state.signal,
      previousRun: lastSuccess,
      dataDir: this.deps.dataDir,
    };

    let failure: unknown = null;
    let completed: StageRun | null = null;
    try {
      const result = await stage.run(ctx);

      if (result.ok) {
        const summary = await tx.commit();
        for (const variant of [...(stage.owns ?? [])].sort()) {
          await this.pruneVariant(variant, stage.name, state);
        }
        const stats: RunStats = {
          ...result.value,
          recordsInserted: summary.inserted,
          recordsUpdated: summary.updated,
          recordsUnchanged: summary.unchanged,
          recordsAffirmed: summary.affirmed,
        };
        completed = this.createRun(stage, state, startedAt, inputFingerprint, {
          outcome: 'success',
          outputFingerprint: summary.outputFingerprint,
          stats,
        });
      } else {
        failure = result.error;
      }
    } catch (error) {
      failure = error;
    } finally {
      if (tx.state === 'open') {
        tx.rollback();
      }
    }

    if (completed) {
      const run = completed;
      this.notify('onStageComplete', () => this.callbacks.onStageComplete?.(run));
      return run;
    }

    const error: StageRunError = { kind: toStageErrorKind(failure), message: errorMessage(failure) };
    const run = this.createRun(stage, state, startedAt, inputFingerprint, {
      outcome: 'failed',
      error,
    });

    this.logger.error(
      `Stage ${stage.name} failed [${error.kind}] (input ${inputFingerprint.slice(0, 12)}): ${error.message}`
    );
    const cause = failure instanceof Error ? failure : new Error(error.message);
    this.notify('onStageError', () => this.callbacks.onStageError?.(run, cause));
    return run;
  }

  /**
   * Invoke a lifecycle callback. A throwing callback is logged and leaves
   * the recorded outcome as it is.
   */
  private notify(event: keyof SchedulerCallbacks, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      this.logger.warn(`${event} callback failed: ${errorMessage(error)}`);
    }
  }

  private storeView(tx: StoreTransaction): StageStore {
    const store = this.deps.store;
    return {
      query: (variant, predicate) => store.query(variant, predicate),
      get: (variant, naturalKey) => store.get(variant, naturalKey),
      status: () => store.status(),
      exportSnapshot: () => store.exportSnapshot(),
      upsert: (variant, naturalKey, attributes) => tx.upsert(variant, naturalKey, attributes),
      markSeen: (variant, naturalKey) => tx.markSeen(variant, naturalKey),
    };
  }

  private createRun(
    stage: Stage,
    state: BuildState,
    startedAt: Date,
    inputFingerprint: string,
    result: Pick<StageRun, 'outcome'> & Partial<Pick<StageRun, 'error' | 'outputFingerprint' | 'stats'>>
  ): StageRun {
    const completedAt = this.now();
    return {
      buildId: state.options.buildId,
      stage: stage.name,
      version: stage.version,
      outcome: result.outcome,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: Math.max(0, completedAt.getTime() - startedAt.getTime()),
      inputFingerprint,
      outputFingerprint: result.outputFingerprint ?? null,
      ...(result.error ? { error: result.error } : {}),
      stats: result.stats ?? {},
    };
  }

  /**
   * A history write failure only costs a rerun next build
   */
  private async record(run: StageRun): Promise<void> {
    try {
      await this.deps.history.append(run);
    } catch (error) {
      this.logger.warn(`Could not record run of ${run.stage}: ${errorMessage(error)}`);
    }
  }

  // ==========================================================================
  // Pruning
  // ==========================================================================

  /**
   * Drop records of an owned variant that the committing stage did not
   * affirm in this build. A failure is reported but does not undo the commit.
   */
  private async pruneVariant(variant: VariantName, owner: string, state: BuildState): Promise<void> {
    try {
      const removed = await this.deps.store.pruneUnseen(variant);
      state.pruned[variant] = removed.length;
      if (removed.length > 0) {
        this.logger.info(`Pruned ${removed.length} ${variant} record(s): ${removed.join(', ')}`);
      }
    } catch (error) {
      const message = `Pruning ${variant} failed: ${errorMessage(error)}`;
      this.logger.error(message);
      state.pruneErrors.push({ stage: owner, kind: 'store', message });
    }
  }

  /**
   * Set partial-failure flags once every stage has settled
   *
   * @returns Variants whose pruning was suppressed, sorted
   */
  private async settleVariants(
    graph: DependencyGraph<Stage>,
    runs: ReadonlyMap<string, StageRun>,
    errors: BuildError[]
  ): Promise<VariantName[]> {
    const suppressed: VariantName[] = [];
    const owned = [...graph.ownership()].sort(([a], [b]) => compareNames(a, b));

    for (const [variant, owner] of owned) {
      const outcome = runs.get(owner)?.outcome;

      try {
        if (outcome === 'success') {
          await this.deps.store.setPartialFailure(variant, false);
        } else if (outcome === 'failed' || outcome === 'blocked' || outcome === 'cancelled') {
          suppressed.push(variant);
          await this.deps.store.setPartialFailure(variant, true);
          this.logger.warn(`Keeping last-known-good ${variant} records (${owner} ${outcome})`);
        }
        // skipped-cached owners leave their variant untouched
      } catch (error) {
        const message = `Updating ${variant} status failed: ${errorMessage(error)}`;
        this.logger.error(message);
        errors.push({ stage: owner, kind: 'store', message });
      }
    }

    return suppressed;
  }

  // ==========================================================================
  // Dry run
  // ==========================================================================

  /**
   * Predict decisions assuming every stage reproduces its last output.
   * Up-to-date stages below a stage that will run are `conditional`.
   */
  private plan(
    graph: DependencyGraph<Stage>,
    lastSuccess: ReadonlyMap<string, StageRun | null>,
    options: RunOptions
  ): PlanEntry[] {
    const predicted = new Map<string, string | null>();
    const decisions = new Map<string, PlanDecision>();
    const now = this.now();

    return graph.topologicalOrder().map((name) => {
      const stage = graph.require(name);
      const last = lastSuccess.get(name) ?? null;
      const verdict = assessStaleness({
        stage,
        lastSuccess: last,
        inputFingerprint: computeInputFingerprint(stage, predicted),
        forced: options.forceAll === true || (options.force ?? []).includes(name),
        now,
      });

      const upstreamMayChange = stage.dependencies.some((dep) => decisions.get(dep) !== 'skip');
      const decision: PlanDecision = verdict.stale
        ? 'run'
        : upstreamMayChange
          ? 'conditional'
          : 'skip';

      decisions.set(name, decision);
      predicted.set(name, last?.outputFingerprint ?? null);
      return { stage: name, decision, reason: verdict.reason };
    });
  }
}

/**
 * Reject options that would corrupt stage history or misfire the timer
 */
export function assertRunOptions(options: Pick<RunOptions, 'buildId' | 'timeoutMs'>): void {
  const buildId = BuildIdSchema.safeParse(options.buildId);
  if (!buildId.success) {
    throw new RangeError(
      `Invalid build id "${options.buildId}": ${buildId.error.issues[0]?.message ?? 'malformed'}`
    );
  }

  const { timeoutMs } = options;
  if (
    timeoutMs !== undefined &&
    (!Number.isInteger(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS)
  ) {
    throw new RangeError(`Timeout must be an integer from 0 to ${MAX_TIMEOUT_MS} ms, got ${timeoutMs}`);
  }
}
