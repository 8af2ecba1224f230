/**
 * Progress Formatters
 *
 * CLI progress display utilities:
 * - Spinner for long-running operations
 * - Build progress display driven by scheduler callbacks
 *
 * Uses the ora library for terminal spinners. Stages of one level run at
 * the same time, so a single spinner lists every running stage.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { StageOutcome, StageRun } from '../../schemas/stage.js';
import type { SchedulerCallbacks } from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

export type StageStatus = 'pending' | 'running' | StageOutcome;

export interface StageDisplay {
  name: string;
  status: StageStatus;
  /** Duration in milliseconds (once finished) */
  durationMs?: number;
  /** Error message (failed or blocked) */
  error?: string;
}

export interface SpinnerOptions {
  text?: string;
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Render even when stdout is not a TTY */
  interactive?: boolean;
}

export interface BuildProgressOptions {
  /** Animate with a spinner (default: stdout is a TTY) */
  interactive?: boolean;
  /** Print nothing */
  quiet?: boolean;
}

// ============================================================================
// Status Icons
// ============================================================================

const STATUS_ICONS: Record<StageStatus, string> = {
  pending: chalk.dim('○'),
  running: chalk.cyan('●'),
  success: chalk.green('✔'),
  failed: chalk.red('✘'),
  'skipped-cached': chalk.dim('='),
  blocked: chalk.yellow('!'),
  cancelled: chalk.yellow('−'),
};

/**
 * Plain text icons for non-TTY output.
 */
const STATUS_ICONS_PLAIN: Record<StageStatus, string> = {
  pending: '[ ]',
  running: '[*]',
  success: '[+]',
  failed: '[X]',
  'skipped-cached': '[=]',
  blocked: '[!]',
  cancelled: '[-]',
};

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Pruning cache...').start();
 * const removed = await cache.prune();
 * spinner.succeed(`Removed ${removed} expired entries`);
 * ```
 */
export class ProgressSpinner {
  private readonly spinner: Ora;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.interactive ?? process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state and elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  /**
   * Hide the spinner so a line can be printed above it
   */
  clear(): this {
    this.spinner.clear();
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Build Progress Display
// ============================================================================

/**
 * Display build progress, one line per finished stage.
 *
 * @example
 * ```typescript
 * const progress = new BuildProgressDisplay(graph.topologicalOrder());
 * await runBuild({ dataDir, stages, callbacks: progress.callbacks() });
 * ```
 */
export class BuildProgressDisplay {
  private readonly stages = new Map<string, StageDisplay>();
  private readonly interactive: boolean;
  private readonly quiet: boolean;
  private spinner: ProgressSpinner | null = null;

  constructor(stageNames: readonly string[], options: BuildProgressOptions = {}) {
    this.interactive = options.interactive ?? process.stdout.isTTY === true;
    this.quiet = options.quiet === true;

    for (const name of stageNames) {
      this.stages.set(name, { name, status: 'pending' });
    }
  }

  callbacks(): SchedulerCallbacks {
    return {
      onStageStart: (stage) => this.startStage(stage),
      onStageComplete: (run) => this.finishStage(run),
      onStageError: (run) => this.finishStage(run),
      onStageSkip: (run) => this.finishStage(run),
    };
  }

  startStage(name: string): void {
    const stage = this.displayFor(name);
    stage.status = 'running';

    if (this.quiet) return;

    const text = `Running ${this.running().join(', ')}...`;
    if (this.interactive) {
      if (this.spinner) {
        this.spinner.update(text);
      } else {
        this.spinner = new ProgressSpinner(text, { interactive: true }).start();
      }
    } else {
      console.log(`${STATUS_ICONS_PLAIN.running} ${name}...`);
    }
  }

  finishStage(run: StageRun): void {
    const stage = this.displayFor(run.stage);
    stage.status = run.outcome;
    if (run.outcome === 'success' || run.outcome === 'failed') {
      stage.durationMs = run.durationMs;
    }
    if (run.error) {
      stage.error = run.error.message;
    }

    if (this.quiet) return;

    this.spinner?.clear();
    console.log(this.formatStageLine(stage));

    if (this.spinner) {
      const running = this.running();
      if (running.length === 0) {
        this.spinner.stop();
        this.spinner = null;
      } else {
        this.spinner.update(`Running ${running.join(', ')}...`);
      }
    }
  }

  getStageDisplay(name: string): StageDisplay | undefined {
    return this.stages.get(name);
  }

  getAllStages(): StageDisplay[] {
    return Array.from(this.stages.values());
  }

  formatStageLine(stage: StageDisplay): string {
    const icon = this.interactive ? STATUS_ICONS[stage.status] : STATUS_ICONS_PLAIN[stage.status];
    let line = `${icon} ${stage.name}`;

    if (stage.status === 'skipped-cached') {
      line += chalk.dim(' (cached)');
    } else if (stage.status === 'cancelled') {
      line += chalk.dim(' (cancelled)');
    } else if (stage.durationMs !== undefined) {
      line += chalk.dim(` (${formatDuration(stage.durationMs)})`);
    }

    if (stage.error && stage.status !== 'cancelled') {
      line += chalk.red(` - ${stage.error}`);
    }

    return line;
  }

  getCounts(): Record<StageStatus, number> {
    const counts: Record<StageStatus, number> = {
      pending: 0,
      running: 0,
      success: 0,
      failed: 0,
      'skipped-cached': 0,
      blocked: 0,
      cancelled: 0,
    };

    for (const stage of this.stages.values()) {
      counts[stage.status]++;
    }

    return counts;
  }

  private running(): string[] {
    return this.getAllStages()
      .filter((stage) => stage.status === 'running')
      .map((stage) => stage.name);
  }

  private displayFor(name: string): StageDisplay {
    let stage = this.stages.get(name);
    if (!stage) {
      stage = { name, status: 'pending' };
      this.stages.set(name, stage);
    }
    return stage;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
