/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color, data-dir)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 * - A pipeline Logger that prints through the same channels
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { config } from '../config/index.js';
import { EXIT_CODES, type ExitCode } from '../pipeline/build.js';
import type { Logger } from '../pipeline/types.js';

export { EXIT_CODES, type ExitCode };

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export type GlobalOptions = {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override default data directory */
  dataDir?: string;
};

/**
 * Log levels for output control.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * Command handlers receive a BaseCommand instance for logging, options
 * and the resolved data directory, and return an exit code.
 *
 * @example
 * ```typescript
 * async function handleStages(base: BaseCommand): Promise<ExitCode> {
 *   const config = await loadGlobalConfig(base.dataDir);
 *   base.info(`${config.feeds.length} feeds configured`);
 *   return EXIT_CODES.SUCCESS;
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved data directory path */
  readonly dataDir: string;

  /** Logger handed to the pipeline */
  readonly logger: Logger;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.dataDir = options.dataDir ?? config.dataDir;

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }

    this.logger = {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => this.printError(message, ...args),
    };
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Print an error message without exiting.
   */
  printError(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param errorOrCode - Error object or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    this.printError(message);

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.BUILD_FAILED);
    }
    process.exit(errorOrCode ?? EXIT_CODES.BUILD_FAILED);
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X (always visible).
   */
  fail(message: string): void {
    console.log(chalk.red(`${this.useColor ? '✘' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a horizontal divider line.
   */
  divider(char = '-', width = 40): void {
    if (!this.options.quiet) {
      console.log(chalk.dim(char.repeat(width)));
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      this.divider('=', title.length);
    }
  }

  /**
   * Print data as formatted JSON (always visible).
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  hasColor(): boolean {
    return this.useColor;
  }

  /**
   * Exit with specific code.
   */
  exitWith(code: ExitCode): never {
    process.exit(code);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createBaseCommand(options: GlobalOptions): BaseCommand {
  return new BaseCommand(options);
}

/**
 * Get the base command stored on the root program by the preAction hook.
 * Walks up from a subcommand to the root.
 */
export function getBaseCommand(cmd: CommandLike): BaseCommand {
  let current: CommandLike | null = cmd;
  while (current) {
    const base = current.opts()['_baseCommand'];
    if (base instanceof BaseCommand) {
      return base;
    }
    current = current.parent ?? null;
  }
  // Create a default one if not available (for testing)
  return new BaseCommand({});
}

/**
 * The part of a commander Command getBaseCommand reads
 */
export interface CommandLike {
  opts(): Record<string, unknown>;
  parent?: CommandLike | null;
}
