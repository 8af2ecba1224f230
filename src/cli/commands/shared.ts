/**
 * Helpers shared by command handlers
 *
 * @module cli/commands/shared
 */

import type { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { GraphError } from '../../pipeline/errors.js';
import { DependencyGraph } from '../../pipeline/graph.js';
import type { Stage } from '../../pipeline/types.js';
import { loadGlobalConfig, type GlobalConfig } from '../../storage/config.js';
import { createDefaultStages } from '../../stages/index.js';

/**
 * Builds the stage set from the data directory's config.json
 */
export type StageFactory = (config: GlobalConfig) => Stage[];

export const defaultStageFactory: StageFactory = (config) => createDefaultStages(config);

/**
 * Bad flag or argument; exits with the usage code
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse an integer flag value.
 *
 * @throws UsageError when the value is not an integer within `minimum`..`maximum`
 */
export function parseInteger(value: string, flag: string, minimum = 1, maximum?: number): number {
  const parsed = Number(value);
  const inRange = parsed >= minimum && (maximum === undefined || parsed <= maximum);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || !inRange) {
    const range = maximum === undefined ? `of at least ${minimum}` : `from ${minimum} to ${maximum}`;
    throw new UsageError(`${flag} must be an integer ${range}, got "${value}"`);
  }
  return parsed;
}

/**
 * Commander reducer for repeatable, comma-separated list options
 *
 * @example
 * ```typescript
 * // --force fetch_feeds,normalize_postings --force publish_site_data
 * cmd.option('--force <stages>', 'Force stages', collectList);
 * ```
 */
export function collectList(value: string, previous: string[] = []): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return [...previous, ...items];
}

/**
 * Load config.json and build the validated stage graph
 *
 * @throws GraphError when the configured stages do not form a valid graph
 */
export async function loadStageGraph(
  dataDir: string,
  createStages: StageFactory
): Promise<{ config: GlobalConfig; stages: Stage[]; graph: DependencyGraph<Stage> }> {
  const config = await loadGlobalConfig(dataDir);
  const stages = createStages(config);
  const graph = new DependencyGraph<Stage>().registerAll(stages).validate();
  return { config, stages, graph };
}

/**
 * Run a handler and map its result or error to an exit code.
 * Usage and graph errors exit with 2; anything else with 1.
 */
export async function runHandler(
  base: BaseCommand,
  handler: () => Promise<ExitCode>
): Promise<ExitCode> {
  try {
    return await handler();
  } catch (error) {
    if (error instanceof UsageError || error instanceof GraphError) {
      base.printError(error.message);
      return EXIT_CODES.USAGE_ERROR;
    }
    const message = error instanceof Error ? error.message : String(error);
    base.printError(message);
    if (base.isVerbose() && error instanceof Error && error.stack) {
      base.debug(error.stack);
    }
    return EXIT_CODES.BUILD_FAILED;
  }
}

/**
 * Commander action body: resolve the base command, run the handler and
 * set the process exit code.
 */
export async function runAction(
  cmd: Command,
  handler: (base: BaseCommand) => Promise<ExitCode>
): Promise<void> {
  const base = getBaseCommand(cmd);
  const code = await runHandler(base, () => handler(base));
  if (code !== EXIT_CODES.SUCCESS) {
    process.exitCode = code;
  }
}

/**
 * Pad a string to a fixed visible width, ignoring ANSI codes.
 */
export function padRight(str: string, width: number): string {
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  return str + ' '.repeat(Math.max(0, width - visibleLength));
}

export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}
