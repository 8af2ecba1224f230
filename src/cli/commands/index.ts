/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerBuildCommand, registerPlanCommand } from './build.js';
import { registerStagesCommand } from './stages.js';
import { registerQueryCommand } from './query.js';
import { registerCacheCommands } from './cache.js';
import { registerHistoryCommand } from './history.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerBuildCommand(program);
  registerPlanCommand(program);
  registerStagesCommand(program);
  registerQueryCommand(program);
  registerCacheCommands(program);
  registerHistoryCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'build [targets...]', description: 'Build stale stages' },
    { name: 'plan [targets...]', description: 'Show what a build would do' },
    { name: 'stages', description: 'List stages in build order' },
    { name: 'query [variant]', description: 'Show store status or list records' },
    { name: 'cache stats', description: 'Show cache statistics' },
    { name: 'cache clear', description: 'Remove every cache entry' },
    { name: 'cache evict <stage>', description: "Remove one stage's cache entries" },
    { name: 'cache prune', description: 'Remove expired cache entries' },
    { name: 'history [stage]', description: 'List recent builds or stage runs' },
  ];
}

export { handleBuild, type BuildCommandOptions } from './build.js';
export { handleStages, listStages, type StageListing } from './stages.js';
export { handleQuery } from './query.js';
export { handleCacheStats, handleCacheClear, handleCacheEvict, handleCachePrune } from './cache.js';
export { handleHistory } from './history.js';
