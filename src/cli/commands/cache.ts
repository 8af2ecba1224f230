/**
 * Cache Commands
 *
 * - cache stats: entry counts, size and entries per stage
 * - cache clear: remove every entry
 * - cache evict <stage>: remove one stage's entries
 * - cache prune: remove expired entries
 *
 * @module cli/commands/cache
 */

import type { Command } from 'commander';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { FileCache } from '../../cache/file-cache.js';
import { runAction } from './shared.js';

export interface CacheStatsOptions {
  json?: boolean;
}

/**
 * Format a byte count for display.
 *
 * @example
 * ```typescript
 * formatBytes(1536); // '1.5 KB'
 * ```
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function openCache(base: BaseCommand): FileCache {
  return new FileCache(base.dataDir, { logger: base.logger });
}

export function registerCacheCommands(program: Command): void {
  const cache = program.command('cache').description('Inspect and manage the fetch cache');

  cache
    .command('stats')
    .description('Show cache statistics')
    .option('--json', 'Print as JSON')
    .action(async (options: CacheStatsOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleCacheStats(options, base));
    });

  cache
    .command('clear')
    .description('Remove every cache entry')
    .action(async (_options: unknown, cmd: Command) => {
      await runAction(cmd, (base) => handleCacheClear(base));
    });

  cache
    .command('evict <stage>')
    .description("Remove one stage's cache entries")
    .action(async (stage: string, _options: unknown, cmd: Command) => {
      await runAction(cmd, (base) => handleCacheEvict(stage, base));
    });

  cache
    .command('prune')
    .description('Remove expired cache entries')
    .action(async (_options: unknown, cmd: Command) => {
      await runAction(cmd, (base) => handleCachePrune(base));
    });
}

export async function handleCacheStats(
  options: CacheStatsOptions,
  base: BaseCommand
): Promise<ExitCode> {
  const stats = await openCache(base).stats();

  if (options.json) {
    base.json(stats);
    return EXIT_CODES.SUCCESS;
  }

  base.section('Cache');
  base.keyValue('Entries', stats.entries);
  base.keyValue('Size', formatBytes(stats.totalBytes));
  base.keyValue('Expired', stats.expired);

  const tags = Object.keys(stats.byTag).sort();
  if (tags.length > 0) {
    base.blank();
    base.info('By stage:');
    for (const tag of tags) {
      base.info(`  ${tag}: ${stats.byTag[tag] ?? 0}`);
    }
  }

  return EXIT_CODES.SUCCESS;
}

export async function handleCacheClear(base: BaseCommand): Promise<ExitCode> {
  const removed = await openCache(base).clear();
  base.success(`Removed ${removed} cache entr${removed === 1 ? 'y' : 'ies'}`);
  return EXIT_CODES.SUCCESS;
}

export async function handleCacheEvict(stage: string, base: BaseCommand): Promise<ExitCode> {
  const removed = await openCache(base).evictTag(stage);
  base.success(`Evicted ${removed} cache entr${removed === 1 ? 'y' : 'ies'} of ${stage}`);
  return EXIT_CODES.SUCCESS;
}

export async function handleCachePrune(base: BaseCommand): Promise<ExitCode> {
  const removed = await openCache(base).prune();
  base.success(`Removed ${removed} expired cache entr${removed === 1 ? 'y' : 'ies'}`);
  return EXIT_CODES.SUCCESS;
}
