/**
 * Query Command
 *
 * Read interface of the content store from the terminal:
 * - `harvest query` shows per-variant counts, owners and partial-failure flags
 * - `harvest query <variant>` lists committed records
 * - `harvest query <variant> --key <naturalKey>` prints one record
 *
 * @module cli/commands/query
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { ContentStore } from '../../store/content-store.js';
import { isVariantName, VARIANT_NAMES } from '../../schemas/variants.js';
import type { ContentRecord } from '../../schemas/record.js';
import {
  defaultStageFactory,
  loadStageGraph,
  padRight,
  parseInteger,
  runAction,
  truncate,
  UsageError,
  type StageFactory,
} from './shared.js';

export interface QueryCommandOptions {
  key?: string;
  limit?: string;
  json?: boolean;
}

export function registerQueryCommand(program: Command): void {
  program
    .command('query [variant]')
    .description('Show store status, or list the records of a variant')
    .option('-k, --key <naturalKey>', 'Print a single record')
    .option('-l, --limit <count>', 'Maximum number of records to list', '50')
    .option('--json', 'Print as JSON')
    .action(async (variant: string | undefined, options: QueryCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleQuery(variant, options, base));
    });
}

/**
 * Short human label for a record: its title or name attribute
 */
function recordLabel(record: ContentRecord): string {
  const { title, name } = record.attributes;
  if (typeof title === 'string') return title;
  if (typeof name === 'string') return name;
  return '';
}

export async function handleQuery(
  variant: string | undefined,
  options: QueryCommandOptions,
  base: BaseCommand,
  createStages: StageFactory = defaultStageFactory
): Promise<ExitCode> {
  const store = await ContentStore.open(base.dataDir, { logger: base.logger });

  if (variant === undefined) {
    const { graph } = await loadStageGraph(base.dataDir, createStages);
    store.setOwners(graph.ownership());
    return printStatus(store, options, base);
  }

  if (!isVariantName(variant)) {
    throw new UsageError(`Unknown variant "${variant}". Known variants: ${VARIANT_NAMES.join(', ')}`);
  }

  if (options.key !== undefined) {
    const record = store.get(variant, options.key);
    if (!record) {
      base.printError(`No ${variant} record with key "${options.key}"`);
      return EXIT_CODES.NOT_FOUND;
    }
    base.json(record);
    return EXIT_CODES.SUCCESS;
  }

  const limit = parseInteger(options.limit ?? '50', '--limit');
  const records = store.query(variant);
  const shown = records.slice(0, limit);

  if (options.json) {
    base.json(shown);
    return EXIT_CODES.SUCCESS;
  }

  if (records.length === 0) {
    base.info(`No ${variant} records.`);
    return EXIT_CODES.SUCCESS;
  }

  console.log(chalk.bold(padRight('KEY', 50) + padRight('UPDATED', 26) + 'LABEL'));
  for (const record of shown) {
    console.log(
      padRight(truncate(record.naturalKey, 48), 50) +
        padRight(record.updatedAt, 26) +
        truncate(recordLabel(record), 40)
    );
  }

  base.blank();
  if (shown.length < records.length) {
    base.info(`Showing ${shown.length} of ${records.length} records (use --limit to show more)`);
  } else {
    base.info(`Total: ${records.length} record${records.length === 1 ? '' : 's'}`);
  }

  return EXIT_CODES.SUCCESS;
}

function printStatus(store: ContentStore, options: QueryCommandOptions, base: BaseCommand): ExitCode {
  const status = store.status();

  if (options.json) {
    base.json(status);
    return EXIT_CODES.SUCCESS;
  }

  console.log(
    chalk.bold(padRight('VARIANT', 15) + padRight('COUNT', 8) + padRight('OWNER', 22) + 'UPDATED')
  );
  for (const entry of status) {
    const flag = entry.partialFailure ? chalk.yellow(' (partial: last refresh failed)') : '';
    console.log(
      padRight(entry.variant, 15) +
        padRight(String(entry.count), 8) +
        padRight(entry.owner ?? '-', 22) +
        (entry.lastUpdatedAt ?? '-') +
        flag
    );
  }

  return EXIT_CODES.SUCCESS;
}
