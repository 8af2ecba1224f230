/**
 * History Command
 *
 * `harvest history` lists recent builds; `harvest history <stage>` lists
 * the recorded runs of one stage, newest first.
 *
 * @module cli/commands/history
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { formatDuration } from '../formatters/progress.js';
import { formatOutcomeCounts } from '../formatters/build-summary.js';
import { StageHistoryStore } from '../../pipeline/history.js';
import { listBuilds, loadBuildReport } from '../../storage/builds.js';
import type { BuildReport } from '../../schemas/build-report.js';
import { padRight, parseInteger, runAction } from './shared.js';

export interface HistoryCommandOptions {
  limit?: string;
  json?: boolean;
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history [stage]')
    .description('List recent builds, or the recorded runs of a stage')
    .option('-l, --limit <count>', 'Maximum number of entries', '10')
    .option('--json', 'Print as JSON')
    .action(async (stage: string | undefined, options: HistoryCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleHistory(stage, options, base));
    });
}

function buildStatus(report: BuildReport): string {
  if (report.cancelled) return chalk.yellow('cancelled');
  return report.success ? chalk.green('success') : chalk.red('failed');
}

export async function handleHistory(
  stage: string | undefined,
  options: HistoryCommandOptions,
  base: BaseCommand
): Promise<ExitCode> {
  const limit = parseInteger(options.limit ?? '10', '--limit');

  if (stage !== undefined) {
    return printStageHistory(stage, limit, options, base);
  }

  const buildIds = (await listBuilds(base.dataDir)).slice(0, limit);
  const reports: BuildReport[] = [];
  for (const buildId of buildIds) {
    reports.push(await loadBuildReport(base.dataDir, buildId));
  }

  if (options.json) {
    base.json(reports);
    return EXIT_CODES.SUCCESS;
  }

  if (reports.length === 0) {
    base.info('No builds recorded yet.');
    base.blank();
    base.info('Run a build with: harvest build');
    return EXIT_CODES.SUCCESS;
  }

  console.log(chalk.bold(padRight('BUILD', 24) + padRight('STATUS', 11) + padRight('DURATION', 10) + 'STAGES'));
  for (const report of reports) {
    console.log(
      padRight(report.buildId, 24) +
        padRight(buildStatus(report), 11) +
        padRight(formatDuration(report.durationMs), 10) +
        formatOutcomeCounts(report.stages.map((run) => run.outcome))
    );
  }

  return EXIT_CODES.SUCCESS;
}

async function printStageHistory(
  stage: string,
  limit: number,
  options: HistoryCommandOptions,
  base: BaseCommand
): Promise<ExitCode> {
  const history = new StageHistoryStore(base.dataDir);
  const runs = await history.recent(stage, limit);

  if (runs.length === 0) {
    base.printError(`No recorded runs for stage "${stage}"`);
    return EXIT_CODES.NOT_FOUND;
  }

  if (options.json) {
    base.json(runs);
    return EXIT_CODES.SUCCESS;
  }

  base.section(`History of ${stage}`);
  for (const run of runs) {
    const error = run.error ? chalk.red(` - ${run.error.message}`) : '';
    console.log(
      padRight(run.buildId, 24) +
        padRight(run.outcome, 16) +
        padRight(formatDuration(run.durationMs), 10) +
        chalk.dim(`v${run.version}`) +
        error
    );
  }

  return EXIT_CODES.SUCCESS;
}
