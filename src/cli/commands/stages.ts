/**
 * Stages Command
 *
 * Lists the configured stages in build order with their dependencies,
 * owned variants and last recorded run.
 *
 * @module cli/commands/stages
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import { StageHistoryStore } from '../../pipeline/history.js';
import type { StageOutcome } from '../../schemas/stage.js';
import {
  defaultStageFactory,
  loadStageGraph,
  padRight,
  runAction,
  type StageFactory,
} from './shared.js';

export interface StagesCommandOptions {
  json?: boolean;
}

export interface StageListing {
  name: string;
  version: string;
  dependencies: string[];
  owns: string[];
  maxAgeMs: number | null;
  lastOutcome: StageOutcome | null;
  lastRunAt: string | null;
}

export function registerStagesCommand(program: Command): void {
  program
    .command('stages')
    .description('List stages in build order')
    .option('--json', 'Print as JSON')
    .action(async (options: StagesCommandOptions, cmd: Command) => {
      await runAction(cmd, (base) => handleStages(options, base));
    });
}

export async function listStages(
  dataDir: string,
  createStages: StageFactory = defaultStageFactory
): Promise<StageListing[]> {
  const { graph } = await loadStageGraph(dataDir, createStages);
  const history = new StageHistoryStore(dataDir);

  const listings: StageListing[] = [];
  for (const name of graph.topologicalOrder()) {
    const stage = graph.require(name);
    const last = await history.lastRun(name);
    listings.push({
      name,
      version: stage.version,
      dependencies: [...stage.dependencies],
      owns: [...(stage.owns ?? [])],
      maxAgeMs: stage.maxAgeMs ?? null,
      lastOutcome: last?.outcome ?? null,
      lastRunAt: last?.completedAt ?? null,
    });
  }
  return listings;
}

export async function handleStages(
  options: StagesCommandOptions,
  base: BaseCommand,
  createStages: StageFactory = defaultStageFactory
): Promise<ExitCode> {
  const listings = await listStages(base.dataDir, createStages);

  if (options.json) {
    base.json(listings);
    return EXIT_CODES.SUCCESS;
  }

  if (listings.length === 0) {
    base.info('No stages configured.');
    return EXIT_CODES.SUCCESS;
  }

  console.log(
    chalk.bold(
      padRight('STAGE', 22) +
        padRight('VERSION', 9) +
        padRight('DEPENDS ON', 22) +
        padRight('OWNS', 14) +
        'LAST RUN'
    )
  );
  for (const stage of listings) {
    const lastRun = stage.lastOutcome ? `${stage.lastOutcome} ${chalk.dim(stage.lastRunAt ?? '')}` : '-';
    console.log(
      padRight(stage.name, 22) +
        padRight(stage.version, 9) +
        padRight(stage.dependencies.join(', ') || '-', 22) +
        padRight(stage.owns.join(', ') || '-', 14) +
        lastRun
    );
  }

  return EXIT_CODES.SUCCESS;
}
