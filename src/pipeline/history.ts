/**
 * Stage Run History
 *
 * Bounded per-stage history of StageRuns at <dataDir>/history/<stage>.json.
 * The scheduler reads the last successful run to decide staleness; the CLI
 * reads it for diagnostics.
 *
 * @module pipeline/history
 */

import * as fs from 'node:fs/promises';
import {
  MAX_STAGE_HISTORY,
  StageHistorySchema,
  StageRunSchema,
  createEmptyStageHistory,
  type StageHistory,
  type StageRun,
} from '../schemas/stage.js';
import { atomicWriteJson, migrateSchema } from '../schemas/migrations/index.js';
import { isErrnoException, readJsonIfExists } from '../storage/atomic.js';
import { getHistoryDir, getStageHistoryPath } from '../storage/paths.js';
import { KeyedLock } from '../storage/keyed-lock.js';

export class StageHistoryStore {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly dataDir: string,
    private readonly limit: number = MAX_STAGE_HISTORY
  ) {}

  /**
   * Load a stage's history; empty when the stage never ran
   *
   * @throws Error if the history file is invalid
   */
  async load(stage: string): Promise<StageHistory> {
    const filePath = getStageHistoryPath(this.dataDir, stage);
    const data = await readJsonIfExists(filePath);

    if (data === null) {
      return createEmptyStageHistory(stage);
    }

    const parsed = StageHistorySchema.safeParse(migrateSchema(data, 'stageHistory'));
    if (!parsed.success) {
      throw new Error(`Invalid stage history in ${filePath}`, { cause: parsed.error });
    }
    return parsed.data;
  }

  /**
   * Most recent runs first
   */
  async recent(stage: string, count: number = this.limit): Promise<StageRun[]> {
    if (count <= 0) {
      return [];
    }
    const history = await this.load(stage);
    return history.runs.slice(-count).reverse();
  }

  async lastRun(stage: string): Promise<StageRun | null> {
    const history = await this.load(stage);
    return history.runs[history.runs.length - 1] ?? null;
  }

  async lastSuccess(stage: string): Promise<StageRun | null> {
    const history = await this.load(stage);
    for (let i = history.runs.length - 1; i >= 0; i--) {
      const run = history.runs[i];
      if (run?.outcome === 'success') {
        return run;
      }
    }
    return null;
  }

  /**
   * Append a run, dropping the oldest beyond the retention limit.
   * The last successful run is always retained so staleness survives a
   * long streak of failures.
   *
   * @throws ZodError for a run the history schema would not load back
   */
  async append(entry: StageRun): Promise<void> {
    const run = StageRunSchema.parse(entry);
    await this.lock.run(run.stage, async () => {
      const history = await this.load(run.stage);
      const runs = [...history.runs, run];

      let trimmed = runs.slice(-this.limit);
      const lastSuccess = [...runs].reverse().find((r) => r.outcome === 'success');
      if (lastSuccess && !trimmed.includes(lastSuccess)) {
        trimmed = [lastSuccess, ...trimmed.slice(1)];
      }

      await atomicWriteJson(getStageHistoryPath(this.dataDir, run.stage), {
        ...history,
        runs: trimmed,
      });
    });
  }

  /**
   * Names of stages with recorded history, sorted
   */
  async stages(): Promise<string[]> {
    try {
      const files = await fs.readdir(getHistoryDir(this.dataDir));
      return files
        .filter((file) => /^[a-z][a-z0-9_]*\.json$/.test(file))
        .map((file) => file.slice(0, -'.json'.length))
        .sort();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}
