import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { StageHistoryStore } from './history.js';
import type { StageOutcome, StageRun } from '../schemas/stage.js';
import { getStageHistoryPath } from '../storage/paths.js';

describe('StageHistoryStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'history-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createRun(index: number, outcome: StageOutcome = 'success'): StageRun {
    const second = String(index).padStart(2, '0');
    return {
      buildId: `20260301-1000${second}-aaaa`,
      stage: 'fetch_feeds',
      version: '1',
      outcome,
      startedAt: `2026-03-01T10:00:${second}.000Z`,
      completedAt: `2026-03-01T10:00:${second}.000Z`,
      durationMs: 0,
      inputFingerprint: 'a'.repeat(64),
      outputFingerprint: outcome === 'success' ? 'b'.repeat(64) : null,
      stats: {},
    };
  }

  it('is empty for a stage that never ran', async () => {
    const history = new StageHistoryStore(tempDir);

    expect(await history.load('fetch_feeds')).toEqual({
      schemaVersion: 1,
      stage: 'fetch_feeds',
      runs: [],
    });
    expect(await history.lastRun('fetch_feeds')).toBeNull();
    expect(await history.lastSuccess('fetch_feeds')).toBeNull();
    expect(await history.stages()).toEqual([]);
  });

  it('returns runs newest first', async () => {
    const history = new StageHistoryStore(tempDir);
    await history.append(createRun(1));
    await history.append(createRun(2, 'failed'));
    await history.append(createRun(3, 'skipped-cached'));

    const recent = await history.recent('fetch_feeds', 2);
    expect(recent.map((run) => run.outcome)).toEqual(['skipped-cached', 'failed']);
    expect((await history.lastRun('fetch_feeds'))?.buildId).toBe('20260301-100003-aaaa');
    expect((await history.lastSuccess('fetch_feeds'))?.buildId).toBe('20260301-100001-aaaa');
    expect(await history.stages()).toEqual(['fetch_feeds']);
  });

  it('returns nothing for a count of zero or less', async () => {
    const history = new StageHistoryStore(tempDir);
    await history.append(createRun(1));
    await history.append(createRun(2));

    expect(await history.recent('fetch_feeds', 0)).toEqual([]);
    expect(await history.recent('fetch_feeds', -1)).toEqual([]);
  });

  it('refuses a run it could not load back', async () => {
    const history = new StageHistoryStore(tempDir);
    await history.append(createRun(1));

    await expect(history.append({ ...createRun(2), buildId: 'b1' })).rejects.toThrow(
      'Build ID must match YYYYMMDD-HHMMSS-xxxx'
    );
    expect((await history.lastRun('fetch_feeds'))?.buildId).toBe('20260301-100001-aaaa');
  });

  it('keeps at most the limit', async () => {
    const history = new StageHistoryStore(tempDir, 3);
    for (let i = 1; i <= 5; i++) {
      await history.append(createRun(i));
    }

    const runs = (await history.load('fetch_feeds')).runs;
    expect(runs.map((run) => run.buildId)).toEqual([
      '20260301-100003-aaaa',
      '20260301-100004-aaaa',
      '20260301-100005-aaaa',
    ]);
  });

  it('retains the last success through a streak of failures', async () => {
    const history = new StageHistoryStore(tempDir, 3);
    await history.append(createRun(1));
    for (let i = 2; i <= 6; i++) {
      await history.append(createRun(i, 'failed'));
    }

    const runs = (await history.load('fetch_feeds')).runs;
    expect(runs.map((run) => run.buildId)).toEqual([
      '20260301-100001-aaaa',
      '20260301-100005-aaaa',
      '20260301-100006-aaaa',
    ]);
    expect((await history.lastSuccess('fetch_feeds'))?.buildId).toBe('20260301-100001-aaaa');
  });

  it('serializes concurrent appends', async () => {
    const history = new StageHistoryStore(tempDir);
    await Promise.all([1, 2, 3, 4].map((i) => history.append(createRun(i))));

    expect((await history.load('fetch_feeds')).runs).toHaveLength(4);
  });

  it('rejects an invalid history file', async () => {
    const filePath = getStageHistoryPath(tempDir, 'fetch_feeds');
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify({ stage: 'fetch_feeds', runs: 'nope' }));

    await expect(new StageHistoryStore(tempDir).load('fetch_feeds')).rejects.toThrow(
      'Invalid stage history'
    );
  });
});
