import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { BuildReport } from '../schemas/index.js';
import {
  saveBuildReport,
  loadBuildReport,
  listBuilds,
  getLatestBuildId,
  updateLatestSymlink,
} from './builds.js';
import { getBuildsDir } from './paths.js';

describe('builds storage', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'builds-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createReport(overrides?: Partial<BuildReport>): BuildReport {
    return {
      schemaVersion: 1,
      buildId: '20260301-101500-ab12',
      startedAt: '2026-03-01T10:15:00.000Z',
      completedAt: '2026-03-01T10:15:01.000Z',
      durationMs: 1000,
      success: true,
      dryRun: false,
      cancelled: false,
      stages: [],
      errors: [],
      pruned: {},
      pruneSuppressed: [],
      plan: [],
      ...overrides,
    };
  }

  it('saves and loads a report', async () => {
    const report = createReport({ pruned: { posting: 1 } });
    await saveBuildReport(tempDir, report);

    expect(await loadBuildReport(tempDir, report.buildId)).toEqual(report);
  });

  it('points latest at the most recently saved build', async () => {
    await saveBuildReport(tempDir, createReport({ buildId: '20260301-101500-ab12' }));
    await saveBuildReport(tempDir, createReport({ buildId: '20260302-090000-cd34' }));

    expect(await getLatestBuildId(tempDir)).toBe('20260302-090000-cd34');
  });

  it('lists builds newest first without the latest link', async () => {
    await saveBuildReport(tempDir, createReport({ buildId: '20260301-101500-ab12' }));
    await saveBuildReport(tempDir, createReport({ buildId: '20260302-090000-cd34' }));

    expect(await listBuilds(tempDir)).toEqual(['20260302-090000-cd34', '20260301-101500-ab12']);
  });

  it('returns empty results before any build', async () => {
    expect(await listBuilds(tempDir)).toEqual([]);
    expect(await getLatestBuildId(tempDir)).toBeNull();
  });

  it('throws for an unknown build', async () => {
    await expect(loadBuildReport(tempDir, '20260101-000000-zzzz')).rejects.toThrow(
      'Build not found: 20260101-000000-zzzz'
    );
  });

  it('refuses to link a missing build directory', async () => {
    await fs.mkdir(getBuildsDir(tempDir), { recursive: true });
    await expect(updateLatestSymlink(tempDir, '20260101-000000-zzzz')).rejects.toThrow(
      'Build directory does not exist: 20260101-000000-zzzz'
    );
  });
});
