import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  GlobalConfigSchema,
  DEFAULT_GLOBAL_CONFIG,
  saveGlobalConfig,
  loadGlobalConfig,
  type GlobalConfig,
} from './config.js';
import { getGlobalConfigPath } from './paths.js';

describe('config storage', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('GlobalConfigSchema', () => {
    it('validates valid config', () => {
      const config: GlobalConfig = {
        schemaVersion: 1,
        feeds: [{ id: 'example-jobs', url: 'https://example.com/feed.json' }],
        cacheTtlMs: 60_000,
      };

      expect(GlobalConfigSchema.safeParse(config).success).toBe(true);
    });

    it('applies defaults', () => {
      expect(GlobalConfigSchema.parse({})).toEqual({ schemaVersion: 1, feeds: [] });
    });

    it('rejects feed ids that are not slugs', () => {
      const result = GlobalConfigSchema.safeParse({
        feeds: [{ id: 'Example Jobs', url: 'https://example.com/feed.json' }],
      });
      expect(result.success).toBe(false);
    });
  });

  describe('loadGlobalConfig', () => {
    it('returns defaults when the file is missing', async () => {
      expect(await loadGlobalConfig(tempDir)).toEqual(DEFAULT_GLOBAL_CONFIG);
    });

    it('round-trips a saved config', async () => {
      const config: GlobalConfig = {
        schemaVersion: 1,
        feeds: [{ id: 'board', url: 'https://example.com/jobs.json', company: 'Acme' }],
        concurrency: 2,
      };
      await saveGlobalConfig(tempDir, config);

      expect(await loadGlobalConfig(tempDir)).toEqual(config);
    });

    it('throws for invalid config', async () => {
      await fs.writeFile(getGlobalConfigPath(tempDir), JSON.stringify({ concurrency: 0 }));

      await expect(loadGlobalConfig(tempDir)).rejects.toThrow();
    });
  });
});
