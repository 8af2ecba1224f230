/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'node:os';
import * as path from 'node:path';

describe('config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Reset module cache to get fresh config
    jest.resetModules();
    process.env = { ...originalEnv, NODE_ENV: 'test' };
    delete process.env.HARVEST_DATA_DIR;
    delete process.env.HARVEST_CONCURRENCY;
    delete process.env.HARVEST_TIMEOUT_MS;
    delete process.env.HARVEST_CACHE_TTL_MS;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should use the default data directory', async () => {
    const { config } = await import('./index.js');
    expect(config.dataDir).toBe(path.join(os.homedir(), '.harvest'));
  });

  it('should use custom data directory when specified', async () => {
    process.env.HARVEST_DATA_DIR = '/srv/harvest';
    const { config } = await import('./index.js');
    expect(config.dataDir).toBe('/srv/harvest');
  });

  it('should have environment flags', async () => {
    const { config } = await import('./index.js');
    expect(config.isTest).toBe(true);
    expect(config.isProduction).toBe(false);
    expect(config.isDevelopment).toBe(false);
  });

  it('should coerce numeric build settings', async () => {
    process.env.HARVEST_CONCURRENCY = '5';
    process.env.HARVEST_TIMEOUT_MS = '60000';
    process.env.HARVEST_CACHE_TTL_MS = '';
    const { config } = await import('./index.js');
    expect(config.build).toEqual({ concurrency: 5, timeoutMs: 60000, cacheTtlMs: undefined });
  });

  it('should treat a zero timeout as no timeout', async () => {
    process.env.HARVEST_TIMEOUT_MS = '0';
    const { config } = await import('./index.js');
    expect(config.build.timeoutMs).toBeUndefined();
  });

  it('should accept the longest timeout a timer can hold', async () => {
    process.env.HARVEST_TIMEOUT_MS = '2147483647';
    const { config } = await import('./index.js');
    expect(config.build.timeoutMs).toBe(2147483647);
  });

  it('should exit on a timeout longer than a timer can hold', async () => {
    process.env.HARVEST_TIMEOUT_MS = '2592000000';
    const exit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});

    await expect(import('./index.js')).rejects.toThrow('process.exit');
    expect(exit).toHaveBeenCalledWith(1);

    exit.mockRestore();
    errorSpy.mockRestore();
  });

  describe('resolveBuildDefaults', () => {
    it('should fall back to built-in defaults', async () => {
      const { resolveBuildDefaults } = await import('./index.js');
      expect(resolveBuildDefaults({ schemaVersion: 1, feeds: [] })).toEqual({
        concurrency: 3,
        timeoutMs: undefined,
        cacheTtlMs: null,
      });
    });

    it('should prefer environment over config.json', async () => {
      const { resolveBuildDefaults } = await import('./index.js');
      const globalConfig = {
        schemaVersion: 1,
        feeds: [],
        concurrency: 2,
        timeoutMs: 30000,
        cacheTtlMs: 600000,
      };

      expect(
        resolveBuildDefaults(globalConfig, {
          concurrency: 8,
          timeoutMs: undefined,
          cacheTtlMs: undefined,
        })
      ).toEqual({ concurrency: 8, timeoutMs: 30000, cacheTtlMs: 600000 });
    });
  });
});
