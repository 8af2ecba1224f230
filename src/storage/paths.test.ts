/**
 * Path Resolution Utilities Tests
 *
 * @module storage/paths.test
 */

import * as os from 'node:os';
import * as path from 'node:path';
import {
  validateIdSecurity,
  getDataDir,
  getGlobalConfigPath,
  getCacheEntryPath,
  getRecordSetPath,
  getStageHistoryPath,
  getBuildDir,
  getBuildReportPath,
  getLatestBuildSymlink,
  getSiteDataPath,
} from './paths.js';

describe('storage/paths', () => {
  // Store original env var to restore after tests
  const originalEnvVar = process.env.HARVEST_DATA_DIR;

  afterEach(() => {
    if (originalEnvVar === undefined) {
      delete process.env.HARVEST_DATA_DIR;
    } else {
      process.env.HARVEST_DATA_DIR = originalEnvVar;
    }
  });

  describe('getDataDir', () => {
    it('should return default path when env var is not set', () => {
      delete process.env.HARVEST_DATA_DIR;

      expect(getDataDir()).toBe(path.join(os.homedir(), '.harvest'));
    });

    it('should use HARVEST_DATA_DIR env var when set', () => {
      process.env.HARVEST_DATA_DIR = '/custom/data/dir';

      expect(getDataDir()).toBe('/custom/data/dir');
    });

    it('should expand tilde in env var path', () => {
      process.env.HARVEST_DATA_DIR = '~/custom/harvest';

      expect(getDataDir()).toBe(path.join(os.homedir(), 'custom/harvest'));
    });

    it('should resolve relative paths in env var', () => {
      process.env.HARVEST_DATA_DIR = './data';

      expect(getDataDir()).toBe(path.resolve('./data'));
    });

    it('should handle empty env var as not set', () => {
      process.env.HARVEST_DATA_DIR = '';

      expect(getDataDir()).toBe(path.join(os.homedir(), '.harvest'));
    });
  });

  describe('validateIdSecurity', () => {
    it('should reject empty ids', () => {
      expect(() => validateIdSecurity('  ', 'stage')).toThrow('stage is required');
    });

    it('should reject traversal', () => {
      expect(() => validateIdSecurity('../x', 'buildId')).toThrow(
        'buildId contains invalid characters (path traversal not allowed)'
      );
      expect(() => validateIdSecurity('a\\b', 'buildId')).toThrow('path traversal');
    });
  });

  describe('layout', () => {
    const dataDir = '/data';

    it('should place config.json at the root', () => {
      expect(getGlobalConfigPath(dataDir)).toBe('/data/config.json');
    });

    it('should shard cache entries by key prefix', () => {
      const key = 'ab' + '0'.repeat(62);
      expect(getCacheEntryPath(dataDir, key)).toBe(`/data/cache/ab/${key}.json`);
    });

    it('should store one file per variant', () => {
      expect(getRecordSetPath(dataDir, 'posting')).toBe('/data/store/posting.json');
    });

    it('should store one history file per stage', () => {
      expect(getStageHistoryPath(dataDir, 'fetch_feeds')).toBe('/data/history/fetch_feeds.json');
    });

    it('should reject stage names that escape the history directory', () => {
      expect(() => getStageHistoryPath(dataDir, '../config')).toThrow('path traversal');
    });

    it('should build report and latest paths', () => {
      expect(getBuildDir(dataDir, '20260301-101500-ab12')).toBe(
        '/data/builds/20260301-101500-ab12'
      );
      expect(getBuildReportPath(dataDir, '20260301-101500-ab12')).toBe(
        '/data/builds/20260301-101500-ab12/report.json'
      );
      expect(getLatestBuildSymlink(dataDir)).toBe('/data/builds/latest');
    });

    it('should put site data under site/', () => {
      expect(getSiteDataPath(dataDir)).toBe('/data/site/site-data.json');
    });
  });
});
