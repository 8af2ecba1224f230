/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the storage layer.
 *
 * Directory Structure:
 * ```
 * ~/.harvest/                          # Default data directory
 * ├── config.json                      # Global config (feeds, defaults)
 * ├── cache/
 * │   └── <key[0..2]>/<key>.json       # Content-addressed fetch cache
 * ├── store/
 * │   └── <variant>.json               # One record set per variant
 * ├── history/
 * │   └── <stage>.json                 # Last runs of each stage
 * ├── builds/
 * │   ├── latest -> 20260301-101500-ab12
 * │   └── <build_id>/report.json       # Build report
 * └── site/
 *     └── site-data.json               # Published snapshot for the site generator
 * ```
 *
 * Every helper takes the data directory explicitly so that cache, store and
 * scheduler instances never depend on ambient state. Only the CLI resolves
 * it from the environment.
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @param id - The ID to validate
 * @param idName - Name of the ID for error messages (e.g., 'buildId', 'stage')
 * @throws {Error} If the ID is empty or contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (!id || id.trim() === '') {
    throw new Error(`${idName} is required`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Gets the root data directory for the application.
 *
 * Uses the `HARVEST_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.harvest/`.
 *
 * @example
 * ```typescript
 * process.env.HARVEST_DATA_DIR = '/srv/harvest';
 * getDataDir(); // '/srv/harvest'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env.HARVEST_DATA_DIR;

  if (envDir) {
    // Resolve relative paths and expand ~ if present
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return path.join(os.homedir(), '.harvest');
}

/**
 * Gets the path to the global config.json file.
 */
export function getGlobalConfigPath(dataDir: string): string {
  return path.join(dataDir, 'config.json');
}

// ============================================
// Cache
// ============================================

export function getCacheDir(dataDir: string): string {
  return path.join(dataDir, 'cache');
}

/**
 * Gets the file path of a cache entry. Entries are sharded by the first
 * two characters of their key.
 *
 * @example
 * ```typescript
 * getCacheEntryPath('/data', 'ab12...');
 * // '/data/cache/ab/ab12....json'
 * ```
 */
export function getCacheEntryPath(dataDir: string, key: string): string {
  validateIdSecurity(key, 'cache key');
  return path.join(getCacheDir(dataDir), key.slice(0, 2), `${key}.json`);
}

// ============================================
// Content Store
// ============================================

export function getStoreDir(dataDir: string): string {
  return path.join(dataDir, 'store');
}

export function getRecordSetPath(dataDir: string, variant: string): string {
  validateIdSecurity(variant, 'variant');
  return path.join(getStoreDir(dataDir), `${variant}.json`);
}

// ============================================
// Stage History
// ============================================

export function getHistoryDir(dataDir: string): string {
  return path.join(dataDir, 'history');
}

export function getStageHistoryPath(dataDir: string, stage: string): string {
  validateIdSecurity(stage, 'stage');
  return path.join(getHistoryDir(dataDir), `${stage}.json`);
}

// ============================================
// Builds
// ============================================

export function getBuildsDir(dataDir: string): string {
  return path.join(dataDir, 'builds');
}

export function getBuildDir(dataDir: string, buildId: string): string {
  validateIdSecurity(buildId, 'buildId');
  return path.join(getBuildsDir(dataDir), buildId);
}

export function getBuildReportPath(dataDir: string, buildId: string): string {
  return path.join(getBuildDir(dataDir, buildId), 'report.json');
}

/**
 * The "latest" symlink points to the most recent build directory.
 */
export function getLatestBuildSymlink(dataDir: string): string {
  return path.join(getBuildsDir(dataDir), 'latest');
}

// ============================================
// Published Output
// ============================================

export function getSiteDir(dataDir: string): string {
  return path.join(dataDir, 'site');
}

export function getSiteDataPath(dataDir: string): string {
  return path.join(getSiteDir(dataDir), 'site-data.json');
}
