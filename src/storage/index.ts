/**
 * Storage Layer
 *
 * File-based persistence for config, build reports and shared helpers.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  validateIdSecurity,
  getDataDir,
  getGlobalConfigPath,
  getCacheDir,
  getCacheEntryPath,
  getStoreDir,
  getRecordSetPath,
  getHistoryDir,
  getStageHistoryPath,
  getBuildsDir,
  getBuildDir,
  getBuildReportPath,
  getLatestBuildSymlink,
  getSiteDir,
  getSiteDataPath,
} from './paths.js';

// Atomic operations
export {
  atomicWriteJson,
  readJson,
  readJsonIfExists,
  fileExists,
  isErrnoException,
} from './atomic.js';

// Build operations
export {
  saveBuildReport,
  loadBuildReport,
  listBuilds,
  getLatestBuildId,
  updateLatestSymlink,
} from './builds.js';

// Config operations
export {
  FeedSourceSchema,
  GlobalConfigSchema,
  DEFAULT_GLOBAL_CONFIG,
  saveGlobalConfig,
  loadGlobalConfig,
  type FeedSource,
  type GlobalConfig,
} from './config.js';

// Locks
export { KeyedLock } from './keyed-lock.js';
