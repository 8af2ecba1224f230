/**
 * site-harvest
 *
 * Incremental pipeline that collects external sources into a local content
 * store for a static-site generator. Stages plug in through the `Stage`
 * interface; `runBuild` runs the stale ones.
 *
 * @example
 * ```typescript
 * import { runBuild, createDefaultStages, loadGlobalConfig } from 'site-harvest';
 *
 * const config = await loadGlobalConfig(dataDir);
 * const { report, exitCode } = await runBuild({
 *   dataDir,
 *   stages: createDefaultStages(config),
 * });
 * ```
 *
 * @module site-harvest
 */

export * from './pipeline/index.js';
export * from './cache/index.js';
export * from './store/index.js';
export * from './schemas/index.js';
export * from './stages/index.js';

export {
  getDataDir,
  getSiteDataPath,
  saveBuildReport,
  loadBuildReport,
  listBuilds,
  getLatestBuildId,
  FeedSourceSchema,
  GlobalConfigSchema,
  DEFAULT_GLOBAL_CONFIG,
  saveGlobalConfig,
  loadGlobalConfig,
  KeyedLock,
  type FeedSource,
  type GlobalConfig,
} from './storage/index.js';
