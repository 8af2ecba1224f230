/**
 * Reference stages
 *
 * The registry is built once from a static list: feeds are fetched,
 * normalized into postings and published for the site generator.
 *
 * @module stages
 */

import type { GlobalConfig } from '../storage/config.js';
import type { Stage } from '../pipeline/types.js';
import { createFetchFeedsStage, type FetchFeedsOptions } from './fetch-feeds.js';
import { createNormalizePostingsStage, NORMALIZE_POSTINGS_STAGE } from './normalize-postings.js';
import { createPublishSiteDataStage } from './publish-site-data.js';

export { createFetchFeedsStage, FETCH_FEEDS_STAGE, type FetchFeedsOptions } from './fetch-feeds.js';
export { createNormalizePostingsStage, NORMALIZE_POSTINGS_STAGE } from './normalize-postings.js';
export { createPublishSiteDataStage, PUBLISH_SITE_DATA_STAGE } from './publish-site-data.js';
export { postingKey, toPosting } from './normalize-postings/posting.js';
export * from './fetch-feeds/index.js';

/**
 * The default stage set for a data directory's configuration
 *
 * @example
 * ```typescript
 * const config = await loadGlobalConfig(dataDir);
 * await runBuild({ dataDir, stages: createDefaultStages(config) });
 * ```
 */
export function createDefaultStages(
  config: GlobalConfig,
  options: Omit<FetchFeedsOptions, 'ttlMs'> = {}
): Stage[] {
  return [
    createFetchFeedsStage(config.feeds, options),
    createNormalizePostingsStage(config.feeds),
    createPublishSiteDataStage([NORMALIZE_POSTINGS_STAGE]),
  ];
}
