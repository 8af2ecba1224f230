/**
 * Publish Site Data Stage
 *
 * Writes the committed store, every variant with its status, to
 * <dataDir>/site/site-data.json for the static-site generator. Owns no
 * variant; it reruns whenever an upstream stage produces new output.
 *
 * @module stages/publish-site-data
 */

import type { RunStats } from '../schemas/stage.js';
import { atomicWriteJson } from '../schemas/migrations/index.js';
import { getSiteDataPath } from '../storage/paths.js';
import { StageError, errorMessage } from '../pipeline/errors.js';
import { ok, err, type Result } from '../pipeline/result.js';
import type { Stage, StageContext } from '../pipeline/types.js';

export const PUBLISH_SITE_DATA_STAGE = 'publish_site_data';

/**
 * @param dependencies - Stages whose output the site shows
 */
export function createPublishSiteDataStage(dependencies: readonly string[]): Stage {
  return {
    name: PUBLISH_SITE_DATA_STAGE,
    version: '1',
    description: 'Write site-data.json for the site generator',
    dependencies: [...dependencies],

    async run(ctx: StageContext): Promise<Result<RunStats, StageError>> {
      const snapshot = ctx.store.exportSnapshot();
      const status = ctx.store.status();
      const filePath = getSiteDataPath(ctx.dataDir);

      try {
        await atomicWriteJson(filePath, { ...snapshot, buildId: ctx.buildId, status });
      } catch (error) {
        return err(
          new StageError('transform', `Cannot write site data: ${errorMessage(error)}`, {
            cause: error,
          })
        );
      }

      const records = status.reduce((sum, variant) => sum + variant.count, 0);
      ctx.logger.debug(`Published ${records} records to ${filePath}`);
      return ok({ variants: status.length, records });
    },
  };
}
