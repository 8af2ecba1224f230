/**
 * Normalize Postings Stage
 *
 * Turns feed_entry records into posting records. Entries are read from the
 * store in natural-key order; when two entries resolve to the same posting
 * key the first one wins.
 *
 * @module stages/normalize-postings
 */

import type { FeedSource } from '../storage/config.js';
import type { RunStats } from '../schemas/stage.js';
import { FeedEntryAttributesSchema } from '../schemas/variants.js';
import { StageError } from '../pipeline/errors.js';
import { ok, err, type Result } from '../pipeline/result.js';
import type { Stage, StageContext } from '../pipeline/types.js';
import { FETCH_FEEDS_STAGE } from './fetch-feeds.js';
import { postingKey, toPosting } from './normalize-postings/posting.js';

export const NORMALIZE_POSTINGS_STAGE = 'normalize_postings';

export function createNormalizePostingsStage(feeds: readonly FeedSource[]): Stage {
  const companies = new Map(
    feeds.flatMap((feed) => (feed.company ? [[feed.id, feed.company] as const] : []))
  );

  return {
    name: NORMALIZE_POSTINGS_STAGE,
    version: '1',
    description: 'Normalize feed entries into job postings',
    dependencies: [FETCH_FEEDS_STAGE],
    owns: ['posting'],

    async run(ctx: StageContext): Promise<Result<RunStats, StageError>> {
      const seen = new Set<string>();
      let duplicates = 0;

      for (const record of ctx.store.query('feed_entry')) {
        const parsed = FeedEntryAttributesSchema.safeParse(record.attributes);
        if (!parsed.success) {
          return err(
            new StageError('validation', `Feed entry "${record.naturalKey}" is malformed`, {
              cause: parsed.error,
            })
          );
        }

        const entry = parsed.data;
        const key = postingKey(entry.url);
        if (seen.has(key)) {
          duplicates++;
          continue;
        }
        seen.add(key);

        const company = companies.get(entry.feedId) ?? entry.authorName ?? entry.feedId;
        ctx.store.upsert('posting', key, toPosting(entry, company));
      }

      ctx.logger.debug(`Normalized ${seen.size} postings (${duplicates} duplicates)`);
      return ok({ postings: seen.size, duplicates });
    },
  };
}
