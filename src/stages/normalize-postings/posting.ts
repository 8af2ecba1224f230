/**
 * Feed entry to posting mapping
 *
 * @module stages/normalize-postings/posting
 */

import type { FeedEntryAttributes, PostingAttributes } from '../../schemas/variants.js';

const LOCATION_TAG_PREFIX = 'location:';
const REMOTE_TAG = 'remote';

/**
 * Natural key of a posting: its URL without tracking parameters, fragment
 * or trailing slash, so one job syndicated by two feeds is stored once.
 *
 * @example
 * ```typescript
 * postingKey('https://Jobs.Example.com/1/?utm_source=feed#apply');
 * // Returns: 'https://jobs.example.com/1'
 * ```
 */
export function postingKey(url: string): string {
  const parsed = new URL(url);
  parsed.hash = '';

  for (const name of [...parsed.searchParams.keys()]) {
    if (name.toLowerCase().startsWith('utm_')) {
      parsed.searchParams.delete(name);
    }
  }

  const pathname =
    parsed.pathname.length > 1 && parsed.pathname.endsWith('/')
      ? parsed.pathname.slice(0, -1)
      : parsed.pathname;
  const search = parsed.searchParams.toString();

  return `${parsed.protocol}//${parsed.host}${pathname}${search ? `?${search}` : ''}`;
}

/**
 * Map a feed entry to posting attributes.
 *
 * Tags carry structure: `remote` marks a remote job and `location:<place>`
 * its location. Remaining tags are lowercased, deduplicated and sorted.
 */
export function toPosting(entry: FeedEntryAttributes, company: string): PostingAttributes {
  let location: string | undefined;
  let remote = false;
  const tags = new Set<string>();

  for (const raw of entry.tags) {
    const tag = raw.trim();
    const lower = tag.toLowerCase();
    if (lower === REMOTE_TAG) {
      remote = true;
    } else if (lower.startsWith(LOCATION_TAG_PREFIX)) {
      location = tag.slice(LOCATION_TAG_PREFIX.length).trim() || location;
    } else if (lower !== '') {
      tags.add(lower);
    }
  }

  return {
    title: entry.title,
    company,
    url: entry.url,
    ...(location !== undefined ? { location } : {}),
    remote,
    ...(entry.publishedAt !== undefined ? { postedOn: entry.publishedAt.slice(0, 10) } : {}),
    tags: [...tags].sort(),
    source: entry.feedId,
  };
}
