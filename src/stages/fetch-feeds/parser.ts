/**
 * JSON Feed parsing
 *
 * Validates a JSON Feed document (versions 1 and 1.1) and maps its items
 * to feed_entry attributes. Items without a title or link are skipped.
 *
 * @module stages/fetch-feeds/parser
 */

import { z } from 'zod';
import type { FeedEntryAttributes } from '../../schemas/variants.js';

const JsonFeedAuthorSchema = z.object({
  name: z.string().optional(),
  url: z.string().optional(),
});

export const JsonFeedItemSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  url: z.string().url().optional(),
  external_url: z.string().url().optional(),
  title: z.string().optional(),
  content_html: z.string().optional(),
  content_text: z.string().optional(),
  summary: z.string().optional(),
  date_published: z.string().datetime({ offset: true }).optional(),
  /** 1.1 */
  authors: z.array(JsonFeedAuthorSchema).optional(),
  /** 1.0 */
  author: JsonFeedAuthorSchema.optional(),
  tags: z.array(z.string()).optional(),
});

export type JsonFeedItem = z.infer<typeof JsonFeedItemSchema>;

export const JsonFeedSchema = z.object({
  version: z.string().startsWith('https://jsonfeed.org/version/'),
  title: z.string(),
  home_page_url: z.string().optional(),
  items: z.array(JsonFeedItemSchema),
});

export interface ParsedFeed {
  title: string;
  entries: FeedEntryAttributes[];
  /** Items without a title or link */
  skipped: number;
}

/**
 * Error for payloads that are not JSON or not a JSON Feed
 */
export class FeedParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FeedParseError';
  }
}

/**
 * @throws FeedParseError when the payload is not a valid JSON Feed
 */
export function parseJsonFeed(payload: string, feedId: string): ParsedFeed {
  let data: unknown;
  try {
    data = JSON.parse(payload);
  } catch (error) {
    throw new FeedParseError('Payload is not valid JSON', { cause: error });
  }

  const parsed = JsonFeedSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new FeedParseError(`Not a JSON Feed${where}: ${issue?.message ?? 'invalid document'}`, {
      cause: parsed.error,
    });
  }

  const entries: FeedEntryAttributes[] = [];
  let skipped = 0;

  for (const item of parsed.data.items) {
    const entry = toFeedEntry(item, feedId);
    if (entry) {
      entries.push(entry);
    } else {
      skipped++;
    }
  }

  return { title: parsed.data.title, entries, skipped };
}

function toFeedEntry(item: JsonFeedItem, feedId: string): FeedEntryAttributes | null {
  const url = item.url ?? item.external_url;
  const title = item.title?.trim();
  if (!url || !title) {
    return null;
  }

  const authorName = item.authors?.[0]?.name ?? item.author?.name;
  const summary = item.summary ?? item.content_text;

  return {
    feedId,
    entryId: item.id,
    title,
    url,
    ...(summary !== undefined ? { summary } : {}),
    ...(item.content_html !== undefined ? { contentHtml: item.content_html } : {}),
    ...(authorName !== undefined ? { authorName } : {}),
    ...(item.date_published !== undefined
      ? { publishedAt: new Date(item.date_published).toISOString() }
      : {}),
    tags: item.tags ?? [],
  };
}
