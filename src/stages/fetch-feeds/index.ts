/**
 * Feed fetching helpers
 *
 * @module stages/fetch-feeds
 */

export { FeedClient, FeedFetchError, type FeedClientOptions, type FetchFn } from './client.js';
export {
  parseJsonFeed,
  FeedParseError,
  JsonFeedSchema,
  JsonFeedItemSchema,
  type JsonFeedItem,
  type ParsedFeed,
} from './parser.js';
