import { describe, it, expect } from '@jest/globals';
import { FeedClient, FeedFetchError, type FetchFn } from './client.js';
import { FakeFeedServer } from '../../../tests/helpers/feed-server.js';

const FEED_URL = 'https://jobs.example.test/feed.json';

async function captureError(promise: Promise<unknown>): Promise<FeedFetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FeedFetchError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a FeedFetchError');
}

const hanging: FetchFn = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

describe('FeedClient', () => {
  it('returns the body and content type', async () => {
    const server = new FakeFeedServer().route(FEED_URL, { body: '{"items":[]}' });
    const client = new FeedClient({ fetch: server.fetch });

    expect(await client.fetchFeed(FEED_URL)).toEqual({
      payload: '{"items":[]}',
      contentType: 'application/feed+json',
    });
    expect(server.requests).toEqual([FEED_URL]);
  });

  it('asks for JSON Feed', async () => {
    let accept: string | null = null;
    const client = new FeedClient({
      fetch: async (_url, init) => {
        accept = new Headers(init.headers).get('accept');
        return new Response('{}');
      },
    });

    await client.fetchFeed(FEED_URL);
    expect(accept).toBe('application/feed+json, application/json;q=0.9');
  });

  it('marks server errors retryable', async () => {
    const server = new FakeFeedServer().route(FEED_URL, { status: 503, body: 'busy' });
    const error = await captureError(new FeedClient({ fetch: server.fetch }).fetchFeed(FEED_URL));

    expect(error.message).toBe(`HTTP 503 from ${FEED_URL}`);
    expect(error.statusCode).toBe(503);
    expect(error.isRetryable).toBe(true);
  });

  it('marks client errors permanent', async () => {
    const server = new FakeFeedServer();
    const error = await captureError(new FeedClient({ fetch: server.fetch }).fetchFeed(FEED_URL));

    expect(error.statusCode).toBe(404);
    expect(error.isRetryable).toBe(false);
  });

  it('wraps network failures', async () => {
    const client = new FeedClient({
      fetch: async () => {
        throw new Error('socket hang up');
      },
    });
    const error = await captureError(client.fetchFeed(FEED_URL));

    expect(error.message).toBe('Request failed: socket hang up');
    expect(error.statusCode).toBeNull();
  });

  it('times out slow requests', async () => {
    const error = await captureError(
      new FeedClient({ fetch: hanging, timeoutMs: 10 }).fetchFeed(FEED_URL)
    );

    expect(error.message).toBe('Request timed out after 10ms');
    expect(error.isRetryable).toBe(true);
  });

  it('times out a body that arrives too slowly', async () => {
    const slowBody: FetchFn = async (_url, init) =>
      Object.assign(new Response(null, { status: 200 }), {
        text: () =>
          new Promise<string>((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('body aborted')));
          }),
      });

    const error = await captureError(
      new FeedClient({ fetch: slowBody, timeoutMs: 10 }).fetchFeed(FEED_URL)
    );

    expect(error.message).toBe('Request timed out after 10ms');
    expect(error.isRetryable).toBe(true);
  });

  it('stops when the build is cancelled', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 5);

    const error = await captureError(
      new FeedClient({ fetch: hanging, timeoutMs: 1000 }).fetchFeed(FEED_URL, controller.signal)
    );

    expect(error.message).toBe('Request cancelled');
    expect(error.isRetryable).toBe(false);
  });

  it('does not start a request after cancellation', async () => {
    const server = new FakeFeedServer();
    const controller = new AbortController();
    controller.abort();

    const error = await captureError(
      new FeedClient({ fetch: server.fetch }).fetchFeed(FEED_URL, controller.signal)
    );

    expect(error.message).toBe('Request cancelled');
    expect(server.requests).toEqual([]);
  });
});
