/**
 * Feed HTTP Client
 *
 * Fetches feed documents with a per-request timeout. The build's abort
 * signal is forwarded so a cancelled build stops waiting on slow sources.
 *
 * @module stages/fetch-feeds/client
 */

import type { FetchedPayload } from '../../cache/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Subset of the global fetch the client needs; injectable for tests
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface FeedClientOptions {
  fetch?: FetchFn;
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

/**
 * Feed request failure with a retryable hint for callers that retry
 */
export class FeedFetchError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number | null,
    public readonly isRetryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FeedFetchError';
  }
}

const DEFAULTS = {
  timeoutMs: 10000,
  contentType: 'application/feed+json',
  accept: 'application/feed+json, application/json;q=0.9',
} as const;

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * @example
 * ```typescript
 * const client = new FeedClient({ timeoutMs: 5000 });
 * const { payload } = await client.fetchFeed('https://example.com/jobs.json', ctx.signal);
 * ```
 */
export class FeedClient {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;

  constructor(options: FeedClientOptions = {}) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
  }

  /**
   * Fetch one feed document. The timeout covers reading the body.
   *
   * @throws FeedFetchError on HTTP errors, timeouts, cancellation and network failures
   */
  async fetchFeed(url: string, signal?: AbortSignal): Promise<FetchedPayload> {
    return this.withTimeout(signal, async (requestSignal) => {
      const response = await this.fetchFn(url, {
        headers: { accept: DEFAULTS.accept },
        signal: requestSignal,
      });

      if (!response.ok) {
        const isRetryable = response.status === 429 || response.status >= 500;
        throw new FeedFetchError(`HTTP ${response.status} from ${url}`, response.status, isRetryable);
      }

      return {
        payload: await response.text(),
        contentType: response.headers.get('content-type') ?? DEFAULTS.contentType,
      };
    });
  }

  private async withTimeout<T>(
    signal: AbortSignal | undefined,
    request: (requestSignal: AbortSignal) => Promise<T>
  ): Promise<T> {
    if (signal?.aborted) {
      throw new FeedFetchError('Request cancelled', null, false);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await request(controller.signal);
    } catch (error) {
      if (error instanceof FeedFetchError) {
        throw error;
      }
      if (timedOut) {
        throw new FeedFetchError(`Request timed out after ${this.timeoutMs}ms`, null, true, {
          cause: error,
        });
      }
      if (controller.signal.aborted) {
        throw new FeedFetchError('Request cancelled', null, false, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FeedFetchError(`Request failed: ${message}`, null, true, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
