import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileCache } from './file-cache.js';
import { cacheKey } from './fingerprint.js';
import { scopeCache } from './scoped.js';

describe('scopeCache', () => {
  let tempDir: string;
  let cache: FileCache;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scoped-cache-test-'));
    cache = new FileCache(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('keys requests by stage and version', () => {
    const scoped = scopeCache(cache, 'fetch_feeds', '3');
    expect(scoped.keyFor({ url: 'https://example.test' })).toBe(
      cacheKey('fetch_feeds', '3', { url: 'https://example.test' })
    );
  });

  it('tags entries with the stage', async () => {
    const scoped = scopeCache(cache, 'fetch_feeds', '1');
    await scoped.put('feed-a', 'x');
    await scoped.cached('feed-b', async () => ({ payload: 'y' }));

    expect((await cache.stats()).byTag).toEqual({ fetch_feeds: 2 });
    const lookup = await scoped.get('feed-a');
    expect(lookup.hit && lookup.entry.tag).toBe('fetch_feeds');
  });

  it('does not see entries of another version', async () => {
    await scopeCache(cache, 'fetch_feeds', '1').put('feed-a', 'x');

    expect((await scopeCache(cache, 'fetch_feeds', '2').get('feed-a')).hit).toBe(false);
    expect((await scopeCache(cache, 'fetch_feeds', '1').get('feed-a')).hit).toBe(true);
  });

  it('invalidates one request', async () => {
    const scoped = scopeCache(cache, 'fetch_feeds', '1');
    await scoped.put('feed-a', 'x');
    await scoped.invalidate('feed-a');
    expect((await scoped.get('feed-a')).hit).toBe(false);
  });
});
