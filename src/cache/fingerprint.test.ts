import { describe, it, expect } from '@jest/globals';
import { cacheKey, canonicalJson, fingerprint, sha256 } from './fingerprint.js';

describe('canonicalJson', () => {
  it('sorts object keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: [{ d: 2, c: 3 }] })).toBe('{"a":[{"c":3,"d":2}],"b":1}');
  });

  it('keeps array order', () => {
    expect(canonicalJson([3, 1, 2])).toBe('[3,1,2]');
  });

  it('serializes undefined as null', () => {
    expect(canonicalJson(undefined)).toBe('null');
  });
});

describe('fingerprint', () => {
  it('is a SHA-256 hex digest', () => {
    expect(sha256('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    expect(fingerprint('abc')).toBe(sha256('"abc"'));
  });

  it('ignores key order', () => {
    expect(fingerprint({ url: 'https://example.test', page: 2 })).toBe(
      fingerprint({ page: 2, url: 'https://example.test' })
    );
  });

  it('changes cache keys with the stage version', () => {
    const request = { url: 'https://example.test/feed.json' };
    expect(cacheKey('fetch_feeds', '1', request)).toBe(cacheKey('fetch_feeds', '1', { ...request }));
    expect(cacheKey('fetch_feeds', '2', request)).not.toBe(cacheKey('fetch_feeds', '1', request));
    expect(cacheKey('other', '1', request)).not.toBe(cacheKey('fetch_feeds', '1', request));
  });
});
