import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs-extra';
import * as path from 'node:path';
import { QueryCache, invalidationMatches } from '../src/cache/QueryCache.js';
import { FileL2CacheStore, MemoryL2CacheStore } from '../src/cache/L2CacheStore.js';
import type { InvalidationRequest } from '../src/types/Reflection.js';
import { makeEntry, makeTempDir } from './helpers.js';

function request(overrides: Partial<InvalidationRequest> = {}): InvalidationRequest {
  return {
    project: 'demo',
    categories: [],
    tags: [],
    terms: [],
    embedded: false,
    broad: false,
    ...overrides,
  };
}

describe('invalidationMatches', () => {
  it('should ignore writes to other projects unless the entry spans projects', () => {
    const req = request({ project: 'other', broad: true });
    expect(invalidationMatches(makeEntry(), req)).toBe(false);
    expect(invalidationMatches(makeEntry({ crossProject: true }), req)).toBe(true);
  });

  it('should match on shared categories, tags or search terms', () => {
    expect(invalidationMatches(makeEntry({ affectedCategories: ['c1'] }), request({ categories: ['c1'] }))).toBe(true);
    expect(invalidationMatches(makeEntry({ affectedTags: ['db'] }), request({ tags: ['db'] }))).toBe(true);
    expect(invalidationMatches(makeEntry({ affectedTerms: ['pool'] }), request({ terms: ['pool', 'size'] }))).toBe(true);
    expect(invalidationMatches(makeEntry({ affectedTerms: ['pool'] }), request({ terms: ['index'] }))).toBe(false);
  });

  it('should let embedded writes reach open-ended semantic answers', () => {
    const entry = makeEntry({ openEnded: true });
    expect(invalidationMatches(entry, request({ embedded: true }))).toBe(true);
    expect(invalidationMatches(entry, request({ embedded: false }))).toBe(false);
  });

  it('should match everything in scope for a broad invalidation', () => {
    expect(invalidationMatches(makeEntry(), request({ broad: true }))).toBe(true);
  });
});

describe('QueryCache', () => {
  let clock: number;
  let l2: MemoryL2CacheStore;
  let cache: QueryCache;

  beforeEach(async () => {
    clock = 1000;
    l2 = new MemoryL2CacheStore(10);
    cache = new QueryCache({
      l1Capacity: 1,
      ttlMs: 60_000,
      embeddingCapacity: 4,
      sweepIntervalMs: 0,
      graceMs: 50,
      l2,
      now: () => clock,
    });
    await cache.init();
  });

  afterEach(async () => {
    await cache.shutdown();
  });

  it('should return private copies of stored entries', () => {
    cache.put('k', makeEntry());
    const first = cache.get('k');
    expect(first?.results[0].score).toBe(0.9);
    if (first) first.results[0].score = 0.1;
    expect(cache.get('k')?.results[0].score).toBe(0.9);
  });

  it('should treat entries at or past their TTL as misses', () => {
    cache.put('k', makeEntry({ createdAt: 1000, ttlMs: 100 }));
    clock = 1099;
    expect(cache.get('k')).toBeDefined();
    clock = 1100;
    expect(cache.get('k')).toBeUndefined();
  });

  it('should promote L2 hits into L1 and count both levels', () => {
    cache.put('k1', makeEntry());
    cache.put('k2', makeEntry());
    expect(cache.get('k1')?.queryFingerprint).toBe('fp');
    expect(cache.stats()).toEqual({
      l1HitRate: 0,
      l2HitRate: 1,
      size: 2,
      l1Size: 1,
      l2Size: 2,
      lookups: 1,
      invalidations: 0,
      evictions: 2,
    });
    expect(cache.get('k1')).toBeDefined();
    expect(cache.stats().l1HitRate).toBe(0.5);
  });

  it('should drop only the entries a write can affect', () => {
    cache.put('db', makeEntry({ affectedTags: ['db'] }));
    cache.put('ui', makeEntry({ affectedTags: ['ui'] }));
    expect(cache.invalidate(request({ tags: ['db'] }))).toBe(1);
    expect(cache.get('db')).toBeUndefined();
    expect(cache.get('ui')).toBeDefined();
    expect(cache.stats().invalidations).toBe(1);
  });

  it('should hide invalidated L2 entries at once and delete them after the grace window', () => {
    cache.put('k', makeEntry({ affectedTerms: ['pool'] }));
    cache.invalidate(request({ terms: ['pool'] }));
    expect(l2.size).toBe(1);
    expect(cache.stats().l2Size).toBe(0);
    expect(cache.get('k')).toBeUndefined();

    clock += 49;
    cache.sweep();
    expect(l2.size).toBe(1);
    clock += 1;
    cache.sweep();
    expect(l2.size).toBe(0);
  });

  it('should refuse a put when a matching write committed after the search started', () => {
    const since = cache.currentSeq;
    cache.invalidate(request({ terms: ['pool'] }));
    expect(cache.put('k', makeEntry({ affectedTerms: ['pool'] }), since)).toBe(false);
    expect(cache.get('k')).toBeUndefined();
  });

  it('should accept a put when the intervening writes are unrelated', () => {
    const since = cache.currentSeq;
    cache.invalidate(request({ terms: ['index'] }));
    expect(cache.put('k', makeEntry({ affectedTerms: ['pool'] }), since)).toBe(true);
  });

  it('should refuse puts that started before a clear', () => {
    const since = cache.currentSeq;
    cache.put('k', makeEntry());
    cache.clear();
    expect(cache.get('k')).toBeUndefined();
    expect(cache.put('k', makeEntry(), since)).toBe(false);
    expect(cache.put('k', makeEntry(), cache.currentSeq)).toBe(true);
  });

  it('should refuse puts older than the invalidation log', () => {
    const since = cache.currentSeq;
    for (let i = 0; i < 300; i++) cache.invalidate(request({ terms: [`t${i}`] }));
    expect(cache.put('k', makeEntry({ affectedTerms: ['pool'] }), since)).toBe(false);
  });

  it('should remember query embeddings by value', () => {
    const vector = [1, 2, 3];
    cache.putEmbedding('database pool', vector);
    vector[0] = 9;
    const got = cache.getEmbedding('database pool');
    expect(got).toEqual([1, 2, 3]);
    if (got) got[1] = 9;
    expect(cache.getEmbedding('database pool')).toEqual([1, 2, 3]);
  });

  it('should stop serving and storing after shutdown', async () => {
    cache.put('k', makeEntry());
    await cache.shutdown();
    expect(cache.get('k')).toBeUndefined();
    expect(cache.put('k', makeEntry())).toBe(false);
  });
});

describe('FileL2CacheStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should persist live entries and drop expired ones on load', async () => {
    const file = path.join(dir, 'cache', 'l2.json');
    const store = new FileL2CacheStore(file, 10, { flushMs: 5 });
    store.set('live', makeEntry({ createdAt: Date.now(), ttlMs: 60_000 }));
    store.set('stale', makeEntry({ createdAt: 0, ttlMs: 1 }));
    await store.close();
    expect(await fs.pathExists(file)).toBe(true);

    const reloaded = new FileL2CacheStore(file, 10);
    await reloaded.load();
    expect(reloaded.size).toBe(1);
    expect(reloaded.get('live')?.project).toBe('demo');
    expect(reloaded.get('stale')).toBeUndefined();
  });

  it('should start cold from an unreadable snapshot', async () => {
    const file = path.join(dir, 'l2.json');
    await fs.writeFile(file, '{ not json');
    const store = new FileL2CacheStore(file, 10);
    await store.load();
    expect(store.size).toBe(0);
  });

  it('should skip malformed entries', async () => {
    const file = path.join(dir, 'l2.json');
    await fs.writeJson(file, {
      version: 1,
      entries: [
        ['bad', { queryFingerprint: 'x' }],
        ['good', makeEntry({ createdAt: Date.now() })],
      ],
    });
    const store = new FileL2CacheStore(file, 10);
    await store.load();
    expect(Array.from(store.entries(), ([key]) => key)).toEqual(['good']);
  });
});
