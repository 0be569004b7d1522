import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { QueryCache } from '../src/cache/QueryCache.js';
import { CategoryClusterer } from '../src/clustering/CategoryClusterer.js';
import { EmbeddingGateway } from '../src/embedding/EmbeddingGateway.js';
import { RecordStoreUnreachableError } from '../src/errors.js';
import { ProgressiveSearchEngine, compareHits, type SearchSettings } from '../src/search/ProgressiveSearchEngine.js';
import { IdentityQueryRewriter } from '../src/search/QueryRewriter.js';
import { LexicalTier, type SearchTier, type TierHit } from '../src/search/tiers.js';
import { DEFAULT_CONFIG } from '../src/config.js';
import type { Reflection } from '../src/types/Reflection.js';
import { FlakyRecordStore, KeywordEmbeddingProvider, deferred, makeReflection } from './helpers.js';

const SETTINGS: SearchSettings = {
  ...DEFAULT_CONFIG.search,
  minResults: 2,
  degradedTtlMs: 30_000,
};

interface SearchContext {
  store: FlakyRecordStore;
  provider: KeywordEmbeddingProvider;
  cache: QueryCache;
  clusterer: CategoryClusterer;
  engine: ProgressiveSearchEngine;
}

function setup(overrides: { settings?: Partial<SearchSettings>; tiers?: SearchTier[]; now?: () => number } = {}): SearchContext {
  const store = new FlakyRecordStore();
  const provider = new KeywordEmbeddingProvider();
  const cache = new QueryCache({
    l1Capacity: 50,
    ttlMs: 60_000,
    embeddingCapacity: 50,
    sweepIntervalMs: 0,
    graceMs: 10,
    now: overrides.now,
  });
  const clusterer = new CategoryClusterer({ ...DEFAULT_CONFIG.clustering, now: overrides.now });
  const gateway = new EmbeddingGateway(provider, { dimension: provider.dimension, timeoutMs: 1000 });
  const engine = new ProgressiveSearchEngine(
    { store, cache, gateway, clusterer, rewriter: new IdentityQueryRewriter(), tiers: overrides.tiers, now: overrides.now },
    { ...SETTINGS, ...overrides.settings },
  );
  return { store, provider, cache, clusterer, engine };
}

async function seed(ctx: SearchContext, reflections: Reflection[]): Promise<void> {
  for (const r of reflections) await ctx.store.persist(r);
}

describe('ProgressiveSearchEngine', () => {
  let ctx: SearchContext;

  beforeEach(() => {
    ctx = setup();
  });

  afterEach(async () => {
    await ctx.cache.shutdown();
  });

  it('should stop after the lexical tier when it finds enough confident hits', async () => {
    await seed(ctx, [
      makeReflection({ content: 'Size the database pool to the core count', embedding: [1, 0, 0] }),
      makeReflection({ content: 'A database pool needs a connection timeout', embedding: [1, 0, 0] }),
    ]);
    const res = await ctx.engine.search('database pool', { project: 'demo' });
    expect(res.tierReached).toBe(0);
    expect(res.results).toHaveLength(2);
    expect(res.results.every((r) => r.score === 1 && r.tier === 0)).toBe(true);
    expect(res.degraded).toBe(false);
    expect(ctx.engine.stats().tierRuns).toEqual({ 0: 1, 1: 0, 2: 0 });
    expect(ctx.provider.calls).toBe(0);
  });

  it('should escalate to the semantic tier when lexical results are thin', async () => {
    const lexical = makeReflection({ content: 'database pool sizing', embedding: [1, 0, 0] });
    const semantic = makeReflection({ content: 'Postgres connection limits', embedding: [0.9, 0.1, 0] });
    const unrelated = makeReflection({ content: 'Flexbox layout quirks', embedding: [0, 0, 1] });
    await seed(ctx, [lexical, semantic, unrelated]);

    const res = await ctx.engine.search('database pool', { project: 'demo' });
    expect(res.tierReached).toBe(1);
    expect(res.results.map((r) => r.reflection.id)).toEqual([lexical.id, semantic.id]);
    expect(res.results[0].tier).toBe(0);
    expect(res.results[1].tier).toBe(1);
    expect(res.results[1].score).toBeCloseTo(0.9 / Math.sqrt(0.82), 10);
    expect(ctx.engine.stats().tierRuns).toEqual({ 0: 1, 1: 1, 2: 0 });
  });

  it('should reach other projects only in the broad tier', async () => {
    const foreign = makeReflection({ content: 'Pool exhaustion under load', project: 'other', embedding: [0.8, 0.6, 0] });
    await seed(ctx, [foreign]);
    const res = await ctx.engine.search('database', { project: 'demo' });
    expect(res.tierReached).toBe(2);
    expect(res.results.map((r) => [r.reflection.id, r.tier])).toEqual([[foreign.id, 2]]);
    expect(res.results[0].score).toBeCloseTo(0.8, 10);
  });

  it('should narrow the semantic tier to the query category', async () => {
    const inCategory = makeReflection({ content: 'alpha', embedding: [1, 0, 0], categoryId: 'db' });
    const elsewhere = makeReflection({ content: 'beta', embedding: [0.9, 0.3, 0], categoryId: 'net' });
    ctx.clusterer.importState({
      version: 1,
      categories: [
        {
          categoryId: 'db',
          parentId: null,
          centroid: [1, 0, 0],
          memberCount: 1,
          keywords: [],
          createdAt: Date.now(),
          lastGrewAt: Date.now(),
          lastReclusteredAt: null,
          decayed: false,
        },
      ],
    });
    await seed(ctx, [inCategory, elsewhere]);
    const res = await ctx.engine.search('database', { project: 'demo', limit: 5 });
    const byTier = res.results.map((r) => [r.reflection.id, r.tier]);
    expect(byTier).toEqual([
      [inCategory.id, 1],
      [elsewhere.id, 2],
    ]);
  });

  it('should degrade to lexical results when embeddings are unavailable', async () => {
    ctx.provider.available = false;
    await seed(ctx, [makeReflection({ content: 'database pool sizing' })]);
    const res = await ctx.engine.search('database pool', { project: 'demo' });
    expect(res.tierReached).toBe(0);
    expect(res.results).toHaveLength(1);
    expect(res.degraded).toBe(true);
    expect(res.degradedReasons).toEqual(['embedding_unavailable']);
    // one failed call, then both semantic tiers skip without asking again
    expect(ctx.provider.calls).toBe(1);

    const again = await ctx.engine.search('database pool', { project: 'demo' });
    expect(again.cacheHit).toBe(true);
    expect(again.degraded).toBe(true);
  });

  it('should come back empty and degraded when nothing matches lexically and embeddings are off', async () => {
    ctx.provider.available = false;
    await seed(ctx, [makeReflection({ content: 'database pool sizing', embedding: [1, 0, 0] })]);
    const res = await ctx.engine.search('kubernetes ingress', { project: 'demo' });
    expect(res.results).toEqual([]);
    expect(res.degraded).toBe(true);
    expect(res.degradedReasons).toEqual(['embedding_unavailable']);
    expect(ctx.engine.stats().tierRuns[0]).toBe(1);
  });

  it('should serve repeated queries from the cache without running tiers', async () => {
    await seed(ctx, [makeReflection({ content: 'database pool sizing' }), makeReflection({ content: 'database pool timeout' })]);
    const first = await ctx.engine.search('Database Pool', { project: 'demo' });
    const second = await ctx.engine.search('database   pool', { project: 'demo' });
    expect(first.cacheHit).toBe(false);
    expect(second.cacheHit).toBe(true);
    expect(second.results.map((r) => r.reflection.id)).toEqual(first.results.map((r) => r.reflection.id));
    expect(ctx.engine.stats()).toEqual({ searches: 2, cacheHits: 1, tierRuns: { 0: 1, 1: 0, 2: 0 }, tierTimeouts: 0 });
  });

  it('should recompute when a cached result no longer resolves', async () => {
    const a = makeReflection({ content: 'database pool sizing' });
    const b = makeReflection({ content: 'database pool timeout' });
    await seed(ctx, [a, b]);
    await ctx.engine.search('database pool', { project: 'demo' });
    ctx.store.hidden.add(a.id);
    const res = await ctx.engine.search('database pool', { project: 'demo' });
    expect(res.cacheHit).toBe(false);
    expect(ctx.engine.stats().tierRuns[0]).toBe(2);
  });

  it('should keep reflections carrying any of the requested tags', async () => {
    const tagged = makeReflection({ content: 'database pool sizing', tags: ['postgres'] });
    const other = makeReflection({ content: 'database pool timeout', tags: ['mysql'] });
    const untagged = makeReflection({ content: 'database pool reuse' });
    await seed(ctx, [tagged, other, untagged]);
    const res = await ctx.engine.search('database pool', { project: 'demo', tags: ['Postgres', 'mysql'] });
    expect(res.results.map((r) => r.reflection.id).sort()).toEqual([tagged.id, other.id].sort());
  });

  it('should apply the score floor and the limit', async () => {
    await seed(ctx, [
      makeReflection({ content: 'database pool sizing' }),
      makeReflection({ content: 'database pool timeout' }),
      makeReflection({ content: 'database vacuum schedule' }),
    ]);
    const floor = await ctx.engine.search('database pool', { project: 'demo', minScore: 0.9 });
    expect(floor.results).toHaveLength(2);
    const limited = await ctx.engine.search('database pool', { project: 'demo', limit: 1 });
    expect(limited.results).toHaveLength(1);
    expect(limited.results[0].score).toBe(1);
  });

  it('should return nothing for a blank query', async () => {
    const res = await ctx.engine.search('   ', { project: 'demo' });
    expect(res.results).toEqual([]);
    expect(res.variants).toEqual([]);
    expect(ctx.engine.stats().tierRuns).toEqual({ 0: 0, 1: 0, 2: 0 });
  });

  it('should surface record store failures as RecordStoreUnreachableError', async () => {
    ctx.store.failing.add('lexicalSearch');
    await expect(ctx.engine.search('database', { project: 'demo' })).rejects.toBeInstanceOf(RecordStoreUnreachableError);
    await expect(ctx.engine.search('database', { project: 'demo' })).rejects.toMatchObject({
      code: 'RECORD_STORE_UNREACHABLE',
      operation: 'lexicalSearch',
    });
  });
});

describe('ProgressiveSearchEngine timeouts', () => {
  it('should move past a tier that overruns its budget and not cache the answer', async () => {
    const gate = deferred<TierHit[]>();
    const slow: SearchTier = {
      level: 1,
      name: 'semantic',
      costEstimate: 10,
      confidenceThreshold: 0.7,
      semantic: false,
      run: () => gate.promise,
    };
    const ctx = setup({ tiers: [new LexicalTier(0.6), slow], settings: { tierTimeoutMs: 20 } });
    await seed(ctx, [makeReflection({ content: 'database pool sizing' })]);

    const res = await ctx.engine.search('database pool', { project: 'demo' });
    expect(res.results).toHaveLength(1);
    expect(res.tierReached).toBe(1);
    expect(res.degradedReasons).toEqual(['tier_timeout']);
    expect(ctx.engine.stats().tierTimeouts).toBe(1);

    gate.resolve([]);
    const again = await ctx.engine.search('database pool', { project: 'demo' });
    expect(again.cacheHit).toBe(false);
    await ctx.cache.shutdown();
  });

  it('should return partial results once the search deadline passes', async () => {
    let clock = 0;
    const expensive: SearchTier = {
      level: 0,
      name: 'lexical',
      costEstimate: 1,
      confidenceThreshold: 0.6,
      semantic: false,
      run: async () => {
        clock += 5000;
        return [];
      },
    };
    const ctx = setup({ tiers: [expensive, new LexicalTier(0.6)], now: () => clock, settings: { searchTimeoutMs: 4000 } });
    const res = await ctx.engine.search('database', { project: 'demo' });
    expect(res.degradedReasons).toEqual(['search_timeout']);
    expect(res.tierReached).toBe(0);
    expect(res.tookMs).toBe(5000);
    expect(ctx.engine.stats().tierRuns).toEqual({ 0: 1, 1: 0, 2: 0 });
    await ctx.cache.shutdown();
  });
});

describe('compareHits', () => {
  it('should order by score, then newest, then id', () => {
    const older = makeReflection({ id: 'B', createdAt: '2026-01-01T00:00:00.000Z' });
    const newer = makeReflection({ id: 'A', createdAt: '2026-02-01T00:00:00.000Z' });
    const twin = makeReflection({ id: 'C', createdAt: '2026-02-01T00:00:00.000Z' });
    const hits: TierHit[] = [
      { reflection: older, score: 0.5, tier: 0 },
      { reflection: newer, score: 0.5, tier: 0 },
      { reflection: twin, score: 0.5, tier: 0 },
      { reflection: older, score: 0.9, tier: 1 },
    ];
    expect(hits.sort(compareHits).map((h) => `${h.reflection.id}:${h.score}`)).toEqual(['B:0.9', 'C:0.5', 'A:0.5', 'B:0.5']);
  });
});
