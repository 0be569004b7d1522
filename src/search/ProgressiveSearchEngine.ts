import { QueryCache } from '../cache/QueryCache.js';
import { queryFingerprint, resolveSearchOptions, type ResolvedSearchOptions } from '../cache/queryFingerprint.js';
import { EmbeddingGateway } from '../embedding/EmbeddingGateway.js';
import { CategoryClusterer } from '../clustering/CategoryClusterer.js';
import { SynonymQueryRewriter, type QueryRewriter } from './QueryRewriter.js';
import { BroadSemanticTier, LexicalTier, SemanticTier, type SearchTier, type TierContext, type TierHit } from './tiers.js';
import { errorMessage } from '../errors.js';
import { guardedStore } from '../storage/guardedStore.js';
import { withTimeout } from '../utils/concurrency.js';
import { uniqueTokens } from '../utils/tokenize.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { RecordStore } from '../storage/StorageAdapter.js';
import type { RecallConfig } from '../types/Config.js';
import type {
  CacheEntry,
  CategoryId,
  DegradationReason,
  RankedResult,
  RankedResults,
  SearchOptions,
  TierLevel,
  Vector,
} from '../types/Reflection.js';

export interface ProgressiveSearchDeps {
  store: RecordStore;
  cache: QueryCache;
  gateway: EmbeddingGateway;
  clusterer: CategoryClusterer;
  rewriter?: QueryRewriter;
  tiers?: SearchTier[];
  now?: () => number;
  logger?: Logger;
}

export type SearchSettings = RecallConfig['search'] & { degradedTtlMs: number };

/** Tier call counts, for instrumentation and tests. */
export interface TierCounters {
  searches: number;
  cacheHits: number;
  tierRuns: Record<TierLevel, number>;
  tierTimeouts: number;
}

/** Ordering across and within tiers: score desc, then newer first, then id for a stable order. */
export function compareHits(a: TierHit, b: TierHit): number {
  return (
    b.score - a.score ||
    b.reflection.createdAt.localeCompare(a.reflection.createdAt) ||
    b.reflection.id.localeCompare(a.reflection.id)
  );
}

/**
 * Cache first, then tiers in increasing cost until one satisfies the
 * result floor. Embedding trouble and tier timeouts degrade the answer;
 * only the record store can fail a search.
 */
export class ProgressiveSearchEngine {
  private readonly store: RecordStore;
  private readonly cache: QueryCache;
  private readonly gateway: EmbeddingGateway;
  private readonly clusterer: CategoryClusterer;
  private readonly rewriter: QueryRewriter;
  private readonly tiers: SearchTier[];
  private readonly settings: SearchSettings;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly counters: TierCounters = {
    searches: 0,
    cacheHits: 0,
    tierRuns: { 0: 0, 1: 0, 2: 0 },
    tierTimeouts: 0,
  };

  constructor(deps: ProgressiveSearchDeps, settings: SearchSettings) {
    this.store = guardedStore(deps.store);
    this.cache = deps.cache;
    this.gateway = deps.gateway;
    this.clusterer = deps.clusterer;
    this.settings = settings;
    this.rewriter = deps.rewriter ?? new SynonymQueryRewriter();
    this.tiers = (
      deps.tiers ?? [
        new LexicalTier(settings.tier0Threshold),
        new SemanticTier(settings.tier1Threshold),
        new BroadSemanticTier(settings.tier2Threshold),
      ]
    )
      .slice()
      .sort((a, b) => a.costEstimate - b.costEstimate);
    this.now = deps.now ?? Date.now;
    this.log = deps.logger ?? createLogger('search');
  }

  stats(): TierCounters {
    return { ...this.counters, tierRuns: { ...this.counters.tierRuns } };
  }

  async search(query: string, options: SearchOptions): Promise<RankedResults> {
    const started = this.now();
    this.counters.searches++;
    const opts = resolveSearchOptions(options, this.settings.defaultLimit);
    const variants = this.rewriter.rewrite(query, this.settings.maxVariants);
    const key = queryFingerprint(query, opts);

    this.cache.beginRead();
    try {
      const cached = this.cache.get(key);
      if (cached) {
        const hit = await this.fromCache(query, variants, cached, started);
        if (hit) return hit;
      }
    } finally {
      this.cache.endRead();
    }

    const sinceSeq = this.cache.currentSeq;
    const outcome = await this.runTiers(variants, opts, started);
    const ranked = Array.from(outcome.hits.values())
      .filter((h) => h.score >= opts.minScore)
      .sort(compareHits)
      .slice(0, opts.limit);

    const degradedReasons = Array.from(outcome.reasons);
    // A search cut short by a timeout is not a stable answer
    const cacheable = !outcome.reasons.has('tier_timeout') && !outcome.reasons.has('search_timeout');
    if (cacheable) {
      const degraded = degradedReasons.length > 0;
      const entry: CacheEntry = {
        queryFingerprint: key,
        results: ranked.map((h) => ({ id: h.reflection.id, score: h.score, tier: h.tier })),
        tierReached: outcome.tierReached,
        degraded,
        degradedReasons,
        project: opts.project,
        crossProject: outcome.crossProject,
        openEnded: outcome.openEnded,
        affectedCategories: affectedCategories(ranked, outcome.queryCategory),
        affectedTags: Array.from(new Set([...opts.tags, ...ranked.flatMap((h) => h.reflection.tags.map((t) => t.toLowerCase()))])),
        affectedTerms: Array.from(new Set(variants.flatMap((v) => uniqueTokens(v)))),
        createdAt: this.now(),
        ttlMs: degraded ? this.settings.degradedTtlMs : this.cache.defaultTtlMs,
      };
      this.cache.put(key, entry, sinceSeq);
    }

    return {
      query,
      variants,
      results: ranked.map(toRankedResult),
      tierReached: outcome.tierReached,
      cacheHit: false,
      degraded: degradedReasons.length > 0,
      degradedReasons,
      tookMs: this.now() - started,
    };
  }

  /** Null when a cached id no longer resolves; the caller recomputes. */
  private async fromCache(
    query: string,
    variants: string[],
    entry: CacheEntry,
    started: number,
  ): Promise<RankedResults | null> {
    const reflections = await Promise.all(entry.results.map((r) => this.store.fetchById(r.id)));
    const results: RankedResult[] = [];
    for (let i = 0; i < entry.results.length; i++) {
      const reflection = reflections[i];
      if (!reflection) return null;
      results.push({ reflection, score: entry.results[i].score, tier: entry.results[i].tier });
    }
    this.counters.cacheHits++;
    return {
      query,
      variants,
      results,
      tierReached: entry.tierReached,
      cacheHit: true,
      degraded: entry.degraded,
      degradedReasons: entry.degradedReasons,
      tookMs: this.now() - started,
    };
  }

  private async runTiers(variants: string[], opts: ResolvedSearchOptions, started: number): Promise<TierOutcome> {
    const outcome: TierOutcome = {
      hits: new Map(),
      reasons: new Set(),
      tierReached: 0,
      openEnded: false,
      crossProject: false,
      queryCategory: null,
    };
    if (variants.length === 0) return outcome;

    const ctx = this.context(variants, opts, outcome);
    const deadline = started + this.settings.searchTimeoutMs;

    for (const tier of this.tiers) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        outcome.reasons.add('search_timeout');
        this.log.warn('Search deadline reached; returning partial results', { tier: tier.name });
        break;
      }
      this.counters.tierRuns[tier.level]++;
      const timed = await withTimeout(tier.run(ctx), Math.min(this.settings.tierTimeoutMs, remaining), (error) =>
        this.log.debug('Tier failed after its timeout', { tier: tier.name, error: errorMessage(error) }),
      );
      if (timed.timedOut) {
        this.counters.tierTimeouts++;
        outcome.reasons.add(this.now() >= deadline ? 'search_timeout' : 'tier_timeout');
        outcome.tierReached = tier.level;
        this.log.warn('Search tier timed out', { tier: tier.name });
        continue;
      }
      // A semantic tier without any query embedding was skipped, not reached
      if (tier.semantic && !ctx.semanticRan) continue;
      outcome.tierReached = tier.level;
      if (tier.semantic) {
        if (tier.level === 2) outcome.crossProject = true;
        if (tier.level === 2 || outcome.queryCategory === null) outcome.openEnded = true;
      }
      for (const hit of timed.value) {
        const prior = outcome.hits.get(hit.reflection.id);
        if (!prior || hit.score > prior.score) outcome.hits.set(hit.reflection.id, hit);
      }
      const confident = Array.from(outcome.hits.values()).filter((h) => h.score >= tier.confidenceThreshold).length;
      if (confident >= this.settings.minResults) break;
    }
    return outcome;
  }

  private context(variants: string[], opts: ResolvedSearchOptions, outcome: TierOutcome): TierContext & { semanticRan: boolean } {
    let vectors: Promise<Vector[]> | null = null;
    let category: Promise<CategoryId | null> | null = null;
    const ctx: TierContext & { semanticRan: boolean } = {
      variants,
      options: opts,
      candidateLimit: opts.limit * this.settings.candidateMultiplier,
      store: this.store,
      semanticRan: false,
      embeddings: () => {
        vectors ??= this.embedVariants(variants).then((vs) => {
          if (vs.length === 0) outcome.reasons.add('embedding_unavailable');
          else ctx.semanticRan = true;
          return vs;
        });
        return vectors;
      },
      queryCategory: () => {
        category ??= ctx.embeddings().then((vs) => {
          outcome.queryCategory = vs.length > 0 ? this.clusterer.nearest(vs[0]) : null;
          return outcome.queryCategory;
        });
        return category;
      },
    };
    return ctx;
  }

  private async embedVariants(variants: string[]): Promise<Vector[]> {
    const out: Vector[] = [];
    for (const variant of variants) {
      const memo = this.cache.getEmbedding(variant);
      if (memo) {
        out.push(memo);
        continue;
      }
      const result = await this.gateway.embed(variant);
      if (!result.ok) {
        // One failure means the provider is down for this search; stop asking
        if (result.error.reason !== 'empty_input') break;
        continue;
      }
      this.cache.putEmbedding(variant, result.vector);
      out.push(result.vector);
    }
    return out;
  }
}

interface TierOutcome {
  hits: Map<string, TierHit>;
  reasons: Set<DegradationReason>;
  tierReached: TierLevel;
  openEnded: boolean;
  crossProject: boolean;
  queryCategory: CategoryId | null;
}

function affectedCategories(hits: TierHit[], queryCategory: CategoryId | null): CategoryId[] {
  const set = new Set<CategoryId>();
  if (queryCategory) set.add(queryCategory);
  for (const h of hits) if (h.reflection.categoryId) set.add(h.reflection.categoryId);
  return Array.from(set);
}

function toRankedResult(hit: TierHit): RankedResult {
  return { reflection: hit.reflection, score: hit.score, tier: hit.tier };
}
