import { tokenize, uniqueTokens } from '../utils/tokenize.js';
import type { RecordStore } from '../storage/StorageAdapter.js';
import type { ResolvedSearchOptions } from '../cache/queryFingerprint.js';
import type { CategoryId, Reflection, TierLevel, TierName, Vector } from '../types/Reflection.js';

export interface TierHit {
  reflection: Reflection;
  score: number;
  tier: TierLevel;
}

/** Per-search state shared by every tier. */
export interface TierContext {
  variants: string[];
  options: ResolvedSearchOptions;
  candidateLimit: number;
  store: RecordStore;
  // Resolves to the embeddings of the variants that could be embedded; empty when none
  embeddings(): Promise<Vector[]>;
  // Category the query falls into, null when it fits none
  queryCategory(): Promise<CategoryId | null>;
}

export interface SearchTier {
  readonly level: TierLevel;
  readonly name: TierName;
  // Relative cost; tiers run cheapest first
  readonly costEstimate: number;
  readonly confidenceThreshold: number;
  readonly semantic: boolean;
  run(ctx: TierContext): Promise<TierHit[]>;
}

/** Reflection carries at least one of the requested tags; no tags means no filter. */
export function matchesTags(reflection: Reflection, tags: readonly string[]): boolean {
  if (tags.length === 0) return true;
  const own = new Set(reflection.tags.map((t) => t.toLowerCase()));
  return tags.some((t) => own.has(t));
}

/** Share of the query's search tokens found in the reflection's content or tags. */
export function lexicalCoverage(queryTokens: readonly string[], reflection: Reflection): number {
  if (queryTokens.length === 0) return 0;
  const own = new Set([...tokenize(reflection.content), ...reflection.tags.flatMap((t) => tokenize(t))]);
  let hit = 0;
  for (const t of queryTokens) if (own.has(t)) hit++;
  return hit / queryTokens.length;
}

function keepBest(into: Map<string, TierHit>, hit: TierHit): void {
  const prior = into.get(hit.reflection.id);
  if (!prior || hit.score > prior.score) into.set(hit.reflection.id, hit);
}

export class LexicalTier implements SearchTier {
  readonly level = 0;
  readonly name = 'lexical';
  readonly costEstimate = 1;
  readonly semantic = false;

  constructor(readonly confidenceThreshold: number) {}

  async run(ctx: TierContext): Promise<TierHit[]> {
    const best = new Map<string, TierHit>();
    for (const variant of ctx.variants) {
      const tokens = uniqueTokens(variant);
      if (tokens.length === 0) continue;
      const candidates = await ctx.store.lexicalSearch(variant, ctx.options.project, ctx.candidateLimit);
      for (const reflection of candidates) {
        if (!matchesTags(reflection, ctx.options.tags)) continue;
        const score = lexicalCoverage(tokens, reflection);
        if (score > 0) keepBest(best, { reflection, score, tier: this.level });
      }
    }
    return Array.from(best.values());
  }
}

/** Cosine search within the query's category, or the whole project when it has none. */
export class SemanticTier implements SearchTier {
  readonly level = 1;
  readonly name = 'semantic';
  readonly costEstimate = 10;
  readonly semantic = true;

  constructor(readonly confidenceThreshold: number) {}

  async run(ctx: TierContext): Promise<TierHit[]> {
    const vectors = await ctx.embeddings();
    if (vectors.length === 0) return [];
    const categoryId = await ctx.queryCategory();
    return vectorHits(ctx, vectors, ctx.options.project, categoryId, this.confidenceThreshold, this.level);
  }
}

/** Same as the semantic tier with a lower floor, no category narrowing and every project. */
export class BroadSemanticTier implements SearchTier {
  readonly level = 2;
  readonly name = 'broad_semantic';
  readonly costEstimate = 30;
  readonly semantic = true;

  constructor(readonly confidenceThreshold: number) {}

  async run(ctx: TierContext): Promise<TierHit[]> {
    const vectors = await ctx.embeddings();
    if (vectors.length === 0) return [];
    return vectorHits(ctx, vectors, null, null, this.confidenceThreshold, this.level);
  }
}

async function vectorHits(
  ctx: TierContext,
  vectors: Vector[],
  project: string | null,
  categoryId: CategoryId | null,
  floor: number,
  tier: TierLevel,
): Promise<TierHit[]> {
  const best = new Map<string, TierHit>();
  for (const vector of vectors) {
    const hits = await ctx.store.vectorSearch(vector, project, categoryId, ctx.candidateLimit);
    for (const { reflection, score } of hits) {
      if (score < floor || !matchesTags(reflection, ctx.options.tags)) continue;
      keepBest(best, { reflection, score, tier });
    }
  }
  return Array.from(best.values());
}
