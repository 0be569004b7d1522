export type ReflectionId = string; // ULID
export type CategoryId = string;
export type Vector = number[];

export interface Reflection {
  id: ReflectionId;
  content: string;
  embedding: Vector | null;
  // base64 MinHash signature; sentinel for untokenizable content
  fingerprint: string;
  categoryId: CategoryId | null;
  tags: string[];
  project: string;
  createdAt: string;
}

export interface ReflectionPatch {
  tags?: string[];
  categoryId?: CategoryId | null;
}

export interface StoreMetadata {
  project: string;
  tags?: string[];
}

export type StoreStatus = 'created' | 'duplicate' | 'merged';

export interface StoreOutcome {
  id: ReflectionId;
  status: StoreStatus;
  duplicateOf?: ReflectionId;
  similarity?: number;
  categoryId: CategoryId | null;
  degradedReasons: DegradationReason[];
}

export type DegradationReason =
  | 'embedding_unavailable'
  | 'fingerprint_failed'
  | 'tier_timeout'
  | 'search_timeout';

export type TierName = 'lexical' | 'semantic' | 'broad_semantic';
export type TierLevel = 0 | 1 | 2;

export interface SearchOptions {
  project: string;
  tags?: string[];
  limit?: number;
  minScore?: number;
}

export interface ScoredId {
  id: ReflectionId;
  score: number;
  tier: TierLevel;
}

export interface RankedResult {
  reflection: Reflection;
  score: number;
  tier: TierLevel;
}

export interface RankedResults {
  query: string;
  variants: string[];
  results: RankedResult[];
  tierReached: TierLevel;
  cacheHit: boolean;
  degraded: boolean;
  degradedReasons: DegradationReason[];
  tookMs: number;
}

export interface CacheEntry {
  queryFingerprint: string;
  results: ScoredId[];
  tierReached: TierLevel;
  degraded: boolean;
  degradedReasons: DegradationReason[];
  project: string;
  // Tier 2 results may come from other projects
  crossProject: boolean;
  // Semantic tiers ran without category narrowing; any embedded write in scope may change the answer
  openEnded: boolean;
  affectedCategories: CategoryId[];
  affectedTags: string[];
  // Search tokens of every query variant; lexical results can only change through these
  affectedTerms: string[];
  createdAt: number;
  ttlMs: number;
}

export interface InvalidationRequest {
  project: string;
  categories: CategoryId[];
  tags: string[];
  terms: string[];
  // The write carried an embedding, so it can surface in semantic tiers
  embedded: boolean;
  // Category layout changed (new centroid, recluster); drop everything in scope
  broad: boolean;
}

export interface CacheStats {
  l1HitRate: number;
  l2HitRate: number;
  size: number;
  l1Size: number;
  l2Size: number;
  lookups: number;
  invalidations: number;
  evictions: number;
}

export interface FingerprintRecord {
  reflectionId: ReflectionId;
  signature: Uint32Array;
  shingleCount: number;
  project: string;
  seq: number;
}

export interface NearDuplicate {
  reflectionId: ReflectionId;
  similarity: number;
}

export interface CategoryCentroid {
  categoryId: CategoryId;
  parentId: CategoryId | null;
  centroid: Vector | null;
  memberCount: number;
  keywords: string[];
  createdAt: number;
  lastGrewAt: number;
  lastReclusteredAt: number | null;
  decayed: boolean;
}

export interface ClusterMember {
  id: ReflectionId;
  embedding: Vector | null;
  categoryId: CategoryId | null;
  content: string;
}

export interface CategoryClusterReport {
  merged: Array<{ from: CategoryId; into: CategoryId; distance: number }>;
  split: Array<{ source: CategoryId; created: CategoryId; variance: number }>;
  decayed: CategoryId[];
  removed: CategoryId[];
  reassigned: Record<ReflectionId, CategoryId | null>;
  categoryCount: number;
  // Mean silhouette over embedded members, cosine distance; 1 with fewer than two clusters
  silhouette: number;
  durationMs: number;
  completedAt: string;
}
