import { LRU } from '../utils/lru.js';
import { sleep } from '../utils/concurrency.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { MemoryL2CacheStore, type L2CacheStore } from './L2CacheStore.js';
import type { CacheEntry, CacheStats, InvalidationRequest, Vector } from '../types/Reflection.js';

export interface QueryCacheOptions {
  l1Capacity: number;
  ttlMs: number;
  embeddingCapacity: number;
  sweepIntervalMs: number;
  graceMs: number;
  l2?: L2CacheStore;
  l2Capacity?: number;
  now?: () => number;
  logger?: Logger;
}

// Invalidations remembered for the put guard; older puts are dropped outright
const INVALIDATION_LOG_SIZE = 256;

interface LoggedInvalidation {
  seq: number;
  request: InvalidationRequest;
}

function overlaps(a: readonly string[], b: readonly string[]): boolean {
  if (a.length === 0 || b.length === 0) return false;
  const set = new Set(a);
  return b.some((x) => set.has(x));
}

/** Whether a committed write can change the answer recorded in `entry`. */
export function invalidationMatches(entry: CacheEntry, req: InvalidationRequest): boolean {
  if (entry.project !== req.project && !entry.crossProject) return false;
  if (req.broad) return true;
  if (req.embedded && entry.openEnded) return true;
  return (
    overlaps(entry.affectedCategories, req.categories) ||
    overlaps(entry.affectedTags, req.tags) ||
    overlaps(entry.affectedTerms, req.terms)
  );
}

function freeze(entry: CacheEntry): CacheEntry {
  return Object.freeze({
    ...entry,
    results: entry.results.map((r) => Object.freeze({ ...r })),
    degradedReasons: [...entry.degradedReasons],
    affectedCategories: [...entry.affectedCategories],
    affectedTags: [...entry.affectedTags],
    affectedTerms: [...entry.affectedTerms],
  });
}

function copy(entry: CacheEntry): CacheEntry {
  return {
    ...entry,
    results: entry.results.map((r) => ({ ...r })),
    degradedReasons: [...entry.degradedReasons],
    affectedCategories: [...entry.affectedCategories],
    affectedTags: [...entry.affectedTags],
    affectedTerms: [...entry.affectedTerms],
  };
}

/**
 * Two-level memo of search results.
 *
 * Stored entries are frozen values. Eviction and invalidation only drop the
 * map's pointer, so a reader that already holds an entry keeps a valid one;
 * callers always receive a private copy. Supporting structures (the L2
 * snapshot, the sweep timer) are torn down only after in-flight reads drain
 * or the grace window closes.
 */
export class QueryCache {
  private readonly l1: LRU<string, CacheEntry>;
  private readonly l2: L2CacheStore;
  private readonly embeddings: LRU<string, Vector>;
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly graceMs: number;
  private readonly now: () => number;
  private readonly log: Logger;

  private seq = 0;
  private invalidationLog: LoggedInvalidation[] = [];
  private clearedAtSeq = 0;
  // L2 keys whose removal waits out the grace window
  private pendingL2Removals: Map<string, number> = new Map();
  private sweepTimer: NodeJS.Timeout | null = null;
  private activeReads = 0;
  private closed = false;

  private lookups = 0;
  private l1Hits = 0;
  private l2Hits = 0;
  private invalidations = 0;
  private evictions = 0;

  constructor(opts: QueryCacheOptions) {
    this.l1 = new LRU(opts.l1Capacity, () => {
      this.evictions++;
    });
    this.l2 = opts.l2 ?? new MemoryL2CacheStore(opts.l2Capacity ?? opts.l1Capacity * 50);
    this.embeddings = new LRU(opts.embeddingCapacity);
    this.ttlMs = opts.ttlMs;
    this.sweepIntervalMs = opts.sweepIntervalMs;
    this.graceMs = opts.graceMs;
    this.now = opts.now ?? Date.now;
    this.log = opts.logger ?? createLogger('cache');
  }

  get defaultTtlMs(): number {
    return this.ttlMs;
  }

  /** Sequence number a search records before computing; hand it back to `put`. */
  get currentSeq(): number {
    return this.seq;
  }

  async init(): Promise<void> {
    await this.l2.load();
    if (this.sweepIntervalMs > 0 && !this.sweepTimer) {
      this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  get(key: string): CacheEntry | undefined {
    if (this.closed) return undefined;
    this.lookups++;
    const now = this.now();

    const hot = this.l1.get(key);
    if (hot) {
      if (!this.expired(hot, now)) {
        this.l1Hits++;
        return copy(hot);
      }
      this.l1.delete(key);
    }

    const warm = this.pendingL2Removals.has(key) ? undefined : this.l2.get(key);
    if (warm) {
      if (!this.expired(warm, now)) {
        this.l2Hits++;
        const frozen = freeze(warm);
        this.l1.set(key, frozen);
        return copy(frozen);
      }
      this.l2.delete(key);
    }
    return undefined;
  }

  /**
   * Stores into both levels. When `sinceSeq` is given and a matching
   * invalidation committed after it, the entry describes a world that no
   * longer exists and is dropped. Returns whether it was stored.
   */
  put(key: string, entry: CacheEntry, sinceSeq?: number): boolean {
    if (this.closed) return false;
    if (sinceSeq !== undefined && this.invalidatedSince(entry, sinceSeq)) {
      this.log.debug('Dropping cache put raced by a write', { key, sinceSeq, seq: this.seq });
      return false;
    }
    const frozen = freeze(entry);
    this.pendingL2Removals.delete(key);
    this.l1.set(key, frozen);
    this.l2.set(key, frozen);
    return true;
  }

  /**
   * Called after a write commits. L1 drops matches immediately; L2 keys are
   * hidden at once and physically removed by the next sweep past the grace
   * window. Returns the number of entries invalidated.
   */
  invalidate(req: InvalidationRequest): number {
    this.seq++;
    this.invalidationLog.push({ seq: this.seq, request: req });
    if (this.invalidationLog.length > INVALIDATION_LOG_SIZE) this.invalidationLog.shift();

    const doomed = new Set<string>();
    for (const [key, entry] of this.l1.entries()) {
      if (invalidationMatches(entry, req)) doomed.add(key);
    }
    for (const [key, entry] of this.l2.entries()) {
      if (!this.pendingL2Removals.has(key) && invalidationMatches(entry, req)) doomed.add(key);
    }
    const now = this.now();
    for (const key of doomed) {
      this.l1.delete(key);
      this.pendingL2Removals.set(key, now);
    }
    this.invalidations += doomed.size;
    if (doomed.size > 0) this.log.debug('Invalidated cache entries', { project: req.project, count: doomed.size });
    return doomed.size;
  }

  /** Drops everything; used after the category layout changes wholesale. */
  clear(): void {
    this.seq++;
    this.clearedAtSeq = this.seq;
    this.invalidations += this.l1.size;
    this.l1.clear();
    const now = this.now();
    for (const [key] of this.l2.entries()) this.pendingL2Removals.set(key, now);
    this.log.debug('Cleared query cache');
  }

  /** Removes TTL-expired entries and finishes invalidations older than the grace window. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of Array.from(this.l1.entries())) {
      if (this.expired(entry, now)) {
        this.l1.delete(key);
        removed++;
      }
    }
    for (const [key, entry] of Array.from(this.l2.entries())) {
      if (this.expired(entry, now) && !this.pendingL2Removals.has(key)) {
        this.l2.delete(key);
        removed++;
      }
    }
    for (const [key, markedAt] of Array.from(this.pendingL2Removals)) {
      if (now - markedAt >= this.graceMs) {
        this.l2.delete(key);
        this.pendingL2Removals.delete(key);
      }
    }
    return removed;
  }

  getEmbedding(normalizedQuery: string): Vector | undefined {
    const v = this.embeddings.get(normalizedQuery);
    return v ? [...v] : undefined;
  }

  putEmbedding(normalizedQuery: string, vector: Vector): void {
    this.embeddings.set(normalizedQuery, [...vector]);
  }

  beginRead(): void {
    this.activeReads++;
  }

  endRead(): void {
    if (this.activeReads > 0) this.activeReads--;
  }

  stats(): CacheStats {
    const l2Visible = Math.max(0, this.l2.size - this.pendingL2Removals.size);
    return {
      l1HitRate: this.lookups === 0 ? 0 : this.l1Hits / this.lookups,
      l2HitRate: this.lookups === 0 ? 0 : this.l2Hits / this.lookups,
      size: Math.max(this.l1.size, l2Visible),
      l1Size: this.l1.size,
      l2Size: l2Visible,
      lookups: this.lookups,
      invalidations: this.invalidations,
      evictions: this.evictions,
    };
  }

  /** Stops the sweeper, waits up to `graceMs` for in-flight reads, then flushes L2. */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    const deadline = Date.now() + this.graceMs;
    while (this.activeReads > 0 && Date.now() < deadline) await sleep(5);
    if (this.activeReads > 0) {
      this.log.warn('Shutting down with reads still in flight', { reads: this.activeReads });
    }
    for (const key of this.pendingL2Removals.keys()) this.l2.delete(key);
    this.pendingL2Removals.clear();
    await this.l2.close();
    this.l1.clear();
    this.embeddings.clear();
  }

  private expired(entry: CacheEntry, now: number): boolean {
    return entry.createdAt + entry.ttlMs <= now;
  }

  private invalidatedSince(entry: CacheEntry, sinceSeq: number): boolean {
    if (sinceSeq >= this.seq) return false;
    if (this.clearedAtSeq > sinceSeq) return true;
    const oldest = this.invalidationLog[0];
    // Too old to check against the log
    if (!oldest || oldest.seq > sinceSeq + 1) return true;
    return this.invalidationLog.some(
      (logged) => logged.seq > sinceSeq && invalidationMatches(entry, logged.request),
    );
  }
}
