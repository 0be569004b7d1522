import { LRU } from '../utils/lru.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import { readJsonIfExists, writeJsonAtomic } from '../storage/jsonFile.js';
import type { CacheEntry } from '../types/Reflection.js';

/**
 * Second cache level. Lookups stay synchronous against an in-memory LRU;
 * implementations that persist do so in the background.
 */
export interface L2CacheStore {
  readonly capacity: number;
  readonly size: number;
  load(): Promise<void>;
  get(key: string): CacheEntry | undefined;
  set(key: string, entry: CacheEntry): void;
  delete(key: string): boolean;
  entries(): IterableIterator<[string, CacheEntry]>;
  clear(): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export class MemoryL2CacheStore implements L2CacheStore {
  protected lru: LRU<string, CacheEntry>;

  constructor(readonly capacity: number) {
    this.lru = new LRU(capacity);
  }

  get size(): number {
    return this.lru.size;
  }

  async load(): Promise<void> {}

  get(key: string): CacheEntry | undefined {
    return this.lru.get(key);
  }

  set(key: string, entry: CacheEntry): void {
    this.lru.set(key, entry);
  }

  delete(key: string): boolean {
    return this.lru.delete(key);
  }

  entries(): IterableIterator<[string, CacheEntry]> {
    return this.lru.entries();
  }

  clear(): void {
    this.lru.clear();
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {}
}

interface L2Snapshot {
  version: 1;
  savedAt: string;
  entries: Array<[string, CacheEntry]>;
}

const TIER_LEVELS = [0, 1, 2];

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === 'string');
}

function isCacheEntry(v: unknown): v is CacheEntry {
  if (typeof v !== 'object' || v === null) return false;
  const e: Record<string, unknown> = { ...v };
  return (
    typeof e.queryFingerprint === 'string' &&
    Array.isArray(e.results) &&
    e.results.every((r: unknown) => {
      if (typeof r !== 'object' || r === null) return false;
      const s: Record<string, unknown> = { ...r };
      return typeof s.id === 'string' && typeof s.score === 'number' && TIER_LEVELS.includes(Number(s.tier));
    }) &&
    TIER_LEVELS.includes(Number(e.tierReached)) &&
    typeof e.degraded === 'boolean' &&
    isStringArray(e.degradedReasons) &&
    typeof e.project === 'string' &&
    typeof e.crossProject === 'boolean' &&
    typeof e.openEnded === 'boolean' &&
    isStringArray(e.affectedCategories) &&
    isStringArray(e.affectedTags) &&
    isStringArray(e.affectedTerms) &&
    typeof e.createdAt === 'number' &&
    typeof e.ttlMs === 'number'
  );
}

/**
 * JSON-snapshot persistence with debounced, atomic (tmp + rename) writes.
 * Expired or malformed entries are dropped on load.
 */
export class FileL2CacheStore extends MemoryL2CacheStore {
  private readonly file: string;
  private readonly flushMs: number;
  private readonly log: Logger;
  private dirty = false;
  private flushTimer: NodeJS.Timeout | null = null;
  private writing: Promise<void> | null = null;

  constructor(file: string, capacity: number, opts: { flushMs?: number; logger?: Logger } = {}) {
    super(capacity);
    this.file = file;
    this.flushMs = opts.flushMs ?? 2000;
    this.log = opts.logger ?? createLogger('cache.l2');
  }

  async load(): Promise<void> {
    let raw: unknown;
    try {
      raw = await readJsonIfExists(this.file);
    } catch (error) {
      // A torn or foreign file only costs warm-up; start cold
      this.log.warn('Discarding unreadable L2 snapshot', { file: this.file, error: errorMessage(error) });
      return;
    }
    if (raw === undefined) return;
    const entries = typeof raw === 'object' && raw !== null && 'entries' in raw && Array.isArray(raw.entries) ? raw.entries : [];
    const now = Date.now();
    let loaded = 0;
    for (const item of entries) {
      if (!Array.isArray(item) || item.length !== 2 || typeof item[0] !== 'string') continue;
      const entry: unknown = item[1];
      if (!isCacheEntry(entry) || entry.createdAt + entry.ttlMs <= now) continue;
      this.lru.set(item[0], entry);
      loaded++;
    }
    this.log.info('Loaded L2 cache snapshot', { file: this.file, entries: loaded });
  }

  set(key: string, entry: CacheEntry): void {
    super.set(key, entry);
    this.markDirty();
  }

  delete(key: string): boolean {
    const removed = super.delete(key);
    if (removed) this.markDirty();
    return removed;
  }

  clear(): void {
    super.clear();
    this.markDirty();
  }

  async flush(): Promise<void> {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.writing) await this.writing;
    if (!this.dirty) return;
    this.dirty = false;
    const snapshot: L2Snapshot = {
      version: 1,
      savedAt: new Date().toISOString(),
      entries: Array.from(this.lru.entries()),
    };
    this.writing = writeJsonAtomic(this.file, snapshot);
    try {
      await this.writing;
    } finally {
      this.writing = null;
    }
  }

  async close(): Promise<void> {
    await this.flush();
  }

  private markDirty(): void {
    this.dirty = true;
    if (this.flushTimer) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush().catch((error: unknown) => {
        this.dirty = true;
        this.log.error('Failed to persist L2 cache', { file: this.file, error: errorMessage(error) });
      });
    }, this.flushMs);
    this.flushTimer.unref();
  }
}
