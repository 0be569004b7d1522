import fs from 'fs-extra';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_CONFIG, mergeConfig } from '../src/config.js';
import { LocalRecordStore } from '../src/storage/LocalRecordStore.js';
import { tokenize } from '../src/utils/tokenize.js';
import type { EmbeddingProvider } from '../src/embedding/EmbeddingProvider.js';
import type { RecordStore, ScoredReflection } from '../src/storage/StorageAdapter.js';
import type { RecallConfig, RecallConfigOverrides } from '../src/types/Config.js';
import type {
  CacheEntry,
  CategoryId,
  Reflection,
  ReflectionId,
  ReflectionPatch,
  Vector,
} from '../src/types/Reflection.js';

export const VOCABULARY = ['database', 'network', 'frontend'];

/**
 * Embeds text as token counts over a small vocabulary, so tests can reason
 * about cosine scores exactly. Can be switched off or slowed down.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'keywords';
  readonly dimension: number;
  available = true;
  delayMs = 0;
  calls = 0;

  constructor(private readonly vocabulary: string[] = VOCABULARY) {
    this.dimension = vocabulary.length;
  }

  async embedText(text: string): Promise<Vector | null> {
    this.calls++;
    if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    if (!this.available) return null;
    const tokens = tokenize(text);
    return this.vocabulary.map((word) => tokens.filter((t) => t === word).length);
  }
}

export type StoreOperation = keyof Omit<RecordStore, 'initialize' | 'close'>;

/** Delegates to an in-memory store; operations named in `failing` reject. */
export class FlakyRecordStore implements RecordStore {
  readonly inner = new LocalRecordStore();
  readonly failing = new Set<StoreOperation>();
  readonly hidden = new Set<ReflectionId>();

  private check(op: StoreOperation): void {
    if (this.failing.has(op)) throw new Error(`${op}: connection refused`);
  }

  async persist(reflection: Reflection): Promise<ReflectionId> {
    this.check('persist');
    return this.inner.persist(reflection);
  }

  async fetchById(id: ReflectionId): Promise<Reflection | null> {
    this.check('fetchById');
    if (this.hidden.has(id)) return null;
    return this.inner.fetchById(id);
  }

  async update(id: ReflectionId, patch: ReflectionPatch): Promise<Reflection | null> {
    this.check('update');
    return this.inner.update(id, patch);
  }

  async lexicalSearch(text: string, project: string, limit: number): Promise<Reflection[]> {
    this.check('lexicalSearch');
    return this.inner.lexicalSearch(text, project, limit);
  }

  async vectorSearch(
    embedding: Vector,
    project: string | null,
    categoryId: CategoryId | null,
    limit: number,
  ): Promise<ScoredReflection[]> {
    this.check('vectorSearch');
    return this.inner.vectorSearch(embedding, project, categoryId, limit);
  }

  async listAll(): Promise<Reflection[]> {
    this.check('listAll');
    return this.inner.listAll();
  }
}

let sequence = 0;

export function makeReflection(overrides: Partial<Reflection> = {}): Reflection {
  sequence++;
  return {
    id: `R${String(sequence).padStart(4, '0')}`,
    content: 'placeholder reflection',
    embedding: null,
    fingerprint: 'mh1:0:AAAAAA==',
    categoryId: null,
    tags: [],
    project: 'demo',
    createdAt: new Date(Date.UTC(2026, 0, 1, 0, 0, sequence)).toISOString(),
    ...overrides,
  };
}

export function makeEntry(overrides: Partial<CacheEntry> = {}): CacheEntry {
  return {
    queryFingerprint: 'fp',
    results: [{ id: 'R1', score: 0.9, tier: 0 }],
    tierReached: 0,
    degraded: false,
    degradedReasons: [],
    project: 'demo',
    crossProject: false,
    openEnded: false,
    affectedCategories: [],
    affectedTags: [],
    affectedTerms: [],
    createdAt: 1000,
    ttlMs: 60_000,
    ...overrides,
  };
}

/** Small, quiet, in-memory configuration with background work switched off. */
export function testConfig(overrides: RecallConfigOverrides = {}): RecallConfig {
  const base = mergeConfig(DEFAULT_CONFIG, {
    embedding: { dimension: VOCABULARY.length, timeoutMs: 1000 },
    cache: { sweepIntervalMs: 0, l2FlushMs: 10 },
    clustering: { reclusterIntervalMs: 0, reclusterEveryWrites: 0 },
    logLevel: 'error',
  });
  return mergeConfig(base, overrides);
}

export async function makeTempDir(prefix = 'recall-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
