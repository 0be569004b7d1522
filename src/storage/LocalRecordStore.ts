import { InvertedIndexer } from './Indexer.js';
import { VectorIndex } from './VectorIndex.js';
import { readJsonIfExists, writeJsonAtomic } from './jsonFile.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import type { RecordStore, ScoredReflection } from './StorageAdapter.js';
import type { CategoryId, Reflection, ReflectionId, ReflectionPatch, Vector } from '../types/Reflection.js';

export interface LocalRecordStoreOptions {
  // JSON snapshot; in-memory only when unset
  file?: string;
  dimension?: number;
  logger?: Logger;
}

interface Snapshot {
  version: 1;
  savedAt: string;
  reflections: Reflection[];
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === 'string');
}

function parseReflection(value: unknown): Reflection | null {
  if (typeof value !== 'object' || value === null) return null;
  const r: Record<string, unknown> = { ...value };
  const embedding = r.embedding;
  if (
    typeof r.id !== 'string' ||
    typeof r.content !== 'string' ||
    typeof r.fingerprint !== 'string' ||
    typeof r.project !== 'string' ||
    typeof r.createdAt !== 'string' ||
    !(r.categoryId === null || typeof r.categoryId === 'string') ||
    !isStringArray(r.tags) ||
    !(embedding === null || (Array.isArray(embedding) && embedding.every((x) => typeof x === 'number')))
  ) {
    return null;
  }
  return {
    id: r.id,
    content: r.content,
    embedding: Array.isArray(embedding) ? embedding.map(Number) : null,
    fingerprint: r.fingerprint,
    categoryId: r.categoryId,
    tags: r.tags,
    project: r.project,
    createdAt: r.createdAt,
  };
}

function clone(r: Reflection): Reflection {
  return { ...r, embedding: r.embedding ? r.embedding.slice() : null, tags: [...r.tags] };
}

/**
 * Bundled in-process record store: BM25 for lexical search, brute-force
 * cosine for vectors, optional JSON snapshot rewritten after every change.
 */
export class LocalRecordStore implements RecordStore {
  private readonly file: string | undefined;
  private readonly log: Logger;
  private records: Map<ReflectionId, Reflection> = new Map();
  private readonly lexical = new InvertedIndexer();
  private readonly vectors: VectorIndex;
  private saving: Promise<void> = Promise.resolve();
  private loaded = false;

  constructor(opts: LocalRecordStoreOptions = {}) {
    this.file = opts.file;
    this.vectors = new VectorIndex(opts.dimension);
    this.log = opts.logger ?? createLogger('store');
  }

  get size(): number {
    return this.records.size;
  }

  async initialize(): Promise<void> {
    if (this.loaded) return;
    this.loaded = true;
    if (!this.file) return;
    const raw = await readJsonIfExists(this.file);
    if (raw === undefined) return;
    const list = typeof raw === 'object' && raw !== null && 'reflections' in raw && Array.isArray(raw.reflections) ? raw.reflections : [];
    let skipped = 0;
    for (const item of list) {
      const reflection = parseReflection(item);
      if (!reflection) {
        skipped++;
        continue;
      }
      this.index(reflection);
    }
    if (skipped > 0) this.log.warn('Skipped malformed reflections in snapshot', { file: this.file, skipped });
    this.log.info('Loaded reflections', { file: this.file, count: this.records.size });
  }

  async persist(reflection: Reflection): Promise<ReflectionId> {
    if (this.records.has(reflection.id)) throw new Error(`reflection ${reflection.id} already exists`);
    this.index(clone(reflection));
    try {
      await this.save();
    } catch (error) {
      this.unindex(reflection.id);
      throw error;
    }
    return reflection.id;
  }

  async fetchById(id: ReflectionId): Promise<Reflection | null> {
    const r = this.records.get(id);
    return r ? clone(r) : null;
  }

  async update(id: ReflectionId, patch: ReflectionPatch): Promise<Reflection | null> {
    const current = this.records.get(id);
    if (!current) return null;
    const next: Reflection = {
      ...current,
      tags: patch.tags ? [...patch.tags] : current.tags,
      categoryId: patch.categoryId !== undefined ? patch.categoryId : current.categoryId,
    };
    this.index(next);
    try {
      await this.save();
    } catch (error) {
      this.index(current);
      throw error;
    }
    return clone(next);
  }

  async lexicalSearch(text: string, project: string, limit: number): Promise<Reflection[]> {
    const hits = this.lexical.search(text, { filter: (id) => this.records.get(id)?.project === project });
    return hits.slice(0, limit).flatMap(({ id }) => {
      const r = this.records.get(id);
      return r ? [clone(r)] : [];
    });
  }

  async vectorSearch(
    embedding: Vector,
    project: string | null,
    categoryId: CategoryId | null,
    limit: number,
  ): Promise<ScoredReflection[]> {
    const hits = this.vectors.search(embedding, limit, (id) => {
      const r = this.records.get(id);
      if (!r) return false;
      if (project !== null && r.project !== project) return false;
      return categoryId === null || r.categoryId === categoryId;
    });
    return hits.flatMap(({ id, score }) => {
      const r = this.records.get(id);
      return r ? [{ reflection: clone(r), score }] : [];
    });
  }

  async listAll(): Promise<Reflection[]> {
    return Array.from(this.records.values(), clone);
  }

  async close(): Promise<void> {
    await this.saving;
  }

  private index(r: Reflection): void {
    this.records.set(r.id, r);
    this.lexical.updateItem(r);
    if (r.embedding) {
      try {
        this.vectors.set(r.id, r.embedding);
      } catch (error) {
        this.log.warn('Reflection embedding not indexed', { id: r.id, error: errorMessage(error) });
      }
    } else {
      this.vectors.remove(r.id);
    }
  }

  private unindex(id: ReflectionId): void {
    this.records.delete(id);
    this.lexical.removeItem(id);
    this.vectors.remove(id);
  }

  // Writes queue behind each other so snapshots land in order
  private save(): Promise<void> {
    const file = this.file;
    if (!file) return Promise.resolve();
    const next = this.saving.then(() => {
      const snapshot: Snapshot = {
        version: 1,
        savedAt: new Date().toISOString(),
        reflections: Array.from(this.records.values()),
      };
      return writeJsonAtomic(file, snapshot);
    });
    // The chain itself never rejects; the caller of this save gets the failure
    this.saving = next.catch((error: unknown) => {
      this.log.error('Snapshot write failed', { file, error: errorMessage(error) });
    });
    return next;
  }
}
