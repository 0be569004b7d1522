import { estimateJaccard, isSentinel, type Signature } from './MinHash.js';
import { CorruptSignatureError } from '../errors.js';
import type { FingerprintRecord, NearDuplicate, ReflectionId } from '../types/Reflection.js';

export interface FingerprintIndexOptions {
  numHashes: number;
  bands: number;
  // Below this threshold banding misses too many true pairs; scan instead
  lshMinThreshold: number;
}

export interface NearDuplicateFilter {
  project?: string;
  exclude?: ReflectionId;
}

/**
 * Banded LSH over MinHash signatures. Each band of `rows` consecutive hashes
 * becomes a bucket key; signatures sharing any bucket are candidates and are
 * then scored exactly. Writers replace bucket sets rather than mutating ones
 * a concurrent reader may be iterating.
 */
export class FingerprintIndex {
  private readonly numHashes: number;
  private readonly bands: number;
  private readonly rows: number;
  private readonly lshMinThreshold: number;
  private records: Map<ReflectionId, FingerprintRecord> = new Map();
  private buckets: Map<string, ReadonlySet<ReflectionId>> = new Map();
  private seq = 0;

  constructor(opts: FingerprintIndexOptions) {
    if (opts.numHashes % opts.bands !== 0) {
      throw new RangeError(`numHashes (${opts.numHashes}) must be divisible by bands (${opts.bands})`);
    }
    this.numHashes = opts.numHashes;
    this.bands = opts.bands;
    this.rows = opts.numHashes / opts.bands;
    this.lshMinThreshold = opts.lshMinThreshold;
  }

  get size(): number {
    return this.records.size;
  }

  get bucketCount(): number {
    return this.buckets.size;
  }

  /** Band bucket keys of a signature. Also used as write-lock keys. */
  bandKeys(sig: Signature): string[] {
    this.assertWidth(sig);
    const keys: string[] = [];
    for (let b = 0; b < this.bands; b++) {
      const start = b * this.rows;
      keys.push(`${b}:${Array.from(sig.hashes.subarray(start, start + this.rows), (h) => h.toString(36)).join('.')}`);
    }
    return keys;
  }

  get(reflectionId: ReflectionId): FingerprintRecord | undefined {
    return this.records.get(reflectionId);
  }

  /** Idempotent for identical arguments; a changed signature replaces the old one. */
  insert(reflectionId: ReflectionId, sig: Signature, project: string): void {
    this.assertWidth(sig);
    const existing = this.records.get(reflectionId);
    if (existing && existing.project === project && sameHashes(existing.signature, sig.hashes)) return;
    if (existing) this.remove(reflectionId);

    const record: FingerprintRecord = {
      reflectionId,
      signature: sig.hashes.slice(),
      shingleCount: sig.shingleCount,
      project,
      seq: ++this.seq,
    };
    this.records.set(reflectionId, record);
    // Sentinels would all collide in every band; they are kept but never bucketed
    if (isSentinel(sig)) return;
    for (const key of this.bandKeys(sig)) {
      const next = new Set(this.buckets.get(key));
      next.add(reflectionId);
      this.buckets.set(key, next);
    }
  }

  remove(reflectionId: ReflectionId): boolean {
    const record = this.records.get(reflectionId);
    if (!record) return false;
    this.records.delete(reflectionId);
    if (record.shingleCount > 0) {
      for (const key of this.bandKeys({ hashes: record.signature, shingleCount: record.shingleCount })) {
        const current = this.buckets.get(key);
        if (!current) continue;
        const next = new Set(current);
        next.delete(reflectionId);
        if (next.size === 0) this.buckets.delete(key);
        else this.buckets.set(key, next);
      }
    }
    return true;
  }

  /**
   * Every indexed signature with estimated Jaccard >= threshold, most similar
   * first, newer first on ties. No match is an empty list.
   */
  findNearDuplicates(sig: Signature, threshold: number, limit: number, filter: NearDuplicateFilter = {}): NearDuplicate[] {
    this.assertWidth(sig);
    if (isSentinel(sig) || limit <= 0) return [];

    const candidates = threshold >= this.lshMinThreshold ? this.candidatesFor(sig) : this.records.keys();
    const scored: Array<NearDuplicate & { seq: number }> = [];
    for (const id of candidates) {
      if (id === filter.exclude) continue;
      const record = this.records.get(id);
      if (!record) continue;
      if (filter.project !== undefined && record.project !== filter.project) continue;
      const similarity = estimateJaccard(sig, { hashes: record.signature, shingleCount: record.shingleCount });
      if (similarity >= threshold) scored.push({ reflectionId: id, similarity, seq: record.seq });
    }
    scored.sort((a, b) => b.similarity - a.similarity || b.seq - a.seq);
    return scored.slice(0, limit).map(({ reflectionId, similarity }) => ({ reflectionId, similarity }));
  }

  clear(): void {
    this.records = new Map();
    this.buckets = new Map();
  }

  private candidatesFor(sig: Signature): Set<ReflectionId> {
    const out = new Set<ReflectionId>();
    for (const key of this.bandKeys(sig)) {
      const bucket = this.buckets.get(key);
      if (bucket) for (const id of bucket) out.add(id);
    }
    return out;
  }

  private assertWidth(sig: Signature): void {
    if (sig.hashes.length !== this.numHashes) {
      throw new CorruptSignatureError(`expected ${this.numHashes} hashes, got ${sig.hashes.length}`);
    }
  }
}

function sameHashes(a: Uint32Array, b: Uint32Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}
