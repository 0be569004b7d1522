import { cosine, norm } from '../utils/vector.js';
import type { Vector } from '../types/Reflection.js';

/** Brute-force cosine index. Every stored vector has the same dimension. */
export class VectorIndex {
  private vectors: Map<string, Vector> = new Map();
  private dim: number | undefined;

  constructor(dim?: number) {
    this.dim = dim;
  }

  get size(): number {
    return this.vectors.size;
  }

  get dimension(): number | undefined {
    return this.dim;
  }

  set(id: string, vec: Vector): void {
    if (vec.length === 0) throw new Error('vector must be non-empty numeric array');
    if (this.dim === undefined) this.dim = vec.length;
    if (this.dim !== vec.length) throw new Error(`vector dimension mismatch: expected ${this.dim}, got ${vec.length}`);
    this.vectors.set(id, vec.slice());
  }

  remove(id: string): void {
    this.vectors.delete(id);
  }

  clear(): void {
    this.vectors = new Map();
  }

  search(query: Vector, k: number = 100, filter?: (id: string) => boolean): Array<{ id: string; score: number }> {
    if (this.dim !== undefined && query.length !== this.dim) return [];
    const out: Array<{ id: string; score: number }> = [];
    if (norm(query) === 0) return out;
    for (const [id, v] of this.vectors) {
      if (filter && !filter(id)) continue;
      const s = cosine(query, v);
      if (s > 0) out.push({ id, score: s });
    }
    out.sort((a, b) => b.score - a.score);
    return out.slice(0, k);
  }
}
