import { tokenize } from '../utils/tokenize.js';
import type { Reflection } from '../types/Reflection.js';

type Postings = Map<string, Map<string, number>>; // token -> id -> tf (weighted)

export interface IndexWeights {
  content: number;
  tag: number;
}

export interface Bm25Options {
  k1?: number;
  b?: number;
}

/** In-memory BM25 inverted index over reflection content and tags. */
export class InvertedIndexer {
  private postings: Postings = new Map();
  private lengths: Map<string, number> = new Map();
  private totalLength = 0;
  private readonly weights: IndexWeights;

  constructor(weights: Partial<IndexWeights> = {}) {
    this.weights = { content: weights.content ?? 2, tag: weights.tag ?? 3 };
  }

  get docCount(): number {
    return this.lengths.size;
  }

  updateItem(item: Pick<Reflection, 'id' | 'content' | 'tags'>): void {
    this.removeItem(item.id);

    let docLen = 0;
    const add = (text: string, weight: number) => {
      const toks = tokenize(text);
      docLen += toks.length * weight;
      for (const t of toks) {
        let posting = this.postings.get(t);
        if (!posting) {
          posting = new Map();
          this.postings.set(t, posting);
        }
        posting.set(item.id, (posting.get(item.id) ?? 0) + weight);
      }
    };

    add(item.content, this.weights.content);
    for (const tag of item.tags) add(tag, this.weights.tag);

    const length = docLen || 1; // avoid zero length
    this.lengths.set(item.id, length);
    this.totalLength += length;
  }

  removeItem(id: string): void {
    const length = this.lengths.get(id);
    if (length === undefined) return;
    for (const [tok, posting] of this.postings) {
      posting.delete(id);
      if (posting.size === 0) this.postings.delete(tok);
    }
    this.lengths.delete(id);
    this.totalLength -= length;
  }

  clear(): void {
    this.postings = new Map();
    this.lengths = new Map();
    this.totalLength = 0;
  }

  rebuildFromItems(items: Iterable<Pick<Reflection, 'id' | 'content' | 'tags'>>): void {
    this.clear();
    for (const it of items) this.updateItem(it);
  }

  search(
    term: string,
    opts: { filter?: (id: string) => boolean; bm25?: Bm25Options } = {},
  ): Array<{ id: string; score: number }> {
    const tokens = Array.from(new Set(tokenize(term)));
    const N = Math.max(1, this.docCount);
    const k1 = opts.bm25?.k1 ?? 1.5;
    const b = opts.bm25?.b ?? 0.75;
    const avgdl = this.docCount > 0 ? this.totalLength / this.docCount : 1;

    const scores = new Map<string, number>();
    for (const tok of tokens) {
      const posting = this.postings.get(tok);
      if (!posting) continue;
      const df = posting.size || 1;
      const idf = Math.log(1 + (N - df + 0.5) / (df + 0.5));
      for (const [id, tf] of posting) {
        if (opts.filter && !opts.filter(id)) continue;
        const dl = this.lengths.get(id) ?? avgdl;
        const denom = tf + k1 * (1 - b + b * (dl / avgdl));
        scores.set(id, (scores.get(id) ?? 0) + idf * ((tf * (k1 + 1)) / (denom || 1)));
      }
    }
    const arr = Array.from(scores, ([id, score]) => ({ id, score }));
    arr.sort((x, y) => y.score - x.score || (x.id < y.id ? 1 : -1));
    return arr;
  }
}
