import type { Vector } from '../types/Reflection.js';

export function norm(v: readonly number[]): number {
  let s = 0;
  for (const x of v) s += x * x;
  return Math.sqrt(s);
}

export function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0, na = 0, nb = 0;
  for (let i = 0; i < a.length && i < b.length; i++) { dot += a[i] * b[i]; na += a[i] * a[i]; nb += b[i] * b[i]; }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  return 1 - cosine(a, b);
}

export function mean(vectors: ReadonlyArray<readonly number[]>): Vector | null {
  if (vectors.length === 0) return null;
  const dim = vectors[0].length;
  const out = new Array<number>(dim).fill(0);
  for (const v of vectors) for (let i = 0; i < dim; i++) out[i] += v[i] ?? 0;
  for (let i = 0; i < dim; i++) out[i] /= vectors.length;
  return out;
}

/** Running mean: fold one more sample into a centroid that already averages `count` samples. */
export function foldInto(centroid: readonly number[], sample: readonly number[], count: number): Vector {
  return centroid.map((c, i) => (c * count + (sample[i] ?? 0)) / (count + 1));
}

/** Inverse of `foldInto`: takes one sample back out of a centroid averaging `count` samples. */
export function foldOut(centroid: readonly number[], sample: readonly number[], count: number): Vector {
  if (count <= 1) return centroid.slice();
  return centroid.map((c, i) => (c * count - (sample[i] ?? 0)) / (count - 1));
}

export function weightedMean(a: readonly number[], wa: number, b: readonly number[], wb: number): Vector {
  const total = wa + wb;
  if (total <= 0) return a.slice();
  return a.map((x, i) => (x * wa + (b[i] ?? 0) * wb) / total);
}

export function isFiniteVector(v: readonly number[]): boolean {
  return v.length > 0 && v.every((x) => Number.isFinite(x));
}
