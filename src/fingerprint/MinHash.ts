import { CorruptSignatureError } from '../errors.js';
import { normalizeText } from '../utils/tokenize.js';

/**
 * MinHash over character shingles of the normalized text.
 *
 * Each of the `numHashes` permutations is simulated by xor-ing the shingle's
 * FNV-1a hash with a per-permutation seed and running murmur3's finalizer.
 * Everything stays in unsigned 32-bit space, so signatures are identical
 * across processes and platforms.
 */

export interface Signature {
  hashes: Uint32Array;
  shingleCount: number;
}

const EMPTY_SLOT = 0xffffffff;
const ENCODING_VERSION = 'mh1';

function fnv1a(text: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function fmix32(input: number): number {
  let h = input;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

// mulberry32; fixed seed so every process derives the same permutations
function seedSequence(count: number, seed = 0x5eed1234): Uint32Array {
  const out = new Uint32Array(count);
  let state = seed >>> 0;
  for (let i = 0; i < count; i++) {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    out[i] = (t ^ (t >>> 14)) >>> 0;
  }
  return out;
}

export function shingles(content: string, size: number): Set<string> {
  const text = normalizeText(content);
  const out = new Set<string>();
  if (!text) return out;
  if (text.length <= size) {
    out.add(text);
    return out;
  }
  for (let i = 0; i + size <= text.length; i++) out.add(text.slice(i, i + size));
  return out;
}

export class MinHasher {
  readonly numHashes: number;
  readonly shingleSize: number;
  private readonly seeds: Uint32Array;

  constructor(opts: { numHashes: number; shingleSize: number }) {
    this.numHashes = opts.numHashes;
    this.shingleSize = opts.shingleSize;
    this.seeds = seedSequence(opts.numHashes);
  }

  /** Pure and deterministic. Untokenizable content yields the sentinel. */
  compute(content: string): Signature {
    const set = shingles(content, this.shingleSize);
    const hashes = new Uint32Array(this.numHashes).fill(EMPTY_SLOT);
    if (set.size === 0) return { hashes, shingleCount: 0 };
    for (const shingle of set) {
      const base = fnv1a(shingle);
      for (let i = 0; i < this.numHashes; i++) {
        const v = fmix32(base ^ this.seeds[i]);
        if (v < hashes[i]) hashes[i] = v;
      }
    }
    return { hashes, shingleCount: set.size };
  }

  sentinel(): Signature {
    return { hashes: new Uint32Array(this.numHashes).fill(EMPTY_SLOT), shingleCount: 0 };
  }
}

export function isSentinel(sig: Signature): boolean {
  return sig.shingleCount === 0;
}

/**
 * Estimated Jaccard similarity: the share of permutations whose minimum
 * agrees. Symmetric; a sentinel never matches anything, itself included.
 */
export function estimateJaccard(a: Signature, b: Signature): number {
  if (a.hashes.length !== b.hashes.length) {
    throw new CorruptSignatureError(`signature width mismatch: ${a.hashes.length} vs ${b.hashes.length}`);
  }
  if (isSentinel(a) || isSentinel(b)) return 0;
  let same = 0;
  for (let i = 0; i < a.hashes.length; i++) if (a.hashes[i] === b.hashes[i]) same++;
  return same / a.hashes.length;
}

/** `mh1:<shingleCount>:<base64 little-endian words>` */
export function encodeSignature(sig: Signature): string {
  const bytes = Buffer.alloc(sig.hashes.length * 4);
  sig.hashes.forEach((h, i) => bytes.writeUInt32LE(h, i * 4));
  return `${ENCODING_VERSION}:${sig.shingleCount}:${bytes.toString('base64')}`;
}

export function decodeSignature(encoded: string, expectedWidth?: number): Signature {
  const parts = encoded.split(':');
  if (parts.length !== 3 || parts[0] !== ENCODING_VERSION) {
    throw new CorruptSignatureError(`unrecognized signature encoding: ${encoded.slice(0, 16)}`);
  }
  const shingleCount = Number(parts[1]);
  if (!Number.isInteger(shingleCount) || shingleCount < 0) {
    throw new CorruptSignatureError(`invalid shingle count: ${parts[1]}`);
  }
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(parts[2])) {
    throw new CorruptSignatureError('signature payload is not base64');
  }
  const bytes = Buffer.from(parts[2], 'base64');
  if (bytes.length === 0 || bytes.length % 4 !== 0) {
    throw new CorruptSignatureError(`signature payload has ${bytes.length} bytes`);
  }
  const hashes = new Uint32Array(bytes.length / 4);
  for (let i = 0; i < hashes.length; i++) hashes[i] = bytes.readUInt32LE(i * 4);
  if (expectedWidth !== undefined && hashes.length !== expectedWidth) {
    throw new CorruptSignatureError(`expected ${expectedWidth} hashes, found ${hashes.length}`);
  }
  return { hashes, shingleCount };
}
