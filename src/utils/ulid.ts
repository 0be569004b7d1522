// ULID-style ids: 10 chars of time + 16 chars of randomness, Crockford base32.
// Ids minted in the same millisecond increment the random part so they stay sortable.

import crypto from 'node:crypto';

const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_LEN = 10;
const RANDOM_LEN = 16;

let lastTime = -1;
let lastRandom: number[] = [];

function freshRandom(): number[] {
  const bytes = crypto.randomBytes(RANDOM_LEN);
  return Array.from(bytes, (b) => b % 32);
}

function increment(digits: number[]): number[] | null {
  const next = digits.slice();
  for (let i = next.length - 1; i >= 0; i--) {
    if (next[i] < 31) {
      next[i] += 1;
      return next;
    }
    next[i] = 0;
  }
  return null; // overflowed all 16 digits
}

export function encodeTime(time: number): string {
  let out = '';
  let t = time;
  for (let i = 0; i < TIME_LEN; i++) {
    const mod = t % 32;
    out = CROCKFORD[mod] + out;
    t = (t - mod) / 32;
  }
  return out;
}

export function decodeTime(id: string): number {
  let t = 0;
  for (const ch of id.slice(0, TIME_LEN)) {
    const v = CROCKFORD.indexOf(ch);
    if (v < 0) return NaN;
    t = t * 32 + v;
  }
  return t;
}

export function ulid(now: number = Date.now()): string {
  if (now === lastTime) {
    lastRandom = increment(lastRandom) ?? freshRandom();
  } else {
    lastTime = now;
    lastRandom = freshRandom();
  }
  return encodeTime(now) + lastRandom.map((d) => CROCKFORD[d]).join('');
}
