import { createHash } from 'node:crypto';
import { normalizeText } from '../utils/tokenize.js';
import type { SearchOptions } from '../types/Reflection.js';

export interface ResolvedSearchOptions {
  project: string;
  tags: string[];
  limit: number;
  minScore: number;
}

export function resolveSearchOptions(options: SearchOptions, defaultLimit: number): ResolvedSearchOptions {
  const tags = Array.from(new Set((options.tags ?? []).map((t) => t.trim().toLowerCase()).filter(Boolean))).sort();
  return {
    project: options.project,
    tags,
    limit: Math.max(1, Math.floor(options.limit ?? defaultLimit)),
    minScore: options.minScore ?? 0,
  };
}

/** Cache key: sha256 over the normalized query and every option that changes the answer. */
export function queryFingerprint(query: string, options: ResolvedSearchOptions): string {
  const material = JSON.stringify({
    q: normalizeText(query),
    project: options.project,
    tags: options.tags,
    limit: options.limit,
    minScore: options.minScore,
  });
  return createHash('sha256').update(material).digest('hex');
}
