import synonymGroups from './synonyms.json';
import { normalizeText } from '../utils/tokenize.js';

/** Turns a raw query into one or more search variants; the first is always the normalized query. */
export interface QueryRewriter {
  readonly name: string;
  rewrite(query: string, maxVariants: number): string[];
}

export class IdentityQueryRewriter implements QueryRewriter {
  readonly name = 'identity';

  rewrite(query: string): string[] {
    const normalized = normalizeText(query);
    return normalized ? [normalized] : [];
  }
}

function buildSynonymMap(groups: readonly string[][]): Map<string, string[]> {
  const map = new Map<string, string[]>();
  for (const group of groups) {
    for (const word of group) {
      const others = group.filter((w) => w !== word);
      map.set(word, Array.from(new Set([...(map.get(word) ?? []), ...others])));
    }
  }
  return map;
}

const DEFAULT_SYNONYMS: ReadonlyMap<string, string[]> = buildSynonymMap(synonymGroups);

/**
 * Swaps one word at a time for a known synonym ("db" <-> "database"),
 * left to right, until `maxVariants` is reached.
 */
export class SynonymQueryRewriter implements QueryRewriter {
  readonly name = 'synonym';
  private readonly synonyms: ReadonlyMap<string, string[]>;

  constructor(groups?: readonly string[][]) {
    this.synonyms = groups ? buildSynonymMap(groups) : DEFAULT_SYNONYMS;
  }

  rewrite(query: string, maxVariants: number): string[] {
    const normalized = normalizeText(query);
    if (!normalized) return [];
    const variants = [normalized];
    const words = normalized.split(' ');
    for (let i = 0; i < words.length && variants.length < maxVariants; i++) {
      const bare = words[i].replace(/^[^\w]+|[^\w]+$/g, '');
      for (const alt of this.synonyms.get(bare) ?? []) {
        if (variants.length >= maxVariants) break;
        const swapped = [...words.slice(0, i), words[i].replace(bare, alt), ...words.slice(i + 1)].join(' ');
        if (!variants.includes(swapped)) variants.push(swapped);
      }
    }
    return variants;
  }
}
