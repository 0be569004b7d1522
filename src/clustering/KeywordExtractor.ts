import { isStopWord } from '../utils/tokenize.js';

export interface KeywordExtractorOptions {
  minLength?: number;
  maxKeywords?: number;
  technicalTerms?: boolean;
}

// Identifiers weigh double: snake_case, camelCase, dotted paths, calls
const TECH_PATTERNS: RegExp[] = [
  /\b[a-z]+(?:_[a-z0-9]+)+\b/g,
  /\b[a-z]+(?:[A-Z][a-z0-9]+)+\b/g,
  /\b[a-z_]+(?:\.[a-z_]+)+\b/gi,
  /\b\w+\(\)/g,
];

/** Frequency-ranked labels for a category, from the text of its members. */
export class KeywordExtractor {
  private readonly minLength: number;
  private readonly maxKeywords: number;
  private readonly technicalTerms: boolean;

  constructor(opts: KeywordExtractorOptions = {}) {
    this.minLength = opts.minLength ?? 3;
    this.maxKeywords = opts.maxKeywords ?? 10;
    this.technicalTerms = opts.technicalTerms ?? true;
  }

  extract(...texts: string[]): string[] {
    const freq = new Map<string, number>();
    const bump = (word: string, by: number) => freq.set(word, (freq.get(word) ?? 0) + by);

    for (const text of texts) {
      for (const word of text.toLowerCase().split(/[^\w\-]+/)) {
        if (word.length >= this.minLength && !isStopWord(word) && !/^\d+$/.test(word)) bump(word, 1);
      }
      if (!this.technicalTerms) continue;
      for (const pattern of TECH_PATTERNS) {
        for (const match of text.match(pattern) ?? []) {
          if (match.length >= this.minLength) bump(match.toLowerCase(), 2);
        }
      }
    }
    return Array.from(freq.entries())
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, this.maxKeywords)
      .map(([word]) => word);
  }
}
