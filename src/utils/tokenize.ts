import stopWordList from './stopwords.json';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

export function splitCamelCase(s: string): string[] {
  return s.replace(/([a-z0-9])([A-Z])/g, '$1 $2').split(/\s+/);
}

export function isStopWord(token: string): boolean {
  return STOP_WORDS.has(token);
}

/** Collapses simple plurals so "connections" and "connection" meet. */
export function stem(token: string): string {
  if (token.length > 4 && token.endsWith('ies')) return token.slice(0, -3) + 'y';
  if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss') && !token.endsWith('us')) {
    return token.slice(0, -1);
  }
  return token;
}

/** Lowercased word tokens, camelCase split, no filtering. */
export function rawTokens(text: string): string[] {
  if (!text) return [];
  return splitCamelCase(text)
    .join(' ')
    .toLowerCase()
    .split(/[^a-z0-9_]+/g)
    .filter(Boolean);
}

/** Search tokens: stop words removed, plurals stemmed, length >= 2. */
export function tokenize(text: string): string[] {
  return rawTokens(text)
    .filter((t) => t.length >= 2 && !STOP_WORDS.has(t))
    .map(stem);
}

export function uniqueTokens(text: string): string[] {
  return Array.from(new Set(tokenize(text)));
}

/** Whitespace-collapsed, lowercased form used for fingerprints and cache keys. */
export function normalizeText(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}
