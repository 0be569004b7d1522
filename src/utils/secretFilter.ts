import crypto from 'node:crypto';

// Reflections are often pasted from terminals; keep obvious credentials out of the store.
const patterns: RegExp[] = [
  /sk-[A-Za-z0-9_-]{32,}/g, // OpenAI-style keys
  /xox[baprs]-[A-Za-z0-9-]+/g, // slack tokens
  /AIza[0-9A-Za-z\-_]{35}/g, // Google API keys
  /gh[pousr]_[0-9A-Za-z]{36}/g, // GitHub tokens
  /AWS(?:SECRET|ACCESS)[A-Z_]*?=[A-Za-z0-9/+]{20,}/gi,
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
];

export const REDACTION_MARKER = '<redacted-secret>';

export interface RedactionResult {
  text: string;
  // sha256 of each removed secret, so repeated leaks can be correlated
  refs: string[];
}

export function redactSecrets(input: string): RedactionResult {
  if (!input) return { text: input, refs: [] };
  let text = input;
  const refs = new Set<string>();
  for (const re of patterns) {
    text = text.replace(re, (match) => {
      refs.add(crypto.createHash('sha256').update(match).digest('hex'));
      return REDACTION_MARKER;
    });
  }
  return { text, refs: Array.from(refs) };
}
