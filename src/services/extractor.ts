import { TOKEN_DENYLIST } from '../constants/lexicon.js';

// Run of 5..12 uppercase letters or digits, bounded by non-word characters in any script.
const TOKEN_PATTERN = /(?<![\p{L}\p{N}_])[A-Z0-9]{5,12}(?![\p{L}\p{N}_])/gu;
const DIGIT = /\d/;

/**
 * A token is kept only if it carries a digit and none of the denylisted fragments.
 * Pure-letter runs are ordinary words once the text is upper-cased.
 */
export function isCandidateToken(token: string): boolean {
  if (!DIGIT.test(token)) return false;
  return !TOKEN_DENYLIST.some((fragment) => token.includes(fragment));
}

/**
 * Extract distinct candidate tokens from free text, in first-occurrence order.
 */
export function extractTokens(text: string): string[] {
  const upper = (text || '').toUpperCase();
  const seen = new Set<string>();
  for (const match of upper.matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    if (isCandidateToken(token)) seen.add(token);
  }
  return Array.from(seen);
}
