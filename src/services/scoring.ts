import { DEFAULT_BRAND_TERM, INVITE_KEYWORDS, NOISE_TERMS } from '../constants/lexicon.js';
import { clamp } from '../utils/normalize.js';

export interface ScoreOptions {
  brandTerm?: string;
}

const BASE_SCORE = 0.5;
const KEYWORD_WEIGHT = 0.1;
const KEYWORD_CAP = 0.3;
const BRAND_BONUS = 0.15;
const NOISE_PENALTY = 0.3;

/**
 * Confidence that `token` in `text` is a genuinely shared invite code.
 * Heuristics: invite vocabulary (capped), brand mention, and log/stack-trace noise.
 * Output: 0.1..1.0
 */
export function scoreConfidence(text: string, _token: string, opts: ScoreOptions = {}): number {
  const lower = (text || '').toLowerCase();
  const brand = (opts.brandTerm ?? DEFAULT_BRAND_TERM).toLowerCase();

  let score = BASE_SCORE;

  const keywordHits = INVITE_KEYWORDS.filter((kw) => lower.includes(kw)).length;
  score += Math.min(keywordHits * KEYWORD_WEIGHT, KEYWORD_CAP);

  if (brand && lower.includes(brand)) score += BRAND_BONUS;

  if (NOISE_TERMS.some((term) => lower.includes(term))) score -= NOISE_PENALTY;

  return clamp(score, 0.1, 1.0);
}
