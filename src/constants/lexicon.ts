/**
 * Word lists used by extraction and scoring.
 */

// Markup and protocol fragments that leak into scraped text as token-shaped runs.
export const TOKEN_DENYLIST = ['HTTP', 'HTTPS', 'HTML', 'JSON', 'XML'] as const;

export const INVITE_KEYWORDS = [
  'invite',
  'code',
  'beta',
  'access',
  'key',
  'token',
  'giveaway',
  'sharing',
  'redeem',
  'signup',
] as const;

// Text with these reads like a log dump or stack trace rather than a sharing post.
export const NOISE_TERMS = ['error', 'exception', 'stack', 'debug'] as const;

export const DEFAULT_BRAND_TERM = 'sora';
