import { escapeHtml, escapeRegExp } from '../utils/normalize.js';

const CONTEXT_RADIUS = 60;
const FALLBACK_LENGTH = 200;

const isHighSurrogate = (unit: number) => unit >= 0xd800 && unit <= 0xdbff;
const isLowSurrogate = (unit: number) => unit >= 0xdc00 && unit <= 0xdfff;

/**
 * Build an HTML-safe excerpt around the first occurrence of `token`,
 * wrapping every occurrence inside the excerpt in <mark>.
 */
export function buildSnippet(title: string, body: string, token: string): string {
  const safeTitle = title ?? '';
  const combined = `${safeTitle}\n${body ?? ''}`.trim();
  if (!combined) return escapeHtml(safeTitle || token || '');
  if (!token) return escapeHtml(combined.slice(0, FALLBACK_LENGTH).replace(/\n/g, ' ').trim());

  const needle = escapeRegExp(token);
  const first = new RegExp(needle, 'i').exec(combined);

  let start = 0;
  let end = Math.min(combined.length, FALLBACK_LENGTH);
  if (first) {
    start = Math.max(first.index - CONTEXT_RADIUS, 0);
    end = Math.min(first.index + first[0].length + CONTEXT_RADIUS, combined.length);
  }
  // keep surrogate pairs whole at both edges
  if (start > 0 && isLowSurrogate(combined.charCodeAt(start))) start -= 1;
  if (end < combined.length && isHighSurrogate(combined.charCodeAt(end - 1))) end += 1;

  const window = combined.slice(start, end).replace(/\n/g, ' ').trim();

  const parts: string[] = [];
  let last = 0;
  for (const match of window.matchAll(new RegExp(needle, 'gi'))) {
    const at = match.index ?? 0;
    parts.push(escapeHtml(window.slice(last, at)));
    parts.push(`<mark>${escapeHtml(match[0])}</mark>`);
    last = at + match[0].length;
  }
  parts.push(escapeHtml(window.slice(last)));
  return parts.join('');
}
