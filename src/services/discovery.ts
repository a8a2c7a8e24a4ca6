import type { Candidate, RawRecord } from '../types.js';
import { sourceTypeFor } from '../constants/sources.js';
import { isoNow } from '../utils/date.js';
import { extractTokens, isCandidateToken } from './extractor.js';
import { scoreConfidence } from './scoring.js';
import { buildSnippet } from './snippet.js';
import type { StateStore } from './stateStore.js';

export interface DiscoveryOptions {
  brandTerm?: string;
  now?: () => Date;
}

/**
 * Label shown next to a candidate: the record title, prefixed with the source name
 * unless the title already mentions it.
 */
export function displayTitle(title: string, sourceName: string): string {
  const base = title || 'Untitled';
  if (sourceName && !base.includes(sourceName)) return `[${sourceName}] ${base}`;
  return base;
}

/**
 * Run fetched records through extraction, the seen-gate, scoring and snippet building.
 * Each new token is claimed in the store before its candidate is appended, so a token
 * yields at most one candidate for the lifetime of the store.
 */
export function processRecords(
  records: readonly RawRecord[],
  sourceName: string,
  store: StateStore,
  opts: DiscoveryOptions = {},
): Candidate[] {
  const now = opts.now ?? (() => new Date());
  const created: Candidate[] = [];

  for (const record of records) {
    const title = record.title ?? '';
    const body = record.body ?? '';
    const text = `${title}\n${body}`;

    for (const token of extractTokens(text)) {
      // extractor contract: never let a malformed token reach the store
      if (!isCandidateToken(token)) continue;
      if (!store.claim(token)) continue;

      const confidence = scoreConfidence(text, token, { brandTerm: opts.brandTerm });
      const candidate: Candidate = {
        code: token,
        exampleText: buildSnippet(title, body, token),
        sourceTitle: displayTitle(title, sourceName),
        url: record.url ?? '',
        discoveredAt: isoNow(now()),
        confidence,
        sourceType: sourceName ? sourceTypeFor(sourceName) : 'unknown',
      };

      store.appendCandidate(candidate);
      created.push(candidate);
      store.appendLog(
        'success',
        `New candidate ${token} from ${sourceName || 'unknown source'} (conf=${confidence.toFixed(2)})`,
      );
    }
  }

  return created;
}
