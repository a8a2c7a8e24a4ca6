import type { PollConfig } from '../config.js';
import type { Candidate, Snapshot } from '../types.js';
import { escapeHtml } from '../utils/normalize.js';
import type { PollPhase } from './orchestrator.js';

export type CodesPayload = Snapshot & {
  query: string;
  pollIntervalSeconds: number;
  maxPostsPerSource: number;
  poller: { phase: PollPhase; source?: string };
};

/**
 * JSON body for /codes.json: the store snapshot plus the settings in effect.
 */
export function buildCodesPayload(
  snapshot: Snapshot,
  config: PollConfig,
  poller: CodesPayload['poller'] = { phase: 'idle' },
): CodesPayload {
  return {
    ...snapshot,
    query: config.query,
    pollIntervalSeconds: config.pollIntervalSeconds,
    maxPostsPerSource: config.maxPostsPerSource,
    poller,
  };
}

export function confidenceClass(score: number): 'high' | 'medium' | 'low' {
  if (score >= 0.75) return 'high';
  if (score >= 0.5) return 'medium';
  return 'low';
}

function safeHref(url: string): string | null {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed.toString() : null;
  } catch {
    return null;
  }
}

function renderCandidate(item: Candidate): string {
  const code = `<code>${escapeHtml(item.code)}</code>`;
  const href = item.url ? safeHref(item.url) : null;
  const codeCell = href ? `<a href="${escapeHtml(href)}" target="_blank" rel="noopener">${code}</a>` : code;
  // exampleText is escaped when the candidate is built; only <mark> is markup
  return [
    '<tr>',
    `<td>${codeCell}</td>`,
    `<td><span class="confidence confidence-${confidenceClass(item.confidence)}">${(item.confidence * 100).toFixed(0)}%</span></td>`,
    `<td>${escapeHtml(item.sourceTitle || 'Unknown source')}</td>`,
    `<td>${item.exampleText}</td>`,
    `<td>${escapeHtml(item.discoveredAt)}</td>`,
    '</tr>',
  ].join('');
}

/**
 * Server-rendered dashboard. Refreshes itself every 30 seconds.
 */
export function renderDashboard(payload: CodesPayload): string {
  const { counters } = payload;

  const stats = [
    ['Last poll', payload.lastPoll ?? 'not yet'],
    ['Candidates', String(counters.totalCandidates)],
    ['Unique codes', String(counters.uniqueCodes)],
    ['Successful fetches', String(counters.successCount)],
    ['Failed fetches', String(counters.errorCount)],
  ]
    .map(([label, value]) => `<div class="stat"><div class="label">${escapeHtml(label)}</div><div class="value">${escapeHtml(value)}</div></div>`)
    .join('');

  const rows = payload.candidates.length
    ? payload.candidates.map(renderCandidate).join('')
    : '<tr><td colspan="5" class="empty">No candidates found yet.</td></tr>';

  const log = payload.activityLog.length
    ? payload.activityLog
        .map((e) => `<li class="log-${e.level}"><span class="ts">${escapeHtml(e.timestamp)}</span> ${escapeHtml(e.message)}</li>`)
        .join('')
    : '<li class="empty">No activity recorded yet.</li>';

  const sources = payload.sources
    .map((s) => {
      const status = s.enabled ? (s.healthy ? 'healthy' : s.lastError ? 'failing' : 'pending') : 'disabled';
      return `<li class="source-${status}">${escapeHtml(s.name)}: ${status} (last success ${escapeHtml(s.lastSuccess ?? 'never')}, last error ${escapeHtml(s.lastError ?? 'none')})</li>`;
    })
    .join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8" />
<meta http-equiv="refresh" content="30" />
<title>Invite Hunter</title>
<style>
body { font-family: -apple-system, "Segoe UI", Arial, sans-serif; margin: 2rem; }
.stats { display: flex; gap: 1rem; flex-wrap: wrap; }
.stat { border: 1px solid #ccc; border-radius: 6px; padding: 0.75rem 1rem; }
.label { font-size: 0.8rem; text-transform: uppercase; color: #555; }
.value { font-size: 1.4rem; font-weight: bold; }
table { border-collapse: collapse; width: 100%; }
th, td { border: 1px solid #ccc; padding: 0.5rem; text-align: left; vertical-align: top; }
.confidence-high { background: #d4edda; } .confidence-medium { background: #fff3cd; } .confidence-low { background: #f8d7da; }
.log-error { color: #b00; } .log-success { color: #064; } .log-debug { color: #777; }
</style>
</head>
<body>
<h1>Invite Hunter</h1>
<p>Query: <code>${escapeHtml(payload.query)}</code>, every ${payload.pollIntervalSeconds}s, up to ${payload.maxPostsPerSource} posts per source.</p>
<div class="stats">${stats}</div>
<h2>Candidates</h2>
<table>
<thead><tr><th>Code</th><th>Confidence</th><th>Source</th><th>Context</th><th>Discovered</th></tr></thead>
<tbody>${rows}</tbody>
</table>
<h2>Sources</h2>
<ul>${sources}</ul>
<h2>Activity</h2>
<ul>${log}</ul>
</body>
</html>`;
}
