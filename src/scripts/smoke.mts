#!/usr/bin/env node
import { getPollConfig } from '../config.js';
import { logger } from '../logger.js';
import { DEFAULT_SOURCES } from '../constants/sources.js';
import { SourceHttpClient } from '../services/httpClient.js';
import { createSourceFetcher } from '../services/fetchers.js';
import { PollOrchestrator } from '../services/orchestrator.js';
import { StateStore } from '../services/stateStore.js';

/**
 * Run one live cycle, optionally against a single source: `npm run smoke -- "Hacker News"`.
 */
async function main() {
  const only = process.argv[2];
  const sources = only ? DEFAULT_SOURCES.filter((s) => s.name.toLowerCase() === only.toLowerCase()) : DEFAULT_SOURCES;
  if (!sources.length) {
    console.error('[SMOKE] Unknown source:', only);
    console.error('[SMOKE] Known sources:', DEFAULT_SOURCES.map((s) => s.name).join(', '));
    process.exit(1);
  }

  const config = getPollConfig();
  const store = new StateStore({ logger });
  const poller = new PollOrchestrator({
    store,
    sources,
    fetchSource: createSourceFetcher(new SourceHttpClient({ timeoutMs: config.requestTimeoutMs, logger }), logger),
    loadConfig: () => config,
    logger,
  });

  console.log('[SMOKE] Polling', sources.length, 'source(s)');
  const report = await poller.runCycle(config);

  for (const outcome of report.outcomes) {
    const status = outcome.ok ? `${outcome.items} item(s), ${outcome.newCandidates} new` : `FAILED ${outcome.error}`;
    console.log(`[SMOKE] ${outcome.source}: ${status}`);
  }
  console.log('[SMOKE] Candidates:', report.candidates.length);
  console.log(
    '[SMOKE] Sample:',
    report.candidates.slice(0, 5).map((c) => ({ code: c.code, confidence: c.confidence, source: c.sourceTitle })),
  );
  process.exit(report.outcomes.some((o) => o.ok) ? 0 : 1);
}

main().catch((e: unknown) => {
  console.error('[SMOKE] Uncaught error:', e instanceof Error ? e.message : String(e));
  process.exit(1);
});
