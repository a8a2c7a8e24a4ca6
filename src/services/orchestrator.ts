import type { PollConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { Candidate, SourceDescriptor } from '../types.js';
import { sleep as defaultSleep, type Sleep } from '../utils/async.js';
import { isoNow } from '../utils/date.js';
import { processRecords } from './discovery.js';
import type { SourceFetcher } from './fetchers.js';
import type { StateStore } from './stateStore.js';

export const MIN_SLEEP_MS = 5000;

export type PollPhase = 'idle' | 'fetching' | 'processing' | 'sleeping';

export interface SourceOutcome {
  source: string;
  ok: boolean;
  items: number;
  newCandidates: number;
  error?: string;
}

export interface CycleReport {
  startedAt: string;
  finishedAt: string;
  outcomes: SourceOutcome[];
  candidates: Candidate[];
}

export interface PollOrchestratorOptions {
  store: StateStore;
  sources: readonly SourceDescriptor[];
  fetchSource: SourceFetcher;
  loadConfig: () => PollConfig;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => Date;
  minSleepMs?: number;
}

/**
 * Time to rest after a cycle so cycles start roughly every `intervalSeconds`,
 * never less than `floorMs`.
 */
export function nextSleepMs(intervalSeconds: number, elapsedMs: number, floorMs = MIN_SLEEP_MS): number {
  return Math.max(intervalSeconds * 1000 - elapsedMs, floorMs);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Single producer that polls every enabled source in registration order and feeds
 * the results into the store. One failing source never aborts a cycle.
 */
export class PollOrchestrator {
  private readonly store: StateStore;
  private readonly sources: readonly SourceDescriptor[];
  private readonly fetchSource: SourceFetcher;
  private readonly loadConfig: () => PollConfig;
  private readonly logger?: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly minSleepMs: number;
  private phase: PollPhase = 'idle';
  private current?: string;

  constructor(opts: PollOrchestratorOptions) {
    this.store = opts.store;
    this.sources = opts.sources;
    this.fetchSource = opts.fetchSource;
    this.loadConfig = opts.loadConfig;
    this.logger = opts.logger;
    this.sleep = opts.sleep ?? defaultSleep;
    this.now = opts.now ?? (() => new Date());
    this.minSleepMs = opts.minSleepMs ?? MIN_SLEEP_MS;

    for (const source of this.sources) {
      this.store.registerSource(source.name, source.enabled);
    }
  }

  get state(): { phase: PollPhase; source?: string } {
    return { phase: this.phase, source: this.current };
  }

  /**
   * One full pass over the enabled sources.
   */
  async runCycle(config: PollConfig = this.loadConfig()): Promise<CycleReport> {
    const startedAt = isoNow(this.now());
    const off = new Set(config.disabledSources.map((name) => name.toLowerCase()));
    const enabled: SourceDescriptor[] = [];
    for (const source of this.sources) {
      const on = source.enabled && !off.has(source.name.toLowerCase());
      this.store.registerSource(source.name, on);
      if (on) enabled.push(source);
    }
    const outcomes: SourceOutcome[] = [];
    const candidates: Candidate[] = [];

    this.store.appendLog('info', `Starting poll cycle (${enabled.length} sources)`);

    for (const source of enabled) {
      this.phase = 'fetching';
      this.current = source.name;
      try {
        const records = await this.fetchSource(source, config);

        this.phase = 'processing';
        const found = processRecords(records, source.name, this.store, {
          brandTerm: config.brandTerm,
          now: this.now,
        });
        candidates.push(...found);
        this.store.recordSuccess(source.name, isoNow(this.now()));
        this.store.appendLog('debug', `${source.name}: ${records.length} item(s), ${found.length} new`);
        outcomes.push({ source: source.name, ok: true, items: records.length, newCandidates: found.length });

        // rate limiting applies after a successful fetch only
        if (source.delayMs > 0) {
          await this.sleep(source.delayMs);
        }
      } catch (error) {
        const message = errorMessage(error);
        this.logger?.debug({ err: error, source: source.name }, 'Source fetch failed');
        this.store.appendLog('error', `${source.name}: ${message}`);
        this.store.recordFailure(source.name, isoNow(this.now()));
        outcomes.push({ source: source.name, ok: false, items: 0, newCandidates: 0, error: message });
      }
    }

    if (candidates.length) {
      this.store.appendLog('success', `Discovered ${candidates.length} new candidates`);
    } else {
      this.store.appendLog('info', 'No new candidates this cycle');
    }

    const finishedAt = isoNow(this.now());
    this.store.markPolled(finishedAt);
    this.phase = 'idle';
    this.current = undefined;

    return { startedAt, finishedAt, outcomes, candidates };
  }

  /**
   * Poll forever. Config is re-read at the start of every cycle.
   */
  async run(): Promise<never> {
    for (;;) {
      const started = this.now().getTime();
      const config = this.loadConfig();
      await this.runCycle(config);

      this.phase = 'sleeping';
      await this.sleep(nextSleepMs(config.pollIntervalSeconds, this.now().getTime() - started, this.minSleepMs));
      this.phase = 'idle';
    }
  }
}
