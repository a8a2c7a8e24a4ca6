import type { Logger } from '../logger.js';
import type {
  ActivityLevel,
  ActivityLogEntry,
  Candidate,
  Snapshot,
  SourceHealth,
} from '../types.js';
import { RingBuffer } from '../utils/ringBuffer.js';
import { isAtOrAfter, isoNow } from '../utils/date.js';

export interface StateStoreOptions {
  maxCandidates?: number;
  maxLogEntries?: number;
  // mirror for activity entries
  logger?: Logger;
  now?: () => Date;
}

type HealthRecord = Omit<SourceHealth, 'healthy'>;

/**
 * Owns every piece of shared runtime state: candidates, seen tokens, activity log,
 * source health and counters.
 *
 * All methods are synchronous. With one event loop each call runs to completion before
 * any reader or the poller can observe the store, so a single call is the critical
 * section, and no call spans a network wait. Check-then-set on tokens goes through
 * `claim()` so it stays a single call.
 */
export class StateStore {
  private readonly candidates: RingBuffer<Candidate>;
  private readonly activity: RingBuffer<ActivityLogEntry>;
  private readonly seen = new Set<string>();
  private readonly health = new Map<string, HealthRecord>();
  private readonly logger?: Logger;
  private readonly now: () => Date;

  private successCount = 0;
  private errorCount = 0;
  private lastPoll: string | null = null;

  constructor(opts: StateStoreOptions = {}) {
    this.candidates = new RingBuffer<Candidate>(opts.maxCandidates ?? 1000);
    this.activity = new RingBuffer<ActivityLogEntry>(opts.maxLogEntries ?? 500);
    this.logger = opts.logger;
    this.now = opts.now ?? (() => new Date());
  }

  isSeen(token: string): boolean {
    return this.seen.has(token);
  }

  markSeen(token: string): void {
    this.seen.add(token);
  }

  /**
   * Atomically check and mark a token. Returns true only for the first claim;
   * the caller that wins is the only one allowed to create the candidate.
   */
  claim(token: string): boolean {
    if (this.seen.has(token)) return false;
    this.seen.add(token);
    return true;
  }

  appendCandidate(candidate: Candidate): void {
    this.candidates.push(Object.freeze({ ...candidate }));
  }

  findCandidate(code: string): Candidate | undefined {
    const wanted = code.trim().toUpperCase();
    return this.candidates.toArray().find((c) => c.code === wanted);
  }

  appendLog(level: ActivityLevel, message: string): ActivityLogEntry {
    const entry: ActivityLogEntry = Object.freeze({ timestamp: isoNow(this.now()), level, message });
    this.activity.push(entry);
    this.mirror(entry);
    return entry;
  }

  registerSource(name: string, enabled: boolean): void {
    const existing = this.health.get(name);
    if (existing) {
      existing.enabled = enabled;
      return;
    }
    this.health.set(name, { name, enabled, lastSuccess: null, lastError: null });
  }

  recordSuccess(name: string, at: string = isoNow(this.now())): void {
    this.healthFor(name).lastSuccess = at;
    this.successCount += 1;
  }

  recordFailure(name: string, at: string = isoNow(this.now())): void {
    this.healthFor(name).lastError = at;
    this.errorCount += 1;
  }

  markPolled(at: string = isoNow(this.now())): void {
    this.lastPoll = at;
  }

  /**
   * Consistent copy of the whole store. Lists are most-recent-first; the result is frozen.
   */
  snapshot(): Snapshot {
    const sources = Array.from(this.health.values()).map((h) =>
      Object.freeze({ ...h, healthy: isAtOrAfter(h.lastSuccess, h.lastError) }),
    );
    return Object.freeze({
      candidates: Object.freeze(this.candidates.toArrayNewestFirst()),
      activityLog: Object.freeze(this.activity.toArrayNewestFirst()),
      counters: Object.freeze({
        successCount: this.successCount,
        errorCount: this.errorCount,
        totalCandidates: this.candidates.size,
        uniqueCodes: this.seen.size,
      }),
      sources: Object.freeze(sources),
      lastPoll: this.lastPoll,
    });
  }

  private healthFor(name: string): HealthRecord {
    let record = this.health.get(name);
    if (!record) {
      record = { name, enabled: true, lastSuccess: null, lastError: null };
      this.health.set(name, record);
    }
    return record;
  }

  private mirror(entry: ActivityLogEntry): void {
    if (!this.logger) return;
    switch (entry.level) {
      case 'debug':
        this.logger.debug(entry.message);
        break;
      case 'error':
        this.logger.error(entry.message);
        break;
      case 'success':
        this.logger.info({ activity: 'success' }, entry.message);
        break;
      default:
        this.logger.info(entry.message);
    }
  }
}
