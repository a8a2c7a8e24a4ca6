/**
 * Shared types for Invite Hunter.
 */

/** One raw item returned by a source fetcher. */
export interface RawRecord {
  title: string;
  body: string;
  url: string;
}

/** A discovered token plus its scoring and provenance. Never mutated after creation. */
export interface Candidate {
  readonly code: string; // uppercase token
  readonly exampleText: string; // HTML-safe excerpt with <mark> around the token
  readonly sourceTitle: string;
  readonly url: string; // may be empty
  readonly discoveredAt: string; // ISO-8601 UTC
  readonly confidence: number; // 0.1..1.0
  readonly sourceType: string;
}

export type ActivityLevel = 'info' | 'debug' | 'success' | 'error';

export interface ActivityLogEntry {
  readonly timestamp: string;
  readonly level: ActivityLevel;
  readonly message: string;
}

export type SourceHealth = {
  name: string;
  enabled: boolean;
  lastSuccess: string | null;
  lastError: string | null;
  healthy: boolean;
};

export type StoreCounters = {
  successCount: number;
  errorCount: number;
  totalCandidates: number;
  uniqueCodes: number;
};

/** Point-in-time copy of the store. Lists are most-recent-first. */
export type Snapshot = {
  readonly candidates: readonly Candidate[];
  readonly activityLog: readonly ActivityLogEntry[];
  readonly counters: Readonly<StoreCounters>;
  readonly sources: readonly Readonly<SourceHealth>[];
  readonly lastPoll: string | null;
};

/**
 * Fetch strategies. Each descriptor carries its parameters explicitly;
 * the fetcher layer dispatches on `kind`.
 */
export type FetchStrategy =
  | { kind: 'reddit-search'; query?: string; window: 'day' | 'week' }
  | { kind: 'reddit-subreddit'; subreddit: string }
  | { kind: 'x-proxy'; searchUrl: string; description: string }
  | { kind: 'bluesky'; query: string }
  | { kind: 'github-issues'; query: string }
  | { kind: 'mastodon'; query: string }
  | { kind: 'hacker-news' }
  | { kind: 'discourse-latest'; baseUrl: string };

export interface SourceDescriptor {
  name: string;
  enabled: boolean;
  delayMs: number; // wait after a successful fetch
  strategy: FetchStrategy;
}
