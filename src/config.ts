/**
 * Centralized configuration loader for Invite Hunter.
 * Reads environment variables, parses types, and exposes a typed config object.
 * getConfig() re-reads process.env on every call, so the poller picks up changes each cycle.
 *
 * Environment variables (see .env.example):
 * - POLL_INTERVAL_SECONDS (default: 60, minimum 10)
 * - MAX_POSTS (default: 75, clamped to 1..100)
 * - QUERY (default: Sora invite search)
 * - USER_AGENT (default: browser-like UA)
 * - GITHUB_TOKEN (optional)
 * - BRAND_TERM (default: sora)
 * - REQUEST_TIMEOUT_MS (default: 30000)
 * - MAX_CANDIDATES / MAX_LOG_ENTRIES (defaults: 1000 / 500, read once at start-up)
 * - DISABLED_SOURCES (comma-separated source names)
 * - TRANSPORT=http|stdio (default: http)
 * - PORT (default: 3000), HOST (default: 0.0.0.0)
 * - ALLOWED_HOSTS / ALLOWED_ORIGINS (optional)
 * - LOG_LEVEL (default: info)
 */

import { config } from 'dotenv';

// Load environment variables from .env file
config();

export type Transport = 'stdio' | 'http';

export const DEFAULT_QUERY = "Sora invite code OR 'Sora 2 invite' OR 'Sora2 invite'";
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/131.0.0.0 Safari/537.36 (InviteHunter/0.1)';

/**
 * Per-cycle settings handed to the poller and the fetchers.
 */
export interface PollConfig {
  pollIntervalSeconds: number;
  maxPostsPerSource: number;
  query: string;
  userAgent: string;
  githubToken?: string;
  brandTerm: string;
  requestTimeoutMs: number;
  disabledSources: string[];
}

export interface AppConfig {
  transport: Transport;
  port: number;
  httpHost: string;
  allowedHosts: string[];
  allowedOrigins: string[];
  logLevel: string;
  capacity: {
    maxCandidates: number;
    maxLogEntries: number;
  };
  poll: PollConfig;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseCsv(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

export function getPollConfig(env: NodeJS.ProcessEnv = process.env): PollConfig {
  const interval = Math.floor(parseNumber(env.POLL_INTERVAL_SECONDS) ?? 60);
  const maxPosts = Math.floor(parseNumber(env.MAX_POSTS) ?? 75);

  return {
    pollIntervalSeconds: Math.max(10, interval),
    maxPostsPerSource: Math.max(1, Math.min(maxPosts, 100)),
    query: env.QUERY?.trim() || DEFAULT_QUERY,
    userAgent: env.USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    githubToken: env.GITHUB_TOKEN?.trim() || undefined,
    brandTerm: env.BRAND_TERM?.trim().toLowerCase() || 'sora',
    requestTimeoutMs: Math.max(1000, parseNumber(env.REQUEST_TIMEOUT_MS) ?? 30000),
    disabledSources: parseCsv(env.DISABLED_SOURCES),
  };
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const transport: Transport = env.TRANSPORT === 'stdio' ? 'stdio' : 'http';

  return {
    transport,
    port: Number(env.PORT || 3000),
    httpHost: env.HOST?.trim() || '0.0.0.0',
    allowedHosts: parseCsv(env.ALLOWED_HOSTS),
    allowedOrigins: parseCsv(env.ALLOWED_ORIGINS),
    logLevel: env.LOG_LEVEL?.trim() || 'info',
    capacity: {
      maxCandidates: Math.max(1, Math.floor(parseNumber(env.MAX_CANDIDATES) ?? 1000)),
      maxLogEntries: Math.max(1, Math.floor(parseNumber(env.MAX_LOG_ENTRIES) ?? 500)),
    },
    poll: getPollConfig(env),
  };
}
