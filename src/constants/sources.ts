import type { SourceDescriptor } from '../types.js';

/**
 * Polled sources, in the order a cycle visits them.
 * Delays are applied after a successful fetch only.
 */
export const DEFAULT_SOURCES: readonly SourceDescriptor[] = [
  // Reddit search
  { name: 'Reddit search (configured)', enabled: true, delayMs: 0, strategy: { kind: 'reddit-search', window: 'day' } },
  {
    name: 'Reddit search (Sora invite code)',
    enabled: true,
    delayMs: 0,
    strategy: { kind: 'reddit-search', query: 'Sora invite code', window: 'week' },
  },
  {
    name: 'Reddit search (Sora beta access)',
    enabled: true,
    delayMs: 0,
    strategy: { kind: 'reddit-search', query: '"Sora" "beta" "access"', window: 'week' },
  },

  // Subreddits
  { name: 'Reddit /r/ChatGPT', enabled: true, delayMs: 0, strategy: { kind: 'reddit-subreddit', subreddit: 'ChatGPT' } },
  { name: 'Reddit /r/OpenAI', enabled: true, delayMs: 0, strategy: { kind: 'reddit-subreddit', subreddit: 'OpenAI' } },
  { name: 'Reddit /r/SoraAI', enabled: true, delayMs: 0, strategy: { kind: 'reddit-subreddit', subreddit: 'SoraAI' } },
  { name: 'Reddit /r/artificial', enabled: true, delayMs: 0, strategy: { kind: 'reddit-subreddit', subreddit: 'artificial' } },

  // X live search through the reader proxy
  {
    name: 'X live (Sora invite code)',
    enabled: true,
    delayMs: 1000,
    strategy: {
      kind: 'x-proxy',
      searchUrl: 'https://x.com/search?q=Sora%20invite%20code&f=live',
      description: 'Live tweets: Sora invite code',
    },
  },
  {
    name: 'X live (#SoraInvite)',
    enabled: true,
    delayMs: 1000,
    strategy: {
      kind: 'x-proxy',
      searchUrl: 'https://x.com/search?q=%23SoraInvite&f=live',
      description: 'Live tweets: #SoraInvite',
    },
  },
  {
    name: 'X live (#SoraAccess)',
    enabled: true,
    delayMs: 1000,
    strategy: {
      kind: 'x-proxy',
      searchUrl: 'https://x.com/search?q=%23SoraAccess&f=live',
      description: 'Live tweets: #SoraAccess',
    },
  },

  // Other networks
  { name: 'Bluesky search', enabled: true, delayMs: 2000, strategy: { kind: 'bluesky', query: 'Sora invite code' } },
  {
    name: 'GitHub issues',
    enabled: true,
    delayMs: 3000,
    strategy: { kind: 'github-issues', query: 'Sora invite code OR Sora access code' },
  },
  { name: 'Mastodon search', enabled: true, delayMs: 2000, strategy: { kind: 'mastodon', query: 'Sora invite' } },
  { name: 'Hacker News', enabled: true, delayMs: 0, strategy: { kind: 'hacker-news' } },
  {
    name: 'OpenAI Community',
    enabled: true,
    delayMs: 0,
    strategy: { kind: 'discourse-latest', baseUrl: 'https://community.openai.com' },
  },
];

/**
 * Coarse category for a source name: its first word, lower-cased.
 */
export function sourceTypeFor(sourceName: string): string {
  const first = sourceName.trim().split(/\s+/)[0];
  return first ? first.toLowerCase() : 'unknown';
}
