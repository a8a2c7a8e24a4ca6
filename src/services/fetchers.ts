import type { z } from 'zod';
import type { PollConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { FetchStrategy, RawRecord, SourceDescriptor } from '../types.js';
import {
  BlueskySearchSchema,
  DiscourseLatestSchema,
  GitHubIssueSearchSchema,
  HackerNewsSearchSchema,
  MastodonSearchSchema,
  RedditListingSchema,
} from '../schemas/payloads.js';
import { stripTags } from '../utils/normalize.js';
import type { GetOptions, SourceHttpClient } from './httpClient.js';

export const ENDPOINTS = {
  redditSearch: 'https://www.reddit.com/search.json',
  redditSubreddit: (subreddit: string) => `https://www.reddit.com/r/${encodeURIComponent(subreddit)}/new.json`,
  hackerNews: 'https://hn.algolia.com/api/v1/search_by_date',
  bluesky: 'https://public.api.bsky.app/xrpc/app.bsky.feed.searchPosts',
  github: 'https://api.github.com/search/issues',
  mastodon: 'https://mastodon.social/api/v2/search',
  xProxyPrefix: 'https://r.jina.ai/',
} as const;

const X_BODY_LIMIT = 15000;

/** Fetch contract the poller depends on. Rejects when the source cannot be read. */
export type SourceFetcher = (source: SourceDescriptor, config: PollConfig) => Promise<RawRecord[]>;

interface FetchContext {
  http: SourceHttpClient;
  config: PollConfig;
  sourceName: string;
  logger?: Logger;
}

function getJson(ctx: FetchContext, url: string, opts: GetOptions = {}): Promise<unknown> {
  return ctx.http.getJson(url, { ...opts, timeoutMs: ctx.config.requestTimeoutMs });
}

function getText(ctx: FetchContext, url: string, opts: GetOptions = {}): Promise<string> {
  return ctx.http.getText(url, { ...opts, timeoutMs: ctx.config.requestTimeoutMs });
}

function redditHeaders(userAgent: string): Record<string, string> {
  return {
    'User-Agent': userAgent,
    Accept: 'application/json, text/javascript, */*; q=0.01',
    Referer: 'https://www.reddit.com/',
  };
}

/**
 * Validate a payload. A shape mismatch is not a fetch failure: the source simply
 * yields no records this cycle.
 */
function parsePayload<T extends z.ZodTypeAny>(schema: T, data: unknown, ctx: FetchContext): z.infer<T> | null {
  const parsed = schema.safeParse(data);
  if (parsed.success) return parsed.data;
  ctx.logger?.warn(
    { source: ctx.sourceName, issues: parsed.error.issues.slice(0, 3) },
    'Unexpected payload shape, treating as empty',
  );
  return null;
}

async function fetchRedditListing(url: string, params: Record<string, string | number | boolean>, ctx: FetchContext) {
  const data = await getJson(ctx, url, { params, headers: redditHeaders(ctx.config.userAgent) });
  const payload = parsePayload(RedditListingSchema, data, ctx);
  if (!payload) return [];
  return payload.data.children.map(({ data: post }): RawRecord => ({
    title: post.title ?? '',
    body: post.selftext ?? '',
    url: post.permalink ? `https://www.reddit.com${post.permalink}` : post.url ?? '',
  }));
}

async function fetchXProxy(searchUrl: string, description: string, ctx: FetchContext): Promise<RawRecord[]> {
  const body = await getText(ctx, `${ENDPOINTS.xProxyPrefix}${searchUrl}`, {
    headers: { 'User-Agent': ctx.config.userAgent },
  });
  return [{ title: description, body: body.slice(0, X_BODY_LIMIT), url: searchUrl }];
}

async function fetchBluesky(query: string, ctx: FetchContext): Promise<RawRecord[]> {
  const data = await getJson(ctx, ENDPOINTS.bluesky, {
    params: { q: query, limit: Math.min(ctx.config.maxPostsPerSource, 25) },
    headers: { 'User-Agent': ctx.config.userAgent },
  });
  const payload = parsePayload(BlueskySearchSchema, data, ctx);
  if (!payload) return [];
  return payload.posts.map((post) => {
    const author = post.author?.handle || 'unknown';
    const postId = post.uri ? post.uri.split('/').pop() : undefined;
    return {
      title: `Bluesky post by @${author}`,
      body: post.record?.text ?? '',
      url: postId ? `https://bsky.app/profile/${author}/post/${postId}` : '',
    };
  });
}

async function fetchGitHubIssues(query: string, ctx: FetchContext): Promise<RawRecord[]> {
  const headers: Record<string, string> = { 'User-Agent': ctx.config.userAgent };
  if (ctx.config.githubToken) headers.Authorization = `token ${ctx.config.githubToken}`;
  const data = await getJson(ctx, ENDPOINTS.github, {
    params: { q: query, sort: 'created', order: 'desc', per_page: Math.min(ctx.config.maxPostsPerSource, 30) },
    headers,
  });
  const payload = parsePayload(GitHubIssueSearchSchema, data, ctx);
  if (!payload) return [];
  return payload.items.map((item) => ({
    title: `GitHub: ${item.title ?? ''}`,
    body: item.body ?? '',
    url: item.html_url ?? '',
  }));
}

async function fetchMastodon(query: string, ctx: FetchContext): Promise<RawRecord[]> {
  const data = await getJson(ctx, ENDPOINTS.mastodon, {
    params: { q: query, type: 'statuses', limit: Math.min(ctx.config.maxPostsPerSource, 20) },
    headers: { 'User-Agent': ctx.config.userAgent },
  });
  const payload = parsePayload(MastodonSearchSchema, data, ctx);
  if (!payload) return [];
  return payload.statuses.map((status) => ({
    title: `Mastodon post by @${status.account?.acct || 'unknown'}`,
    body: stripTags(status.content ?? ''),
    url: status.url ?? '',
  }));
}

async function fetchHackerNews(ctx: FetchContext): Promise<RawRecord[]> {
  const data = await getJson(ctx, ENDPOINTS.hackerNews, {
    params: {
      query: ctx.config.query,
      tags: 'story,comment',
      hitsPerPage: Math.min(ctx.config.maxPostsPerSource, 50),
    },
  });
  const payload = parsePayload(HackerNewsSearchSchema, data, ctx);
  if (!payload) return [];
  return payload.hits.map((hit) => {
    let url = hit.url || hit.story_url || '';
    if (!url && hit.objectID) url = `https://news.ycombinator.com/item?id=${hit.objectID}`;
    return {
      title: hit.title || hit.story_title || '',
      body: hit.story_text || hit.comment_text || '',
      url,
    };
  });
}

async function fetchDiscourseLatest(baseUrl: string, ctx: FetchContext): Promise<RawRecord[]> {
  const root = baseUrl.replace(/\/+$/, '');
  const data = await getJson(ctx, `${root}/latest.json`, {
    headers: { 'User-Agent': ctx.config.userAgent },
  });
  const payload = parsePayload(DiscourseLatestSchema, data, ctx);
  if (!payload) return [];
  return payload.topic_list.topics.slice(0, ctx.config.maxPostsPerSource).map((topic) => ({
    title: topic.title ?? '',
    body: topic.excerpt ?? '',
    url: topic.slug && topic.id != null ? `${root}/t/${topic.slug}/${topic.id}` : '',
  }));
}

async function dispatch(strategy: FetchStrategy, ctx: FetchContext): Promise<RawRecord[]> {
  const limit = ctx.config.maxPostsPerSource;
  switch (strategy.kind) {
    case 'reddit-search':
      return fetchRedditListing(
        ENDPOINTS.redditSearch,
        { q: strategy.query ?? ctx.config.query, sort: 'new', limit, restrict_sr: false, t: strategy.window },
        ctx,
      );
    case 'reddit-subreddit':
      return fetchRedditListing(ENDPOINTS.redditSubreddit(strategy.subreddit), { limit }, ctx);
    case 'x-proxy':
      return fetchXProxy(strategy.searchUrl, strategy.description, ctx);
    case 'bluesky':
      return fetchBluesky(strategy.query, ctx);
    case 'github-issues':
      return fetchGitHubIssues(strategy.query, ctx);
    case 'mastodon':
      return fetchMastodon(strategy.query, ctx);
    case 'hacker-news':
      return fetchHackerNews(ctx);
    case 'discourse-latest':
      return fetchDiscourseLatest(strategy.baseUrl, ctx);
    default: {
      const unknownStrategy: never = strategy;
      throw new Error(`Unsupported fetch strategy: ${JSON.stringify(unknownStrategy)}`);
    }
  }
}

/**
 * Build the fetcher used by the poller. Results never exceed `maxPostsPerSource`.
 */
export function createSourceFetcher(http: SourceHttpClient, logger?: Logger): SourceFetcher {
  return async (source, config) => {
    const records = await dispatch(source.strategy, { http, config, sourceName: source.name, logger });
    return records.slice(0, config.maxPostsPerSource);
  };
}
