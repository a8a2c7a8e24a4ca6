import { describe, expect, it } from 'vitest';
import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import type { PollConfig } from '../src/config.js';
import { createSourceFetcher } from '../src/services/fetchers.js';
import { SourceHttpClient, SourceHttpError } from '../src/services/httpClient.js';
import type { FetchStrategy, SourceDescriptor } from '../src/types.js';

const config: PollConfig = {
  pollIntervalSeconds: 60,
  maxPostsPerSource: 10,
  query: 'sora test',
  userAgent: 'test-agent',
  githubToken: 'test-token',
  brandTerm: 'sora',
  requestTimeoutMs: 1000,
  disabledSources: [],
};

function source(strategy: FetchStrategy): SourceDescriptor {
  return { name: 'Test source', enabled: true, delayMs: 0, strategy };
}

/** Fetcher backed by an in-process adapter that answers by URL. */
function fetcherFor(routes: Record<string, unknown>) {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (cfg) => {
    requests.push(cfg);
    const url = cfg.url ?? '';
    if (!(url in routes)) throw new Error(`no route for ${url}`);
    return { data: routes[url], status: 200, statusText: 'OK', headers: {}, config: cfg };
  };
  const http = new SourceHttpClient({ maxAttempts: 1, axiosInstance: axios.create({ adapter }) });
  return { fetch: createSourceFetcher(http), requests };
}

describe('createSourceFetcher', () => {
  it('maps a Reddit search listing', async () => {
    const { fetch, requests } = fetcherFor({
      'https://www.reddit.com/search.json': {
        data: {
          children: [
            { data: { title: 'T', selftext: null, permalink: '/r/x/comments/1' } },
            { data: { title: 'U', selftext: 'b', url: 'https://u.example' } },
          ],
        },
      },
    });

    const records = await fetch(source({ kind: 'reddit-search', window: 'day' }), config);

    expect(records).toEqual([
      { title: 'T', body: '', url: 'https://www.reddit.com/r/x/comments/1' },
      { title: 'U', body: 'b', url: 'https://u.example' },
    ]);
    expect(requests[0].params).toEqual({ q: 'sora test', sort: 'new', limit: 10, restrict_sr: false, t: 'day' });
    expect(requests[0].headers.get('User-Agent')).toBe('test-agent');
    expect(requests[0].timeout).toBe(1000);
  });

  it('reads the newest posts of a subreddit', async () => {
    const { fetch, requests } = fetcherFor({
      'https://www.reddit.com/r/SoraAI/new.json': { data: { children: [] } },
    });
    await expect(fetch(source({ kind: 'reddit-subreddit', subreddit: 'SoraAI' }), config)).resolves.toEqual([]);
    expect(requests[0].params).toEqual({ limit: 10 });
  });

  it('treats a malformed payload as empty', async () => {
    const { fetch } = fetcherFor({ 'https://www.reddit.com/search.json': { unexpected: true } });
    await expect(fetch(source({ kind: 'reddit-search', window: 'week' }), config)).resolves.toEqual([]);
  });

  it('propagates transport failures', async () => {
    const { fetch } = fetcherFor({});
    await expect(fetch(source({ kind: 'hacker-news' }), config)).rejects.toBeInstanceOf(SourceHttpError);
  });

  it('wraps the X reader proxy page as one record', async () => {
    const { fetch, requests } = fetcherFor({
      'https://r.jina.ai/https://x.com/search?q=a': 'x'.repeat(20000),
    });

    const records = await fetch(
      source({ kind: 'x-proxy', searchUrl: 'https://x.com/search?q=a', description: 'X search' }),
      config,
    );

    expect(records).toHaveLength(1);
    expect(records[0].title).toBe('X search');
    expect(records[0].body).toHaveLength(15000);
    expect(records[0].url).toBe('https://x.com/search?q=a');
    expect(requests[0].responseType).toBe('text');
  });

  it('maps Bluesky posts to profile links', async () => {
    const { fetch, requests } = fetcherFor({
      'https://public.api.bsky.app/xrpc/app.bsky.feed.searchPosts': {
        posts: [
          {
            uri: 'at://did:plc:abc/app.bsky.feed.post/3kxyz',
            author: { handle: 'alice.bsky.social' },
            record: { text: 'hi AB12C3' },
          },
        ],
      },
    });

    const records = await fetch(source({ kind: 'bluesky', query: 'sora invite' }), config);

    expect(records).toEqual([
      {
        title: 'Bluesky post by @alice.bsky.social',
        body: 'hi AB12C3',
        url: 'https://bsky.app/profile/alice.bsky.social/post/3kxyz',
      },
    ]);
    expect(requests[0].params).toEqual({ q: 'sora invite', limit: 10 });
  });

  it('authenticates GitHub issue search when a token is configured', async () => {
    const { fetch, requests } = fetcherFor({
      'https://api.github.com/search/issues': {
        items: [{ title: 'Issue', body: null, html_url: 'https://github.com/o/r/issues/1' }],
      },
    });

    const records = await fetch(source({ kind: 'github-issues', query: 'sora invite' }), config);

    expect(records).toEqual([{ title: 'GitHub: Issue', body: '', url: 'https://github.com/o/r/issues/1' }]);
    expect(requests[0].headers.get('Authorization')).toBe('token test-token');
    expect(requests[0].params).toEqual({ q: 'sora invite', sort: 'created', order: 'desc', per_page: 10 });
  });

  it('strips markup from Mastodon statuses', async () => {
    const { fetch } = fetcherFor({
      'https://mastodon.social/api/v2/search': {
        statuses: [{ content: '<p>Code <b>AB12C3</b></p>', url: 'https://mastodon.social/@bob/1', account: { acct: 'bob' } }],
      },
    });

    await expect(fetch(source({ kind: 'mastodon', query: 'sora' }), config)).resolves.toEqual([
      { title: 'Mastodon post by @bob', body: 'Code AB12C3', url: 'https://mastodon.social/@bob/1' },
    ]);
  });

  it('links Hacker News hits without a URL to their item page', async () => {
    const { fetch } = fetcherFor({
      'https://hn.algolia.com/api/v1/search_by_date': {
        hits: [{ objectID: '42', story_title: 'Story', comment_text: 'body', url: null }],
      },
    });

    await expect(fetch(source({ kind: 'hacker-news' }), config)).resolves.toEqual([
      { title: 'Story', body: 'body', url: 'https://news.ycombinator.com/item?id=42' },
    ]);
  });

  it('builds Discourse topic links and caps the result', async () => {
    const topics = [1, 2, 3].map((id) => ({ id, title: `Topic ${id}`, excerpt: 'e', slug: `topic-${id}` }));
    const { fetch } = fetcherFor({ 'https://forum.example/latest.json': { topic_list: { topics } } });

    const records = await fetch(
      source({ kind: 'discourse-latest', baseUrl: 'https://forum.example/' }),
      { ...config, maxPostsPerSource: 2 },
    );

    expect(records).toEqual([
      { title: 'Topic 1', body: 'e', url: 'https://forum.example/t/topic-1/1' },
      { title: 'Topic 2', body: 'e', url: 'https://forum.example/t/topic-2/2' },
    ]);
  });
});
