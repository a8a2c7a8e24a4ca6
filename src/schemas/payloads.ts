import { z } from 'zod';

/**
 * Response shapes of the polled APIs. Only the fields the fetchers read are declared;
 * anything else is stripped. Optional text fields accept null as the APIs send it.
 */

const text = z.string().nullish();

export const RedditListingSchema = z.object({
  data: z.object({
    children: z.array(
      z.object({
        data: z.object({
          title: text,
          selftext: text,
          permalink: text,
          url: text,
        }),
      }),
    ),
  }),
});

export const HackerNewsSearchSchema = z.object({
  hits: z.array(
    z.object({
      title: text,
      story_title: text,
      story_text: text,
      comment_text: text,
      url: text,
      story_url: text,
      objectID: text,
    }),
  ),
});

export const DiscourseLatestSchema = z.object({
  topic_list: z.object({
    topics: z.array(
      z.object({
        id: z.number().nullish(),
        title: text,
        excerpt: text,
        slug: text,
      }),
    ),
  }),
});

export const BlueskySearchSchema = z.object({
  posts: z.array(
    z.object({
      uri: text,
      author: z.object({ handle: text }).nullish(),
      record: z.object({ text: text }).nullish(),
    }),
  ),
});

export const GitHubIssueSearchSchema = z.object({
  items: z.array(
    z.object({
      title: text,
      body: text,
      html_url: text,
    }),
  ),
});

export const MastodonSearchSchema = z.object({
  statuses: z.array(
    z.object({
      content: text,
      url: text,
      account: z.object({ acct: text }).nullish(),
    }),
  ),
});
