/**
 * DevGate — Reddit Adapter
 *
 * Subreddit listings from Reddit's public JSON endpoints. Reddit rejects
 * requests without a descriptive User-Agent.
 */

import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { numberOr, parseEach, parsePayload, stringOr, take, unknownListOr } from '../lib/shape';
import type { PostRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const REDDIT_BASE = 'https://www.reddit.com';
const USER_AGENT = 'devgate/1.0 (developer platform aggregator)';

const MAX_TOP_POSTS = 10;
const MAX_SEARCH_POSTS = 25;

const ListingSchema = z.object({
  data: z
    .object({ children: unknownListOr() })
    .nullish()
    .transform(data => data?.children ?? []),
});

const ChildSchema = z.object({
  data: z.object({
    id: z.string(),
    title: stringOr('No Title'),
    subreddit: stringOr(null),
    permalink: stringOr(''),
    author: stringOr('No Author'),
    score: numberOr(0),
  }),
});

const SearchQuerySchema = z.object({
  query: z.string().min(1),
});

export class RedditAdapter extends SourceAdapter {
  readonly prefix = 'reddit';
  readonly description = 'Get top posts from a specified subreddit';
  readonly exampleEndpoint = '/reddit/top/programming';

  constructor(config: GatewayConfig) {
    super(config, 'Reddit');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/top/:subreddit', "Today's top posts of a subreddit", ({ params }) =>
        this.top(params.subreddit)
      ),
      this.get('/r/:subreddit/search', 'Search posts within a subreddit', ({ params, query }) => {
        const input = this.validate(SearchQuerySchema, query);
        return this.search(params.subreddit, input.query);
      }),
    ];
  }

  async top(subreddit: string): Promise<PostRecord[]> {
    const payload = await this.http.getJson(`${REDDIT_BASE}/r/${encodeURIComponent(subreddit)}/top.json`, {
      headers: { 'User-Agent': USER_AGENT },
      query: { t: 'day', limit: MAX_TOP_POSTS },
      errorMessage: 'Error fetching Reddit top posts',
      notFound: { message: `Subreddit '${subreddit}' not found.` },
    });
    return take(this.toPosts(payload, subreddit), MAX_TOP_POSTS);
  }

  async search(subreddit: string, query: string): Promise<PostRecord[]> {
    const payload = await this.http.getJson(`${REDDIT_BASE}/r/${encodeURIComponent(subreddit)}/search.json`, {
      headers: { 'User-Agent': USER_AGENT },
      query: { q: query, restrict_sr: 'on', limit: MAX_SEARCH_POSTS },
      errorMessage: 'Error searching Reddit',
      notFound: { message: `Subreddit '${subreddit}' not found.` },
    });
    return take(this.toPosts(payload, subreddit), MAX_SEARCH_POSTS);
  }

  private toPosts(payload: unknown, subreddit: string): PostRecord[] {
    const { data: children } = parsePayload(ListingSchema, payload, this.label);
    return parseEach(ChildSchema, children, this.label).map(({ data: post }) => ({
      id: post.id,
      title: post.title,
      subreddit: post.subreddit ?? subreddit,
      url: `${REDDIT_BASE}${post.permalink}`,
      author: post.author,
      score: post.score,
    }));
  }
}
