/**
 * DevGate — Hacker News Adapter
 *
 * Story lists and items come from the official Firebase API: one call for
 * the id list, then one item call per id through the fan-out coordinator.
 * Full-text search goes through the Algolia HN API.
 *
 * The Firebase API answers an unknown item or user with `null` and a 200.
 */

import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { NotFoundError } from '../lib/errors';
import { fanOut } from '../lib/fanout';
import {
  numberOr,
  numericId,
  parseEach,
  parsePayload,
  stringOr,
  take,
  unknownList,
  unknownListOr,
} from '../lib/shape';
import type { HnUserRecord, StoryRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const HN_API_BASE = 'https://hacker-news.firebaseio.com/v0';
const HN_SEARCH_BASE = 'https://hn.algolia.com/api/v1';

const MAX_STORIES = 10;

export type StoryList = 'top' | 'new' | 'best';

const IdListSchema = z.array(z.number().int());

const ItemSchema = z.object({
  id: z.number().int(),
  title: stringOr('N/A'),
  url: stringOr(null),
  by: stringOr('N/A'),
  score: numberOr(0),
  time: numberOr(0),
  type: stringOr('N/A'),
  descendants: numberOr(0),
});

const UserSchema = z.object({
  id: z.string(),
  created: z.number(),
  karma: z.number(),
  about: stringOr(null),
  submitted: z
    .array(z.number().int())
    .nullish()
    .transform(value => value ?? []),
});

const HitSchema = z.object({
  objectID: z.string().regex(/^\d+$/),
  title: z.string(),
  url: stringOr(null),
  points: numberOr(0),
  author: stringOr('No Author'),
  created_at_i: numberOr(0),
  num_comments: numberOr(0),
});

const SearchSchema = z.object({ hits: unknownListOr() });

const SearchQuerySchema = z.object({
  query: z.string().min(1),
});

const ItemParamsSchema = z.object({
  id: numericId,
});

function hasTitle(hit: unknown): boolean {
  if (typeof hit !== 'object' || hit === null || !('title' in hit)) return false;
  return typeof hit.title === 'string' && hit.title.length > 0;
}

function toStory(item: z.output<typeof ItemSchema>): StoryRecord {
  return {
    id: item.id,
    title: item.title,
    url: item.url,
    points: item.score,
    author: item.by,
    type: item.type,
    time: item.time,
    comments: item.descendants,
  };
}

export class HackerNewsAdapter extends SourceAdapter {
  readonly prefix = 'hackernews';
  readonly description = 'List top stories from Hacker News';
  readonly exampleEndpoint = '/hackernews/topstories';

  constructor(config: GatewayConfig) {
    super(config, 'Hacker News');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/topstories', 'Top 10 stories', () => this.stories('top')),
      this.get('/newstories', 'Newest 10 stories', () => this.stories('new')),
      this.get('/beststories', 'Best 10 stories', () => this.stories('best')),
      this.get('/item/:id', 'A single item', ({ params }) => {
        const { id } = this.validate(ItemParamsSchema, params);
        return this.item(id);
      }),
      this.get('/user/:id', 'A user profile', ({ params }) => this.user(params.id)),
      this.get('/search', 'Full-text story search', ({ query }) => {
        const input = this.validate(SearchQuerySchema, query);
        return this.search(input.query);
      }),
    ];
  }

  /**
   * First ten ids of a story list, expanded concurrently.
   * Items that fail to load, are null, or are not stories are dropped.
   */
  async stories(list: StoryList): Promise<StoryRecord[]> {
    const payload = await this.http.getJson(`${HN_API_BASE}/${list}stories.json`, {
      errorMessage: `Failed to fetch ${list} stories`,
    });
    const ids = take(parsePayload(IdListSchema, payload, this.label), MAX_STORIES);

    const outcome = await fanOut(ids, id => this.fetchItem(id), {
      label: `hackernews.${list}stories`,
      logger: this.logger,
    });

    return outcome.values
      .filter((item): item is z.output<typeof ItemSchema> => item !== null && item.type === 'story')
      .map(toStory);
  }

  async item(id: number): Promise<StoryRecord> {
    const item = await this.fetchItem(id);
    if (!item) {
      throw new NotFoundError(`Item with ID ${id} not found.`);
    }
    return toStory(item);
  }

  async user(id: string): Promise<HnUserRecord> {
    const notFound = `User '${id}' not found.`;
    const payload = await this.http.getJson(`${HN_API_BASE}/user/${encodeURIComponent(id)}.json`, {
      errorMessage: 'Failed to fetch user',
      notFound: { message: notFound },
    });
    if (payload === null) {
      throw new NotFoundError(notFound);
    }

    const user = parsePayload(UserSchema, payload, this.label);
    return {
      id: user.id,
      created: user.created,
      karma: user.karma,
      about: user.about,
      submitted: user.submitted,
    };
  }

  async search(query: string): Promise<StoryRecord[]> {
    const payload = await this.http.getJson(`${HN_SEARCH_BASE}/search`, {
      query: { query, tags: 'story' },
      errorMessage: 'Error searching Hacker News',
    });
    const { hits } = parsePayload(SearchSchema, payload, this.label);

    // Title is required: untitled hits are dropped before anything else
    return parseEach(HitSchema, hits.filter(hasTitle), this.label).map(hit => ({
      id: Number(hit.objectID),
      title: hit.title,
      url: hit.url,
      points: hit.points,
      author: hit.author,
      type: 'story',
      time: hit.created_at_i,
      comments: hit.num_comments,
    }));
  }

  private async fetchItem(id: number): Promise<z.output<typeof ItemSchema> | null> {
    const payload = await this.http.getJson(`${HN_API_BASE}/item/${id}.json`, {
      errorMessage: `Failed to fetch item ${id}`,
      notFound: { message: `Item with ID ${id} not found.` },
    });
    if (payload === null) return null;
    return parsePayload(ItemSchema, payload, this.label);
  }
}
