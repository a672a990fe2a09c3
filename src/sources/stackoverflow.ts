/**
 * DevGate — Stack Overflow Adapter
 *
 * Featured questions, tag-scoped search, and a user's own questions and
 * answers through the Stack Exchange API.
 *
 * USER RESOLUTION (per request, never cached):
 * 1. `user_id` query parameter
 * 2. STACKOVERFLOW_USER_ID
 * 3. `username` query parameter → one lookup call
 * 4. STACKOVERFLOW_USERNAME → one lookup call
 * Nothing supplied → 400 before any network call.
 */

import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { BadRequestError, NotFoundError } from '../lib/errors';
import {
  booleanOr,
  numberOr,
  numericId,
  parseEach,
  parsePayload,
  stringListOr,
  stringOr,
  take,
  unknownListOr,
} from '../lib/shape';
import type {
  AnswerRecord,
  FeaturedQuestionRecord,
  QuestionRecord,
  SearchQuestionRecord,
} from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const STACK_EXCHANGE_API = 'https://api.stackexchange.com/2.3';
const SITE = 'stackoverflow';

const MAX_FEATURED = 15;
const MAX_USER_POSTS = 10;
const MAX_SEARCH_RESULTS = 30;

const ItemsSchema = z.object({ items: unknownListOr() });

const QuestionSchema = z.object({
  question_id: z.number().int(),
  title: z.string(),
  link: z.string(),
});

const AnswerSchema = z.object({
  answer_id: z.number().int(),
  question_id: z.number().int(),
});

const OwnerSchema = z
  .object({ display_name: stringOr('Unknown') })
  .nullish()
  .transform(owner => owner?.display_name ?? 'Unknown');

const FeaturedSchema = z.object({
  title: z.string(),
  link: z.string(),
  bounty_amount: numberOr(0),
  answer_count: numberOr(0),
  owner: OwnerSchema,
});

const SearchItemSchema = QuestionSchema.extend({
  owner: OwnerSchema,
  tags: stringListOr(),
  score: numberOr(0),
  is_answered: booleanOr(false),
});

const UserLookupSchema = z.object({ user_id: z.number().int() });

const IdentityQuerySchema = z.object({
  user_id: numericId.optional(),
  username: z.string().min(1).optional(),
});

const SearchQuerySchema = z.object({
  q: z.string().min(1),
  tagged: z.string().min(1),
});

export type Identity = z.output<typeof IdentityQuerySchema>;

export class StackOverflowAdapter extends SourceAdapter {
  readonly prefix = 'stackoverflow';
  readonly description = 'Get featured, searched, or a user\'s Stack Overflow questions and answers';
  readonly exampleEndpoint = '/stackoverflow/featured';

  constructor(config: GatewayConfig) {
    super(config, 'Stack Exchange');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/featured', 'Questions with an active bounty', () => this.featured()),
      this.get('/search', 'Search question titles within tags', ({ query }) => {
        const input = this.validate(SearchQuerySchema, query);
        return this.search(input.q, input.tagged);
      }),
      this.get('/questions', "A user's most recent questions", ({ query }) =>
        this.questions(this.validate(IdentityQuerySchema, query))
      ),
      this.get('/answers', "A user's most recent answers", ({ query }) =>
        this.answers(this.validate(IdentityQuerySchema, query))
      ),
    ];
  }

  async featured(): Promise<FeaturedQuestionRecord[]> {
    const items = await this.fetchItems(
      '/questions/featured',
      { order: 'desc', sort: 'activity' },
      'Failed to fetch featured questions'
    );
    return parseEach(FeaturedSchema, take(items, MAX_FEATURED), this.label).map(item => ({
      title: item.title,
      link: item.link,
      bounty_amount: item.bounty_amount,
      answer_count: item.answer_count,
      owner_display_name: item.owner,
    }));
  }

  async search(intitle: string, tagged: string): Promise<SearchQuestionRecord[]> {
    const items = await this.fetchItems(
      '/search',
      { intitle, tagged, sort: 'relevance', order: 'desc', pagesize: MAX_SEARCH_RESULTS },
      'Error searching Stack Overflow'
    );
    return parseEach(SearchItemSchema, take(items, MAX_SEARCH_RESULTS), this.label).map(item => ({
      question_id: item.question_id,
      title: item.title,
      link: item.link,
      owner: { display_name: item.owner },
      tags: item.tags,
      score: item.score,
      is_answered: item.is_answered,
    }));
  }

  async questions(identity: Identity): Promise<QuestionRecord[]> {
    const userId = await this.resolveUserId(identity);
    const items = await this.fetchItems(
      `/users/${userId}/questions`,
      { order: 'desc', sort: 'creation' },
      'Failed to fetch questions'
    );
    return parseEach(QuestionSchema, take(items, MAX_USER_POSTS), this.label);
  }

  async answers(identity: Identity): Promise<AnswerRecord[]> {
    const userId = await this.resolveUserId(identity);
    const items = await this.fetchItems(
      `/users/${userId}/answers`,
      { order: 'desc', sort: 'creation' },
      'Failed to fetch answers'
    );
    return parseEach(AnswerSchema, take(items, MAX_USER_POSTS), this.label).map(answer => ({
      answer_id: answer.answer_id,
      question_id: answer.question_id,
      link: `https://stackoverflow.com/a/${answer.answer_id}`,
    }));
  }

  /**
   * Resolve whose posts to read, in fixed priority order.
   */
  async resolveUserId(identity: Identity): Promise<number> {
    if (identity.user_id !== undefined) return identity.user_id;

    const defaults = this.config.stackoverflow;
    if (defaults.defaultUserId !== undefined) return defaults.defaultUserId;

    if (identity.username) return this.lookupUserId(identity.username);
    if (defaults.defaultUsername) return this.lookupUserId(defaults.defaultUsername);

    throw new BadRequestError('A Stack Overflow user_id or username must be provided.');
  }

  /** Highest-reputation user whose display name contains `username`. */
  private async lookupUserId(username: string): Promise<number> {
    const items = await this.fetchItems(
      '/users',
      { order: 'desc', sort: 'reputation', inname: username },
      'Failed to fetch user ID'
    );
    if (items.length === 0) {
      throw new NotFoundError(`Stack Overflow user '${username}' not found.`);
    }
    return parsePayload(UserLookupSchema, items[0], this.label).user_id;
  }

  private async fetchItems(
    path: string,
    query: Record<string, string | number>,
    errorMessage: string
  ): Promise<unknown[]> {
    const payload = await this.http.getJson(`${STACK_EXCHANGE_API}${path}`, {
      query: { ...query, site: SITE },
      errorMessage,
    });
    return parsePayload(ItemsSchema, payload, this.label).items;
  }
}
