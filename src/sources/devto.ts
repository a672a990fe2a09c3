/**
 * DevGate — DEV.to Adapter
 *
 * Requires DEVTO_API_KEY.
 */

import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { requireSetting } from '../lib/errors';
import { numericId, parseEach, parsePayload, stringOr, take, unknownList } from '../lib/shape';
import type { ArticleRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const DEVTO_API = 'https://dev.to/api';

const MAX_ARTICLES = 10;

// List responses carry tag_list as an array, single-article responses
// as a comma-separated string.
const TagsSchema = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform(tags => (Array.isArray(tags) ? tags.join(', ') : tags ?? ''));

const ArticleSchema = z.object({
  id: z.number().int(),
  title: stringOr('No Title'),
  url: stringOr(''),
  user: z
    .object({ name: stringOr(null) })
    .nullish()
    .transform(user => user?.name ?? null),
  tag_list: TagsSchema,
});

const ArticleParamsSchema = z.object({
  id: numericId.refine(id => id > 0, 'must be positive'),
});

function toArticle(article: z.output<typeof ArticleSchema>): ArticleRecord {
  return {
    id: article.id,
    title: article.title,
    url: article.url,
    author: article.user,
    tags: article.tag_list,
  };
}

export class DevToAdapter extends SourceAdapter {
  readonly prefix = 'devto';
  readonly description = 'Fetch latest DEV.to articles';
  readonly exampleEndpoint = '/devto/articles';

  constructor(config: GatewayConfig) {
    super(config, 'DEV.to');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/articles', 'Latest articles', () => this.latest()),
      this.get('/article/:id', 'A single article', ({ params }) => {
        const { id } = this.validate(ArticleParamsSchema, params);
        return this.article(id);
      }),
    ];
  }

  async latest(): Promise<ArticleRecord[]> {
    const payload = await this.http.getJson(`${DEVTO_API}/articles/latest`, {
      headers: this.headers(),
      query: { per_page: MAX_ARTICLES },
      errorMessage: 'Error fetching articles',
    });
    const articles = parsePayload(unknownList, payload, this.label);
    return take(parseEach(ArticleSchema, articles, this.label), MAX_ARTICLES).map(toArticle);
  }

  async article(id: number): Promise<ArticleRecord> {
    const payload = await this.http.getJson(`${DEVTO_API}/articles/${id}`, {
      headers: this.headers(),
      errorMessage: 'Error fetching article',
      notFound: { message: `Article with ID ${id} not found.` },
    });
    return toArticle(parsePayload(ArticleSchema, payload, this.label));
  }

  private headers(): Record<string, string> {
    return {
      'api-key': requireSetting(this.config.devto.apiKey, 'DEVTO_API_KEY'),
      Accept: 'application/vnd.forem.api-v1+json',
    };
  }
}
