/**
 * DevGate — Kaggle Adapter
 *
 * Datasets and competitions through the Kaggle REST API, authenticated
 * with HTTP basic auth (KAGGLE_USERNAME / KAGGLE_KEY).
 */

import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { requireSetting } from '../lib/errors';
import { basicAuth } from '../lib/http';
import { parseEach, parsePayload, take, unknownList } from '../lib/shape';
import type { CompetitionRecord, DatasetRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const KAGGLE_API = 'https://www.kaggle.com/api/v1';
const KAGGLE_WEB = 'https://www.kaggle.com';

const PAGE_SIZE = 10;

const DatasetSchema = z.object({
  title: z.string(),
  ref: z.string(),
});

const CompetitionSchema = z.object({
  ref: z.string(),
  title: z.string(),
  deadline: z.string(),
});

export class KaggleAdapter extends SourceAdapter {
  readonly prefix = 'kaggle';
  readonly description = 'List trending Kaggle datasets and competitions';
  readonly exampleEndpoint = '/kaggle/datasets';

  constructor(config: GatewayConfig) {
    super(config, 'Kaggle');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/datasets', 'Most recently updated datasets', () => this.datasets()),
      this.get('/competitions', 'Competitions by latest deadline', () => this.competitions()),
    ];
  }

  async datasets(): Promise<DatasetRecord[]> {
    const items = await this.fetchList('/datasets/list', 'updated', 'Failed to fetch Kaggle datasets');
    return take(parseEach(DatasetSchema, items, this.label), PAGE_SIZE).map(dataset => ({
      title: dataset.title,
      ref: dataset.ref,
      url: `${KAGGLE_WEB}/datasets/${dataset.ref}`,
    }));
  }

  async competitions(): Promise<CompetitionRecord[]> {
    const items = await this.fetchList(
      '/competitions/list',
      'latestDeadline',
      'Failed to fetch Kaggle competitions'
    );
    return take(parseEach(CompetitionSchema, items, this.label), PAGE_SIZE);
  }

  private async fetchList(path: string, sortBy: string, errorMessage: string): Promise<unknown[]> {
    const username = requireSetting(this.config.kaggle.username, 'KAGGLE_USERNAME');
    const key = requireSetting(this.config.kaggle.key, 'KAGGLE_KEY');

    const payload = await this.http.getJson(`${KAGGLE_API}${path}`, {
      headers: { Authorization: basicAuth(username, key) },
      query: { sort_by: sortBy, page_size: PAGE_SIZE },
      errorMessage,
    });
    return parsePayload(unknownList, payload, this.label);
  }
}
