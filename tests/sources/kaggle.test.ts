/**
 * DevGate — Kaggle Adapter Tests
 */

import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { basicAuth } from '../../src/lib/http';
import { createApp } from '../../src/server/app';
import { calledUrls, jsonResponse, mockFetchByUrl, sentHeader, testConfig } from '../helpers';

const app = createApp(testConfig({ KAGGLE_USERNAME: 'tester', KAGGLE_KEY: 'test-secret' }));

describe('GET /kaggle/datasets', () => {
  it('should list datasets with web links using basic auth', async () => {
    const mockFetch = mockFetchByUrl(() =>
      jsonResponse([{ title: 'Weather', ref: 'someone/weather', totalBytes: 100 }])
    );

    const response = await request(app).get('/kaggle/datasets');

    expect(response.body).toEqual([
      { title: 'Weather', ref: 'someone/weather', url: 'https://www.kaggle.com/datasets/someone/weather' },
    ]);
    expect(sentHeader(mockFetch, 0, 'authorization')).toBe(basicAuth('tester', 'test-secret'));
    const [url] = calledUrls(mockFetch);
    expect(url?.pathname).toBe('/api/v1/datasets/list');
    expect(url?.searchParams.get('sort_by')).toBe('updated');
  });

  it('should name the missing credential', async () => {
    const partial = createApp(testConfig({ KAGGLE_USERNAME: 'tester' }));

    const response = await request(partial).get('/kaggle/datasets');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ detail: 'KAGGLE_KEY is not configured.' });
  });
});

describe('GET /kaggle/competitions', () => {
  it('should list competitions by deadline', async () => {
    const mockFetch = mockFetchByUrl(() =>
      jsonResponse([
        { ref: 'titanic', title: 'Titanic', deadline: '2030-01-01T00:00:00Z', reward: 'Knowledge' },
      ])
    );

    const response = await request(app).get('/kaggle/competitions');

    expect(response.body).toEqual([
      { ref: 'titanic', title: 'Titanic', deadline: '2030-01-01T00:00:00Z' },
    ]);
    expect(calledUrls(mockFetch)[0]?.searchParams.get('sort_by')).toBe('latestDeadline');
  });

  it('should pass upstream errors through', async () => {
    mockFetchByUrl(() => jsonResponse({ code: 401, message: 'Unauthenticated' }, 401));

    const response = await request(app).get('/kaggle/competitions');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      detail: 'Failed to fetch Kaggle competitions: {"code":401,"message":"Unauthenticated"}',
    });
  });
});
