/**
 * DevGate — Upstream HTTP Client Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  NotFoundError,
  ShapeError,
  UpstreamError,
  UpstreamUnavailableError,
} from '../../src/lib/errors';
import { UpstreamClient, basicAuth, buildUrl } from '../../src/lib/http';
import { logger } from '../../src/lib/logger';
import { jsonResponse, mockFetchByUrl, sentHeader, textResponse } from '../helpers';

const client = new UpstreamClient('Example', 1000, logger);

describe('buildUrl', () => {
  it('should append defined query values only', () => {
    expect(buildUrl('https://api.example.test/items', { q: 'a b', page: 2, missing: undefined })).toBe(
      'https://api.example.test/items?q=a+b&page=2'
    );
  });
});

describe('basicAuth', () => {
  it('should encode credentials', () => {
    expect(basicAuth('user', 'test-secret')).toBe(
      `Basic ${Buffer.from('user:test-secret').toString('base64')}`
    );
  });
});

describe('UpstreamClient', () => {
  beforeEach(() => {
    mockFetchByUrl(() => jsonResponse({}));
  });

  it('should return parsed JSON and send the given headers', async () => {
    const mockFetch = mockFetchByUrl(() => jsonResponse({ ok: true }));

    const body = await client.getJson('https://api.example.test/x', {
      headers: { 'X-Api-Key': 'test-secret' },
      errorMessage: 'Failed',
    });

    expect(body).toEqual({ ok: true });
    expect(sentHeader(mockFetch, 0, 'x-api-key')).toBe('test-secret');
    expect(sentHeader(mockFetch, 0, 'accept')).toBe('application/json');
  });

  it('should map declared not-found statuses to NotFoundError', async () => {
    mockFetchByUrl(() => jsonResponse({ error: 'nope' }, 400));

    await expect(
      client.getJson('https://api.example.test/x', {
        errorMessage: 'Failed',
        notFound: { message: 'Thing not found.', statuses: [400, 404] },
      })
    ).rejects.toThrow(NotFoundError);
  });

  it('should release the body of a not-found response', async () => {
    const notFound = jsonResponse({ error: 'nope' }, 404);
    const body = notFound.body;
    if (!body) throw new Error('response has no body');
    const cancel = vi.spyOn(body, 'cancel');
    mockFetchByUrl(() => notFound);

    await expect(
      client.getJson('https://api.example.test/x', {
        errorMessage: 'Failed',
        notFound: { message: 'Thing not found.' },
      })
    ).rejects.toThrow('Thing not found.');
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should pass other error statuses through with the upstream body', async () => {
    mockFetchByUrl(() => textResponse('rate limited', 429));

    const error = await client
      .getJson('https://api.example.test/x', {
        errorMessage: 'Failed to fetch things',
        notFound: { message: 'Thing not found.' },
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ status: 429, message: 'Failed to fetch things: rate limited' });
  });

  it('should answer 502 for a non-error status outside the success range', async () => {
    mockFetchByUrl(() => textResponse('moved', 302));

    const error = await client
      .getJson('https://api.example.test/x', { errorMessage: 'Failed' })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ upstreamStatus: 302, status: 502 });
  });

  it('should map transport failures to UpstreamUnavailableError', async () => {
    mockFetchByUrl(() => {
      throw new TypeError('fetch failed');
    });

    const error = await client
      .getJson('https://api.example.test/x', { errorMessage: 'Failed' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamUnavailableError);
    expect(error).toMatchObject({ status: 503, message: 'Could not connect to the Example API.' });
  });

  it('should treat a timeout as unavailable', async () => {
    mockFetchByUrl(() => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    });

    await expect(
      client.getJson('https://api.example.test/x', { errorMessage: 'Failed' })
    ).rejects.toThrow(UpstreamUnavailableError);
  });

  it('should raise a ShapeError for an unparseable body', async () => {
    mockFetchByUrl(() => textResponse('<html>not json</html>'));

    await expect(
      client.getJson('https://api.example.test/x', { errorMessage: 'Failed' })
    ).rejects.toThrow(ShapeError);
  });

  it('should return raw text from getText', async () => {
    mockFetchByUrl(() => textResponse('<p>hello</p>'));

    await expect(
      client.getText('https://example.test/page', { errorMessage: 'Failed' })
    ).resolves.toBe('<p>hello</p>');
  });
});
