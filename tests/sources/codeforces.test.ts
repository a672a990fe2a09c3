/**
 * DevGate — Codeforces Adapter Tests
 */

import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../../src/server/app';
import { formatEpochSeconds } from '../../src/sources/codeforces';
import { calledUrls, jsonResponse, mockFetchByUrl, testConfig } from '../helpers';

const app = createApp(testConfig());

const profile = {
  handle: 'Tourist_Test',
  firstName: 'Ada',
  rating: 3500,
  maxRating: 3800,
  rank: 'legendary grandmaster',
  maxRank: 'legendary grandmaster',
  lastOnlineTimeSeconds: 1700000000,
};

describe('formatEpochSeconds', () => {
  it('should format in UTC', () => {
    expect(formatEpochSeconds(1700000000)).toBe('2023-11-14 22:13:20');
  });

  it('should return null for zero or absent', () => {
    expect(formatEpochSeconds(0)).toBeNull();
    expect(formatEpochSeconds(null)).toBeNull();
  });
});

describe('GET /codeforces/contests', () => {
  it('should keep only upcoming contests in upstream order', async () => {
    const contests = Array.from({ length: 12 }, (_, i) => ({
      id: 1000 + i,
      name: `Round ${i}`,
      phase: [2, 5, 9].includes(i) ? 'BEFORE' : 'FINISHED',
    }));
    mockFetchByUrl(() => jsonResponse({ status: 'OK', result: contests }));

    const response = await request(app).get('/codeforces/contests');

    expect(response.status).toBe(200);
    expect(response.body).toEqual([
      { id: 1002, name: 'Round 2', phase: 'BEFORE', link: 'https://codeforces.com/contest/1002' },
      { id: 1005, name: 'Round 5', phase: 'BEFORE', link: 'https://codeforces.com/contest/1005' },
      { id: 1009, name: 'Round 9', phase: 'BEFORE', link: 'https://codeforces.com/contest/1009' },
    ]);
  });

  it('should cap the list at ten after filtering', async () => {
    const contests = Array.from({ length: 14 }, (_, i) => ({ id: i, name: `R${i}`, phase: 'BEFORE' }));
    mockFetchByUrl(() => jsonResponse({ status: 'OK', result: contests }));

    const response = await request(app).get('/codeforces/contests');

    expect(response.body).toHaveLength(10);
    expect(response.body[9].id).toBe(9);
  });

  it('should fail with a shape error when the envelope has no result', async () => {
    mockFetchByUrl(() => jsonResponse({ status: 'FAILED' }));

    const response = await request(app).get('/codeforces/contests');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ detail: 'Unexpected response from the Codeforces API.' });
  });
});

describe('GET /codeforces/userinfo/:handle', () => {
  it('should return the profile with a profile link and formatted last-online time', async () => {
    const mockFetch = mockFetchByUrl(() => jsonResponse({ status: 'OK', result: [profile] }));

    const response = await request(app).get('/codeforces/userinfo/tourist_test');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      handle: 'Tourist_Test',
      firstName: 'Ada',
      lastName: null,
      country: null,
      organization: null,
      rating: 3500,
      maxRating: 3800,
      rank: 'legendary grandmaster',
      maxRank: 'legendary grandmaster',
      lastOnline: '2023-11-14 22:13:20',
      profileLink: 'https://codeforces.com/profile/Tourist_Test',
    });
    expect(calledUrls(mockFetch)[0]?.searchParams.get('handles')).toBe('tourist_test');
  });

  it('should answer 404 when Codeforces rejects the handle', async () => {
    mockFetchByUrl(() =>
      jsonResponse({ status: 'FAILED', comment: 'handles: User with handle nobody not found' }, 400)
    );

    const response = await request(app).get('/codeforces/userinfo/nobody');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ detail: "Codeforces user 'nobody' not found." });
  });

  it('should answer 404 for an empty result', async () => {
    mockFetchByUrl(() => jsonResponse({ status: 'OK', result: [] }));

    const response = await request(app).get('/codeforces/userinfo/nobody');

    expect(response.status).toBe(404);
  });
});

describe('GET /codeforces/userinfo/me', () => {
  it('should fail with a configuration error when no default handle is set', async () => {
    const mockFetch = mockFetchByUrl(() => jsonResponse({ status: 'OK', result: [profile] }));

    const response = await request(app).get('/codeforces/userinfo/me');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ detail: 'CODEFORCES_HANDLE is not configured.' });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should look up the configured handle', async () => {
    const configured = createApp(testConfig({ CODEFORCES_HANDLE: 'Tourist_Test' }));
    const mockFetch = mockFetchByUrl(() => jsonResponse({ status: 'OK', result: [profile] }));

    const response = await request(configured).get('/codeforces/userinfo/me');

    expect(response.status).toBe(200);
    expect(response.body.handle).toBe('Tourist_Test');
    expect(calledUrls(mockFetch)[0]?.searchParams.get('handles')).toBe('Tourist_Test');
  });

  it('should name the default user when it does not exist', async () => {
    const configured = createApp(testConfig({ CODEFORCES_HANDLE: 'gone' }));
    mockFetchByUrl(() => jsonResponse({ status: 'FAILED' }, 400));

    const response = await request(configured).get('/codeforces/userinfo/me');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ detail: "Default Codeforces user 'gone' not found." });
  });
});
