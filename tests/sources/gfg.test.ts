/**
 * DevGate — GeeksforGeeks Adapter Tests
 */

import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../../src/server/app';
import { extractProblemOfTheDay } from '../../src/sources/gfg';
import { calledUrls, jsonResponse, mockFetchByUrl, textResponse, testConfig } from '../helpers';

const app = createApp(testConfig());

const PAGE_URL = 'https://www.geeksforgeeks.org/problem-of-the-day';

const potdPage = `
<html><body>
  <div class="POTD_header-main__Xy12">
    <h2>Problem of the day</h2>
    <a href="/problems/two-sum/1">  Two Sum  </a>
    <a href="/problems/other/1">Other</a>
  </div>
</body></html>`;

describe('extractProblemOfTheDay', () => {
  it('should read the first link inside the container', () => {
    expect(extractProblemOfTheDay(potdPage, PAGE_URL)).toEqual({
      title: 'Two Sum',
      link: 'https://www.geeksforgeeks.org/problems/two-sum/1',
    });
  });

  it('should keep absolute links', () => {
    const html = '<div class="POTD_header-main"><a href="https://practice.example.test/p/1">P1</a></div>';
    expect(extractProblemOfTheDay(html, PAGE_URL)).toEqual({
      title: 'P1',
      link: 'https://practice.example.test/p/1',
    });
  });

  it('should return null when the container is missing', () => {
    expect(extractProblemOfTheDay('<div class="other"><a href="/x">X</a></div>', PAGE_URL)).toBeNull();
  });

  it('should return null when the container has no link', () => {
    expect(extractProblemOfTheDay('<div class="POTD_header-main">Soon</div>', PAGE_URL)).toBeNull();
  });
});

describe('GET /gfg/potd', () => {
  it('should return the scraped problem', async () => {
    mockFetchByUrl(() => textResponse(potdPage));

    const response = await request(app).get('/gfg/potd');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      title: 'Two Sum',
      link: 'https://www.geeksforgeeks.org/problems/two-sum/1',
    });
  });

  it('should answer 500 when the page structure changed', async () => {
    mockFetchByUrl(() => textResponse('<html><body>redesigned</body></html>'));

    const response = await request(app).get('/gfg/potd');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      detail: 'Failed to fetch or parse the GeeksforGeeks problem of the day page.',
    });
  });

  it('should answer 500 even when the site is unreachable', async () => {
    mockFetchByUrl(() => {
      throw new TypeError('fetch failed');
    });

    const response = await request(app).get('/gfg/potd');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      detail: 'Failed to fetch or parse the GeeksforGeeks problem of the day page.',
    });
  });
});

describe('GET /gfg/stats/:username', () => {
  it('should return solve counts', async () => {
    const mockFetch = mockFetchByUrl(() =>
      jsonResponse({ totalProblemsSolved: 120, easy: 60, medium: 50, hard: 10, School: 0 })
    );

    const response = await request(app).get('/gfg/stats/coder1');

    expect(response.body).toEqual({ totalSolved: 120, easy: 60, medium: 50, hard: 10 });
    const [url] = calledUrls(mockFetch);
    expect(url?.searchParams.get('userName')).toBe('coder1');
    expect(url?.searchParams.get('raw')).toBe('y');
  });

  it('should answer 404 for an unknown user', async () => {
    mockFetchByUrl(() => jsonResponse({ error: 'User not found' }, 404));

    const response = await request(app).get('/gfg/stats/nobody');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ detail: "GeeksforGeeks user 'nobody' not found." });
  });
});
