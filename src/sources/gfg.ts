/**
 * DevGate — GeeksforGeeks Adapter
 *
 * The problem of the day has no API and is scraped from the public page.
 * Solve statistics come from a community stats API.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { ScrapeError } from '../lib/errors';
import { numberOr, parsePayload } from '../lib/shape';
import type { ProblemOfTheDayRecord, SolveStatsRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const POTD_URL = 'https://www.geeksforgeeks.org/problem-of-the-day';
const STATS_API = 'https://geeks-for-geeks-stats-api.vercel.app/';

// Class names carry a build hash suffix; match the stable fragment
const POTD_CONTAINER = 'div[class*="POTD_header-main"]';

const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

const SCRAPE_FAILED = 'Failed to fetch or parse the GeeksforGeeks problem of the day page.';

const StatsSchema = z.object({
  totalProblemsSolved: numberOr(null),
  easy: numberOr(null),
  medium: numberOr(null),
  hard: numberOr(null),
});

/**
 * Pull the problem title and link out of the page.
 * Returns null when the container, the anchor, or its text is missing.
 */
export function extractProblemOfTheDay(html: string, pageUrl: string): ProblemOfTheDayRecord | null {
  const $ = cheerio.load(html);
  const container = $(POTD_CONTAINER).first();
  if (container.length === 0) return null;

  const anchor = container.find('a[href]').first();
  const href = anchor.attr('href');
  const title = anchor.text().trim();
  if (!href || !title) return null;

  return { title, link: new URL(href, pageUrl).toString() };
}

export class GeeksForGeeksAdapter extends SourceAdapter {
  readonly prefix = 'gfg';
  readonly description = 'Get the GeeksforGeeks problem of the day and user solve stats';
  readonly exampleEndpoint = '/gfg/potd';

  constructor(config: GatewayConfig) {
    super(config, 'GeeksforGeeks');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/potd', 'Problem of the day', () => this.problemOfTheDay()),
      this.get('/stats/:username', 'Solved problem counts of a user', ({ params }) =>
        this.stats(params.username)
      ),
    ];
  }

  /**
   * Every failure on the way, network included, becomes one ScrapeError:
   * partial page structure is never returned.
   */
  async problemOfTheDay(): Promise<ProblemOfTheDayRecord> {
    let problem: ProblemOfTheDayRecord | null;
    try {
      const html = await this.http.getText(POTD_URL, {
        headers: { 'User-Agent': BROWSER_USER_AGENT },
        errorMessage: 'Failed to fetch the problem of the day page',
      });
      problem = extractProblemOfTheDay(html, POTD_URL);
    } catch (error) {
      this.logger.warn('Problem of the day scrape failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ScrapeError(SCRAPE_FAILED);
    }

    if (!problem) {
      this.logger.warn('Problem of the day container or link not found');
      throw new ScrapeError(SCRAPE_FAILED);
    }
    return problem;
  }

  async stats(username: string): Promise<SolveStatsRecord> {
    const payload = await this.http.getJson(STATS_API, {
      query: { raw: 'y', userName: username },
      errorMessage: `GeeksforGeeks stats fetch failed for user '${username}'`,
      notFound: { message: `GeeksforGeeks user '${username}' not found.` },
    });
    const stats = parsePayload(StatsSchema, payload, this.label);
    return {
      totalSolved: stats.totalProblemsSolved,
      easy: stats.easy,
      medium: stats.medium,
      hard: stats.hard,
    };
  }
}
