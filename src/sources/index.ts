/**
 * DevGate — Source Adapters Index
 *
 * One adapter per upstream platform. Where the platform once had two
 * competing implementations (GitHub, Hacker News, Stack Overflow) the
 * single adapter here serves the union of their endpoints.
 */

import type { GatewayConfig } from '../lib/config';
import type { SourceAdapter } from './base';
import { CodeforcesAdapter } from './codeforces';
import { DevToAdapter } from './devto';
import { GeeksForGeeksAdapter } from './gfg';
import { GitHubAdapter } from './github';
import { GitLabAdapter } from './gitlab';
import { HackerNewsAdapter } from './hacker-news';
import { KaggleAdapter } from './kaggle';
import { NpmAdapter } from './npm';
import { PypiAdapter } from './pypi';
import { RedditAdapter } from './reddit';
import { StackOverflowAdapter } from './stackoverflow';

export function createAdapters(config: GatewayConfig): SourceAdapter[] {
  return [
    // Source hosting
    new GitHubAdapter(config),
    new GitLabAdapter(config),
    // Package registries
    new NpmAdapter(config),
    new PypiAdapter(config),
    // News & forums
    new HackerNewsAdapter(config),
    new RedditAdapter(config),
    new DevToAdapter(config),
    // Q&A
    new StackOverflowAdapter(config),
    // Competitive programming & data
    new CodeforcesAdapter(config),
    new GeeksForGeeksAdapter(config),
    new KaggleAdapter(config),
  ];
}

export { SourceAdapter } from './base';
export type { RouteContext, RouteDefinition, RouteHandler } from './base';
