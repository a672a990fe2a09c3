/**
 * DevGate — GitHub Adapter
 *
 * Repositories, issues and pull requests of the authenticated user, plus
 * per-repository pull requests and releases, through Octokit.
 *
 * Every endpoint except releases needs GITHUB_TOKEN. Releases work
 * anonymously and use the token for the higher rate limit when present.
 */

import { Octokit, RequestError } from 'octokit';
import type { GatewayConfig } from '../lib/config';
import {
  NotFoundError,
  UpstreamError,
  UpstreamUnavailableError,
  isTransportError,
  requireSetting,
} from '../lib/errors';
import { timeOperation } from '../lib/logger';
import { take } from '../lib/shape';
import type { IssueRecord, PullRequestRecord, ReleaseRecord, RepoRecord } from '../types';
import { SourceAdapter, type RouteDefinition } from './base';

const PAGE_SIZE = 10;
const MAX_RELEASES = 30;

interface GitHubCall {
  /** Prefix of the upstream-error message. */
  errorMessage: string;
  /** Message used when GitHub answers 404. */
  notFound?: string;
}

/**
 * Octokit hands over the body already parsed: text bodies arrive as the
 * raw string, JSON bodies are serialized back.
 */
function describeBody(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined) return '';
  return JSON.stringify(data);
}

export class GitHubAdapter extends SourceAdapter {
  readonly prefix = 'github';
  readonly description = 'List your GitHub repositories, issues, pull requests and releases';
  readonly exampleEndpoint = '/github/repos';

  constructor(config: GatewayConfig) {
    super(config, 'GitHub');
  }

  routes(): RouteDefinition[] {
    return [
      this.get('/repos', 'Recently updated repositories', () => this.repos()),
      this.get('/issues', 'Issues assigned to the user', () => this.issues()),
      this.get('/pulls', 'Open pull requests involving the user', () => this.myPullRequests()),
      this.get('/repos/:owner/:repo/pulls', 'Open pull requests of a repository', ({ params }) =>
        this.pullRequests(params.owner, params.repo)
      ),
      this.get('/:owner/:repo/releases', 'Latest releases of a repository', ({ params }) =>
        this.releases(params.owner, params.repo)
      ),
    ];
  }

  async repos(): Promise<RepoRecord[]> {
    const client = this.authenticatedClient();
    const { data } = await this.call({ errorMessage: 'Failed to fetch GitHub repos' }, signal =>
      client.rest.repos.listForAuthenticatedUser({
        sort: 'updated',
        per_page: PAGE_SIZE,
        request: { signal },
      })
    );
    return take(data, PAGE_SIZE).map(repo => ({ id: repo.id, name: repo.name, url: repo.html_url }));
  }

  async issues(): Promise<IssueRecord[]> {
    const client = this.authenticatedClient();
    const { data } = await this.call({ errorMessage: 'Failed to fetch GitHub issues' }, signal =>
      client.rest.issues.list({
        filter: 'assigned',
        sort: 'updated',
        per_page: PAGE_SIZE,
        request: { signal },
      })
    );
    return take(data, PAGE_SIZE).map(issue => ({
      id: issue.id,
      title: issue.title,
      url: issue.html_url,
    }));
  }

  /**
   * Two sequential calls: resolve the token's login, then search pull
   * requests involving it.
   */
  async myPullRequests(): Promise<IssueRecord[]> {
    const client = this.authenticatedClient();
    const errorMessage = 'Failed to fetch GitHub pull requests';

    const { data: user } = await this.call({ errorMessage }, signal =>
      client.rest.users.getAuthenticated({ request: { signal } })
    );

    const { data } = await this.call({ errorMessage }, signal =>
      client.rest.search.issuesAndPullRequests({
        q: `is:pr is:open involves:${user.login}`,
        sort: 'updated',
        per_page: PAGE_SIZE,
        request: { signal },
      })
    );

    return take(data.items, PAGE_SIZE).map(item => ({
      id: item.id,
      title: item.title,
      url: item.html_url,
    }));
  }

  async pullRequests(owner: string, repo: string): Promise<PullRequestRecord[]> {
    const client = this.authenticatedClient();
    const { data } = await this.call(
      {
        errorMessage: `Failed to fetch pull requests for ${owner}/${repo}`,
        notFound: `Repository ${owner}/${repo} not found.`,
      },
      signal => client.rest.pulls.list({ owner, repo, request: { signal } })
    );
    return data.map(pr => ({
      id: pr.id,
      title: pr.title,
      url: pr.html_url,
      // Deleted accounts come back as null; GitHub renders them as "ghost"
      user: pr.user?.login ?? 'ghost',
    }));
  }

  async releases(owner: string, repo: string): Promise<ReleaseRecord[]> {
    const client = this.client(this.config.github.token);
    const { data } = await this.call(
      {
        errorMessage: 'Error fetching releases',
        notFound: `Repository '${owner}/${repo}' not found.`,
      },
      signal =>
        client.rest.repos.listReleases({
          owner,
          repo,
          per_page: MAX_RELEASES,
          request: { signal },
        })
    );
    return take(data, MAX_RELEASES).map(release => ({
      tag_name: release.tag_name,
      name: release.name,
      url: release.html_url,
      published_at: release.published_at ?? '',
    }));
  }

  // ============================================================
  // CLIENT
  // ============================================================

  private authenticatedClient(): Octokit {
    return this.client(requireSetting(this.config.github.token, 'GITHUB_TOKEN'));
  }

  private client(token: string | undefined): Octokit {
    return new Octokit({
      auth: token,
      userAgent: 'devgate/1.0',
      // One attempt per call
      retry: { enabled: false },
      throttle: { enabled: false },
    });
  }

  /**
   * Run one Octokit request with the gateway timeout and map its failure.
   */
  private async call<T>(
    options: GitHubCall,
    request: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    try {
      return await timeOperation(
        options.errorMessage,
        () => request(AbortSignal.timeout(this.config.upstreamTimeoutMs)),
        this.logger
      );
    } catch (error) {
      throw this.mapError(error, options);
    }
  }

  private mapError(error: unknown, options: GitHubCall): unknown {
    if (error instanceof RequestError) {
      // Octokit wraps network failures in a RequestError without a response
      if (!error.response) {
        this.logger.warn('Upstream unreachable', { error: error.message });
        return new UpstreamUnavailableError(this.label);
      }
      if (error.status === 404 && options.notFound) {
        return new NotFoundError(options.notFound);
      }
      return new UpstreamError(
        error.status,
        `${options.errorMessage}: ${describeBody(error.response.data)}`
      );
    }
    if (isTransportError(error)) {
      return new UpstreamUnavailableError(this.label);
    }
    return error;
  }
}
