/**
 * DevGate — Upstream HTTP Client
 *
 * One GET per logical call, no retries, bounded by a per-call timeout.
 * Failures are mapped onto gateway errors:
 * - transport failure or timeout → UpstreamUnavailableError (503)
 * - adapter-declared "not found" statuses → NotFoundError (404)
 * - any other non-2xx → UpstreamError carrying the upstream status and body
 * - unparseable JSON → ShapeError (500)
 */

import {
  NotFoundError,
  ShapeError,
  UpstreamError,
  UpstreamUnavailableError,
  isTransportError,
} from './errors';
import { timeOperation, type Logger } from './logger';

export type QueryValue = string | number | boolean | undefined;

export interface UpstreamRequest {
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  /** Prefix for upstream-error messages, e.g. "Failed to fetch GitLab issues". */
  errorMessage: string;
  /** When set, these statuses (default 404) mean the requested resource does not exist. */
  notFound?: {
    message: string;
    statuses?: number[];
  };
}

export function buildUrl(base: string, query: Record<string, QueryValue> = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}

export class UpstreamClient {
  constructor(
    /** Display name used in error messages, e.g. "Hacker News". */
    readonly label: string,
    private readonly timeoutMs: number,
    private readonly log: Logger
  ) {}

  async getJson(url: string, request: UpstreamRequest): Promise<unknown> {
    const response = await this.send(url, request, 'application/json');
    try {
      return await response.json();
    } catch {
      throw new ShapeError(this.label, ['response body is not valid JSON']);
    }
  }

  async getText(url: string, request: UpstreamRequest): Promise<string> {
    const response = await this.send(url, request, 'text/html,*/*');
    return response.text();
  }

  private async send(
    url: string,
    request: UpstreamRequest,
    accept: string
  ): Promise<Response> {
    const target = buildUrl(url, request.query);

    let response: Response;
    try {
      response = await timeOperation(
        `GET ${target}`,
        () =>
          fetch(target, {
            method: 'GET',
            headers: { Accept: accept, ...request.headers },
            signal: AbortSignal.timeout(this.timeoutMs),
          }),
        this.log
      );
    } catch (error) {
      if (isTransportError(error)) {
        this.log.warn('Upstream unreachable', {
          url: target,
          error: error instanceof Error ? error.message : String(error),
        });
        throw new UpstreamUnavailableError(this.label);
      }
      throw error;
    }

    if (response.ok) {
      return response;
    }

    const notFoundStatuses = request.notFound?.statuses ?? [404];
    if (request.notFound && notFoundStatuses.includes(response.status)) {
      await response.body?.cancel();
      throw new NotFoundError(request.notFound.message);
    }

    const body = await response.text().catch(() => '');
    this.log.warn('Upstream returned an error status', { url: target, status: response.status });
    throw new UpstreamError(response.status, `${request.errorMessage}: ${body}`);
  }
}
