/**
 * DevGate — Source Adapter Base
 *
 * Abstract base class for all upstream adapters.
 * Each adapter owns one path prefix and declares its routes; the
 * registry mounts them and the facade renders results and errors.
 */

import type { z } from 'zod';
import type { GatewayConfig } from '../lib/config';
import { BadRequestError, formatZodIssues } from '../lib/errors';
import { UpstreamClient } from '../lib/http';
import { logger, type Logger } from '../lib/logger';

// ============================================================
// ROUTE TYPES
// ============================================================

export interface RouteContext {
  params: Record<string, string>;
  query: Record<string, unknown>;
}

/** Resolves to one record or a list of records. */
export type RouteHandler = (context: RouteContext) => Promise<object>;

export interface RouteDefinition {
  method: 'get';
  /** Path relative to the adapter prefix, express syntax. */
  path: string;
  summary: string;
  handler: RouteHandler;
}

// ============================================================
// ADAPTER
// ============================================================

export abstract class SourceAdapter {
  /** Top-level path segment, without slashes. */
  abstract readonly prefix: string;
  abstract readonly description: string;
  /** Full path of one representative endpoint, listed by /features. */
  abstract readonly exampleEndpoint: string;

  protected readonly logger: Logger;
  protected readonly http: UpstreamClient;

  constructor(
    protected readonly config: GatewayConfig,
    /** Display name used in error messages. */
    readonly label: string
  ) {
    this.logger = logger.child({ source: label });
    this.http = new UpstreamClient(label, config.upstreamTimeoutMs, this.logger);
  }

  /**
   * Routes served under the prefix.
   * Must be implemented by each adapter.
   */
  abstract routes(): RouteDefinition[];

  protected get(path: string, summary: string, handler: RouteHandler): RouteDefinition {
    return { method: 'get', path, summary, handler };
  }

  /**
   * Validate query or path parameters before any network call.
   */
  protected validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
      throw new BadRequestError(formatZodIssues(result.error));
    }
    return result.data;
  }
}
