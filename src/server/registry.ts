/**
 * DevGate — Router Registry
 *
 * Mounts each adapter's routes under its own prefix and keeps the
 * discovery list derived from what is actually mounted.
 *
 * Registration fails at startup when:
 * - two adapters claim the same prefix
 * - an adapter claims a reserved prefix
 * - an adapter declares no routes
 * - two routes share a method and path (parameter names ignored)
 * - the example endpoint lies outside the adapter's prefix
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { RouteCollisionError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { SourceAdapter } from '../sources/base';
import type { FeatureMap } from '../types';

export const RESERVED_PREFIXES: ReadonlySet<string> = new Set(['features']);

export interface RegisteredRoute {
  prefix: string;
  method: string;
  path: string;
  summary: string;
}

/** `/repos/:owner/:repo` and `/repos/:a/:b` are the same route. */
export function routeKey(method: string, path: string): string {
  return `${method.toUpperCase()} ${path.replace(/:[A-Za-z0-9_]+/g, ':param').replace(/\/+$/, '')}`;
}

function stringParams(params: Record<string, unknown>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (typeof value === 'string') result[key] = value;
  }
  return result;
}

export class RouterRegistry {
  private readonly adapters = new Map<string, SourceAdapter>();
  private readonly routeKeys = new Set<string>();
  private readonly registered: RegisteredRoute[] = [];
  readonly router: Router = Router();

  register(adapter: SourceAdapter): this {
    const { prefix } = adapter;

    if (!/^[a-z0-9-]+$/.test(prefix)) {
      throw new RouteCollisionError(`Invalid prefix '${prefix}'`);
    }
    if (RESERVED_PREFIXES.has(prefix)) {
      throw new RouteCollisionError(`Prefix '${prefix}' is reserved by the gateway`);
    }
    const existing = this.adapters.get(prefix);
    if (existing) {
      throw new RouteCollisionError(
        `Prefix '${prefix}' already registered by ${existing.label}; refusing ${adapter.label}`
      );
    }
    if (!adapter.exampleEndpoint.startsWith(`/${prefix}/`)) {
      throw new RouteCollisionError(
        `Example endpoint ${adapter.exampleEndpoint} is outside /${prefix}`
      );
    }

    const routes = adapter.routes();
    if (routes.length === 0) {
      throw new RouteCollisionError(`Adapter ${adapter.label} declares no routes`);
    }

    const subRouter = Router();
    const pending: RegisteredRoute[] = [];
    const pendingKeys = new Set<string>();

    for (const route of routes) {
      const fullPath = `/${prefix}${route.path}`;
      const key = routeKey(route.method, fullPath);
      if (this.routeKeys.has(key) || pendingKeys.has(key)) {
        throw new RouteCollisionError(`Duplicate route ${key} in ${adapter.label}`);
      }
      pendingKeys.add(key);
      pending.push({ prefix, method: route.method.toUpperCase(), path: fullPath, summary: route.summary });

      subRouter[route.method](route.path, async (req: Request, res: Response, next: NextFunction) => {
        try {
          const result = await route.handler({ params: stringParams(req.params), query: req.query });
          res.json(result);
        } catch (error) {
          next(error);
        }
      });
    }

    // Commit only once the whole adapter validated
    for (const key of pendingKeys) this.routeKeys.add(key);
    this.registered.push(...pending);
    this.adapters.set(prefix, adapter);
    this.router.use(`/${prefix}`, subRouter);

    logger.debug('Source registered', { prefix, routes: routes.length });
    return this;
  }

  prefixes(): string[] {
    return Array.from(this.adapters.keys());
  }

  routes(): RegisteredRoute[] {
    return [...this.registered];
  }

  /**
   * Discovery payload: one entry per registered prefix.
   */
  features(): FeatureMap {
    const features: FeatureMap = {};
    for (const [prefix, adapter] of this.adapters) {
      features[prefix] = {
        example_endpoint: adapter.exampleEndpoint,
        description: adapter.description,
      };
    }
    return features;
  }
}
