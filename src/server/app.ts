/**
 * DevGate — Gateway Facade
 *
 * Composition root of the HTTP surface:
 * - GET /          — welcome message
 * - GET /features  — one entry per registered source
 * - /<prefix>/...  — adapter routes from the registry
 *
 * Cross-origin policy and error rendering live here; adapters only throw.
 */

import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { GatewayConfig } from '../lib/config';
import { GatewayError } from '../lib/errors';
import { logger } from '../lib/logger';
import { createAdapters, type SourceAdapter } from '../sources';
import { RouterRegistry } from './registry';

export const WELCOME_MESSAGE = 'Welcome to the DevGate aggregator API! See /features for a summary.';

export interface AppOptions {
  /** Replaces the default adapter set. */
  adapters?: SourceAdapter[];
}

/** A 4xx status carried by an error that is not a GatewayError. */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status <= 499 ? status : undefined;
}

export function createRegistry(config: GatewayConfig, adapters?: SourceAdapter[]): RouterRegistry {
  const registry = new RouterRegistry();
  for (const adapter of adapters ?? createAdapters(config)) {
    registry.register(adapter);
  }
  return registry;
}

export function createApp(config: GatewayConfig, options: AppOptions = {}): Express {
  const registry = createRegistry(config, options.adapters);
  const app = express();

  app.disable('x-powered-by');

  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    })
  );

  // Request log
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    res.on('finish', () => {
      logger.info('Request completed', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      });
    });
    next();
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: WELCOME_MESSAGE });
  });

  app.get('/features', (_req: Request, res: Response) => {
    res.json(registry.features());
  });

  app.use(registry.router);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof GatewayError) {
      if (err.status >= 500) {
        logger.error('Request failed', { path: req.originalUrl, kind: err.kind, error: err.message });
      }
      res.status(err.status).json({ detail: err.message });
      return;
    }

    // Errors raised by express itself, e.g. a path param that fails to decode
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      logger.warn('Rejected request', { path: req.originalUrl, status });
      res.status(status).json({ detail: err instanceof Error ? err.message : 'Bad Request' });
      return;
    }

    logger.error('Unhandled error', {
      path: req.originalUrl,
      error: err instanceof Error ? err.message : String(err),
    });
    res.status(500).json({ detail: 'Internal server error' });
  });

  logger.info('Gateway ready', { sources: registry.prefixes() });

  return app;
}
