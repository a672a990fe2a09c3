/**
 * DevGate — Server Entry Point
 *
 * Loads .env, builds the configuration and starts listening.
 * Run with: npm start
 */

import type { Server } from 'node:http';
import { config as loadDotenv } from 'dotenv';
import { loadConfig, type GatewayConfig } from '../lib/config';
import { logger } from '../lib/logger';
import { createApp } from './app';

// ============================================================
// SERVER START
// ============================================================

export function startServer(config: GatewayConfig): Server {
  const app = createApp(config);

  const server = app.listen(config.port, () => {
    logger.info(`DevGate listening on port ${config.port}`, {
      corsOrigins: config.corsOrigins,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(error => {
      if (error) {
        logger.error('Error while closing server', { error: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

// Start if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  loadDotenv();
  try {
    startServer(loadConfig());
  } catch (error) {
    logger.error('Failed to start', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}
