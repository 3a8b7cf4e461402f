#!/usr/bin/env node
/**
 * @fileoverview Webhook server entry point
 *
 * Loads the configuration, builds the application context, starts the
 * HTTP server and the buffer sweeper, and shuts everything down on
 * SIGINT/SIGTERM.
 *
 * @module index
 * @license MIT
 */

import 'dotenv/config';
import { AppContext } from './app-context.js';
import { loadConfig } from './config/env.js';
import { createLogger } from './utils/logger.js';
import { createApp, startWebhookServer } from './webhook-server.js';

const logger = createLogger('main');

/**
 * Main application entry point.
 *
 * @description
 * Startup failures are logged and exit with code 1. On a shutdown signal
 * the server stops accepting connections, running batches and queued
 * tasks finish, and the databases are closed. Batches still buffered are
 * picked up by the sweeper on the next start.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const context = new AppContext(config);

  const server = startWebhookServer(createApp(context.webhookDeps()), config.WEBHOOK_PORT, createLogger('http'));
  context.scheduler.start();
  // Batches left over from a previous run are due immediately.
  context.scheduler.sweep();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);

    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          logger.warn(`HTTP server close: ${error.message}`);
        }
        resolve();
      });
    });
    await context.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start webhook server:', error);
  process.exit(1);
});
