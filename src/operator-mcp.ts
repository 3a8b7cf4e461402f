#!/usr/bin/env node
/**
 * @fileoverview Operator MCP server entry point
 *
 * Runs the operator tools over stdio against the same database as the
 * webhook server. This process never buffers or routes inbound messages,
 * so the debounce scheduler is not started.
 *
 * @module operator-mcp
 * @license MIT
 */

import 'dotenv/config';
import { AppContext } from './app-context.js';
import { loadConfig } from './config/env.js';
import { OperatorMcpServer } from './server.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('main');

async function main(): Promise<void> {
  const context = new AppContext(loadConfig());
  const server = new OperatorMcpServer(context);
  await server.start();

  const shutdown = async (): Promise<void> => {
    await server.close();
    await context.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown().catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to start operator MCP server:', error);
  process.exit(1);
});
