#!/usr/bin/env node

/**
 * Markdown Reply Renderer MCP Server
 *
 * Main entry point - reads configuration, starts the render session and
 * serves the tools over stdio
 */

import { initServerConfig, getReplyPipeline } from './server/server-config.js';
import { RenderMcpServer } from './server/mcp-server.js';
import { getLogger, asError } from './shared/services/logging.service.js';

const SERVER_NAME = 'md-reply-renderer';
const SERVER_VERSION = '0.1.0';

async function main(): Promise<void> {
  const config = initServerConfig(process.argv.slice(2));
  const pipeline = getReplyPipeline();

  const server = new RenderMcpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      capabilities: { tools: {}, logging: {} },
    },
    pipeline
  );

  await server.start();

  // Launch failures are logged and retried on the first render
  await pipeline.start();
  getLogger().info('Rendering into cache directory', { cacheDir: config.cacheDir, tag: config.tag });

  const shutdown = (signal: string): void => {
    console.error(`Received ${signal}, shutting down...`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  getLogger().critical('Failed to start server', asError(error));
  process.exit(1);
});
