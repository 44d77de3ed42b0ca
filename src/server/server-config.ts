/**
 * Server Configuration
 *
 * Holds the parsed configuration and the process-wide reply pipeline.
 */

import { parseArgs, type ServerArgs } from '../cli/args.js';
import { RenderSession } from '../browser/render-session.js';
import { DocumentRenderer } from '../document/document-renderer.js';
import { ReplyPipeline } from '../pipeline/reply-pipeline.js';

let serverConfig: ServerArgs | null = null;
let replyPipeline: ReplyPipeline | null = null;

/**
 * Initialize server configuration from CLI arguments and environment variables.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function initServerConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ServerArgs {
  serverConfig = parseArgs(argv, env);
  return serverConfig;
}

/**
 * Get the current server configuration.
 * Throws if not initialized.
 */
export function getServerConfig(): ServerArgs {
  if (!serverConfig) {
    throw new Error('Server config not initialized. Call initServerConfig() first.');
  }
  return serverConfig;
}

/**
 * Build the pipeline for a configuration: one render session, one renderer.
 */
export function createReplyPipeline(config: ServerArgs): ReplyPipeline {
  const session = new RenderSession({
    executablePath: config.executablePath,
    channel: config.channel,
    engineCacheDir: config.engineCacheDir,
  });

  const renderer = new DocumentRenderer(session, {
    cacheDir: config.cacheDir,
    mathJaxUrl: config.mathJaxUrl,
    settleDelayMs: config.settleDelayMs,
    navigationTimeoutMs: config.navigationTimeoutMs,
  });

  return new ReplyPipeline(session, renderer, {
    tag: config.tag,
    sanitizeLiterals: config.sanitize,
    scaleFactor: config.scale,
    minWidth: config.minWidth,
    fixedWidth: config.width,
  });
}

/**
 * Get or create the ReplyPipeline singleton.
 */
export function getReplyPipeline(): ReplyPipeline {
  replyPipeline ??= createReplyPipeline(getServerConfig());
  return replyPipeline;
}

/**
 * Reset server state (for testing).
 */
export function resetServerState(): void {
  serverConfig = null;
  replyPipeline = null;
}
