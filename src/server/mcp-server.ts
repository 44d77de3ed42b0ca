/**
 * MCP Server
 *
 * Exposes the reply pipeline over MCP stdio: tool registration, request
 * routing, and log forwarding to the client.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SetLevelRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ServerConfig } from './types.js';
import type { ReplyPipeline } from '../pipeline/reply-pipeline.js';
import {
  RenderMarkdownInputSchema,
  RenderReplyInputSchema,
  GetTagInstructionsInputSchema,
} from '../tools/tool-schemas.js';
import { renderMarkdown, renderReply, getTagInstructions } from '../tools/render-tools.js';
import {
  createSuccessResponse,
  createErrorResponse,
  type McpToolResponse,
} from '../shared/errors/index.js';
import {
  getLogger,
  isLogLevel,
  type LogLevel,
  type McpNotificationSender,
} from '../shared/services/logging.service.js';

/**
 * Run a tool handler with timing, logging and structured error conversion
 */
export async function executeWithLogging(
  toolName: string,
  handler: () => Promise<Record<string, unknown>> | Record<string, unknown>
): Promise<McpToolResponse> {
  const logger = getLogger();
  const startTime = Date.now();

  try {
    logger.debug(`Executing tool: ${toolName}`);
    const result = await handler();
    logger.debug(`Tool ${toolName} completed in ${Date.now() - startTime}ms`);
    return createSuccessResponse(result);
  } catch (error) {
    logger.error(
      `Tool ${toolName} failed after ${Date.now() - startTime}ms`,
      error instanceof Error ? error : undefined,
      { toolName }
    );
    return createErrorResponse(error);
  }
}

export class RenderMcpServer implements McpNotificationSender {
  private readonly server: McpServer;
  private readonly transport: StdioServerTransport;

  constructor(
    private readonly config: ServerConfig,
    private readonly pipeline: ReplyPipeline
  ) {
    this.server = new McpServer(
      { name: config.name, version: config.version },
      { capabilities: config.capabilities }
    );
    this.transport = new StdioServerTransport();

    this.registerLoggingHandlers();
    this.registerTools();
  }

  async start(): Promise<void> {
    await this.server.connect(this.transport);
    getLogger().setMcpServer(this);
    getLogger().info('MCP server started', { name: this.config.name });
  }

  async stop(): Promise<void> {
    getLogger().setMcpServer(null);
    await this.pipeline.stop();
    await this.server.close();
  }

  async sendLoggingMessage(params: {
    level: LogLevel;
    logger?: string;
    data: Record<string, unknown>;
  }): Promise<void> {
    await this.server.server.notification({
      method: 'notifications/message',
      params: {
        level: params.level,
        logger: params.logger,
        data: params.data,
      },
    });
  }

  private registerLoggingHandlers(): void {
    this.server.server.setRequestHandler(SetLevelRequestSchema, (request) => {
      const { level } = request.params;
      if (isLogLevel(level)) {
        getLogger().setMinLevel(level);
        getLogger().info(`Log level set to: ${level}`);
      }
      return {};
    });
  }

  private registerTools(): void {
    this.server.registerTool(
      'render_markdown',
      {
        title: 'Render Markdown',
        description:
          'Render a Markdown document (tables, code, LaTeX math) to a PNG image and return its file path',
        inputSchema: RenderMarkdownInputSchema.shape,
      },
      async (input) => executeWithLogging('render_markdown', () => renderMarkdown(this.pipeline, input))
    );

    this.server.registerTool(
      'render_reply',
      {
        title: 'Render Reply',
        description:
          'Split a model reply on its render tags and return ordered text and image items; failed renders fall back to the source text',
        inputSchema: RenderReplyInputSchema.shape,
      },
      async (input) => executeWithLogging('render_reply', () => renderReply(this.pipeline, input))
    );

    this.server.registerTool(
      'get_tag_instructions',
      {
        title: 'Get Tag Instructions',
        description:
          'Return a system prompt extended with instructions that teach the model the render tag grammar',
        inputSchema: GetTagInstructionsInputSchema.shape,
      },
      async (input) =>
        executeWithLogging('get_tag_instructions', () => getTagInstructions(this.pipeline, input))
    );
  }
}
