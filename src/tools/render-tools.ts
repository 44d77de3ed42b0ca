/**
 * Render Tools
 *
 * MCP tool handlers. Each takes the reply pipeline and validated input and
 * returns structured output, or throws an McpError for the server to report.
 */

import type { ReplyPipeline } from '../pipeline/reply-pipeline.js';
import type { OutputItem } from '../assembler/output.types.js';
import type { RenderFailure } from '../document/render.types.js';
import { ErrorCode, ErrorSeverity } from '../shared/errors/error-codes.js';
import { McpError } from '../shared/errors/mcp-error.js';
import {
  RenderMarkdownInputSchema,
  RenderReplyInputSchema,
  GetTagInstructionsInputSchema,
} from './tool-schemas.js';

function failureCode(failure: RenderFailure): ErrorCode {
  switch (failure.reason) {
    case 'ENGINE_UNAVAILABLE':
      return ErrorCode.ENGINE_UNAVAILABLE;
    case 'TIMEOUT':
      return ErrorCode.TIMEOUT;
    case 'EMPTY_DOCUMENT':
    case 'MISSING_OUTPUT':
    case 'UNKNOWN':
      return ErrorCode.RENDER_FAILED;
  }
}

/**
 * render_markdown: one Markdown document to one image
 */
export async function renderMarkdown(
  pipeline: ReplyPipeline,
  rawInput: unknown
): Promise<{ path: string }> {
  const input = RenderMarkdownInputSchema.parse(rawInput);
  const result = await pipeline.renderMarkdown(input.content, {
    scaleFactor: input.scale_factor,
    minWidth: input.min_width,
    fixedWidth: input.width,
  });

  if (!result.ok) {
    throw new McpError(
      `Render failed: ${result.failure.message}`,
      failureCode(result.failure),
      ErrorSeverity.ERROR,
      { reason: result.failure.reason }
    );
  }
  return { path: result.image.path };
}

/**
 * render_reply: a tagged reply to ordered text and image items
 */
export async function renderReply(
  pipeline: ReplyPipeline,
  rawInput: unknown
): Promise<{ items: OutputItem[] }> {
  const input = RenderReplyInputSchema.parse(rawInput);
  const items = await pipeline.renderReply(input.text, { sanitizeLiterals: input.sanitize });
  return { items };
}

/**
 * get_tag_instructions: the system prompt extended with the tag grammar
 */
export function getTagInstructions(
  pipeline: ReplyPipeline,
  rawInput: unknown
): { prompt: string } {
  const input = GetTagInstructionsInputSchema.parse(rawInput);
  return { prompt: pipeline.withInstructions(input.system_prompt ?? '') };
}
