/**
 * Error Response Utilities
 *
 * Builds structured success and error responses for MCP tools.
 */

import { ZodError } from 'zod';
import { ErrorCode, ErrorSeverity } from './error-codes.js';
import { McpError } from './mcp-error.js';

/**
 * MCP Tool Response type
 */
export interface McpToolResponse {
  [x: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

/**
 * Normalize any thrown value into an McpError.
 */
export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }
  if (error instanceof ZodError) {
    return new McpError(
      'Invalid input',
      ErrorCode.INVALID_INPUT,
      ErrorSeverity.WARNING,
      { issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
      error
    );
  }
  if (error instanceof Error) {
    return McpError.fromError(error);
  }
  return new McpError(String(error), ErrorCode.UNKNOWN_ERROR);
}

/**
 * Create a structured error response for MCP tools
 *
 * @param error - Error to convert to structured response
 * @param includeStack - Whether to include stack trace (default: process.env.NODE_ENV !== 'production')
 */
export function createErrorResponse(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production'
): McpToolResponse {
  const structured = toMcpError(error).toStructured();

  if (!includeStack) {
    delete structured.stack;
  }

  const textParts: string[] = [
    `Error: ${structured.error}`,
    `Code: ${structured.code}`,
    `Severity: ${structured.severity}`,
  ];

  if (structured.details && Object.keys(structured.details).length > 0) {
    textParts.push(`Details: ${JSON.stringify(structured.details, null, 2)}`);
  }

  if (includeStack && structured.stack) {
    textParts.push(`\nStack trace:\n${structured.stack}`);
  }

  return {
    content: [{ type: 'text', text: textParts.join('\n') }],
    structuredContent: structured,
    isError: true,
  };
}

/**
 * Create a success response with structured output
 */
export function createSuccessResponse(output: Record<string, unknown>): McpToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    structuredContent: output,
    isError: false,
  };
}
