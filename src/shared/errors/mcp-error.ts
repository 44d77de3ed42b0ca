/**
 * MCP Error Types
 *
 * Structured error type for MCP tool responses.
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Base MCP Error class
 *
 * Extends Error with the metadata a structured tool response needs.
 */
export class McpError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'McpError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, McpError);
    }
  }

  /**
   * Convert to structured error object for MCP responses
   */
  toStructured(): {
    error: string;
    code: ErrorCode;
    severity: ErrorSeverity;
    details?: Record<string, unknown>;
    stack?: string;
  } {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }

  static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.ERROR
  ): McpError {
    return new McpError(error.message, code, severity, undefined, error);
  }
}
