/**
 * Error Codes
 *
 * Codes and severities carried by structured MCP error responses.
 */

export enum ErrorCode {
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',
  RENDER_FAILED = 'RENDER_FAILED',
  ENGINE_UNAVAILABLE = 'ENGINE_UNAVAILABLE',
  TIMEOUT = 'TIMEOUT',
}

export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
