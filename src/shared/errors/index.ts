/**
 * Error Handling
 *
 * Exports error types, codes, and utilities for structured error responses
 */

export * from './error-codes.js';
export * from './mcp-error.js';
export * from './render.error.js';
export * from './error-response.js';
export * from './extract-error-message.js';
