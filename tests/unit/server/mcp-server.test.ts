/**
 * MCP Server Tests
 */

import { describe, it, expect } from 'vitest';
import { executeWithLogging } from '../../../src/server/mcp-server.js';
import { McpError, ErrorCode, ErrorSeverity } from '../../../src/shared/errors/index.js';

describe('executeWithLogging', () => {
  it('should wrap a result in a success response', async () => {
    const response = await executeWithLogging('render_markdown', () => ({ path: '/cache/1.png' }));

    expect(response).toEqual({
      content: [{ type: 'text', text: '{\n  "path": "/cache/1.png"\n}' }],
      structuredContent: { path: '/cache/1.png' },
      isError: false,
    });
  });

  it('should convert a thrown error into an error response', async () => {
    const response = await executeWithLogging('render_markdown', () =>
      Promise.reject(
        new McpError('Render failed: Navigation timeout', ErrorCode.TIMEOUT, ErrorSeverity.ERROR, {
          reason: 'TIMEOUT',
        })
      )
    );

    expect(response.isError).toBe(true);
    expect(response.structuredContent).toMatchObject({
      error: 'Render failed: Navigation timeout',
      code: 'TIMEOUT',
      details: { reason: 'TIMEOUT' },
    });
  });

  it('should wrap unexpected errors', async () => {
    const response = await executeWithLogging('render_reply', () =>
      Promise.reject(new Error('unexpected'))
    );

    expect(response.structuredContent).toMatchObject({
      error: 'unexpected',
      code: 'UNKNOWN_ERROR',
    });
  });
});
