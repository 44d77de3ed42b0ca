/**
 * Server Types
 */

import type { ServerCapabilities } from '@modelcontextprotocol/sdk/types.js';

/**
 * MCP Server identity and capabilities
 */
export interface ServerConfig {
  name: string;
  version: string;
  capabilities: Pick<ServerCapabilities, 'tools' | 'logging'>;
}
