/**
 * MCP server assembly
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { VaultWeaveConfig } from './core/write/config.js';
import { registerGraphTools } from './tools/read/graph.js';
import { registerSystemTools } from './tools/read/system.js';
import { registerVaultTools, type VaultToolOptions } from './tools/write/vault.js';

export const SERVER_NAME = 'vaultweave';
export const SERVER_VERSION = '0.1.0';

/**
 * Create a server with every tool registered. Tools read the config on
 * each call.
 */
export function createServer(config: VaultWeaveConfig, options: VaultToolOptions = {}): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerVaultTools(server, () => config, options);
  registerGraphTools(server, () => config);
  registerSystemTools(server);

  return server;
}
