#!/usr/bin/env node
/**
 * VaultWeave - generates interlinked markdown vaults over MCP
 *
 * Tools:
 * - generate_vault: topic → notes, reciprocal links, index document
 * - inspect_vault: re-read a vault and check its link invariants
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './core/write/config.js';
import { serverLog } from './core/shared/serverLog.js';
import { createServer } from './server.js';

async function main() {
  serverLog('server', 'Starting VaultWeave server...');

  const config = loadConfig();
  const server = createServer(config);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  serverLog('server', `MCP server connected (vault root ${config.vaultRoot})`);
}

main().catch((error) => {
  serverLog('server', `Fatal error: ${error instanceof Error ? error.message : String(error)}`, 'error');
  process.exit(1);
});
