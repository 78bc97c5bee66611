/**
 * Diagnostics tool
 * Tools: server_log
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { getServerLog } from '../../core/shared/serverLog.js';
import { jsonResult } from '../write/results.js';

export function registerSystemTools(server: McpServer): void {
  server.tool(
    'server_log',
    'Recent server activity: topic expansion, graph builds, content fallbacks and writes. Use it to see why notes fell back to the template.',
    {
      component: z.enum(['server', 'config', 'topics', 'graph', 'content', 'vault']).optional().describe('Only entries from this component'),
      level: z.enum(['info', 'warn', 'error']).optional().describe('Only entries at this level'),
      since: z.number().optional().describe('Only entries after this timestamp (ms since epoch)'),
      limit: z.number().int().min(1).max(200).default(50).describe('Maximum entries to return (default: 50)'),
    },
    async ({ component, level, since, limit }) => jsonResult(getServerLog({ component, level, since, limit }))
  );
}
