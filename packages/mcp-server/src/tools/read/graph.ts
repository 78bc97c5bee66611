/**
 * Vault inspection tool
 * Tools: inspect_vault
 */

import path from 'path';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { inspectVault } from '../../core/read/graph.js';
import { InvalidConfigError } from '../../core/shared/errors.js';
import type { VaultWeaveConfig } from '../../core/write/config.js';
import { validatePath } from '../../core/write/writer.js';
import { errorResult, jsonResult } from '../write/results.js';

export function registerGraphTools(server: McpServer, getConfig: () => VaultWeaveConfig): void {
  server.tool(
    'inspect_vault',
    'Read a generated vault back from disk and check its links: every link must be reciprocal, name an existing note and appear once, and no note may be an orphan.',
    {
      vaultName: z.string().describe('Directory name under the vault root'),
    },
    async ({ vaultName }) => {
      try {
        const { vaultRoot } = getConfig();
        const check = validatePath(vaultRoot, vaultName);
        if (!check.valid) {
          throw new InvalidConfigError([`vaultName: ${check.reason ?? 'invalid'}`]);
        }
        const inspection = await inspectVault(path.join(vaultRoot, vaultName));
        return jsonResult({ success: true, ...inspection });
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
