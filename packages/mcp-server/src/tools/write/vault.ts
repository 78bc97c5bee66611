/**
 * Vault generation tool
 * Tools: generate_vault
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { ProviderSchema, type ContentServices, type VaultWeaveConfig } from '../../core/write/config.js';
import { generateVault } from '../../core/write/generator.js';
import type { FetchLike } from '../../core/write/llm.js';
import { errorResult, jsonResult } from './results.js';

export interface VaultToolOptions {
  /** Fixed filler and namer instead of the configured provider */
  services?: ContentServices;
  fetch?: FetchLike;
  now?: () => Date;
}

/**
 * Register the generation tool with the MCP server
 */
export function registerVaultTools(
  server: McpServer,
  getConfig: () => VaultWeaveConfig,
  options: VaultToolOptions = {}
): void {
  // ========================================
  // Tool: generate_vault
  // ========================================
  server.tool(
    'generate_vault',
    'Generate a vault of interlinked markdown notes about a topic. Every link is reciprocal and every note has at least one link.\n\nExample: generate_vault({ mainTopic: "Machine Learning", noteCount: 20, connectionDensity: 0.3, randomSeed: 7 })',
    {
      mainTopic: z.string().describe('Subject of the vault (e.g., "Machine Learning")'),
      noteCount: z.number().int().optional().describe('Number of topic notes, at least 2 (default: 30). Hub notes are added on top.'),
      connectionDensity: z.number().optional().describe('Share of note pairs to link, between 0.0 and 1.0 (default: 0.4)'),
      randomSeed: z.union([z.number().int(), z.string()]).optional().describe('Seed for the link layout; the same seed gives the same graph'),
      vaultName: z.string().optional().describe('Directory name under the vault root (default: the topic with dashes)'),
      provider: ProviderSchema.optional().describe('Content provider; falls back to "template" when the API key is missing'),
      dryRun: z.boolean().optional().describe('If true, build and fill the vault without writing files'),
      hubCount: z.number().int().optional().describe('Override the number of hub notes (default: one per 10 notes)'),
      degreeCap: z.number().int().optional().describe('Override the maximum links per topic note'),
      floorNeighbors: z.number().int().optional().describe('Override how many following notes each note links to in the connectivity chain (default: 1)'),
    },
    async (args) => {
      try {
        const report = await generateVault(args, {
          config: getConfig(),
          services: options.services,
          fetch: options.fetch,
          now: options.now,
        });
        return jsonResult(report);
      } catch (err) {
        return errorResult(err);
      }
    }
  );
}
