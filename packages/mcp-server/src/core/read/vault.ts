/**
 * Vault scanner - finds all markdown notes in a generated vault
 */

import * as fs from 'fs';
import * as path from 'path';
import { serverLog } from '../shared/serverLog.js';

/** Directories to exclude from scanning */
const EXCLUDED_DIRS = new Set([
  '.obsidian',
  '.trash',
  '.git',
  'node_modules',
]);

/** File info returned by the scanner */
export interface VaultFile {
  path: string;        // Relative path from vault root
  absolutePath: string; // Full filesystem path
}

/**
 * Recursively scan a vault directory for markdown files.
 * Results are sorted by path so callers see a stable order.
 */
export async function scanVault(vaultPath: string): Promise<VaultFile[]> {
  const files: VaultFile[] = [];

  async function scan(dir: string, relativePath: string = ''): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      serverLog('vault', `Could not read directory ${dir}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relPath = relativePath ? path.join(relativePath, entry.name) : entry.name;

      if (entry.isDirectory()) {
        if (!EXCLUDED_DIRS.has(entry.name)) {
          await scan(fullPath, relPath);
        }
      } else if (entry.isFile() && entry.name.endsWith('.md')) {
        files.push({
          path: relPath.replace(/\\/g, '/'),
          absolutePath: fullPath,
        });
      }
    }
  }

  await scan(vaultPath);
  return files.sort((a, b) => a.path.localeCompare(b.path));
}
