/**
 * Core utilities for vault file operations
 */

import fs from 'fs/promises';
import path from 'path';
import matter from 'gray-matter';

/**
 * Result of path validation
 */
export interface PathValidationResult {
  valid: boolean;
  reason?: string;
}

/**
 * Ensure content ends with exactly one newline.
 */
export function normalizeTrailingNewline(content: string): string {
  return content.replace(/[\r\n\s]+$/, '') + '\n';
}

/**
 * Validate a vault-relative path: no absolute paths, no traversal.
 */
export function validatePath(vaultPath: string, notePath: string): PathValidationResult {
  if (notePath.startsWith('/') || notePath.startsWith('\\')) {
    return { valid: false, reason: 'Absolute paths not allowed' };
  }
  // Drive letters only mean something on Windows
  if (process.platform === 'win32' && /^[a-zA-Z]:/.test(notePath)) {
    return { valid: false, reason: 'Absolute paths not allowed' };
  }
  if (notePath.startsWith('..')) {
    return { valid: false, reason: 'Path traversal not allowed' };
  }

  const resolvedVault = path.resolve(vaultPath);
  const resolvedNote = path.resolve(vaultPath, notePath);

  const relative = path.relative(resolvedVault, resolvedNote);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return { valid: false, reason: 'Path escapes vault root' };
  }

  return { valid: true };
}

/**
 * Render a note file: YAML frontmatter followed by the markdown body.
 * The body goes in as a file object so gray-matter writes it verbatim
 * instead of parsing it for frontmatter of its own.
 */
export function renderVaultFile(content: string, frontmatter: Record<string, unknown>): string {
  return normalizeTrailingNewline(matter.stringify({ content }, frontmatter));
}

/**
 * Write a note to the vault, creating parent directories as needed.
 */
export async function writeVaultFile(
  vaultPath: string,
  notePath: string,
  content: string,
  frontmatter: Record<string, unknown>
): Promise<void> {
  const validation = validatePath(vaultPath, notePath);
  if (!validation.valid) {
    throw new Error(`Invalid path: ${validation.reason}`);
  }

  const fullPath = path.join(vaultPath, notePath);
  await fs.mkdir(path.dirname(fullPath), { recursive: true });
  await fs.writeFile(fullPath, renderVaultFile(content, frontmatter), 'utf-8');
}
