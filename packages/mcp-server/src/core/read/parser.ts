/**
 * Markdown parser - extracts wikilinks and frontmatter
 *
 * Handles edge cases:
 * - Malformed YAML frontmatter (falls back to treating it as content)
 * - Empty files
 * - Files with only frontmatter
 * - Very large files
 */

import * as fs from 'fs';
import matter from 'gray-matter';
import type { OutLink, VaultNote } from './types.js';
import type { VaultFile } from './vault.js';

/** Maximum file size to parse (10MB) - skip larger files */
const MAX_FILE_SIZE = 10 * 1024 * 1024;

/** Regex to match wikilinks: [[target]], [[target|alias]], [[target#heading]] */
const WIKILINK_REGEX = /\[\[([^\]|#]+)(?:#[^\]|]*)?(?:\|([^\]]+))?\]\]/g;

/** Regex to detect code blocks (to skip parsing inside them) */
const CODE_BLOCK_REGEX = /```[\s\S]*?```|`[^`\n]+`/g;

/**
 * Extract wikilinks from markdown content, skipping code
 */
export function extractWikilinks(content: string): OutLink[] {
  const links: OutLink[] = [];

  // Blank out code so line numbers still line up
  const contentWithoutCode = content.replace(CODE_BLOCK_REGEX, (match) => match.replace(/[^\n]/g, ' '));
  const lines = contentWithoutCode.split('\n');

  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    WIKILINK_REGEX.lastIndex = 0;

    let match: RegExpExecArray | null;
    while ((match = WIKILINK_REGEX.exec(lines[lineNum])) !== null) {
      const target = match[1].trim();
      const alias = match[2]?.trim();

      if (target) {
        links.push({ target, alias, line: lineNum + 1 });
      }
    }
  }

  return links;
}

/** Result of parsing a note - includes warnings for partial failures */
export interface ParseResult {
  note: VaultNote;
  warnings: string[];
  skipped: boolean;
  skipReason?: string;
}

/** Parsed pieces of a note's raw text */
export interface ParsedContent {
  frontmatter: Record<string, unknown>;
  markdown: string;
  outlinks: OutLink[];
  warnings: string[];
}

/**
 * Split raw note text into frontmatter, body and links
 */
export function parseNoteContent(content: string): ParsedContent {
  const warnings: string[] = [];
  let frontmatter: Record<string, unknown> = {};
  let markdown = content;

  try {
    const parsed = matter(content);
    frontmatter = parsed.data;
    markdown = parsed.content;
  } catch (err) {
    warnings.push(`Malformed frontmatter: ${err instanceof Error ? err.message : String(err)}`);
  }

  return {
    frontmatter,
    markdown,
    outlinks: extractWikilinks(markdown),
    warnings,
  };
}

/** Note title from a vault-relative path */
export function titleFromPath(notePath: string): string {
  return notePath.replace(/\.md$/, '').split('/').pop() || notePath;
}

/**
 * Parse a markdown file with detailed result including warnings
 */
export async function parseNoteWithWarnings(file: VaultFile): Promise<ParseResult> {
  const empty: VaultNote = {
    path: file.path,
    title: titleFromPath(file.path),
    frontmatter: {},
    outlinks: [],
  };

  try {
    const stats = await fs.promises.stat(file.absolutePath);
    if (stats.size > MAX_FILE_SIZE) {
      return {
        note: empty,
        warnings: [],
        skipped: true,
        skipReason: `File too large (${(stats.size / 1024 / 1024).toFixed(1)}MB > ${MAX_FILE_SIZE / 1024 / 1024}MB limit)`,
      };
    }
  } catch {
    // Unstattable files still get a read attempt below
  }

  let content: string;
  try {
    content = await fs.promises.readFile(file.absolutePath, 'utf-8');
  } catch (err) {
    return {
      note: empty,
      warnings: [],
      skipped: true,
      skipReason: `Could not read file: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  if (content.trim().length === 0) {
    return { note: empty, warnings: ['Empty file'], skipped: false };
  }

  const parsed = parseNoteContent(content);
  return {
    note: {
      ...empty,
      frontmatter: parsed.frontmatter,
      outlinks: parsed.outlinks,
    },
    warnings: parsed.warnings,
    skipped: false,
  };
}
