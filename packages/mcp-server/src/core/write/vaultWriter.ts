/**
 * Vault persistence
 *
 * One file per note at the vault root, named exactly "<title>.md", so the
 * wikilink target and the stored identity agree character for character.
 * finalize() writes the index document that lists every note.
 */

import type { NoteRecord } from '../shared/types.js';
import { serverLog } from '../shared/serverLog.js';
import { formatWikilink } from './wikilinks.js';
import { renderVaultFile, validatePath, writeVaultFile } from './writer.js';

/** Vault-relative path of the index document */
export const INDEX_NOTE_PATH = 'README.md';

export interface VaultWriter {
  /** Persist one note; returns its vault-relative location */
  write(note: NoteRecord, order: number): Promise<string>;
  /** Write the index document listing every title; returns its location */
  finalize(titles: readonly string[], summary: IndexSummary): Promise<string>;
}

/** Facts recorded in the index document */
export interface IndexSummary {
  mainTopic: string;
  density: number;
  seed: number;
  degreeCap: number;
  hubs: readonly string[];
  edges: number;
  createdAt: Date;
}

/** Vault-relative filename for a note title */
export function notePathFor(title: string): string {
  return `${title}.md`;
}

export function noteFrontmatter(note: NoteRecord, order: number, createdAt: Date): Record<string, unknown> {
  return {
    tags: note.tags,
    kind: note.kind,
    type: note.noteType,
    hub: note.kind === 'hub',
    order,
    links: note.links.length,
    created: createdAt.toISOString(),
  };
}

function formatDate(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Markdown and frontmatter of the index document.
 */
export function renderIndex(
  titles: readonly string[],
  summary: IndexSummary
): { content: string; frontmatter: Record<string, unknown> } {
  const sorted = [...titles].sort((a, b) => a.localeCompare(b));

  const lines = [
    `# ${summary.mainTopic} - Knowledge Vault`,
    '',
    `**Created:** ${formatDate(summary.createdAt)}`,
    '',
    '## Overview',
    '',
    `This vault contains interconnected notes about **${summary.mainTopic}**. Open the graph view to explore the connections between them.`,
    '',
    '## All Notes',
    '',
    ...sorted.map(title => `- ${formatWikilink(title)}`),
    '',
    '## Statistics',
    '',
    `- **Total Notes:** ${titles.length}`,
    `- **Hub Notes:** ${summary.hubs.length}`,
    `- **Links:** ${summary.edges}`,
    `- **Connection Density:** ${summary.density}`,
  ];

  return {
    content: lines.join('\n'),
    frontmatter: {
      topic: summary.mainTopic,
      density: summary.density,
      seed: summary.seed,
      degree_cap: summary.degreeCap,
      notes: titles.length,
      edges: summary.edges,
      created: summary.createdAt.toISOString(),
    },
  };
}

/**
 * Writes notes as markdown files under a vault directory.
 */
export class FileVaultWriter implements VaultWriter {
  constructor(readonly vaultPath: string, private readonly createdAt: Date = new Date()) {}

  async write(note: NoteRecord, order: number): Promise<string> {
    const notePath = notePathFor(note.title);
    await writeVaultFile(this.vaultPath, notePath, note.body, noteFrontmatter(note, order, this.createdAt));
    return notePath;
  }

  async finalize(titles: readonly string[], summary: IndexSummary): Promise<string> {
    const { content, frontmatter } = renderIndex(titles, summary);
    await writeVaultFile(this.vaultPath, INDEX_NOTE_PATH, content, frontmatter);
    serverLog('vault', `Wrote index for ${titles.length} notes to ${this.vaultPath}`);
    return INDEX_NOTE_PATH;
  }
}

/**
 * Keeps rendered files in memory. Used for dry runs and tests.
 */
export class MemoryVaultWriter implements VaultWriter {
  readonly files = new Map<string, string>();

  constructor(readonly vaultPath: string = 'memory', private readonly createdAt: Date = new Date()) {}

  async write(note: NoteRecord, order: number): Promise<string> {
    const notePath = notePathFor(note.title);
    this.store(notePath, renderVaultFile(note.body, noteFrontmatter(note, order, this.createdAt)));
    return notePath;
  }

  async finalize(titles: readonly string[], summary: IndexSummary): Promise<string> {
    const { content, frontmatter } = renderIndex(titles, summary);
    this.store(INDEX_NOTE_PATH, renderVaultFile(content, frontmatter));
    return INDEX_NOTE_PATH;
  }

  private store(notePath: string, rendered: string): void {
    const validation = validatePath('/', notePath);
    if (!validation.valid) {
      throw new Error(`Invalid path: ${validation.reason}`);
    }
    if (this.files.has(notePath)) {
      throw new Error(`File written twice: ${notePath}`);
    }
    this.files.set(notePath, rendered);
  }
}
