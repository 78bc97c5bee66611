/**
 * Vault reader - rebuilds the link graph from the files on disk
 *
 * Used to check a written vault: every [[wikilink]] must name an existing
 * note, appear once, and be mirrored by a link back.
 */

import * as fs from 'fs';
import { VaultNotFoundError } from '../shared/errors.js';
import type { LinkGraph } from '../shared/types.js';
import { serverLog } from '../shared/serverLog.js';
import { checkLinkGraph, graphStats } from '../write/graphBuilder.js';
import { INDEX_NOTE_PATH } from '../write/vaultWriter.js';
import { parseNoteWithWarnings } from './parser.js';
import type { VaultInspection, VaultNote } from './types.js';
import { scanVault, type VaultFile } from './vault.js';

/** Default timeout for reading a vault (1 minute) */
const DEFAULT_TIMEOUT_MS = 60 * 1000;

/** Concurrency limit for parallel file parsing */
const PARSE_CONCURRENCY = 50;

export interface LoadedVault {
  graph: LinkGraph;
  notes: Map<string, VaultNote>;
  /** Notes whose body links the same target more than once */
  repeatedLinks: string[];
  skipped: string[];
  /** Partial parse failures, as "<path>: <warning>" */
  warnings: string[];
}

export interface LoadOptions {
  timeoutMs?: number;
}

function orderOf(note: VaultNote): number {
  const order = note.frontmatter.order;
  return typeof order === 'number' && Number.isFinite(order) ? order : Number.MAX_SAFE_INTEGER;
}

/**
 * Read every note in the vault and rebuild its link graph.
 * The index document is navigation, not a note, and is left out.
 */
export async function loadVaultGraph(
  vaultPath: string,
  options: LoadOptions = {}
): Promise<LoadedVault> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`Vault read timed out after ${timeoutMs / 1000}s`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([loadVaultGraphInternal(vaultPath), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

async function loadVaultGraphInternal(vaultPath: string): Promise<LoadedVault> {
  const scanned = await scanVault(vaultPath);
  const files = scanned.filter(file => file.path !== INDEX_NOTE_PATH);

  const notes = new Map<string, VaultNote>();
  const skipped: string[] = [];
  const warnings: string[] = [];

  for (let i = 0; i < files.length; i += PARSE_CONCURRENCY) {
    const batch = files.slice(i, i + PARSE_CONCURRENCY);
    const results = await Promise.all(batch.map(file => parseNoteWithWarnings(file)));

    for (const result of results) {
      if (result.skipped) {
        serverLog('vault', `Skipped ${result.note.path}: ${result.skipReason ?? 'unknown reason'}`, 'warn');
        skipped.push(result.note.path);
        continue;
      }
      for (const warning of result.warnings) {
        warnings.push(`${result.note.path}: ${warning}`);
      }
      notes.set(result.note.title, result.note);
    }
  }

  const ordered = [...notes.values()].sort((a, b) => orderOf(a) - orderOf(b) || a.path.localeCompare(b.path));
  const titles = ordered.map(note => note.title);
  const hubs = new Set(ordered.filter(note => note.frontmatter.hub === true).map(note => note.title));

  const links = new Map<string, ReadonlySet<string>>();
  const repeatedLinks: string[] = [];
  for (const note of ordered) {
    const targets = note.outlinks.map(link => link.target);
    const unique = new Set(targets);
    if (unique.size !== targets.length) {
      repeatedLinks.push(note.title);
    }
    links.set(note.title, unique);
  }

  const indexNote = await readIndexFrontmatter(scanned.find(file => file.path === INDEX_NOTE_PATH));
  const cap = indexNote?.degree_cap;

  return {
    graph: {
      titles,
      hubs,
      links,
      degreeCap: typeof cap === 'number' ? cap : Number.POSITIVE_INFINITY,
    },
    notes,
    repeatedLinks,
    skipped,
    warnings,
  };
}

async function readIndexFrontmatter(indexFile: VaultFile | undefined): Promise<Record<string, unknown> | null> {
  if (!indexFile) return null;

  const result = await parseNoteWithWarnings(indexFile);
  return result.skipped ? null : result.note.frontmatter;
}

/**
 * Check a vault on disk against the link graph invariants.
 * @throws VaultNotFoundError if the directory does not exist
 */
export async function inspectVault(vaultPath: string, options: LoadOptions = {}): Promise<VaultInspection> {
  const stats = await fs.promises.stat(vaultPath).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new VaultNotFoundError(vaultPath);
  }

  const loaded = await loadVaultGraph(vaultPath, options);
  const { graph } = loaded;

  const violations = checkLinkGraph(graph);
  const descriptions = violations
    .filter(v => v.kind !== 'orphan')
    .map(v => (v.other ? `${v.kind}: ${v.title} -> ${v.other}` : `${v.kind}: ${v.title}`));
  for (const title of loaded.repeatedLinks) {
    descriptions.push(`repeated-link: ${title}`);
  }

  const counts = graphStats(graph);
  const inspection: VaultInspection = {
    vaultPath,
    notes: counts.notes,
    hubs: [...graph.hubs],
    edges: counts.edges,
    orphans: violations.filter(v => v.kind === 'orphan').map(v => v.title),
    violations: descriptions,
    skipped: loaded.skipped,
    warnings: loaded.warnings,
  };

  serverLog(
    'vault',
    `Inspected ${vaultPath}: ${inspection.notes} notes, ${inspection.edges} edges, ${inspection.violations.length} violations`
  );
  return inspection;
}
