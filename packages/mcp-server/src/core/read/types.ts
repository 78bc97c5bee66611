/**
 * Types for reading a generated vault back from disk
 */

/** A wikilink extracted from a note */
export interface OutLink {
  target: string;      // Note title (without .md)
  alias?: string;      // Display text from [[target|alias]]
  line: number;        // 1-indexed line number
}

/** A parsed note from the vault */
export interface VaultNote {
  path: string;                           // Relative to vault root, with .md
  title: string;                          // Filename without .md
  frontmatter: Record<string, unknown>;   // All frontmatter data
  outlinks: OutLink[];                    // [[wikilinks]] this note contains
}

/** Outcome of checking a vault on disk */
export interface VaultInspection {
  vaultPath: string;
  notes: number;
  hubs: string[];
  edges: number;
  orphans: string[];
  /** Human-readable descriptions of broken invariants */
  violations: string[];
  /** Files that could not be parsed */
  skipped: string[];
  /** Partial parse failures, as "<path>: <warning>" */
  warnings: string[];
}
