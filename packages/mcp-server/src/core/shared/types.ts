/**
 * Shared types for vault generation
 */

/** Role a note plays in the vault. */
export type NoteKind = 'overview' | 'topic' | 'hub';

/** Rough category guessed from the title. */
export type NoteType = 'concept' | 'person' | 'event' | 'project';

/**
 * Frozen link graph. Titles are in generation order: topic titles first,
 * hub titles appended. Links are reciprocal, never self-referencing, and
 * only name titles present in `titles`.
 */
export interface LinkGraph {
  readonly titles: readonly string[];
  readonly hubs: ReadonlySet<string>;
  readonly links: ReadonlyMap<string, ReadonlySet<string>>;
  /** Degree cap the builder enforced on topic notes */
  readonly degreeCap: number;
}

/** A note ready to be written to the vault. */
export interface NoteRecord {
  title: string;
  kind: NoteKind;
  noteType: NoteType;
  tags: string[];
  /** Linked titles, in generation order */
  links: string[];
  body: string;
}

/** Summary returned after a generation run. */
export interface VaultReport {
  success: true;
  vaultName: string;
  vaultPath: string;
  mainTopic: string;
  provider: string;
  dryRun: boolean;
  notes: number;
  hubs: number;
  edges: number;
  /** Notes written with the provider's own text */
  generated: number;
  /** Notes the provider left to the template (hubs under an LLM provider) */
  templated: number;
  fallback: number;
  fallbackTitles: string[];
  indexPath: string;
  seed: number;
  durationMs: number;
}
