/**
 * Wikilink rendering
 *
 * A link to the note titled T is written as [[T]], with T verbatim. The
 * only place generated bodies carry links is the Related Topics section,
 * which holds exactly one marker per graph edge.
 */

import { extractWikilinks } from '../read/parser.js';

export const RELATED_HEADING = '## Related Topics';

/** Matches [[target]], [[target|alias]] and [[target#heading]] */
const WIKILINK_PATTERN = /\[\[([^\]|#]+)(?:#[^\]|]*)?(?:\|([^\]]+))?\]\]/g;

export function formatWikilink(title: string): string {
  return `[[${title}]]`;
}

/**
 * The canonical Related Topics section for a note's links.
 */
export function relatedSection(links: readonly string[]): string {
  const lines = links.length > 0
    ? links.map(link => `- ${formatWikilink(link)}`)
    : ['_No related notes._'];
  return [RELATED_HEADING, '', ...lines].join('\n');
}

/**
 * Replace every wikilink with its display text.
 */
export function stripWikilinks(text: string): string {
  return text.replace(WIKILINK_PATTERN, (_match, target: string, alias: string | undefined) =>
    (alias ?? target).trim()
  );
}

/**
 * Remove a Related Topics section (up to the next heading of the same or
 * higher level) from generated text.
 */
export function removeRelatedSection(text: string): string {
  const lines = text.split('\n');
  const start = lines.findIndex(line => line.trim().toLowerCase() === RELATED_HEADING.toLowerCase());
  if (start === -1) return text;

  let end = start + 1;
  while (end < lines.length && !/^#{1,2}\s/.test(lines[end])) {
    end++;
  }

  return [...lines.slice(0, start), ...lines.slice(end)].join('\n');
}

/**
 * Compare the links a body carries with the links it should carry.
 * Returns a reason string on mismatch, null when they agree exactly.
 */
export function linkMismatch(body: string, expected: readonly string[]): string | null {
  const found = extractWikilinks(body).map(link => link.target);
  const foundSet = new Set(found);

  if (foundSet.size !== found.length) {
    return 'body repeats a wikilink';
  }

  const missing = expected.filter(title => !foundSet.has(title));
  if (missing.length > 0) {
    return `body is missing links to ${missing.join(', ')}`;
  }

  const expectedSet = new Set(expected);
  const extra = found.filter(title => !expectedSet.has(title));
  if (extra.length > 0) {
    return `body links to notes outside the graph edge set: ${extra.join(', ')}`;
  }

  return null;
}
