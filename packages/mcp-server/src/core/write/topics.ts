/**
 * Topic expansion: main topic + count → ordered, unique note titles
 *
 * The first title is always the overview note. Titles double as filenames
 * and wikilink targets, so every title passes through toNoteTitle() and
 * uniquifyTitles() before the graph sees it.
 */

import { InsufficientTopicsError } from '../shared/errors.js';
import { serverLog } from '../shared/serverLog.js';
import type { NoteType } from '../shared/types.js';

/** Characters that break a filename or a [[wikilink]] */
const INVALID_TITLE_CHARS = /[<>:"/\\|?*#^[\]\x00-\x1f]/g;

export const MAX_TITLE_LENGTH = 100;

/** Names taken by files that are not notes (the index document) */
export const RESERVED_TITLES: readonly string[] = ['README'];

/** Suffixes for the first block of sub-topics: "<topic> <suffix>" */
const BASE_SUFFIXES = [
  'Fundamentals',
  'Applications',
  'History',
  'Best Practices',
  'Advanced Concepts',
  'Examples',
  'Resources',
];

/** Extensions cycled after the base block: "<topic> - <extension>" */
const EXTENSIONS = [
  'Key Concepts',
  'Important Principles',
  'Common Patterns',
  'Use Cases',
  'Related Technologies',
  'Future Trends',
  'Getting Started',
  'Deep Dive',
  'Quick Reference',
  'Troubleshooting',
];

/** Words that mark a title as a note about a person, event or project */
const NOTE_TYPE_WORDS: Array<[NoteType, string[]]> = [
  ['person', ['person', 'author', 'scientist']],
  ['event', ['event', 'meeting', 'conference']],
  ['project', ['project', 'case study']],
];

/**
 * External generator for sub-topic names (usually an LLM).
 * Its output is untrusted: names are sanitised and de-duplicated here.
 */
export interface TopicNamer {
  readonly name: string;
  suggest(mainTopic: string, count: number): Promise<string[]>;
}

/**
 * Cut to at most `max` UTF-16 units on a code point boundary. A lone
 * surrogate cannot be stored in a filename.
 */
function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  let cut = '';
  for (const char of text) {
    if (cut.length + char.length > max) break;
    cut += char;
  }
  return cut;
}

/**
 * Turn an arbitrary name into a valid note title.
 * Idempotent: toNoteTitle(toNoteTitle(x)) === toNoteTitle(x).
 */
export function toNoteTitle(raw: string): string {
  let title = raw
    .replace(/\s+/g, ' ')
    .replace(INVALID_TITLE_CHARS, '_')
    .replace(/^[.\s]+|[.\s]+$/g, '');

  if (title.length > MAX_TITLE_LENGTH) {
    title = truncate(title, MAX_TITLE_LENGTH).replace(/[.\s]+$/, '');
  }

  return title;
}

/**
 * Sanitise titles and rename case-insensitive duplicates (and reserved
 * names) to "<title> (n)". Order is preserved; titles that sanitise to
 * nothing are dropped.
 */
export function uniquifyTitles(rawTitles: readonly string[]): string[] {
  const taken = new Set(RESERVED_TITLES.map(title => title.toLowerCase()));
  const result: string[] = [];

  for (const raw of rawTitles) {
    const title = toNoteTitle(raw);
    if (!title) continue;

    let candidate = title;
    for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
      const suffix = ` (${n})`;
      const base = truncate(title, MAX_TITLE_LENGTH - suffix.length).replace(/[.\s]+$/, '');
      candidate = `${base}${suffix}`;
    }

    taken.add(candidate.toLowerCase());
    result.push(candidate);
  }

  return result;
}

/** Title of the overview note that heads every vault */
export function overviewTitle(mainTopic: string): string {
  return toNoteTitle(`${mainTopic.trim()} Overview`);
}

export function slugify(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/(^-|-$)/g, '');
}

/**
 * Guess the note type from words in the title.
 */
export function noteTypeFor(title: string): NoteType {
  const lower = title.toLowerCase();
  for (const [type, words] of NOTE_TYPE_WORDS) {
    if (words.some(word => lower.includes(word))) {
      return type;
    }
  }
  return 'concept';
}

/**
 * Template candidates, before de-duplication. The extension list cycles,
 * so long runs repeat names that uniquifyTitles() later renames.
 */
function templateCandidates(mainTopic: string, count: number): string[] {
  const topic = mainTopic.trim();
  const candidates = [
    overviewTitle(topic),
    ...BASE_SUFFIXES.map(suffix => `${topic} ${suffix}`),
  ].slice(0, count);

  for (let i = 0; candidates.length < count; i++) {
    candidates.push(`${topic} - ${EXTENSIONS[i % EXTENSIONS.length]}`);
  }

  return candidates;
}

function assertEnough(mainTopic: string, titles: string[]): string[] {
  if (titles.length < 2) {
    throw new InsufficientTopicsError(mainTopic, titles.length);
  }
  return titles;
}

/**
 * Expand a topic into at most `count` unique titles from the fixed vocabulary.
 * @throws InsufficientTopicsError when fewer than 2 titles result
 */
export function expandTopics(mainTopic: string, count: number): string[] {
  if (!toNoteTitle(mainTopic)) {
    throw new InsufficientTopicsError(mainTopic, 0);
  }
  if (!Number.isFinite(count) || count < 2) {
    throw new InsufficientTopicsError(mainTopic, count >= 1 ? 1 : 0);
  }

  const titles = uniquifyTitles(templateCandidates(mainTopic, Math.trunc(count))).slice(0, count);
  serverLog('topics', `Expanded "${mainTopic}" into ${titles.length} titles from template`);
  return assertEnough(mainTopic, titles);
}

/**
 * Expand a topic using an external namer. The overview title stays first;
 * short answers are topped up from the template, and a failing namer falls
 * back to the template entirely.
 */
export async function expandTopicsWith(
  mainTopic: string,
  count: number,
  namer: TopicNamer
): Promise<string[]> {
  const fallback = expandTopics(mainTopic, count);

  let suggested: string[];
  try {
    suggested = await namer.suggest(mainTopic.trim(), count - 1);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    serverLog('topics', `${namer.name} topic naming failed, using template: ${reason}`, 'warn');
    return fallback;
  }

  const overview = fallback[0];
  const mainLower = mainTopic.trim().toLowerCase();
  const named = suggested.filter(name => name.trim().toLowerCase() !== mainLower);

  const titles = uniquifyTitles([overview, ...named]).slice(0, count);
  const namedCount = titles.length - 1;
  const taken = new Set(titles.map(title => title.toLowerCase()));
  for (const title of fallback.slice(1)) {
    if (titles.length >= count) break;
    if (taken.has(title.toLowerCase())) continue;
    taken.add(title.toLowerCase());
    titles.push(title);
  }

  serverLog('topics', `${namer.name} named ${namedCount} of ${count - 1} sub-topics for "${mainTopic}"`);
  return assertEnough(mainTopic, titles);
}
