/**
 * Note content generation
 *
 * A ContentFiller turns a note title and its final link list into a
 * markdown body. Fillers run only after the link graph is frozen, once per
 * note. Any failure falls back to the template body for that note alone.
 */

import { ContentGenerationError } from '../shared/errors.js';
import { serverLog } from '../shared/serverLog.js';
import type { LinkGraph, NoteKind, NoteRecord, NoteType } from '../shared/types.js';
import { linksOf } from './graphBuilder.js';
import type { ChatClient } from './llm.js';
import { parseTopicList } from './llm.js';
import { noteTypeFor, slugify, type TopicNamer } from './topics.js';
import { linkMismatch, relatedSection, removeRelatedSection, stripWikilinks } from './wikilinks.js';

/** Default number of notes filled at the same time */
export const DEFAULT_FILL_CONCURRENCY = 4;

export interface FillRequest {
  title: string;
  /** Final linked titles, in generation order */
  links: readonly string[];
  isHub: boolean;
  kind: NoteKind;
  noteType: NoteType;
  mainTopic: string;
}

export interface ContentFiller {
  readonly name: string;
  fill(request: FillRequest): Promise<string>;
  /** Requests this filler answers with the template body rather than its own text */
  usesTemplate?(request: FillRequest): boolean;
}

// ---------------------------------------------------------------------------
// Template filler
// ---------------------------------------------------------------------------

function overviewParagraph(request: FillRequest): string {
  switch (request.kind) {
    case 'overview':
      return `This note is the entry point for **${request.mainTopic}**. Follow the links below to explore its sub-topics.`;
    case 'hub':
      return `This hub gathers closely related notes about ${request.mainTopic}. Start here to move across the vault.`;
    default:
      return `This note covers ${request.title} as a ${request.noteType}.`;
  }
}

/**
 * Deterministic body: title, overview, key points, details, links.
 */
export function renderTemplate(request: FillRequest): string {
  const sections = [`# ${request.title}`, '', '## Overview', '', overviewParagraph(request), ''];

  if (request.kind !== 'hub') {
    sections.push(
      '## Key Points',
      '',
      '- Add your key insights here',
      `- Important information about ${request.title}`,
      '- Connections to other concepts',
      '',
      '## Details',
      '',
      'Expand on the topic here with relevant information and context.',
      ''
    );
  }

  sections.push(relatedSection(request.links));
  return sections.join('\n') + '\n';
}

export class TemplateFiller implements ContentFiller {
  readonly name = 'template';

  async fill(request: FillRequest): Promise<string> {
    return renderTemplate(request);
  }
}

// ---------------------------------------------------------------------------
// LLM filler
// ---------------------------------------------------------------------------

const NOTE_SYSTEM = 'You are a knowledge management expert writing interconnected notes for a markdown knowledge vault.';

const TOPICS_SYSTEM = 'You are a knowledge base architect. Return only valid JSON arrays.';

function buildNotePrompt(request: FillRequest): string {
  const related = request.links.join(', ');
  return `Write a markdown note about "${request.title}" for a knowledge vault on ${request.mainTopic}.

Note type: ${request.noteType}
Related notes: ${related || 'none'}

Include:
1. A clear introduction explaining the topic
2. Key concepts and definitions
3. Important details and context
4. Examples or applications if relevant

Mention the related notes in prose where it helps, as plain text.
Do not write wikilinks and do not add a "Related Topics" section; it is added separately.
Start with "# ${request.title}".`;
}

const FENCE_LINE = /^---[ \t]*\r?$/m;

/**
 * Drop a leading "---" block from model text. Note files carry their own
 * frontmatter, so a body must never open with a fence. An unclosed
 * opening fence is dropped on its own.
 */
export function stripLeadingFrontmatter(text: string): string {
  const opening = /^\s*---[ \t]*\r?\n/.exec(text);
  if (!opening) return text;

  const rest = text.slice(opening[0].length);
  const closing = FENCE_LINE.exec(rest);
  return closing ? rest.slice(closing.index + closing[0].length) : rest;
}

/**
 * Body text from a chat model. Hubs keep the template body, since a hub
 * is a list of links rather than prose.
 */
export class LlmFiller implements ContentFiller {
  readonly name: string;

  constructor(private readonly client: ChatClient, private readonly maxTokens = 1000) {
    this.name = `${client.provider}:${client.model}`;
  }

  usesTemplate(request: FillRequest): boolean {
    return request.isHub;
  }

  async fill(request: FillRequest): Promise<string> {
    if (this.usesTemplate(request)) {
      return renderTemplate(request);
    }

    const reply = await this.client.complete({
      system: NOTE_SYSTEM,
      prompt: buildNotePrompt(request),
      maxTokens: this.maxTokens,
    });

    const prose = removeRelatedSection(stripWikilinks(stripLeadingFrontmatter(reply))).trim();
    if (!prose) {
      throw new Error('Model returned an empty note');
    }

    return `${prose}\n\n${relatedSection(request.links)}\n`;
  }
}

/**
 * Sub-topic names from a chat model.
 */
export class LlmTopicNamer implements TopicNamer {
  readonly name: string;

  constructor(private readonly client: ChatClient) {
    this.name = `${client.provider}:${client.model}`;
  }

  async suggest(mainTopic: string, count: number): Promise<string[]> {
    const reply = await this.client.complete({
      system: TOPICS_SYSTEM,
      prompt: `Generate ${count} interconnected topics related to "${mainTopic}" for a knowledge base.

Return a JSON array of topic names (strings only, no other text).
Topics should be diverse, naturally interconnected, clear and specific.

Example format: ["Topic 1", "Topic 2", "Topic 3"]`,
      maxTokens: 500,
      temperature: 0.8,
    });
    return parseTopicList(reply);
  }
}

// ---------------------------------------------------------------------------
// Filling a frozen graph
// ---------------------------------------------------------------------------

export interface FillOptions {
  mainTopic: string;
  concurrency?: number;
  /** Per-note time limit; slower fills fall back to the template */
  timeoutMs?: number;
}

export interface FillResult {
  /** One record per graph title, in generation order */
  notes: NoteRecord[];
  /** Notes whose body is the filler's own text */
  generated: number;
  /** Notes the filler chose to answer with the template body */
  templateTitles: string[];
  /** Notes whose fill failed and fell back to the template */
  fallbackTitles: string[];
}

type FillSource = 'filler' | 'template' | 'fallback';

/**
 * The fill request for one note of the graph. The first topic title is
 * the overview note.
 */
export function fillRequestFor(graph: LinkGraph, title: string, mainTopic: string): FillRequest {
  const isHub = graph.hubs.has(title);
  const kind: NoteKind = isHub ? 'hub' : title === graph.titles[0] ? 'overview' : 'topic';
  return {
    title,
    links: linksOf(graph, title),
    isHub,
    kind,
    noteType: noteTypeFor(title),
    mainTopic,
  };
}

export function tagsFor(request: FillRequest): string[] {
  const topicTag = slugify(request.mainTopic) || 'vault';
  return [topicTag, request.kind === 'topic' ? request.noteType : request.kind];
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number | undefined, title: string): Promise<T> {
  if (!timeoutMs) return work;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timed out after ${timeoutMs}ms for "${title}"`)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fill every note of a frozen graph, calling the filler exactly once per
 * note. Each worker writes only its own slot, so results never race.
 */
export async function fillNotes(
  graph: LinkGraph,
  filler: ContentFiller,
  options: FillOptions
): Promise<FillResult> {
  const { mainTopic, concurrency = DEFAULT_FILL_CONCURRENCY, timeoutMs } = options;
  const titles = graph.titles;
  const slots: Array<{ record: NoteRecord; source: FillSource } | undefined> = new Array(titles.length);

  async function fillOne(index: number): Promise<void> {
    const title = titles[index];
    const request = fillRequestFor(graph, title, mainTopic);

    let body: string;
    let source: FillSource = filler.usesTemplate?.(request) ? 'template' : 'filler';
    try {
      body = await withTimeout(filler.fill(request), timeoutMs, title);
      const mismatch = linkMismatch(body, request.links);
      if (mismatch) {
        throw new Error(mismatch);
      }
    } catch (err) {
      const failure = new ContentGenerationError(title, filler.name, err);
      serverLog('content', `${failure.message}; using template`, 'warn');
      body = renderTemplate(request);
      source = 'fallback';
    }

    slots[index] = {
      record: {
        title,
        kind: request.kind,
        noteType: request.noteType,
        tags: tagsFor(request),
        links: [...request.links],
        body,
      },
      source,
    };
  }

  let next = 0;
  const workerCount = Math.max(1, Math.min(Math.floor(concurrency) || 1, titles.length));
  const workers = Array.from({ length: workerCount }, async () => {
    while (next < titles.length) {
      const index = next++;
      await fillOne(index);
    }
  });
  await Promise.all(workers);

  const notes: NoteRecord[] = [];
  const templateTitles: string[] = [];
  const fallbackTitles: string[] = [];
  for (const [index, slot] of slots.entries()) {
    if (!slot) {
      throw new Error(`Note "${titles[index]}" was never filled`);
    }
    notes.push(slot.record);
    if (slot.source === 'template') templateTitles.push(slot.record.title);
    if (slot.source === 'fallback') fallbackTitles.push(slot.record.title);
  }

  const generated = notes.length - templateTitles.length - fallbackTitles.length;
  serverLog(
    'content',
    `Filled ${notes.length} notes with ${filler.name}: ${generated} generated, ${templateTitles.length} template, ${fallbackTitles.length} fallback`
  );
  return { notes, generated, templateTitles, fallbackTitles };
}
