/**
 * Tests for the markdown parser
 */

import { describe, it, expect } from 'vitest';
import { extractWikilinks, parseNoteContent, titleFromPath } from '../../../src/core/read/parser.js';

describe('extractWikilinks', () => {
  it('should find links with aliases and headings, skipping code', () => {
    const content = 'Intro [[A]] and [[B|bee]]\n```\n[[Hidden]]\n```\nEnd [[C#Part]]';

    expect(extractWikilinks(content)).toEqual([
      { target: 'A', alias: undefined, line: 1 },
      { target: 'B', alias: 'bee', line: 1 },
      { target: 'C', alias: undefined, line: 5 },
    ]);
  });

  it('should skip inline code', () => {
    expect(extractWikilinks('Use `[[Literal]]` syntax')).toEqual([]);
  });
});

describe('parseNoteContent', () => {
  it('should split frontmatter from the body and collect links', () => {
    const parsed = parseNoteContent('---\ntags: [chess, hub]\norder: 2\n---\nText #openings [[A]]\n');

    expect(parsed.frontmatter).toEqual({ tags: ['chess', 'hub'], order: 2 });
    expect(parsed.markdown).toBe('Text #openings [[A]]\n');
    expect(parsed.outlinks.map(link => link.target)).toEqual(['A']);
    expect(parsed.warnings).toEqual([]);
  });

  it('should keep the raw text when frontmatter is malformed', () => {
    const content = '---\nfoo: [unclosed\n---\nBody [[A]]';
    const parsed = parseNoteContent(content);

    expect(parsed.warnings).toHaveLength(1);
    expect(parsed.warnings[0].startsWith('Malformed frontmatter')).toBe(true);
    expect(parsed.frontmatter).toEqual({});
    expect(parsed.markdown).toBe(content);
    expect(parsed.outlinks).toEqual([{ target: 'A', alias: undefined, line: 4 }]);
  });
});

describe('titleFromPath', () => {
  it('should drop folders and the extension', () => {
    expect(titleFromPath('sub/Chess Overview.md')).toBe('Chess Overview');
  });
});
