/**
 * Tests for wikilink rendering and body checks
 */

import { describe, it, expect } from 'vitest';
import {
  formatWikilink,
  linkMismatch,
  relatedSection,
  removeRelatedSection,
  stripWikilinks,
} from '../../../src/core/write/wikilinks.js';

describe('formatWikilink', () => {
  it('should wrap the title verbatim', () => {
    expect(formatWikilink('Deep Learning (2)')).toBe('[[Deep Learning (2)]]');
  });
});

describe('relatedSection', () => {
  it('should list one marker per link', () => {
    expect(relatedSection(['A', 'B'])).toBe('## Related Topics\n\n- [[A]]\n- [[B]]');
  });

  it('should say so when there are no links', () => {
    expect(relatedSection([])).toBe('## Related Topics\n\n_No related notes._');
  });
});

describe('stripWikilinks', () => {
  it('should keep display text', () => {
    expect(stripWikilinks('See [[Alpha]] and [[Beta|the beta]] or [[Gamma#Intro]].'))
      .toBe('See Alpha and the beta or Gamma.');
  });
});

describe('removeRelatedSection', () => {
  it('should remove the section up to the next heading', () => {
    const text = '# T\n\nText\n\n## Related Topics\n- [[A]]\n### Sub\n\n## Next\nMore';
    expect(removeRelatedSection(text)).toBe('# T\n\nText\n\n## Next\nMore');
  });

  it('should leave text without the section alone', () => {
    expect(removeRelatedSection('# T\n\nText')).toBe('# T\n\nText');
  });
});

describe('linkMismatch', () => {
  it('should accept a body that carries exactly its links', () => {
    expect(linkMismatch(`# A\n\n${relatedSection(['B', 'C'])}\n`, ['B', 'C'])).toBeNull();
  });

  it('should ignore links inside code', () => {
    expect(linkMismatch(`\`[[Z]]\`\n\n${relatedSection(['B'])}`, ['B'])).toBeNull();
  });

  it('should report missing links', () => {
    expect(linkMismatch(relatedSection(['B']), ['B', 'C'])).toBe('body is missing links to C');
  });

  it('should report repeated links', () => {
    expect(linkMismatch('[[B]] and [[B]]', ['B'])).toBe('body repeats a wikilink');
  });

  it('should report links outside the edge set', () => {
    expect(linkMismatch(relatedSection(['B', 'C']), ['B'])).toBe(
      'body links to notes outside the graph edge set: C'
    );
  });
});
