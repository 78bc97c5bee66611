/**
 * Tests for topic expansion and title handling
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  expandTopics,
  expandTopicsWith,
  noteTypeFor,
  overviewTitle,
  slugify,
  toNoteTitle,
  uniquifyTitles,
  MAX_TITLE_LENGTH,
} from '../../../src/core/write/topics.js';
import { InsufficientTopicsError } from '../../../src/core/shared/errors.js';
import { FixedNamer } from '../../helpers/testUtils.js';

describe('toNoteTitle', () => {
  it('should collapse whitespace and trim', () => {
    expect(toNoteTitle('  Machine   Learning  ')).toBe('Machine Learning');
  });

  it('should replace characters that break filenames or wikilinks', () => {
    expect(toNoteTitle('C++ / Rust: A "Comparison"')).toBe('C++ _ Rust_ A _Comparison_');
    expect(toNoteTitle('Notes [[draft]] #1 | v2')).toBe('Notes __draft__ _1 _ v2');
  });

  it('should strip leading and trailing dots', () => {
    expect(toNoteTitle('...hidden.')).toBe('hidden');
  });

  it('should cap the length', () => {
    expect(toNoteTitle('a'.repeat(150))).toHaveLength(MAX_TITLE_LENGTH);
  });

  it('should not split a surrogate pair at the length cap', () => {
    expect(toNoteTitle('a'.repeat(99) + '😀')).toBe('a'.repeat(99));
    expect(toNoteTitle('a'.repeat(98) + '😀')).toBe('a'.repeat(98) + '😀');
  });

  it('should produce titles that survive a UTF-8 round trip', () => {
    fc.assert(
      fc.property(fc.string({ unit: 'binary', maxLength: 120 }), (raw) => {
        const title = toNoteTitle(raw);
        expect(Buffer.from(title, 'utf8').toString('utf8')).toBe(title);
      })
    );
  });

  it('should be idempotent', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 200 }), (raw) => {
        const once = toNoteTitle(raw);
        expect(toNoteTitle(once)).toBe(once);
      })
    );
  });
});

describe('uniquifyTitles', () => {
  it('should rename case-insensitive duplicates with a counter', () => {
    expect(uniquifyTitles(['Alpha', 'alpha', 'ALPHA', 'Beta'])).toEqual([
      'Alpha',
      'alpha (2)',
      'ALPHA (3)',
      'Beta',
    ]);
  });

  it('should rename the reserved index name and drop empty titles', () => {
    expect(uniquifyTitles(['README', 'Notes', '   '])).toEqual(['README (2)', 'Notes']);
  });

  it('should not split a surrogate pair when adding a counter', () => {
    const name = 'a'.repeat(95) + '😀b';
    expect(uniquifyTitles([name, name])).toEqual([name, 'a'.repeat(95) + ' (2)']);
  });

  it('should keep distinct names distinct', () => {
    fc.assert(
      fc.property(fc.array(fc.string({ minLength: 1, maxLength: 30 }), { maxLength: 40 }), (raw) => {
        const titles = uniquifyTitles(raw);
        const lowered = new Set(titles.map(title => title.toLowerCase()));
        expect(lowered.size).toBe(titles.length);
        expect(lowered.has('readme')).toBe(false);
      })
    );
  });
});

describe('expandTopics', () => {
  it('should start with the overview and use the base suffixes first', () => {
    expect(expandTopics('Machine Learning', 5)).toEqual([
      'Machine Learning Overview',
      'Machine Learning Fundamentals',
      'Machine Learning Applications',
      'Machine Learning History',
      'Machine Learning Best Practices',
    ]);
  });

  it('should continue with extensions after the base block', () => {
    const titles = expandTopics('Rust', 10);
    expect(titles).toHaveLength(10);
    expect(titles.slice(7)).toEqual(['Rust Resources', 'Rust - Key Concepts', 'Rust - Important Principles']);
  });

  it('should keep titles unique when the extensions cycle', () => {
    const titles = expandTopics('Go', 30);
    expect(titles).toHaveLength(30);
    expect(new Set(titles.map(title => title.toLowerCase())).size).toBe(30);
    expect(titles[18]).toBe('Go - Key Concepts (2)');
    expect(titles[28]).toBe('Go - Key Concepts (3)');
  });

  it('should produce exactly two titles for a count of two', () => {
    expect(expandTopics('Chess', 2)).toEqual(['Chess Overview', 'Chess Fundamentals']);
  });

  it('should raise InsufficientTopicsError for a count of one', () => {
    expect(() => expandTopics('Chess', 1)).toThrow(InsufficientTopicsError);
    try {
      expandTopics('Chess', 1);
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientTopicsError);
      expect(err).toMatchObject({ code: 'INSUFFICIENT_TOPICS', produced: 1 });
    }
  });

  it('should raise InsufficientTopicsError for a blank topic', () => {
    expect(() => expandTopics('   ', 10)).toThrow(InsufficientTopicsError);
  });
});

describe('expandTopicsWith', () => {
  it('should keep the overview first and top up from the template', async () => {
    const namer = new FixedNamer(['Neural Networks', 'Machine Learning', 'Backprop: Basics']);
    const titles = await expandTopicsWith('Machine Learning', 5, namer);
    expect(titles).toEqual([
      'Machine Learning Overview',
      'Neural Networks',
      'Backprop_ Basics',
      'Machine Learning Fundamentals',
      'Machine Learning Applications',
    ]);
  });

  it('should drop extra names beyond the count', async () => {
    const namer = new FixedNamer(['A', 'B', 'C', 'D', 'E']);
    expect(await expandTopicsWith('Letters', 3, namer)).toEqual(['Letters Overview', 'A', 'B']);
  });

  it('should fall back to the template when the namer fails', async () => {
    const namer = new FixedNamer(new Error('rate limited'));
    expect(await expandTopicsWith('Chess', 3, namer)).toEqual(expandTopics('Chess', 3));
  });
});

describe('title helpers', () => {
  it('should build the overview title', () => {
    expect(overviewTitle(' Jazz ')).toBe('Jazz Overview');
  });

  it('should slugify', () => {
    expect(slugify('Machine Learning!')).toBe('machine-learning');
  });

  it('should guess note types from title words', () => {
    expect(noteTypeFor('Famous Scientist Profiles')).toBe('person');
    expect(noteTypeFor('Annual Conference Notes')).toBe('event');
    expect(noteTypeFor('Case Study: Search')).toBe('project');
    expect(noteTypeFor('Gradient Descent')).toBe('concept');
  });
});
