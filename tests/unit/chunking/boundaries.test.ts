/**
 * Unit tests for heading and sentence boundary detection
 *
 * @module tests/unit/chunking/boundaries
 */

import { describe, it, expect } from 'vitest';
import { buildSectionTree, findHeadings, splitSentences } from '../../../src/services/chunking/boundaries.js';

describe('findHeadings', () => {
  it('finds markdown and numbered headings outside code fences', () => {
    const text =
      '# Title\nbody\n## Sub ##\n```\n# not a heading\n```\nChapter 3: Results\nSection 2 Methods\n';

    expect(findHeadings(text)).toEqual([
      { level: 1, title: 'Title', start: 0, end: 8 },
      { level: 2, title: 'Sub', start: 13, end: 23 },
      { level: 1, title: 'Results', start: 47, end: 66 },
      { level: 2, title: 'Methods', start: 66, end: 84 },
    ]);
  });

  it('ignores hashtags and plain lines', () => {
    expect(findHeadings('#hashtag\nChapter without number\n')).toEqual([]);
  });
});

describe('buildSectionTree', () => {
  it('nests headings and bounds each body by its first subsection', () => {
    const text = '# A\nintro\n## B\nb text\n# C\nc text';
    const root = buildSectionTree(text, findHeadings(text));

    expect(root.body).toEqual({ start: 0, end: 0 });
    expect(root.children.map((c) => c.heading?.title)).toEqual(['A', 'C']);

    const [a, c] = root.children;
    expect({ start: a.start, end: a.end, body: a.body }).toEqual({ start: 0, end: 22, body: { start: 4, end: 10 } });
    expect(a.children.map((n) => [n.start, n.end, n.body.start, n.body.end])).toEqual([[10, 22, 15, 22]]);
    expect({ start: c.start, end: c.end, body: c.body }).toEqual({ start: 22, end: 32, body: { start: 26, end: 32 } });
  });

  it('gives the root the whole text when there are no headings', () => {
    const root = buildSectionTree('plain text', []);

    expect(root.body).toEqual({ start: 0, end: 10 });
    expect(root.children).toEqual([]);
  });
});

describe('splitSentences', () => {
  it('splits at terminators followed by whitespace, keeping closers', () => {
    expect(splitSentences('One. Two? "Three!" Four', 0, 23)).toEqual([
      { start: 0, end: 5, paragraphEnd: false },
      { start: 5, end: 10, paragraphEnd: false },
      { start: 10, end: 19, paragraphEnd: false },
      { start: 19, end: 23, paragraphEnd: true },
    ]);
  });

  it('does not split inside a number', () => {
    expect(splitSentences('3.14 is pi.', 0, 11)).toEqual([{ start: 0, end: 11, paragraphEnd: true }]);
  });

  it('marks a blank line as a paragraph end', () => {
    expect(splitSentences('A.\n\nB.', 0, 6)).toEqual([
      { start: 0, end: 4, paragraphEnd: true },
      { start: 4, end: 6, paragraphEnd: true },
    ]);
  });

  it('breaks at a single line break', () => {
    expect(splitSentences('line one\nline two', 0, 17)).toEqual([
      { start: 0, end: 9, paragraphEnd: false },
      { start: 9, end: 17, paragraphEnd: true },
    ]);
  });

  it('tiles a sub-range and attaches leading whitespace', () => {
    expect(splitSentences('xx A. B. yy', 3, 8)).toEqual([
      { start: 3, end: 6, paragraphEnd: false },
      { start: 6, end: 8, paragraphEnd: true },
    ]);
    expect(splitSentences('  Hi. ', 0, 6)).toEqual([{ start: 0, end: 6, paragraphEnd: true }]);
  });

  it('returns nothing for whitespace', () => {
    expect(splitSentences('   \n ', 0, 5)).toEqual([]);
  });
});
