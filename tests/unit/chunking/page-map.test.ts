/**
 * Unit tests for page joining and offset-to-page mapping
 *
 * @module tests/unit/chunking/page-map
 */

import { describe, it, expect } from 'vitest';
import { joinPages, pageForOffset } from '../../../src/services/chunking/page-map.js';

describe('joinPages', () => {
  it('joins pages in page order with a blank line between them', () => {
    const joined = joinPages([
      { page_number: 2, raw_text: 'bb' },
      { page_number: 1, raw_text: 'a' },
    ]);

    expect(joined.text).toBe('a\n\nbb');
    expect(joined.pageOffsets).toEqual([
      { page: 1, charStart: 0, charEnd: 1 },
      { page: 2, charStart: 3, charEnd: 5 },
    ]);
  });

  it('handles no pages', () => {
    expect(joinPages([])).toEqual({ text: '', pageOffsets: [] });
  });
});

describe('pageForOffset', () => {
  const { pageOffsets } = joinPages([
    { page_number: 1, raw_text: 'a' },
    { page_number: 2, raw_text: 'bb' },
  ]);

  it('maps offsets to pages, separators to the page before', () => {
    expect([0, 1, 2, 3, 4].map((offset) => pageForOffset(offset, pageOffsets))).toEqual([1, 1, 1, 2, 2]);
  });

  it('returns null without pages', () => {
    expect(pageForOffset(0, [])).toBeNull();
  });
});
