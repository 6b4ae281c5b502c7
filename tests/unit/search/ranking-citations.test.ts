/**
 * Unit tests for candidate ordering, top-K selection and citations
 *
 * @module tests/unit/search/ranking-citations
 */

import { describe, it, expect } from 'vitest';
import {
  compareByRerank,
  compareByVector,
  ScoredCandidate,
  selectTopK,
} from '../../../src/services/search/ranking.js';
import { citationFor, dedupeCitations, formatCitation } from '../../../src/services/search/citations.js';
import { makeSegment } from '../../fixtures/models.js';

function scored(orderIndex: number, vectorScore: number, rerankScore: number | null): ScoredCandidate {
  const segment = makeSegment('doc', orderIndex, `segment ${orderIndex}`);
  return {
    segment,
    candidate: {
      segment_id: segment.segment_id,
      vector_score: vectorScore,
      rerank_score: rerankScore,
      final_rank: null,
    },
  };
}

const ids = (items: ScoredCandidate[]): string[] => items.map((i) => i.candidate.segment_id);

// ═══════════════════════════════════════════════════════════════════════════════
// RANKING
// ═══════════════════════════════════════════════════════════════════════════════

describe('ranking', () => {
  describe('compareByRerank', () => {
    it('orders by rerank score, then vector score, then reading order', () => {
      const items = [scored(3, 0.5, 0.2), scored(1, 0.9, 0.2), scored(0, 0.9, 0.2), scored(2, 0.1, 0.8)];

      expect(ids([...items].sort(compareByRerank))).toEqual(['doc#2', 'doc#0', 'doc#1', 'doc#3']);
    });

    it('puts unscored candidates last', () => {
      const items = [scored(0, 0.99, null), scored(1, 0.1, -5)];

      expect(ids([...items].sort(compareByRerank))).toEqual(['doc#1', 'doc#0']);
    });
  });

  describe('compareByVector', () => {
    it('ignores rerank scores', () => {
      const items = [scored(0, 0.2, 0.9), scored(1, 0.8, 0.1)];

      expect(ids([...items].sort(compareByVector))).toEqual(['doc#1', 'doc#0']);
    });
  });

  describe('selectTopK', () => {
    it('keeps k items and stamps 1-based ranks without mutating input', () => {
      const items = [scored(0, 0.1, null), scored(1, 0.7, null), scored(2, 0.4, null)];

      const top = selectTopK(items, 2, compareByVector);

      expect(ids(top)).toEqual(['doc#1', 'doc#2']);
      expect(top.map((t) => t.candidate.final_rank)).toEqual([1, 2]);
      expect(items.every((i) => i.candidate.final_rank === null)).toBe(true);
    });

    it('returns everything when k exceeds the input', () => {
      expect(selectTopK([scored(0, 0.1, null)], 5, compareByVector)).toHaveLength(1);
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// CITATIONS
// ═══════════════════════════════════════════════════════════════════════════════

describe('citations', () => {
  it('builds a citation from segment page and document name', () => {
    expect(citationFor(makeSegment('doc', 0, 'x', 12), 'x.pdf')).toEqual({
      page_number: 12,
      document_name: 'x.pdf',
    });
  });

  it('collapses two segments from the same page into one citation at the first position', () => {
    const citations = [
      citationFor(makeSegment('doc', 0, 'a', 3), 'x.pdf'),
      citationFor(makeSegment('doc', 1, 'b', 12), 'x.pdf'),
      citationFor(makeSegment('doc', 2, 'c', 4), 'x.pdf'),
      citationFor(makeSegment('doc', 3, 'd', 12), 'x.pdf'),
    ];

    expect(dedupeCitations(citations)).toEqual([
      { page_number: 3, document_name: 'x.pdf' },
      { page_number: 12, document_name: 'x.pdf' },
      { page_number: 4, document_name: 'x.pdf' },
    ]);
  });

  it('keeps the same page of different documents apart', () => {
    const citations = [
      { page_number: 12, document_name: 'x.pdf' },
      { page_number: 12, document_name: 'y.pdf' },
      { page_number: null, document_name: 'y.pdf' },
      { page_number: null, document_name: 'y.pdf' },
    ];

    expect(dedupeCitations(citations)).toEqual(citations.slice(0, 3));
  });

  it('formats with and without a page number', () => {
    expect(formatCitation({ page_number: 12, document_name: 'x.pdf' })).toBe('x.pdf p.12');
    expect(formatCitation({ page_number: null, document_name: 'x.pdf' })).toBe('x.pdf');
  });
});
