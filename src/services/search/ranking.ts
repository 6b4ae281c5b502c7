/**
 * Candidate ordering and top-K selection
 *
 * Every comparator is total, so equal inputs always produce the same order.
 *
 * @module services/search/ranking
 */

import { RetrievalCandidate } from '../../models/retrieval.js';
import { TextSegment } from '../../models/segment.js';

/** A candidate together with the segment it points at. */
export interface ScoredCandidate {
  segment: TextSegment;
  candidate: RetrievalCandidate;
}

function byFallbacks(a: ScoredCandidate, b: ScoredCandidate): number {
  return (
    a.segment.order_index - b.segment.order_index ||
    (a.segment.segment_id < b.segment.segment_id ? -1 : a.segment.segment_id > b.segment.segment_id ? 1 : 0)
  );
}

/**
 * Rerank score desc, then vector score desc, then reading order.
 * Unscored candidates sort after scored ones.
 */
export function compareByRerank(a: ScoredCandidate, b: ScoredCandidate): number {
  const ra = a.candidate.rerank_score ?? Number.NEGATIVE_INFINITY;
  const rb = b.candidate.rerank_score ?? Number.NEGATIVE_INFINITY;
  if (ra !== rb) return rb - ra;
  return compareByVector(a, b);
}

/** Vector score desc, then reading order. */
export function compareByVector(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.candidate.vector_score !== b.candidate.vector_score) {
    return b.candidate.vector_score - a.candidate.vector_score;
  }
  return byFallbacks(a, b);
}

/**
 * Sort a copy, keep the first k and stamp final_rank 1..k.
 */
export function selectTopK(
  items: ScoredCandidate[],
  k: number,
  compare: (a: ScoredCandidate, b: ScoredCandidate) => number
): ScoredCandidate[] {
  return [...items]
    .sort(compare)
    .slice(0, Math.max(0, k))
    .map((item, i) => ({
      segment: item.segment,
      candidate: { ...item.candidate, final_rank: i + 1 },
    }));
}
