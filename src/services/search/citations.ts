/**
 * Citation assembly
 *
 * @module services/search/citations
 */

import { Citation } from '../../models/retrieval.js';
import { TextSegment } from '../../models/segment.js';

export function citationFor(segment: TextSegment, documentName: string): Citation {
  return { page_number: segment.page_number, document_name: documentName };
}

/**
 * Drop repeated (page, document) pairs, keeping first occurrences in order.
 */
export function dedupeCitations(citations: Citation[]): Citation[] {
  const seen = new Set<string>();
  const out: Citation[] = [];
  for (const citation of citations) {
    const key = `${citation.page_number ?? 'none'}\u0000${citation.document_name}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(citation);
  }
  return out;
}

/** "x.pdf p.12" or "x.pdf" when the page is unknown */
export function formatCitation(citation: Citation): string {
  return citation.page_number === null
    ? citation.document_name
    : `${citation.document_name} p.${citation.page_number}`;
}
