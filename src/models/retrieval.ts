/**
 * Retrieval interfaces: candidates, citations and the evidence set
 * handed to generation.
 */

import type { DocumentRecord } from './document.js';
import type { TextSegment } from './segment.js';

/**
 * A segment considered during one query. Transient, never persisted.
 */
export interface RetrievalCandidate {
  segment_id: string;
  /** Cosine similarity, -1..1 */
  vector_score: number;
  /** Cross-encoder score; null until re-ranked or when re-ranking degraded */
  rerank_score: number | null;
  /** 1-based rank after re-ranking; null before selection */
  final_rank: number | null;
}

/**
 * Reference to a location in a source document, derived at selection time.
 */
export interface Citation {
  page_number: number | null;
  document_name: string;
}

/**
 * A selected segment with everything generation needs to quote and cite it.
 */
export interface EvidenceItem {
  candidate: RetrievalCandidate;
  segment: TextSegment;
  citation: Citation;
}

/**
 * Per-query pipeline stages. DONE and ERROR are terminal.
 */
export type PipelineStage =
  | 'EMBEDDING_QUERY'
  | 'VECTOR_SEARCH'
  | 'RERANKING'
  | 'CITATION_ASSEMBLY'
  | 'DONE'
  | 'ERROR';

export interface StageTransition {
  stage: PipelineStage;
  /** Milliseconds since the run started */
  at_ms: number;
}

/**
 * A candidate excluded because the cross-encoder could not score it
 */
export interface RerankFailureSummary {
  segment_id: string;
  reason: string;
}

export interface RetrievalResult {
  status: 'success';
  /** Text actually embedded and re-ranked against (conversation-augmented) */
  query_text: string;
  /** Selected evidence in final rank order */
  evidence: EvidenceItem[];
  /** Deduplicated citations in the order of their first occurrence */
  citations: Citation[];
  /** True when re-ranking failed for every candidate and vector scores decided the order */
  degraded: boolean;
  candidate_count: number;
  failures: RerankFailureSummary[];
  transitions: StageTransition[];
}

/** Resolves segment ids returned by the index to segments and their documents. */
export interface SegmentSource {
  getSegments(segmentIds: string[]): TextSegment[];
  getDocument(documentId: string): DocumentRecord | null;
}
