/**
 * Text segment interfaces
 *
 * A segment is the retrievable unit produced by the chunker. Segments are
 * immutable after creation; hierarchy is expressed by `parent_segment_id`
 * and resolved through the document's segment list, never by object links.
 */

/**
 * Chunking strategy selection. Tagged so each strategy only carries the
 * parameters it uses.
 */
export type ChunkingConfig =
  | {
      strategy: 'hierarchical';
      /** Token ceiling per segment (default: 1000) */
      maxTokens: number;
      /** Tokens shared by adjacent windows of one split unit (default: 100) */
      overlapTokens: number;
    }
  | {
      strategy: 'semantic';
      /** Token ceiling per segment (default: 1000) */
      maxTokens: number;
      /** Minimum cosine similarity for a sentence to join the running segment (default: 0.7) */
      similarityThreshold: number;
    };

export type ChunkingStrategy = ChunkingConfig['strategy'];

export const DEFAULT_HIERARCHICAL_CONFIG = {
  strategy: 'hierarchical',
  maxTokens: 1000,
  overlapTokens: 100,
} as const satisfies ChunkingConfig;

export const DEFAULT_SEMANTIC_CONFIG = {
  strategy: 'semantic',
  maxTokens: 1000,
  similarityThreshold: 0.7,
} as const satisfies ChunkingConfig;

/**
 * Persisted segment
 */
export interface TextSegment {
  /** `<document_id>#<order_index>` */
  segment_id: string;
  document_id: string;
  text: string;
  /** Page of the segment's first character, null when the document has no pages */
  page_number: number | null;
  parent_segment_id: string | null;
  /** 0-based position in document order */
  order_index: number;

  /** Offsets into the joined document text */
  char_start: number;
  char_end: number;
  token_count: number;
  /** Characters at the start of `text` repeated from the previous segment */
  overlap_previous: number;

  /** sha256 of `text` */
  content_hash: string;
}

export function segmentIdFor(documentId: string, orderIndex: number): string {
  return `${documentId}#${orderIndex}`;
}
