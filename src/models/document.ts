/**
 * Document interfaces
 *
 * A document is the unit of ingestion: an ordered list of pages produced by
 * an extractor, immutable once ingested.
 */

/**
 * Document status throughout the ingestion lifecycle.
 * Only 'complete' documents are queryable.
 */
export type DocumentStatus = 'pending' | 'processing' | 'complete' | 'failed';

/**
 * File types the bundled plain-text extractor understands.
 * Everything else needs an external extractor.
 */
export const TEXT_FILE_TYPES = ['txt', 'md'] as const;

export type TextFileType = (typeof TEXT_FILE_TYPES)[number];

/** One extracted page. */
export interface DocumentPage {
  /** 1-based page number */
  page_number: number;
  raw_text: string;
}

/**
 * A document as produced by extraction, before it is persisted.
 */
export interface Document {
  /** UUID v4 identifier, generated at ingestion */
  document_id: string;

  /** Original filename or caller-supplied label; used in citations */
  source_name: string;

  /** Ordered pages */
  pages: DocumentPage[];

  /** ISO 8601 timestamp when the document was ingested */
  created_at: string;
}

/**
 * Persisted document row. Pages are stored separately.
 */
export interface DocumentRecord {
  document_id: string;
  source_name: string;
  file_type: string;
  content_hash: string;
  page_count: number;
  status: DocumentStatus;
  error_message: string | null;
  chunking_strategy: string | null;
  model_identity: string | null;
  segment_count: number;
  created_at: string;
  updated_at: string;
}

/**
 * Character span of a page inside the joined document text
 */
export interface PageOffset {
  page: number;
  charStart: number;
  charEnd: number;
}

/** Separator placed between pages when the document text is joined. */
export const PAGE_SEPARATOR = '\n\n';
