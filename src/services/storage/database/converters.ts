/**
 * Row conversion functions for DatabaseService
 *
 * Converts database rows to domain model interfaces.
 */

import { DocumentRecord, DocumentStatus } from '../../../models/document.js';
import { TextSegment } from '../../../models/segment.js';
import { ConversationTurn } from '../../../models/conversation.js';
import { DatabaseError, DatabaseErrorCode, DocumentRow, SegmentRow, TurnRow } from './types.js';

const VALID_DOCUMENT_STATUSES: readonly DocumentStatus[] = [
  'pending',
  'processing',
  'complete',
  'failed',
];

export function isDocumentStatus(value: string): value is DocumentStatus {
  return isMember(value, VALID_DOCUMENT_STATUSES);
}

function isMember<T extends string>(value: string, validValues: readonly T[]): value is T {
  return validValues.some((valid) => valid === value);
}

/**
 * Reject values outside a union type instead of letting them leak into
 * typed code.
 */
function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: string
): T {
  if (!isMember(value, validValues)) {
    throw new DatabaseError(
      `Invalid ${fieldName} "${value}" for ${id}. Expected one of: ${validValues.join(', ')}`,
      DatabaseErrorCode.CORRUPT_ROW
    );
  }
  return value;
}

export function rowToDocument(row: DocumentRow): DocumentRecord {
  return {
    document_id: row.document_id,
    source_name: row.source_name,
    file_type: row.file_type,
    content_hash: row.content_hash,
    page_count: row.page_count,
    status: validateEnum(row.status, VALID_DOCUMENT_STATUSES, 'status', row.document_id),
    error_message: row.error_message,
    chunking_strategy: row.chunking_strategy,
    model_identity: row.model_identity,
    segment_count: row.segment_count,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToSegment(row: SegmentRow): TextSegment {
  return {
    segment_id: row.segment_id,
    document_id: row.document_id,
    text: row.text,
    page_number: row.page_number,
    parent_segment_id: row.parent_segment_id,
    order_index: row.order_index,
    char_start: row.char_start,
    char_end: row.char_end,
    token_count: row.token_count,
    overlap_previous: row.overlap_previous,
    content_hash: row.content_hash,
  };
}

export function rowToTurn(row: TurnRow): ConversationTurn {
  return {
    query: row.query,
    answer: row.answer,
    cited_pages: parseCitedPages(row.cited_pages),
    created_at: row.created_at,
  };
}

function parseCitedPages(raw: string): Array<number | null> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new DatabaseError(`Corrupt cited_pages value: ${raw.slice(0, 80)}`, DatabaseErrorCode.CORRUPT_ROW, error);
  }
  if (!Array.isArray(parsed)) {
    throw new DatabaseError('cited_pages is not an array', DatabaseErrorCode.CORRUPT_ROW);
  }
  return parsed.map((page: unknown) => (typeof page === 'number' ? page : null));
}
