/**
 * Types and error handling for DatabaseService
 */

import type { DocumentStatus } from '../../../models/document.js';

export enum DatabaseErrorCode {
  DATABASE_UNAVAILABLE = 'DATABASE_UNAVAILABLE',
  DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
  CONVERSATION_NOT_FOUND = 'CONVERSATION_NOT_FOUND',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  EXTENSION_LOAD_FAILED = 'EXTENSION_LOAD_FAILED',
  CORRUPT_ROW = 'CORRUPT_ROW',
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'DatabaseError';
  }
}

export interface ListDocumentsOptions {
  status?: DocumentStatus;
  limit?: number;
  offset?: number;
}

export interface DatabaseStats {
  path: string;
  total_documents: number;
  documents_by_status: Record<DocumentStatus, number>;
  total_segments: number;
  total_vectors: number;
  total_conversations: number;
}

export interface DocumentRow {
  document_id: string;
  source_name: string;
  file_type: string;
  content_hash: string;
  page_count: number;
  status: string;
  error_message: string | null;
  chunking_strategy: string | null;
  model_identity: string | null;
  segment_count: number;
  created_at: string;
  updated_at: string;
}

export interface PageRow {
  page_number: number;
  raw_text: string;
}

export interface SegmentRow {
  segment_id: string;
  document_id: string;
  order_index: number;
  text: string;
  page_number: number | null;
  parent_segment_id: string | null;
  char_start: number;
  char_end: number;
  token_count: number;
  overlap_previous: number;
  content_hash: string;
}

export interface ConversationRow {
  conversation_id: string;
  document_id: string;
  created_at: string;
}

export interface TurnRow {
  query: string;
  answer: string;
  cited_pages: string;
  created_at: string;
}
