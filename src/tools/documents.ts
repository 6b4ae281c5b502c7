/**
 * Document Management MCP Tools
 *
 * Tools: rag_document_list, rag_document_get, rag_document_delete
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/documents
 */

import { requireServices } from '../server/state.js';
import { successResult } from '../server/types.js';
import { documentNotFoundError } from '../server/errors.js';
import {
  DocumentDeleteInput,
  DocumentGetInput,
  DocumentListInput,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleDocumentList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentListInput, params);
    const { db } = requireServices();

    const documents = db.listDocuments({
      status: input.status_filter,
      limit: input.limit,
      offset: input.offset,
    });
    const stats = db.getStats();

    return formatResponse(
      successResult({
        documents: documents.map((d) => ({
          document_id: d.document_id,
          source_name: d.source_name,
          file_type: d.file_type,
          status: d.status,
          page_count: d.page_count,
          segment_count: d.segment_count,
          created_at: d.created_at,
          ...(d.error_message && { error_message: d.error_message }),
        })),
        total: input.status_filter ? stats.documents_by_status[input.status_filter] : stats.total_documents,
        limit: input.limit,
        offset: input.offset,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentGetInput, params);
    const { db, index, conversations } = requireServices();

    const document = db.getDocument(input.document_id);
    if (!document) {
      throw documentNotFoundError(input.document_id);
    }

    const result: Record<string, unknown> = {
      ...document,
      vector_count: index.count(document.document_id),
      conversations: conversations.list(document.document_id),
    };

    if (input.include_segments) {
      const segments = db.getSegmentsByDocument(document.document_id);
      result.segments = segments
        .slice(input.segment_offset, input.segment_offset + input.segment_limit)
        .map((s) => ({
          segment_id: s.segment_id,
          order_index: s.order_index,
          page_number: s.page_number,
          parent_segment_id: s.parent_segment_id,
          token_count: s.token_count,
          char_start: s.char_start,
          char_end: s.char_end,
          text: s.text,
        }));
      result.segments_total = segments.length;
    }

    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentDelete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentDeleteInput, params);
    const { ingestion } = requireServices();

    if (!(await ingestion.deleteDocument(input.document_id))) {
      throw documentNotFoundError(input.document_id);
    }
    return formatResponse(successResult({ document_id: input.document_id, deleted: true }));
  } catch (error) {
    return handleError(error);
  }
}

export const documentTools: Record<string, ToolDefinition> = {
  rag_document_list: {
    description:
      '[ESSENTIAL] Use to browse ingested documents with status, page and segment counts. Filter by status; paginate with limit/offset.',
    inputSchema: DocumentListInput.shape,
    handler: handleDocumentList,
  },
  rag_document_get: {
    description:
      '[CORE] Use to inspect one document: status, error_message, chunking strategy, embedding model, vector count, conversations and optionally its segments.',
    inputSchema: DocumentGetInput.shape,
    handler: handleDocumentGet,
  },
  rag_document_delete: {
    description:
      '[DESTRUCTIVE] Use to permanently delete a document with its segments, vectors and conversations. Requires confirm=true.',
    inputSchema: DocumentDeleteInput.shape,
    handler: handleDocumentDelete,
  },
};
