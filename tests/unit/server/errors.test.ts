/**
 * Unit tests for MCP error mapping
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import { formatErrorResponse, getRecoveryHint, MCPError } from '../../../src/server/errors.js';
import { ValidationError } from '../../../src/utils/validation.js';
import { EmbeddingError } from '../../../src/services/embedding/model.js';
import { ExtractionError } from '../../../src/services/extraction/extractor.js';
import { IngestionError } from '../../../src/services/ingestion/ingestion-service.js';
import { QAError } from '../../../src/services/qa/qa-service.js';
import { PipelineCancelled, PipelineError, PipelineTimeout } from '../../../src/services/retrieval/errors.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/index.js';
import { IndexError } from '../../../src/services/storage/vector-index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

describe('MCPError.fromUnknown', () => {
  it('returns an MCPError unchanged', () => {
    const error = new MCPError('PATH_NOT_FOUND', 'gone');

    expect(MCPError.fromUnknown(error)).toBe(error);
  });

  it('maps a validation failure', () => {
    const error = MCPError.fromUnknown(new ValidationError('query: Query is required'));

    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('query: Query is required');
    expect(error.details).toEqual({ originalName: 'ValidationError' });
  });

  it('keeps the code of coded errors', () => {
    const error = MCPError.fromUnknown(new EmbeddingError('weights missing', 'MODEL_NOT_FOUND'));

    expect(error.category).toBe('EMBEDDING_MODEL_ERROR');
    expect(error.details).toEqual({ originalName: 'EmbeddingError', errorCode: 'MODEL_NOT_FOUND' });
  });

  it('takes the category of the cause of a pipeline error', () => {
    const cause = new EmbeddingError('Embedding failed after 3 attempts', 'RETRIES_EXHAUSTED');
    const error = MCPError.fromUnknown(
      new PipelineError('EMBEDDING_QUERY failed: Embedding failed after 3 attempts', 'EMBEDDING_QUERY', true, undefined, {
        cause,
      })
    );

    expect(error.category).toBe('EMBEDDING_FAILED');
    expect(error.details).toEqual({ originalName: 'PipelineError', stage: 'EMBEDDING_QUERY', retryable: true });
  });

  it('maps timeouts and cancellation', () => {
    const timeout = MCPError.fromUnknown(new PipelineTimeout('rerank', 50, 'RERANKING'));
    const cancelled = MCPError.fromUnknown(new PipelineCancelled('VECTOR_SEARCH'));

    expect(timeout.category).toBe('QUERY_TIMEOUT');
    expect(timeout.message).toBe('rerank timed out after 50ms');
    expect(timeout.details).toEqual({
      originalName: 'PipelineTimeout',
      errorDetails: { operation: 'rerank', timeoutMs: 50 },
      stage: 'RERANKING',
      retryable: true,
    });
    expect(cancelled.category).toBe('QUERY_CANCELLED');
    expect(cancelled.message).toBe('Query cancelled during VECTOR_SEARCH');
  });

  it('falls back to QUERY_FAILED for a pipeline error without a known cause', () => {
    const error = new PipelineError('RERANKING failed: boom', 'RERANKING', false, undefined, {
      cause: new Error('boom'),
    });

    expect(MCPError.fromUnknown(error).category).toBe('QUERY_FAILED');
  });

  it('maps ingestion failures through their cause', () => {
    const extraction = new ExtractionError('Unsupported file type: .pdf', 'unsupported_format', 'pdf');
    const wrapped = new IngestionError('Ingestion of "a.pdf" failed', 'INGESTION_FAILED', undefined, {
      cause: extraction,
    });

    expect(MCPError.fromUnknown(wrapped).category).toBe('EXTRACTION_FAILED');
    expect(MCPError.fromUnknown(new IngestionError('failed', 'INGESTION_FAILED')).category).toBe('INGESTION_FAILED');
    expect(MCPError.fromUnknown(new IngestionError('busy', 'DOCUMENT_NOT_READY')).category).toBe('DOCUMENT_NOT_READY');
  });

  it('maps storage and conversation errors', () => {
    expect(
      MCPError.fromUnknown(new DatabaseError('no such conversation', DatabaseErrorCode.CONVERSATION_NOT_FOUND)).category
    ).toBe('CONVERSATION_NOT_FOUND');
    expect(
      MCPError.fromUnknown(new DatabaseError('closed', DatabaseErrorCode.DATABASE_UNAVAILABLE)).category
    ).toBe('STORAGE_UNAVAILABLE');
    expect(MCPError.fromUnknown(new IndexError('No vectors', 'NOT_FOUND')).category).toBe('DOCUMENT_NOT_FOUND');
    expect(MCPError.fromUnknown(new IndexError('bad', 'INVALID_VECTOR')).category).toBe('INTERNAL_ERROR');
    expect(MCPError.fromUnknown(new QAError('stale vectors', 'MODEL_MISMATCH')).category).toBe('EMBEDDING_MODEL_MISMATCH');
    expect(MCPError.fromUnknown(new QAError('elsewhere', 'CONVERSATION_MISMATCH')).category).toBe(
      'CONVERSATION_NOT_FOUND'
    );
  });

  it('uses the default category for unknown errors and values', () => {
    expect(MCPError.fromUnknown(new Error('surprise')).category).toBe('INTERNAL_ERROR');
    expect(MCPError.fromUnknown(new Error('surprise'), 'QUERY_FAILED').category).toBe('QUERY_FAILED');

    const fromString = MCPError.fromUnknown('oops');
    expect(fromString.message).toBe('oops');
    expect(fromString.details).toEqual({ originalValue: 'oops' });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE FORMAT
// ═══════════════════════════════════════════════════════════════════════════════

describe('formatErrorResponse', () => {
  it('attaches the recovery hint for the category', () => {
    const response = formatErrorResponse(new MCPError('DOCUMENT_NOT_FOUND', 'Document not found: x', { documentId: 'x' }));

    expect(response).toEqual({
      success: false,
      error: {
        category: 'DOCUMENT_NOT_FOUND',
        message: 'Document not found: x',
        recovery: getRecoveryHint('DOCUMENT_NOT_FOUND'),
        details: { documentId: 'x' },
      },
    });
    expect(response.error.recovery.tool).toBe('rag_document_list');
  });
});
