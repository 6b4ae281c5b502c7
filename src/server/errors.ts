/**
 * MCP Server Error Handling
 *
 * FAIL FAST: every service error is mapped to a category and returned to
 * the client with a recovery hint naming the next tool to call.
 *
 * @module server/errors
 */

import { ChunkingError } from '../services/chunking/chunker.js';
import { EmbeddingError } from '../services/embedding/model.js';
import { ExtractionError } from '../services/extraction/extractor.js';
import { GenerationError } from '../services/generation/generator.js';
import { IngestionError } from '../services/ingestion/ingestion-service.js';
import { QAError } from '../services/qa/qa-service.js';
import { PipelineCancelled, PipelineError, PipelineTimeout } from '../services/retrieval/errors.js';
import { CrossEncoderError } from '../services/search/cross-encoder.js';
import { DatabaseError, DatabaseErrorCode } from '../services/storage/database/index.js';
import { IndexError } from '../services/storage/vector-index.js';
import { ValidationError } from '../utils/validation.js';
import { ConfigError } from './config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Document / conversation errors
  | 'DOCUMENT_NOT_FOUND'
  | 'DOCUMENT_NOT_READY'
  | 'EMBEDDING_MODEL_MISMATCH'
  | 'CONVERSATION_NOT_FOUND'

  // Ingestion errors
  | 'EXTRACTION_FAILED'
  | 'CHUNKING_FAILED'
  | 'INGESTION_FAILED'

  // Model errors
  | 'EMBEDDING_FAILED'
  | 'EMBEDDING_MODEL_ERROR'
  | 'RERANK_FAILED'
  | 'GENERATION_FAILED'

  // Query errors
  | 'QUERY_TIMEOUT'
  | 'QUERY_CANCELLED'
  | 'QUERY_FAILED'

  // Storage errors
  | 'STORAGE_UNAVAILABLE'

  // File system errors
  | 'PATH_NOT_FOUND'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;
    Error.captureStackTrace?.(this, MCPError);
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const details: Record<string, unknown> = { originalName: error.name };
      if ('code' in error && typeof error.code === 'string') {
        details.errorCode = error.code;
      }
      if ('details' in error && error.details !== undefined) {
        details.errorDetails = error.details;
      }
      if (error instanceof PipelineError && error.stage !== null) {
        details.stage = error.stage;
        details.retryable = error.retryable;
      }
      return new MCPError(categorize(error) ?? defaultCategory, error.message, details);
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Category for a service error, or null for errors this server did not raise.
 * Wrapping errors (PipelineError, IngestionError) take their cause's category.
 */
function categorize(error: Error): ErrorCategory | null {
  if (error instanceof ValidationError) return 'VALIDATION_ERROR';
  if (error instanceof ConfigError) return 'CONFIGURATION_ERROR';
  if (error instanceof ExtractionError) return 'EXTRACTION_FAILED';
  if (error instanceof ChunkingError) return 'CHUNKING_FAILED';
  if (error instanceof EmbeddingError) {
    return error.code === 'MODEL_NOT_FOUND' ? 'EMBEDDING_MODEL_ERROR' : 'EMBEDDING_FAILED';
  }
  if (error instanceof CrossEncoderError) return 'RERANK_FAILED';
  if (error instanceof GenerationError) return 'GENERATION_FAILED';
  if (error instanceof IndexError) {
    if (error.code === 'NOT_FOUND') return 'DOCUMENT_NOT_FOUND';
    return error.code === 'STORAGE_UNAVAILABLE' ? 'STORAGE_UNAVAILABLE' : 'INTERNAL_ERROR';
  }
  if (error instanceof DatabaseError) {
    switch (error.code) {
      case DatabaseErrorCode.DOCUMENT_NOT_FOUND:
      case DatabaseErrorCode.FOREIGN_KEY_VIOLATION:
        return 'DOCUMENT_NOT_FOUND';
      case DatabaseErrorCode.CONVERSATION_NOT_FOUND:
        return 'CONVERSATION_NOT_FOUND';
      default:
        return 'STORAGE_UNAVAILABLE';
    }
  }
  if (error instanceof QAError) {
    switch (error.code) {
      case 'DOCUMENT_NOT_FOUND':
        return 'DOCUMENT_NOT_FOUND';
      case 'DOCUMENT_NOT_READY':
        return 'DOCUMENT_NOT_READY';
      case 'CANCELLED':
        return 'QUERY_CANCELLED';
      case 'MODEL_MISMATCH':
        return 'EMBEDDING_MODEL_MISMATCH';
      default:
        return 'CONVERSATION_NOT_FOUND';
    }
  }
  if (error instanceof PipelineCancelled) return 'QUERY_CANCELLED';
  if (error instanceof PipelineTimeout) return 'QUERY_TIMEOUT';
  if (error instanceof PipelineError) {
    return (error.cause instanceof Error ? categorize(error.cause) : null) ?? 'QUERY_FAILED';
  }
  if (error instanceof IngestionError) {
    switch (error.code) {
      case 'DOCUMENT_NOT_FOUND':
        return 'DOCUMENT_NOT_FOUND';
      case 'DOCUMENT_NOT_READY':
        return 'DOCUMENT_NOT_READY';
      default:
        return (error.cause instanceof Error ? categorize(error.cause) : null) ?? 'INGESTION_FAILED';
    }
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'rag_config_get', hint: 'Check parameter types and required fields' },
  DOCUMENT_NOT_FOUND: {
    tool: 'rag_document_list',
    hint: 'Use rag_document_list to browse ingested documents',
  },
  DOCUMENT_NOT_READY: {
    tool: 'rag_document_get',
    hint: 'Only complete documents can be queried; check status and error_message, then re-ingest',
  },
  EMBEDDING_MODEL_MISMATCH: {
    tool: 'rag_document_reembed',
    hint: 'The document was embedded with another model; re-embed it with rag_document_reembed, then query again',
  },
  CONVERSATION_NOT_FOUND: {
    tool: 'rag_query',
    hint: 'Omit conversation_id to start a new conversation for this document',
  },
  EXTRACTION_FAILED: {
    tool: 'rag_ingest_text',
    hint: 'Only UTF-8 .txt and .md files are extracted; pass text pages directly with rag_ingest_text',
  },
  CHUNKING_FAILED: {
    tool: 'rag_config_get',
    hint: 'Check max_tokens, overlap_tokens and similarity_threshold',
  },
  INGESTION_FAILED: {
    tool: 'rag_document_get',
    hint: 'The document was marked failed; fix the cause and ingest it again',
  },
  EMBEDDING_FAILED: {
    tool: 'rag_config_get',
    hint: 'Check the Python embedding worker (pip install sentence-transformers) and retry',
  },
  EMBEDDING_MODEL_ERROR: {
    tool: 'rag_config_get',
    hint: 'Verify RAG_EMBEDDING_MODEL names a downloadable sentence-transformers model',
  },
  RERANK_FAILED: {
    tool: 'rag_config_get',
    hint: 'Check the Python reranker worker and RAG_RERANKER_MODEL',
  },
  GENERATION_FAILED: {
    tool: 'rag_retrieve',
    hint: 'Check that Ollama is running at RAG_OLLAMA_URL with the configured model pulled; rag_retrieve works without it',
  },
  QUERY_TIMEOUT: { tool: 'rag_query', hint: 'Retry the query; raise timeout_ms for slow models' },
  QUERY_CANCELLED: { tool: 'rag_query', hint: 'The query was cancelled; submit it again if still needed' },
  QUERY_FAILED: { tool: 'rag_query', hint: 'Retry if details.retryable is true' },
  STORAGE_UNAVAILABLE: {
    tool: 'rag_config_get',
    hint: 'Check RAG_STORAGE_PATH is writable and sqlite-vec is installed',
  },
  PATH_NOT_FOUND: { tool: 'rag_ingest_file', hint: 'Verify the file path exists on the filesystem' },
  CONFIGURATION_ERROR: {
    tool: 'rag_config_get',
    hint: 'Check RAG_* environment variables; final_k must not exceed initial_k',
  },
  INTERNAL_ERROR: { tool: 'rag_config_get', hint: 'Check server logs on stderr for details' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function documentNotFoundError(documentId: string): MCPError {
  return new MCPError(
    'DOCUMENT_NOT_FOUND',
    `Document not found: ${documentId}. Use rag_document_list to browse available documents.`,
    { documentId }
  );
}

export function modelMismatchError(documentId: string, storedModel: string, currentModel: string): MCPError {
  return new MCPError(
    'EMBEDDING_MODEL_MISMATCH',
    `Document ${documentId} was embedded with ${storedModel}, not ${currentModel}; re-embed it before querying`,
    { document_id: documentId, stored_model: storedModel, current_model: currentModel }
  );
}

export function conversationNotFoundError(conversationId: string): MCPError {
  return new MCPError('CONVERSATION_NOT_FOUND', `Conversation not found: ${conversationId}`, {
    conversationId,
  });
}

export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, { path });
}
