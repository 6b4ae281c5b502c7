/**
 * Ingestion Service
 *
 * Document -> segments -> vectors, all or nothing. The document row is
 * written first in 'processing' state; segments, vectors and the
 * 'complete' status land in one transaction. Any failure leaves the
 * document 'failed' with no segments and no vectors.
 *
 * Work on one document id (ingest, re-embed, delete) is serialized.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/ingestion/ingestion-service
 */

import { v4 as uuidv4 } from 'uuid';
import { Document, DocumentPage } from '../../models/document.js';
import { EmbeddingVector, IndexEntry } from '../../models/embedding.js';
import { ChunkingConfig, DEFAULT_HIERARCHICAL_CONFIG, TextSegment } from '../../models/segment.js';
import { computeHash } from '../../utils/hash.js';
import { KeyedLock } from '../../utils/keyed-lock.js';
import { chunkDocument, reconstructText } from '../chunking/chunker.js';
import { joinPages } from '../chunking/page-map.js';
import { TokenCounter } from '../chunking/token-counter.js';
import { Embedder } from '../embedding/embedder.js';
import { PlainTextExtractor } from '../extraction/extractor.js';
import { DatabaseService } from '../storage/database/index.js';
import { VectorIndex } from '../storage/vector-index.js';

export type IngestionErrorCode =
  | 'DOCUMENT_NOT_FOUND'
  | 'DOCUMENT_NOT_READY'
  | 'RECONSTRUCTION_MISMATCH'
  | 'INGESTION_FAILED';

export class IngestionError extends Error {
  constructor(
    message: string,
    public readonly code: IngestionErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IngestionError';
    Error.captureStackTrace?.(this, IngestionError);
  }
}

export interface IngestionOptions {
  chunking: ChunkingConfig;
  /** Segments per embedding call (default: 32) */
  batchSize: number;
  /** Embedding calls in flight per document (default: 2) */
  maxConcurrentBatches: number;
}

export const DEFAULT_INGESTION_OPTIONS: IngestionOptions = {
  chunking: DEFAULT_HIERARCHICAL_CONFIG,
  batchSize: 32,
  maxConcurrentBatches: 2,
};

export interface IngestRequest {
  source_name: string;
  pages: DocumentPage[];
  file_type?: string;
  /** Chunking override for this document */
  chunking?: ChunkingConfig;
}

export interface IngestionResult {
  document_id: string;
  source_name: string;
  status: 'complete';
  segment_count: number;
  page_count: number;
  chunking_strategy: string;
  model_identity: string;
  duration_ms: number;
}

export interface IngestionDeps {
  db: DatabaseService;
  /** Must share db's connection so writes join one transaction */
  index: VectorIndex;
  embedder: Embedder;
  tokenCounter: TokenCounter;
  extractor?: PlainTextExtractor;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class IngestionService {
  private readonly options: IngestionOptions;
  private readonly locks = new KeyedLock();
  private readonly extractor: PlainTextExtractor;

  constructor(
    private readonly deps: IngestionDeps,
    options: Partial<IngestionOptions> = {}
  ) {
    this.options = { ...DEFAULT_INGESTION_OPTIONS, ...options };
    this.extractor = deps.extractor ?? new PlainTextExtractor();
  }

  /**
   * Ingest extracted pages as a new document.
   *
   * @throws IngestionError INGESTION_FAILED (details.documentId names the failed row)
   */
  async ingest(request: IngestRequest): Promise<IngestionResult> {
    const document: Document = {
      document_id: uuidv4(),
      source_name: request.source_name,
      pages: request.pages,
      created_at: new Date().toISOString(),
    };
    return this.locks.run(document.document_id, () =>
      this.ingestLocked(document, request.file_type ?? 'txt', request.chunking ?? this.options.chunking)
    );
  }

  /**
   * Extract then ingest. ExtractionError is surfaced as-is and nothing is stored.
   */
  async ingestFile(filePath: string, chunking?: ChunkingConfig): Promise<IngestionResult> {
    const extracted = this.extractor.extractFile(filePath);
    return this.ingest({ ...extracted, chunking });
  }

  /**
   * Replace a document's vectors with ones from the current embedding model.
   * Segments are kept; old vectors stay in place if embedding fails.
   */
  async reembedDocument(documentId: string): Promise<IngestionResult> {
    return this.locks.run(documentId, async () => {
      const start = Date.now();
      const record = this.deps.db.getDocument(documentId);
      if (!record) {
        throw new IngestionError(`Document not found: ${documentId}`, 'DOCUMENT_NOT_FOUND', { documentId });
      }
      if (record.status !== 'complete') {
        throw new IngestionError(
          `Document ${documentId} is ${record.status}; only complete documents can be re-embedded`,
          'DOCUMENT_NOT_READY',
          { documentId, status: record.status }
        );
      }

      const segments = this.deps.db.getSegmentsByDocument(documentId);
      const vectors = await this.embedInBatches(segments);
      const model = this.deps.embedder.modelIdentity;

      this.deps.db.transaction(() => {
        this.deps.index.delete(documentId);
        this.deps.index.upsertMany(toEntries(segments, vectors));
        this.deps.db.updateDocumentStatus(documentId, { status: 'complete', model_identity: model });
      });

      console.error(`[Ingestion] Re-embedded ${documentId}: ${segments.length} segments with ${model}`);
      return {
        document_id: documentId,
        source_name: record.source_name,
        status: 'complete',
        segment_count: segments.length,
        page_count: record.page_count,
        chunking_strategy: record.chunking_strategy ?? this.options.chunking.strategy,
        model_identity: model,
        duration_ms: Date.now() - start,
      };
    });
  }

  /**
   * Remove a document with its pages, segments, conversations and vectors.
   * @returns false when the document does not exist
   */
  async deleteDocument(documentId: string): Promise<boolean> {
    return this.locks.run(documentId, async () => {
      const deleted = this.deps.db.transaction(() => {
        const vectors = this.deps.index.delete(documentId);
        const removed = this.deps.db.deleteDocument(documentId);
        return removed ? vectors : null;
      });
      if (deleted === null) return false;
      console.error(`[Ingestion] Deleted ${documentId} (${deleted} vectors)`);
      return true;
    });
  }

  private async ingestLocked(
    document: Document,
    fileType: string,
    chunking: ChunkingConfig
  ): Promise<IngestionResult> {
    const start = Date.now();
    const { text } = joinPages(document.pages);
    const documentId = document.document_id;

    this.deps.db.insertDocument({
      document_id: documentId,
      source_name: document.source_name,
      file_type: fileType,
      content_hash: computeHash(text),
      pages: document.pages,
      created_at: document.created_at,
    });
    console.error(
      `[Ingestion] ${documentId} "${document.source_name}": ${document.pages.length} pages, ${chunking.strategy}`
    );

    try {
      const segments = await chunkDocument(document, chunking, {
        tokenCounter: this.deps.tokenCounter,
        embedder: this.deps.embedder,
      });
      // A whitespace-only document has no segments and nothing to reconstruct
      if (segments.length > 0 && reconstructText(segments) !== text) {
        throw new IngestionError('Segments do not reconstruct the document text', 'RECONSTRUCTION_MISMATCH', {
          documentId,
        });
      }

      const vectors = await this.embedInBatches(segments);
      const model = this.deps.embedder.modelIdentity;

      this.deps.db.transaction(() => {
        this.deps.db.insertSegments(segments);
        this.deps.index.upsertMany(toEntries(segments, vectors));
        this.deps.db.updateDocumentStatus(documentId, {
          status: 'complete',
          error_message: null,
          chunking_strategy: chunking.strategy,
          model_identity: model,
          segment_count: segments.length,
        });
      });

      const durationMs = Date.now() - start;
      console.error(`[Ingestion] ${documentId} complete: ${segments.length} segments in ${durationMs}ms`);
      return {
        document_id: documentId,
        source_name: document.source_name,
        status: 'complete',
        segment_count: segments.length,
        page_count: document.pages.length,
        chunking_strategy: chunking.strategy,
        model_identity: model,
        duration_ms: durationMs,
      };
    } catch (error) {
      this.markFailed(documentId, errorMessage(error));
      throw new IngestionError(
        `Ingestion of "${document.source_name}" failed: ${errorMessage(error)}`,
        'INGESTION_FAILED',
        { documentId },
        { cause: error }
      );
    }
  }

  /**
   * Batches of batchSize segments, at most maxConcurrentBatches in flight.
   */
  private async embedInBatches(segments: TextSegment[]): Promise<EmbeddingVector[]> {
    const batches: TextSegment[][] = [];
    for (let i = 0; i < segments.length; i += this.options.batchSize) {
      batches.push(segments.slice(i, i + this.options.batchSize));
    }

    const vectors: EmbeddingVector[] = [];
    for (let i = 0; i < batches.length; i += this.options.maxConcurrentBatches) {
      const wave = batches.slice(i, i + this.options.maxConcurrentBatches);
      const results = await Promise.all(wave.map((batch) => this.deps.embedder.embedSegments(batch)));
      for (const batchVectors of results) vectors.push(...batchVectors);
    }
    return vectors;
  }

  private markFailed(documentId: string, message: string): void {
    console.error(`[Ingestion] ${documentId} failed: ${message}`);
    this.deps.db.transaction(() => {
      this.deps.index.delete(documentId);
      this.deps.db.deleteSegmentsByDocument(documentId);
      this.deps.db.updateDocumentStatus(documentId, {
        status: 'failed',
        error_message: message,
        segment_count: 0,
      });
    });
  }
}

function toEntries(segments: TextSegment[], vectors: EmbeddingVector[]): IndexEntry[] {
  return segments.map((segment, i) => ({
    segment_id: segment.segment_id,
    document_id: segment.document_id,
    vector: vectors[i],
    metadata: {
      page_number: segment.page_number,
      order_index: segment.order_index,
      is_top_level: segment.parent_segment_id === null,
    },
  }));
}
