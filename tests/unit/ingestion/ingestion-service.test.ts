/**
 * Unit tests for IngestionService
 *
 * Document -> segments -> vectors against a real in-memory database and
 * vector index, with the hashing model in place of the embedding worker.
 *
 * @module tests/unit/ingestion/ingestion-service
 */

import { describe, it, expect, beforeEach, afterEach, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { IngestionError, IngestionService } from '../../../src/services/ingestion/ingestion-service.js';
import { Embedder } from '../../../src/services/embedding/embedder.js';
import { WhitespaceTokenCounter } from '../../../src/services/chunking/token-counter.js';
import { reconstructText } from '../../../src/services/chunking/chunker.js';
import { joinPages } from '../../../src/services/chunking/page-map.js';
import { ExtractionError } from '../../../src/services/extraction/extractor.js';
import { DocumentPage } from '../../../src/models/document.js';
import { HashingEmbeddingModel, HashingModelOptions } from '../../fixtures/models.js';
import { createTestServices, sqliteVecAvailable, TestServices } from '../../fixtures/services.js';

/** Three pages of three ten-word sentences: 90 tokens */
function threePages(): DocumentPage[] {
  return [1, 2, 3].map((page) => ({
    page_number: page,
    raw_text: [0, 1, 2]
      .map((k) => `p${page}s${k} alpha beta gamma delta epsilon zeta eta theta iota.`)
      .join(' '),
  }));
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

function otherModelIngestion(s: TestServices, model: HashingModelOptions): IngestionService {
  const tokenCounter = new WhitespaceTokenCounter();
  const embedder = new Embedder(new HashingEmbeddingModel(model), {
    tokenCounter,
    retry: { baseDelayMs: 1, maxDelayMs: 5 },
  });
  return new IngestionService({ db: s.db, index: s.index, embedder, tokenCounter });
}

const tempDirs: string[] = [];

afterAll(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe.skipIf(!sqliteVecAvailable)('IngestionService', () => {
  let s: TestServices;

  beforeEach(() => {
    s = createTestServices();
  });

  afterEach(() => {
    s.db.close();
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // INGEST
  // ═══════════════════════════════════════════════════════════════════════════

  describe('ingest', () => {
    it('stores segments and vectors and marks the document complete', async () => {
      const pages = threePages();
      const result = await s.ingestion.ingest({ source_name: 'manual.txt', pages });

      expect(result).toMatchObject({
        source_name: 'manual.txt',
        status: 'complete',
        segment_count: 3,
        page_count: 3,
        chunking_strategy: 'hierarchical',
        model_identity: 'test-hash-16',
      });
      expect(s.db.getDocument(result.document_id)).toMatchObject({
        status: 'complete',
        segment_count: 3,
        chunking_strategy: 'hierarchical',
        model_identity: 'test-hash-16',
        error_message: null,
      });

      const segments = s.db.getSegmentsByDocument(result.document_id);
      expect(segments.map((seg) => seg.page_number)).toEqual([1, 2, 3]);
      expect(reconstructText(segments)).toBe(joinPages(pages).text);
      expect(s.index.count(result.document_id)).toBe(3);
      expect(s.model.calls).toHaveLength(1);
    });

    it('tags vectors with page, order and whether the segment is top level', async () => {
      const text = '# Guide\nIntro line one.\n## Install\nRun the installer now.\n## Usage\nOpen the app and work.';
      const { document_id } = await s.ingestion.ingest({
        source_name: 'guide.md',
        pages: [{ page_number: 1, raw_text: text }],
        chunking: { strategy: 'hierarchical', maxTokens: 8, overlapTokens: 0 },
      });
      const query = await s.embedder.embed('installer');
      const ids = (metadata: Record<string, number | boolean>): string[] =>
        s.index
          .query(query, 10, { documentId: document_id, metadata })
          .map((hit) => hit.segment_id)
          .sort();

      expect(ids({ is_top_level: true })).toEqual([`${document_id}#0`]);
      expect(ids({ is_top_level: false })).toEqual([`${document_id}#1`, `${document_id}#2`, `${document_id}#3`]);
      expect(ids({ order_index: 2, page_number: 1 })).toEqual([`${document_id}#2`]);
    });

    it('completes a whitespace-only document with no segments', async () => {
      const result = await s.ingestion.ingest({
        source_name: 'blank.txt',
        pages: [{ page_number: 1, raw_text: '  \n ' }],
      });

      expect(result.segment_count).toBe(0);
      expect(s.db.getDocument(result.document_id)?.status).toBe('complete');
      expect(s.model.calls).toEqual([]);
    });

    it('applies a per-document chunking override', async () => {
      const pages = threePages();
      const result = await s.ingestion.ingest({
        source_name: 'semantic.txt',
        pages,
        chunking: { strategy: 'semantic', maxTokens: 40, similarityThreshold: 0.5 },
      });

      expect(result.chunking_strategy).toBe('semantic');
      const segments = s.db.getSegmentsByDocument(result.document_id);
      expect(reconstructText(segments)).toBe(joinPages(pages).text);
      expect(segments.every((seg) => seg.token_count <= 40)).toBe(true);
    });

    it('leaves nothing behind but a failed document when embedding fails', async () => {
      s.db.close();
      s = createTestServices({ model: { failures: 10 } });

      const error = await captureError(s.ingestion.ingest({ source_name: 'doomed.txt', pages: threePages() }));

      expect(error).toBeInstanceOf(IngestionError);
      if (!(error instanceof IngestionError)) return;
      expect(error.code).toBe('INGESTION_FAILED');
      expect(error.message).toBe('Ingestion of "doomed.txt" failed: Embedding failed after 3 attempts');

      const documentId = error.details?.documentId;
      expect(typeof documentId).toBe('string');
      if (typeof documentId !== 'string') return;
      expect(s.db.getDocument(documentId)).toMatchObject({
        status: 'failed',
        error_message: 'Embedding failed after 3 attempts',
        segment_count: 0,
      });
      expect(s.db.getSegmentsByDocument(documentId)).toEqual([]);
      expect(s.index.count(documentId)).toBe(0);
    });

    it('fails on an invalid chunking config', async () => {
      await expect(
        s.ingestion.ingest({
          source_name: 'bad.txt',
          pages: threePages(),
          chunking: { strategy: 'hierarchical', maxTokens: 10, overlapTokens: 10 },
        })
      ).rejects.toMatchObject({ code: 'INGESTION_FAILED' });
      expect(s.db.listDocuments({ status: 'failed' })).toHaveLength(1);
    });
  });

  describe('ingestFile', () => {
    it('extracts a markdown file and names the document after it', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ingest-'));
      tempDirs.push(dir);
      const filePath = path.join(dir, 'notes.md');
      fs.writeFileSync(filePath, 'Hello world. Second line here.');

      const result = await s.ingestion.ingestFile(filePath);

      expect(result.source_name).toBe('notes.md');
      expect(result.segment_count).toBe(1);
      expect(s.db.getDocument(result.document_id)?.file_type).toBe('md');
    });

    it('stores nothing when extraction fails', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ingest-'));
      tempDirs.push(dir);
      const filePath = path.join(dir, 'scan.png');
      fs.writeFileSync(filePath, Buffer.from([0x89, 0x50, 0x4e, 0x47]));

      const error = await captureError(s.ingestion.ingestFile(filePath));

      expect(error).toBeInstanceOf(ExtractionError);
      expect(s.db.listDocuments()).toEqual([]);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // RE-EMBED AND DELETE
  // ═══════════════════════════════════════════════════════════════════════════

  describe('reembedDocument', () => {
    it('replaces vectors with ones from the new model and keeps segments', async () => {
      const { document_id } = await s.ingestion.ingest({ source_name: 'manual.txt', pages: threePages() });
      const before = s.db.getSegmentsByDocument(document_id);

      const result = await otherModelIngestion(s, { identity: 'test-hash-8', dimensions: 8 }).reembedDocument(
        document_id
      );

      expect(result.model_identity).toBe('test-hash-8');
      expect(result.segment_count).toBe(3);
      expect(s.db.getDocument(document_id)?.model_identity).toBe('test-hash-8');
      expect(s.db.getSegmentsByDocument(document_id)).toEqual(before);
      expect(s.index.count(document_id)).toBe(3);

      const oldModelQuery = await s.embedder.embed('alpha beta');
      expect(s.index.query(oldModelQuery, 5, { documentId: document_id })).toEqual([]);
    });

    it('keeps the old vectors when re-embedding fails', async () => {
      const { document_id } = await s.ingestion.ingest({ source_name: 'manual.txt', pages: threePages() });

      await expect(
        otherModelIngestion(s, { identity: 'test-hash-8', dimensions: 8, failures: 10 }).reembedDocument(document_id)
      ).rejects.toMatchObject({ code: 'RETRIES_EXHAUSTED' });

      expect(s.db.getDocument(document_id)?.model_identity).toBe('test-hash-16');
      const hits = s.index.query(await s.embedder.embed('alpha beta'), 5, { documentId: document_id });
      expect(hits).toHaveLength(3);
    });

    it('rejects unknown and unfinished documents', async () => {
      await expect(s.ingestion.reembedDocument('missing')).rejects.toMatchObject({ code: 'DOCUMENT_NOT_FOUND' });

      s.db.insertDocument({
        document_id: 'pending-doc',
        source_name: 'p.txt',
        file_type: 'txt',
        content_hash: 'sha256:' + '0'.repeat(64),
        pages: [],
        created_at: '2024-01-01T00:00:00.000Z',
      });
      await expect(s.ingestion.reembedDocument('pending-doc')).rejects.toMatchObject({
        code: 'DOCUMENT_NOT_READY',
        message: 'Document pending-doc is processing; only complete documents can be re-embedded',
      });
    });
  });

  describe('deleteDocument', () => {
    it('removes the document, its segments and its vectors', async () => {
      const { document_id } = await s.ingestion.ingest({ source_name: 'manual.txt', pages: threePages() });
      const other = await s.ingestion.ingest({ source_name: 'other.txt', pages: threePages() });

      expect(await s.ingestion.deleteDocument(document_id)).toBe(true);

      expect(s.db.getDocument(document_id)).toBeNull();
      expect(s.db.getSegmentsByDocument(document_id)).toEqual([]);
      expect(s.index.count(document_id)).toBe(0);
      expect(s.index.count(other.document_id)).toBe(3);
      expect(await s.ingestion.deleteDocument(document_id)).toBe(false);
    });
  });
});
