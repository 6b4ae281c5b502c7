/**
 * Unit tests for SqliteVectorIndex
 *
 * Real sqlite-vec on a private in-memory database. Skipped when the
 * extension cannot be loaded on this platform.
 *
 * @module tests/unit/storage/vector-index
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseService } from '../../../src/services/storage/database/index.js';
import { IndexError, SqliteVectorIndex } from '../../../src/services/storage/vector-index.js';
import { EmbeddingVector, EntryMetadata, IndexEntry } from '../../../src/models/embedding.js';
import { sqliteVecAvailable } from '../../fixtures/services.js';

function vec(values: number[], model = 'model-a'): EmbeddingVector {
  return { owner_segment_id: null, model_identity: model, values: Float32Array.from(values) };
}

function entry(
  segmentId: string,
  documentId: string,
  values: number[],
  metadata: EntryMetadata = {},
  model = 'model-a'
): IndexEntry {
  return { segment_id: segmentId, document_id: documentId, vector: vec(values, model), metadata };
}

function expectIndexError(fn: () => unknown, code: string, message?: string): void {
  try {
    fn();
    expect.unreachable('should have thrown');
  } catch (error) {
    expect(error).toBeInstanceOf(IndexError);
    if (error instanceof IndexError) {
      expect(error.code).toBe(code);
      if (message !== undefined) expect(error.message).toBe(message);
    }
  }
}

describe.skipIf(!sqliteVecAvailable)('SqliteVectorIndex', () => {
  let db: DatabaseService;
  let index: SqliteVectorIndex;

  beforeEach(() => {
    db = DatabaseService.open(':memory:');
    index = new SqliteVectorIndex(db.getConnection());
  });

  afterEach(() => {
    db.close();
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERY
  // ═══════════════════════════════════════════════════════════════════════════

  describe('query', () => {
    it('returns hits by cosine similarity, best first', () => {
      index.upsertMany([
        entry('c', 'doc', [0, 1, 0]),
        entry('a', 'doc', [1, 0, 0]),
        entry('b', 'doc', [0.6, 0.8, 0]),
      ]);

      const hits = index.query(vec([1, 0, 0]), 3);

      expect(hits.map((h) => h.segment_id)).toEqual(['a', 'b', 'c']);
      expect(hits[0].vector_score).toBeCloseTo(1, 5);
      expect(hits[1].vector_score).toBeCloseTo(0.6, 5);
      expect(hits[2].vector_score).toBeCloseTo(0, 5);
      expect(hits[0].document_id).toBe('doc');
    });

    it('limits results to topN', () => {
      index.upsertMany([entry('a', 'doc', [1, 0]), entry('b', 'doc', [0, 1])]);

      expect(index.query(vec([1, 0]), 1).map((h) => h.segment_id)).toEqual(['a']);
    });

    it('keeps insertion order for equal scores, also after a re-upsert', () => {
      index.upsertMany([entry('x', 'doc', [1, 1]), entry('y', 'doc', [1, 1])]);
      index.upsert(entry('x', 'doc', [2, 2]));

      expect(index.query(vec([1, 1]), 2).map((h) => h.segment_id)).toEqual(['x', 'y']);
      expect(index.count()).toBe(2);
    });

    it('only compares vectors of the same model and dimension', () => {
      index.upsertMany([
        entry('same', 'doc', [1, 0]),
        entry('other-model', 'doc', [1, 0], {}, 'model-b'),
        entry('other-dim', 'doc', [1, 0, 0]),
      ]);

      expect(index.query(vec([1, 0]), 10).map((h) => h.segment_id)).toEqual(['same']);
      expect(index.query(vec([1, 0], 'model-b'), 10).map((h) => h.segment_id)).toEqual(['other-model']);
    });

    it('filters by document and metadata', () => {
      index.upsertMany([
        entry('a1', 'doc-a', [1, 0], { page_number: 1, is_top_level: true }),
        entry('a2', 'doc-a', [1, 0.1], { page_number: 2, is_top_level: false }),
        entry('b1', 'doc-b', [1, 0], { page_number: 2 }),
        entry('a3', 'doc-a', [1, 0.2], { page_number: null }),
      ]);

      expect(index.query(vec([1, 0]), 10, { documentId: 'doc-b' }).map((h) => h.segment_id)).toEqual(['b1']);
      expect(
        index.query(vec([1, 0]), 10, { metadata: { page_number: 2 } }).map((h) => h.segment_id)
      ).toEqual(['b1', 'a2']);
      expect(
        index
          .query(vec([1, 0]), 10, { documentId: 'doc-a', metadata: { is_top_level: true } })
          .map((h) => h.segment_id)
      ).toEqual(['a1']);
      expect(
        index.query(vec([1, 0]), 10, { metadata: { page_number: null } }).map((h) => h.segment_id)
      ).toEqual(['a3']);
    });

    it('returns nothing for an unknown document unless requireDocument is set', () => {
      index.upsert(entry('a', 'doc', [1, 0]));

      expect(index.query(vec([1, 0]), 5, { documentId: 'missing' })).toEqual([]);
      expectIndexError(
        () => index.query(vec([1, 0]), 5, { documentId: 'missing', requireDocument: true }),
        'NOT_FOUND',
        'No vectors for document missing under model model-a'
      );
    });

    it('rejects bad queries', () => {
      expectIndexError(() => index.query(vec([0, 0]), 5), 'INVALID_VECTOR', 'Vector for query has zero length');
      expectIndexError(() => index.query(vec([]), 5), 'INVALID_VECTOR', 'Vector for query is empty');
      expectIndexError(() => index.query(vec([1, 0]), 0), 'INVALID_FILTER', 'topN must be a positive integer, got 0');
      expectIndexError(
        () => index.query(vec([1, 0]), 5, { metadata: { "x') OR 1=1 --": 1 } }),
        'INVALID_FILTER'
      );
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // WRITES
  // ═══════════════════════════════════════════════════════════════════════════

  describe('writes', () => {
    it('writes nothing when any entry in a batch is invalid', () => {
      expectIndexError(
        () => index.upsertMany([entry('ok', 'doc', [1, 0]), entry('bad', 'doc', [Number.NaN, 1])]),
        'INVALID_VECTOR',
        'Vector for bad has non-finite values'
      );
      expect(index.count()).toBe(0);
    });

    it('deletes all entries of a document', () => {
      index.upsertMany([entry('a1', 'doc-a', [1, 0]), entry('a2', 'doc-a', [0, 1]), entry('b1', 'doc-b', [1, 0])]);

      expect(index.delete('doc-a')).toBe(2);
      expect(index.count('doc-a')).toBe(0);
      expect(index.count('doc-b')).toBe(1);
      expect(index.delete('doc-a')).toBe(0);
    });

    it('rolls back with the surrounding transaction', () => {
      expect(() =>
        db.transaction(() => {
          index.upsert(entry('a', 'doc', [1, 0]));
          throw new Error('abort');
        })
      ).toThrow('abort');

      expect(index.count()).toBe(0);
    });
  });

  it('reports STORAGE_UNAVAILABLE once the connection is closed', () => {
    db.close();

    expectIndexError(() => index.count(), 'STORAGE_UNAVAILABLE');
  });
});
