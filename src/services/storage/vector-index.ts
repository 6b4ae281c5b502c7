/**
 * VectorIndex - durable vector storage and cosine similarity search
 *
 * Entries are keyed by segment_id and scored with sqlite-vec's
 * vec_distance_cosine(). A query only sees entries written by the same
 * model identity (and dimension) as the query vector, so vectors from a
 * previous model are never compared against a new one.
 *
 * better-sqlite3 runs every statement to completion before the next one
 * starts, and multi-row writes are single transactions, so a query never
 * observes a half-applied upsert or delete.
 *
 * @module services/storage/vector-index
 */

import Database from 'better-sqlite3';
import { EmbeddingVector, EntryMetadata, IndexEntry, MetadataValue } from '../../models/embedding.js';
import { isFiniteVector, l2Norm } from '../../utils/math.js';
import { loadSqliteVecExtension } from './schema.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLING
// ═══════════════════════════════════════════════════════════════════════════════

export type IndexErrorCode = 'NOT_FOUND' | 'STORAGE_UNAVAILABLE' | 'INVALID_VECTOR' | 'INVALID_FILTER';

export class IndexError extends Error {
  constructor(
    message: string,
    public readonly code: IndexErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'IndexError';
    Error.captureStackTrace?.(this, IndexError);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export interface IndexQueryFilter {
  documentId?: string;
  /** Equality on metadata keys; null matches a missing or null value */
  metadata?: EntryMetadata;
  /**
   * Raise NOT_FOUND instead of returning nothing when documentId has no
   * entries for the query's model
   */
  requireDocument?: boolean;
}

export interface IndexHit {
  segment_id: string;
  document_id: string;
  /** Cosine similarity (1 - cosine distance) */
  vector_score: number;
}

export interface VectorIndex {
  /** Insert or replace by segment_id. Idempotent. */
  upsert(entry: IndexEntry): void;
  /** All entries or none. */
  upsertMany(entries: IndexEntry[]): number;
  /** Highest similarity first; equal scores in insertion order. */
  query(vector: EmbeddingVector, topN: number, filter?: IndexQueryFilter): IndexHit[];
  /** Remove every entry of a document. */
  delete(documentId: string): number;
  count(documentId?: string): number;
}

interface HitRow {
  segment_id: string;
  document_id: string;
  distance: number;
}

type UpsertParams = [string, string, string, number, Buffer, string, string];

const METADATA_KEY = /^[A-Za-z0-9_]+$/;

// ═══════════════════════════════════════════════════════════════════════════════
// SQLITE VECTOR INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export class SqliteVectorIndex implements VectorIndex {
  constructor(private readonly db: Database.Database) {
    this.ensureVecFunctions();
  }

  /**
   * sqlite-vec is normally loaded when the schema is initialized; load it
   * here for connections opened some other way. FAIL FAST if unavailable.
   */
  private ensureVecFunctions(): void {
    try {
      this.db.prepare('SELECT vec_version()').get();
      return;
    } catch (error) {
      console.error(
        '[VectorIndex] vec functions missing on connection, loading sqlite-vec:',
        error instanceof Error ? error.message : String(error)
      );
    }
    try {
      loadSqliteVecExtension(this.db);
    } catch (error) {
      throw new IndexError('sqlite-vec extension is not available', 'STORAGE_UNAVAILABLE', undefined, {
        cause: error,
      });
    }
  }

  upsert(entry: IndexEntry): void {
    this.upsertMany([entry]);
  }

  upsertMany(entries: IndexEntry[]): number {
    if (entries.length === 0) return 0;

    // Validate everything before the first write
    const rows = entries.map((entry): UpsertParams => {
      this.checkVector(entry.vector, entry.segment_id);
      const values = entry.vector.values;
      return [
        entry.segment_id,
        entry.document_id,
        entry.vector.model_identity,
        values.length,
        Buffer.from(values.buffer, values.byteOffset, values.byteLength),
        JSON.stringify(entry.metadata),
        new Date().toISOString(),
      ];
    });

    return this.storage('upsert', () => {
      const stmt = this.db.prepare<UpsertParams>(`
        INSERT INTO vector_entries
          (segment_id, document_id, model_identity, dimensions, vector, metadata, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(segment_id) DO UPDATE SET
          document_id = excluded.document_id,
          model_identity = excluded.model_identity,
          dimensions = excluded.dimensions,
          vector = excluded.vector,
          metadata = excluded.metadata,
          updated_at = excluded.updated_at
      `);
      return this.db.transaction((batch: UpsertParams[]) => {
        for (const row of batch) stmt.run(...row);
        return batch.length;
      })(rows);
    });
  }

  query(vector: EmbeddingVector, topN: number, filter: IndexQueryFilter = {}): IndexHit[] {
    this.checkVector(vector, 'query');
    if (!Number.isInteger(topN) || topN < 1) {
      throw new IndexError(`topN must be a positive integer, got ${topN}`, 'INVALID_FILTER');
    }

    const values = vector.values;
    const params: unknown[] = [
      Buffer.from(values.buffer, values.byteOffset, values.byteLength),
      vector.model_identity,
      values.length,
    ];
    let where = 'model_identity = ? AND dimensions = ?';

    if (filter.documentId !== undefined) {
      where += ' AND document_id = ?';
      params.push(filter.documentId);
    }
    for (const [key, value] of Object.entries(filter.metadata ?? {})) {
      const clause = metadataClause(key, value);
      where += ` AND ${clause.sql}`;
      params.push(...clause.params);
    }
    params.push(topN);

    const rows = this.storage('query', () =>
      this.db
        .prepare<unknown[], HitRow>(
          `SELECT segment_id, document_id, vec_distance_cosine(vector, ?) AS distance
           FROM vector_entries
           WHERE ${where}
           ORDER BY distance ASC, seq ASC
           LIMIT ?`
        )
        .all(...params)
    );

    if (rows.length === 0 && filter.requireDocument && filter.documentId !== undefined) {
      const stored = this.storage('query', () =>
        this.db
          .prepare<[string, string], { n: number }>(
            'SELECT COUNT(*) AS n FROM vector_entries WHERE document_id = ? AND model_identity = ?'
          )
          .get(filter.documentId ?? '', vector.model_identity)
      );
      if (!stored || stored.n === 0) {
        throw new IndexError(
          `No vectors for document ${filter.documentId} under model ${vector.model_identity}`,
          'NOT_FOUND',
          { documentId: filter.documentId, model: vector.model_identity }
        );
      }
    }

    return rows.map((row) => ({
      segment_id: row.segment_id,
      document_id: row.document_id,
      vector_score: 1 - row.distance,
    }));
  }

  delete(documentId: string): number {
    return this.storage('delete', () =>
      this.db.prepare<[string]>('DELETE FROM vector_entries WHERE document_id = ?').run(documentId).changes
    );
  }

  count(documentId?: string): number {
    return this.storage('count', () => {
      const row =
        documentId === undefined
          ? this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM vector_entries').get()
          : this.db
              .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM vector_entries WHERE document_id = ?')
              .get(documentId);
      return row?.n ?? 0;
    });
  }

  private checkVector(vector: EmbeddingVector, label: string): void {
    const values = vector.values;
    if (values.length === 0) {
      throw new IndexError(`Vector for ${label} is empty`, 'INVALID_VECTOR', { label });
    }
    if (!isFiniteVector(values)) {
      throw new IndexError(`Vector for ${label} has non-finite values`, 'INVALID_VECTOR', { label });
    }
    if (l2Norm(values) === 0) {
      throw new IndexError(`Vector for ${label} has zero length`, 'INVALID_VECTOR', { label });
    }
  }

  /**
   * SQLite failures (closed connection, I/O, locks) become STORAGE_UNAVAILABLE.
   */
  private storage<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof IndexError) throw error;
      throw new IndexError(
        `Vector index ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        'STORAGE_UNAVAILABLE',
        { operation },
        { cause: error }
      );
    }
  }
}

function metadataClause(key: string, value: MetadataValue): { sql: string; params: unknown[] } {
  if (!METADATA_KEY.test(key)) {
    throw new IndexError(`Invalid metadata filter key "${key}"`, 'INVALID_FILTER', { key });
  }
  const path = `'$.${key}'`;
  if (value === null) {
    return { sql: `json_extract(metadata, ${path}) IS NULL`, params: [] };
  }
  return {
    sql: `json_extract(metadata, ${path}) = ?`,
    params: [typeof value === 'boolean' ? (value ? 1 : 0) : value],
  };
}
