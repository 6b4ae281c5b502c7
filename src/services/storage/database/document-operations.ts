/**
 * Document operations for DatabaseService
 *
 * Documents and their pages. Deleting a document cascades to its pages,
 * segments and conversations; vector entries belong to the vector index
 * and are removed by its owner.
 */

import Database from 'better-sqlite3';
import { DocumentPage, DocumentRecord, DocumentStatus } from '../../../models/document.js';
import { DocumentRow, ListDocumentsOptions, PageRow } from './types.js';
import { isDocumentStatus, rowToDocument } from './converters.js';

export interface NewDocument {
  document_id: string;
  source_name: string;
  file_type: string;
  content_hash: string;
  pages: DocumentPage[];
  created_at: string;
}

/**
 * Insert a document in 'processing' state together with its pages.
 */
export function insertDocument(db: Database.Database, doc: NewDocument): void {
  const insertDoc = db.prepare<[string, string, string, string, number, string, string]>(`
    INSERT INTO documents (
      document_id, source_name, file_type, content_hash, page_count,
      status, segment_count, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, 'processing', 0, ?, ?)
  `);
  const insertPage = db.prepare<[string, number, string]>(
    'INSERT INTO document_pages (document_id, page_number, raw_text) VALUES (?, ?, ?)'
  );

  db.transaction(() => {
    insertDoc.run(
      doc.document_id,
      doc.source_name,
      doc.file_type,
      doc.content_hash,
      doc.pages.length,
      doc.created_at,
      doc.created_at
    );
    for (const page of doc.pages) {
      insertPage.run(doc.document_id, page.page_number, page.raw_text);
    }
  })();
}

export function getDocument(db: Database.Database, documentId: string): DocumentRecord | null {
  const row = db
    .prepare<[string], DocumentRow>('SELECT * FROM documents WHERE document_id = ?')
    .get(documentId);
  return row ? rowToDocument(row) : null;
}

export function getDocumentPages(db: Database.Database, documentId: string): DocumentPage[] {
  return db
    .prepare<[string], PageRow>(
      'SELECT page_number, raw_text FROM document_pages WHERE document_id = ? ORDER BY page_number'
    )
    .all(documentId)
    .map((row) => ({ page_number: row.page_number, raw_text: row.raw_text }));
}

/**
 * Newest first.
 */
export function listDocuments(
  db: Database.Database,
  options: ListDocumentsOptions = {}
): DocumentRecord[] {
  const limit = Math.min(Math.max(1, options.limit ?? 50), 1000);
  const offset = Math.max(0, options.offset ?? 0);

  const rows = options.status
    ? db
        .prepare<[string, number, number], DocumentRow>(
          `SELECT * FROM documents WHERE status = ?
           ORDER BY created_at DESC, document_id LIMIT ? OFFSET ?`
        )
        .all(options.status, limit, offset)
    : db
        .prepare<[number, number], DocumentRow>(
          'SELECT * FROM documents ORDER BY created_at DESC, document_id LIMIT ? OFFSET ?'
        )
        .all(limit, offset);

  return rows.map(rowToDocument);
}

export interface StatusUpdate {
  status: DocumentStatus;
  error_message?: string | null;
  chunking_strategy?: string | null;
  model_identity?: string | null;
  segment_count?: number;
}

/**
 * @returns false when the document does not exist
 */
export function updateDocumentStatus(
  db: Database.Database,
  documentId: string,
  update: StatusUpdate
): boolean {
  const result = db
    .prepare<
      [string, string | null, string | null, string | null, number | null, string, string]
    >(
      `UPDATE documents SET
         status = ?,
         error_message = ?,
         chunking_strategy = COALESCE(?, chunking_strategy),
         model_identity = COALESCE(?, model_identity),
         segment_count = COALESCE(?, segment_count),
         updated_at = ?
       WHERE document_id = ?`
    )
    .run(
      update.status,
      update.error_message ?? null,
      update.chunking_strategy ?? null,
      update.model_identity ?? null,
      update.segment_count ?? null,
      new Date().toISOString(),
      documentId
    );
  return result.changes > 0;
}

/**
 * @returns false when the document does not exist
 */
export function deleteDocument(db: Database.Database, documentId: string): boolean {
  return (
    db.prepare<[string]>('DELETE FROM documents WHERE document_id = ?').run(documentId).changes > 0
  );
}

export function countDocumentsByStatus(db: Database.Database): Record<DocumentStatus, number> {
  const counts: Record<DocumentStatus, number> = {
    pending: 0,
    processing: 0,
    complete: 0,
    failed: 0,
  };
  const rows = db
    .prepare<[], { status: string; n: number }>(
      'SELECT status, COUNT(*) AS n FROM documents GROUP BY status'
    )
    .all();
  for (const row of rows) {
    if (isDocumentStatus(row.status)) {
      counts[row.status] = row.n;
    }
  }
  return counts;
}
