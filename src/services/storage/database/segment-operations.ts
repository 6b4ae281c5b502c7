/**
 * Segment operations for DatabaseService
 */

import Database from 'better-sqlite3';
import { TextSegment } from '../../../models/segment.js';
import { SegmentRow } from './types.js';
import { rowToSegment } from './converters.js';
import { placeholders, runWithForeignKeyCheck } from './helpers.js';

type SegmentParams = [
  string,
  string,
  number,
  string,
  number | null,
  string | null,
  number,
  number,
  number,
  number,
  string,
];

/**
 * Insert segments. Callers wrap this in their own transaction.
 */
export function insertSegments(db: Database.Database, segments: TextSegment[]): number {
  const stmt = db.prepare<SegmentParams>(`
    INSERT INTO segments (
      segment_id, document_id, order_index, text, page_number, parent_segment_id,
      char_start, char_end, token_count, overlap_previous, content_hash
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  for (const s of segments) {
    runWithForeignKeyCheck(
      stmt,
      [
        s.segment_id,
        s.document_id,
        s.order_index,
        s.text,
        s.page_number,
        s.parent_segment_id,
        s.char_start,
        s.char_end,
        s.token_count,
        s.overlap_previous,
        s.content_hash,
      ],
      `inserting segment ${s.segment_id}: document ${s.document_id} does not exist`
    );
  }
  return segments.length;
}

/**
 * Segments by id, returned in the order the ids were given. Unknown ids
 * are skipped.
 */
export function getSegmentsByIds(db: Database.Database, segmentIds: string[]): TextSegment[] {
  if (segmentIds.length === 0) return [];
  const rows = db
    .prepare<string[], SegmentRow>(
      `SELECT * FROM segments WHERE segment_id IN (${placeholders(segmentIds.length)})`
    )
    .all(...segmentIds);

  const byId = new Map(rows.map((row) => [row.segment_id, rowToSegment(row)]));
  const ordered: TextSegment[] = [];
  for (const id of segmentIds) {
    const segment = byId.get(id);
    if (segment) ordered.push(segment);
  }
  return ordered;
}

export function getSegmentsByDocument(db: Database.Database, documentId: string): TextSegment[] {
  return db
    .prepare<[string], SegmentRow>(
      'SELECT * FROM segments WHERE document_id = ? ORDER BY order_index'
    )
    .all(documentId)
    .map(rowToSegment);
}

export function deleteSegmentsByDocument(db: Database.Database, documentId: string): number {
  return db.prepare<[string]>('DELETE FROM segments WHERE document_id = ?').run(documentId).changes;
}

export function countSegments(db: Database.Database): number {
  return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM segments').get()?.n ?? 0;
}
