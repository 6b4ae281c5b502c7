/**
 * DatabaseService class for all relational database operations
 *
 * Documents, pages, segments and conversations. Uses prepared statements;
 * multi-row writes run in transactions. The connection is shared with the
 * vector index so both can join one transaction.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { DocumentPage, DocumentRecord } from '../../../models/document.js';
import { TextSegment } from '../../../models/segment.js';
import { ConversationContext, ConversationTurn } from '../../../models/conversation.js';
import { SegmentSource } from '../../../models/retrieval.js';
import { initializeDatabase } from '../schema.js';
import { DatabaseError, DatabaseErrorCode, DatabaseStats, ListDocumentsOptions } from './types.js';
import * as docOps from './document-operations.js';
import * as segOps from './segment-operations.js';
import * as convOps from './conversation-operations.js';
import type { NewDocument, StatusUpdate } from './document-operations.js';

export class DatabaseService implements SegmentSource {
  private constructor(
    private readonly db: Database.Database,
    private readonly path: string
  ) {}

  /**
   * Open (creating if needed) the database file and bring its schema up.
   * Pass ':memory:' for a private in-process database.
   */
  static open(path: string): DatabaseService {
    if (path !== ':memory:') {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }

    let db: Database.Database;
    try {
      db = new Database(path);
    } catch (error) {
      throw new DatabaseError(
        `Failed to open database at ${path}: ${String(error)}`,
        DatabaseErrorCode.DATABASE_UNAVAILABLE,
        error
      );
    }

    try {
      initializeDatabase(db);
    } catch (error) {
      db.close();
      throw error;
    }
    return new DatabaseService(db, path);
  }

  close(): void {
    if (!this.db.open) return;
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  getPath(): string {
    return this.path;
  }

  getConnection(): Database.Database {
    return this.db;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getStats(): DatabaseStats {
    const byStatus = docOps.countDocumentsByStatus(this.db);
    return {
      path: this.path,
      total_documents: Object.values(byStatus).reduce((a, b) => a + b, 0),
      documents_by_status: byStatus,
      total_segments: segOps.countSegments(this.db),
      total_vectors:
        this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM vector_entries').get()?.n ?? 0,
      total_conversations: convOps.countConversations(this.db),
    };
  }

  // ==================== DOCUMENT OPERATIONS ====================

  insertDocument(doc: NewDocument): void {
    docOps.insertDocument(this.db, doc);
  }

  getDocument(documentId: string): DocumentRecord | null {
    return docOps.getDocument(this.db, documentId);
  }

  getDocumentPages(documentId: string): DocumentPage[] {
    return docOps.getDocumentPages(this.db, documentId);
  }

  listDocuments(options?: ListDocumentsOptions): DocumentRecord[] {
    return docOps.listDocuments(this.db, options);
  }

  updateDocumentStatus(documentId: string, update: StatusUpdate): boolean {
    return docOps.updateDocumentStatus(this.db, documentId, update);
  }

  deleteDocument(documentId: string): boolean {
    return docOps.deleteDocument(this.db, documentId);
  }

  // ==================== SEGMENT OPERATIONS ====================

  insertSegments(segments: TextSegment[]): number {
    return segOps.insertSegments(this.db, segments);
  }

  getSegments(segmentIds: string[]): TextSegment[] {
    return segOps.getSegmentsByIds(this.db, segmentIds);
  }

  getSegmentsByDocument(documentId: string): TextSegment[] {
    return segOps.getSegmentsByDocument(this.db, documentId);
  }

  deleteSegmentsByDocument(documentId: string): number {
    return segOps.deleteSegmentsByDocument(this.db, documentId);
  }

  // ==================== CONVERSATION OPERATIONS ====================

  insertConversation(conversation: { conversation_id: string; document_id: string; created_at: string }): void {
    convOps.insertConversation(this.db, conversation);
  }

  getConversation(conversationId: string): ConversationContext | null {
    return convOps.getConversation(this.db, conversationId);
  }

  appendTurn(conversationId: string, turn: ConversationTurn): number {
    return convOps.appendTurn(this.db, conversationId, turn);
  }

  listConversations(documentId: string): Array<{ conversation_id: string; created_at: string; turn_count: number }> {
    return convOps.listConversations(this.db, documentId);
  }
}
