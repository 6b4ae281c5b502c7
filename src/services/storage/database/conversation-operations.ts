/**
 * Conversation operations for DatabaseService
 *
 * Turns are only ever appended; there is no update or delete of a turn.
 */

import Database from 'better-sqlite3';
import { ConversationContext, ConversationTurn } from '../../../models/conversation.js';
import { ConversationRow, DatabaseError, DatabaseErrorCode, TurnRow } from './types.js';
import { rowToTurn } from './converters.js';
import { runWithForeignKeyCheck } from './helpers.js';

export function insertConversation(
  db: Database.Database,
  conversation: { conversation_id: string; document_id: string; created_at: string }
): void {
  runWithForeignKeyCheck(
    db.prepare<[string, string, string]>(
      'INSERT INTO conversations (conversation_id, document_id, created_at) VALUES (?, ?, ?)'
    ),
    [conversation.conversation_id, conversation.document_id, conversation.created_at],
    `creating conversation: document ${conversation.document_id} does not exist`
  );
}

export function getConversation(
  db: Database.Database,
  conversationId: string
): ConversationContext | null {
  const row = db
    .prepare<[string], ConversationRow>('SELECT * FROM conversations WHERE conversation_id = ?')
    .get(conversationId);
  if (!row) return null;

  const turns = db
    .prepare<[string], TurnRow>(
      `SELECT query, answer, cited_pages, created_at FROM conversation_turns
       WHERE conversation_id = ? ORDER BY turn_index`
    )
    .all(conversationId)
    .map(rowToTurn);

  return {
    conversation_id: row.conversation_id,
    document_id: row.document_id,
    turns,
    created_at: row.created_at,
  };
}

/**
 * Append a turn at the next index. Runs in its own transaction so the
 * index read and the insert cannot interleave with another append.
 *
 * @returns Index of the new turn
 */
export function appendTurn(
  db: Database.Database,
  conversationId: string,
  turn: ConversationTurn
): number {
  return db.transaction(() => {
    const exists = db
      .prepare<[string], { n: number }>(
        'SELECT COUNT(*) AS n FROM conversations WHERE conversation_id = ?'
      )
      .get(conversationId);
    if (!exists || exists.n === 0) {
      throw new DatabaseError(
        `Conversation not found: ${conversationId}`,
        DatabaseErrorCode.CONVERSATION_NOT_FOUND
      );
    }

    const next =
      db
        .prepare<[string], { next: number }>(
          'SELECT COALESCE(MAX(turn_index) + 1, 0) AS next FROM conversation_turns WHERE conversation_id = ?'
        )
        .get(conversationId)?.next ?? 0;

    db.prepare<[string, number, string, string, string, string]>(
      `INSERT INTO conversation_turns (conversation_id, turn_index, query, answer, cited_pages, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    ).run(
      conversationId,
      next,
      turn.query,
      turn.answer,
      JSON.stringify(turn.cited_pages),
      turn.created_at
    );
    return next;
  })();
}

export function listConversations(
  db: Database.Database,
  documentId: string
): Array<{ conversation_id: string; created_at: string; turn_count: number }> {
  return db
    .prepare<[string], { conversation_id: string; created_at: string; turn_count: number }>(
      `SELECT c.conversation_id, c.created_at, COUNT(t.turn_index) AS turn_count
       FROM conversations c
       LEFT JOIN conversation_turns t ON t.conversation_id = c.conversation_id
       WHERE c.document_id = ?
       GROUP BY c.conversation_id
       ORDER BY c.created_at, c.conversation_id`
    )
    .all(documentId);
}

export function countConversations(db: Database.Database): number {
  return db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM conversations').get()?.n ?? 0;
}
