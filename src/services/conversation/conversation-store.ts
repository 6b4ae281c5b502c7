/**
 * Conversation history and conversation-aware query building
 *
 * @module services/conversation/conversation-store
 */

import { v4 as uuidv4 } from 'uuid';
import { ConversationContext, ConversationTurn } from '../../models/conversation.js';
import { DatabaseService } from '../storage/database/index.js';

export const DEFAULT_HISTORY_TURNS = 3;

/**
 * Prefix the query with the questions of the last `maxTurns` turns.
 * With no history the query is returned unchanged.
 *
 * "Previous questions: q1 | q2\nQuestion: q"
 *
 * When `fits` is given, the oldest questions are dropped until the text
 * fits; if none fit, the bare query is returned.
 */
export function buildRetrievalQuery(
  query: string,
  context: ConversationContext | null,
  maxTurns: number = DEFAULT_HISTORY_TURNS,
  fits?: (text: string) => boolean
): string {
  if (!context || maxTurns <= 0 || context.turns.length === 0) {
    return query;
  }
  const previous = context.turns.slice(-maxTurns).map((turn) => turn.query.trim());
  while (previous.length > 0) {
    const text = `Previous questions: ${previous.join(' | ')}\nQuestion: ${query}`;
    if (!fits || fits(text)) return text;
    previous.shift();
  }
  return query;
}

export class ConversationStore {
  constructor(private readonly db: DatabaseService) {}

  /**
   * @throws DatabaseError FOREIGN_KEY_VIOLATION when the document does not exist
   */
  create(documentId: string): ConversationContext {
    const conversation = {
      conversation_id: uuidv4(),
      document_id: documentId,
      created_at: new Date().toISOString(),
    };
    this.db.insertConversation(conversation);
    console.error(`[Conversation] Created ${conversation.conversation_id} for document ${documentId}`);
    return { ...conversation, turns: [] };
  }

  get(conversationId: string): ConversationContext | null {
    return this.db.getConversation(conversationId);
  }

  /**
   * @returns Index of the new turn
   * @throws DatabaseError CONVERSATION_NOT_FOUND
   */
  appendTurn(conversationId: string, turn: Omit<ConversationTurn, 'created_at'>): number {
    return this.db.appendTurn(conversationId, { ...turn, created_at: new Date().toISOString() });
  }

  list(documentId: string): Array<{ conversation_id: string; created_at: string; turn_count: number }> {
    return this.db.listConversations(documentId);
  }
}
