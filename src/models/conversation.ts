/**
 * Conversation interfaces
 *
 * Turns are append-only; a failed query never adds or alters one.
 */

export interface ConversationTurn {
  query: string;
  answer: string;
  /** Pages cited by the answer, in citation order */
  cited_pages: Array<number | null>;
  created_at: string;
}

export interface ConversationContext {
  conversation_id: string;
  document_id: string;
  turns: ConversationTurn[];
  created_at: string;
}
