/**
 * Conversation MCP Tools
 *
 * Tools: rag_conversation_get, rag_conversation_list
 *
 * @module tools/conversations
 */

import { requireServices } from '../server/state.js';
import { successResult } from '../server/types.js';
import { conversationNotFoundError, documentNotFoundError } from '../server/errors.js';
import { ConversationGetInput, ConversationListInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleConversationGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConversationGetInput, params);
    const conversation = requireServices().conversations.get(input.conversation_id);
    if (!conversation) {
      throw conversationNotFoundError(input.conversation_id);
    }
    return formatResponse(successResult(conversation));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConversationList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConversationListInput, params);
    const { db, conversations } = requireServices();
    if (!db.getDocument(input.document_id)) {
      throw documentNotFoundError(input.document_id);
    }
    return formatResponse(
      successResult({ document_id: input.document_id, conversations: conversations.list(input.document_id) })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const conversationTools: Record<string, ToolDefinition> = {
  rag_conversation_get: {
    description: '[CORE] Use to read a conversation: every question, answer and cited pages in order.',
    inputSchema: ConversationGetInput.shape,
    handler: handleConversationGet,
  },
  rag_conversation_list: {
    description: '[CORE] Use to list the conversations held about one document, with turn counts.',
    inputSchema: ConversationListInput.shape,
    handler: handleConversationList,
  },
};
