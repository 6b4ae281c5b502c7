/**
 * Query MCP Tools
 *
 * Tools: rag_query (answer with citations), rag_retrieve (evidence only)
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/query
 */

import { getConfig, requireServices } from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  conversationNotFoundError,
  documentNotFoundError,
  modelMismatchError,
  validationError,
} from '../server/errors.js';
import { QueryInput, QueryShape, RetrieveInput, RetrieveShape, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * A request that lowers only initial_k also lowers the default final_k to fit.
 */
function resolveK(
  input: { initial_k?: number; final_k?: number },
  defaults: { initialK: number; finalK: number }
): { initialK: number; finalK: number } {
  const initialK = input.initial_k ?? defaults.initialK;
  return { initialK, finalK: input.final_k ?? Math.min(defaults.finalK, initialK) };
}

export async function handleQuery(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QueryInput, params);
    const { qa } = requireServices();
    const defaults = getConfig().retrieval;

    const result = await qa.query({
      document_id: input.document_id,
      query_text: input.query,
      conversation_id: input.conversation_id,
      ...resolveK(input, defaults),
      timeoutMs: input.timeout_ms,
    });
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Retrieval without generation: the evidence set and citations that
 * rag_query would answer from. Conversation history shapes the query but
 * is not extended.
 */
export async function handleRetrieve(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(RetrieveInput, params);
    const { db, pipeline, conversations } = requireServices();
    const defaults = getConfig().retrieval;

    const record = db.getDocument(input.document_id);
    if (!record) {
      throw documentNotFoundError(input.document_id);
    }
    if (record.segment_count > 0 && record.model_identity !== null && record.model_identity !== pipeline.modelIdentity) {
      throw modelMismatchError(input.document_id, record.model_identity, pipeline.modelIdentity);
    }
    const conversation = input.conversation_id ? conversations.get(input.conversation_id) : null;
    if (input.conversation_id && !conversation) {
      throw conversationNotFoundError(input.conversation_id);
    }
    if (conversation && conversation.document_id !== input.document_id) {
      throw validationError(
        `Conversation ${conversation.conversation_id} belongs to document ${conversation.document_id}`,
        { conversation_id: conversation.conversation_id, document_id: input.document_id }
      );
    }

    const result = await pipeline.retrieve({
      documentId: input.document_id,
      queryText: input.query,
      conversation,
      ...resolveK(input, defaults),
      timeoutMs: input.timeout_ms,
    });

    return formatResponse(
      successResult({
        query_text: result.query_text,
        degraded: result.degraded,
        candidate_count: result.candidate_count,
        citations: result.citations,
        evidence: result.evidence.map((item) => ({
          segment_id: item.segment.segment_id,
          final_rank: item.candidate.final_rank,
          vector_score: item.candidate.vector_score,
          rerank_score: item.candidate.rerank_score,
          page_number: item.citation.page_number,
          document_name: item.citation.document_name,
          ...(input.include_text && { text: item.segment.text }),
        })),
        failures: result.failures,
        transitions: result.transitions,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const queryTools: Record<string, ToolDefinition> = {
  rag_query: {
    description:
      '[ESSENTIAL] Use to ask a question about one document. Returns an answer with deduplicated page citations and a conversation_id; pass it back for follow-up questions.',
    inputSchema: QueryShape,
    handler: handleQuery,
  },
  rag_retrieve: {
    description:
      '[CORE] Use to see the ranked evidence passages for a question without generating an answer. Shows vector and re-rank scores and whether ranking degraded to vector-only.',
    inputSchema: RetrieveShape,
    handler: handleRetrieve,
  },
};
