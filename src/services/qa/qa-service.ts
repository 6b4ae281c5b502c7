/**
 * Question answering over one document
 *
 * retrieve -> generate -> record the turn. The conversation only changes
 * after an answer exists; a failed or cancelled query leaves it untouched.
 *
 * @module services/qa/qa-service
 */

import { ConversationContext } from '../../models/conversation.js';
import { Citation } from '../../models/retrieval.js';
import { ConversationStore } from '../conversation/conversation-store.js';
import { Generator } from '../generation/generator.js';
import { RetrievalPipeline } from '../retrieval/pipeline.js';
import { DatabaseService } from '../storage/database/index.js';

export const NO_RELEVANT_CONTENT_ANSWER =
  'No relevant content was found in the document for this question.';

export type QAErrorCode =
  | 'DOCUMENT_NOT_FOUND'
  | 'DOCUMENT_NOT_READY'
  | 'CONVERSATION_NOT_FOUND'
  | 'CONVERSATION_MISMATCH'
  | 'MODEL_MISMATCH'
  | 'CANCELLED';

export class QAError extends Error {
  constructor(
    message: string,
    public readonly code: QAErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'QAError';
    Error.captureStackTrace?.(this, QAError);
  }
}

export interface AskRequest {
  document_id: string;
  query_text: string;
  conversation_id?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
  initialK?: number;
  finalK?: number;
}

export interface AskResult {
  answer: string;
  citations: Citation[];
  conversation_id: string;
  evidence_count: number;
  degraded: boolean;
}

export interface QADeps {
  db: DatabaseService;
  pipeline: RetrievalPipeline;
  conversations: ConversationStore;
  generator: Generator;
}

export class QuestionAnsweringService {
  constructor(private readonly deps: QADeps) {}

  async query(request: AskRequest): Promise<AskResult> {
    const record = this.deps.db.getDocument(request.document_id);
    if (!record) {
      throw new QAError(`Document not found: ${request.document_id}`, 'DOCUMENT_NOT_FOUND', {
        document_id: request.document_id,
      });
    }
    if (record.status !== 'complete') {
      throw new QAError(
        `Document ${request.document_id} is ${record.status}, not complete`,
        'DOCUMENT_NOT_READY',
        { document_id: request.document_id, status: record.status }
      );
    }
    const currentModel = this.deps.pipeline.modelIdentity;
    if (record.segment_count > 0 && record.model_identity !== null && record.model_identity !== currentModel) {
      throw new QAError(
        `Document ${request.document_id} was embedded with ${record.model_identity}, not ${currentModel}; re-embed it before querying`,
        'MODEL_MISMATCH',
        { document_id: request.document_id, stored_model: record.model_identity, current_model: currentModel }
      );
    }

    const existing = request.conversation_id
      ? this.loadConversation(request.conversation_id, request.document_id)
      : null;

    const retrieval = await this.deps.pipeline.retrieve({
      documentId: request.document_id,
      queryText: request.query_text,
      conversation: existing,
      signal: request.signal,
      timeoutMs: request.timeoutMs,
      initialK: request.initialK,
      finalK: request.finalK,
    });

    let answer: string;
    if (retrieval.evidence.length === 0) {
      answer = NO_RELEVANT_CONTENT_ANSWER;
    } else {
      const generated = await this.deps.generator.generate({
        query: request.query_text,
        evidence: retrieval.evidence,
        conversation: existing,
        signal: request.signal,
      });
      answer = generated.text;
    }

    // Nothing is recorded for a run cancelled while generating
    if (request.signal?.aborted) {
      throw new QAError('Query cancelled before the answer was recorded', 'CANCELLED');
    }

    const conversation = existing ?? this.deps.conversations.create(request.document_id);
    this.deps.conversations.appendTurn(conversation.conversation_id, {
      query: request.query_text,
      answer,
      cited_pages: retrieval.citations.map((c) => c.page_number),
    });

    return {
      answer,
      citations: retrieval.citations,
      conversation_id: conversation.conversation_id,
      evidence_count: retrieval.evidence.length,
      degraded: retrieval.degraded,
    };
  }

  private loadConversation(conversationId: string, documentId: string): ConversationContext {
    const conversation = this.deps.conversations.get(conversationId);
    if (!conversation) {
      throw new QAError(`Conversation not found: ${conversationId}`, 'CONVERSATION_NOT_FOUND', {
        conversation_id: conversationId,
      });
    }
    if (conversation.document_id !== documentId) {
      throw new QAError(
        `Conversation ${conversationId} belongs to document ${conversation.document_id}`,
        'CONVERSATION_MISMATCH',
        { conversation_id: conversationId, document_id: documentId }
      );
    }
    return conversation;
  }
}
