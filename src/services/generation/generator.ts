/**
 * Answer generation contract and prompt assembly
 *
 * @module services/generation/generator
 */

import { ConversationContext } from '../../models/conversation.js';
import { EvidenceItem } from '../../models/retrieval.js';
import { formatCitation } from '../search/citations.js';

export interface GenerationRequest {
  query: string;
  evidence: EvidenceItem[];
  conversation: ConversationContext | null;
  signal?: AbortSignal;
}

export interface GenerationResult {
  text: string;
  model: string;
  processingTimeMs: number;
}

export interface Generator {
  readonly identity: string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export type GenerationErrorCode = 'HTTP_ERROR' | 'NETWORK_ERROR' | 'INVALID_RESPONSE' | 'RETRIES_EXHAUSTED';

export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly code: GenerationErrorCode,
    public readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GenerationError';
    Error.captureStackTrace?.(this, GenerationError);
  }

  /** 429, 5xx and network failures */
  get retryable(): boolean {
    if (this.code === 'NETWORK_ERROR') return true;
    return this.code === 'HTTP_ERROR' && this.status !== null && (this.status === 429 || this.status >= 500);
  }
}

const PROMPT_HISTORY_TURNS = 3;

/**
 * Numbered passages [1]..[n] with (document, page) labels, the last few
 * turns, then the question. The model is told to cite passage numbers only.
 */
export function buildAnswerPrompt(request: Omit<GenerationRequest, 'signal'>): string {
  const lines: string[] = [
    'Answer the question using only the passages below.',
    'Cite passages by their number in square brackets, e.g. [1].',
    'Never cite a passage that is not listed. If the passages do not contain the answer, say so.',
    '',
    'Passages:',
  ];

  request.evidence.forEach((item, i) => {
    lines.push(`[${i + 1}] (${formatCitation(item.citation)})`, item.segment.text.trim(), '');
  });

  const history = request.conversation?.turns.slice(-PROMPT_HISTORY_TURNS) ?? [];
  if (history.length > 0) {
    lines.push('Conversation so far:');
    for (const turn of history) {
      lines.push(`Q: ${turn.query}`, `A: ${turn.answer}`);
    }
    lines.push('');
  }

  lines.push(`Question: ${request.query}`, 'Answer:');
  return lines.join('\n');
}
