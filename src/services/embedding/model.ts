/**
 * Embedding model contract and errors
 *
 * @module services/embedding/model
 */

export type EmbeddingErrorCode =
  | 'EMPTY_INPUT'
  | 'INPUT_TOO_LONG'
  | 'INVALID_OUTPUT'
  | 'MODEL_FAILURE'
  | 'MODEL_NOT_FOUND'
  | 'WORKER_ERROR'
  | 'PARSE_ERROR'
  | 'RETRIES_EXHAUSTED';

const RETRYABLE_CODES: ReadonlySet<EmbeddingErrorCode> = new Set(['MODEL_FAILURE', 'WORKER_ERROR']);

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }

  get retryable(): boolean {
    return RETRYABLE_CODES.has(this.code);
  }
}

/**
 * A loaded embedding model. Implementations must be deterministic for a
 * given identity: equal input texts give equal vectors.
 */
export interface EmbeddingModel {
  /** Stable name of model and version, stored with every vector */
  readonly identity: string;
  readonly dimensions: number;
  /** Longest input the model accepts, in tokens */
  readonly maxInputTokens: number;
  /** One vector per input text, in input order */
  encode(texts: string[]): Promise<number[][]>;
}
