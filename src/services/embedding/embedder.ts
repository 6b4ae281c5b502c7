/**
 * Embedder - text to vector, bound to one injected model
 *
 * Validates every input before the model sees it, batches, retries
 * transient model failures with exponential backoff and bounds every
 * model call with a deadline. Several Embedders with different models can
 * live side by side; nothing here is global.
 *
 * @module services/embedding/embedder
 */

import { EmbeddingVector } from '../../models/embedding.js';
import { TextSegment } from '../../models/segment.js';
import { BackoffConfig, RetriesExhaustedError, withRetry } from '../../utils/backoff.js';
import { withDeadline } from '../../utils/deadline.js';
import { isFiniteVector, l2Norm } from '../../utils/math.js';
import { normalizeForEmbedding } from '../chunking/text-normalizer.js';
import { GptTokenCounter, TokenCounter } from '../chunking/token-counter.js';
import { PipelineTimeout } from '../retrieval/errors.js';
import { EmbeddingError, EmbeddingModel } from './model.js';

export const DEFAULT_EMBED_BATCH_SIZE = 32;
export const DEFAULT_EMBED_TIMEOUT_MS = 60_000;

export interface EmbedderOptions {
  /** Texts per model call (default: 32) */
  batchSize?: number;
  /** Deadline per model call (default: 60s) */
  timeoutMs?: number;
  retry?: Partial<BackoffConfig>;
  /** Counts input length against the model limit (default: gpt-tokenizer) */
  tokenCounter?: TokenCounter;
}

export interface EmbedCallOptions {
  timeoutMs?: number;
}

/**
 * Model failures are worth another attempt; refusals and timeouts are not.
 */
function isTransient(error: unknown): boolean {
  if (error instanceof PipelineTimeout) return false;
  if (error instanceof EmbeddingError) return error.retryable;
  return true;
}

export class Embedder {
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly retry: Partial<BackoffConfig>;
  private readonly tokenCounter: TokenCounter;

  constructor(
    private readonly model: EmbeddingModel,
    options: EmbedderOptions = {}
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_EMBED_BATCH_SIZE);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EMBED_TIMEOUT_MS;
    this.retry = { label: 'Embedder', ...options.retry };
    this.tokenCounter = options.tokenCounter ?? new GptTokenCounter();
  }

  get modelIdentity(): string {
    return this.model.identity;
  }

  get dimensions(): number {
    return this.model.dimensions;
  }

  /**
   * Cut text down to the model's input limit. Callers that would rather
   * shorten than be refused call this before embed().
   */
  truncateForModel(text: string): string {
    return this.tokenCounter.truncate(text, this.model.maxInputTokens);
  }

  /** Whether text is within the model's input limit once normalized */
  fitsModel(text: string): boolean {
    return this.tokenCounter.count(normalizeForEmbedding(text)) <= this.model.maxInputTokens;
  }

  async embed(text: string, options: EmbedCallOptions = {}): Promise<EmbeddingVector> {
    const [vector] = await this.embedMany([text], options);
    return vector;
  }

  /**
   * Embed texts in order. The whole input is validated before any model
   * call, so a bad text fails the call without partial work.
   *
   * @throws EmbeddingError EMPTY_INPUT | INPUT_TOO_LONG | INVALID_OUTPUT |
   *   MODEL_NOT_FOUND | RETRIES_EXHAUSTED
   * @throws PipelineTimeout when a model call misses its deadline
   */
  async embedMany(texts: string[], options: EmbedCallOptions = {}): Promise<EmbeddingVector[]> {
    const prepared = texts.map((text, index) => this.prepare(text, index));
    const vectors: EmbeddingVector[] = [];

    for (let i = 0; i < prepared.length; i += this.batchSize) {
      const batch = prepared.slice(i, i + this.batchSize);
      const raw = await this.encodeWithRetry(batch, options.timeoutMs ?? this.timeoutMs);
      this.checkOutput(raw, batch.length, i);
      for (const values of raw) {
        vectors.push({
          owner_segment_id: null,
          model_identity: this.model.identity,
          values: Float32Array.from(values),
        });
      }
    }

    return vectors;
  }

  /**
   * Embed segments; each vector is owned by its segment. Segment text
   * longer than the model accepts is embedded from its leading tokens.
   */
  async embedSegments(
    segments: TextSegment[],
    options: EmbedCallOptions = {}
  ): Promise<EmbeddingVector[]> {
    const vectors = await this.embedMany(
      segments.map((s) => this.truncateForModel(s.text)),
      options
    );
    return vectors.map((vector, i) => ({ ...vector, owner_segment_id: segments[i].segment_id }));
  }

  private prepare(text: string, index: number): string {
    const normalized = normalizeForEmbedding(text);
    if (normalized.length === 0) {
      throw new EmbeddingError(`Input ${index} is empty`, 'EMPTY_INPUT', { index });
    }
    const tokens = this.tokenCounter.count(normalized);
    if (tokens > this.model.maxInputTokens) {
      throw new EmbeddingError(
        `Input ${index} has ${tokens} tokens; ${this.model.identity} accepts at most ${this.model.maxInputTokens}`,
        'INPUT_TOO_LONG',
        { index, tokens, maxInputTokens: this.model.maxInputTokens }
      );
    }
    return normalized;
  }

  private async encodeWithRetry(batch: string[], timeoutMs: number): Promise<number[][]> {
    try {
      return await withRetry(
        () =>
          withDeadline(this.model.encode(batch), timeoutMs, () => new PipelineTimeout('embed', timeoutMs)),
        isTransient,
        this.retry
      );
    } catch (error) {
      if (error instanceof RetriesExhaustedError) {
        throw new EmbeddingError(
          `Embedding failed after ${error.attempts} attempts`,
          'RETRIES_EXHAUSTED',
          { model: this.model.identity, batchSize: batch.length },
          { cause: error.lastError }
        );
      }
      if (error instanceof EmbeddingError || error instanceof PipelineTimeout) {
        throw error;
      }
      throw new EmbeddingError(
        `Embedding model ${this.model.identity} failed: ${error instanceof Error ? error.message : String(error)}`,
        'MODEL_FAILURE',
        { model: this.model.identity },
        { cause: error }
      );
    }
  }

  private checkOutput(raw: number[][], expected: number, offset: number): void {
    if (raw.length !== expected) {
      throw new EmbeddingError(
        `Model returned ${raw.length} vectors for ${expected} inputs`,
        'INVALID_OUTPUT',
        { expected, actual: raw.length }
      );
    }
    raw.forEach((values, i) => {
      if (values.length !== this.model.dimensions) {
        throw new EmbeddingError(
          `Vector ${offset + i} has ${values.length} dimensions, expected ${this.model.dimensions}`,
          'INVALID_OUTPUT',
          { index: offset + i, actualDim: values.length }
        );
      }
      if (!isFiniteVector(values) || l2Norm(values) === 0) {
        throw new EmbeddingError(`Vector ${offset + i} is zero or not finite`, 'INVALID_OUTPUT', {
          index: offset + i,
        });
      }
    });
  }
}
