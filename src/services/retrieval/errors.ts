/**
 * Retrieval pipeline errors
 *
 * @module services/retrieval/errors
 */

import type { PipelineStage } from '../../models/retrieval.js';

/**
 * A query run that ended in the ERROR state.
 * `retryable` tells the caller whether re-submitting the same query can succeed.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: PipelineStage | null,
    public readonly retryable: boolean,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
    Error.captureStackTrace?.(this, PipelineError);
  }
}

/**
 * An external call (embedding, re-ranking, generation) missed its deadline.
 * Raised with stage null outside a pipeline run; the pipeline re-raises it
 * with the stage it was in.
 */
export class PipelineTimeout extends PipelineError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    stage: PipelineStage | null = null
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, stage, true, { operation, timeoutMs });
    this.name = 'PipelineTimeout';
  }

  atStage(stage: PipelineStage): PipelineTimeout {
    return new PipelineTimeout(this.operation, this.timeoutMs, stage);
  }
}

/** The caller's AbortSignal fired; any in-flight result was discarded. */
export class PipelineCancelled extends PipelineError {
  constructor(stage: PipelineStage) {
    super(`Query cancelled during ${stage}`, stage, false, { stage });
    this.name = 'PipelineCancelled';
  }
}
