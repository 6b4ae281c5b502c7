/**
 * Cross-encoder re-ranker
 *
 * Scores every candidate against the query text with a cross-encoder. A
 * candidate that cannot be scored (blank text, a per-passage model error,
 * a missing or non-finite score) is excluded and reported as a
 * RerankPartialFailure; the rest keep going. When the model call itself
 * fails, every candidate is reported as failed and the caller decides how
 * to degrade.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/search/reranker
 */

import { TextSegment } from '../../models/segment.js';
import { withDeadline } from '../../utils/deadline.js';
import { PipelineTimeout } from '../retrieval/errors.js';
import { CrossEncoderModel, PassageScore } from './cross-encoder.js';
import { compareByRerank, ScoredCandidate } from './ranking.js';

export const DEFAULT_RERANK_TIMEOUT_MS = 30_000;

/**
 * One candidate the cross-encoder could not score
 */
export class RerankPartialFailure extends Error {
  constructor(
    public readonly segmentId: string,
    public readonly reason: string
  ) {
    super(`Re-ranking failed for segment ${segmentId}: ${reason}`);
    this.name = 'RerankPartialFailure';
    Error.captureStackTrace?.(this, RerankPartialFailure);
  }
}

export interface RerankInput {
  segment: TextSegment;
  vector_score: number;
}

export interface RerankOutput {
  /** Scored candidates, best first; final_rank is not assigned yet */
  scored: ScoredCandidate[];
  failures: RerankPartialFailure[];
  /** True when the model call as a whole failed */
  modelFailed: boolean;
}

export interface RerankOptions {
  timeoutMs?: number;
}

export class Reranker {
  private readonly timeoutMs: number;

  constructor(
    private readonly model: CrossEncoderModel,
    options: RerankOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RERANK_TIMEOUT_MS;
  }

  get modelIdentity(): string {
    return this.model.identity;
  }

  /**
   * @throws PipelineTimeout when the model does not answer within the deadline
   */
  async rerank(query: string, inputs: RerankInput[], options: RerankOptions = {}): Promise<RerankOutput> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const failures: RerankPartialFailure[] = [];
    const passages: Array<{ index: number; text: string }> = [];

    inputs.forEach((input, index) => {
      if (input.segment.text.trim().length === 0) {
        failures.push(new RerankPartialFailure(input.segment.segment_id, 'segment text is blank'));
        return;
      }
      passages.push({ index, text: input.segment.text });
    });

    if (passages.length === 0) {
      return { scored: [], failures, modelFailed: false };
    }

    let results: PassageScore[];
    try {
      results = await withDeadline(
        this.model.score(query, passages),
        timeoutMs,
        () => new PipelineTimeout('rerank', timeoutMs)
      );
    } catch (error) {
      if (error instanceof PipelineTimeout) throw error;
      const reason = `model call failed: ${error instanceof Error ? error.message : String(error)}`;
      console.error(`[Reranker] ${this.model.identity} ${reason}`);
      for (const passage of passages) {
        failures.push(new RerankPartialFailure(inputs[passage.index].segment.segment_id, reason));
      }
      return { scored: [], failures, modelFailed: true };
    }

    const byIndex = new Map<number, PassageScore>();
    for (const result of results) {
      if (byIndex.has(result.index)) {
        console.error(`[Reranker] Duplicate score for passage ${result.index}, keeping the first`);
        continue;
      }
      byIndex.set(result.index, result);
    }

    const scored: ScoredCandidate[] = [];
    for (const passage of passages) {
      const input = inputs[passage.index];
      const segmentId = input.segment.segment_id;
      const result = byIndex.get(passage.index);

      if (result === undefined) {
        failures.push(new RerankPartialFailure(segmentId, 'no score returned'));
      } else if ('error' in result) {
        failures.push(new RerankPartialFailure(segmentId, result.error));
      } else if (!Number.isFinite(result.score)) {
        failures.push(new RerankPartialFailure(segmentId, `non-finite score ${result.score}`));
      } else {
        scored.push({
          segment: input.segment,
          candidate: {
            segment_id: segmentId,
            vector_score: input.vector_score,
            rerank_score: result.score,
            final_rank: null,
          },
        });
      }
    }

    for (const failure of failures) {
      console.error(`[Reranker] Excluded ${failure.segmentId}: ${failure.reason}`);
    }

    return { scored: scored.sort(compareByRerank), failures, modelFailed: false };
  }
}
