/**
 * RetrievalPipeline - per-query state machine
 *
 * EMBEDDING_QUERY -> VECTOR_SEARCH -> RERANKING -> CITATION_ASSEMBLY -> DONE,
 * with ERROR reachable from every non-terminal stage. Zero candidates after
 * VECTOR_SEARCH go straight to DONE with an empty evidence set.
 *
 * Each run owns its own state; concurrent runs share only the database.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/retrieval/pipeline
 */

import { ConversationContext } from '../../models/conversation.js';
import { EmbeddingVector } from '../../models/embedding.js';
import {
  EvidenceItem,
  PipelineStage,
  RetrievalResult,
  SegmentSource,
  StageTransition,
} from '../../models/retrieval.js';
import { TextSegment } from '../../models/segment.js';
import { buildRetrievalQuery, DEFAULT_HISTORY_TURNS } from '../conversation/conversation-store.js';
import { Embedder } from '../embedding/embedder.js';
import { EmbeddingError } from '../embedding/model.js';
import { citationFor, dedupeCitations } from '../search/citations.js';
import { compareByRerank, compareByVector, ScoredCandidate, selectTopK } from '../search/ranking.js';
import { Reranker, RerankInput } from '../search/reranker.js';
import { IndexError, IndexHit, VectorIndex } from '../storage/vector-index.js';
import { PipelineCancelled, PipelineError, PipelineTimeout } from './errors.js';

export interface RetrievalDefaults {
  /** Candidates taken from vector search (default: 10) */
  initialK: number;
  /** Evidence items kept after re-ranking (default: 5) */
  finalK: number;
  /** Prior questions folded into the query (default: 3) */
  historyTurns: number;
  /** Deadline for each embedding / re-ranking call; 0 keeps the component default */
  callTimeoutMs: number;
}

export const DEFAULT_RETRIEVAL: RetrievalDefaults = {
  initialK: 10,
  finalK: 5,
  historyTurns: DEFAULT_HISTORY_TURNS,
  callTimeoutMs: 0,
};

export interface RetrieveRequest {
  documentId: string;
  queryText: string;
  conversation?: ConversationContext | null;
  initialK?: number;
  finalK?: number;
  signal?: AbortSignal;
  /** Overrides callTimeoutMs for this run */
  timeoutMs?: number;
}

export interface PipelineDeps {
  embedder: Embedder;
  index: VectorIndex;
  reranker: Reranker;
  segments: SegmentSource;
}

/**
 * Mutable state of one run. Never shared between runs.
 */
class QueryRun {
  stage: PipelineStage = 'EMBEDDING_QUERY';
  readonly transitions: StageTransition[] = [];
  private readonly startedAt = Date.now();

  constructor(private readonly signal: AbortSignal | undefined) {
    this.transitions.push({ stage: this.stage, at_ms: 0 });
  }

  enter(stage: PipelineStage): void {
    this.stage = stage;
    this.transitions.push({ stage, at_ms: Date.now() - this.startedAt });
  }

  /** Throw if the caller has cancelled. */
  checkpoint(): void {
    if (this.signal?.aborted) {
      throw new PipelineCancelled(this.stage);
    }
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof EmbeddingError) {
    return error.retryable || error.code === 'RETRIES_EXHAUSTED';
  }
  if (error instanceof IndexError) {
    return error.code === 'STORAGE_UNAVAILABLE';
  }
  return false;
}

function validateK(initialK: number, finalK: number): void {
  if (!Number.isInteger(initialK) || initialK < 1) {
    throw new PipelineError(`initialK must be a positive integer, got ${initialK}`, null, false, { initialK });
  }
  if (!Number.isInteger(finalK) || finalK < 1) {
    throw new PipelineError(`finalK must be a positive integer, got ${finalK}`, null, false, { finalK });
  }
  if (finalK > initialK) {
    throw new PipelineError(`finalK (${finalK}) must not exceed initialK (${initialK})`, null, false, {
      initialK,
      finalK,
    });
  }
}

export class RetrievalPipeline {
  private readonly defaults: RetrievalDefaults;

  constructor(
    private readonly deps: PipelineDeps,
    defaults: Partial<RetrievalDefaults> = {}
  ) {
    this.defaults = { ...DEFAULT_RETRIEVAL, ...defaults };
    validateK(this.defaults.initialK, this.defaults.finalK);
  }

  /** Identity of the model queries are embedded with */
  get modelIdentity(): string {
    return this.deps.embedder.modelIdentity;
  }

  /**
   * Run one query against one document.
   *
   * @throws PipelineError with the stage the run failed in
   * @throws PipelineTimeout when an external call misses its deadline
   * @throws PipelineCancelled when request.signal fires
   */
  async retrieve(request: RetrieveRequest): Promise<RetrievalResult> {
    const initialK = request.initialK ?? this.defaults.initialK;
    const finalK = request.finalK ?? this.defaults.finalK;
    validateK(initialK, finalK);
    if (request.queryText.trim().length === 0) {
      throw new PipelineError('Query text is empty', null, false);
    }

    const timeoutMs = request.timeoutMs ?? this.defaults.callTimeoutMs;
    const callOptions = timeoutMs > 0 ? { timeoutMs } : {};
    const run = new QueryRun(request.signal);

    try {
      run.checkpoint();
      // History yields to the current question; the question itself is cut only when it alone is too long
      const queryText = buildRetrievalQuery(
        request.queryText,
        request.conversation ?? null,
        this.defaults.historyTurns,
        (text) => this.deps.embedder.fitsModel(text)
      );
      const queryVector = await this.deps.embedder.embed(
        this.deps.embedder.truncateForModel(queryText),
        callOptions
      );
      run.checkpoint();

      run.enter('VECTOR_SEARCH');
      run.checkpoint();
      const hits = this.search(queryVector, initialK, request.documentId);
      const inputs = this.resolve(hits);

      if (inputs.length === 0) {
        run.enter('DONE');
        console.error(`[Pipeline] No candidates for document ${request.documentId}`);
        return {
          status: 'success',
          query_text: queryText,
          evidence: [],
          citations: [],
          degraded: false,
          candidate_count: 0,
          failures: [],
          transitions: run.transitions,
        };
      }

      run.enter('RERANKING');
      run.checkpoint();
      const reranked = await this.deps.reranker.rerank(queryText, inputs, callOptions);
      run.checkpoint();

      const degraded = reranked.scored.length === 0;
      const selected = degraded
        ? selectTopK(this.vectorOnly(inputs), finalK, compareByVector)
        : selectTopK(reranked.scored, finalK, compareByRerank);
      if (degraded) {
        console.error(
          `[Pipeline] Re-ranking failed for all ${inputs.length} candidates, ranking by vector score`
        );
      }

      run.enter('CITATION_ASSEMBLY');
      run.checkpoint();
      const evidence = this.assemble(selected);

      run.enter('DONE');
      console.error(
        `[Pipeline] ${evidence.length} evidence item(s) from ${inputs.length} candidate(s)` +
          (reranked.failures.length > 0 ? `, ${reranked.failures.length} re-rank failure(s)` : '')
      );
      return {
        status: 'success',
        query_text: queryText,
        evidence,
        citations: dedupeCitations(evidence.map((item) => item.citation)),
        degraded,
        candidate_count: inputs.length,
        failures: reranked.failures.map((f) => ({ segment_id: f.segmentId, reason: f.reason })),
        transitions: run.transitions,
      };
    } catch (error) {
      throw this.fail(run, error);
    }
  }

  private search(vector: EmbeddingVector, topN: number, documentId: string): IndexHit[] {
    try {
      return this.deps.index.query(vector, topN, { documentId, requireDocument: true });
    } catch (error) {
      if (error instanceof IndexError && error.code === 'NOT_FOUND') {
        console.error(`[Pipeline] ${error.message}; treating as no candidates`);
        return [];
      }
      throw error;
    }
  }

  /** Hits whose segment no longer exists are dropped. */
  private resolve(hits: IndexHit[]): RerankInput[] {
    const segments = new Map<string, TextSegment>(
      this.deps.segments.getSegments(hits.map((h) => h.segment_id)).map((s) => [s.segment_id, s])
    );
    const inputs: RerankInput[] = [];
    for (const hit of hits) {
      const segment = segments.get(hit.segment_id);
      if (!segment) {
        console.error(`[Pipeline] Index entry ${hit.segment_id} has no stored segment, skipping`);
        continue;
      }
      inputs.push({ segment, vector_score: hit.vector_score });
    }
    return inputs;
  }

  private vectorOnly(inputs: RerankInput[]): ScoredCandidate[] {
    return inputs.map((input) => ({
      segment: input.segment,
      candidate: {
        segment_id: input.segment.segment_id,
        vector_score: input.vector_score,
        rerank_score: null,
        final_rank: null,
      },
    }));
  }

  private assemble(selected: ScoredCandidate[]): EvidenceItem[] {
    const names = new Map<string, string>();
    return selected.map(({ segment, candidate }) => {
      let name = names.get(segment.document_id);
      if (name === undefined) {
        const doc = this.deps.segments.getDocument(segment.document_id);
        if (!doc) {
          console.error(`[Pipeline] Document ${segment.document_id} missing, citing by id`);
        }
        name = doc?.source_name ?? segment.document_id;
        names.set(segment.document_id, name);
      }
      return { candidate, segment, citation: citationFor(segment, name) };
    });
  }

  private fail(run: QueryRun, error: unknown): PipelineError {
    const stage = run.stage;
    run.enter('ERROR');

    if (error instanceof PipelineTimeout) {
      return error.stage === null ? error.atStage(stage) : error;
    }
    if (error instanceof PipelineError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Pipeline] ${stage} failed: ${message}`);
    return new PipelineError(`${stage} failed: ${message}`, stage, isRetryable(error), undefined, {
      cause: error,
    });
  }
}
