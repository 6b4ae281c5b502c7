/**
 * Document chunker
 *
 * Turns a document into ordered, immutable TextSegments using the strategy
 * selected by ChunkingConfig. Strategies only plan spans over the joined
 * page text; this module turns spans into segments, closes whitespace gaps
 * so the segments tile the text, and assigns ids, pages and hashes.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/chunking/chunker
 */

import { Document, PageOffset } from '../../models/document.js';
import { ChunkingConfig, TextSegment, segmentIdFor } from '../../models/segment.js';
import { computeHash } from '../../utils/hash.js';
import { TokenCounter } from './token-counter.js';
import { joinPages, pageForOffset } from './page-map.js';
import { planHierarchical, SegmentDraft } from './hierarchical.js';
import { planSemantic, SentenceEmbedder } from './semantic.js';

type ChunkingErrorCode = 'INVALID_CONFIG' | 'MISSING_EMBEDDER' | 'TEXT_LOST';

export class ChunkingError extends Error {
  constructor(
    message: string,
    public readonly code: ChunkingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ChunkingError';
    Error.captureStackTrace?.(this, ChunkingError);
  }
}

export interface ChunkerDeps {
  tokenCounter: TokenCounter;
  /** Required by the semantic strategy */
  embedder?: SentenceEmbedder;
}

export function validateChunkingConfig(config: ChunkingConfig): void {
  if (!Number.isInteger(config.maxTokens) || config.maxTokens < 1) {
    throw new ChunkingError(`maxTokens must be a positive integer, got ${config.maxTokens}`, 'INVALID_CONFIG');
  }
  if (config.strategy === 'hierarchical') {
    if (
      !Number.isInteger(config.overlapTokens) ||
      config.overlapTokens < 0 ||
      config.overlapTokens >= config.maxTokens
    ) {
      throw new ChunkingError(
        `overlapTokens must be an integer in [0, maxTokens), got ${config.overlapTokens}`,
        'INVALID_CONFIG',
        { maxTokens: config.maxTokens }
      );
    }
  } else if (
    !Number.isFinite(config.similarityThreshold) ||
    config.similarityThreshold < -1 ||
    config.similarityThreshold > 1
  ) {
    throw new ChunkingError(
      `similarityThreshold must be in [-1, 1], got ${config.similarityThreshold}`,
      'INVALID_CONFIG'
    );
  }
}

/**
 * Chunk a document.
 *
 * @returns Segments in order_index order (0..n-1); empty for a document
 * whose pages hold only whitespace
 * @throws ChunkingError on invalid config, or a semantic config without an embedder
 */
export async function chunkDocument(
  document: Document,
  config: ChunkingConfig,
  deps: ChunkerDeps
): Promise<TextSegment[]> {
  validateChunkingConfig(config);
  const { text, pageOffsets } = joinPages(document.pages);

  let drafts: SegmentDraft[];
  if (config.strategy === 'hierarchical') {
    drafts = planHierarchical(text, config, deps.tokenCounter);
  } else {
    if (!deps.embedder) {
      throw new ChunkingError('Semantic chunking requires an embedder', 'MISSING_EMBEDDER', {
        documentId: document.document_id,
      });
    }
    drafts = await planSemantic(text, config, deps.tokenCounter, deps.embedder);
  }

  const segments = materializeSegments(document.document_id, text, pageOffsets, drafts, deps.tokenCounter);

  const oversized = drafts.filter((d) => d.oversized).length;
  console.error(
    `[Chunker] ${document.document_id}: ${segments.length} segments (${config.strategy}` +
      `${oversized > 0 ? `, ${oversized} oversized` : ''})`
  );
  return segments;
}

/**
 * Turn planned spans into segments that tile the text.
 *
 * A whitespace-only gap before a span is folded into it, as is trailing
 * whitespace after the last span. A gap holding anything else means the
 * plan dropped text and is rejected.
 */
export function materializeSegments(
  documentId: string,
  text: string,
  pageOffsets: PageOffset[],
  drafts: SegmentDraft[],
  counter: TokenCounter
): TextSegment[] {
  let covered = 0;

  const segments = drafts.map((draft, index): TextSegment => {
    let start = draft.start;
    if (start > covered) {
      assertWhitespace(text, covered, start, documentId);
      start = covered;
    }
    let end = draft.end;
    if (index === drafts.length - 1 && end < text.length) {
      assertWhitespace(text, end, text.length, documentId);
      end = text.length;
    }

    const segmentText = text.slice(start, end);
    const firstVisible = start + (segmentText.length - segmentText.trimStart().length);
    const overlapPrevious = Math.max(0, covered - start);
    covered = Math.max(covered, end);

    return {
      segment_id: segmentIdFor(documentId, index),
      document_id: documentId,
      text: segmentText,
      page_number: pageForOffset(firstVisible, pageOffsets),
      parent_segment_id:
        draft.parentIndex === null ? null : segmentIdFor(documentId, draft.parentIndex),
      order_index: index,
      char_start: start,
      char_end: end,
      token_count: counter.count(segmentText),
      overlap_previous: overlapPrevious,
      content_hash: computeHash(segmentText),
    };
  });

  if (segments.length === 0 && text.trim().length > 0) {
    throw new ChunkingError('Chunking produced no segments for non-empty text', 'TEXT_LOST', {
      documentId,
    });
  }
  return segments;
}

function assertWhitespace(text: string, from: number, to: number, documentId: string): void {
  if (text.slice(from, to).trim().length > 0) {
    throw new ChunkingError(`Chunking skipped text at [${from}, ${to})`, 'TEXT_LOST', {
      documentId,
      preview: text.slice(from, Math.min(to, from + 80)),
    });
  }
}

/**
 * Stitch segments back together, dropping each segment's overlap prefix.
 * For segments produced by chunkDocument this is the joined page text.
 */
export function reconstructText(segments: TextSegment[]): string {
  return [...segments]
    .sort((a, b) => a.order_index - b.order_index)
    .map((s) => s.text.slice(s.overlap_previous))
    .join('');
}
