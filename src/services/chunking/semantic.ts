/**
 * Semantic chunking strategy
 *
 * Sentences are embedded once; a segment keeps absorbing the next sentence
 * while that sentence stays close to the segment's mean direction and the
 * token ceiling holds. Output is flat with no overlap.
 *
 * @module services/chunking/semantic
 */

import { EmbeddingVector } from '../../models/embedding.js';
import { cosineSimilarity, meanVector, normalize } from '../../utils/math.js';
import { TokenCounter } from './token-counter.js';
import { splitSentences } from './boundaries.js';
import type { SegmentDraft } from './hierarchical.js';

/** The part of the embedder the semantic strategy needs. */
export interface SentenceEmbedder {
  embedMany(texts: string[]): Promise<EmbeddingVector[]>;
  truncateForModel(text: string): string;
}

export interface SemanticOptions {
  maxTokens: number;
  similarityThreshold: number;
}

export async function planSemantic(
  text: string,
  options: SemanticOptions,
  counter: TokenCounter,
  embedder: SentenceEmbedder
): Promise<SegmentDraft[]> {
  const sentences = splitSentences(text, 0, text.length);
  if (sentences.length === 0) return [];

  const tokens = sentences.map((s) => counter.count(text.slice(s.start, s.end)));
  const vectors = await embedder.embedMany(
    sentences.map((s) => embedder.truncateForModel(text.slice(s.start, s.end).trim()))
  );

  const drafts: SegmentDraft[] = [];
  let groupStart = 0;
  let groupTokens = tokens[0];
  let groupVectors: Float32Array[] = [vectors[0].values];

  const close = (endExclusive: number): void => {
    drafts.push({
      start: sentences[groupStart].start,
      end: sentences[endExclusive - 1].end,
      parentIndex: null,
      oversized: groupTokens > options.maxTokens,
    });
  };

  for (let k = 1; k < sentences.length; k++) {
    const centroid = normalize(meanVector(groupVectors));
    const similarity = cosineSimilarity(centroid, vectors[k].values);
    const fits = groupTokens + tokens[k] <= options.maxTokens;

    if (fits && similarity >= options.similarityThreshold) {
      groupTokens += tokens[k];
      groupVectors.push(vectors[k].values);
      continue;
    }

    close(k);
    groupStart = k;
    groupTokens = tokens[k];
    groupVectors = [vectors[k].values];
  }
  close(sentences.length);

  return drafts;
}
