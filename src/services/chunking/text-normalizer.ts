/**
 * Text Normalizer for Embedding Input
 *
 * Cleans segment and query text before it reaches the embedding model.
 * The stored segment text is never changed.
 *
 * @module services/chunking/text-normalizer
 */

/**
 * Leading line numbers left by PDF-to-text conversion: digits followed by
 * 2+ spaces. Ordered lists ("1. Item") and years ("2024 was") do not match.
 */
const LINE_NUMBER_REGEX = /^\d+ {2,}/gm;

const WHITESPACE_RUN = /\s+/g;

/**
 * Strip leading line numbers and collapse whitespace runs to one space.
 * Pure: equal input gives equal output.
 */
export function normalizeForEmbedding(text: string): string {
  if (text.length === 0) {
    return text;
  }
  return text.replace(LINE_NUMBER_REGEX, '').replace(WHITESPACE_RUN, ' ').trim();
}
