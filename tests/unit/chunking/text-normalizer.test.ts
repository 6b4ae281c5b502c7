/**
 * Unit tests for embedding input normalization
 *
 * @module tests/unit/chunking/text-normalizer
 */

import { describe, it, expect } from 'vitest';
import { normalizeForEmbedding } from '../../../src/services/chunking/text-normalizer.js';

describe('normalizeForEmbedding', () => {
  it('strips leading line numbers', () => {
    expect(normalizeForEmbedding('12   first line\n13   second line')).toBe('first line second line');
  });

  it('keeps ordered lists and years', () => {
    expect(normalizeForEmbedding('1. Item')).toBe('1. Item');
    expect(normalizeForEmbedding('2024 was a year')).toBe('2024 was a year');
  });

  it('collapses whitespace and trims', () => {
    expect(normalizeForEmbedding('  a \n\t b  ')).toBe('a b');
    expect(normalizeForEmbedding('')).toBe('');
  });
});
