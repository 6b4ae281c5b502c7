/**
 * Unit tests for content hashing and vector math
 *
 * @module tests/unit/utils/hash-math
 */

import { describe, it, expect } from 'vitest';
import { computeHash } from '../../../src/utils/hash.js';
import { cosineSimilarity, isFiniteVector, meanVector, normalize } from '../../../src/utils/math.js';

describe('computeHash', () => {
  it('produces prefixed SHA-256 hex', () => {
    expect(computeHash('hello')).toBe('sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
    expect(computeHash(Buffer.from('hello'))).toBe(computeHash('hello'));
  });
});

describe('vector math', () => {
  it('computes cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 1], [2, 2])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it('rejects vectors of different lengths', () => {
    expect(() => cosineSimilarity([1], [1, 0])).toThrow(RangeError);
  });

  it('normalizes to unit length and averages', () => {
    const unit = normalize([3, 4]);
    expect(unit[0]).toBeCloseTo(0.6, 6);
    expect(unit[1]).toBeCloseTo(0.8, 6);
    expect(Array.from(meanVector([[1, 2], [3, 4]]))).toEqual([2, 3]);
    expect(() => meanVector([])).toThrow('meanVector requires at least one vector');
  });

  it('detects non-finite values', () => {
    expect(isFiniteVector([1, 2])).toBe(true);
    expect(isFiniteVector([1, Number.POSITIVE_INFINITY])).toBe(false);
  });
});
