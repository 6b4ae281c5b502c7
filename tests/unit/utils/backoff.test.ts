/**
 * Unit tests for exponential backoff and withRetry
 *
 * @module tests/unit/utils/backoff
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { calculateBackoffDelay, RetriesExhaustedError, withRetry } from '../../../src/utils/backoff.js';

const fast = { baseDelayMs: 1, maxDelayMs: 1, maxAttempts: 3 };

afterEach(() => {
  vi.restoreAllMocks();
});

describe('calculateBackoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    const cfg = { baseDelayMs: 100, maxDelayMs: 1000, jitterFraction: 0 };

    expect([0, 1, 2, 3, 4, 10].map((a) => calculateBackoffDelay(a, cfg))).toEqual([100, 200, 400, 800, 1000, 1000]);
  });

  it('applies jitter in both directions', () => {
    const cfg = { baseDelayMs: 100, jitterFraction: 0.25 };

    vi.spyOn(Math, 'random').mockReturnValue(1);
    expect(calculateBackoffDelay(0, cfg)).toBe(125);
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoffDelay(0, cfg)).toBe(75);
  });
});

describe('withRetry', () => {
  it('returns once an attempt succeeds', async () => {
    const attempts: number[] = [];
    const result = await withRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 2) throw new Error(`fail ${attempt}`);
        return 'done';
      },
      () => true,
      fast
    );

    expect(result).toBe('done');
    expect(attempts).toEqual([0, 1, 2]);
  });

  it('rethrows a non-retryable error as-is', async () => {
    const refused = new Error('refused');
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw refused;
        },
        () => false,
        fast
      )
    ).rejects.toBe(refused);
    expect(calls).toBe(1);
  });

  it('wraps the last error once attempts run out', async () => {
    let calls = 0;
    try {
      await withRetry(
        async () => {
          calls++;
          throw new Error(`fail ${calls}`);
        },
        () => true,
        fast
      );
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(RetriesExhaustedError);
      if (error instanceof RetriesExhaustedError) {
        expect(error.attempts).toBe(3);
        expect(error.message).toBe('Gave up after 3 attempt(s): fail 3');
        expect(error.lastError).toBeInstanceOf(Error);
      }
    }
    expect(calls).toBe(3);
  });
});
