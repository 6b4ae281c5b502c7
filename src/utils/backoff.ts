/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt (capped at maxDelayMs); jitter adds
 * +/- jitterFraction randomness so concurrent callers spread out.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Maximum number of attempts, first call included (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
  /** Log prefix for retry messages (default: 'Backoff') */
  label: string;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
  label: 'Backoff',
};

/**
 * Thrown by withRetry when every attempt failed with a retryable error.
 */
export class RetriesExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`
    );
    this.name = 'RetriesExhaustedError';
    Error.captureStackTrace?.(this, RetriesExhaustedError);
  }
}

/**
 * Delay for a zero-indexed attempt: min(base * 2^attempt, max) +/- jitter.
 * Never negative.
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function backoffSleep(attempt: number, config?: Partial<BackoffConfig>): Promise<void> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const delay = calculateBackoffDelay(attempt, cfg);
  console.error(`[${cfg.label}] Attempt ${attempt + 1} failed: retrying in ${delay}ms`);
  return new Promise((resolve) => setTimeout(resolve, delay));
}

/**
 * Run fn, retrying errors accepted by shouldRetry up to maxAttempts.
 *
 * Non-retryable errors are re-thrown as-is. When the last attempt fails
 * with a retryable error a RetriesExhaustedError wrapping it is thrown,
 * so callers can tell "gave up" apart from "refused".
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        await backoffSleep(attempt, cfg);
      }
    }
  }

  throw new RetriesExhaustedError(cfg.maxAttempts, lastError);
}
