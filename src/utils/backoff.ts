/**
 * Exponential Backoff with Jitter
 *
 * Retry policy for provider HTTP calls. The delay doubles each attempt from
 * baseDelayMs up to maxDelayMs, with +/- jitterFraction randomness.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Total attempts including the first (default: 2) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
  /** Prefix for retry log lines */
  label: string;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 10000,
  maxAttempts: 2,
  jitterFraction: 0.25,
  label: 'Backoff',
};

/**
 * Delay for a zero-indexed attempt: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  config?: Partial<BackoffConfig>,
  random: () => number = Math.random
): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Execute fn, retrying errors that pass shouldRetry until maxAttempts is
 * reached. Other errors are re-thrown immediately.
 *
 * @throws The last error if all attempts fail
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        const delay = calculateBackoffDelay(attempt, cfg);
        console.error(
          `[${cfg.label}] Attempt ${attempt + 1}/${cfg.maxAttempts} failed (${error instanceof Error ? error.message : String(error)}); retrying in ${delay}ms`
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  throw lastError;
}
