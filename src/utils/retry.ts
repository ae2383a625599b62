/**
 * Retry backoff configuration options
 */
export interface RetryConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitterPercent: number;
}

/**
 * Default backoff
 * - Exponential: 250ms, 500ms, 1000ms (with jitter)
 * - ±20% jitter to prevent thundering herd
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  baseDelayMs: 250,
  maxDelayMs: 5000,
  backoffFactor: 2,
  jitterPercent: 20,
};

/**
 * Calculate delay with exponential backoff and jitter
 *
 * @param attempt 1-based number of the retry about to happen
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random
): number {
  // Exponential backoff: baseDelay * (backoffFactor ^ (attempt - 1))
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt - 1);

  // Cap at maxDelay
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  // Add jitter: ±jitterPercent
  const jitterRange = (cappedDelay * config.jitterPercent) / 100;
  const jitter = random() * jitterRange * 2 - jitterRange;

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

/**
 * Sleep for specified milliseconds. Resolves early when `signal` aborts;
 * callers check the signal afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
