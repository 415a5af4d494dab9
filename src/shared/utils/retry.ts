/**
 * Retry with Exponential Backoff
 *
 * Only the page fetch goes through here; the diff core does no I/O.
 */
import { logger } from "../../monitoring/logger";

export interface RetryOptions {
  /** Attempts including the first */
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor?: number;
  /** Fraction of the delay added or removed at random (default 0.2) */
  jitterRatio?: number;
  /** Name used in log lines */
  label?: string;
  /** Return false to rethrow at once */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Wait before retry number `attempt` (1-based).
 * `random` in [0, 1) picks the jitter; 0.5 means none.
 */
export function backoffDelay(
  attempt: number,
  initialDelayMs: number,
  backoffFactor: number,
  jitterRatio: number,
  random: number = Math.random()
): number {
  const base = initialDelayMs * Math.pow(backoffFactor, attempt - 1);
  return Math.max(0, Math.round(base + base * jitterRatio * (random * 2 - 1)));
}

/**
 * Call `fn` until it resolves, attempts run out or `shouldRetry` says no.
 *
 * @throws The last error seen
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    initialDelayMs,
    backoffFactor = 2,
    jitterRatio = 0.2,
    label = "operation",
    shouldRetry = () => true,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const giveUp = attempt >= maxAttempts || !shouldRetry(err);

      if (giveUp) {
        logger.error({ label, attempt, err }, `${label} failed after ${attempt} attempt(s)`);
        throw err;
      }

      const delay = backoffDelay(attempt, initialDelayMs, backoffFactor, jitterRatio);
      logger.warn({ label, attempt, maxAttempts, delay, error: err.message }, `${label} retrying`);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }
}
