/**
 * Bounded exponential backoff for exchange calls.
 *
 * A call is attempted at most `maxRetries + 1` times and no retry starts
 * once it would end past `maxElapsedMs`. The decision to retry belongs to
 * `shouldRetry`; by default only network failures and allow-listed
 * exchange codes qualify.
 */

import { DEFAULT_TRANSIENT_CODES } from './constants';
import { isRetryableTradingError } from './errors';

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry */
  initialDelayMs: number;
  /** Cap on any single delay */
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Fraction of the delay added or removed at random, 0 to 1 */
  jitterFactor: number;
  /** Total time budget across attempts and delays */
  maxElapsedMs: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called with the 1-based number of the retry about to be scheduled */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: unknown; attempts: number; totalTimeMs: number };

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
  maxElapsedMs: 60000,
};

export const RETRY_PROFILES = {
  /** Signed REST calls; the exchange answers bursts with 429 and 418 */
  EXCHANGE_API: {
    maxRetries: 3,
    initialDelayMs: 500,
    maxDelayMs: 8000,
    backoffMultiplier: 2,
    jitterFactor: 0.2,
    maxElapsedMs: 30000,
  },
  /** Calls through ccxt, which already throttles itself */
  EXCHANGE_LIBRARY: {
    maxRetries: 2,
    initialDelayMs: 250,
    maxDelayMs: 4000,
    backoffMultiplier: 2,
    jitterFactor: 0.1,
    maxElapsedMs: 20000,
  },
} as const satisfies Record<string, Partial<RetryConfig>>;

type BackoffShape = Pick<RetryConfig, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitterFactor'>;

/**
 * Delay before retry number `attempt + 1`, capped, then jittered
 */
export function calculateBackoffDelay(attempt: number, config: BackoffShape): number {
  const base = Math.min(config.initialDelayMs * config.backoffMultiplier ** attempt, config.maxDelayMs);
  const spread = base * config.jitterFactor;
  return Math.max(0, Math.round(base + spread * (2 * Math.random() - 1)));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Default retry policy
 */
export function isRetryableError(error: unknown): boolean {
  return isRetryableTradingError(error, DEFAULT_TRANSIENT_CODES);
}

/**
 * Run `fn` under the retry policy and report how it went instead of
 * throwing.
 *
 * @example
 * ```typescript
 * const result = await retryWithBackoff(() => exchange.fetchBalance(), RETRY_PROFILES.EXCHANGE_API);
 * if (!result.success) {
 *   logger.error({ attempts: result.attempts, err: result.error }, 'Balance fetch failed');
 * }
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<RetryResult<T>> {
  const settings: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const shouldRetry = settings.shouldRetry ?? isRetryableError;
  const startedAt = Date.now();
  const elapsed = () => Date.now() - startedAt;

  let attempts = 0;
  for (;;) {
    attempts++;
    try {
      const data = await fn();
      return { success: true, data, attempts, totalTimeMs: elapsed() };
    } catch (error) {
      const retryIndex = attempts - 1;
      if (retryIndex >= settings.maxRetries || !shouldRetry(error, retryIndex)) {
        return { success: false, error, attempts, totalTimeMs: elapsed() };
      }

      const delayMs = calculateBackoffDelay(retryIndex, settings);
      if (elapsed() + delayMs > settings.maxElapsedMs) {
        return { success: false, error, attempts, totalTimeMs: elapsed() };
      }

      settings.onRetry?.(error, attempts, delayMs);
      await sleep(delayMs);
    }
  }
}

/**
 * Like `retryWithBackoff`, but resolves to the data and rethrows the last
 * error unchanged.
 */
export async function retry<T>(fn: () => Promise<T>, config: Partial<RetryConfig> = {}): Promise<T> {
  const result = await retryWithBackoff(fn, config);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
