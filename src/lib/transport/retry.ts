import { CancelledError, RateLimitError, isRetryableError } from '../errors/challenge-errors.js';
import {
  RETRY_BACKOFF_FACTOR,
  RETRY_BASE_DELAY_MS,
  RETRY_JITTER_PERCENT,
  RETRY_MAX_ATTEMPTS,
  RETRY_MAX_DELAY_MS,
} from '../constants/defaults.js';
import { debugRetry } from '../utils/debug.js';

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Retry configuration for provider calls
 */
export interface RetryConfig {
  /** Total number of attempts, first one included (default: 5) */
  maxAttempts: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Backoff multiplier (default: 2) */
  backoffFactor: number;
  /** Jitter percentage 0-1 (default: 0.1) */
  jitterPercent: number;
  /** Respect a provider supplied Retry-After (default: true) */
  respectRetryAfter: boolean;
  /** Delay implementation, replaceable in tests */
  sleep: SleepFunction;
}

/**
 * Sleep for specified milliseconds; rejects with CancelledError when the
 * signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(CancelledError.fromSignal(signal, 'Backoff'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(CancelledError.fromSignal(signal, 'Backoff'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject with CancelledError as soon as `signal`
 * fires. The underlying work is not stopped; other callers sharing it are
 * unaffected.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined, operation: string): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    // Keep a late rejection of the shared work from going unhandled
    promise.catch(() => undefined);
    return Promise.reject(CancelledError.fromSignal(signal, operation));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(CancelledError.fromSignal(signal, operation));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: RETRY_MAX_ATTEMPTS,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
  backoffFactor: RETRY_BACKOFF_FACTOR,
  jitterPercent: RETRY_JITTER_PERCENT,
  respectRetryAfter: true,
  sleep,
};

/**
 * Calculate retry delay with exponential backoff and jitter
 *
 * @param attempt - zero-based index of the attempt that just failed
 */
export function calculateRetryDelay(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs' | 'backoffFactor' | 'jitterPercent' | 'respectRetryAfter'>,
  retryAfterMs?: number,
): number {
  if (config.respectRetryAfter && retryAfterMs !== undefined) {
    return Math.min(retryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt);

  // Add jitter to avoid thundering herd
  const jitter = exponentialDelay * config.jitterPercent * (Math.random() * 2 - 1);
  const delayWithJitter = exponentialDelay + jitter;

  return Math.min(Math.max(delayWithJitter, 0), config.maxDelayMs);
}

/**
 * Retry wrapper for async provider calls.
 *
 * Only errors flagged `retryable` (transient and rate limit) are retried;
 * everything else is rethrown immediately.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  context = 'operation',
  signal?: AbortSignal,
): Promise<T> {
  const finalConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const maxAttempts = Math.max(1, finalConfig.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw CancelledError.fromSignal(signal, context);
    }

    try {
      const result = await operation();

      if (attempt > 0) {
        debugRetry('Retry %s succeeded on attempt %d/%d', context, attempt + 1, maxAttempts);
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        debugRetry(
          'Retry %s: non-retryable error on attempt %d: %s',
          context,
          attempt + 1,
          error instanceof Error ? error.message : String(error),
        );
        throw error;
      }

      if (attempt === maxAttempts - 1) {
        break;
      }

      const retryAfterMs = error instanceof RateLimitError ? error.retryAfterMs : undefined;
      const delayMs = calculateRetryDelay(attempt, finalConfig, retryAfterMs);

      debugRetry(
        'Retry %s: attempt %d/%d failed, retrying in %dms. Error: %s',
        context,
        attempt + 1,
        maxAttempts,
        Math.round(delayMs),
        error instanceof Error ? error.message : String(error),
      );

      await finalConfig.sleep(delayMs, signal);
    }
  }

  debugRetry('Retry %s: all %d attempts failed', context, maxAttempts);

  throw lastError;
}
