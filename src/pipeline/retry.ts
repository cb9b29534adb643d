/**
 * Retry logic with exponential backoff
 */

import { RateLimitError, TimeoutError, TransientCallError } from './errors';

export interface RetryConfig {
  /** Total number of attempts, the first one included */
  maxAttempts: number;
  /** Initial delay between retries in milliseconds */
  initialDelay: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay: number;
  /** Exponential backoff base */
  exponentialBase: number;
  /** Add random jitter to delays */
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  exponentialBase: 2,
  jitter: true,
};

export interface RetryHooks {
  /** Called before waiting for the next attempt */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Calculate delay after the given (1-based) failed attempt
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = Math.min(
    config.initialDelay * Math.pow(config.exponentialBase, attempt - 1),
    config.maxDelay
  );

  if (config.jitter) {
    // "Equal jitter": random value between 50% and 100% of delay.
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return delay;
}

/**
 * Only transient call failures are worth another attempt
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof TransientCallError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute fn, retrying transient failures. fn receives the 1-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  hooks: RetryHooks = {}
): Promise<T> {
  const maxAttempts = Math.max(1, config.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!isRetryable(error) || attempt === maxAttempts) {
        throw error;
      }

      let delay = calculateDelay(attempt, config);

      // Honour the server's Retry-After when it asks for longer
      if (error instanceof RateLimitError && error.retryAfter) {
        delay = Math.max(delay, error.retryAfter * 1000);
      }

      hooks.onRetry?.({ attempt, delayMs: Math.round(delay), error });
      await sleep(delay);
    }
  }

  throw lastError;
}

/**
 * Run fn with an abort signal that fires after ms; a call still pending then fails with TimeoutError.
 * ms <= 0 disables the watchdog.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label = 'call'
): Promise<T> {
  const controller = new AbortController();
  if (!ms || ms <= 0) return fn(controller.signal);

  let timeoutHandle: NodeJS.Timeout | null = null;
  const watchdog = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`${label} timed out after ${ms}ms`));
    }, ms);
  });
  try {
    return await Promise.race([fn(controller.signal), watchdog]);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  }
}
