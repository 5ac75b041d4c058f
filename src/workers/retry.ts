/**
 * Retry helpers shared by the provider clients.
 *
 * @module workers/retry
 */

/**
 * Exponential backoff settings.
 */
export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

/** YouTube Data API calls */
export const YOUTUBE_API_RETRY: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 4000,
  jitterMs: 500,
};

/** Language and vision model calls */
export const MODEL_RETRY: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
  jitterMs: 300,
};

/** No waiting between attempts; for tests */
export const IMMEDIATE_RETRY: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 0,
  maxDelayMs: 0,
  jitterMs: 0,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function calculateDelay(attempt: number, config: RetryConfig): number {
  const exponential = Math.min(config.maxDelayMs, config.baseDelayMs * Math.pow(2, attempt));
  const jitter = (Math.random() * 2 - 1) * config.jitterMs;
  return Math.max(0, exponential + jitter);
}

/**
 * Run `fn`, retrying while `isRetryable` accepts the error.
 *
 * @throws the last error once retries are exhausted or the error is permanent
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  isRetryable: (error: unknown) => boolean,
  config: RetryConfig
): Promise<T> {
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryable(error) || attempt >= config.maxRetries) {
        break;
      }

      const delay = calculateDelay(attempt, config);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }

  throw lastError ?? new Error('Unknown error during API call');
}

/**
 * Reject with `onTimeout()` when `promise` does not settle in time.
 *
 * Used for SDKs that take no AbortSignal.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
