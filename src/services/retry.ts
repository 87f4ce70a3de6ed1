/**
 * Retry Service
 * Exponential backoff for transient HTTP failures (GET only)
 */

export interface RetryConfig {
  /** Retries after the first attempt (default: 3) */
  maxRetries: number;
  /** First backoff in milliseconds; doubles per attempt (default: 800) */
  baseDelayMs: number;
  /** Upper bound for a single backoff (default: 10000) */
  maxDelayMs: number;
  /** Decide whether an error is worth another attempt */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each backoff */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Replaceable wait, used by tests */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_CONFIG: Pick<RetryConfig, 'maxRetries' | 'baseDelayMs' | 'maxDelayMs'> = {
  maxRetries: 3,
  baseDelayMs: 800,
  maxDelayMs: 10000,
};

/** HTTP status codes that are retried before a page counts as failed */
export const RETRYABLE_STATUSES = [
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
];

/**
 * Error thrown when all retry attempts are exhausted
 */
export class RetryError extends Error {
  public readonly code = 'RETRY_EXHAUSTED';
  public readonly originalError: unknown;
  public readonly attempts: number;

  constructor(message: string, originalError: unknown, attempts: number) {
    super(message);
    this.name = 'RetryError';
    this.originalError = originalError;
    this.attempts = attempts;
  }
}

/**
 * Backoff before the next attempt: baseDelay * 2^(attempt-1), capped, no jitter.
 * Attempt 1 → 0.8s, 2 → 1.6s, 3 → 3.2s with the defaults.
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>
): number {
  if (config.baseDelayMs <= 0) {
    return 0;
  }

  const normalizedAttempt = Math.max(1, attempt);
  const exponentialDelay = config.baseDelayMs * Math.pow(2, normalizedAttempt - 1);

  return Math.min(exponentialDelay, config.maxDelayMs);
}

export function isRetryableStatus(
  status: number,
  retryableStatuses: number[] = RETRYABLE_STATUSES
): boolean {
  return retryableStatuses.includes(status);
}

/**
 * Pull an HTTP status off an error thrown by an HTTP client
 */
export function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object') {
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return error.statusCode;
    }
    if ('status' in error && typeof error.status === 'number') {
      return error.status;
    }
  }
  return undefined;
}

/**
 * Default retry decision: retryable HTTP status, or a network-level failure
 */
export function defaultShouldRetry(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined) {
    return isRetryableStatus(status);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('socket hang up') ||
      message.includes('fetch failed')
    );
  }

  return false;
}

type RetryableFunction<T> = (context: { attempt: number }) => Promise<T>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic
 * @throws RetryError when a retryable error persists past maxRetries
 * @throws the original error when it is not retryable
 */
export async function retry<T>(
  fn: RetryableFunction<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const maxRetries = config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries;
  const backoff = {
    baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
  };
  const shouldRetry = config.shouldRetry ?? defaultShouldRetry;
  const wait = config.sleep ?? sleep;
  const maxAttempts = maxRetries + 1;

  let attempt = 0;

  for (;;) {
    attempt++;

    try {
      return await fn({ attempt });
    } catch (error) {
      const retryable = shouldRetry(error);

      if (!retryable) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        if (maxRetries > 0) {
          throw new RetryError(`Still failing after ${attempt} attempts`, error, attempt);
        }
        throw error;
      }

      const delay = calculateBackoff(attempt, backoff);
      config.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
