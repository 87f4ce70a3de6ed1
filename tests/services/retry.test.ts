/**
 * Retry Service Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  retry,
  calculateBackoff,
  defaultShouldRetry,
  isRetryableStatus,
  statusOf,
  RetryError,
  DEFAULT_RETRY_CONFIG,
} from '../../src/services/retry.js';

class HttpStatusError extends Error {
  constructor(public statusCode: number) {
    super(`HTTP ${statusCode}`);
  }
}

describe('calculateBackoff', () => {
  it('should double from the base delay', () => {
    const config = { baseDelayMs: 800, maxDelayMs: 10000 };
    expect(calculateBackoff(1, config)).toBe(800);
    expect(calculateBackoff(2, config)).toBe(1600);
    expect(calculateBackoff(3, config)).toBe(3200);
  });

  it('should cap at maxDelayMs', () => {
    expect(calculateBackoff(10, { baseDelayMs: 800, maxDelayMs: 5000 })).toBe(5000);
  });

  it('should handle zero base delay', () => {
    expect(calculateBackoff(1, { baseDelayMs: 0, maxDelayMs: 1000 })).toBe(0);
  });

  it('should handle attempt 0 same as attempt 1', () => {
    expect(calculateBackoff(0, { baseDelayMs: 800, maxDelayMs: 10000 })).toBe(800);
  });
});

describe('isRetryableStatus', () => {
  it.each([429, 500, 502, 503, 504])('should retry %i', (status) => {
    expect(isRetryableStatus(status)).toBe(true);
  });

  it.each([400, 403, 404, 408])('should not retry %i', (status) => {
    expect(isRetryableStatus(status)).toBe(false);
  });
});

describe('statusOf / defaultShouldRetry', () => {
  it('should read statusCode or status', () => {
    expect(statusOf(new HttpStatusError(503))).toBe(503);
    expect(statusOf({ status: 429 })).toBe(429);
    expect(statusOf(new Error('plain'))).toBeUndefined();
  });

  it('should retry network failures but not other errors', () => {
    expect(defaultShouldRetry(new Error('fetch failed'))).toBe(true);
    expect(defaultShouldRetry(new Error('socket hang up'))).toBe(true);
    expect(defaultShouldRetry(new Error('Unexpected token'))).toBe(false);
    expect(defaultShouldRetry(new HttpStatusError(404))).toBe(false);
    expect(defaultShouldRetry('string error')).toBe(false);
  });
});

describe('retry', () => {
  it('should use three retries with a 0.8s base by default', () => {
    expect(DEFAULT_RETRY_CONFIG).toEqual({ maxRetries: 3, baseDelayMs: 800, maxDelayMs: 10000 });
  });

  it('should return the first successful result', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi.fn(async () => 'ok');

    await expect(retry(fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should retry retryable failures with backoff', async () => {
    const sleep = vi.fn(async () => {});
    const onRetry = vi.fn();
    let calls = 0;
    const fn = async () => {
      calls++;
      if (calls < 3) throw new HttpStatusError(503);
      return 'page';
    };

    await expect(retry(fn, { sleep, onRetry })).resolves.toBe('page');
    expect(calls).toBe(3);
    expect(sleep.mock.calls).toEqual([[800], [1600]]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should throw RetryError after exhausting retries', async () => {
    const sleep = vi.fn(async () => {});
    const failure = new HttpStatusError(502);
    const fn = vi.fn(async () => {
      throw failure;
    });

    const error = await retry(fn, { sleep }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    expect(error).toMatchObject({ attempts: 4, originalError: failure });
    expect(fn).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls).toEqual([[800], [1600], [3200]]);
  });

  it('should rethrow non-retryable errors immediately', async () => {
    const sleep = vi.fn(async () => {});
    const failure = new HttpStatusError(404);

    await expect(retry(async () => Promise.reject(failure), { sleep })).rejects.toBe(failure);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should rethrow the original error when retries are disabled', async () => {
    const failure = new HttpStatusError(503);

    await expect(retry(async () => Promise.reject(failure), { maxRetries: 0 })).rejects.toBe(failure);
  });
});
