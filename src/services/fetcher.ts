/**
 * HTTP Fetcher
 * GET-only page and document downloads with bounded retry.
 * Failures come back as results; callers log and move on.
 */

import { ofetch } from 'ofetch';
import { retry, statusOf, defaultShouldRetry, type RetryConfig } from './retry.js';
import { loggers } from '../lib/logger.js';
import { recordFetch } from '../lib/metrics.js';
import { FetchFailedError, err, ok, type Result } from '../types/result.js';

const REQUEST_TIMEOUT_MS = 25000;

/**
 * The fetch capability the pipeline depends on
 */
export interface PageFetcher {
  fetchText(url: string): Promise<Result<string, FetchFailedError>>;
  fetchBytes(url: string): Promise<Result<Uint8Array, FetchFailedError>>;
}

export interface HttpFetcherOptions {
  userAgent: string;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Unwrap RetryError so the reported status is the server's
 */
function rootCause(error: unknown): unknown {
  if (error && typeof error === 'object' && 'originalError' in error) {
    return error.originalError;
  }
  return error;
}

export class HttpFetcher implements PageFetcher {
  private userAgent: string;
  private timeoutMs: number;
  private retryConfig: Partial<RetryConfig>;

  constructor(options: HttpFetcherOptions) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.retryConfig = options.retry ?? {};
  }

  async fetchText(url: string): Promise<Result<string, FetchFailedError>> {
    return this.request(url, 'page', () =>
      ofetch(url, {
        method: 'GET',
        responseType: 'text',
        headers: { 'User-Agent': this.userAgent },
        timeout: this.timeoutMs,
        retry: 0,
      })
    );
  }

  async fetchBytes(url: string): Promise<Result<Uint8Array, FetchFailedError>> {
    return this.request(url, 'pdf', async () => {
      const buffer = await ofetch(url, {
        method: 'GET',
        responseType: 'arrayBuffer',
        headers: { 'User-Agent': this.userAgent },
        timeout: this.timeoutMs,
        retry: 0,
      });
      return new Uint8Array(buffer);
    });
  }

  private async request<T>(
    url: string,
    kind: 'page' | 'pdf',
    send: () => Promise<T>
  ): Promise<Result<T, FetchFailedError>> {
    const startTime = Date.now();

    try {
      const body = await retry(() => send(), {
        shouldRetry: defaultShouldRetry,
        onRetry: (error, attempt, delayMs) => {
          loggers.fetch.debug('Retrying fetch', {
            url,
            attempt,
            delayMs,
            statusCode: statusOf(error),
          });
        },
        ...this.retryConfig,
      });

      const duration = Date.now() - startTime;
      recordFetch(kind, true, duration);
      loggers.fetch.debug('Fetched', { url, duration });

      return ok(body);
    } catch (error) {
      const duration = Date.now() - startTime;
      const cause = rootCause(error);
      const status = statusOf(cause);
      recordFetch(kind, false, duration);

      return err(new FetchFailedError(url, messageOf(cause), status));
    }
  }
}
