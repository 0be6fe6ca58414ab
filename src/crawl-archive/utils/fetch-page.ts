import type {
  FailedFetchResult,
  FetchOptions,
  FetchResult,
  OkFetchResult,
  PageFetcher,
} from '../models/fetch';
import type { SourceConfig } from '../models/source';

import { clamp, delay } from 'es-toolkit';

import type { UrlString } from '~/models/common';
import {
  CrawlCancelledError,
  PermanentFetchError,
  TransientNetworkError,
  describeCause,
} from '~/models/errors';
import type { AppLogger } from '~/models/interfaces';

const USER_AGENTS: string[] = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:126.0) Gecko/20100101 Firefox/126.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:126.0) Gecko/20100101 Firefox/126.0',
];

const HTML_ACCEPT =
  'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8';

const MAX_RETRY_AFTER_MS = 60_000;

export function parseRetryAfter(
  header: string | null,
  now: number = Date.now(),
): number | null {
  if (!header) return null;
  // Seconds value
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) return clamp(seconds * 1000, 0, MAX_RETRY_AFTER_MS);
  // HTTP date format
  const diff = new Date(header).getTime() - now;
  if (Number.isFinite(diff) && diff > 0) return clamp(diff, 0, MAX_RETRY_AFTER_MS);
  return null;
}

/**
 * Exponential backoff with uniform jitter, shared by every request of one source.
 */
export class RetryPolicy {
  constructor(
    /** Retries after the first attempt. */
    readonly maxRetries: number,
    readonly baseDelayMs: number,
    readonly maxBackoffMs: number,
    private readonly random: () => number = Math.random,
  ) {}

  static fromSource(source: SourceConfig, random?: () => number) {
    return new RetryPolicy(
      source.maxRetries,
      source.baseBackoffMs,
      source.maxBackoffMs,
      random,
    );
  }

  get maxAttempts() {
    return this.maxRetries + 1;
  }

  /**
   * @param attempt 1-based number of the attempt that just failed
   */
  canRetry(attempt: number) {
    return attempt <= this.maxRetries;
  }

  /**
   * Wait before the attempt following `attempt`:
   * `baseDelayMs * 2^(attempt-1)` plus up to `baseDelayMs` of jitter,
   * raised to a server-requested wait, capped at `maxBackoffMs`.
   */
  backoffMs(attempt: number, retryAfterMs: number | null = null) {
    const exponential = this.baseDelayMs * Math.pow(2, attempt - 1);
    const jitter = this.random() * this.baseDelayMs;
    return clamp(
      Math.max(exponential + jitter, retryAfterMs ?? 0),
      0,
      this.maxBackoffMs,
    );
  }
}

export type FetcherOptions = {
  policy: RetryPolicy;
  /** Politeness delay range waited before every attempt. */
  minDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt request timeout. */
  timeoutMs: number;
  /** Sent with every request, after the default headers. */
  headers?: Record<string, string>;
  logger: AppLogger;
  taskId?: string;
  /** Overridable for tests. Must reject when `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
};

/**
 * HTTP fetcher with politeness delays, bounded retries and cancellation.
 * Resolves to `ok` or `permanent_error`; rejects only with CrawlCancelledError.
 */
export class Fetcher implements PageFetcher {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly options: FetcherOptions) {
    this.sleep = options.sleep ?? ((ms, signal) => delay(ms, { signal }));
    this.random = options.random ?? Math.random;
  }

  static fromSource(source: SourceConfig, logger: AppLogger, taskId?: string) {
    return new Fetcher({
      policy: RetryPolicy.fromSource(source),
      minDelayMs: source.minDelayMs,
      maxDelayMs: source.maxDelayMs,
      timeoutMs: source.timeoutMs,
      headers: source.requestHeaders,
      logger,
      taskId,
    });
  }

  public async fetch(
    url: UrlString,
    options: FetchOptions = {},
  ): Promise<FetchResult> {
    const { policy } = this.options;

    for (let attempt = 1; ; attempt++) {
      await this.wait(this.politenessDelayMs(), options.signal);

      const startedAt = Date.now();
      try {
        const result = await this.attempt(url, attempt, options);
        this.logAttempt(url, attempt, 'ok', result.httpStatus, startedAt);
        return result;
      } catch (error) {
        if (error instanceof CrawlCancelledError) {
          throw error;
        }

        if (error instanceof PermanentFetchError) {
          this.logAttempt(url, attempt, 'permanent_error', error.httpStatus, startedAt);
          return this.failure(url, 'permanent_error', error.httpStatus, error.message, attempt);
        }

        const transient =
          error instanceof TransientNetworkError
            ? error
            : new TransientNetworkError(url, null, describeCause(error), {
                cause: error,
              });
        this.logAttempt(url, attempt, 'transient_error', transient.httpStatus, startedAt);

        if (!policy.canRetry(attempt)) {
          return this.failure(
            url,
            'permanent_error',
            transient.httpStatus,
            `Retries exhausted after ${attempt} attempts: ${transient.message}`,
            attempt,
          );
        }

        await this.wait(
          policy.backoffMs(attempt, transient.retryAfterMs),
          options.signal,
        );
      }
    }
  }

  private async attempt(
    url: UrlString,
    attempt: number,
    options: FetchOptions,
  ): Promise<OkFetchResult> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new CrawlCancelledError();
    }

    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(`timeout after ${timeoutMs}ms`),
      timeoutMs,
    );
    const onAbort = () => controller.abort('cancelled');
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        redirect: 'follow',
        signal: controller.signal,
        headers: {
          'User-Agent': this.pickUserAgent(),
          Accept: options.accept ?? HTML_ACCEPT,
          'Accept-Language': 'en-US,en;q=0.9',
          Referer: options.referer ?? 'https://www.google.com/',
          Connection: 'keep-alive',
          ...this.options.headers,
        },
      });
      const status = response.status;

      if (!response.ok) {
        // Release the connection; error bodies are never read.
        await response.body?.cancel();
      }
      if (status === 429 || status >= 500) {
        throw new TransientNetworkError(
          url,
          status,
          `Request failed (status=${status})`,
          { retryAfterMs: parseRetryAfter(response.headers.get('retry-after')) },
        );
      }
      if (!response.ok) {
        throw new PermanentFetchError(url, status, `Request failed (status=${status})`);
      }

      const rawPayload = await response.text();
      if (rawPayload.trim() === '') {
        throw new TransientNetworkError(url, status, 'Empty response body');
      }

      return {
        url,
        status: 'ok',
        rawPayload,
        httpStatus: status,
        contentType: (response.headers.get('content-type') ?? '').toLowerCase(),
        attempts: attempt,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw new CrawlCancelledError();
      }
      if (controller.signal.aborted) {
        throw new TransientNetworkError(url, null, `Timed out after ${timeoutMs}ms`, {
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async wait(ms: number, signal?: AbortSignal) {
    if (signal?.aborted) {
      throw new CrawlCancelledError();
    }
    if (ms <= 0) {
      return;
    }
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new CrawlCancelledError();
      }
      throw error;
    }
  }

  private politenessDelayMs() {
    const { minDelayMs, maxDelayMs } = this.options;
    return minDelayMs + this.random() * (maxDelayMs - minDelayMs);
  }

  private pickUserAgent() {
    return USER_AGENTS[Math.floor(this.random() * USER_AGENTS.length)];
  }

  private failure(
    url: UrlString,
    status: FailedFetchResult['status'],
    httpStatus: number | null,
    errorDetail: string,
    attempts: number,
  ): FailedFetchResult {
    return { url, status, rawPayload: null, httpStatus, errorDetail, attempts };
  }

  private logAttempt(
    url: UrlString,
    attempt: number,
    outcome: FetchResult['status'],
    httpStatus: number | null,
    startedAt: number,
  ) {
    this.options.logger.debug({
      event: 'fetch.attempt',
      taskId: this.options.taskId,
      durationMs: Date.now() - startedAt,
      data: { url, attempt, outcome, httpStatus },
    });
  }
}
