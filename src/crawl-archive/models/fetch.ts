import type { UrlString } from '~/models/common';

export type FetchStatus = 'ok' | 'transient_error' | 'permanent_error';

export type OkFetchResult = {
  url: UrlString;
  status: 'ok';
  rawPayload: string;
  httpStatus: number;
  /** Lower-cased Content-Type header, empty when absent. */
  contentType: string;
  /** Attempts used, including the successful one. */
  attempts: number;
};

export type FailedFetchResult = {
  url: UrlString;
  status: 'transient_error' | 'permanent_error';
  rawPayload: null;
  /** Null when no HTTP response was received. */
  httpStatus: number | null;
  errorDetail: string;
  attempts: number;
};

/**
 * Outcome of one retrieval. `transient_error` only describes a single attempt;
 * `Fetcher.fetch` resolves to `ok` or `permanent_error`.
 */
export type FetchResult = OkFetchResult | FailedFetchResult;

export type FetchOptions = {
  /** Cancels the politeness delay, backoff waits and the in-flight request. */
  signal?: AbortSignal;
  referer?: UrlString;
  accept?: string;
};

/**
 * Anything that can retrieve a page with the crawler's retry semantics.
 */
export interface PageFetcher {
  fetch: (url: UrlString, options?: FetchOptions) => Promise<FetchResult>;
}
