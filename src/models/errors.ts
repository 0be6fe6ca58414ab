import type { SourceId, UnitKey, UrlString } from './common';

export type CrawlErrorCode =
  | 'TRANSIENT_NETWORK'
  | 'PERMANENT_FETCH'
  | 'PARSE'
  | 'STORE_UNAVAILABLE'
  | 'CONFIG'
  | 'CHECKPOINT'
  | 'CANCELLED';

/**
 * Base class of every error the crawler raises on purpose.
 * `code` is stable and safe to branch on; `message` is for humans.
 */
export abstract class CrawlError extends Error {
  abstract readonly code: CrawlErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A retryable fetch failure: network error, timeout, HTTP 5xx or 429.
 */
export class TransientNetworkError extends CrawlError {
  readonly code = 'TRANSIENT_NETWORK';

  /** Server-requested wait parsed from Retry-After, in milliseconds. */
  readonly retryAfterMs: number | null;

  constructor(
    readonly url: UrlString,
    readonly httpStatus: number | null,
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number | null },
  ) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs ?? null;
  }
}

/**
 * A fetch failure that retrying will not fix: HTTP 4xx (but 429) or exhausted retries.
 */
export class PermanentFetchError extends CrawlError {
  readonly code = 'PERMANENT_FETCH';

  constructor(
    readonly url: UrlString,
    readonly httpStatus: number | null,
    message: string,
  ) {
    super(message);
  }
}

/**
 * The page was fetched but its structure could not be interpreted.
 * Distinct from a page that legitimately lists zero articles.
 */
export class ParseError extends CrawlError {
  readonly code = 'PARSE';

  constructor(
    readonly url: UrlString,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The persistent article store could not answer a dedup lookup or a commit.
 */
export class StoreUnavailableError extends CrawlError {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(
    readonly operation: 'findExistingUrls' | 'upsertArticles',
    options?: { cause?: unknown },
  ) {
    super(
      `Article store unavailable during ${operation}: ${describeCause(options?.cause)}`,
      options,
    );
  }
}

/**
 * Invalid source configuration. Raised at startup, never ignored.
 */
export class ConfigError extends CrawlError {
  readonly code = 'CONFIG';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n- ${issues.join('\n- ')}` : message);
  }
}

/**
 * The checkpoint could not be read or written, or an advance would move it backwards.
 */
export class CheckpointError extends CrawlError {
  readonly code = 'CHECKPOINT';

  constructor(
    readonly sourceId: SourceId,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The run was cancelled through its AbortSignal.
 */
export class CrawlCancelledError extends CrawlError {
  readonly code = 'CANCELLED';

  constructor(readonly unitKey?: UnitKey) {
    super(
      unitKey === undefined
        ? 'Crawl cancelled'
        : `Crawl cancelled while processing ${unitKey}`,
    );
  }
}

export const isCrawlError = (error: unknown): error is CrawlError =>
  error instanceof CrawlError;

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
