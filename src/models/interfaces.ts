import type { LogMessage } from './log';

/**
 * Logger interface used across the crawler.
 * - Accepts structured LogMessage; implement it to forward to pino, CloudWatch, Datadog, etc.
 * - info is for run/source milestones, debug for per-stage and per-request tracing,
 *   error for failures that end a WorkItem or a source run.
 * - error accepts either a structured LogMessage or an arbitrary error object.
 *
 * Usage examples:
 * logger.info({ event: 'crawl.source.done', taskId, data: { sourceId } })
 * logger.debug({ event: 'fetch.attempt', data: { url, attempt, outcome: 'ok' } })
 * logger.error({ event: 'crawl.item.failed', data: { unitKey, error: err.message } })
 */
export interface AppLogger {
  /** Info-level logs for operational events/state. */
  info: (message: LogMessage) => void;
  /** Debug-level logs for detailed debugging/tracing. */
  debug: (message: LogMessage) => void;
  /** Error-level logs. Accepts structured messages or arbitrary errors (Error/unknown). */
  error: (message: LogMessage | unknown) => void;
}

export const noopLogger: AppLogger = {
  info: (_msg) => {},
  debug: (_msg) => {},
  error: (_msg) => {},
};
