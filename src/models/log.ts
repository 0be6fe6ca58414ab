/**
 * Global logging level type used across the project.
 */
export type LogLevel = 'debug' | 'info' | 'error';

/**
 * Structured log message format.
 * - event: "domain.action[.state]" style, e.g., "crawl.source.start" | "fetch.attempt" | "crawl.item.state"
 * - level: Usually implied by the called method, but can be explicit (info/debug).
 * - taskId: Crawl run identifier, correlates every log line of one run.
 * - durationMs: Elapsed time (ms) on ".done"/".error" logs.
 * - data: Additional context. JSON-serializable values only.
 * Examples:
 * logger.info({ event: 'crawl.run.start', taskId })
 * logger.debug({ event: 'fetch.attempt', data: { url, attempt, outcome } })
 */
export type LogMessage<
  TaskId = unknown,
  Extra extends Record<string, unknown> = Record<string, unknown>,
> = {
  /** Event name, e.g., "crawl.item.state", "fetch.attempt" */
  event: string;
  /** Log level (optional; implied by the method if omitted) */
  level?: LogLevel;
  /** Associated crawl run identifier */
  taskId?: TaskId;
  /** Elapsed time in milliseconds (typically for done/error) */
  durationMs?: number;
  /** Additional data container */
  data?: Extra;
};

export const isLogMessage = (value: unknown): value is LogMessage =>
  typeof value === 'object' &&
  value !== null &&
  'event' in value &&
  typeof value.event === 'string';
