import type { AppLogger } from '~/models/interfaces';
import type { LogMessage } from '~/models/log';

import { describeCause, isCrawlError } from '~/models/errors';

export type ExecuteWithLoggingConfig<T> = {
  /** Base event key (prefix). e.g., "crawl.source" */
  event: string;
  /** Log level (default: debug) */
  level?: 'debug' | 'info';
  /** Additional data to include on start */
  startFields?: Record<string, unknown>;
  /** Data builder invoked on success with the result to enrich log */
  doneFields?: (result: T) => Record<string, unknown> | void;
};

/**
 * Executor that provides a standardized start/done/error logging pattern.
 * - Uses the injected logger and taskId to attach common fields to every log.
 * - Pass config.event as a prefix like "crawl.item";
 *   ".start"/".done"/".error" are appended automatically.
 * - The ".error" line carries the error code and message. Errors that are not
 *   CrawlErrors are additionally handed to logger.error with their stack.
 */
export class LoggingExecutor<TaskId> {
  constructor(
    private readonly logger: AppLogger,
    private readonly taskId: TaskId,
  ) {}

  public async executeWithLogging<T>(
    config: ExecuteWithLoggingConfig<T>,
    fn: () => Promise<T>,
  ): Promise<T> {
    const level = config.level ?? 'debug';
    const startedAt = Date.now();

    const startMsg: LogMessage<TaskId> = {
      event: `${config.event}.start`,
      level,
      taskId: this.taskId,
      data: config.startFields ?? {},
    };
    this.logger[level](startMsg);

    try {
      const result = await fn();
      const durationMs = Date.now() - startedAt;
      const doneExtra = config.doneFields
        ? (config.doneFields(result) ?? {})
        : {};

      const doneMsg: LogMessage<TaskId> = {
        event: `${config.event}.done`,
        level,
        taskId: this.taskId,
        durationMs,
        data: { ...(config.startFields ?? {}), ...doneExtra },
      };
      this.logger[level](doneMsg);
      return result;
    } catch (err) {
      const durationMs = Date.now() - startedAt;
      const errorMsg: LogMessage<TaskId> = {
        event: `${config.event}.error`,
        level,
        taskId: this.taskId,
        durationMs,
        data: {
          ...(config.startFields ?? {}),
          error: {
            code: isCrawlError(err) ? err.code : 'UNKNOWN',
            message: describeCause(err),
          },
        },
      };
      this.logger[level](errorMsg);
      if (!isCrawlError(err)) {
        this.logger.error(err);
      }
      throw err;
    }
  }
}
