import type { Runnable } from '@langchain/core/runnables';

import type { LoggingExecutor } from '~/logging/logging-executor';
import type { AppLogger } from '~/models/interfaces';

export type ChainConfig<Provider> = {
  logger: AppLogger;
  /** Crawl run identifier attached to every log line. */
  taskId: string;
  provider: Provider;
  loggingExecutor: LoggingExecutor<string>;
};

export abstract class Chain<Provider, Input, Output> {
  protected readonly logger: AppLogger;
  protected readonly taskId: string;
  protected readonly provider: Provider;
  protected readonly executeWithLogging: LoggingExecutor<string>['executeWithLogging'];

  protected constructor(config: ChainConfig<Provider>) {
    this.logger = config.logger;
    this.taskId = config.taskId;
    this.provider = config.provider;
    this.executeWithLogging = config.loggingExecutor.executeWithLogging.bind(
      config.loggingExecutor,
    );
  }

  abstract get chain(): Runnable<Input, Output>;
}
