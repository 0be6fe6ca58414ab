import type { Logger } from 'pino';

import type { AppLogger } from '~/models/interfaces';
import { type LogMessage, isLogMessage } from '~/models/log';

/**
 * Adapt a pino logger to AppLogger.
 * The event becomes the message; taskId, durationMs and data become fields.
 */
export function createPinoAppLogger(logger: Logger): AppLogger {
  const fields = ({ taskId, durationMs, data }: LogMessage) => ({
    taskId,
    durationMs,
    data,
  });

  return {
    info: (message) => logger.info(fields(message), message.event),
    debug: (message) => logger.debug(fields(message), message.event),
    error: (message) => {
      if (isLogMessage(message)) {
        logger.error(fields(message), message.event);
        return;
      }
      logger.error({ err: message }, 'Unexpected error');
    },
  };
}
