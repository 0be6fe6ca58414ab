import { pino } from 'pino';

import { createPinoAppLogger } from './pino-logger';

const capture = (level: string) => {
  const lines: string[] = [];
  const logger = pino(
    { level, base: undefined, timestamp: false },
    { write: (line: string) => void lines.push(line) },
  );
  const entries = () => lines.map((line): unknown => JSON.parse(line));
  return { appLogger: createPinoAppLogger(logger), entries };
};

describe('createPinoAppLogger', () => {
  test('writes the event as the message with its fields', () => {
    const { appLogger, entries } = capture('info');

    appLogger.info({
      event: 'crawl.source.done',
      taskId: 'run-1',
      durationMs: 42,
      data: { sourceId: 'daily-herald', ingested: 3 },
    });

    expect(entries()).toEqual([
      {
        level: 30,
        taskId: 'run-1',
        durationMs: 42,
        data: { sourceId: 'daily-herald', ingested: 3 },
        msg: 'crawl.source.done',
      },
    ]);
  });

  test('respects the configured level', () => {
    const { appLogger, entries } = capture('info');

    appLogger.debug({ event: 'fetch.attempt', data: { attempt: 1 } });

    expect(entries()).toEqual([]);
  });

  test('logs structured errors and arbitrary errors', () => {
    const { appLogger, entries } = capture('debug');

    appLogger.error({ event: 'crawl.source.failed', data: { sourceId: 'city-wire' } });
    appLogger.error(new Error('boom'));

    expect(entries()).toEqual([
      { level: 50, data: { sourceId: 'city-wire' }, msg: 'crawl.source.failed' },
      {
        level: 50,
        err: expect.objectContaining({ type: 'Error', message: 'boom' }),
        msg: 'Unexpected error',
      },
    ]);
  });
});
