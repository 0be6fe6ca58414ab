/**
 * Archive crawl CLI
 *
 * Usage:
 *   tsx src/cli.ts                          - Crawl every source in SOURCES_FILE
 *   tsx src/cli.ts --source=daily-herald    - Crawl only the named source (repeatable)
 *   tsx src/cli.ts --no-cache               - Skip the local JSONL cache
 *
 * Ctrl+C cancels the run; the unit in flight is not checkpointed and is crawled again next time.
 */

import { Pool } from 'pg';
import { pino } from 'pino';

import { loadEnv } from './cli/env';
import { createPinoAppLogger } from './cli/pino-logger';
import { readSources } from './cli/read-sources';
import ArchiveCrawler from './crawl-archive';
import type { CrawlRunReport } from './crawl-archive/models/report';
import FileCheckpointStore from './stores/file-checkpoint-store';
import JsonlArticleCache from './stores/jsonl-article-cache';
import PostgresArticleStore from './stores/postgres-article-store';

const args = process.argv.slice(2);
const selectedSources = args
  .filter((arg) => arg.startsWith('--source='))
  .map((arg) => arg.slice('--source='.length));
const useCache = !args.includes('--no-cache');

let logger = pino();

function printReport(report: CrawlRunReport) {
  for (const source of report.sources) {
    logger.info(
      {
        status: source.status,
        finalCheckpoint: source.finalCheckpoint,
        failedUnitKey: source.failedUnitKey,
        error: source.error,
        ...source.counts,
      },
      `${source.sourceId}: ${source.status}`,
    );
  }
}

async function main(): Promise<void> {
  const env = loadEnv();
  logger = pino({ level: env.LOG_LEVEL });

  const sources = await readSources(env.SOURCES_FILE, selectedSources);
  const pool = new Pool({ connectionString: env.DATABASE_URL });
  const controller = new AbortController();

  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.info('Cancelling, press Ctrl+C again to exit immediately');
    controller.abort();
  });

  try {
    const articleStore = new PostgresArticleStore(pool);
    await articleStore.ensureSchema();

    const crawler = new ArchiveCrawler({
      sources,
      articleStore,
      checkpointStore: new FileCheckpointStore(env.CHECKPOINT_DIR),
      articleCache: useCache ? new JsonlArticleCache(env.CACHE_DIR) : undefined,
      logger: createPinoAppLogger(logger),
      options: { sourceConcurrency: env.SOURCE_CONCURRENCY },
    });

    logger.info({ sources: crawler.sourceIds, cache: useCache }, 'Starting crawl');
    const report = await crawler.crawl({ signal: controller.signal });
    printReport(report);

    if (report.sources.some(({ status }) => status === 'failed')) {
      process.exitCode = 1;
    } else if (report.sources.some(({ status }) => status === 'cancelled')) {
      process.exitCode = 130;
    }
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Crawl failed');
  process.exitCode = 1;
});
