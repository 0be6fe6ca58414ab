import { RunnableLambda } from '@langchain/core/runnables';
import { randomUUID } from 'node:crypto';

import SourceCrawlChain from '~/crawl-archive/chains/source-crawl.chain';
import type {
  ArchiveCrawlerConfig,
  ArticleCache,
  ArticlePageParser,
  ArticleStore,
  CheckpointStore,
} from '~/crawl-archive/models/interfaces';
import type { CrawlOptions, CrawlRunOptions } from '~/crawl-archive/models/options';
import {
  type CrawlRunReport,
  type SourceCrawlReport,
  createEmptyCounts,
} from '~/crawl-archive/models/report';
import { type SourceConfig, sourceConfigSchema } from '~/crawl-archive/models/source';
import { createArchiveStrategy } from '~/crawl-archive/strategies/archive-strategy';
import { Fetcher } from '~/crawl-archive/utils/fetch-page';
import { parseArticlePage } from '~/crawl-archive/utils/parse-article-page';
import { LoggingExecutor } from '~/logging/logging-executor';
import type { SourceId } from '~/models/common';
import { ConfigError } from '~/models/errors';
import { type AppLogger, noopLogger } from '~/models/interfaces';

/**
 * Resumable archive crawler over a set of news sources.
 * - Each source runs its own crawl driver; sources run in parallel up to `sourceConcurrency`.
 * - Stores, cache, parsers and logger are injected.
 */
export default class ArchiveCrawler {
  private readonly sources: SourceConfig[];
  private readonly articleStore: ArticleStore;
  private readonly checkpointStore: CheckpointStore;
  private readonly articleCache?: ArticleCache;
  private readonly articleParsers: Record<SourceId, ArticlePageParser>;
  private readonly logger: AppLogger;
  private readonly options: Required<CrawlOptions>;

  /**
   * @throws ConfigError when a source configuration or an option is invalid
   * @example
   * const crawler = new ArchiveCrawler({
   *   sources: [heraldSource, wireSource],
   *   articleStore: new PostgresArticleStore(pool),
   *   checkpointStore: new FileCheckpointStore('./checkpoints'),
   *   options: { sourceConcurrency: 2 },
   * });
   */
  public constructor(config: ArchiveCrawlerConfig) {
    const defaultOptions: Required<CrawlOptions> = {
      sourceConcurrency: 1,
      continueOnSourceFailure: true,
    };

    this.sources = parseSources(config.sources);
    this.articleStore = config.articleStore;
    this.checkpointStore = config.checkpointStore;
    this.articleCache = config.articleCache;
    this.articleParsers = config.articleParsers ?? {};
    this.logger = config.logger ?? noopLogger;
    this.options = { ...defaultOptions, ...config.options };

    if (
      !Number.isInteger(this.options.sourceConcurrency) ||
      this.options.sourceConcurrency < 1
    ) {
      throw new ConfigError(
        `sourceConcurrency must be a positive integer, got ${this.options.sourceConcurrency}`,
      );
    }

    const sourceIds = new Set(this.sources.map(({ sourceId }) => sourceId));
    const unknownParsers = Object.keys(this.articleParsers).filter(
      (sourceId) => !sourceIds.has(sourceId),
    );
    if (unknownParsers.length > 0) {
      throw new ConfigError('Article parsers given for unknown sources', unknownParsers);
    }
  }

  public get sourceIds(): SourceId[] {
    return this.sources.map(({ sourceId }) => sourceId);
  }

  /**
   * Crawl every source once, resuming each from its checkpoint.
   * Resolves with one report per source, in configuration order, also when sources fail.
   */
  public async crawl(options: CrawlRunOptions = {}): Promise<CrawlRunReport> {
    const runId = randomUUID();
    const startedAt = new Date().toISOString();
    const executor = new LoggingExecutor(this.logger, runId);
    let halted = false;

    const sources = await executor.executeWithLogging(
      {
        event: 'crawl.run',
        level: 'info',
        startFields: {
          sources: this.sources.length,
          sourceConcurrency: this.options.sourceConcurrency,
        },
        doneFields: (reports) => ({
          completed: reports.filter(({ status }) => status === 'completed').length,
          failed: reports.filter(({ status }) => status === 'failed').length,
          cancelled: reports.filter(({ status }) => status === 'cancelled').length,
          skipped: reports.filter(({ status }) => status === 'skipped').length,
        }),
      },
      async () => {
        const runSource = RunnableLambda.from(async (source: SourceConfig) => {
          if (halted) {
            return skippedReport(source);
          }

          const report = await this.createSourceChain(source, runId, executor)
            .chain.invoke({ signal: options.signal });

          if (report.status === 'failed') {
            this.logger.error({
              event: 'crawl.source.failed',
              taskId: runId,
              data: { sourceId: source.sourceId, unitKey: report.failedUnitKey, error: report.error },
            });
            halted ||= !this.options.continueOnSourceFailure;
          }
          return report;
        });

        return runSource.batch(this.sources, {
          maxConcurrency: this.options.sourceConcurrency,
        });
      },
    );

    return {
      runId,
      startedAt,
      finishedAt: new Date().toISOString(),
      sources,
    };
  }

  private createSourceChain(
    source: SourceConfig,
    runId: string,
    loggingExecutor: LoggingExecutor<string>,
  ) {
    return new SourceCrawlChain({
      logger: this.logger,
      taskId: runId,
      loggingExecutor,
      provider: {
        source,
        fetcher: Fetcher.fromSource(source, this.logger, runId),
        strategy: createArchiveStrategy(source),
        articleStore: this.articleStore,
        checkpointStore: this.checkpointStore,
        articleCache: this.articleCache,
        parseArticle: this.articleParsers[source.sourceId] ?? parseArticlePage,
      },
    });
  }
}

function parseSources(inputs: ArchiveCrawlerConfig['sources']): SourceConfig[] {
  const issues: string[] = [];
  const sources: SourceConfig[] = [];

  inputs.forEach((input, index) => {
    const parsed = sourceConfigSchema.safeParse(input);
    if (!parsed.success) {
      const label = isNamed(input) ? input.sourceId : `#${index}`;
      issues.push(
        ...parsed.error.issues.map(
          ({ path, message }) => `sources[${label}].${path.join('.')}: ${message}`,
        ),
      );
      return;
    }
    sources.push(parsed.data);
  });

  const seen = new Set<SourceId>();
  for (const { sourceId } of sources) {
    if (seen.has(sourceId)) {
      issues.push(`sources[${sourceId}]: duplicate sourceId`);
    }
    seen.add(sourceId);
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid source configuration', issues);
  }
  return sources;
}

const isNamed = (input: unknown): input is { sourceId: string } =>
  typeof input === 'object' &&
  input !== null &&
  'sourceId' in input &&
  typeof input.sourceId === 'string';

const skippedReport = (source: SourceConfig): SourceCrawlReport => {
  const now = new Date().toISOString();
  return {
    sourceId: source.sourceId,
    mediaName: source.mediaName,
    status: 'skipped',
    startedAt: now,
    finishedAt: now,
    counts: createEmptyCounts(),
    finalCheckpoint: null,
  };
};
