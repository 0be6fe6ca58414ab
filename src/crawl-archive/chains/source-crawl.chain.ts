import type { PageFetcher } from '../models/fetch';
import type {
  ArticleCache,
  ArticlePageParser,
  ArticleStore,
  CheckpointStore,
} from '../models/interfaces';
import {
  type SourceCrawlCounts,
  type SourceCrawlReport,
  createEmptyCounts,
} from '../models/report';
import type { SourceConfig } from '../models/source';
import type {
  CandidateLink,
  Checkpoint,
  WorkItem,
  WorkItemState,
} from '../models/work-item';
import type { ArchiveStrategy } from '../strategies/archive-strategy';

import { RunnableLambda } from '@langchain/core/runnables';

import type { UnitKey } from '~/models/common';
import {
  CheckpointError,
  CrawlCancelledError,
  ParseError,
  describeCause,
  isCrawlError,
} from '~/models/errors';

import DedupFilter from '../stages/dedup-filter';
import SinkWriter from '../stages/sink-writer';
import { enumerateWorkItems } from '../utils/enumerate-work-items';
import { buildArchiveUrl } from '../utils/url-template';
import { Chain, type ChainConfig } from './chain';
import ExtractionPoolChain from './extraction-pool.chain';

export type SourceCrawlProvider = {
  source: SourceConfig;
  fetcher: PageFetcher;
  strategy: ArchiveStrategy;
  articleStore: ArticleStore;
  checkpointStore: CheckpointStore;
  articleCache?: ArticleCache;
  parseArticle: ArticlePageParser;
};

type SourceCrawlInput = {
  signal?: AbortSignal;
};

type Progress = {
  counts: SourceCrawlCounts;
  finalCheckpoint: UnitKey | null;
  current: WorkItem | null;
};

type WorkItemResult = {
  /** Unique candidates found on the archive page. */
  candidates: number;
  /** The archive answered 404 for this page: nothing lies beyond it. */
  endOfArchive: boolean;
};

/**
 * Crawl driver of one source.
 * Walks WorkItems strictly in order; each one goes
 * fetching_archive → extracting_candidates → deduping → parallel_extracting → committing → done,
 * and the checkpoint only moves once the unit's articles are committed.
 */
export default class SourceCrawlChain extends Chain<
  SourceCrawlProvider,
  SourceCrawlInput,
  SourceCrawlReport
> {
  private readonly dedupFilter: DedupFilter;
  private readonly sinkWriter: SinkWriter;
  private readonly extractionPool: ExtractionPoolChain;

  constructor(config: ChainConfig<SourceCrawlProvider>) {
    super(config);

    const { provider } = config;
    this.dedupFilter = new DedupFilter(provider.articleStore);
    this.sinkWriter = new SinkWriter({
      store: provider.articleStore,
      cache: provider.articleCache,
      logger: config.logger,
      taskId: config.taskId,
    });
    this.extractionPool = new ExtractionPoolChain({
      ...config,
      provider: {
        source: provider.source,
        fetcher: provider.fetcher,
        parseArticle: provider.parseArticle,
      },
    });
  }

  public get chain() {
    return RunnableLambda.from(({ signal }: SourceCrawlInput) =>
      this.crawl(signal),
    );
  }

  /**
   * Run the source to completion, failure or cancellation.
   * Never rejects: the outcome is described by the returned report.
   */
  public async crawl(signal?: AbortSignal): Promise<SourceCrawlReport> {
    const { source } = this.provider;
    const startedAt = new Date().toISOString();
    const progress: Progress = {
      counts: createEmptyCounts(),
      finalCheckpoint: null,
      current: null,
    };

    const report = (
      status: SourceCrawlReport['status'],
      error?: unknown,
    ): SourceCrawlReport => ({
      sourceId: source.sourceId,
      mediaName: source.mediaName,
      status,
      startedAt,
      finishedAt: new Date().toISOString(),
      counts: progress.counts,
      finalCheckpoint: progress.finalCheckpoint,
      ...(progress.current && status !== 'completed'
        ? { failedUnitKey: progress.current.unitKey }
        : {}),
      ...(error === undefined
        ? {}
        : {
            error: {
              code: isCrawlError(error) ? error.code : 'UNKNOWN',
              message: describeCause(error),
            },
          }),
    });

    try {
      await this.executeWithLogging(
        {
          event: 'crawl.source',
          level: 'info',
          startFields: {
            sourceId: source.sourceId,
            granularity: source.granularity,
          },
          doneFields: () => ({
            ...progress.counts,
            finalCheckpoint: progress.finalCheckpoint,
          }),
        },
        () => this.run(progress, signal),
      );
      return report('completed');
    } catch (error) {
      const cancelled = error instanceof CrawlCancelledError || signal?.aborted;
      if (progress.current) {
        progress.current.status = 'failed';
        this.logState(progress.current, 'failed');
      }
      return report(cancelled ? 'cancelled' : 'failed', error);
    }
  }

  private async run(progress: Progress, signal?: AbortSignal) {
    const { source } = this.provider;
    if (signal?.aborted) {
      throw new CrawlCancelledError();
    }

    const checkpoint = await this.loadCheckpoint();
    progress.finalCheckpoint = checkpoint?.lastCompletedUnitKey ?? null;

    const openEnded =
      source.granularity === 'paginated' && source.endPage === undefined;
    let consecutiveEmptyPages = 0;

    for (const item of enumerateWorkItems(source, checkpoint)) {
      progress.current = item;
      if (signal?.aborted) {
        throw new CrawlCancelledError(item.unitKey);
      }

      const { candidates, endOfArchive } = await this.processWorkItem(
        item,
        progress.counts,
        signal,
      );

      if (endOfArchive) {
        this.logger.info({
          event: 'crawl.source.end_of_archive',
          taskId: this.taskId,
          data: { sourceId: source.sourceId, unitKey: item.unitKey },
        });
        break;
      }

      // Empty pages of an open-ended archive are covered by the next non-empty page's advance.
      if (openEnded && candidates === 0) {
        consecutiveEmptyPages++;
      } else {
        consecutiveEmptyPages = 0;
        await this.advanceCheckpoint(item);
        progress.finalCheckpoint = item.unitKey;
      }

      item.status = 'done';
      this.logState(item, 'done');
      progress.counts.workItemsCompleted++;

      if (openEnded && consecutiveEmptyPages >= source.maxConsecutiveEmptyPages) {
        this.logger.info({
          event: 'crawl.source.exhausted',
          taskId: this.taskId,
          data: { sourceId: source.sourceId, unitKey: item.unitKey, consecutiveEmptyPages },
        });
        break;
      }
    }

    progress.current = null;
  }

  private async processWorkItem(
    item: WorkItem,
    counts: SourceCrawlCounts,
    signal?: AbortSignal,
  ): Promise<WorkItemResult> {
    item.status = 'in_progress';
    item.attemptCount++;

    return this.executeWithLogging(
      {
        event: 'crawl.item',
        level: 'debug',
        startFields: { sourceId: item.sourceId, unitKey: item.unitKey },
        doneFields: (result) => ({ ...result }),
      },
      async () => {
        const candidates = await this.readArchivePage(item, counts, signal);
        if (candidates === null) {
          return { candidates: 0, endOfArchive: true };
        }
        counts.candidatesFound += candidates.length;
        if (candidates.length === 0) {
          return { candidates: 0, endOfArchive: false };
        }

        this.logState(item, 'deduping');
        const { fresh, duplicates } = await this.dedupFilter.filter(candidates);
        counts.deduped += fresh.length;
        counts.skippedDuplicate += duplicates.length;

        this.logState(item, 'parallel_extracting');
        const pool = await this.extractionPool.extract(fresh, signal);
        counts.skippedPermanentFailure += pool.counts.skipped_permanent;
        counts.skippedParseError += pool.counts.skipped_parse;
        counts.skippedEmptyContent += pool.counts.skipped_empty;

        if (signal?.aborted) {
          throw new CrawlCancelledError(item.unitKey);
        }

        this.logState(item, 'committing');
        const commit = await this.sinkWriter.commit(pool.records);
        counts.ingested += commit.written;
        counts.skippedDuplicate += commit.alreadyPresent;
        counts.skippedEmptyContent += commit.droppedEmpty;
        counts.skippedParseError += commit.droppedInvalid;

        return { candidates: candidates.length, endOfArchive: false };
      },
    );
  }

  /**
   * Fetch and parse the archive page of a unit.
   * @returns null at the end of a paginated archive; an empty list when the page failed
   */
  private async readArchivePage(
    item: WorkItem,
    counts: SourceCrawlCounts,
    signal?: AbortSignal,
  ): Promise<CandidateLink[] | null> {
    const { source, fetcher, strategy } = this.provider;
    const url = buildArchiveUrl(source, item.unitKey);

    this.logState(item, 'fetching_archive');
    const result = await fetcher.fetch(url, {
      signal,
      accept: strategy.accept,
      referer: new URL(url).origin,
    });

    if (result.status !== 'ok') {
      if (source.granularity === 'paginated' && result.httpStatus === 404) {
        return null;
      }
      counts.archivePagesFailed++;
      this.logger.error({
        event: 'crawl.archive.failed',
        taskId: this.taskId,
        data: { sourceId: source.sourceId, unitKey: item.unitKey, url, error: result.errorDetail },
      });
      return [];
    }

    this.logState(item, 'extracting_candidates');
    try {
      return strategy.parse(result, item);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      counts.archivePagesFailed++;
      this.logger.error({
        event: 'crawl.archive.unparsable',
        taskId: this.taskId,
        data: { sourceId: source.sourceId, unitKey: item.unitKey, url, error: error.message },
      });
      return [];
    }
  }

  private async loadCheckpoint(): Promise<Checkpoint | null> {
    const { sourceId } = this.provider.source;
    try {
      return await this.provider.checkpointStore.load(sourceId);
    } catch (error) {
      if (error instanceof CheckpointError) {
        throw error;
      }
      throw new CheckpointError(sourceId, `Could not load checkpoint: ${describeCause(error)}`, {
        cause: error,
      });
    }
  }

  private async advanceCheckpoint(item: WorkItem) {
    const { sourceId } = this.provider.source;

    await this.executeWithLogging(
      {
        event: 'crawl.checkpoint.advance',
        level: 'debug',
        startFields: { sourceId, unitKey: item.unitKey },
      },
      async () => {
        try {
          return await this.provider.checkpointStore.advance(sourceId, item.unitKey);
        } catch (error) {
          if (error instanceof CheckpointError) {
            throw error;
          }
          throw new CheckpointError(
            sourceId,
            `Could not advance checkpoint to ${item.unitKey}: ${describeCause(error)}`,
            { cause: error },
          );
        }
      },
    );
  }

  private logState(item: WorkItem, state: WorkItemState) {
    this.logger.debug({
      event: 'crawl.item.state',
      taskId: this.taskId,
      data: { sourceId: item.sourceId, unitKey: item.unitKey, state },
    });
  }
}
