import { FakeFetcher, archivePage, articlePage, emptyArticlePage } from 'test/fake-fetcher';
import { MemoryArticleStore } from 'test/memory-article-store';
import { MemoryCheckpointStore } from 'test/memory-checkpoint-store';
import { dailySource, paginatedSource } from 'test/sources';
import { loggedEvents, makeLogger } from 'test/test-utils';

import type { SourceConfig } from '../models/source';

import { LoggingExecutor } from '~/logging/logging-executor';
import type { UrlString } from '~/models/common';
import { isLogMessage } from '~/models/log';

import { createArchiveStrategy } from '../strategies/archive-strategy';
import { parseArticlePage } from '../utils/parse-article-page';
import SourceCrawlChain from './source-crawl.chain';

const archiveUrl = (day: string) => `https://herald.test/archive/2024/05/${day}/`;
const articleUrl = (day: string, index: number) =>
  `https://herald.test/article/2024-05-${day}-${index}`;

/** Routes a date archive page and `count` healthy articles behind it. */
const routeDay = (fetcher: FakeFetcher, day: string, count: number): UrlString[] => {
  const urls = Array.from({ length: count }, (_, index) => articleUrl(day, index));
  fetcher.on(archiveUrl(day), archivePage(urls));
  urls.forEach((url, index) => fetcher.on(url, articlePage(`Story ${day}-${index}`)));
  return urls;
};

type Stores = {
  fetcher?: FakeFetcher;
  articleStore?: MemoryArticleStore;
  checkpointStore?: MemoryCheckpointStore;
};

const setup = (source: SourceConfig = dailySource(), stores: Stores = {}) => {
  const logger = makeLogger();
  const fetcher = stores.fetcher ?? new FakeFetcher();
  const articleStore = stores.articleStore ?? new MemoryArticleStore();
  const checkpointStore = stores.checkpointStore ?? new MemoryCheckpointStore();
  const chain = new SourceCrawlChain({
    logger,
    taskId: 'run-1',
    loggingExecutor: new LoggingExecutor(logger, 'run-1'),
    provider: {
      source,
      fetcher,
      strategy: createArchiveStrategy(source),
      articleStore,
      checkpointStore,
      parseArticle: parseArticlePage,
    },
  });
  return { logger, fetcher, articleStore, checkpointStore, chain };
};

const itemStates = (logger: ReturnType<typeof makeLogger>) =>
  logger.debug.mock.calls
    .map(([message]) => message)
    .filter(isLogMessage)
    .filter(({ event }) => event === 'crawl.item.state')
    .map(({ data }) => data?.state);

describe('SourceCrawlChain', () => {
  test('commits 37 of 50 candidates and only then advances the checkpoint', async () => {
    const { fetcher, articleStore, checkpointStore, chain } = setup(
      dailySource({ endDate: '2024-05-01' }),
    );
    const urls = Array.from({ length: 50 }, (_, index) => articleUrl('01', index));
    fetcher.on(archiveUrl('01'), archivePage(urls));
    urls.forEach((url, index) => fetcher.on(url, articlePage(`Story ${index}`)));
    articleStore.seed(urls.slice(0, 10));
    fetcher.on(urls[10], { status: 404 }).on(urls[11], { status: 410 });
    fetcher.on(urls[12], emptyArticlePage('Sponsored'));

    const report = await chain.crawl();

    expect(report).toMatchObject({
      sourceId: 'daily-herald',
      mediaName: 'Daily Herald',
      status: 'completed',
      finalCheckpoint: '2024-05-01',
    });
    expect(report.counts).toEqual({
      workItemsCompleted: 1,
      candidatesFound: 50,
      deduped: 40,
      ingested: 37,
      skippedPermanentFailure: 2,
      skippedParseError: 0,
      skippedEmptyContent: 1,
      skippedDuplicate: 10,
      archivePagesFailed: 0,
    });
    expect(report).not.toHaveProperty('failedUnitKey');
    expect(report).not.toHaveProperty('error');

    expect(articleStore.upsertArticles).toHaveBeenCalledTimes(1);
    expect(articleStore.upsertArticles.mock.calls[0][0]).toHaveLength(37);
    expect(articleStore.records.size).toBe(47);
    expect([...articleStore.records.values()].every(({ wordCount }) => wordCount > 0)).toBe(true);
    expect(checkpointStore.history).toEqual(['2024-05-01']);
    expect(articleStore.upsertArticles.mock.invocationCallOrder[0]).toBeLessThan(
      checkpointStore.advance.mock.invocationCallOrder[0],
    );
  });

  test('walks every unit in order and logs each state transition', async () => {
    const { logger, fetcher, checkpointStore, chain } = setup(
      dailySource({ endDate: '2024-05-01' }),
    );
    routeDay(fetcher, '01', 2);

    await chain.crawl();

    expect(itemStates(logger)).toEqual([
      'fetching_archive',
      'extracting_candidates',
      'deduping',
      'parallel_extracting',
      'committing',
      'done',
    ]);
    expect(checkpointStore.history).toEqual(['2024-05-01']);
    expect(loggedEvents(logger.info)).toEqual(['crawl.source.start', 'crawl.source.done']);
  });

  test('fails the run when the store goes down and resumes from the last good unit', async () => {
    const articleStore = new MemoryArticleStore();
    const checkpointStore = new MemoryCheckpointStore();
    const fetcher = new FakeFetcher();
    routeDay(fetcher, '01', 2);
    routeDay(fetcher, '03', 1);
    const secondDay = [articleUrl('02', 0), articleUrl('02', 1)];
    secondDay.forEach((url) => fetcher.on(url, articlePage(`Story ${url}`)));
    let archiveReads = 0;
    fetcher.on(archiveUrl('02'), async () => {
      archiveReads++;
      if (archiveReads === 1) {
        articleStore.failing.add('findExistingUrls');
      }
      return archivePage(secondDay);
    });

    const first = setup(dailySource(), { fetcher, articleStore, checkpointStore });
    const failed = await first.chain.crawl();

    expect(failed).toMatchObject({
      status: 'failed',
      failedUnitKey: '2024-05-02',
      finalCheckpoint: '2024-05-01',
      error: {
        code: 'STORE_UNAVAILABLE',
        message: 'Article store unavailable during findExistingUrls: connection refused',
      },
    });
    expect(failed.counts).toMatchObject({ workItemsCompleted: 1, ingested: 2 });
    expect(checkpointStore.history).toEqual(['2024-05-01']);
    expect(itemStates(first.logger).at(-1)).toBe('failed');

    articleStore.failing.clear();
    fetcher.fetch.mockClear();
    const second = setup(dailySource(), { fetcher, articleStore, checkpointStore });
    const resumed = await second.chain.crawl();

    expect(fetcher.fetch.mock.calls[0][0]).toBe(archiveUrl('02'));
    expect(resumed).toMatchObject({ status: 'completed', finalCheckpoint: '2024-05-03' });
    expect(resumed.counts).toMatchObject({ workItemsCompleted: 2, ingested: 3 });
    expect(checkpointStore.history).toEqual(['2024-05-01', '2024-05-02', '2024-05-03']);
    expect(articleStore.records.size).toBe(5);
  });

  test('fails without checkpointing when the commit cannot reach the store', async () => {
    const { logger, fetcher, articleStore, checkpointStore, chain } = setup(
      dailySource({ endDate: '2024-05-01' }),
    );
    routeDay(fetcher, '01', 2);
    articleStore.failing.add('upsertArticles');

    const report = await chain.crawl();

    expect(report).toMatchObject({
      status: 'failed',
      failedUnitKey: '2024-05-01',
      finalCheckpoint: null,
      error: {
        code: 'STORE_UNAVAILABLE',
        message: 'Article store unavailable during upsertArticles: connection refused',
      },
    });
    expect(checkpointStore.advance).not.toHaveBeenCalled();
    expect(checkpointStore.history).toEqual([]);
    expect(articleStore.records.size).toBe(0);
    expect(itemStates(logger).at(-1)).toBe('failed');
  });

  test('a second run over the same range ingests nothing new', async () => {
    const articleStore = new MemoryArticleStore();
    const checkpointStore = new MemoryCheckpointStore();
    const fetcher = new FakeFetcher();
    routeDay(fetcher, '01', 3);
    routeDay(fetcher, '02', 2);
    routeDay(fetcher, '03', 1);

    const first = await setup(dailySource(), { fetcher, articleStore, checkpointStore }).chain.crawl();
    const stored = [...articleStore.records.keys()].sort();

    checkpointStore.checkpoints.clear();
    const second = await setup(dailySource(), { fetcher, articleStore, checkpointStore }).chain.crawl();

    expect(first.counts.ingested).toBe(6);
    expect(second.status).toBe('completed');
    expect(second.counts).toMatchObject({ ingested: 0, deduped: 0, skippedDuplicate: 6 });
    expect([...articleStore.records.keys()].sort()).toEqual(stored);
  });

  test('starts after the stored checkpoint', async () => {
    const { fetcher, checkpointStore, chain } = setup();
    routeDay(fetcher, '03', 1);
    checkpointStore.set('daily-herald', '2024-05-02');

    const report = await chain.crawl();

    expect(fetcher.fetch.mock.calls.map(([url]) => url)).toEqual([
      archiveUrl('03'),
      articleUrl('03', 0),
    ]);
    expect(report).toMatchObject({ status: 'completed', finalCheckpoint: '2024-05-03' });
    expect(checkpointStore.history).toEqual(['2024-05-03']);
  });

  test('counts a failed or unparsable archive page and moves on', async () => {
    const { logger, fetcher, checkpointStore, chain } = setup(
      dailySource({ endDate: '2024-05-02' }),
    );
    fetcher.on(archiveUrl('01'), { status: 403 });
    fetcher.on(archiveUrl('02'), 'Service temporarily unavailable');

    const report = await chain.crawl();

    expect(report.status).toBe('completed');
    expect(report.counts).toMatchObject({
      workItemsCompleted: 2,
      candidatesFound: 0,
      archivePagesFailed: 2,
    });
    expect(checkpointStore.history).toEqual(['2024-05-01', '2024-05-02']);
    expect(loggedEvents(logger.error)).toEqual([
      'crawl.archive.failed',
      'crawl.archive.unparsable',
    ]);
  });

  test('fails with a CheckpointError when the watermark cannot be written', async () => {
    const { fetcher, articleStore, checkpointStore, chain } = setup(
      dailySource({ endDate: '2024-05-01' }),
    );
    routeDay(fetcher, '01', 2);
    checkpointStore.failAdvance = true;

    const report = await chain.crawl();

    expect(report).toMatchObject({
      status: 'failed',
      failedUnitKey: '2024-05-01',
      finalCheckpoint: null,
      error: {
        code: 'CHECKPOINT',
        message: 'Could not advance checkpoint to 2024-05-01: disk full',
      },
    });
    expect(articleStore.records.size).toBe(2);
  });

  test('treats a 404 listing page as the end of a paginated archive', async () => {
    const { logger, fetcher, checkpointStore, chain } = setup(
      paginatedSource({ endPage: undefined }),
    );
    fetcher
      .on('https://wire.test/category/state/', archivePage(['https://wire.test/2024/05/one/', 'https://wire.test/2024/05/two/']))
      .on('https://wire.test/category/state/page/2/', archivePage(['https://wire.test/2024/05/three/']))
      .on('https://wire.test/2024/05/one/', articlePage('One'))
      .on('https://wire.test/2024/05/two/', articlePage('Two'))
      .on('https://wire.test/2024/05/three/', articlePage('Three'));

    const report = await chain.crawl();

    expect(report).toMatchObject({ status: 'completed', finalCheckpoint: 2 });
    expect(report.counts).toMatchObject({
      workItemsCompleted: 2,
      ingested: 3,
      archivePagesFailed: 0,
    });
    expect(checkpointStore.history).toEqual([1, 2]);
    expect(loggedEvents(logger.info)).toContain('crawl.source.end_of_archive');
  });

  test('lets the next non-empty page advance over empty pages of an open-ended archive', async () => {
    const { fetcher, checkpointStore, chain } = setup(
      paginatedSource({ endPage: undefined, maxConsecutiveEmptyPages: 2 }),
    );
    fetcher
      .on('https://wire.test/category/state/', archivePage(['https://wire.test/2024/05/one/']))
      .on('https://wire.test/category/state/page/2/', archivePage([]))
      .on('https://wire.test/category/state/page/3/', archivePage(['https://wire.test/2024/05/three/']))
      .on('https://wire.test/category/state/page/4/', archivePage([]))
      .on('https://wire.test/category/state/page/5/', archivePage([]))
      .on('https://wire.test/2024/05/one/', articlePage('One'))
      .on('https://wire.test/2024/05/three/', articlePage('Three'));

    const report = await chain.crawl();

    expect(report).toMatchObject({ status: 'completed', finalCheckpoint: 3 });
    expect(report.counts.workItemsCompleted).toBe(5);
    expect(checkpointStore.history).toEqual([1, 3]);
    expect(fetcher.fetch).not.toHaveBeenCalledWith(
      'https://wire.test/category/state/page/6/',
      expect.anything(),
    );
  });

  test('reports cancellation without checkpointing the unit in flight', async () => {
    const { fetcher, articleStore, checkpointStore, chain } = setup();
    const controller = new AbortController();
    fetcher.on(archiveUrl('01'), archivePage([articleUrl('01', 0)]));
    fetcher.on(articleUrl('01', 0), async () => {
      controller.abort();
      return articlePage('Story');
    });

    const report = await chain.crawl(controller.signal);

    expect(report).toMatchObject({
      status: 'cancelled',
      failedUnitKey: '2024-05-01',
      finalCheckpoint: null,
      error: { code: 'CANCELLED' },
    });
    expect(articleStore.upsertArticles).not.toHaveBeenCalled();
    expect(checkpointStore.advance).not.toHaveBeenCalled();
  });

  test('does not start when the signal is already aborted', async () => {
    const { fetcher, chain } = setup();
    const controller = new AbortController();
    controller.abort();

    const report = await chain.crawl(controller.signal);

    expect(report).toMatchObject({ status: 'cancelled', error: { code: 'CANCELLED' } });
    expect(report).not.toHaveProperty('failedUnitKey');
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });
});
