import { FakeFetcher, articlePage, emptyArticlePage } from 'test/fake-fetcher';
import { dailySource } from 'test/sources';
import { loggedEvents, makeLogger } from 'test/test-utils';

import type { SourceConfig } from '../models/source';
import type { CandidateLink } from '../models/work-item';

import { LoggingExecutor } from '~/logging/logging-executor';
import { CrawlCancelledError } from '~/models/errors';

import { parseArticlePage } from '../utils/parse-article-page';
import ExtractionPoolChain from './extraction-pool.chain';

const candidate = (slug: string): CandidateLink => ({
  sourceId: 'daily-herald',
  unitKey: '2024-05-01',
  url: `https://herald.test/article/${slug}`,
  metadata: { headline: `Headline ${slug}` },
});

const tick = () => new Promise((resolve) => setTimeout(resolve, 5));

describe('ExtractionPoolChain', () => {
  const setup = (source: SourceConfig = dailySource()) => {
    const logger = makeLogger();
    const fetcher = new FakeFetcher();
    const pool = new ExtractionPoolChain({
      logger,
      taskId: 'run-1',
      loggingExecutor: new LoggingExecutor(logger, 'run-1'),
      provider: {
        source,
        fetcher,
        parseArticle: parseArticlePage,
        now: () => new Date('2024-06-01T10:00:00.000Z'),
      },
    });
    return { logger, fetcher, pool };
  };

  test('classifies every candidate and keeps records in candidate order', async () => {
    const { logger, fetcher, pool } = setup();
    fetcher
      .on('https://herald.test/article/a', articlePage('Story A', 12))
      .on('https://herald.test/article/gone', { status: 410 })
      .on('https://herald.test/article/blank', '<html><body></body></html>')
      .on('https://herald.test/article/ad', emptyArticlePage('Sponsored'))
      .on('https://herald.test/article/b', articlePage('Story B', 20));

    const result = await pool.extract(
      ['a', 'gone', 'blank', 'ad', 'b'].map(candidate),
    );

    expect(result.counts).toEqual({
      ingested: 2,
      skipped_permanent: 1,
      skipped_parse: 1,
      skipped_empty: 1,
    });
    expect(result.outcomes.map(({ state }) => state)).toEqual([
      'ingested',
      'skipped_permanent',
      'skipped_parse',
      'skipped_empty',
      'ingested',
    ]);
    expect(result.records.map(({ title, wordCount }) => [title, wordCount])).toEqual([
      ['Story A', 12],
      ['Story B', 20],
    ]);
    expect(result.records[0]).toMatchObject({
      sourceUrl: 'https://herald.test/article/a',
      unitKey: '2024-05-01',
      fetchedAt: '2024-06-01T10:00:00.000Z',
    });
    expect(result.outcomes[1]).toMatchObject({ detail: 'Request failed (status=410)' });
    expect(result.outcomes[2]).toMatchObject({ detail: 'Article page has no body content' });

    const events = loggedEvents(logger.debug);
    expect(events[0]).toBe('crawl.extract.start');
    expect(events.at(-1)).toBe('crawl.extract.done');
    expect(events.filter((event) => event === 'crawl.extract.candidate')).toHaveLength(5);
  });

  test('never runs more than poolSize candidates at once', async () => {
    const { fetcher, pool } = setup(dailySource({ poolSize: 2 }));
    let active = 0;
    let peak = 0;
    const slugs = ['1', '2', '3', '4', '5', '6'];
    for (const slug of slugs) {
      fetcher.on(`https://herald.test/article/${slug}`, async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
        return articlePage(`Story ${slug}`);
      });
    }

    const result = await pool.extract(slugs.map(candidate));

    expect(result.counts.ingested).toBe(6);
    expect(peak).toBe(2);
  });

  test('a fetcher that throws only skips its own candidate', async () => {
    const { fetcher, pool } = setup();
    fetcher
      .on('https://herald.test/article/a', async () => {
        throw new Error('socket hang up');
      })
      .on('https://herald.test/article/b', articlePage('Story B'));

    const result = await pool.extract([candidate('a'), candidate('b')]);

    expect(result.outcomes[0]).toEqual({
      state: 'skipped_permanent',
      candidate: candidate('a'),
      detail: 'socket hang up',
    });
    expect(result.counts.ingested).toBe(1);
  });

  test('does nothing for an empty candidate list', async () => {
    const { fetcher, pool } = setup();

    const result = await pool.extract([]);

    expect(result).toEqual({
      records: [],
      outcomes: [],
      counts: { ingested: 0, skipped_permanent: 0, skipped_parse: 0, skipped_empty: 0 },
    });
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });

  test('stops with CrawlCancelledError when the run is aborted mid-pool', async () => {
    const { fetcher, pool } = setup(dailySource({ poolSize: 1 }));
    const controller = new AbortController();
    fetcher
      .on('https://herald.test/article/a', async () => {
        controller.abort();
        return articlePage('Story A');
      })
      .on('https://herald.test/article/b', articlePage('Story B'));

    await expect(
      pool.extract([candidate('a'), candidate('b')], controller.signal),
    ).rejects.toBeInstanceOf(CrawlCancelledError);
  });

  test('is usable as a runnable', async () => {
    const { fetcher, pool } = setup();
    fetcher.on('https://herald.test/article/a', articlePage('Story A'));

    const result = await pool.chain.invoke({ candidates: [candidate('a')] });

    expect(result.counts.ingested).toBe(1);
  });
});
