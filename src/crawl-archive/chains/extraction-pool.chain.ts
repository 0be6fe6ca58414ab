import type { ArticleRecord } from '../models/article';
import type { FetchResult, PageFetcher } from '../models/fetch';
import type { ArticlePageParser } from '../models/interfaces';
import type { SourceConfig } from '../models/source';
import type { CandidateLink } from '../models/work-item';

import { RunnableLambda } from '@langchain/core/runnables';
import { countBy } from 'es-toolkit';

import { CrawlCancelledError, describeCause } from '~/models/errors';

import { Chain, type ChainConfig } from './chain';

export type ExtractionPoolProvider = {
  source: SourceConfig;
  fetcher: PageFetcher;
  parseArticle: ArticlePageParser;
  /** Clock used for `fetchedAt`. */
  now?: () => Date;
};

export type CandidateOutcome =
  | { state: 'ingested'; candidate: CandidateLink; record: ArticleRecord }
  | { state: 'skipped_permanent'; candidate: CandidateLink; detail: string }
  | { state: 'skipped_parse'; candidate: CandidateLink; detail: string }
  | { state: 'skipped_empty'; candidate: CandidateLink };

export type CandidateState = CandidateOutcome['state'];

export type PoolResult = {
  /** Records of ingested candidates, in candidate order. */
  records: ArticleRecord[];
  outcomes: CandidateOutcome[];
  counts: Record<CandidateState, number>;
};

type ExtractionInput = {
  candidates: CandidateLink[];
  signal?: AbortSignal;
};

/**
 * Bounded worker pool turning candidate links into article records.
 * - At most `source.poolSize` candidates are fetched and parsed at once.
 * - A failing candidate only ends its own work; cancellation ends the pool.
 */
export default class ExtractionPoolChain extends Chain<
  ExtractionPoolProvider,
  ExtractionInput,
  PoolResult
> {
  constructor(config: ChainConfig<ExtractionPoolProvider>) {
    super(config);
  }

  public get chain() {
    return RunnableLambda.from(({ candidates, signal }: ExtractionInput) =>
      this.extract(candidates, signal),
    );
  }

  public async extract(
    candidates: CandidateLink[],
    signal?: AbortSignal,
  ): Promise<PoolResult> {
    const { source } = this.provider;

    return this.executeWithLogging(
      {
        event: 'crawl.extract',
        level: 'debug',
        startFields: {
          sourceId: source.sourceId,
          candidates: candidates.length,
          poolSize: source.poolSize,
        },
        doneFields: ({ counts }) => counts,
      },
      async () => {
        const worker = RunnableLambda.from((candidate: CandidateLink) =>
          this.processCandidate(candidate, signal),
        );

        let outcomes: CandidateOutcome[] = [];
        try {
          if (candidates.length > 0) {
            outcomes = await worker.batch(candidates, {
              maxConcurrency: source.poolSize,
            });
          }
        } catch (error) {
          if (signal?.aborted) {
            throw new CrawlCancelledError(candidates[0]?.unitKey);
          }
          throw error;
        }

        return summarize(outcomes);
      },
    );
  }

  private async processCandidate(
    candidate: CandidateLink,
    signal?: AbortSignal,
  ): Promise<CandidateOutcome> {
    if (signal?.aborted) {
      throw new CrawlCancelledError(candidate.unitKey);
    }

    const outcome = await this.fetchAndParse(candidate, signal);

    this.logger.debug({
      event: 'crawl.extract.candidate',
      taskId: this.taskId,
      data: {
        url: candidate.url,
        state: outcome.state,
        detail: 'detail' in outcome ? outcome.detail : undefined,
      },
    });

    return outcome;
  }

  private async fetchAndParse(
    candidate: CandidateLink,
    signal?: AbortSignal,
  ): Promise<CandidateOutcome> {
    const { fetcher, parseArticle, source } = this.provider;

    let result: FetchResult;
    try {
      result = await fetcher.fetch(candidate.url, {
        signal,
        referer: new URL(candidate.url).origin,
      });
    } catch (error) {
      if (error instanceof CrawlCancelledError) {
        throw error;
      }
      return { state: 'skipped_permanent', candidate, detail: describeCause(error) };
    }

    if (result.status !== 'ok') {
      return { state: 'skipped_permanent', candidate, detail: result.errorDetail };
    }

    let record: ArticleRecord;
    try {
      const fetchedAt = (this.provider.now?.() ?? new Date()).toISOString();
      record = parseArticle(result.rawPayload, candidate, source, fetchedAt);
    } catch (error) {
      return { state: 'skipped_parse', candidate, detail: describeCause(error) };
    }

    if (record.wordCount === 0) {
      return { state: 'skipped_empty', candidate };
    }
    return { state: 'ingested', candidate, record };
  }
}

function summarize(outcomes: CandidateOutcome[]): PoolResult {
  return {
    records: outcomes.flatMap((outcome) =>
      outcome.state === 'ingested' ? [outcome.record] : [],
    ),
    outcomes,
    counts: {
      ingested: 0,
      skipped_permanent: 0,
      skipped_parse: 0,
      skipped_empty: 0,
      ...countBy(outcomes, ({ state }) => state),
    },
  };
}
