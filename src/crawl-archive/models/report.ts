import type { CrawlErrorCode } from '~/models/errors';
import type {
  IsoDateTimeString,
  SourceId,
  UnitKey,
} from '~/models/common';

export type SourceCrawlStatus = 'completed' | 'failed' | 'cancelled' | 'skipped';

export type SourceCrawlCounts = {
  workItemsCompleted: number;
  /** Unique candidate links found on archive pages. */
  candidatesFound: number;
  /** Candidates that survived the dedup filter. */
  deduped: number;
  ingested: number;
  skippedPermanentFailure: number;
  skippedParseError: number;
  skippedEmptyContent: number;
  /** Removed by the dedup filter, plus upserts that found the URL already stored. */
  skippedDuplicate: number;
  /** Archive pages that failed permanently or could not be parsed. */
  archivePagesFailed: number;
};

export type SourceCrawlReport = {
  sourceId: SourceId;
  mediaName: string;
  status: SourceCrawlStatus;
  startedAt: IsoDateTimeString;
  finishedAt: IsoDateTimeString;
  counts: SourceCrawlCounts;
  /** Watermark after the run; null when no unit was ever completed or the source was skipped. */
  finalCheckpoint: UnitKey | null;
  /** Unit being processed when the run failed or was cancelled. */
  failedUnitKey?: UnitKey;
  error?: {
    code: CrawlErrorCode | 'UNKNOWN';
    message: string;
  };
};

export type CrawlRunReport = {
  runId: string;
  startedAt: IsoDateTimeString;
  finishedAt: IsoDateTimeString;
  sources: SourceCrawlReport[];
};

export const createEmptyCounts = (): SourceCrawlCounts => ({
  workItemsCompleted: 0,
  candidatesFound: 0,
  deduped: 0,
  ingested: 0,
  skippedPermanentFailure: 0,
  skippedParseError: 0,
  skippedEmptyContent: 0,
  skippedDuplicate: 0,
  archivePagesFailed: 0,
});
