import type {
  IsoDateString,
  IsoDateTimeString,
  SourceId,
  UnitKey,
  UrlString,
} from '~/models/common';

export type WorkItemStatus = 'pending' | 'in_progress' | 'done' | 'failed';

/**
 * Stages one WorkItem moves through inside the crawl driver.
 * `done` triggers the checkpoint advance; `failed` ends the source run.
 */
export type WorkItemState =
  | 'pending'
  | 'fetching_archive'
  | 'extracting_candidates'
  | 'deduping'
  | 'parallel_extracting'
  | 'committing'
  | 'done'
  | 'failed';

/**
 * One unit of crawl work: an archive date or an archive page of one source.
 */
export type WorkItem = {
  sourceId: SourceId;

  /**
   * @example "2024-05-01"
   * @example 7
   */
  unitKey: UnitKey;

  status: WorkItemStatus;

  /** Times this unit has been started in the current run. */
  attemptCount: number;

  /** 0-based position in enumeration order. */
  sequence: number;
};

/**
 * Durable watermark of the last fully ingested WorkItem of a source.
 */
export type Checkpoint = {
  sourceId: SourceId;
  lastCompletedUnitKey: UnitKey;
  updatedAt: IsoDateTimeString;
};

/**
 * Article reference found on an archive page, not yet checked against the store.
 */
export type CandidateLink = {
  sourceId: SourceId;
  unitKey: UnitKey;
  url: UrlString;
  metadata: CandidateMetadata;
};

/**
 * Whatever the archive page already tells about the article.
 * The article page parser falls back to these values.
 */
export type CandidateMetadata = {
  externalId?: string;
  headline?: string;
  summary?: string;
  publishedDate?: IsoDateString;
  section?: string;
};
