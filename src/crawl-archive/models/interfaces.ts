import type { ArticleRecord } from './article';
import type { CrawlOptions } from './options';
import type { SourceConfig, SourceConfigInput } from './source';
import type { CandidateLink, Checkpoint } from './work-item';

import type {
  IsoDateTimeString,
  SourceId,
  UnitKey,
  UrlString,
} from '~/models/common';
import type { AppLogger } from '~/models/interfaces';

/**
 * Persistent article store. Source of truth for dedup.
 */
export interface ArticleStore {
  /**
   * Look up which of the given URLs are already stored.
   * Called once per WorkItem with every candidate URL of that unit.
   * @param urls Candidate article URLs
   * @returns The subset of `urls` already present
   */
  findExistingUrls: (urls: UrlString[]) => Promise<UrlString[]>;

  /**
   * Insert records, leaving rows whose `sourceUrl` already exists untouched.
   * Must be safe to call again with the same records.
   * @returns Number of newly inserted records
   */
  upsertArticles: (records: ArticleRecord[]) => Promise<number>;
}

/**
 * Durable per-source resume watermark.
 */
export interface CheckpointStore {
  /**
   * @returns The last persisted checkpoint, or null when the source never completed a unit
   */
  load: (sourceId: SourceId) => Promise<Checkpoint | null>;

  /**
   * Atomically persist a new watermark.
   * Rejects with CheckpointError when `unitKey` does not move the watermark forward.
   */
  advance: (sourceId: SourceId, unitKey: UnitKey) => Promise<Checkpoint>;
}

/**
 * Best-effort local copy of committed records. Failures never fail a commit.
 */
export interface ArticleCache {
  append: (sourceId: SourceId, records: ArticleRecord[]) => Promise<void>;
}

/**
 * Turns a fetched article page into an ArticleRecord.
 * Throws ParseError when the page cannot be interpreted.
 */
export type ArticlePageParser = (
  html: string,
  candidate: CandidateLink,
  source: SourceConfig,
  fetchedAt: IsoDateTimeString,
) => ArticleRecord;

/**
 * Dependencies and sources for one ArchiveCrawler.
 */
export type ArchiveCrawlerConfig = {
  /**
   * Source configurations, validated at construction.
   */
  sources: SourceConfigInput[];

  articleStore: ArticleStore;

  checkpointStore: CheckpointStore;

  /**
   * Optional local cache receiving every committed batch.
   */
  articleCache?: ArticleCache;

  /**
   * Per-source article parsers replacing the default one.
   * @example { 'daily-herald': parseHeraldArticle }
   */
  articleParsers?: Record<SourceId, ArticlePageParser>;

  /**
   * Structured logger. Defaults to a no-op logger.
   */
  logger?: AppLogger;

  options?: CrawlOptions;
};
