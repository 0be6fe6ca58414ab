import type { OkFetchResult } from '../models/fetch';
import type { ArchiveStrategyConfig, SourceConfig } from '../models/source';
import type { CandidateLink, WorkItem } from '../models/work-item';

import ArchiveHtmlStrategy from './archive-html.strategy';
import CategoryListingStrategy from './category-listing.strategy';
import PaginatedApiStrategy from './paginated-api.strategy';

/**
 * Turns one fetched archive page into candidate article links.
 * - Returns candidates unique by URL, in page order.
 * - An empty array means the page legitimately lists nothing.
 * - Throws ParseError when the page cannot be interpreted at all.
 */
export interface ArchiveStrategy {
  readonly type: ArchiveStrategyConfig['type'];

  /** Accept header used when fetching archive pages. */
  readonly accept?: string;

  parse: (result: OkFetchResult, item: WorkItem) => CandidateLink[];
}

/**
 * Pick the strategy variant configured for a source.
 */
export function createArchiveStrategy(source: SourceConfig): ArchiveStrategy {
  const config = source.strategy;

  switch (config.type) {
    case 'archive-html':
      return new ArchiveHtmlStrategy(config);
    case 'paginated-api':
      return new PaginatedApiStrategy(config);
    case 'category-listing':
      return new CategoryListingStrategy(config);
  }
}
