import type { OkFetchResult } from '../models/fetch';
import type { ArchiveStrategyConfig } from '../models/source';
import type { CandidateLink, WorkItem } from '../models/work-item';
import type { ArchiveStrategy } from './archive-strategy';

import { collectPageLinks } from './html-links';

type CategoryListingConfig = Extract<
  ArchiveStrategyConfig,
  { type: 'category-listing' }
>;

const bareHost = (url: URL) => url.hostname.replace(/^www\./, '');

/**
 * Paginated category listings: every same-site article link on the page,
 * without listing, tag and author pages.
 */
export default class CategoryListingStrategy implements ArchiveStrategy {
  readonly type = 'category-listing';
  private readonly pattern: RegExp | null;

  constructor(private readonly config: CategoryListingConfig) {
    this.pattern = config.articleUrlPattern
      ? new RegExp(config.articleUrlPattern)
      : null;
  }

  public parse(result: OkFetchResult, item: WorkItem): CandidateLink[] {
    const page = new URL(result.url);

    return collectPageLinks(
      result.rawPayload,
      result.url,
      this.config.containerSelector,
    )
      .filter(({ url }) => this.isArticleLink(new URL(url), page))
      .map(({ url, text }) => ({
        sourceId: item.sourceId,
        unitKey: item.unitKey,
        url,
        metadata: { headline: text },
      }));
  }

  private isArticleLink(link: URL, page: URL) {
    if (bareHost(link) !== bareHost(page)) return false;
    if (link.pathname === '/' || link.pathname === page.pathname) return false;
    if (
      this.config.excludePathSegments.some((segment) =>
        link.pathname.includes(segment),
      )
    ) {
      return false;
    }
    return this.pattern ? this.pattern.test(link.toString()) : true;
  }
}
