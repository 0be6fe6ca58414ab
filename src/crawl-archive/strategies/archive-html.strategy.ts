import type { OkFetchResult } from '../models/fetch';
import type { ArchiveStrategyConfig } from '../models/source';
import type { CandidateLink, WorkItem } from '../models/work-item';
import type { ArchiveStrategy } from './archive-strategy';

import { collectPageLinks } from './html-links';

type ArchiveHtmlConfig = Extract<ArchiveStrategyConfig, { type: 'archive-html' }>;

/**
 * Date archive pages listing the day's articles as plain anchors.
 */
export default class ArchiveHtmlStrategy implements ArchiveStrategy {
  readonly type = 'archive-html';
  private readonly pattern: RegExp;

  constructor(private readonly config: ArchiveHtmlConfig) {
    this.pattern = new RegExp(config.articleUrlPattern);
  }

  public parse(result: OkFetchResult, item: WorkItem): CandidateLink[] {
    return collectPageLinks(
      result.rawPayload,
      result.url,
      this.config.containerSelector,
    )
      .filter(({ url }) => this.pattern.test(url))
      .map(({ url, text }) => ({
        sourceId: item.sourceId,
        unitKey: item.unitKey,
        url,
        metadata: {
          headline: text,
          publishedDate:
            typeof item.unitKey === 'string' ? item.unitKey : undefined,
        },
      }));
  }
}
