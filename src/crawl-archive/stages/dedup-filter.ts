import type { ArticleStore } from '../models/interfaces';
import type { CandidateLink } from '../models/work-item';

import { uniqBy } from 'es-toolkit';

import type { UrlString } from '~/models/common';
import { StoreUnavailableError } from '~/models/errors';

export type DedupResult = {
  /** Candidates not yet in the store, first occurrence of each URL. */
  fresh: CandidateLink[];
  /** Stored URLs plus repeats inside the batch. */
  duplicates: CandidateLink[];
};

/**
 * Drops candidates whose URL the article store already holds.
 * One store lookup per batch; a failed lookup fails the batch.
 */
export default class DedupFilter {
  constructor(private readonly store: ArticleStore) {}

  public async filter(candidates: CandidateLink[]): Promise<DedupResult> {
    if (candidates.length === 0) {
      return { fresh: [], duplicates: [] };
    }

    const unique = uniqBy(candidates, ({ url }) => url);

    let existing: UrlString[];
    try {
      existing = await this.store.findExistingUrls(unique.map(({ url }) => url));
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError('findExistingUrls', { cause: error });
    }

    const existingUrls = new Set(existing);
    const fresh = unique.filter(({ url }) => !existingUrls.has(url));
    const freshSet = new Set(fresh);

    return {
      fresh,
      duplicates: candidates.filter((candidate) => !freshSet.has(candidate)),
    };
  }
}
