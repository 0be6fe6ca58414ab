import type { SourceConfig } from '../models/source';
import type { Checkpoint, WorkItem } from '../models/work-item';

import { ConfigError } from '~/models/errors';

import { addDays, daysBetween, isDateKey } from './unit-key';

/**
 * Lazily yield the WorkItems of a source that come strictly after its checkpoint.
 *
 * - Daily sources walk UTC calendar days from `startDate` to `endDate` inclusive.
 * - Paginated sources walk pages from `startPage`; without `endPage` the sequence
 *   never ends and the caller decides when to stop.
 * - `sequence` is the unit's offset from the configured floor, so the same
 *   checkpoint always regenerates the same items.
 */
export function* enumerateWorkItems(
  source: SourceConfig,
  checkpoint: Checkpoint | null,
): Generator<WorkItem> {
  if (checkpoint && checkpoint.sourceId !== source.sourceId) {
    throw new ConfigError(
      `Checkpoint of "${checkpoint.sourceId}" given for source "${source.sourceId}"`,
    );
  }

  const resumeKey = checkpoint?.lastCompletedUnitKey;

  if (source.granularity === 'daily') {
    if (resumeKey !== undefined && !isDateKey(resumeKey)) {
      throw new ConfigError(
        `Source "${source.sourceId}" is daily but its checkpoint holds page ${resumeKey}`,
      );
    }

    let date = source.startDate;
    if (resumeKey !== undefined && resumeKey >= date) {
      date = addDays(resumeKey, 1);
    }

    for (; date <= source.endDate; date = addDays(date, 1)) {
      yield createWorkItem(source, date, daysBetween(source.startDate, date));
    }
    return;
  }

  if (resumeKey !== undefined && isDateKey(resumeKey)) {
    throw new ConfigError(
      `Source "${source.sourceId}" is paginated but its checkpoint holds date ${resumeKey}`,
    );
  }

  let page = source.startPage;
  if (resumeKey !== undefined && resumeKey >= page) {
    page = resumeKey + 1;
  }

  const endPage = source.endPage ?? Number.POSITIVE_INFINITY;
  for (; page <= endPage; page++) {
    yield createWorkItem(source, page, page - source.startPage);
  }
}

const createWorkItem = (
  source: SourceConfig,
  unitKey: WorkItem['unitKey'],
  sequence: number,
): WorkItem => ({
  sourceId: source.sourceId,
  unitKey,
  status: 'pending',
  attemptCount: 0,
  sequence,
});
