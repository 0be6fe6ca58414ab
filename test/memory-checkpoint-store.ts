import type { CheckpointStore } from '~/crawl-archive/models/interfaces';
import type { Checkpoint } from '~/crawl-archive/models/work-item';
import { compareUnitKeys } from '~/crawl-archive/utils/unit-key';
import type { SourceId, UnitKey } from '~/models/common';
import { CheckpointError } from '~/models/errors';

/**
 * In-process CheckpointStore with the same monotonic contract as the file store.
 */
export class MemoryCheckpointStore implements CheckpointStore {
  readonly checkpoints = new Map<SourceId, Checkpoint>();
  /** Every accepted advance, in order. */
  readonly history: UnitKey[] = [];
  failAdvance = false;

  readonly load = vi.fn(async (sourceId: SourceId) => this.checkpoints.get(sourceId) ?? null);

  readonly advance = vi.fn(async (sourceId: SourceId, unitKey: UnitKey) => {
    if (this.failAdvance) {
      throw new Error('disk full');
    }
    const current = this.checkpoints.get(sourceId);
    if (current && compareUnitKeys(unitKey, current.lastCompletedUnitKey) <= 0) {
      throw new CheckpointError(sourceId, `Checkpoint would move backwards to ${unitKey}`);
    }
    const checkpoint: Checkpoint = {
      sourceId,
      lastCompletedUnitKey: unitKey,
      updatedAt: '2024-06-01T10:00:00.000Z',
    };
    this.checkpoints.set(sourceId, checkpoint);
    this.history.push(unitKey);
    return checkpoint;
  });

  set(sourceId: SourceId, unitKey: UnitKey) {
    this.checkpoints.set(sourceId, {
      sourceId,
      lastCompletedUnitKey: unitKey,
      updatedAt: '2024-05-31T00:00:00.000Z',
    });
  }
}
