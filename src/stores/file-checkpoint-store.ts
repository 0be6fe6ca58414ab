import { randomUUID } from 'node:crypto';
import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';

import type { CheckpointStore } from '~/crawl-archive/models/interfaces';
import type { Checkpoint } from '~/crawl-archive/models/work-item';
import { compareUnitKeys } from '~/crawl-archive/utils/unit-key';
import type { SourceId, UnitKey } from '~/models/common';
import { CheckpointError, describeCause } from '~/models/errors';

const checkpointSchema = z.object({
  sourceId: z.string().min(1),
  lastCompletedUnitKey: z.union([
    z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    z.number().int().positive(),
  ]),
  updatedAt: z.string().datetime(),
});

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

async function writeSynced(path: string, content: string) {
  const handle = await open(path, 'w');
  try {
    await handle.writeFile(content, 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * One JSON file per source under `directory`.
 * Writes go to a temporary file, are flushed to disk and then renamed into
 * place, so a crash or power loss leaves the previous checkpoint intact.
 */
export default class FileCheckpointStore implements CheckpointStore {
  constructor(
    private readonly directory: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  public async load(sourceId: SourceId): Promise<Checkpoint | null> {
    let content: string;
    try {
      content = await readFile(this.pathOf(sourceId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new CheckpointError(sourceId, `Could not read checkpoint: ${describeCause(error)}`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new CheckpointError(sourceId, 'Checkpoint file is not valid JSON', { cause: error });
    }

    const result = checkpointSchema.safeParse(parsed);
    if (!result.success || result.data.sourceId !== sourceId) {
      throw new CheckpointError(sourceId, 'Checkpoint file has an unexpected shape');
    }
    return result.data;
  }

  public async advance(sourceId: SourceId, unitKey: UnitKey): Promise<Checkpoint> {
    const current = await this.load(sourceId);
    if (current) {
      const { lastCompletedUnitKey } = current;
      if (typeof lastCompletedUnitKey !== typeof unitKey) {
        throw new CheckpointError(
          sourceId,
          `Checkpoint holds ${lastCompletedUnitKey}; cannot advance to ${unitKey}`,
        );
      }
      if (compareUnitKeys(unitKey, lastCompletedUnitKey) <= 0) {
        throw new CheckpointError(
          sourceId,
          `Checkpoint would not move forward: ${lastCompletedUnitKey} -> ${unitKey}`,
        );
      }
    }

    const checkpoint: Checkpoint = {
      sourceId,
      lastCompletedUnitKey: unitKey,
      updatedAt: this.now().toISOString(),
    };

    const target = this.pathOf(sourceId);
    const temporary = `${target}.${randomUUID()}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeSynced(temporary, `${JSON.stringify(checkpoint, null, 2)}\n`);
      await rename(temporary, target);
    } catch (error) {
      await rm(temporary, { force: true });
      throw new CheckpointError(sourceId, `Could not write checkpoint: ${describeCause(error)}`, {
        cause: error,
      });
    }
    return checkpoint;
  }

  private pathOf(sourceId: SourceId) {
    return join(this.directory, `${sourceId}.json`);
  }
}
