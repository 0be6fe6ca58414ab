import {
  type ArticleRecord,
  articleRecordSchema,
} from '../models/article';
import type { ArticleCache, ArticleStore } from '../models/interfaces';

import { groupBy } from 'es-toolkit';

import { StoreUnavailableError, describeCause } from '~/models/errors';
import type { AppLogger } from '~/models/interfaces';

export type CommitResult = {
  /** Records newly inserted into the store. */
  written: number;
  /** Records dropped for having no words. */
  droppedEmpty: number;
  /** Records dropped for failing schema validation. */
  droppedInvalid: number;
  /** Valid records whose URL the store already held. */
  alreadyPresent: number;
};

export type SinkWriterConfig = {
  store: ArticleStore;
  cache?: ArticleCache;
  logger: AppLogger;
  taskId?: string;
};

/**
 * Durable commit of one WorkItem's records.
 * Resolving means the records are in the store. The cache copy is written
 * first and is best-effort, so it survives a store outage.
 */
export default class SinkWriter {
  constructor(private readonly config: SinkWriterConfig) {}

  public async commit(records: ArticleRecord[]): Promise<CommitResult> {
    const nonEmpty = records.filter(({ wordCount }) => wordCount > 0);
    const valid = nonEmpty.filter((record) => this.isValid(record));

    const result: CommitResult = {
      written: 0,
      droppedEmpty: records.length - nonEmpty.length,
      droppedInvalid: nonEmpty.length - valid.length,
      alreadyPresent: 0,
    };
    if (valid.length === 0) {
      return result;
    }

    await this.appendToCache(valid);

    let inserted: number;
    try {
      inserted = await this.config.store.upsertArticles(valid);
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError('upsertArticles', { cause: error });
    }

    return {
      ...result,
      written: inserted,
      alreadyPresent: Math.max(valid.length - inserted, 0),
    };
  }

  private isValid(record: ArticleRecord) {
    const parsed = articleRecordSchema.safeParse(record);
    if (!parsed.success) {
      this.config.logger.debug({
        event: 'sink.record.invalid',
        taskId: this.config.taskId,
        data: {
          url: record.sourceUrl,
          issues: parsed.error.issues.map(
            ({ path, message }) => `${path.join('.')}: ${message}`,
          ),
        },
      });
    }
    return parsed.success;
  }

  private async appendToCache(records: ArticleRecord[]) {
    const { cache } = this.config;
    if (!cache) {
      return;
    }

    for (const [sourceId, group] of Object.entries(
      groupBy(records, ({ sourceId }) => sourceId),
    )) {
      try {
        await cache.append(sourceId, group);
      } catch (error) {
        this.config.logger.error({
          event: 'sink.cache.error',
          taskId: this.config.taskId,
          data: { sourceId, count: group.length, error: describeCause(error) },
        });
      }
    }
  }
}
