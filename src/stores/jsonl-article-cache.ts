import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  type ArticleRecord,
  articleRecordSchema,
} from '~/crawl-archive/models/article';
import type { ArticleCache } from '~/crawl-archive/models/interfaces';
import type { SourceId } from '~/models/common';

/**
 * Appends committed records as JSON lines to `<directory>/<sourceId>.jsonl`.
 * May hold repeats across re-runs; the article store stays the source of truth.
 */
export default class JsonlArticleCache implements ArticleCache {
  constructor(private readonly directory: string) {}

  public async append(sourceId: SourceId, records: ArticleRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    await mkdir(this.directory, { recursive: true });
    await appendFile(
      this.pathOf(sourceId),
      records.map((record) => `${JSON.stringify(record)}\n`).join(''),
      'utf-8',
    );
  }

  /**
   * Read back the cached records of a source, skipping lines that no longer validate.
   */
  public async read(sourceId: SourceId): Promise<ArticleRecord[]> {
    let content: string;
    try {
      content = await readFile(this.pathOf(sourceId), 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return content
      .split('\n')
      .filter((line) => line.trim() !== '')
      .flatMap((line) => {
        const parsed = articleRecordSchema.safeParse(parseLine(line));
        return parsed.success ? [parsed.data] : [];
      });
  }

  private pathOf(sourceId: SourceId) {
    return join(this.directory, `${sourceId}.jsonl`);
  }
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    // A torn last line after a crash is expected.
    return null;
  }
}
