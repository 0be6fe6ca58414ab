import { chunk } from 'es-toolkit';
import { z } from 'zod';

import type { ArticleRecord } from '~/crawl-archive/models/article';
import type { ArticleStore } from '~/crawl-archive/models/interfaces';
import type { UrlString } from '~/models/common';

/**
 * Anything that runs a parameterised query: a pg Pool, a PoolClient or a Client.
 */
export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const urlRowsSchema = z.array(z.object({ source_url: z.string() }));

export const ARTICLES_SCHEMA = `
CREATE TABLE IF NOT EXISTS articles (
  id BIGSERIAL PRIMARY KEY,
  source_url TEXT NOT NULL UNIQUE,
  source_id TEXT NOT NULL,
  media_name TEXT NOT NULL,
  title TEXT NOT NULL,
  author TEXT,
  publish_date DATE,
  body_text TEXT NOT NULL,
  tags TEXT[] NOT NULL DEFAULT '{}',
  section TEXT,
  word_count INTEGER NOT NULL CHECK (word_count > 0),
  language_code TEXT NOT NULL,
  unit_key TEXT NOT NULL,
  fetched_at TIMESTAMPTZ NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_articles_media_publish_date ON articles (media_name, publish_date);
CREATE INDEX IF NOT EXISTS idx_articles_source_id ON articles (source_id);
`;

const COLUMNS = [
  'source_url',
  'source_id',
  'media_name',
  'title',
  'author',
  'publish_date',
  'body_text',
  'tags',
  'section',
  'word_count',
  'language_code',
  'unit_key',
  'fetched_at',
] as const;

/** 1000 rows × 13 columns stays under PostgreSQL's 65535 bind parameters. */
export const INSERT_BATCH_SIZE = 1000;

const toRow = (record: ArticleRecord): unknown[] => [
  record.sourceUrl,
  record.sourceId,
  record.mediaName,
  record.title,
  record.author,
  record.publishDate,
  record.bodyText,
  record.tags,
  record.section,
  record.wordCount,
  record.languageCode,
  String(record.unitKey),
  record.fetchedAt,
];

/**
 * ArticleStore on PostgreSQL. `source_url` is unique; inserts never overwrite.
 */
export default class PostgresArticleStore implements ArticleStore {
  constructor(private readonly db: SqlExecutor) {}

  /**
   * Create the articles table and its indexes when missing.
   */
  public async ensureSchema(): Promise<void> {
    await this.db.query(ARTICLES_SCHEMA);
  }

  public async findExistingUrls(urls: UrlString[]): Promise<UrlString[]> {
    if (urls.length === 0) {
      return [];
    }
    const { rows } = await this.db.query(
      'SELECT source_url FROM articles WHERE source_url = ANY($1::text[])',
      [urls],
    );
    return urlRowsSchema.parse(rows).map(({ source_url }) => source_url);
  }

  /**
   * Inserts in batches of {@link INSERT_BATCH_SIZE}. Batches are not atomic
   * together; a rerun after a failed batch skips what earlier batches inserted.
   */
  public async upsertArticles(records: ArticleRecord[]): Promise<number> {
    let inserted = 0;
    for (const batch of chunk(records, INSERT_BATCH_SIZE)) {
      inserted += await this.insertBatch(batch);
    }
    return inserted;
  }

  private async insertBatch(records: ArticleRecord[]): Promise<number> {
    const values: unknown[] = [];
    const tuples = records.map((record) => {
      const offset = values.length;
      values.push(...toRow(record));
      return `(${COLUMNS.map((_, index) => `$${offset + index + 1}`).join(', ')})`;
    });

    const { rows } = await this.db.query(
      `INSERT INTO articles (${COLUMNS.join(', ')})
       VALUES ${tuples.join(',\n              ')}
       ON CONFLICT (source_url) DO NOTHING
       RETURNING source_url`,
      values,
    );
    return urlRowsSchema.parse(rows).length;
  }
}
