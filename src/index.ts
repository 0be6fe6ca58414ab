export type * from './crawl-archive/models/article';
export type * from './crawl-archive/models/fetch';
export type * from './crawl-archive/models/interfaces';
export type * from './crawl-archive/models/options';
export type * from './crawl-archive/models/report';
export type * from './crawl-archive/models/source';
export type * from './crawl-archive/models/work-item';
export type * from './models/common';
export type * from './models/interfaces';
export type * from './models/log';
export type { ArchiveStrategy } from './crawl-archive/strategies/archive-strategy';
export type { SqlExecutor } from './stores/postgres-article-store';

export * from './models/errors';
export { articleRecordSchema } from './crawl-archive/models/article';
export { sourceConfigSchema } from './crawl-archive/models/source';
export { noopLogger } from './models/interfaces';
export { createArchiveStrategy } from './crawl-archive/strategies/archive-strategy';
export { Fetcher, RetryPolicy } from './crawl-archive/utils/fetch-page';
export { parseArticlePage } from './crawl-archive/utils/parse-article-page';
export { sanitizeContent } from './crawl-archive/utils/sanitize-content';
export { normalizePublishDate } from './crawl-archive/utils/normalize-date';
export { ARTICLES_SCHEMA } from './stores/postgres-article-store';

export { default as ArchiveCrawler } from './crawl-archive';
export { default as FileCheckpointStore } from './stores/file-checkpoint-store';
export { default as JsonlArticleCache } from './stores/jsonl-article-cache';
export { default as PostgresArticleStore } from './stores/postgres-article-store';
