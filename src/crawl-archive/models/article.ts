import { z } from 'zod';

/**
 * Structured article as committed to the persistent store.
 * `sourceUrl` is the dedup key and unique across the store.
 */
export const articleRecordSchema = z.object({
  /**
   * Canonical article URL.
   * @example "https://example.com/article/markets-rally-2024"
   */
  sourceUrl: z.string().url(),

  sourceId: z.string().min(1),

  /**
   * @example "Daily Herald"
   */
  mediaName: z.string().min(1),

  title: z.string().min(1),

  author: z.string().min(1).nullable(),

  /**
   * Publication date (YYYY-MM-DD) when the page or the archive states one.
   * @example "2024-05-01"
   */
  publishDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .nullable(),

  /** Sanitized plain-text body, blocks separated by blank lines. */
  bodyText: z.string(),

  tags: z.array(z.string().min(1)),

  section: z.string().min(1).nullable(),

  /** Must be positive for the record to be stored. */
  wordCount: z.number().int().nonnegative(),

  /**
   * @example "hi"
   */
  languageCode: z.string().min(2),

  /** Archive position the article was discovered at. */
  unitKey: z.union([z.string(), z.number().int().positive()]),

  /** ISO timestamp of the article page fetch. */
  fetchedAt: z.string().datetime(),
});

export type ArticleRecord = z.infer<typeof articleRecordSchema>;
