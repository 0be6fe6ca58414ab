import { z } from 'zod';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date')
  .refine(
    (value) => {
      const parsed = new Date(`${value}T00:00:00Z`);
      return (
        !Number.isNaN(parsed.getTime()) &&
        parsed.toISOString().slice(0, 10) === value
      );
    },
    { message: 'not a valid calendar date' },
  );

const positiveInt = z.number().int().positive();

const regexSource = z.string().refine(
  (value) => {
    try {
      new RegExp(value);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'not a valid regular expression' },
);

/**
 * Archive-page strategies. One variant per archive shape, picked by `type` at startup.
 */
export const archiveStrategyConfigSchema = z.discriminatedUnion('type', [
  z.object({
    /** Date archive page listing that day's articles as anchors. */
    type: z.literal('archive-html'),
    /**
     * Only absolute URLs matching this pattern are candidates.
     * @example "/article/"
     */
    articleUrlPattern: regexSource,
    /** Restrict link collection to this element. A missing element is a parse error. */
    containerSelector: z.string().min(1).optional(),
  }),
  z.object({
    /** Paginated JSON API returning an array of article descriptors. */
    type: z.literal('paginated-api'),
    /**
     * Article URL built from item fields; `{field}` tokens are replaced with item values.
     * @example "https://www.example.com/news/national-{webTitleUrl}-{id}.html"
     */
    articleUrlTemplate: z.string().min(1),
    /** Dot path to the items array inside the response; the root when omitted. */
    itemsPath: z.string().min(1).optional(),
    /** Item field names copied into candidate metadata. */
    fields: z
      .object({
        externalId: z.string().default('id'),
        headline: z.string().default('headline'),
        summary: z.string().default('summary'),
        publishedDate: z.string().default('modDate'),
        section: z.string().default('category'),
      })
      .default({}),
  }),
  z.object({
    /** Paginated category listing page on the source's own host. */
    type: z.literal('category-listing'),
    /** Optional narrowing pattern, applied after the exclusions. */
    articleUrlPattern: regexSource.optional(),
    containerSelector: z.string().min(1).optional(),
    excludePathSegments: z
      .array(z.string().min(1))
      .default(['/category/', '/tag/', '/author/', '/page/']),
  }),
]);

/**
 * Selectors used by the default article page parser.
 */
export const articleParserConfigSchema = z
  .object({
    titleSelector: z.string().min(1).optional(),
    /** Tried in order; the first element with text wins. */
    bodySelectors: z.array(z.string().min(1)).optional(),
  })
  .default({});

const dailyGranularitySchema = z.object({
  granularity: z.literal('daily'),
  startDate: isoDate,
  endDate: isoDate,
});

const paginatedGranularitySchema = z.object({
  granularity: z.literal('paginated'),
  startPage: positiveInt.default(1),
  /** Inclusive. When omitted the archive is open-ended. */
  endPage: positiveInt.optional(),
  pageSize: positiveInt.default(10),
});

const sourceFieldsSchema = z.object({
  sourceId: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/i, 'letters, digits, "-" and "_" only'),
  mediaName: z.string().min(1),
  /** BCP 47 language of the articles. */
  languageCode: z.string().min(2).default('en'),
  /**
   * Archive page URL with tokens: {yyyy} {mm} {dd} {m} {d} {mon} {dayCounter} {page} {pageSize}.
   * @example "https://example.com/archive/{yyyy}/{mm}/{dd}/"
   */
  baseUrlTemplate: z.string().url(),
  /** URL used instead of the template for page 1 of a paginated archive. */
  firstPageUrl: z.string().url().optional(),
  /**
   * Archives that address days by a running counter rather than a calendar date.
   * `{dayCounter}` = `base` + days elapsed since `epoch`.
   */
  dayCounter: z
    .object({ epoch: isoDate, base: z.number().int() })
    .optional(),
  /**
   * Extra request headers, e.g. an API token required by a JSON archive.
   * @example { "Authorization": "Bearer test-token" }
   */
  requestHeaders: z.record(z.string()).default({}),
  minDelayMs: z.number().int().nonnegative().default(1_000),
  maxDelayMs: z.number().int().nonnegative().default(3_000),
  maxRetries: z.number().int().nonnegative().default(3),
  baseBackoffMs: z.number().int().positive().default(1_000),
  maxBackoffMs: z.number().int().positive().default(30_000),
  timeoutMs: z.number().int().positive().default(30_000),
  poolSize: positiveInt.default(5),
  maxConsecutiveEmptyPages: positiveInt.default(3),
  strategy: archiveStrategyConfigSchema,
  article: articleParserConfigSchema,
});

export const sourceConfigSchema = z
  .discriminatedUnion('granularity', [
    sourceFieldsSchema.merge(dailyGranularitySchema),
    sourceFieldsSchema.merge(paginatedGranularitySchema),
  ])
  .superRefine((source, ctx) => {
    if (source.minDelayMs > source.maxDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minDelayMs'],
        message: 'minDelayMs must not exceed maxDelayMs',
      });
    }
    if (source.baseBackoffMs > source.maxBackoffMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['baseBackoffMs'],
        message: 'baseBackoffMs must not exceed maxBackoffMs',
      });
    }

    const template = source.baseUrlTemplate;

    if (source.granularity === 'daily') {
      if (source.startDate > source.endDate) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['startDate'],
          message: 'startDate must not be after endDate',
        });
      }
      if (!/\{(yyyy|mm|dd|m|d|mon|dayCounter)\}/.test(template)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['baseUrlTemplate'],
          message: 'a daily archive template needs a date token',
        });
      }
      if (template.includes('{dayCounter}') && !source.dayCounter) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['dayCounter'],
          message: '{dayCounter} is used but dayCounter is not configured',
        });
      }
      if (source.strategy.type !== 'archive-html') {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['strategy', 'type'],
          message: 'daily archives use the archive-html strategy',
        });
      }
      return;
    }

    if (source.endPage !== undefined && source.startPage > source.endPage) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['startPage'],
        message: 'startPage must not be after endPage',
      });
    }
    if (!template.includes('{page}')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['baseUrlTemplate'],
        message: 'a paginated archive template needs the {page} token',
      });
    }
    if (source.strategy.type === 'archive-html') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['strategy', 'type'],
        message: 'paginated archives use paginated-api or category-listing',
      });
    }
  });

/** Source configuration as written by users (defaults not yet applied). */
export type SourceConfigInput = z.input<typeof sourceConfigSchema>;

/** Validated source configuration with defaults applied. */
export type SourceConfig = z.output<typeof sourceConfigSchema>;

export type DailySourceConfig = Extract<SourceConfig, { granularity: 'daily' }>;

export type PaginatedSourceConfig = Extract<
  SourceConfig,
  { granularity: 'paginated' }
>;

export type ArchiveStrategyConfig = z.output<typeof archiveStrategyConfigSchema>;

export type ArticleParserConfig = z.output<typeof articleParserConfigSchema>;
