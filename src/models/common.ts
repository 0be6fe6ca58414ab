/**
 * Common type aliases shared by the crawler, the stores and the CLI.
 */

/**
 * ISO 8601 calendar date. YYYY-MM-DD without time.
 * @example "2024-05-01"
 */
export type IsoDateString = string;

/**
 * ISO 8601 timestamp with time and offset.
 * @example "2024-05-01T08:30:00.000Z"
 */
export type IsoDateTimeString = string;

/**
 * Absolute URL string.
 * @example "https://example.com/news/123"
 */
export type UrlString = string;

/**
 * Stable identifier of a configured news source.
 * @example "daily-herald"
 */
export type SourceId = string;

/**
 * Position of one crawl unit inside a source archive.
 * An ISO date for daily archives, a 1-based page number for paginated ones.
 * @example "2024-05-01"
 * @example 42
 */
export type UnitKey = IsoDateString | number;
