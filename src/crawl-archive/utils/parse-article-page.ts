import type { ArticleRecord } from '../models/article';
import type { ArticlePageParser } from '../models/interfaces';
import type { SourceConfig } from '../models/source';
import type { CandidateLink } from '../models/work-item';

import { isPlainObject, uniq } from 'es-toolkit';
import { JSDOM } from 'jsdom';
import { z } from 'zod';

import type { IsoDateTimeString } from '~/models/common';
import { ParseError } from '~/models/errors';
import { collapseWhitespace, countWords, ensureStringArray } from '~/utils/string';

import { normalizePublishDate } from './normalize-date';
import { sanitizeContent } from './sanitize-content';

const DEFAULT_BODY_SELECTORS = [
  '[itemprop="articleBody"]',
  '.articleBody',
  '.article-body',
  '.article-content',
  '.story-content',
  '.entry-content',
  'article',
  'main',
];

/** Below this many words the JSON-LD articleBody is preferred when present. */
const MIN_DOM_BODY_WORDS = 30;

const looseString = z.string().optional().catch(undefined);

const personSchema = z.union([z.string(), z.object({ name: z.string() })]);

const jsonLdArticleSchema = z.object({
  headline: looseString,
  datePublished: looseString,
  articleBody: looseString,
  articleSection: looseString,
  keywords: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .catch(undefined),
  author: z
    .union([personSchema, z.array(personSchema)])
    .optional()
    .catch(undefined),
});

type JsonLdArticle = z.infer<typeof jsonLdArticleSchema>;

/**
 * Default article page parser.
 * Reads metadata from the DOM, Open Graph tags and JSON-LD, falling back to
 * what the archive page already said about the candidate.
 */
export const parseArticlePage: ArticlePageParser = (
  html: string,
  candidate: CandidateLink,
  source: SourceConfig,
  fetchedAt: IsoDateTimeString,
): ArticleRecord => {
  const { document } = new JSDOM(html, { url: candidate.url }).window;

  if (collapseWhitespace(document.body?.textContent ?? '') === '') {
    throw new ParseError(candidate.url, 'Article page has no body content');
  }

  const jsonLd = readJsonLdArticle(document);

  const title = firstNonEmpty(
    source.article.titleSelector
      ? textOf(document.querySelector(source.article.titleSelector))
      : undefined,
    textOf(document.querySelector('h1')),
    metaContent(document, 'meta[property="og:title"]'),
    jsonLd?.headline,
    candidate.metadata.headline,
  );
  if (!title) {
    throw new ParseError(candidate.url, 'Article title not found');
  }

  const bodyText = readBody(document, source, jsonLd);

  return {
    sourceUrl: candidate.url,
    sourceId: source.sourceId,
    mediaName: source.mediaName,
    title,
    author: readAuthor(document, jsonLd),
    publishDate:
      normalizePublishDate(
        firstNonEmpty(
          metaContent(document, 'meta[property="article:published_time"]'),
          document.querySelector('time[datetime]')?.getAttribute('datetime'),
          jsonLd?.datePublished,
        ),
      ) ?? normalizePublishDate(candidate.metadata.publishedDate),
    bodyText,
    tags: readTags(document, jsonLd),
    section:
      firstNonEmpty(
        metaContent(document, 'meta[property="article:section"]'),
        jsonLd?.articleSection,
        candidate.metadata.section,
      ) ?? null,
    wordCount: countWords(bodyText),
    languageCode: source.languageCode,
    unitKey: candidate.unitKey,
    fetchedAt,
  };
};

function readBody(
  document: Document,
  source: SourceConfig,
  jsonLd: JsonLdArticle | null,
): string {
  const selectors = source.article.bodySelectors ?? DEFAULT_BODY_SELECTORS;
  const container =
    selectors
      .map((selector) => document.querySelector(selector))
      .find(
        (element): element is Element =>
          element !== null && textOf(element) !== undefined,
      ) ??
    document.body;

  const domBody = sanitizeContent(container.innerHTML);
  if (countWords(domBody) >= MIN_DOM_BODY_WORDS || !jsonLd?.articleBody) {
    return domBody;
  }

  const jsonLdBody = sanitizeContent(jsonLd.articleBody);
  return countWords(jsonLdBody) > countWords(domBody) ? jsonLdBody : domBody;
}

/** "By", "Written by" or "Author:" ahead of a byline name. */
const BYLINE_PREFIX = /^(?:(?:written\s+)?by|author)\b\s*:?\s*/i;

function readAuthor(document: Document, jsonLd: JsonLdArticle | null) {
  const fromJsonLd = jsonLd?.author
    ? ensureArray(jsonLd.author)
        .map((person) => (typeof person === 'string' ? person : person.name))
        .join(', ')
    : undefined;

  return (
    firstNonEmpty(
      ...[
        metaContent(document, 'meta[name="author"]'),
        textOf(document.querySelector('a[rel="author"]')),
        textOf(document.querySelector('[itemprop="author"] [itemprop="name"]')),
        textOf(document.querySelector('a[href*="/author/"]')),
        fromJsonLd,
      ].map((name) => name?.replace(BYLINE_PREFIX, ''))
    ) ?? null
  );
}

function readTags(document: Document, jsonLd: JsonLdArticle | null): string[] {
  const articleTags = Array.from(
    document.querySelectorAll('meta[property="article:tag"]'),
  ).map((meta) => meta.getAttribute('content') ?? '');

  const keywords = [
    metaContent(document, 'meta[name="keywords"]') ?? '',
    ...(jsonLd?.keywords ? ensureStringArray(jsonLd.keywords) : []),
  ].flatMap((value) => value.split(','));

  return uniq(
    [...articleTags, ...keywords]
      .map(collapseWhitespace)
      .filter((tag) => tag.length > 0),
  );
}

function readJsonLdArticle(document: Document): JsonLdArticle | null {
  const nodes = Array.from(
    document.querySelectorAll('script[type="application/ld+json"]'),
  ).flatMap((script) => flattenJsonLd(parseJson(script.textContent ?? '')));

  for (const node of nodes) {
    const parsed = jsonLdArticleSchema.safeParse(node);
    if (parsed.success && (parsed.data.headline || parsed.data.articleBody)) {
      return parsed.data;
    }
  }
  return null;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Broken JSON-LD blocks are common; the DOM still has the data.
    return null;
  }
}

function flattenJsonLd(value: unknown): unknown[] {
  if (Array.isArray(value)) {
    return value.flatMap(flattenJsonLd);
  }
  if (isPlainObject(value)) {
    const graph: unknown = value['@graph'];
    return Array.isArray(graph) ? [value, ...graph.flatMap(flattenJsonLd)] : [value];
  }
  return [];
}

const ensureArray = <T>(value: T | T[]): T[] =>
  Array.isArray(value) ? value : [value];

function textOf(element: Element | null): string | undefined {
  const text = collapseWhitespace(element?.textContent ?? '');
  return text === '' ? undefined : text;
}

function metaContent(document: Document, selector: string): string | undefined {
  const content = collapseWhitespace(
    document.querySelector(selector)?.getAttribute('content') ?? '',
  );
  return content === '' ? undefined : content;
}

function firstNonEmpty(...values: (string | null | undefined)[]): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}
