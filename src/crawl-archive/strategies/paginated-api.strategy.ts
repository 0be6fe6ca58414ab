import type { OkFetchResult } from '../models/fetch';
import type { ArchiveStrategyConfig } from '../models/source';
import type { CandidateLink, WorkItem } from '../models/work-item';
import type { ArchiveStrategy } from './archive-strategy';

import { isPlainObject } from 'es-toolkit';

import type { UrlString } from '~/models/common';
import { ParseError } from '~/models/errors';

import { normalizePublishDate } from '../utils/normalize-date';
import { fillTemplate } from '../utils/url-template';

type PaginatedApiConfig = Extract<ArchiveStrategyConfig, { type: 'paginated-api' }>;

type ItemValues = Record<string, string | undefined>;

/**
 * JSON archive APIs answering one page of article descriptors per request.
 */
export default class PaginatedApiStrategy implements ArchiveStrategy {
  readonly type = 'paginated-api';
  readonly accept = 'application/json, text/plain, */*';
  private readonly requiredFields: string[];

  constructor(private readonly config: PaginatedApiConfig) {
    this.requiredFields = [
      ...config.articleUrlTemplate.matchAll(/\{(\w+)\}/g),
    ].map((match) => match[1]);
  }

  public parse(result: OkFetchResult, item: WorkItem): CandidateLink[] {
    const items = this.readItems(result);
    const candidates = new Map<UrlString, CandidateLink>();

    for (const entry of items) {
      if (!isPlainObject(entry)) continue;

      const values = toValues(entry);
      if (this.requiredFields.some((field) => values[field] === undefined)) {
        continue;
      }

      const url = toAbsoluteUrl(fillTemplate(this.config.articleUrlTemplate, values));
      if (!url || candidates.has(url)) continue;

      const { fields } = this.config;
      candidates.set(url, {
        sourceId: item.sourceId,
        unitKey: item.unitKey,
        url,
        metadata: {
          externalId: values[fields.externalId],
          headline: values[fields.headline],
          summary: values[fields.summary],
          publishedDate:
            normalizePublishDate(values[fields.publishedDate]) ?? undefined,
          section: values[fields.section],
        },
      });
    }

    return [...candidates.values()];
  }

  private readItems(result: OkFetchResult): unknown[] {
    let payload: unknown;
    try {
      payload = JSON.parse(result.rawPayload);
    } catch (error) {
      throw new ParseError(result.url, 'Archive API answered invalid JSON', {
        cause: error,
      });
    }

    const items = this.config.itemsPath
      ? readPath(payload, this.config.itemsPath)
      : payload;
    if (!Array.isArray(items)) {
      throw new ParseError(
        result.url,
        `Archive API payload has no item array at "${this.config.itemsPath ?? '(root)'}"`,
      );
    }
    return items;
  }
}

function readPath(value: unknown, path: string): unknown {
  return path
    .split('.')
    .reduce<unknown>(
      (current, key) => (isPlainObject(current) ? current[key] : undefined),
      value,
    );
}

function toValues(entry: Record<PropertyKey, unknown>): ItemValues {
  const values: ItemValues = {};
  for (const [key, value] of Object.entries(entry)) {
    if (typeof value === 'string' && value.trim() !== '') {
      values[key] = value.trim();
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      values[key] = String(value);
    }
  }
  return values;
}

function toAbsoluteUrl(value: string): UrlString | null {
  try {
    return new URL(value).toString();
  } catch {
    return null;
  }
}
