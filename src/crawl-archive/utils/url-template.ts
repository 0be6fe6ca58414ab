import type { SourceConfig } from '../models/source';

import type { UnitKey, UrlString } from '~/models/common';

import { daysBetween, isDateKey, splitDate } from './unit-key';

const TOKEN_PATTERN = /\{(\w+)\}/g;

/**
 * Replace `{token}` placeholders. Unknown tokens are left in place.
 */
export function fillTemplate(
  template: string,
  values: Record<string, string | number | undefined>,
): string {
  return template.replace(TOKEN_PATTERN, (match, token: string) => {
    const value = values[token];
    return value === undefined ? match : String(value);
  });
}

/**
 * Build the archive page URL of one unit.
 *
 * @example
 * // baseUrlTemplate "https://example.com/archive/{yyyy}-{mon}/{dd}"
 * buildArchiveUrl(source, '2024-05-01') // "https://example.com/archive/2024-May/01"
 */
export function buildArchiveUrl(source: SourceConfig, unitKey: UnitKey): UrlString {
  if (isDateKey(unitKey)) {
    const dayCounter = source.dayCounter
      ? source.dayCounter.base + daysBetween(source.dayCounter.epoch, unitKey)
      : undefined;

    return fillTemplate(source.baseUrlTemplate, {
      ...splitDate(unitKey),
      dayCounter,
    });
  }

  if (unitKey === 1 && source.firstPageUrl) {
    return source.firstPageUrl;
  }

  return fillTemplate(source.baseUrlTemplate, {
    page: unitKey,
    pageSize: source.granularity === 'paginated' ? source.pageSize : undefined,
  });
}
