import type { IsoDateString } from '~/models/common';

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

// "2025-11-30", "2025-11-30T19:25:00+05:30", "2025-11-30 19:25:00"
const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/;
// "Sun, 30 Nov 2025 07:25 PM (IST)", "30 November 2025"
const DAY_MONTH_YEAR_PATTERN = /^(?:[A-Za-z]{3,9},?\s+)?(\d{1,2})\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})\b/;
// "November 30, 2025 8:30 pm", "Nov 30 2025"
const MONTH_DAY_YEAR_PATTERN = /^(?:[A-Za-z]{3,9},?\s+)?([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})\b/;

const toIsoDate = (year: number, month: number | undefined, day: number) => {
  if (month === undefined) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.toISOString().slice(0, 10);
};

const monthOf = (name: string) => MONTHS[name.slice(0, 3).toLowerCase()];

/**
 * Reduce a published-date string to YYYY-MM-DD.
 * The calendar date is taken as written; offsets are not converted.
 * @returns null when the value is missing or unreadable
 */
export function normalizePublishDate(
  raw: string | null | undefined,
): IsoDateString | null {
  const text = raw?.trim();
  if (!text) return null;

  const iso = ISO_PATTERN.exec(text);
  if (iso) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const dayFirst = DAY_MONTH_YEAR_PATTERN.exec(text);
  if (dayFirst) {
    return toIsoDate(Number(dayFirst[3]), monthOf(dayFirst[2]), Number(dayFirst[1]));
  }

  const monthFirst = MONTH_DAY_YEAR_PATTERN.exec(text);
  if (monthFirst) {
    return toIsoDate(Number(monthFirst[3]), monthOf(monthFirst[1]), Number(monthFirst[2]));
  }

  return null;
}
