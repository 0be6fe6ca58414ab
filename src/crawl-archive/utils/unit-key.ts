import type { IsoDateString, UnitKey } from '~/models/common';

const DAY_MS = 24 * 60 * 60 * 1000;

const MONTH_ABBREVIATIONS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

export const isDateKey = (key: UnitKey): key is IsoDateString =>
  typeof key === 'string';

export const isPageKey = (key: UnitKey): key is number =>
  typeof key === 'number';

/**
 * Orders two keys of the same kind. Dates compare lexically, which matches
 * chronological order for YYYY-MM-DD.
 * @returns negative, zero or positive like Array.prototype.sort comparators
 */
export function compareUnitKeys(a: UnitKey, b: UnitKey): number {
  if (isPageKey(a) && isPageKey(b)) {
    return a - b;
  }
  if (isDateKey(a) && isDateKey(b)) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new TypeError(`Cannot compare unit keys of different kinds: ${a}, ${b}`);
}

const toUtcDate = (date: IsoDateString) => new Date(`${date}T00:00:00Z`);

export function addDays(date: IsoDateString, days: number): IsoDateString {
  const next = toUtcDate(date);
  next.setUTCDate(next.getUTCDate() + days);
  return next.toISOString().slice(0, 10);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: IsoDateString, to: IsoDateString): number {
  return Math.round(
    (toUtcDate(to).getTime() - toUtcDate(from).getTime()) / DAY_MS,
  );
}

export type DateParts = {
  yyyy: string;
  mm: string;
  dd: string;
  m: string;
  d: string;
  mon: string;
};

export function splitDate(date: IsoDateString): DateParts {
  const [yyyy, mm, dd] = date.split('-');
  const month = Number(mm);
  return {
    yyyy,
    mm,
    dd,
    m: String(month),
    d: String(Number(dd)),
    mon: MONTH_ABBREVIATIONS[month - 1],
  };
}
