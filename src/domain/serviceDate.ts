/**
 * Calendar-date helpers for service dates.
 * Dates travel as `YYYY-MM-DD` strings; no time-of-day or zone is attached.
 */

/** Longest report period, roughly ten years */
export const MAX_PERIOD_DAYS = 3660;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
// Legacy sheets were filled day-first
const DAY_FIRST_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?: .*)?$/;

function toIsoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a stored or submitted service date. Returns null when the value is not a real date.
 */
export function parseServiceDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();

  const iso = ISO_DATE.exec(trimmed);
  if (iso) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const dayFirst = DAY_FIRST_DATE.exec(trimmed);
  if (dayFirst) {
    return toIsoDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }

  return null;
}

export function addDays(isoDate: string, days: number): string {
  const [year, month, day] = isoDate.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day + days));
  return date.toISOString().slice(0, 10);
}

/**
 * Today's calendar date in the given IANA time zone
 */
export function todayIn(timeZone: string, now: Date = new Date()): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((part) => part.type === type)?.value ?? '';

  return `${pick('year')}-${pick('month')}-${pick('day')}`;
}

export function isWithinRange(isoDate: string, startDate: string, endDate: string): boolean {
  return isoDate >= startDate && isoDate <= endDate;
}
