const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const DAYS_PER_YEAR = 365.25;

/** Date-time with no `Z` or `±hh:mm` suffix */
const LOCAL_DATE_TIME = /T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Parse an ISO-8601 timestamp. Returns null for anything missing or invalid.
 * A date-time without an offset is read as UTC, not local time.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const trimmed = value.trim();
  const ms = Date.parse(LOCAL_DATE_TIME.test(trimmed) ? `${trimmed}Z` : trimmed);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Whole days from `earlier` to `later`, floored (negative when `later` is first).
 */
export function wholeDaysBetween(later: Date, earlier: Date): number {
  return Math.floor((later.getTime() - earlier.getTime()) / MS_PER_DAY);
}

/** Years between two instants, counted in whole days */
export function yearsBetween(later: Date, earlier: Date): number {
  return wholeDaysBetween(later, earlier) / DAYS_PER_YEAR;
}

export function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
