/**
 * Calendar helpers. Dates travel as YYYY-MM-DD strings and are stored as
 * YYYY-MM-DDT00:00:00 so that lexical order matches chronological order.
 */
import type { DateRange, IsoDate, Month } from './types.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for a real calendar date in YYYY-MM-DD form */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

function formatUtc(date: Date): IsoDate {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

function parseUtc(isoDate: IsoDate): Date {
  const [y, m, d] = isoDate.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d));
}

/** Stored form of a user-chosen date: midnight, no zone */
export function startOfDay(isoDate: IsoDate): string {
  return `${isoDate}T00:00:00`;
}

export function addDays(isoDate: IsoDate, days: number): IsoDate {
  const date = parseUtc(isoDate);
  date.setUTCDate(date.getUTCDate() + days);
  return formatUtc(date);
}

/**
 * Half-open [start, end) bounds for a date range. The end date is
 * inclusive for the caller, so the bound is midnight of the following day.
 */
export function rangeBounds(range: DateRange | undefined): { start?: string; end?: string } {
  return {
    start: range?.start ? startOfDay(range.start) : undefined,
    end: range?.end ? startOfDay(addDays(range.end, 1)) : undefined,
  };
}

/** [first of month, first of next month) for the month containing referenceDate */
export function monthWindow(referenceDate: IsoDate): { start: string; end: string } {
  const [y, m] = referenceDate.split('-').map(Number);
  const start = new Date(Date.UTC(y, m - 1, 1));
  const end = new Date(Date.UTC(y, m, 1));
  return { start: startOfDay(formatUtc(start)), end: startOfDay(formatUtc(end)) };
}

export function monthOf(isoDateOrTimestamp: string): Month {
  return isoDateOrTimestamp.slice(0, 7);
}

/** Local calendar date as YYYY-MM-DD */
export function today(now: Date = new Date()): IsoDate {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}
