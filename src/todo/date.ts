import type { CalendarDate } from './model.js';

const CALENDAR_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** `Date.UTC` maps years 0-99 to 1900-1999; `setUTCFullYear` does not. */
function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

/**
 * True if `value` is `YYYY-MM-DD` and names a real day (no `2024-02-30`).
 */
export function isCalendarDate(value: string): value is CalendarDate {
  const match = value.match(CALENDAR_DATE_RE);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return false;
  const candidate = utcDate(year, month, day);
  return (
    candidate.getUTCFullYear() === year &&
    candidate.getUTCMonth() === month - 1 &&
    candidate.getUTCDate() === day
  );
}

export function parseCalendarDate(value: string): CalendarDate | undefined {
  return isCalendarDate(value) ? value : undefined;
}

function toUtcMs(date: CalendarDate): number {
  const [year, month, day] = date.split('-').map(Number);
  return utcDate(year ?? 0, month ?? 1, day ?? 1).getTime();
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function fromUtc(date: Date): CalendarDate {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtc(new Date(toUtcMs(date) + days * MS_PER_DAY));
}

/**
 * The local calendar date of `now`.
 *
 * Only the CLI and server call this; the core always takes the reference date
 * as an argument.
 */
export function localCalendarDate(now: Date = new Date()): CalendarDate {
  return `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1, 2)}-${pad(now.getDate(), 2)}`;
}
