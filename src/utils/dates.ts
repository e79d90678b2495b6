/**
 * Calendar date helpers (UTC, `YYYY-MM-DD`)
 * Location: src/utils/dates.ts
 */

import { InvalidTimeWindowError } from '../services/errors';
import type { CalendarDate, TimeWindow } from '../types/satellite';

const DAY_MS = 86_400_000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a calendar date to UTC midnight epoch ms.
 * Rejects impossible dates such as 2024-02-30.
 */
export function parseCalendarDate(value: string): number {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new InvalidTimeWindowError(`Date must be in YYYY-MM-DD format (got "${value}")`);
  }
  const [, year, month, day] = match;
  const epoch = Date.UTC(Number(year), Number(month) - 1, Number(day));
  if (formatCalendarDate(epoch) !== value) {
    throw new InvalidTimeWindowError(`Not a valid calendar date: ${value}`);
  }
  return epoch;
}

export function formatCalendarDate(epochMs: number): CalendarDate {
  return new Date(epochMs).toISOString().slice(0, 10);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return formatCalendarDate(parseCalendarDate(date) + days * DAY_MS);
}

export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  return Math.round((parseCalendarDate(to) - parseCalendarDate(from)) / DAY_MS);
}

export function createTimeWindow(before: CalendarDate, after: CalendarDate): TimeWindow {
  const elapsedDays = daysBetween(before, after);
  if (elapsedDays <= 0) {
    throw new InvalidTimeWindowError(
      `After date (${after}) must be later than before date (${before})`
    );
  }
  return Object.freeze({ before, after, elapsedDays });
}

/**
 * Dates to try for a request, closest first; on equal distance the
 * earlier date comes first: d, d-1, d+1, d-2, d+2, ...
 */
export function fallbackDates(date: CalendarDate, windowDays: number): CalendarDate[] {
  const dates = [date];
  for (let offset = 1; offset <= windowDays; offset++) {
    dates.push(addDays(date, -offset), addDays(date, offset));
  }
  return dates;
}
