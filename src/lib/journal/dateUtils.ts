/**
 * Date utilities for the journal
 *
 * CRITICAL: Entries are keyed by LOCAL calendar date (YYYY-MM-DD), never by UTC.
 *
 * A session logged at 2024-01-20 01:00 in Tokyo belongs to the 20th, while
 * toISOString() would file it under the 19th. Every conversion here goes
 * through date-fns local-time helpers so day arithmetic stays on calendar days,
 * DST transitions included.
 */

import {
  addDays,
  differenceInCalendarDays,
  endOfISOWeek,
  format,
  getISOWeek,
  getISOWeekYear,
  isValid,
  parseISO,
  startOfISOWeek,
} from 'date-fns';
import { InvalidInputError } from './errors';
import type { DateKey, DateRange } from './types';

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Format a Date as YYYY-MM-DD in the local timezone
 *
 * @example
 *   formatDateKey(new Date('2024-01-20T01:00:00+09:00')); // "2024-01-20" in Tokyo
 */
export function formatDateKey(date: Date): DateKey {
  return format(date, 'yyyy-MM-dd');
}

export function getTodayDateKey(): DateKey {
  return formatDateKey(new Date());
}

export function isDateKey(value: string): boolean {
  return DATE_KEY_PATTERN.test(value) && isValid(parseISO(value));
}

/**
 * Parse a YYYY-MM-DD key into local midnight.
 * Rejects impossible dates such as 2024-02-30 instead of rolling them over.
 */
export function parseDateKey(key: DateKey): Date {
  if (!DATE_KEY_PATTERN.test(key)) {
    throw new InvalidInputError(`Malformed date "${key}", expected YYYY-MM-DD`);
  }
  const parsed = parseISO(key);
  if (!isValid(parsed)) {
    throw new InvalidInputError(`Invalid calendar date "${key}"`);
  }
  return parsed;
}

export function addDaysToKey(key: DateKey, days: number): DateKey {
  return formatDateKey(addDays(parseDateKey(key), days));
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier) */
export function daysBetween(from: DateKey, to: DateKey): number {
  return differenceInCalendarDays(parseDateKey(to), parseDateKey(from));
}

/** Calendar length of an inclusive range */
export function spanDays(range: DateRange): number {
  return daysBetween(range.start, range.end) + 1;
}

export function eachDateKey(range: DateRange): DateKey[] {
  const keys: DateKey[] = [];
  const start = parseDateKey(range.start);
  const total = spanDays(range);
  for (let i = 0; i < total; i++) {
    keys.push(formatDateKey(addDays(start, i)));
  }
  return keys;
}

export function isWithinRange(key: DateKey, range: DateRange): boolean {
  // Keys are zero-padded, so lexical order is calendar order
  return key >= range.start && key <= range.end;
}

/** ISO week id like "2025-W02" */
export function isoWeekId(key: DateKey): string {
  const date = parseDateKey(key);
  return `${getISOWeekYear(date)}-W${String(getISOWeek(date)).padStart(2, '0')}`;
}

/** Monday..Sunday of the ISO week containing `key` */
export function isoWeekBounds(key: DateKey): DateRange {
  const date = parseDateKey(key);
  return {
    start: formatDateKey(startOfISOWeek(date)),
    end: formatDateKey(endOfISOWeek(date)),
  };
}
