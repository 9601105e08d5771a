// Canonical reflection periods, aligned to whole ISO weeks
import { endOfMonth, startOfMonth, subMonths } from 'date-fns';
import { addDaysToKey, formatDateKey, getTodayDateKey, isoWeekBounds, parseDateKey } from './dateUtils';
import { InvalidInputError } from './errors';
import type { DateKey, DateRange, TimeRangeKey } from './types';

export const TIME_RANGE_LABELS: Record<TimeRangeKey, string> = {
  '1w': '1 week',
  '1m': '1 month',
  '3m': '3 months',
  '6m': '6 months',
};

// Months before the anchor's month that a range reaches back
const MONTHS_BACK: Record<Exclude<TimeRangeKey, '1w'>, number> = {
  '1m': 0,
  '3m': 2,
  '6m': 5,
};

export function isTimeRangeKey(value: string): value is TimeRangeKey {
  return Object.prototype.hasOwnProperty.call(TIME_RANGE_LABELS, value);
}

/**
 * Resolve a range key into concrete dates.
 *
 * - 1w: the ISO week (Mon-Sun) containing the anchor
 * - 1m / 3m / 6m: the anchor's calendar month plus the 0 / 2 / 5 months
 *   before it, widened outward to whole ISO weeks
 */
export function resolveTimeRange(rangeKey: string, anchor: DateKey = getTodayDateKey()): DateRange {
  const key = rangeKey.toLowerCase();
  if (!isTimeRangeKey(key)) {
    throw new InvalidInputError(`Unknown time range "${rangeKey}"`);
  }

  if (key === '1w') {
    return isoWeekBounds(anchor);
  }

  const anchorDate = parseDateKey(anchor);
  const firstMonth = startOfMonth(subMonths(anchorDate, MONTHS_BACK[key]));
  const lastDay = endOfMonth(anchorDate);

  return {
    start: isoWeekBounds(formatDateKey(firstMonth)).start,
    end: isoWeekBounds(formatDateKey(lastDay)).end,
  };
}

/**
 * The current period and the one before it. The previous period is resolved
 * from the day before the current period starts, so with month-based keys the
 * two can share the ISO week that straddles the month boundary.
 */
export function resolveCurrentAndPreviousPeriod(
  rangeKey: string,
  anchor: DateKey = getTodayDateKey(),
): { current: DateRange; previous: DateRange } {
  const current = resolveTimeRange(rangeKey, anchor);
  const previous = resolveTimeRange(rangeKey, addDaysToKey(current.start, -1));
  return { current, previous };
}
