import { addDaysToKey, eachDateKey, isWithinRange } from '../dateUtils';
import { InvalidInputError } from '../errors';
import { parseDateRange, parseDayEntries } from '../validation';
import { aggregate } from './aggregate';
import type { AggregateOptions, DateRange, DayEntry, RollingPoint } from '../types';

/**
 * Trailing-window load and volume for every day of `range`.
 *
 * The window for day D covers D-(windowDays-1)..D and may reach back before
 * the range. Days whose trailing window holds no entries stay undefined.
 */
export function buildRollingSeries(
  entries: readonly DayEntry[],
  range: DateRange,
  windowDays: number,
  options: AggregateOptions = {},
): RollingPoint[] {
  if (!Number.isInteger(windowDays) || windowDays < 1) {
    throw new InvalidInputError(`Rolling window must be a positive whole number of days, got ${windowDays}`);
  }
  const bounds = parseDateRange(range);
  const all = parseDayEntries(entries);

  return eachDateKey(bounds).map((date) => {
    const window = { start: addDaysToKey(date, -(windowDays - 1)), end: date };
    const result = aggregate(
      all.filter((e) => isWithinRange(e.date, window)),
      window,
      options,
    );
    return {
      date,
      window,
      totalLoad: result.totalLoad,
      volumeMinutes: result.volumeMinutes,
      undefinedLoadCount: result.undefinedLoadCount,
    };
  });
}
