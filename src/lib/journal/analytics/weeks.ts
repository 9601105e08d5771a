// Weekly series - ISO week buckets with week-over-week comparisons
import { addDaysToKey, isoWeekBounds, isoWeekId, isWithinRange } from '../dateUtils';
import { parseDateRange, parseDayEntries } from '../validation';
import { aggregate } from './aggregate';
import { compareAll } from './compare';
import {
  METRIC_KINDS,
  type AggregateOptions,
  type CompareOptions,
  type DateRange,
  type DayEntry,
  type WeekSummary,
} from '../types';

/**
 * ISO weeks overlapping `range`, each clipped to the range.
 * A range starting mid-week yields a shorter first window.
 */
export function buildWeekWindows(range: DateRange): Array<{ weekId: string; window: DateRange }> {
  const bounds = parseDateRange(range);
  const windows: Array<{ weekId: string; window: DateRange }> = [];

  let weekStart = isoWeekBounds(bounds.start).start;
  while (weekStart <= bounds.end) {
    const weekEnd = addDaysToKey(weekStart, 6);
    windows.push({
      weekId: isoWeekId(weekStart),
      window: {
        start: weekStart < bounds.start ? bounds.start : weekStart,
        end: weekEnd > bounds.end ? bounds.end : weekEnd,
      },
    });
    weekStart = addDaysToKey(weekStart, 7);
  }

  return windows;
}

/**
 * Build ordered week summaries for a range.
 *
 * Every week of the range is present, including weeks with no entries
 * (their aggregate is entirely undefined). The first week has no
 * previous-week comparison; clipped edge weeks compare as span mismatches
 * unless a 'rate' span policy is given.
 */
export function buildWeekSummaries(
  entries: readonly DayEntry[],
  range: DateRange,
  options: AggregateOptions & CompareOptions = {},
): WeekSummary[] {
  const all = parseDayEntries(entries);
  const summaries: WeekSummary[] = [];
  let previous: WeekSummary | null = null;

  for (const { weekId, window } of buildWeekWindows(range)) {
    const weekEntries = all.filter((e) => isWithinRange(e.date, window));
    const summary: WeekSummary = {
      weekId,
      aggregate: aggregate(weekEntries, window, options),
      vsPreviousWeek: {},
    };
    if (previous) {
      summary.vsPreviousWeek = compareAll(previous.aggregate, summary.aggregate, METRIC_KINDS, options);
    }
    summaries.push(summary);
    previous = summary;
  }

  return summaries;
}
