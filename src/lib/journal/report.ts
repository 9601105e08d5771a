/**
 * Reporting Facade
 *
 * Pulls entries from the log store, aggregates the requested windows and
 * compares them. Everything is recomputed per call; nothing derived is kept.
 */

import { getConfig } from '@/lib/config';
import { logger } from '@/lib/logger';
import stableStringify from '@/lib/utils/stableStringify';
import { aggregate } from './analytics/aggregate';
import { compareAll } from './analytics/compare';
import { buildWeekSummaries } from './analytics/weeks';
import { verifyStoreEntries, type LogStore } from './logStore';
import { resolveCurrentAndPreviousPeriod } from './timeRanges';
import { parseDateRange } from './validation';
import {
  METRIC_KINDS,
  type Aggregate,
  type AggregateOptions,
  type CompareOptions,
  type DateKey,
  type DateRange,
  type DayEntry,
  type MetricKind,
  type Report,
  type WeeklyReport,
} from './types';

export interface ReportOptions extends AggregateOptions, CompareOptions {
  /** Metrics to compare; every tracked metric by default */
  metrics?: readonly MetricKind[];
}

function withDefaults(options: ReportOptions): ReportOptions {
  return { ...options, weighting: options.weighting ?? getConfig().loadWeighting };
}

async function fetchEntries(logStore: LogStore, range: DateRange): Promise<DayEntry[]> {
  // Store failures propagate as thrown; only the returned data is checked here
  const raw = await logStore.getEntries(range);
  return verifyStoreEntries(raw, range);
}

function noteMissingLoad(label: string, result: Aggregate): void {
  const skipped = result.undefinedLoadCount;
  if (skipped.status === 'defined' && skipped.value > 0) {
    logger.debug(
      `${label} ${result.window.start}..${result.window.end}: ${skipped.value} session(s) without RPE left out of load`,
    );
  }
}

/**
 * Build the report for `range`, optionally compared against `comparisonRange`.
 *
 * Comparisons run from the comparison window (baseline) to the primary
 * window (current): a positive delta means the primary window is higher.
 */
export async function buildReport(
  logStore: LogStore,
  range: DateRange,
  comparisonRange?: DateRange,
  options: ReportOptions = {},
): Promise<Report> {
  const primaryRange = parseDateRange(range);
  const baselineRange = comparisonRange ? parseDateRange(comparisonRange) : undefined;
  const settings = withDefaults(options);

  const primaryEntries = await fetchEntries(logStore, primaryRange);
  const primaryAggregate = aggregate(primaryEntries, primaryRange, settings);
  noteMissingLoad('primary', primaryAggregate);

  if (!baselineRange) {
    return { range: primaryRange, primaryAggregate, comparisons: {} };
  }

  const baselineEntries = await fetchEntries(logStore, baselineRange);
  const comparisonAggregate = aggregate(baselineEntries, baselineRange, settings);
  noteMissingLoad('comparison', comparisonAggregate);

  return {
    range: primaryRange,
    comparisonRange: baselineRange,
    primaryAggregate,
    comparisonAggregate,
    dominantActivityChanged:
      comparisonAggregate.dominantActivity !== primaryAggregate.dominantActivity,
    comparisons: compareAll(
      comparisonAggregate,
      primaryAggregate,
      settings.metrics ?? METRIC_KINDS,
      settings,
    ),
  };
}

/**
 * Report for a canonical period ('1w', '1m', '3m', '6m') against the period
 * before it. Calendar months differ in length, so comparisons default to the
 * 'rate' span policy here.
 */
export async function buildPeriodReport(
  logStore: LogStore,
  rangeKey: string,
  anchor?: DateKey,
  options: ReportOptions = {},
): Promise<Report> {
  const { current, previous } = resolveCurrentAndPreviousPeriod(rangeKey, anchor);
  logger.debug(`period ${rangeKey}: ${current.start}..${current.end} vs ${previous.start}..${previous.end}`);
  return buildReport(logStore, current, previous, {
    ...options,
    spanPolicy: options.spanPolicy ?? 'rate',
  });
}

/**
 * ISO-week series of `range` with week-over-week comparisons.
 */
export async function buildWeeklyReport(
  logStore: LogStore,
  range: DateRange,
  options: AggregateOptions & CompareOptions = {},
): Promise<WeeklyReport> {
  const bounds = parseDateRange(range);
  const entries = await fetchEntries(logStore, bounds);
  return {
    range: bounds,
    weeks: buildWeekSummaries(entries, bounds, withDefaults(options)),
  };
}

/**
 * Canonical JSON for a report: same inputs, same bytes.
 */
export function serializeReport(report: Report | WeeklyReport): string {
  return stableStringify(report);
}
