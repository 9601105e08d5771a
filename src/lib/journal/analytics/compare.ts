/**
 * Comparator - decides per metric whether two windows can be compared
 *
 * A comparison needs both values defined and comparable spans. Anything else
 * comes back as an explicit undefined result with a reason, never as a
 * zero or an estimate.
 */

import { missing, defined } from '../measure';
import {
  METRIC_KINDS,
  type Aggregate,
  type CompareOptions,
  type ComparisonMap,
  type ComparisonResult,
  type MetricKind,
} from '../types';

/**
 * How a metric scales with window length:
 * - additive: grows with the span (sums and counts); per-day rates are comparable
 * - intensive: already normalised (ratios, averages); comparable across spans
 * - extent: bounded by the span (streaks, gaps); never comparable across spans
 */
export type MetricScaling = 'additive' | 'intensive' | 'extent';

export const METRIC_SCALING: Record<MetricKind, MetricScaling> = {
  totalLoad: 'additive',
  undefinedLoadCount: 'additive',
  volumeMinutes: 'additive',
  loggedDayCount: 'additive',
  restDayCount: 'additive',
  activeDayCount: 'additive',
  unloggedDayCount: 'additive',
  hardSessionCount: 'additive',
  lowEnergySessionCount: 'additive',
  restRatio: 'intensive',
  averageRpe: 'intensive',
  averageEnergy: 'intensive',
  loadDensity: 'intensive',
  longestActiveStreak: 'extent',
  longestRestStreak: 'extent',
  maxGapDays: 'extent',
};

function percentChange(delta: number, baseline: number) {
  return baseline === 0 ? missing('zero-baseline') : defined(delta / baseline);
}

/**
 * Compare `metric` from baseline `a` to current `b`.
 *
 * With the default 'absolute' span policy the two windows must have the same
 * calendar length. Under 'rate', additive metrics are divided by their span
 * and compared per day; extent metrics still require equal spans.
 */
export function compare(
  a: Aggregate,
  b: Aggregate,
  metric: MetricKind,
  options: CompareOptions = {},
): ComparisonResult {
  const spanPolicy = options.spanPolicy ?? 'absolute';
  const baseMeasure = a[metric];
  const currentMeasure = b[metric];

  if (baseMeasure.status !== 'defined' || currentMeasure.status !== 'defined') {
    return { status: 'undefined', metric, reason: 'insufficient-data' };
  }

  const sameSpan = a.spanDays === b.spanDays;
  const scaling = METRIC_SCALING[metric];

  if (!sameSpan && (spanPolicy === 'absolute' || scaling === 'extent')) {
    return { status: 'undefined', metric, reason: 'span-mismatch' };
  }

  const perDay = !sameSpan && scaling === 'additive';
  const baseline = perDay ? baseMeasure.value / a.spanDays : baseMeasure.value;
  const current = perDay ? currentMeasure.value / b.spanDays : currentMeasure.value;
  const delta = current - baseline;

  return {
    status: 'defined',
    metric,
    basis: perDay ? 'per-day' : 'total',
    baseline,
    current,
    delta,
    percentChange: percentChange(delta, baseline),
  };
}

/**
 * Compare every requested metric (all tracked metrics by default).
 */
export function compareAll(
  a: Aggregate,
  b: Aggregate,
  metrics: readonly MetricKind[] = METRIC_KINDS,
  options: CompareOptions = {},
): ComparisonMap {
  const results: ComparisonMap = {};
  for (const metric of metrics) {
    results[metric] = compare(a, b, metric, options);
  }
  return results;
}
