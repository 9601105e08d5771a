/**
 * Display formatting for journal metrics
 * Pure string helpers: an undefined value always renders as the placeholder,
 * never as 0 or an empty string.
 */

import { isDefined } from './measure';
import type { ComparisonResult, Measure, MissingReason } from './types';

export const MISSING_PLACEHOLDER = '—';

const MISSING_REASON_LABELS: Record<MissingReason, string> = {
  'empty-window': 'No entries in this period',
  'no-rpe': 'No RPE logged',
  'no-energy': 'No energy level logged',
  'insufficient-data': 'Not enough data to compare',
  'span-mismatch': 'Periods differ in length',
  'zero-baseline': 'No baseline to compare against',
};

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  // Avoid "-0"
  return rounded === 0 ? 0 : rounded;
}

/**
 * Format a number with at most `decimals` places: "420", "6.5" (no trailing .0)
 */
export function formatNumber(value: number, decimals = 1): string {
  return String(round(value, decimals));
}

export function formatMeasure(measure: Measure, options: { decimals?: number; unit?: string } = {}): string {
  if (!isDefined(measure)) {
    return MISSING_PLACEHOLDER;
  }
  const text = formatNumber(measure.value, options.decimals ?? 1);
  return options.unit ? `${text} ${options.unit}` : text;
}

/**
 * Signed delta: "+5", "-3", "0"
 */
export function formatDelta(value: number | Measure, decimals = 1): string {
  if (typeof value !== 'number') {
    if (value.status !== 'defined') return MISSING_PLACEHOLDER;
    return formatDelta(value.value, decimals);
  }
  const rounded = round(value, decimals);
  return rounded > 0 ? `+${rounded}` : String(rounded);
}

/**
 * Fraction as signed percent: 0.125 → "+12.5%"
 */
export function formatPercent(measure: Measure, decimals = 1): string {
  if (!isDefined(measure)) {
    return MISSING_PLACEHOLDER;
  }
  return `${formatDelta(measure.value * 100, decimals)}%`;
}

/**
 * "+60 (+14.3%)", "+60" when the baseline was zero, "—" when not comparable
 */
export function formatComparison(result: ComparisonResult | undefined, decimals = 1): string {
  if (!result || result.status !== 'defined') {
    return MISSING_PLACEHOLDER;
  }
  const delta = formatDelta(result.delta, decimals);
  if (result.percentChange.status !== 'defined') {
    return delta;
  }
  return `${delta} (${formatPercent(result.percentChange, decimals)})`;
}

export function describeMissing(measure: Measure | ComparisonResult | undefined): string | null {
  if (!measure) return MISSING_REASON_LABELS['insufficient-data'];
  if (measure.status === 'defined') return null;
  return MISSING_REASON_LABELS[measure.reason];
}
