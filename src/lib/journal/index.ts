/**
 * Training journal metrics engine
 */

export * from './types';
export { JournalError, InvalidInputError, LogStoreError } from './errors';
export { computeLoad, createLoadCalculator, resolveRpeFactor, DEFAULT_LOAD_WEIGHTING } from './load';
export { defined, missing, isDefined } from './measure';
export {
  aggregate,
  compare,
  compareAll,
  buildWeekSummaries,
  buildRollingSeries,
  METRIC_SCALING,
} from './analytics';
export { InMemoryLogStore, verifyStoreEntries, type LogStore } from './logStore';
export { createSupabaseLogStore, getConfiguredLogStore } from './supabaseLogStore';
export {
  buildReport,
  buildPeriodReport,
  buildWeeklyReport,
  serializeReport,
  type ReportOptions,
} from './report';
export { resolveTimeRange, resolveCurrentAndPreviousPeriod, TIME_RANGE_LABELS } from './timeRanges';
export { parseDayEntry, parseDayEntries, parseDateRange, validateDayEntry } from './validation';
export {
  formatMeasure,
  formatDelta,
  formatPercent,
  formatComparison,
  describeMissing,
  MISSING_PLACEHOLDER,
} from './format';
