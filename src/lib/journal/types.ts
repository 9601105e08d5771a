// Training journal types

export const ACTIVITY_TYPES = [
  'karate',
  'strength',
  'running',
  'rowing',
  'cardio',
  'rest',
] as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[number];

export type TrainingActivity = Exclude<ActivityType, 'rest'>;

export const SESSION_EMPHASES = ['technical', 'physical', 'mixed'] as const;

export type SessionEmphasis = (typeof SESSION_EMPHASES)[number];

// Readiness before the session: 1 = very tired ... 5 = sharp
export type EnergyLevel = 1 | 2 | 3 | 4 | 5;

/** YYYY-MM-DD calendar date, no time or timezone */
export type DateKey = string;

export interface DayEntry {
  date: DateKey;
  activityType: ActivityType;
  durationMinutes?: number;
  /** Rated perceived effort 1-10. Absent for rest days and unrated sessions. */
  rpe?: number;
  energyLevel?: EnergyLevel;
  emphasis?: SessionEmphasis;
  notes?: string;
}

export interface DateRange {
  start: DateKey;
  end: DateKey;
}

// ============================================================================
// TAGGED VALUES
// ============================================================================

export type MissingReason =
  | 'empty-window'
  | 'no-rpe'
  | 'no-energy'
  | 'insufficient-data'
  | 'span-mismatch'
  | 'zero-baseline';

export type Measure<R extends MissingReason = MissingReason> =
  | { status: 'defined'; value: number }
  | { status: 'undefined'; reason: R };

export type DefinedMeasure = Extract<Measure, { status: 'defined' }>;

// ============================================================================
// LOAD
// ============================================================================

export type LoadWeightingName = 'linear' | 'squared';

/**
 * Either a named curve or a lookup table of ten strictly increasing
 * factors, index 0 holding f(1).
 */
export type LoadWeighting =
  | LoadWeightingName
  | { kind: 'table'; factors: readonly number[] };

export type LoadValue = Measure<'no-rpe'>;

// ============================================================================
// AGGREGATES
// ============================================================================

export const METRIC_KINDS = [
  'totalLoad',
  'undefinedLoadCount',
  'volumeMinutes',
  'loggedDayCount',
  'restDayCount',
  'activeDayCount',
  'unloggedDayCount',
  'restRatio',
  'longestActiveStreak',
  'longestRestStreak',
  'maxGapDays',
  'hardSessionCount',
  'lowEnergySessionCount',
  'averageRpe',
  'averageEnergy',
  'loadDensity',
] as const;

export type MetricKind = (typeof METRIC_KINDS)[number];

export type AggregateMetrics = Record<MetricKind, Measure>;

export interface Aggregate extends AggregateMetrics {
  window: DateRange;
  spanDays: number;
  entryCount: number;
  activityCounts: Record<ActivityType, number>;
  dominantActivity: TrainingActivity | null;
}

export interface AggregateOptions {
  weighting?: LoadWeighting;
  /** RPE at or above this counts as a hard session. Default 7. */
  hardRpeThreshold?: number;
}

// ============================================================================
// COMPARISON
// ============================================================================

/**
 * absolute: unequal spans are rejected.
 * rate: additive metrics are compared per day, so unequal spans are allowed.
 */
export type SpanPolicy = 'absolute' | 'rate';

export interface CompareOptions {
  spanPolicy?: SpanPolicy;
}

export type ComparisonResult =
  | {
      status: 'defined';
      metric: MetricKind;
      basis: 'total' | 'per-day';
      baseline: number;
      current: number;
      delta: number;
      /** delta / baseline, as a fraction */
      percentChange: Measure<'zero-baseline'>;
    }
  | {
      status: 'undefined';
      metric: MetricKind;
      reason: 'insufficient-data' | 'span-mismatch';
    };

export type ComparisonMap = Partial<Record<MetricKind, ComparisonResult>>;

// ============================================================================
// REPORTS
// ============================================================================

export interface Report {
  range: DateRange;
  comparisonRange?: DateRange;
  primaryAggregate: Aggregate;
  comparisonAggregate?: Aggregate;
  comparisons: ComparisonMap;
  /** Whether the most frequent training activity differs between the windows */
  dominantActivityChanged?: boolean;
}

export interface WeekSummary {
  weekId: string;
  aggregate: Aggregate;
  /** Against the previous week of the series; empty for the first week */
  vsPreviousWeek: ComparisonMap;
}

export interface WeeklyReport {
  range: DateRange;
  weeks: WeekSummary[];
}

export interface RollingPoint {
  date: DateKey;
  window: DateRange;
  totalLoad: Measure;
  volumeMinutes: Measure;
  undefinedLoadCount: Measure;
}

export type TimeRangeKey = '1w' | '1m' | '3m' | '6m';
