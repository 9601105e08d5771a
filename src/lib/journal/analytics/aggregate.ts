/**
 * Rhythm Aggregator - reduces the entries of one calendar window
 *
 * Every calendar day of a window is in exactly one of three states:
 * active (a training entry), rest (an explicit rest entry) or unlogged
 * (no entry). Unlogged is never read as rest.
 */

import { eachDateKey, isWithinRange, spanDays } from '../dateUtils';
import { loadOfEntry, resolveRpeFactor } from '../load';
import { defined, missing } from '../measure';
import { parseDateRange, parseDayEntries } from '../validation';
import {
  ACTIVITY_TYPES,
  type ActivityType,
  type Aggregate,
  type AggregateMetrics,
  type AggregateOptions,
  type DateRange,
  type DayEntry,
  type TrainingActivity,
} from '../types';

export const DEFAULT_HARD_RPE_THRESHOLD = 7;

// "Very tired" on the 1-5 readiness scale
export const LOW_ENERGY_LEVEL = 1;

type DayState = 'active' | 'rest' | 'unlogged';

function emptyActivityCounts(): Record<ActivityType, number> {
  return {
    karate: 0,
    strength: 0,
    running: 0,
    rowing: 0,
    cardio: 0,
    rest: 0,
  };
}

function emptyMetrics(): AggregateMetrics {
  return {
    totalLoad: missing('empty-window'),
    undefinedLoadCount: missing('empty-window'),
    volumeMinutes: missing('empty-window'),
    loggedDayCount: missing('empty-window'),
    restDayCount: missing('empty-window'),
    activeDayCount: missing('empty-window'),
    unloggedDayCount: missing('empty-window'),
    restRatio: missing('empty-window'),
    longestActiveStreak: missing('empty-window'),
    longestRestStreak: missing('empty-window'),
    maxGapDays: missing('empty-window'),
    hardSessionCount: missing('empty-window'),
    lowEnergySessionCount: missing('empty-window'),
    averageRpe: missing('empty-window'),
    averageEnergy: missing('empty-window'),
    loadDensity: missing('empty-window'),
  };
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Most frequent training activity. Ties go to the earlier type in ACTIVITY_TYPES.
 */
export function pickDominantActivity(
  counts: Record<ActivityType, number>,
): TrainingActivity | null {
  let best: TrainingActivity | null = null;
  let bestCount = 0;
  for (const type of ACTIVITY_TYPES) {
    if (type === 'rest') continue;
    if (counts[type] > bestCount) {
      best = type;
      bestCount = counts[type];
    }
  }
  return best;
}

/**
 * Walk the window day by day and measure streaks and gaps.
 * Unlogged days break both streak kinds; a gap is a run of unlogged days
 * between two logged days.
 */
function scanRhythm(window: DateRange, byDate: ReadonlyMap<string, DayEntry>) {
  let longestActive = 0;
  let longestRest = 0;
  let maxGap = 0;
  let activeRun = 0;
  let restRun = 0;
  let unloggedRun = 0;
  let seenLogged = false;

  for (const day of eachDateKey(window)) {
    const entry = byDate.get(day);
    const state: DayState = !entry ? 'unlogged' : entry.activityType === 'rest' ? 'rest' : 'active';

    if (state === 'unlogged') {
      activeRun = 0;
      restRun = 0;
      unloggedRun++;
      continue;
    }

    if (seenLogged) {
      maxGap = Math.max(maxGap, unloggedRun);
    }
    seenLogged = true;
    unloggedRun = 0;

    if (state === 'active') {
      activeRun++;
      restRun = 0;
      longestActive = Math.max(longestActive, activeRun);
    } else {
      restRun++;
      activeRun = 0;
      longestRest = Math.max(longestRest, restRun);
    }
  }

  return { longestActive, longestRest, maxGap };
}

/**
 * Aggregate the entries falling inside `window` (inclusive on both ends).
 *
 * An empty window yields every metric undefined ('empty-window'), not zeros.
 * Volume sums every entry's duration, rest entries included.
 * Total load sums the defined loads and reports the skipped entries in
 * `undefinedLoadCount`; it is undefined only when the window has training
 * entries and none of them carries an RPE.
 */
export function aggregate(
  entries: readonly DayEntry[],
  window: DateRange,
  options: AggregateOptions = {},
): Aggregate {
  const range = parseDateRange(window);
  const factor = resolveRpeFactor(options.weighting);
  const hardThreshold = options.hardRpeThreshold ?? DEFAULT_HARD_RPE_THRESHOLD;
  const span = spanDays(range);

  const inWindow = parseDayEntries(entries).filter((e) => isWithinRange(e.date, range));
  const activityCounts = emptyActivityCounts();

  if (inWindow.length === 0) {
    return {
      window: range,
      spanDays: span,
      entryCount: 0,
      activityCounts,
      dominantActivity: null,
      ...emptyMetrics(),
    };
  }

  let volume = 0;
  let loadSum = 0;
  let definedTrainingLoads = 0;
  let undefinedLoads = 0;
  let restDays = 0;
  let activeDays = 0;
  let hardSessions = 0;
  let lowEnergySessions = 0;
  const rpes: number[] = [];
  const energies: number[] = [];
  const byDate = new Map<string, DayEntry>();

  for (const entry of inWindow) {
    byDate.set(entry.date, entry);
    activityCounts[entry.activityType]++;
    volume += entry.durationMinutes ?? 0;
    if (entry.energyLevel !== undefined) energies.push(entry.energyLevel);
    if (entry.energyLevel === LOW_ENERGY_LEVEL) lowEnergySessions++;

    if (entry.activityType === 'rest') {
      restDays++;
      continue;
    }

    activeDays++;

    const load = loadOfEntry(entry, factor);
    if (load.status === 'defined') {
      loadSum += load.value;
      definedTrainingLoads++;
    } else {
      undefinedLoads++;
    }

    if (entry.rpe !== undefined) {
      rpes.push(entry.rpe);
      if (entry.rpe >= hardThreshold) hardSessions++;
    }
  }

  const loggedDays = restDays + activeDays;
  const rhythm = scanRhythm(range, byDate);
  const allTrainingUnrated = activeDays > 0 && definedTrainingLoads === 0;

  return {
    window: range,
    spanDays: span,
    entryCount: inWindow.length,
    activityCounts,
    dominantActivity: pickDominantActivity(activityCounts),

    totalLoad: allTrainingUnrated ? missing('no-rpe') : defined(loadSum),
    undefinedLoadCount: defined(undefinedLoads),
    volumeMinutes: defined(volume),
    loggedDayCount: defined(loggedDays),
    restDayCount: defined(restDays),
    activeDayCount: defined(activeDays),
    unloggedDayCount: defined(span - loggedDays),
    restRatio: defined(restDays / span),
    longestActiveStreak: defined(rhythm.longestActive),
    longestRestStreak: defined(rhythm.longestRest),
    maxGapDays: defined(rhythm.maxGap),
    hardSessionCount: defined(hardSessions),
    lowEnergySessionCount: defined(lowEnergySessions),
    averageRpe: rpes.length > 0 ? defined(mean(rpes)) : missing('no-rpe'),
    averageEnergy: energies.length > 0 ? defined(mean(energies)) : missing('no-energy'),
    loadDensity: defined(volume / loggedDays),
  };
}
