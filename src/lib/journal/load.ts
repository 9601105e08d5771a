// Load Calculator - session load from duration and perceived effort
import { InvalidInputError } from './errors';
import { parseDayEntry, parseLoadWeighting } from './validation';
import type { DayEntry, LoadValue, LoadWeighting } from './types';

export type RpeFactor = (rpe: number) => number;

export const DEFAULT_LOAD_WEIGHTING: LoadWeighting = 'linear';

/**
 * Linear weighting: f(rpe) = rpe
 * load = minutes × RPE (session-RPE method, "arbitrary units")
 */
export function linearRpeFactor(rpe: number): number {
  return rpe;
}

/**
 * Squared weighting: f(rpe) = rpe²
 * Emphasises hard sessions; a 60 min RPE 8 session counts 4x a 60 min RPE 4 one.
 */
export function squaredRpeFactor(rpe: number): number {
  return rpe * rpe;
}

/**
 * Resolve a weighting policy into a factor function.
 * Tables are checked once here (ten strictly increasing factors).
 */
export function resolveRpeFactor(weighting: LoadWeighting = DEFAULT_LOAD_WEIGHTING): RpeFactor {
  const policy = parseLoadWeighting(weighting);
  if (policy === 'linear') return linearRpeFactor;
  if (policy === 'squared') return squaredRpeFactor;
  const factors = [...policy.factors];
  return (rpe: number) => factors[rpe - 1];
}

function assertRpe(rpe: number): void {
  if (!Number.isInteger(rpe) || rpe < 1 || rpe > 10) {
    throw new InvalidInputError(`RPE must be an integer between 1 and 10, got ${rpe}`);
  }
}

/**
 * Load of an already validated entry.
 *
 * Rest is a defined zero. A training entry without RPE has no load at all:
 * callers must keep it apart from zero.
 */
export function loadOfEntry(entry: DayEntry, factor: RpeFactor): LoadValue {
  if (entry.activityType === 'rest') {
    return { status: 'defined', value: 0 };
  }
  if (entry.rpe === undefined) {
    return { status: 'undefined', reason: 'no-rpe' };
  }
  assertRpe(entry.rpe);
  return { status: 'defined', value: (entry.durationMinutes ?? 0) * factor(entry.rpe) };
}

/**
 * Returns a calculator bound to one weighting policy, for scoring many entries.
 */
export function createLoadCalculator(weighting: LoadWeighting = DEFAULT_LOAD_WEIGHTING) {
  const factor = resolveRpeFactor(weighting);
  return (entry: DayEntry): LoadValue => loadOfEntry(parseDayEntry(entry), factor);
}

/**
 * Compute the training load of a single day entry.
 *
 * @example
 *   computeLoad({ date: '2025-03-03', activityType: 'karate', durationMinutes: 60, rpe: 7 });
 *   // { status: 'defined', value: 420 }
 */
export function computeLoad(
  entry: DayEntry,
  weighting: LoadWeighting = DEFAULT_LOAD_WEIGHTING,
): LoadValue {
  return loadOfEntry(parseDayEntry(entry), resolveRpeFactor(weighting));
}
