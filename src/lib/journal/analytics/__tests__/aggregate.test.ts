/**
 * Rhythm Aggregator Tests
 *
 * - load totals with partial RPE coverage
 * - rest / active / unlogged day accounting
 * - streaks and gaps
 * - empty windows
 */

import { describe, it, expect } from 'vitest';
import { aggregate, pickDominantActivity } from '../aggregate';
import { InvalidInputError } from '../../errors';
import { METRIC_KINDS, type DayEntry } from '../../types';

// 2025-03-03 is a Monday
const scenarioEntries: DayEntry[] = [
  { date: '2025-03-03', activityType: 'karate', durationMinutes: 60, rpe: 7 },
  { date: '2025-03-04', activityType: 'rest' },
  { date: '2025-03-05', activityType: 'running', durationMinutes: 30 },
];

describe('aggregate', () => {
  it('summarises a Mon-Thu window with a rest day, an unrated run and an unlogged day', () => {
    const result = aggregate(scenarioEntries, { start: '2025-03-03', end: '2025-03-06' });

    expect(result.spanDays).toBe(4);
    expect(result.entryCount).toBe(3);
    expect(result.volumeMinutes).toEqual({ status: 'defined', value: 90 });
    expect(result.totalLoad).toEqual({ status: 'defined', value: 420 });
    expect(result.undefinedLoadCount).toEqual({ status: 'defined', value: 1 });
    expect(result.restDayCount).toEqual({ status: 'defined', value: 1 });
    expect(result.activeDayCount).toEqual({ status: 'defined', value: 2 });
    expect(result.unloggedDayCount).toEqual({ status: 'defined', value: 1 });
    expect(result.loggedDayCount).toEqual({ status: 'defined', value: 3 });
    expect(result.longestActiveStreak).toEqual({ status: 'defined', value: 1 });
    expect(result.longestRestStreak).toEqual({ status: 'defined', value: 1 });
    expect(result.restRatio).toEqual({ status: 'defined', value: 0.25 });
    expect(result.maxGapDays).toEqual({ status: 'defined', value: 0 });
    expect(result.hardSessionCount).toEqual({ status: 'defined', value: 1 });
    expect(result.lowEnergySessionCount).toEqual({ status: 'defined', value: 0 });
    expect(result.averageRpe).toEqual({ status: 'defined', value: 7 });
    expect(result.averageEnergy).toEqual({ status: 'undefined', reason: 'no-energy' });
    expect(result.loadDensity).toEqual({ status: 'defined', value: 30 });
  });

  it('counts activities and breaks dominant-activity ties by activity order', () => {
    const result = aggregate(scenarioEntries, { start: '2025-03-03', end: '2025-03-06' });

    expect(result.activityCounts).toEqual({
      karate: 1,
      strength: 0,
      running: 1,
      rowing: 0,
      cardio: 0,
      rest: 1,
    });
    expect(result.dominantActivity).toBe('karate');
  });

  it('does not treat an unlogged day as rest', () => {
    const entries: DayEntry[] = [
      { date: '2025-03-03', activityType: 'karate', durationMinutes: 45, rpe: 5 },
      { date: '2025-03-05', activityType: 'rest' },
    ];
    const result = aggregate(entries, { start: '2025-03-03', end: '2025-03-05' });

    expect(result.restDayCount).toEqual({ status: 'defined', value: 1 });
    expect(result.unloggedDayCount).toEqual({ status: 'defined', value: 1 });
    expect(result.restRatio.status).toBe('defined');
    if (result.restRatio.status === 'defined') {
      expect(result.restRatio.value).toBeCloseTo(1 / 3);
    }
    expect(result.longestActiveStreak).toEqual({ status: 'defined', value: 1 });
    expect(result.longestRestStreak).toEqual({ status: 'defined', value: 1 });
    expect(result.maxGapDays).toEqual({ status: 'defined', value: 1 });
  });

  it('measures the longest active streak across consecutive training days', () => {
    const entries: DayEntry[] = [
      { date: '2025-03-03', activityType: 'strength', durationMinutes: 50, rpe: 6 },
      { date: '2025-03-04', activityType: 'running', durationMinutes: 30, rpe: 5 },
      { date: '2025-03-05', activityType: 'karate', durationMinutes: 90, rpe: 8 },
      { date: '2025-03-07', activityType: 'rowing', durationMinutes: 20, rpe: 6 },
      { date: '2025-03-08', activityType: 'cardio', durationMinutes: 25, rpe: 4 },
    ];
    const result = aggregate(entries, { start: '2025-03-03', end: '2025-03-09' });

    expect(result.longestActiveStreak).toEqual({ status: 'defined', value: 3 });
    expect(result.longestRestStreak).toEqual({ status: 'defined', value: 0 });
    expect(result.unloggedDayCount).toEqual({ status: 'defined', value: 2 });
    expect(result.maxGapDays).toEqual({ status: 'defined', value: 1 });
    expect(result.hardSessionCount).toEqual({ status: 'defined', value: 1 });
  });

  it('lets an unlogged day break a rest streak', () => {
    const entries: DayEntry[] = [
      { date: '2025-03-03', activityType: 'rest' },
      { date: '2025-03-04', activityType: 'rest' },
      { date: '2025-03-06', activityType: 'rest' },
    ];
    const result = aggregate(entries, { start: '2025-03-03', end: '2025-03-06' });

    expect(result.longestRestStreak).toEqual({ status: 'defined', value: 2 });
    expect(result.longestActiveStreak).toEqual({ status: 'defined', value: 0 });
  });

  it('returns every metric undefined for an empty window', () => {
    const result = aggregate(scenarioEntries, { start: '2025-02-01', end: '2025-02-07' });

    for (const metric of METRIC_KINDS) {
      expect(result[metric]).toEqual({ status: 'undefined', reason: 'empty-window' });
    }
    expect(result.entryCount).toBe(0);
    expect(result.spanDays).toBe(7);
    expect(result.dominantActivity).toBeNull();
  });

  it('leaves total load undefined when no training entry has an RPE', () => {
    const entries: DayEntry[] = [
      { date: '2025-03-10', activityType: 'running', durationMinutes: 40 },
      { date: '2025-03-11', activityType: 'rest' },
      { date: '2025-03-12', activityType: 'rowing', durationMinutes: 30 },
    ];
    const result = aggregate(entries, { start: '2025-03-10', end: '2025-03-16' });

    expect(result.totalLoad).toEqual({ status: 'undefined', reason: 'no-rpe' });
    expect(result.undefinedLoadCount).toEqual({ status: 'defined', value: 2 });
    expect(result.volumeMinutes).toEqual({ status: 'defined', value: 70 });
    expect(result.averageRpe).toEqual({ status: 'undefined', reason: 'no-rpe' });
  });

  it('gives a rest-only window a defined zero load', () => {
    const entries: DayEntry[] = [
      { date: '2025-03-10', activityType: 'rest', durationMinutes: 20 },
      { date: '2025-03-11', activityType: 'rest' },
    ];
    const result = aggregate(entries, { start: '2025-03-10', end: '2025-03-11' });

    expect(result.totalLoad).toEqual({ status: 'defined', value: 0 });
    expect(result.volumeMinutes).toEqual({ status: 'defined', value: 20 });
    expect(result.restRatio).toEqual({ status: 'defined', value: 1 });
    expect(result.dominantActivity).toBeNull();
  });

  it('counts minutes logged on a rest entry in volume and density', () => {
    const entries: DayEntry[] = [
      { date: '2025-03-10', activityType: 'karate', durationMinutes: 60, rpe: 6 },
      { date: '2025-03-11', activityType: 'rest', durationMinutes: 30 },
    ];
    const result = aggregate(entries, { start: '2025-03-10', end: '2025-03-11' });

    expect(result.volumeMinutes).toEqual({ status: 'defined', value: 90 });
    expect(result.loadDensity).toEqual({ status: 'defined', value: 45 });
    // Rest minutes carry no load
    expect(result.totalLoad).toEqual({ status: 'defined', value: 360 });
  });

  it('counts sessions logged at the lowest energy level', () => {
    const entries: DayEntry[] = [
      { date: '2025-03-10', activityType: 'karate', durationMinutes: 60, rpe: 6, energyLevel: 1 },
      { date: '2025-03-11', activityType: 'rest', energyLevel: 1 },
      { date: '2025-03-12', activityType: 'running', durationMinutes: 30, rpe: 4, energyLevel: 2 },
      { date: '2025-03-13', activityType: 'rowing', durationMinutes: 20, rpe: 5 },
    ];
    const result = aggregate(entries, { start: '2025-03-10', end: '2025-03-16' });

    expect(result.lowEnergySessionCount).toEqual({ status: 'defined', value: 2 });
  });

  it('averages energy levels when logged', () => {
    const entries: DayEntry[] = [
      { date: '2025-03-10', activityType: 'karate', durationMinutes: 60, rpe: 6, energyLevel: 4 },
      { date: '2025-03-11', activityType: 'rest', energyLevel: 2 },
    ];
    const result = aggregate(entries, { start: '2025-03-10', end: '2025-03-11' });

    expect(result.averageEnergy).toEqual({ status: 'defined', value: 3 });
  });

  it('ignores entries outside the window', () => {
    const result = aggregate(scenarioEntries, { start: '2025-03-04', end: '2025-03-05' });

    expect(result.entryCount).toBe(2);
    expect(result.totalLoad).toEqual({ status: 'undefined', reason: 'no-rpe' });
    expect(result.volumeMinutes).toEqual({ status: 'defined', value: 30 });
  });

  it('applies the weighting and hard-session options', () => {
    const result = aggregate(scenarioEntries, { start: '2025-03-03', end: '2025-03-06' }, {
      weighting: 'squared',
      hardRpeThreshold: 8,
    });

    expect(result.totalLoad).toEqual({ status: 'defined', value: 2940 });
    expect(result.hardSessionCount).toEqual({ status: 'defined', value: 0 });
  });

  it('accepts entries in any order', () => {
    const reversed = [...scenarioEntries].reverse();
    expect(aggregate(reversed, { start: '2025-03-03', end: '2025-03-06' })).toEqual(
      aggregate(scenarioEntries, { start: '2025-03-03', end: '2025-03-06' }),
    );
  });

  it('rejects duplicate dates', () => {
    const entries: DayEntry[] = [
      { date: '2025-03-03', activityType: 'karate', durationMinutes: 60, rpe: 7 },
      { date: '2025-03-03', activityType: 'rest' },
    ];
    expect(() => aggregate(entries, { start: '2025-03-03', end: '2025-03-09' })).toThrow(
      'Duplicate entry for 2025-03-03',
    );
  });

  it('rejects a window that ends before it starts', () => {
    expect(() => aggregate(scenarioEntries, { start: '2025-03-09', end: '2025-03-03' })).toThrow(
      InvalidInputError,
    );
  });
});

describe('pickDominantActivity', () => {
  it('ignores rest when picking the dominant activity', () => {
    expect(
      pickDominantActivity({ karate: 1, strength: 2, running: 0, rowing: 0, cardio: 0, rest: 5 }),
    ).toBe('strength');
  });
});
