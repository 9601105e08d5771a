import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '../errors';
import { isTimeRangeKey, resolveCurrentAndPreviousPeriod, resolveTimeRange } from '../timeRanges';

// 2025-03-12 is a Wednesday
const anchor = '2025-03-12';

describe('resolveTimeRange', () => {
  it('should resolve 1w to the ISO week of the anchor', () => {
    expect(resolveTimeRange('1w', anchor)).toEqual({ start: '2025-03-10', end: '2025-03-16' });
  });

  it('should widen month ranges to whole ISO weeks', () => {
    expect(resolveTimeRange('1m', anchor)).toEqual({ start: '2025-02-24', end: '2025-04-06' });
    expect(resolveTimeRange('3m', anchor)).toEqual({ start: '2024-12-30', end: '2025-04-06' });
    expect(resolveTimeRange('6m', anchor)).toEqual({ start: '2024-09-30', end: '2025-04-06' });
  });

  it('should accept upper-case keys', () => {
    expect(resolveTimeRange('1W', anchor)).toEqual({ start: '2025-03-10', end: '2025-03-16' });
  });

  it('should reject unknown keys', () => {
    expect(() => resolveTimeRange('2y', anchor)).toThrow(InvalidInputError);
    expect(() => resolveTimeRange('2y', anchor)).toThrow('Unknown time range "2y"');
  });

  it('should recognise range keys', () => {
    expect(isTimeRangeKey('3m')).toBe(true);
    expect(isTimeRangeKey('12m')).toBe(false);
  });
});

describe('resolveCurrentAndPreviousPeriod', () => {
  it('should resolve the week before for 1w', () => {
    expect(resolveCurrentAndPreviousPeriod('1w', anchor)).toEqual({
      current: { start: '2025-03-10', end: '2025-03-16' },
      previous: { start: '2025-03-03', end: '2025-03-09' },
    });
  });

  it('should resolve the previous month from the day before the current start', () => {
    expect(resolveCurrentAndPreviousPeriod('1m', anchor)).toEqual({
      current: { start: '2025-02-24', end: '2025-04-06' },
      previous: { start: '2025-01-27', end: '2025-03-02' },
    });
  });

  it('should let month periods share the straddling week', () => {
    // April 2025 starts on a Tuesday, so the current period begins on 31 March
    const { current, previous } = resolveCurrentAndPreviousPeriod('1m', '2025-04-15');
    expect(current).toEqual({ start: '2025-03-31', end: '2025-05-04' });
    expect(previous).toEqual({ start: '2025-02-24', end: '2025-04-06' });
  });
});
