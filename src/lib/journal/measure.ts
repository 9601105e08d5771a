import type { DefinedMeasure, Measure, MissingReason } from './types';

export function defined(value: number): DefinedMeasure {
  return { status: 'defined', value };
}

export function missing<R extends MissingReason>(reason: R): Measure<R> {
  return { status: 'undefined', reason };
}

export function isDefined<R extends MissingReason>(
  measure: Measure<R>,
): measure is { status: 'defined'; value: number } {
  return measure.status === 'defined';
}
