import { z } from 'zod';
import { isDateKey } from './dateUtils';
import { InvalidInputError } from './errors';
import {
  ACTIVITY_TYPES,
  SESSION_EMPHASES,
  type DateRange,
  type DayEntry,
  type LoadWeighting,
} from './types';

/**
 * Calendar date key (YYYY-MM-DD)
 */
export const dateKeySchema = z
  .string()
  .refine(isDateKey, { message: 'Date must be a valid YYYY-MM-DD calendar date' });

export const rpeSchema = z
  .number()
  .int('RPE must be a whole number')
  .min(1, 'RPE must be between 1 and 10')
  .max(10, 'RPE must be between 1 and 10');

export const energyLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

export const dayEntrySchema = z
  .object({
    date: dateKeySchema,
    activityType: z.enum(ACTIVITY_TYPES),
    durationMinutes: z.number().finite().nonnegative('Duration cannot be negative').optional(),
    rpe: rpeSchema.optional(),
    energyLevel: energyLevelSchema.optional(),
    emphasis: z.enum(SESSION_EMPHASES).optional(),
    notes: z.string().optional(),
  })
  .superRefine((entry, ctx) => {
    if (entry.activityType === 'rest' && entry.rpe !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rpe'],
        message: 'Rest days carry no RPE',
      });
    }
  });

export const dateRangeSchema = z
  .object({
    start: dateKeySchema,
    end: dateKeySchema,
  })
  .refine((range) => range.start <= range.end, {
    message: 'Range end must not be before its start',
    path: ['end'],
  });

export const weightingNameSchema = z.enum(['linear', 'squared']);

export const weightingTableSchema = z.object({
  kind: z.literal('table'),
  factors: z
    .array(z.number().finite())
    .length(10, 'A weighting table needs one factor per RPE 1-10')
    .refine(
      (factors) => factors.every((factor, i) => i === 0 || factor > factors[i - 1]),
      { message: 'Weighting factors must be strictly increasing' },
    ),
});

function describeIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    const location = [prefix, path].filter(Boolean).join('.');
    return location ? `${location}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse a single entry, throwing InvalidInputError on any violation.
 * Values are never coerced: an RPE of 11 is rejected, not clamped.
 */
export function parseDayEntry(input: unknown): DayEntry {
  const result = dayEntrySchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError('Invalid day entry', describeIssues(result.error));
  }
  return result.data;
}

/**
 * Parse a list of entries and reject duplicate dates.
 * The result is sorted by date ascending.
 */
export function parseDayEntries(input: readonly unknown[]): DayEntry[] {
  const issues: string[] = [];
  const entries: DayEntry[] = [];
  input.forEach((raw, index) => {
    const result = dayEntrySchema.safeParse(raw);
    if (result.success) {
      entries.push(result.data);
    } else {
      issues.push(...describeIssues(result.error, `[${index}]`));
    }
  });

  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.date)) {
      issues.push(`Duplicate entry for ${entry.date}`);
    }
    seen.add(entry.date);
  }

  if (issues.length > 0) {
    throw new InvalidInputError('Invalid day entries', issues);
  }
  return entries.sort((a, b) => a.date.localeCompare(b.date));
}

export function parseDateRange(input: unknown): DateRange {
  const result = dateRangeSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError('Invalid date range', describeIssues(result.error));
  }
  return result.data;
}

export function parseLoadWeighting(input: unknown): LoadWeighting {
  const result =
    typeof input === 'string' ? weightingNameSchema.safeParse(input) : weightingTableSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidInputError('Invalid load weighting', describeIssues(result.error));
  }
  return result.data;
}

/**
 * Validate an entry without throwing (form-style)
 */
export function validateDayEntry(input: unknown): { valid: boolean; error?: string } {
  const result = dayEntrySchema.safeParse(input);
  if (result.success) {
    return { valid: true };
  }
  return { valid: false, error: result.error.issues[0]?.message };
}
