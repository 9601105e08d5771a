import { isWithinRange } from './dateUtils';
import { LogStoreError } from './errors';
import { dayEntrySchema, parseDayEntries } from './validation';
import type { DateRange, DayEntry } from './types';

/**
 * Read side of the journal's entry storage.
 *
 * getEntries returns the entries dated inside `range` (inclusive), ordered by
 * date ascending, at most one per date. An empty result is valid.
 */
export interface LogStore {
  getEntries(range: DateRange): Promise<readonly DayEntry[]>;
}

/**
 * Check what a store handed back before the engine relies on it.
 * Ordering, uniqueness and range violations mean the store is broken,
 * not that the caller asked for something wrong.
 */
export function verifyStoreEntries(entries: unknown, range: DateRange): DayEntry[] {
  if (!Array.isArray(entries)) {
    throw new LogStoreError('Log store returned a non-list result');
  }

  const verified: DayEntry[] = [];
  entries.forEach((raw: unknown, index) => {
    const result = dayEntrySchema.safeParse(raw);
    if (!result.success) {
      const reason = result.error.issues[0]?.message ?? 'invalid entry';
      throw new LogStoreError(`Corrupt entry at position ${index}: ${reason}`, { cause: result.error });
    }
    const entry = result.data;
    if (!isWithinRange(entry.date, range)) {
      throw new LogStoreError(`Entry ${entry.date} lies outside ${range.start}..${range.end}`);
    }
    const prev = verified[verified.length - 1];
    if (prev && prev.date >= entry.date) {
      throw new LogStoreError(
        prev.date === entry.date
          ? `Duplicate entry for ${entry.date}`
          : `Entries out of order: ${entry.date} after ${prev.date}`,
      );
    }
    verified.push(entry);
  });

  return verified;
}

/**
 * Store backed by an in-process array. Entries are validated once on the way
 * in and copied on every read, so callers never share state.
 */
export class InMemoryLogStore implements LogStore {
  private readonly entries: readonly DayEntry[];

  constructor(entries: readonly DayEntry[] = []) {
    this.entries = parseDayEntries(entries);
  }

  async getEntries(range: DateRange): Promise<readonly DayEntry[]> {
    return this.entries.filter((e) => isWithinRange(e.date, range)).map((e) => ({ ...e }));
  }
}
