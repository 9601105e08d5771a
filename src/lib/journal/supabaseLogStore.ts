import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { getConfig } from '@/lib/config';
import { logger } from '@/lib/logger';
import { getSupabaseClient } from '@/lib/supabase';
import { LogStoreError } from './errors';
import type { LogStore } from './logStore';
import { dayEntrySchema } from './validation';
import type { DateRange, DayEntry } from './types';

export const JOURNAL_ENTRY_COLUMNS =
  'entry_date, activity_type, duration_minutes, rpe, energy_level, session_emphasis, notes';

// Older rows were written with the journal's first activity names
const LEGACY_ACTIVITY_NAMES: Record<string, string> = {
  weights: 'strength',
  run: 'running',
};

const journalEntryRowSchema = z.object({
  entry_date: z.string(),
  activity_type: z.string(),
  duration_minutes: z.number().nullable(),
  rpe: z.number().nullable(),
  energy_level: z.number().nullable(),
  session_emphasis: z.string().nullable(),
  notes: z.string().nullable(),
});

export type JournalEntryRow = z.infer<typeof journalEntryRowSchema>;

/**
 * Row → entry shape. Nulls become absent fields; nothing is defaulted.
 */
export function rowToEntry(row: JournalEntryRow): Record<string, unknown> {
  const activityType = row.activity_type.toLowerCase();
  const entry: Record<string, unknown> = {
    // entry_date is a DATE column; anything else fails dateKeySchema
    date: row.entry_date,
    activityType: LEGACY_ACTIVITY_NAMES[activityType] ?? activityType,
  };
  if (row.duration_minutes !== null) entry.durationMinutes = row.duration_minutes;
  if (row.rpe !== null) entry.rpe = row.rpe;
  if (row.energy_level !== null) entry.energyLevel = row.energy_level;
  if (row.session_emphasis !== null) entry.emphasis = row.session_emphasis;
  if (row.notes !== null) entry.notes = row.notes;
  return entry;
}

/**
 * Log store reading the `journal_entries` table. Soft-deleted rows are skipped.
 *
 * Query errors become LogStoreError; there is no retry here.
 */
export function createSupabaseLogStore(
  client: SupabaseClient,
  options: { table?: string } = {},
): LogStore {
  const table = options.table ?? 'journal_entries';

  return {
    async getEntries(range: DateRange): Promise<readonly DayEntry[]> {
      const { data, error } = await client
        .from(table)
        .select(JOURNAL_ENTRY_COLUMNS)
        .is('deleted_at', null)
        .gte('entry_date', range.start)
        .lte('entry_date', range.end)
        .order('entry_date', { ascending: true });

      if (error) {
        logger.error('journal_entries query failed', error);
        throw new LogStoreError(`${error.message} (${error.code ?? 'no-code'})`, { cause: error });
      }

      const rows: unknown[] = data ?? [];
      return rows.map((raw, index) => {
        const parsed = journalEntryRowSchema.safeParse(raw);
        if (!parsed.success) {
          throw new LogStoreError(`Malformed journal_entries row at position ${index}`, {
            cause: parsed.error,
          });
        }
        const entry = dayEntrySchema.safeParse(rowToEntry(parsed.data));
        if (!entry.success) {
          const reason = entry.error.issues[0]?.message ?? 'invalid entry';
          throw new LogStoreError(`Corrupt journal entry for ${parsed.data.entry_date}: ${reason}`, {
            cause: entry.error,
          });
        }
        return entry.data;
      });
    },
  };
}

/**
 * The store described by the environment, or null when no Supabase project
 * is configured.
 */
export function getConfiguredLogStore(): LogStore | null {
  const { supabase } = getConfig();
  const client = getSupabaseClient();
  if (!supabase || !client) {
    return null;
  }
  logger.debug(`reading entries from ${supabase.table}`);
  return createSupabaseLogStore(client, { table: supabase.table });
}
