import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  JOURNAL_SUPABASE_URL: z.string().url('JOURNAL_SUPABASE_URL must be a URL').optional(),
  JOURNAL_SUPABASE_ANON_KEY: z.string().min(1).optional(),
  JOURNAL_SUPABASE_TABLE: z.string().min(1).default('journal_entries'),
  JOURNAL_LOAD_WEIGHTING: z.enum(['linear', 'squared']).default('linear'),
  JOURNAL_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type LogLevel = z.infer<typeof envSchema>['JOURNAL_LOG_LEVEL'];

export type JournalConfig = {
  env: 'development' | 'test' | 'production';
  isDev: boolean;
  logLevel: LogLevel;
  loadWeighting: 'linear' | 'squared';
  supabase: { url: string; anonKey: string; table: string } | null;
};

/**
 * Read configuration from environment variables.
 * Empty strings count as unset so a blank .env line does not fail validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): JournalConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid journal configuration: ${details}`);
  }

  const parsed = result.data;
  const supabase =
    parsed.JOURNAL_SUPABASE_URL && parsed.JOURNAL_SUPABASE_ANON_KEY
      ? {
          url: parsed.JOURNAL_SUPABASE_URL,
          anonKey: parsed.JOURNAL_SUPABASE_ANON_KEY,
          table: parsed.JOURNAL_SUPABASE_TABLE,
        }
      : null;

  return {
    env: parsed.NODE_ENV,
    isDev: parsed.NODE_ENV !== 'production',
    logLevel: parsed.JOURNAL_LOG_LEVEL,
    loadWeighting: parsed.JOURNAL_LOAD_WEIGHTING,
    supabase,
  };
}

let cached: JournalConfig | null = null;

export function getConfig(): JournalConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

/** Drop the cached config (tests that change process.env) */
export function resetConfig(): void {
  cached = null;
}
