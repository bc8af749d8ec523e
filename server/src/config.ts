import { z } from 'zod';
import { ConfigError } from './errors';

const intFromEnv = (def: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(def);

const EnvSchema = z.object({
  SUPABASE_URL: z.string().url('Expected a valid https URL like https://YOUR_PROJECT.supabase.co').optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  PORT: intFromEnv(4000, 1, 65535),
  API_SECRET: z.string().trim().min(1).optional(),
  SCRAPE_CONCURRENCY: intFromEnv(5, 1, 10),
  FETCH_TIMEOUT_MS: intFromEnv(30000, 1000, 120000),
  FETCH_MAX_ATTEMPTS: intFromEnv(3, 1, 10),
  FETCH_BACKOFF_INITIAL_MS: intFromEnv(1000, 0, 60000),
  FETCH_BACKOFF_MAX_MS: intFromEnv(10000, 0, 300000),
  FETCH_BACKOFF_JITTER: z.enum(['none', 'full']).default('none'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
});

export interface AppConfig {
  /** null only when loaded with `requireDatabase: false`. */
  supabase: { url: string; serviceRoleKey: string } | null;
  port: number;
  apiSecret: string | null;
  scrape: { concurrency: number };
  fetch: {
    timeoutMs: number;
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    jitter: 'none' | 'full';
  };
  log: { level: string; format: 'json' | 'pretty' };
}

/**
 * Validate the environment into an AppConfig.
 * Throws ConfigError listing every problem; callers treat this as fatal.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  { requireDatabase = true }: { requireDatabase?: boolean } = {},
): AppConfig {
  // Blank values in .env files behave like unset ones.
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;
  const missing = [
    !e.SUPABASE_URL && 'SUPABASE_URL is not set',
    !e.SUPABASE_SERVICE_ROLE_KEY && 'SUPABASE_SERVICE_ROLE_KEY is not set',
  ].filter((m): m is string => typeof m === 'string');
  if (requireDatabase && missing.length) {
    throw new ConfigError(`Invalid configuration: ${missing.join('; ')}`, missing);
  }
  return {
    supabase: e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
      ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
      : null,
    port: e.PORT,
    apiSecret: e.API_SECRET ?? null,
    scrape: { concurrency: e.SCRAPE_CONCURRENCY },
    fetch: {
      timeoutMs: e.FETCH_TIMEOUT_MS,
      maxAttempts: e.FETCH_MAX_ATTEMPTS,
      initialDelayMs: e.FETCH_BACKOFF_INITIAL_MS,
      maxDelayMs: e.FETCH_BACKOFF_MAX_MS,
      jitter: e.FETCH_BACKOFF_JITTER,
    },
    log: { level: e.LOG_LEVEL, format: e.LOG_FORMAT },
  };
}
