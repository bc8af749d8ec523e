import { loadConfig } from './config';
import type { AppConfig } from './config';
import type { StoreProvider } from './db/store';
import { ConfigError } from './errors';
import { SupabaseStoreProvider } from './db/supabaseStore';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { ScrapeEngine } from './services/scraping/engine';
import { PageFetcher } from './services/scraping/http';
import { isTransientFetchError } from './services/scraping/retry';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  storeProvider: StoreProvider;
  engine: ScrapeEngine;
}

function supabaseProvider(config: AppConfig): StoreProvider {
  if (!config.supabase) throw new ConfigError('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required');
  return new SupabaseStoreProvider(config.supabase.url, config.supabase.serviceRoleKey);
}

/**
 * Build the process-wide collaborators once. Throws ConfigError on bad env.
 * `storeProvider` can be swapped, e.g. for an in-memory dry run.
 */
export function createRuntime(
  env: NodeJS.ProcessEnv = process.env,
  overrides: { storeProvider?: StoreProvider } = {},
): Runtime {
  const config = loadConfig(env, { requireDatabase: !overrides.storeProvider });
  const logger = createLogger(config.log);
  const storeProvider = overrides.storeProvider ?? supabaseProvider(config);
  const fetcher = new PageFetcher({
    timeoutMs: config.fetch.timeoutMs,
    logger,
    retryPolicy: {
      maxAttempts: config.fetch.maxAttempts,
      initialDelayMs: config.fetch.initialDelayMs,
      backoffMultiplier: 2,
      maxDelayMs: config.fetch.maxDelayMs,
      jitter: config.fetch.jitter,
      isRetryable: isTransientFetchError,
    },
  });
  const engine = new ScrapeEngine({
    storeProvider,
    fetcher,
    concurrency: config.scrape.concurrency,
    logger,
  });
  return { config, logger, storeProvider, engine };
}
