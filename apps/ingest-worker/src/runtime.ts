import { IntervalRateLimiter, JQuantsClient } from '@libs/jquants-client';
import type { Logger } from '@libs/jquants-client';
import type { IngestEnv } from './config/env';
import { loadDatasetSchemas } from './config/datasets';
import { DatasetNormalizer } from './lib/normalizer';
import { createNotifier } from './lib/notifier';
import { createSupabaseClient } from './lib/supabase';
import { IncrementalMergePipeline } from './pipeline/incrementalMerge';
import { RangeFetchOrchestrator } from './pipeline/rangeFetch';
import { LocalFileStore } from './stores/localFileStore';
import { SupabaseTimeSeriesStore } from './stores/supabaseStore';
import type { TimeSeriesStore } from './stores/types';

export interface IngestRuntime {
  client: JQuantsClient;
  pipeline: IncrementalMergePipeline;
  store: TimeSeriesStore;
}

export function createStore(env: IngestEnv, logger: Logger): TimeSeriesStore {
  if (env.STORE_KIND === 'supabase') {
    return new SupabaseTimeSeriesStore(
      createSupabaseClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY),
      { logger },
    );
  }
  return new LocalFileStore({ dir: env.DATA_DIR, logger });
}

/** Wire one API client (and so one token manager) into a pipeline shared by every table. */
export function createIngestRuntime(env: IngestEnv, logger: Logger = console): IngestRuntime {
  const client = new JQuantsClient({
    credentials: { address: env.JQUANTS_MAIL_ADDRESS, passcode: env.JQUANTS_PASSWORD },
    baseUrl: env.JQUANTS_API_BASE,
    maxAttempts: env.JQUANTS_MAX_ATTEMPTS,
    baseRetryDelayMs: env.JQUANTS_RETRY_DELAY_MS,
    timeoutMs: env.JQUANTS_TIMEOUT_MS,
    rateLimiter: env.JQUANTS_MAX_RPS ? new IntervalRateLimiter(env.JQUANTS_MAX_RPS) : undefined,
    logger,
  });

  const normalizer = new DatasetNormalizer(loadDatasetSchemas(), env.JQUANTS_PLAN);
  const fetcher = new RangeFetchOrchestrator(client, normalizer, {
    concurrency: env.RANGE_CONCURRENCY,
    cacheDir: env.FETCH_CACHE_DIR,
    logger,
  });
  const store = createStore(env, logger);

  const pipeline = new IncrementalMergePipeline({
    store,
    fetcher,
    notifier: createNotifier({
      discordWebhookUrl: env.DISCORD_WEBHOOK_URL,
      lineNotifyToken: env.LINE_NOTIFY_TOKEN,
      logger,
    }),
    symbol: env.TIME_SERIES_SYMBOL,
    initialStartDate: env.INITIAL_START_DATE,
    timeZone: env.MARKET_TIMEZONE,
    cutoffHour: env.AVAILABILITY_CUTOFF_HOUR,
    logger,
  });

  return { client, pipeline, store };
}
