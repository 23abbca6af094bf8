import type { EndpointId, EndpointQuery } from './endpoints';
import { ENDPOINTS } from './endpoints';
import {
  DEFAULT_BASE_RETRY_DELAY_MS,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TIMEOUT_MS,
  RetryingHttpClient,
} from './httpClient';
import { DEFAULT_MAX_PAGES, fetchAll } from './pagination';
import { TokenManager } from './tokenManager';
import type { EndpointRecord, JQuantsClientConfig, Logger, QueryParams } from './types';

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * J-Quants API Client
 *
 * Provides access to the J-Quants datasets including:
 * - Listed issue information and daily quotes
 * - Financial statements, announcements and dividends
 * - Index option prices and TOPIX levels
 * - Investor-type trading, margin interest, short selling and trade breakdown
 *
 * Every helper drains all pages and returns the raw records.
 */
export class JQuantsClient {
  readonly http: RetryingHttpClient;
  readonly tokens: TokenManager;
  private readonly maxPages: number;
  private readonly logger?: Logger;

  constructor(config: JQuantsClientConfig, tokens?: TokenManager) {
    this.http = new RetryingHttpClient(config);
    this.tokens = tokens ?? new TokenManager({
      credentials: config.credentials,
      exchange: this.http,
      now: config.now,
      logger: config.logger,
    });
    this.http.setAuthProvider(this.tokens);
    this.maxPages = config.maxPages ?? DEFAULT_MAX_PAGES;
    this.logger = config.logger;
  }

  /** Fetch every record of one endpoint for one query. */
  async fetchEndpoint(
    endpoint: EndpointId,
    query: EndpointQuery = {},
    options: FetchOptions = {},
  ): Promise<EndpointRecord[]> {
    const { path, resultKey } = ENDPOINTS[endpoint];
    const params: QueryParams = { ...query };
    return fetchAll(this.http, path, params, resultKey, {
      maxPages: this.maxPages,
      signal: options.signal,
      logger: this.logger,
    });
  }

  // ==========================================================================
  // Dataset Helpers
  // ==========================================================================

  async getListedInfo(params: { code?: string; date?: string } = {}, options?: FetchOptions) {
    return this.fetchEndpoint('listed_info', params, options);
  }

  /** `date` takes precedence over `from`/`to`. */
  async getDailyQuotes(
    params: { code?: string; date?: string; from?: string; to?: string },
    options?: FetchOptions,
  ) {
    const { code, date, from, to } = params;
    return this.fetchEndpoint('daily_quotes', date ? { code, date } : { code, from, to }, options);
  }

  async getFinsStatements(params: { code?: string; date?: string }, options?: FetchOptions) {
    return this.fetchEndpoint('fins_statements', params, options);
  }

  /** Earnings announcements scheduled for the next business day. */
  async getFinsAnnouncement(options?: FetchOptions) {
    return this.fetchEndpoint('fins_announcement', {}, options);
  }

  async getFinsDividend(
    params: { code?: string; date?: string; from?: string; to?: string },
    options?: FetchOptions,
  ) {
    return this.fetchEndpoint('fins_dividend', params, options);
  }

  async getIndexOption(params: { date: string }, options?: FetchOptions) {
    return this.fetchEndpoint('index_option', params, options);
  }

  /** Omitting `from` fetches the full history. */
  async getTradesSpec(
    params: { section?: string; from?: string; to?: string } = {},
    options?: FetchOptions,
  ) {
    return this.fetchEndpoint('trades_spec', params, options);
  }

  async getWeeklyMarginInterest(
    params: { code?: string; date?: string; from?: string; to?: string },
    options?: FetchOptions,
  ) {
    return this.fetchEndpoint('weekly_margin_interest', params, options);
  }

  async getShortSelling(
    params: { sector33code?: string; date?: string; from?: string; to?: string },
    options?: FetchOptions,
  ) {
    return this.fetchEndpoint('short_selling', params, options);
  }

  async getBreakdown(
    params: { code?: string; date?: string; from?: string; to?: string },
    options?: FetchOptions,
  ) {
    return this.fetchEndpoint('breakdown', params, options);
  }

  async getTopix(params: { from?: string; to?: string }, options?: FetchOptions) {
    return this.fetchEndpoint('topix', params, options);
  }
}

/**
 * Factory function to create a J-Quants client from environment variables
 *
 * @param configOverrides - Optional config overrides
 * @returns Configured JQuantsClient instance
 */
export function createJQuantsClient(
  configOverrides?: Partial<JQuantsClientConfig>,
): JQuantsClient {
  const address = process.env.JQUANTS_MAIL_ADDRESS;
  const passcode = process.env.JQUANTS_PASSWORD;

  if (!configOverrides?.credentials) {
    if (!address) {
      throw new Error('JQUANTS_MAIL_ADDRESS environment variable is required');
    }
    if (!passcode) {
      throw new Error('JQUANTS_PASSWORD environment variable is required');
    }
  }

  return new JQuantsClient({
    credentials: { address: address ?? '', passcode: passcode ?? '' },
    baseUrl: process.env.JQUANTS_API_BASE ?? DEFAULT_BASE_URL,
    maxAttempts: parseNumberOrDefault(process.env.JQUANTS_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
    baseRetryDelayMs: parseNumberOrDefault(
      process.env.JQUANTS_RETRY_DELAY_MS,
      DEFAULT_BASE_RETRY_DELAY_MS,
    ),
    timeoutMs: parseNumberOrDefault(process.env.JQUANTS_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    ...configOverrides,
  });
}

function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}
