/**
 * @libs/jquants-client
 *
 * J-Quants API Client Library
 *
 * ## Architecture
 *
 * - **TokenManager**: lazy credential exchange, 23h id token cache, single-flight refresh
 * - **RetryingHttpClient**: bearer auth, bounded retries with backoff, request timeout
 * - **fetchAll**: drains `pagination_key` cursors into one record list
 * - **JQuantsClient**: typed helpers for every dataset endpoint
 *
 * ## Usage
 *
 * ```typescript
 * import { createJQuantsClient } from '@libs/jquants-client';
 *
 * // Create client (reads from env vars)
 * const client = createJQuantsClient();
 *
 * // All quotes for one trading day
 * const quotes = await client.getDailyQuotes({ date: '20240304' });
 *
 * // TOPIX levels for a span
 * const topix = await client.getTopix({ from: '20240101', to: '20240331' });
 * ```
 *
 * ## Environment Variables
 *
 * Required:
 * - `JQUANTS_MAIL_ADDRESS` - account mail address
 * - `JQUANTS_PASSWORD` - account password
 *
 * Optional:
 * - `JQUANTS_API_BASE` - Base URL (default: https://api.jquants.com/v1)
 * - `JQUANTS_MAX_ATTEMPTS` - Attempts per request including the first (default: 3)
 * - `JQUANTS_RETRY_DELAY_MS` - Base backoff delay in ms (default: 500)
 * - `JQUANTS_TIMEOUT_MS` - Request timeout in ms (default: 30000)
 */

export { JQuantsClient, createJQuantsClient } from './jquantsClient';
export type { FetchOptions } from './jquantsClient';
export { RetryingHttpClient, isRetryableStatus, DEFAULT_BASE_URL } from './httpClient';
export { TokenManager, DEFAULT_ID_TOKEN_TTL_MS } from './tokenManager';
export type { TokenManagerOptions } from './tokenManager';
export { fetchAll, DEFAULT_MAX_PAGES } from './pagination';
export type { FetchAllOptions } from './pagination';
export { IntervalRateLimiter } from './rateLimiter';
export { ENDPOINTS } from './endpoints';
export type { EndpointDefinition, EndpointId, EndpointQuery } from './endpoints';

export type {
  AuthHeader,
  AuthHeaderProvider,
  Credentials,
  EndpointRecord,
  EndpointValue,
  HttpMethod,
  HttpTransport,
  JQuantsClientConfig,
  JsonRequester,
  Logger,
  MetricsSink,
  QueryParams,
  RateLimiter,
  RequestMetric,
  RequestOptions,
  RetryingHttpClientConfig,
} from './types';

export {
  AuthError,
  CancelledError,
  HttpError,
  NoopRateLimiter,
  ProtocolError,
  TimeoutError,
} from './types';
