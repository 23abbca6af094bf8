import { z } from 'zod';

/**
 * J-Quants API Client Types
 *
 * Error taxonomy, transport hooks and request/response structures shared by
 * the token manager, the retrying HTTP client and the pagination helper.
 */

// ============================================================================
// Errors
// ============================================================================

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body?: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** Request exceeded the client timeout. Retryable; surfaces as an HttpError with status 0. */
export class TimeoutError extends HttpError {
  constructor(message: string) {
    super(message, 0);
    this.name = 'TimeoutError';
  }
}

/** Bad credentials or an expired refresh token. Never retried in-process. */
export class AuthError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/** Response did not follow the wire contract (bad JSON, bad page shape, runaway pagination). */
export class ProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CancelledError';
  }
}

// ============================================================================
// Hooks
// ============================================================================

export interface RateLimiter {
  throttle(key?: string): Promise<void>;
  onSuccess?(key?: string): void | Promise<void>;
  onError?(key: string | undefined, error: HttpError): void | Promise<void>;
}

export class NoopRateLimiter implements RateLimiter {
  async throttle(): Promise<void> {
    // no-op
  }
}

export interface Logger {
  debug?(msg: string, meta?: unknown): void;
  info?(msg: string, meta?: unknown): void;
  warn?(msg: string, meta?: unknown): void;
  error?(msg: string, meta?: unknown): void;
}

export interface RequestMetric {
  endpoint: string;
  method: string;
  durationMs: number;
  status: number;
  attempt: number;
}

export interface MetricsSink {
  recordRequest(metric: RequestMetric): void | Promise<void>;
}

export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}

// ============================================================================
// Requests
// ============================================================================

export type HttpMethod = 'GET' | 'POST';

export type QueryParamValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryParamValue>;

export interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
  /** `false` for the token exchanges: no bearer header, and POST becomes retryable. */
  auth?: boolean;
  signal?: AbortSignal;
}

/** The subset of the HTTP client the pagination helper and token manager need. */
export interface JsonRequester {
  request(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
}

export interface Credentials {
  readonly address: string;
  readonly passcode: string;
}

export interface AuthHeader {
  Authorization: string;
}

export interface AuthHeaderProvider {
  getAuthHeader(): Promise<AuthHeader>;
}

export interface RetryingHttpClientConfig {
  baseUrl?: string;
  /** Total attempts, including the first. */
  maxAttempts?: number;
  baseRetryDelayMs?: number;
  /** Upper bound on any single wait between attempts, `Retry-After` included. */
  maxRetryDelayMs?: number;
  /** Covers the whole attempt: headers and body. */
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
  logger?: Logger;
  metrics?: MetricsSink;
  transport?: HttpTransport;
  /** Backoff wait. Must reject once `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface JQuantsClientConfig extends RetryingHttpClientConfig {
  credentials: Credentials;
  maxPages?: number;
  /** Clock used for token expiry. */
  now?: () => number;
}

// ============================================================================
// Wire schemas
// ============================================================================

export const refreshTokenResponseSchema = z.object({
  refreshToken: z.string().min(1),
});

export const idTokenResponseSchema = z.object({
  idToken: z.string().min(1),
});

export type RefreshTokenResponse = z.infer<typeof refreshTokenResponseSchema>;
export type IdTokenResponse = z.infer<typeof idTokenResponseSchema>;

export const endpointValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** One flat record of one page of one endpoint. */
export const endpointRecordSchema = z.record(endpointValueSchema);

export type EndpointValue = z.infer<typeof endpointValueSchema>;
export type EndpointRecord = z.infer<typeof endpointRecordSchema>;
