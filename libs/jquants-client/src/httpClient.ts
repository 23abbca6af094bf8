import { setTimeout as sleep } from 'timers/promises';
import type {
  AuthHeaderProvider,
  HttpMethod,
  HttpTransport,
  JsonRequester,
  Logger,
  MetricsSink,
  QueryParams,
  RateLimiter,
  RequestOptions,
  RetryingHttpClientConfig,
} from './types';
import {
  CancelledError,
  HttpError,
  NoopRateLimiter,
  ProtocolError,
  TimeoutError,
} from './types';

export const DEFAULT_BASE_URL = 'https://api.jquants.com/v1';
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_RETRY_DELAY_MS = 500;
export const DEFAULT_MAX_RETRY_DELAY_MS = 60_000;
export const DEFAULT_TIMEOUT_MS = 30_000;

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

interface HttpResult {
  response: Response;
  /** Undefined when the body of an error response could not be read. */
  text?: string;
}

/**
 * JSON-over-HTTP client with bounded retries.
 *
 * - Attaches the bearer header from the auth provider on every authenticated call
 * - Retries 429/500/502/503/504, network failures and timeouts with exponential backoff
 * - GET is always retryable; POST only when the call is unauthenticated (token exchange)
 */
export class RetryingHttpClient implements JsonRequester {
  private readonly baseUrl: string;
  private readonly maxAttempts: number;
  private readonly baseRetryDelayMs: number;
  private readonly maxRetryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly rateLimiter: RateLimiter;
  private readonly logger?: Logger;
  private readonly metrics?: MetricsSink;
  private readonly transport: HttpTransport;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private auth?: AuthHeaderProvider;

  constructor(config: RetryingHttpClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseRetryDelayMs = config.baseRetryDelayMs ?? DEFAULT_BASE_RETRY_DELAY_MS;
    this.maxRetryDelayMs = config.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rateLimiter = config.rateLimiter ?? new NoopRateLimiter();
    this.logger = config.logger;
    this.metrics = config.metrics;
    this.transport = config.transport ?? ((url, init) => fetch(url, init));
    this.sleep = config.sleep ?? ((ms, signal) => sleep(ms, undefined, { signal }));
  }

  /** Wires the token source. Kept separate so the token manager can post through this client. */
  setAuthProvider(auth: AuthHeaderProvider): void {
    this.auth = auth;
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const authenticated = options.auth !== false;
    const retryable = method === 'GET' || !authenticated;
    const url = this.buildUrl(path, options.params);
    const key = `${method}:${path}`;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      throwIfAborted(options.signal);

      const headers: Record<string, string> = { Accept: 'application/json' };
      if (authenticated) {
        if (!this.auth) {
          throw new Error('RetryingHttpClient has no auth provider for an authenticated request');
        }
        Object.assign(headers, await this.auth.getAuthHeader());
      }

      const init: RequestInit = { method, headers };
      if (options.body !== undefined) {
        headers['Content-Type'] = 'application/json';
        init.body = JSON.stringify(options.body);
      }

      const start = Date.now();
      let error: HttpError;
      try {
        await this.rateLimiter.throttle(key);
        const { response, text } = await this.executeHttp(url, init, options.signal);

        if (response.ok) {
          const data = parseJson(text ?? '', path);
          await this.rateLimiter.onSuccess?.(key);
          await this.recordAttempt(path, method, start, response.status, attempt);
          return data;
        }

        error = new HttpError(
          `J-Quants request ${method} ${path} failed with status ${response.status}`,
          response.status,
          text,
          parseRetryAfter(response),
        );
      } catch (err) {
        if (!(err instanceof HttpError)) {
          throw err;
        }
        error = err;
      }

      await this.rateLimiter.onError?.(key, error);
      await this.recordAttempt(path, method, start, error.status, attempt);

      if (!retryable || !isRetryableStatus(error.status) || attempt === this.maxAttempts) {
        throw error;
      }

      const delayMs = Math.min(
        this.maxRetryDelayMs,
        error.retryAfterMs && error.retryAfterMs > 0
          ? error.retryAfterMs
          : computeBackoffWithJitter(this.baseRetryDelayMs, attempt - 1),
      );
      this.logger?.warn?.(
        `[JQuantsClient] Retrying ${method} ${path} after ${Math.round(delayMs)}ms due to status ${error.status}`,
      );
      try {
        await this.sleep(delayMs, options.signal);
      } catch (err) {
        if (options.signal?.aborted) {
          throw new CancelledError(undefined, { cause: err });
        }
        throw err;
      }
    }

    throw new HttpError(`J-Quants request ${method} ${path} exceeded retries`, 0);
  }

  /** One attempt. The timeout and the caller's signal stay armed until the body is read. */
  private async executeHttp(url: string, init: RequestInit, signal?: AbortSignal): Promise<HttpResult> {
    throwIfAborted(signal);
    const controller = new AbortController();
    const abortHandler = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', abortHandler);

    let timedOut = false;
    const timeoutId = this.timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, this.timeoutMs)
      : undefined;

    try {
      const response = await this.transport(url, { ...init, signal: controller.signal });
      try {
        return { response, text: await readText(response, controller.signal) };
      } catch (error) {
        if (response.ok || controller.signal.aborted) {
          throw error;
        }
        return { response };
      }
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError(`J-Quants request timed out after ${this.timeoutMs}ms`);
      }
      if (signal?.aborted) {
        throw new CancelledError(undefined, { cause: error });
      }
      throw new HttpError(
        `J-Quants request failed: ${error instanceof Error ? error.message : 'network error'}`,
        0,
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', abortHandler);
    }
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\/+/, '')}`);
    if (params) {
      const entries = Object.entries(params).filter(
        (entry): entry is [string, string | number | boolean] => entry[1] !== undefined && entry[1] !== '',
      );
      entries.sort(([a], [b]) => a.localeCompare(b));
      for (const [key, value] of entries) {
        url.searchParams.append(key, String(value));
      }
    }
    return url.toString();
  }

  private async recordAttempt(
    endpoint: string,
    method: string,
    start: number,
    status: number,
    attempt: number,
  ): Promise<void> {
    await this.metrics?.recordRequest({
      endpoint,
      method,
      durationMs: Date.now() - start,
      status,
      attempt,
    });
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

export function isRetryableStatus(status: number): boolean {
  return status === 0 || RETRYABLE_STATUSES.has(status);
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(undefined, { cause: signal.reason });
  }
}

/** Reads the body, giving up as soon as `signal` aborts even if the stream itself stalls. */
function readText(response: Response, signal: AbortSignal): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function parseJson(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`J-Quants response for ${path} is not valid JSON`, { cause: error });
  }
}

function computeBackoffWithJitter(baseMs: number, retryIndex: number): number {
  const exp = baseMs * 2 ** retryIndex;
  const jitter = Math.random() * baseMs;
  return exp + jitter;
}

function parseRetryAfter(res: Response): number | undefined {
  const header = res.headers.get('retry-after');
  if (!header) {
    return undefined;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    const diff = date - Date.now();
    return diff > 0 ? diff : 0;
  }

  return undefined;
}
