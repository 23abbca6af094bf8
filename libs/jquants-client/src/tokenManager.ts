import type { ZodType } from 'zod';
import type {
  AuthHeader,
  AuthHeaderProvider,
  Credentials,
  JsonRequester,
  Logger,
} from './types';
import {
  AuthError,
  HttpError,
  idTokenResponseSchema,
  refreshTokenResponseSchema,
} from './types';

/** One hour of margin under the presumed 24h server-side lifetime. */
export const DEFAULT_ID_TOKEN_TTL_MS = 23 * 60 * 60 * 1000;

export interface TokenManagerOptions {
  credentials: Credentials;
  /** Unauthenticated POST channel, normally the retrying HTTP client. */
  exchange: JsonRequester;
  now?: () => number;
  idTokenTtlMs?: number;
  logger?: Logger;
}

/**
 * Owns the credential exchange and the id token lifecycle.
 *
 * The refresh token is obtained lazily on first use and kept for the life of
 * the manager. The id token is valid while `now < expiresAt`; after that it is
 * re-derived from the refresh token. Concurrent callers share one in-flight
 * exchange.
 */
export class TokenManager implements AuthHeaderProvider {
  private readonly credentials: Credentials;
  private readonly exchange: JsonRequester;
  private readonly now: () => number;
  private readonly idTokenTtlMs: number;
  private readonly logger?: Logger;

  private refreshToken: string | null = null;
  private idToken: string | null = null;
  private expiresAt = 0;
  private inFlight: Promise<string> | null = null;

  constructor(options: TokenManagerOptions) {
    this.credentials = options.credentials;
    this.exchange = options.exchange;
    this.now = options.now ?? Date.now;
    this.idTokenTtlMs = options.idTokenTtlMs ?? DEFAULT_ID_TOKEN_TTL_MS;
    this.logger = options.logger;
  }

  async getAuthHeader(): Promise<AuthHeader> {
    return { Authorization: `Bearer ${await this.getIdToken()}` };
  }

  async getIdToken(): Promise<string> {
    if (this.idToken && this.now() < this.expiresAt) {
      return this.idToken;
    }

    if (!this.inFlight) {
      this.inFlight = this.renew().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** Forget the id token; the refresh token is kept. */
  invalidate(): void {
    this.idToken = null;
    this.expiresAt = 0;
  }

  get tokenExpiresAt(): number {
    return this.expiresAt;
  }

  private async renew(): Promise<string> {
    if (!this.refreshToken) {
      this.refreshToken = await this.requestRefreshToken();
    }

    const { idToken } = await this.post(
      'token/auth_refresh',
      { params: { refreshtoken: this.refreshToken } },
      idTokenResponseSchema,
      'refresh token exchange',
    );
    this.idToken = idToken;
    this.expiresAt = this.now() + this.idTokenTtlMs;
    this.logger?.debug?.('[TokenManager] Issued new id token', { expiresAt: this.expiresAt });
    return idToken;
  }

  private async requestRefreshToken(): Promise<string> {
    const { refreshToken } = await this.post(
      'token/auth_user',
      { body: { mailaddress: this.credentials.address, password: this.credentials.passcode } },
      refreshTokenResponseSchema,
      'credential exchange',
    );
    this.logger?.debug?.('[TokenManager] Obtained refresh token');
    return refreshToken;
  }

  private async post<T>(
    path: string,
    options: { params?: Record<string, string>; body?: unknown },
    schema: ZodType<T>,
    label: string,
  ): Promise<T> {
    let body: unknown;
    try {
      body = await this.exchange.request('POST', path, { ...options, auth: false });
    } catch (error) {
      if (error instanceof HttpError && error.status !== 0) {
        throw new AuthError(`J-Quants ${label} failed with status ${error.status}`, error.status, {
          cause: error,
        });
      }
      throw error;
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError(`J-Quants ${label} returned a malformed body`, undefined, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
