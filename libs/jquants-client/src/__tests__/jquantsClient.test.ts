/**
 * J-Quants Client Unit Tests
 *
 * Covers the token handshake through the shared HTTP client, endpoint routing
 * and the environment factory.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { JQuantsClient, createJQuantsClient } from '../jquantsClient';
import type { HttpTransport } from '../types';

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json' },
  });
}

describe('JQuantsClient', () => {
  let transport: Mock<HttpTransport>;
  let client: JQuantsClient;

  beforeEach(() => {
    transport = vi.fn<HttpTransport>(async (url) => {
      const { pathname, searchParams } = new URL(url);
      if (pathname.endsWith('/token/auth_user')) {
        return jsonResponse({ refreshToken: 'refresh-1' });
      }
      if (pathname.endsWith('/token/auth_refresh')) {
        return jsonResponse({ idToken: 'id-1' });
      }
      if (pathname.endsWith('/prices/daily_quotes')) {
        if (searchParams.get('pagination_key') === 'next') {
          return jsonResponse({ daily_quotes: [{ Date: '2024-03-04', Code: '86970', Close: 2440 }] });
        }
        return jsonResponse({
          daily_quotes: [{ Date: '2024-03-04', Code: '72030', Close: 3700 }],
          pagination_key: 'next',
        });
      }
      return jsonResponse({ info: [] });
    });

    client = new JQuantsClient({
      credentials: { address: 'user@example.com', passcode: 'test-secret' },
      baseUrl: 'https://api.jquants.test/v1',
      transport,
      sleep: async () => {},
    });
  });

  test('authenticates once and drains every page', async () => {
    const rows = await client.getDailyQuotes({ date: '20240304' });
    await client.getListedInfo();

    expect(rows.map((r) => r.Code)).toEqual(['72030', '86970']);
    expect(transport.mock.calls.map(([url]) => new URL(url).pathname)).toEqual([
      '/v1/token/auth_user',
      '/v1/token/auth_refresh',
      '/v1/prices/daily_quotes',
      '/v1/prices/daily_quotes',
      '/v1/listed/info',
    ]);
  });

  test('sends the id token on data requests only', async () => {
    await client.getListedInfo({ code: '7203' });

    const headerOf = (call: number) => new Headers(transport.mock.calls[call][1].headers).get('Authorization');
    expect(headerOf(0)).toBeNull();
    expect(headerOf(1)).toBeNull();
    expect(headerOf(2)).toBe('Bearer id-1');
    expect(transport.mock.calls[1][0]).toBe(
      'https://api.jquants.test/v1/token/auth_refresh?refreshtoken=refresh-1',
    );
    expect(transport.mock.calls[2][0]).toBe('https://api.jquants.test/v1/listed/info?code=7203');
  });

  test('prefers date over from/to for daily quotes', async () => {
    await client.getDailyQuotes({ date: '20240304', from: '20240301', to: '20240305' });

    expect(transport.mock.calls[2][0]).toBe(
      'https://api.jquants.test/v1/prices/daily_quotes?date=20240304',
    );
  });

  test('routes each endpoint to its path and result key', async () => {
    transport.mockImplementation(async (url) => {
      const { pathname } = new URL(url);
      if (pathname.endsWith('/token/auth_user')) return jsonResponse({ refreshToken: 'refresh-1' });
      if (pathname.endsWith('/token/auth_refresh')) return jsonResponse({ idToken: 'id-1' });
      return jsonResponse({ trades_spec: [{ PublishedDate: '2024-03-07', Section: 'TSEPrime' }] });
    });

    const rows = await client.getTradesSpec({ from: '20240301', to: '20240308' });

    expect(rows).toEqual([{ PublishedDate: '2024-03-07', Section: 'TSEPrime' }]);
    expect(transport.mock.calls[2][0]).toBe(
      'https://api.jquants.test/v1/markets/trades_spec?from=20240301&to=20240308',
    );
  });
});

describe('createJQuantsClient', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('requires the mail address', () => {
    vi.stubEnv('JQUANTS_MAIL_ADDRESS', '');
    vi.stubEnv('JQUANTS_PASSWORD', 'test-secret');

    expect(() => createJQuantsClient()).toThrow('JQUANTS_MAIL_ADDRESS environment variable is required');
  });

  test('requires the password', () => {
    vi.stubEnv('JQUANTS_MAIL_ADDRESS', 'user@example.com');
    vi.stubEnv('JQUANTS_PASSWORD', '');

    expect(() => createJQuantsClient()).toThrow('JQUANTS_PASSWORD environment variable is required');
  });

  test('builds a client from the environment', () => {
    vi.stubEnv('JQUANTS_MAIL_ADDRESS', 'user@example.com');
    vi.stubEnv('JQUANTS_PASSWORD', 'test-secret');
    vi.stubEnv('JQUANTS_MAX_ATTEMPTS', 'not-a-number');

    expect(createJQuantsClient()).toBeInstanceOf(JQuantsClient);
  });
});
