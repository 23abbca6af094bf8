/**
 * Retrying HTTP client tests: retry policy, timeouts, cancellation and wire parsing.
 */

import { describe, test, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { DEFAULT_MAX_RETRY_DELAY_MS, RetryingHttpClient } from '../httpClient';
import type { AuthHeaderProvider, HttpTransport, MetricsSink, RequestMetric } from '../types';
import { CancelledError, HttpError, ProtocolError, TimeoutError } from '../types';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

/** A 200 whose body never finishes arriving. */
function stalledBodyResponse(): Response {
  return new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 });
}

/** A 200 whose body stream fails part-way, as after a connection reset. */
function brokenBodyResponse(): Response {
  return new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new TypeError('terminated'));
      },
    }),
    { status: 200 },
  );
}

function statusResponse(status: number, body = '', headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

describe('RetryingHttpClient', () => {
  let transport: Mock<HttpTransport>;
  let sleep: Mock<(ms: number, signal?: AbortSignal) => Promise<void>>;
  let metrics: RequestMetric[];
  let client: RetryingHttpClient;

  const auth: AuthHeaderProvider = {
    getAuthHeader: async () => ({ Authorization: 'Bearer test-id-token' }),
  };

  beforeEach(() => {
    transport = vi.fn<HttpTransport>();
    sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>().mockResolvedValue(undefined);
    metrics = [];
    const sink: MetricsSink = { recordRequest: (metric) => void metrics.push(metric) };

    client = new RetryingHttpClient({
      baseUrl: 'https://api.jquants.test/v1',
      maxAttempts: 3,
      baseRetryDelayMs: 10,
      timeoutMs: 1000,
      metrics: sink,
      transport,
      sleep,
    });
    client.setAuthProvider(auth);
  });

  describe('retry policy', () => {
    test('retries 503 twice and returns the third payload', async () => {
      transport
        .mockResolvedValueOnce(statusResponse(503))
        .mockResolvedValueOnce(statusResponse(503))
        .mockResolvedValueOnce(jsonResponse({ daily_quotes: [{ Code: '7203' }] }));

      const body = await client.request('GET', 'prices/daily_quotes', { params: { date: '20240304' } });

      expect(body).toEqual({ daily_quotes: [{ Code: '7203' }] });
      expect(transport).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(metrics.map((m) => [m.status, m.attempt])).toEqual([
        [503, 1],
        [503, 2],
        [200, 3],
      ]);
    });

    test('fails immediately on a non-retryable status', async () => {
      transport.mockResolvedValueOnce(statusResponse(404, 'not found'));

      const error = await client.request('GET', 'listed/info').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(HttpError);
      expect(error).toMatchObject({ status: 404, body: 'not found' });
      expect(transport).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    test('gives up after maxAttempts and surfaces the last status', async () => {
      transport.mockImplementation(async () => statusResponse(500));

      await expect(client.request('GET', 'indices/topix')).rejects.toMatchObject({ status: 500 });
      expect(transport).toHaveBeenCalledTimes(3);
    });

    test('does not retry an authenticated POST', async () => {
      transport.mockResolvedValueOnce(statusResponse(503));

      await expect(client.request('POST', 'some/resource', { body: { a: 1 } })).rejects.toMatchObject({
        status: 503,
      });
      expect(transport).toHaveBeenCalledTimes(1);
    });

    test('retries an unauthenticated POST without a bearer header', async () => {
      transport
        .mockResolvedValueOnce(statusResponse(502))
        .mockResolvedValueOnce(jsonResponse({ refreshToken: 'refresh-1' }));

      const body = await client.request('POST', 'token/auth_user', {
        body: { mailaddress: 'user@example.com', password: 'test-secret' },
        auth: false,
      });

      expect(body).toEqual({ refreshToken: 'refresh-1' });
      expect(transport).toHaveBeenCalledTimes(2);
      const [, init] = transport.mock.calls[1];
      const headers = new Headers(init.headers);
      expect(headers.get('Authorization')).toBeNull();
      expect(headers.get('Content-Type')).toBe('application/json');
      expect(init.body).toBe('{"mailaddress":"user@example.com","password":"test-secret"}');
    });

    test('waits for Retry-After when the server sends it', async () => {
      transport
        .mockResolvedValueOnce(statusResponse(429, '', { 'retry-after': '2' }))
        .mockResolvedValueOnce(jsonResponse({ topix: [] }));

      await client.request('GET', 'indices/topix');

      expect(sleep).toHaveBeenCalledWith(2000, undefined);
    });

    test('caps a long Retry-After at the maximum retry delay', async () => {
      transport
        .mockResolvedValueOnce(statusResponse(429, '', { 'retry-after': '86400' }))
        .mockResolvedValueOnce(jsonResponse({ topix: [] }));

      await client.request('GET', 'indices/topix');

      expect(sleep).toHaveBeenCalledWith(DEFAULT_MAX_RETRY_DELAY_MS, undefined);
    });

    test('retries a body that fails mid-stream as status 0', async () => {
      transport
        .mockResolvedValueOnce(brokenBodyResponse())
        .mockResolvedValueOnce(jsonResponse({ info: [{ Code: '7203' }] }));

      await expect(client.request('GET', 'listed/info')).resolves.toEqual({ info: [{ Code: '7203' }] });
      expect(transport).toHaveBeenCalledTimes(2);
      expect(metrics.map((m) => [m.status, m.attempt])).toEqual([
        [0, 1],
        [200, 2],
      ]);
    });

    test('keeps the status of an error response whose body cannot be read', async () => {
      transport.mockResolvedValueOnce(
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.error(new TypeError('terminated'));
            },
          }),
          { status: 404 },
        ),
      );

      const error = await client.request('GET', 'listed/info').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(HttpError);
      expect(error).toMatchObject({ status: 404, body: undefined });
      expect(transport).toHaveBeenCalledTimes(1);
    });

    test('retries network failures as status 0', async () => {
      transport
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(jsonResponse({ info: [] }));

      await expect(client.request('GET', 'listed/info')).resolves.toEqual({ info: [] });
      expect(metrics[0]).toMatchObject({ status: 0, attempt: 1 });
    });
  });

  describe('request shaping', () => {
    test('attaches the bearer header and sorts the query string', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ daily_quotes: [] }));

      await client.request('GET', 'prices/daily_quotes', {
        params: { date: '20240304', code: '7203', from: undefined },
      });

      const [url, init] = transport.mock.calls[0];
      expect(url).toBe('https://api.jquants.test/v1/prices/daily_quotes?code=7203&date=20240304');
      expect(new Headers(init.headers).get('Authorization')).toBe('Bearer test-id-token');
      expect(init.method).toBe('GET');
    });

    test('returns an empty successful body as-is', async () => {
      transport.mockResolvedValueOnce(jsonResponse({ daily_quotes: [] }));

      await expect(client.request('GET', 'prices/daily_quotes')).resolves.toEqual({ daily_quotes: [] });
      expect(transport).toHaveBeenCalledTimes(1);
    });

    test('rejects a body that is not JSON with ProtocolError', async () => {
      transport.mockResolvedValueOnce(statusResponse(200, '<html>maintenance</html>'));

      await expect(client.request('GET', 'listed/info')).rejects.toBeInstanceOf(ProtocolError);
      expect(transport).toHaveBeenCalledTimes(1);
    });
  });

  describe('timeouts and cancellation', () => {
    const hangingTransport: HttpTransport = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    test('raises TimeoutError after retrying a hanging request', async () => {
      transport.mockImplementation(hangingTransport);
      const slow = new RetryingHttpClient({
        baseUrl: 'https://api.jquants.test/v1',
        maxAttempts: 2,
        timeoutMs: 5,
        transport,
        sleep,
      });
      slow.setAuthProvider(auth);

      const error = await slow.request('GET', 'listed/info').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ status: 0 });
      expect(transport).toHaveBeenCalledTimes(2);
    });

    test('times out a response whose body stalls after the headers', async () => {
      transport.mockImplementation(async () => stalledBodyResponse());
      const slow = new RetryingHttpClient({
        baseUrl: 'https://api.jquants.test/v1',
        maxAttempts: 2,
        timeoutMs: 20,
        transport,
        sleep,
      });
      slow.setAuthProvider(auth);

      const error = await slow.request('GET', 'listed/info').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(transport).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    test('does not send a request when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        client.request('GET', 'listed/info', { signal: controller.signal }),
      ).rejects.toBeInstanceOf(CancelledError);
      expect(transport).not.toHaveBeenCalled();
    });

    test('raises CancelledError when aborted mid-request', async () => {
      const controller = new AbortController();
      transport.mockImplementation((url, init) => {
        const response = hangingTransport(url, init);
        controller.abort();
        return response;
      });

      const pending = client.request('GET', 'listed/info', { signal: controller.signal });

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(transport).toHaveBeenCalledTimes(1);
    });

    test('stops waiting between attempts once cancelled', async () => {
      const controller = new AbortController();
      transport.mockImplementation(async () => {
        setTimeout(() => controller.abort(), 10);
        return statusResponse(503);
      });
      const patient = new RetryingHttpClient({
        baseUrl: 'https://api.jquants.test/v1',
        maxAttempts: 3,
        baseRetryDelayMs: 60_000,
        transport,
      });
      patient.setAuthProvider(auth);

      const started = Date.now();
      const error = await patient
        .request('GET', 'listed/info', { signal: controller.signal })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CancelledError);
      expect(transport).toHaveBeenCalledTimes(1);
      expect(Date.now() - started).toBeLessThan(5_000);
    });
  });
});
