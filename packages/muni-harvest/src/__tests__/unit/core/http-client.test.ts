/**
 * HTTPClient Tests
 *
 * Retry schedule, error taxonomy and cancellation against an in-process
 * fetch implementation.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  FetchError,
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
  type FetchImplementation,
} from '../../../core/http-client.js';
import {
  brokenBodyResponse,
  errorResponse,
  hangUntilAborted,
  htmlResponse,
  jsonResponse,
  stalledBodyResponse,
} from '../../utils/fake-fetch.js';

const URL_UNDER_TEST = 'https://wiki.example/wiki/Aachen';

function createClient(fetchImpl: FetchImplementation, maxAttempts = 3): HTTPClient {
  return new HTTPClient({ fetchImpl, maxAttempts, initialDelayMs: 0, maxDelayMs: 0 });
}

describe('HTTPClient', () => {
  describe('fetchText', () => {
    it('should return the body of a 2xx response on the first attempt', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () => htmlResponse('<p>ok</p>'));
      const client = createClient(fetchImpl);

      await expect(client.fetchText(URL_UNDER_TEST)).resolves.toBe('<p>ok</p>');
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it('should send the configured User-Agent', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () => htmlResponse('ok'));
      const client = new HTTPClient({ fetchImpl, userAgent: 'test-agent/0.1' });

      await client.fetchText(URL_UNDER_TEST);

      const init = fetchImpl.mock.calls[0]?.[1];
      expect(new Headers(init?.headers).get('user-agent')).toBe('test-agent/0.1');
      expect(init?.method).toBe('GET');
    });

    it('should retry a 5xx response and return the first success', async () => {
      const fetchImpl = vi
        .fn<FetchImplementation>()
        .mockResolvedValueOnce(errorResponse(503, 'Service Unavailable'))
        .mockResolvedValueOnce(errorResponse(502, 'Bad Gateway'))
        .mockResolvedValueOnce(htmlResponse('third time'));
      const client = createClient(fetchImpl);

      await expect(client.fetchText(URL_UNDER_TEST)).resolves.toBe('third time');
      expect(fetchImpl).toHaveBeenCalledTimes(3);
    });

    it('should retry 4xx responses as well', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () => errorResponse(404, 'Not Found'));
      const client = createClient(fetchImpl);

      await expect(client.fetchText(URL_UNDER_TEST)).rejects.toBeInstanceOf(FetchError);
      expect(fetchImpl).toHaveBeenCalledTimes(3);
    });

    it('should throw FetchError carrying the last failure after exhausting attempts', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () =>
        errorResponse(500, 'Internal Server Error')
      );
      const client = createClient(fetchImpl);

      const error = await client.fetchText(URL_UNDER_TEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (!(error instanceof FetchError)) return;
      expect(error.attempts).toBe(3);
      expect(error.url).toBe(URL_UNDER_TEST);
      expect(error.message).toBe('Fetch failed after 3 attempts: HTTP 500: Internal Server Error');
      expect(error.cause).toBeInstanceOf(HTTPError);
      if (error.cause instanceof HTTPError) {
        expect(error.cause.statusCode).toBe(500);
      }
    });

    it('should wrap transport failures in HTTPNetworkError', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () => {
        throw new TypeError('fetch failed');
      });
      const client = createClient(fetchImpl, 2);

      const error = await client.fetchText(URL_UNDER_TEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (!(error instanceof FetchError)) return;
      expect(error.cause).toBeInstanceOf(HTTPNetworkError);
      expect(error.cause.message).toBe('Network error: fetch failed');
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it('should report a per-attempt timeout as HTTPTimeoutError', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(hangUntilAborted);
      const client = new HTTPClient({ fetchImpl, maxAttempts: 1, timeoutMs: 20 });

      const error = await client.fetchText(URL_UNDER_TEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (!(error instanceof FetchError)) return;
      expect(error.cause).toBeInstanceOf(HTTPTimeoutError);
      expect(error.cause.message).toBe(`Request timeout after 20ms: ${URL_UNDER_TEST}`);
    });

    it('should retry when the body stream breaks mid-read', async () => {
      const fetchImpl = vi
        .fn<FetchImplementation>()
        .mockResolvedValueOnce(brokenBodyResponse('<p>hal', new TypeError('terminated')))
        .mockResolvedValueOnce(htmlResponse('<p>whole</p>'));
      const client = createClient(fetchImpl);

      await expect(client.fetchText(URL_UNDER_TEST)).resolves.toBe('<p>whole</p>');
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it('should fail with FetchError when every body read breaks', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () =>
        brokenBodyResponse('<p>hal', new TypeError('terminated'))
      );
      const client = createClient(fetchImpl, 2);

      const error = await client.fetchText(URL_UNDER_TEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (!(error instanceof FetchError)) return;
      expect(error.attempts).toBe(2);
      expect(error.cause).toBeInstanceOf(HTTPNetworkError);
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it('should bound a stalled body by the per-attempt timeout', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async (_url, init) =>
        stalledBodyResponse('<p>first chunk', init)
      );
      const client = new HTTPClient({ fetchImpl, maxAttempts: 1, timeoutMs: 20 });

      const error = await client.fetchText(URL_UNDER_TEST).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (!(error instanceof FetchError)) return;
      expect(error.cause).toBeInstanceOf(HTTPTimeoutError);
      expect(error.cause.message).toBe(`Request timeout after 20ms: ${URL_UNDER_TEST}`);
    });

    it('should honor per-request maxAttempts', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () => errorResponse(500, 'Boom'));
      const client = createClient(fetchImpl, 5);

      await expect(client.fetchText(URL_UNDER_TEST, { maxAttempts: 1 })).rejects.toThrow(
        'Fetch failed after 1 attempts'
      );
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
  });

  describe('cancellation', () => {
    it('should not fetch when the signal is already aborted', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () => htmlResponse('ok'));
      const client = createClient(fetchImpl);
      const controller = new AbortController();
      controller.abort(new Error('stop now'));

      await expect(
        client.fetchText(URL_UNDER_TEST, { signal: controller.signal })
      ).rejects.toThrow('stop now');
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('should stop an in-flight request with the abort reason', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(hangUntilAborted);
      const client = createClient(fetchImpl);
      const controller = new AbortController();

      const pending = client.fetchText(URL_UNDER_TEST, { signal: controller.signal });
      controller.abort(new Error('cancelled by caller'));

      await expect(pending).rejects.toThrow('cancelled by caller');
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it('should stop retrying when aborted during backoff', async () => {
      const controller = new AbortController();
      const fetchImpl = vi.fn<FetchImplementation>(async () => {
        setTimeout(() => controller.abort(new Error('gave up')), 5);
        return errorResponse(500, 'Boom');
      });
      const client = new HTTPClient({ fetchImpl, maxAttempts: 3, initialDelayMs: 10000 });

      await expect(
        client.fetchText(URL_UNDER_TEST, { signal: controller.signal })
      ).rejects.toThrow('gave up');
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
  });

  describe('fetchJSON', () => {
    it('should retry a JSON body that breaks mid-read', async () => {
      const fetchImpl = vi
        .fn<FetchImplementation>()
        .mockResolvedValueOnce(brokenBodyResponse('{"ok":', new TypeError('terminated')))
        .mockResolvedValueOnce(jsonResponse({ ok: true }));
      const client = createClient(fetchImpl);

      await expect(client.fetchJSON(URL_UNDER_TEST)).resolves.toEqual({ ok: true });
      expect(fetchImpl).toHaveBeenCalledTimes(2);
    });

    it('should parse a JSON body', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () => jsonResponse({ ok: true }));
      const client = createClient(fetchImpl);

      await expect(client.fetchJSON(URL_UNDER_TEST)).resolves.toEqual({ ok: true });
    });

    it('should throw HTTPJSONParseError on an invalid body without retrying', async () => {
      const fetchImpl = vi.fn<FetchImplementation>(async () => htmlResponse('<html>'));
      const client = createClient(fetchImpl);

      await expect(client.fetchJSON(URL_UNDER_TEST)).rejects.toBeInstanceOf(HTTPJSONParseError);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
  });

  describe('calculateBackoffDelay', () => {
    it('should double the delay per attempt up to the cap', () => {
      const client = new HTTPClient({ initialDelayMs: 2000, maxDelayMs: 30000 });

      expect(client.calculateBackoffDelay(1)).toBe(2000);
      expect(client.calculateBackoffDelay(2)).toBe(4000);
      expect(client.calculateBackoffDelay(3)).toBe(8000);
      expect(client.calculateBackoffDelay(5)).toBe(30000);
    });
  });
});
