/**
 * Tests for base-client.ts
 *
 * Tests cover:
 * - Fixed-window rate limiter
 * - Transport error classification
 * - Session lifecycle
 * - HTTP methods
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import {
  BaseApiClient,
  RateLimiter,
  readNumericHeader,
} from '@ipgeo/api-clients/base-client';
import { ConfigError, IpApiError, RateLimitError } from '@ipgeo/utils';
import { createMockTransport, httpError, okResponse } from '../helpers';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('grants exactly maxRequests per window', () => {
    const limiter = new RateLimiter({ maxRequests: 3, windowMs: 1000 });

    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(false);
    expect(limiter.getState()).toEqual({
      count: 3,
      windowStart: Date.parse('2024-03-01T12:00:00Z'),
      limit: 3,
      remaining: 0,
    });
  });

  it('keeps the window until strictly more than windowMs has elapsed', () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000 });
    expect(limiter.tryAcquire()).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(limiter.tryAcquire()).toBe(false);
    expect(limiter.getTimeUntilReset()).toBe(1);

    vi.advanceTimersByTime(1);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.getState().count).toBe(1);
    expect(limiter.getState().windowStart).toBe(Date.parse('2024-03-01T12:00:01.001Z'));
  });

  it('canAcquire() does not take a unit', () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000 });

    expect(limiter.canAcquire()).toBe(true);
    expect(limiter.canAcquire()).toBe(true);
    expect(limiter.getState().count).toBe(0);

    limiter.tryAcquire();
    expect(limiter.canAcquire()).toBe(false);
  });

  it('reset() starts a fresh window', () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000 });
    limiter.tryAcquire();
    limiter.reset();
    expect(limiter.getState().remaining).toBe(1);
  });

  it('rejects nonsensical limits', () => {
    expect(() => new RateLimiter({ maxRequests: 0, windowMs: 1000 })).toThrow(ConfigError);
    expect(() => new RateLimiter({ maxRequests: 1, windowMs: 0 })).toThrow(ConfigError);
  });
});

describe('readNumericHeader', () => {
  it('reads plain header objects case-insensitively by lower-casing the name', () => {
    expect(readNumericHeader({ 'x-ttl': '42' }, 'X-Ttl')).toBe(42);
  });

  it('reads AxiosHeaders instances', () => {
    expect(readNumericHeader(new AxiosHeaders({ 'X-Rl': '7' }), 'X-Rl')).toBe(7);
  });

  it('returns undefined for missing or non-numeric values', () => {
    expect(readNumericHeader({}, 'X-Rl')).toBeUndefined();
    expect(readNumericHeader({ 'x-rl': 'soon' }, 'X-Rl')).toBeUndefined();
    expect(readNumericHeader(undefined, 'X-Rl')).toBeUndefined();
  });
});

describe('BaseApiClient', () => {
  let mock: ReturnType<typeof createMockTransport>;

  beforeEach(() => {
    mock = createMockTransport();
  });

  describe('HTTP Methods', () => {
    it('should make GET request', async () => {
      mock.request.mockResolvedValue(okResponse({ result: 'success' }));
      const client = new BaseApiClient({ baseURL: 'http://api.test', axiosInstance: mock.transport });

      const result = await client.get('/test', { params: { foo: 'bar' } });

      expect(mock.request).toHaveBeenCalledWith({
        method: 'GET',
        url: '/test',
        params: { foo: 'bar' },
      });
      expect(result).toEqual({ result: 'success' });
    });

    it('should make POST request', async () => {
      mock.request.mockResolvedValue(okResponse([1, 2]));
      const client = new BaseApiClient({ baseURL: 'http://api.test', axiosInstance: mock.transport });

      const result = await client.post('/test', { key: 'value' });

      expect(mock.request).toHaveBeenCalledWith({
        method: 'POST',
        url: '/test',
        data: { key: 'value' },
      });
      expect(result).toEqual([1, 2]);
    });

    it('should return the transport', () => {
      const client = new BaseApiClient({ baseURL: 'http://api.test', axiosInstance: mock.transport });
      expect(client.getAxiosInstance()).toBe(mock.transport);
    });
  });

  describe('Rate limiting', () => {
    it('refuses before sending once the budget is spent', async () => {
      mock.request.mockResolvedValue(okResponse({}));
      const client = new BaseApiClient({
        baseURL: 'http://api.test',
        axiosInstance: mock.transport,
        rateLimiter: { maxRequests: 2, windowMs: 60_000 },
      });

      await client.get('/a');
      await client.get('/b');
      await expect(client.get('/c')).rejects.toBeInstanceOf(RateLimitError);

      expect(mock.request).toHaveBeenCalledTimes(2);
      expect(client.getRateLimitState()?.remaining).toBe(0);
    });

    it('has no state without a limiter', () => {
      const client = new BaseApiClient({ baseURL: 'http://api.test', axiosInstance: mock.transport });
      expect(client.getRateLimitState()).toBeUndefined();
    });
  });

  describe('Error classification', () => {
    let client: BaseApiClient;

    beforeEach(() => {
      client = new BaseApiClient({
        baseURL: 'http://api.test',
        apiName: 'ip-api',
        timeout: 1500,
        axiosInstance: mock.transport,
      });
    });

    async function failureOf(promise: Promise<unknown>): Promise<IpApiError> {
      try {
        await promise;
      } catch (error) {
        if (error instanceof IpApiError) return error;
        throw error;
      }
      throw new Error('expected the request to fail');
    }

    it('maps a server 429 to IpApiError with the reset time', async () => {
      mock.request.mockRejectedValue(httpError(429, 'Too Many Requests', { 'x-ttl': '30' }));

      const error = await failureOf(client.get('/json/8.8.8.8'));

      expect(error).not.toBeInstanceOf(RateLimitError);
      expect(error.kind).toBe('api');
      expect(error.source).toBe('http');
      expect(error.apiStatusCode).toBe(429);
      expect(error.retryAfterSeconds).toBe(30);
      expect(error.message).toBe('Rate limit exceeded by ip-api. Reset in 30 seconds');
    });

    it('maps a 422 to a batch rejection', async () => {
      mock.request.mockRejectedValue(httpError(422, 'Unprocessable Entity'));

      const error = await failureOf(client.post('/batch', []));

      expect(error.apiStatusCode).toBe(422);
      expect(error.message).toBe(
        'ip-api rejected the request (more than 100 entries or an invalid body)'
      );
    });

    it('maps other HTTP errors with their status', async () => {
      mock.request.mockRejectedValue(httpError(503, 'Service Unavailable'));

      const error = await failureOf(client.get('/json'));

      expect(error.source).toBe('http');
      expect(error.message).toBe('ip-api responded with HTTP 503 Service Unavailable');
    });

    it('maps a timeout to a transport failure', async () => {
      const timeout = new AxiosError('timeout of 1500ms exceeded', AxiosError.ECONNABORTED);
      mock.request.mockRejectedValue(timeout);

      const error = await failureOf(client.get('/json'));

      expect(error.source).toBe('transport');
      expect(error.message).toBe('Request to ip-api timed out after 1500 ms');
      expect(error.cause).toBe(timeout);
    });

    it('maps an unreachable endpoint to a transport failure', async () => {
      mock.request.mockRejectedValue(
        new AxiosError('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED')
      );

      const error = await failureOf(client.get('/json'));

      expect(error.source).toBe('transport');
      expect(error.message).toBe('Network error: connect ECONNREFUSED 127.0.0.1:80');
    });

    it('wraps anything else', async () => {
      mock.request.mockRejectedValue(new Error('socket hang up'));

      const error = await failureOf(client.get('/json'));

      expect(error.source).toBe('transport');
      expect(error.message).toBe('Request failed: socket hang up');
    });
  });

  describe('Session lifecycle', () => {
    it('rejects requests after close() without sending', async () => {
      const client = new BaseApiClient({ baseURL: 'http://api.test', axiosInstance: mock.transport });
      client.close();

      await expect(client.get('/json')).rejects.toBeInstanceOf(ConfigError);
      expect(mock.request).not.toHaveBeenCalled();
    });

    it('open() resumes a closed client', async () => {
      mock.request.mockResolvedValue(okResponse({ ok: true }));
      const client = new BaseApiClient({ baseURL: 'http://api.test', axiosInstance: mock.transport });
      client.close();
      client.open();

      await expect(client.get('/json')).resolves.toEqual({ ok: true });
    });

    it('closing twice is a no-op', () => {
      const client = new BaseApiClient({ baseURL: 'http://api.test' });

      client.close();
      expect(() => client.close()).not.toThrow();
      expect(client.isClosed()).toBe(true);
    });

    it('re-opening builds a fresh transport', () => {
      const client = new BaseApiClient({ baseURL: 'http://api.test' });
      const first = client.getAxiosInstance();

      client.close();
      client.open();

      expect(client.isClosed()).toBe(false);
      expect(client.getAxiosInstance()).not.toBe(first);
      client.close();
    });

    it('use() closes on success and on failure', async () => {
      const ok = new BaseApiClient({ baseURL: 'http://api.test', axiosInstance: mock.transport });
      await expect(ok.use(async () => 'done')).resolves.toBe('done');
      expect(ok.isClosed()).toBe(true);

      const failing = new BaseApiClient({ baseURL: 'http://api.test', axiosInstance: mock.transport });
      await expect(
        failing.use(async () => {
          throw new Error('caller failed');
        })
      ).rejects.toThrow('caller failed');
      expect(failing.isClosed()).toBe(true);
    });
  });
});
