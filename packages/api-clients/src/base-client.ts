/**
 * Base API Client
 * ===============
 * Axios-backed client base with client-side rate limiting, error
 * classification and an explicit session lifecycle.
 */

import axios, {
  AxiosHeaders,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from 'axios';
import * as http from 'http';
import * as https from 'https';
import {
  createLogger,
  ConfigError,
  IpApiError,
  RateLimitError,
  errorMessage,
  type AnyIpApiError,
} from '@ipgeo/utils';

const logger = createLogger('api-clients');

/**
 * The part of an axios instance the client sends through
 */
export type HttpTransport = Pick<AxiosInstance, 'request'>;

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
  maxRequests: number;
  windowMs: number;
}

export interface RateLimitState {
  count: number;
  windowStart: number;
  limit: number;
  remaining: number;
}

/**
 * Base API client configuration
 */
export interface BaseApiClientConfig {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  rateLimiter?: RateLimiterConfig;
  apiName?: string;
  /** Optional transport for testing; replaces the keep-alive axios instance */
  axiosInstance?: HttpTransport;
}

/**
 * Fixed-window request counter. The window restarts once more than
 * `windowMs` has elapsed since it began.
 */
export class RateLimiter {
  private count = 0;
  private windowStart: number;
  private readonly maxRequests: number;
  private readonly windowMs: number;

  constructor(config: RateLimiterConfig) {
    if (!Number.isInteger(config.maxRequests) || config.maxRequests <= 0) {
      throw new ConfigError('Rate limit must be a positive integer', 'rateLimit.maxRequests');
    }
    if (!(config.windowMs > 0)) {
      throw new ConfigError('Rate limit window must be positive', 'rateLimit.windowMs');
    }
    this.maxRequests = config.maxRequests;
    this.windowMs = config.windowMs;
    this.windowStart = Date.now();
  }

  private rollWindow(now: number): void {
    if (now - this.windowStart > this.windowMs) {
      this.count = 0;
      this.windowStart = now;
    }
  }

  /**
   * Whether a unit is left in the current window, without taking it
   */
  canAcquire(): boolean {
    this.rollWindow(Date.now());
    return this.count < this.maxRequests;
  }

  /**
   * Take one unit of budget; false when the window is exhausted
   */
  tryAcquire(): boolean {
    if (!this.canAcquire()) {
      return false;
    }
    this.count++;
    return true;
  }

  /**
   * Milliseconds until the current window gives way to a fresh one
   */
  getTimeUntilReset(): number {
    return Math.max(0, this.windowStart + this.windowMs + 1 - Date.now());
  }

  getState(): RateLimitState {
    this.rollWindow(Date.now());
    return {
      count: this.count,
      windowStart: this.windowStart,
      limit: this.maxRequests,
      remaining: this.maxRequests - this.count,
    };
  }

  getLimit(): number {
    return this.maxRequests;
  }

  getWindowMs(): number {
    return this.windowMs;
  }

  reset(): void {
    this.count = 0;
    this.windowStart = Date.now();
  }
}

/**
 * Read a numeric response header from either an AxiosHeaders instance or a
 * plain header object
 */
export function readNumericHeader(
  headers: AxiosResponse['headers'] | undefined,
  name: string
): number | undefined {
  if (!headers) return undefined;
  const raw: unknown =
    headers instanceof AxiosHeaders ? headers.get(name) : headers[name.toLowerCase()];
  const value: unknown = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const parsed = parseInt(String(value), 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Base API client with rate limiting and a closable session
 */
export class BaseApiClient {
  protected axiosInstance: HttpTransport;
  protected rateLimiter?: RateLimiter;
  protected apiName: string;
  protected readonly timeout: number;
  private readonly baseURL: string;
  private readonly headers: Record<string, string>;
  private readonly injectedTransport: boolean;
  private httpAgent?: http.Agent;
  private httpsAgent?: https.Agent;
  private closed = false;

  constructor(config: BaseApiClientConfig) {
    this.apiName = config.apiName || 'API';
    this.baseURL = config.baseURL;
    this.timeout = config.timeout ?? 30_000;
    this.headers = { Accept: 'application/json', ...config.headers };
    this.injectedTransport = config.axiosInstance !== undefined;

    this.axiosInstance = config.axiosInstance ?? this.createTransport();

    if (config.rateLimiter) {
      this.rateLimiter = new RateLimiter(config.rateLimiter);
    }
  }

  private createTransport(): AxiosInstance {
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });
    return axios.create({
      baseURL: this.baseURL,
      timeout: this.timeout,
      headers: this.headers,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
    });
  }

  /**
   * Re-open a closed client. No-op when already open.
   */
  open(): void {
    if (!this.closed) return;
    if (!this.injectedTransport) {
      this.axiosInstance = this.createTransport();
    }
    this.closed = false;
    logger.debug('Session opened', { apiName: this.apiName });
  }

  /**
   * Release pooled connections. Closing twice is a no-op.
   */
  close(): void {
    if (this.closed) return;
    this.httpAgent?.destroy();
    this.httpsAgent?.destroy();
    this.httpAgent = undefined;
    this.httpsAgent = undefined;
    this.closed = true;
    logger.debug('Session closed', { apiName: this.apiName });
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Run `fn` with this client and close it however `fn` exits
   */
  async use<T>(fn: (client: this) => Promise<T> | T): Promise<T> {
    try {
      return await fn(this);
    } finally {
      this.close();
    }
  }

  /**
   * Local rate-limit window, or undefined when the client does not limit
   */
  getRateLimitState(): RateLimitState | undefined {
    return this.rateLimiter?.getState();
  }

  /**
   * Pre-flight checks that must pass before anything is sent. Validation
   * errors are raised by callers before this point so they never cost budget.
   * A unit is taken from every limiter only once all of them have one left.
   */
  protected beforeRequest(
    config: AxiosRequestConfig,
    extraLimiters: readonly RateLimiter[] = []
  ): void {
    if (this.closed) {
      throw new ConfigError(`${this.apiName} client is closed; call open() first`, 'session');
    }

    const limiters = this.rateLimiter ? [this.rateLimiter, ...extraLimiters] : extraLimiters;
    const exhausted = limiters.find((limiter) => !limiter.canAcquire());
    if (exhausted) {
      const waitTime = exhausted.getTimeUntilReset();
      logger.warn('Rate limit reached, request refused', {
        apiName: this.apiName,
        endpoint: config.url,
        waitTimeMs: waitTime,
      });
      throw new RateLimitError(
        `Rate limit exceeded: ${exhausted.getLimit()} requests per ${
          exhausted.getWindowMs() / 1000
        } seconds`,
        waitTime
      );
    }

    for (const limiter of limiters) {
      limiter.tryAcquire();
    }
  }

  /**
   * Hook for subclasses to read response headers
   */
  protected onResponse(_response: AxiosResponse): void {}

  /**
   * Make one request. No retries: every failure after sending surfaces as
   * an IpApiError. `extraLimiters` are charged alongside the client's own.
   */
  protected async request<T = unknown>(
    config: AxiosRequestConfig,
    extraLimiters: readonly RateLimiter[] = []
  ): Promise<AxiosResponse<T>> {
    this.beforeRequest(config, extraLimiters);

    const startTime = Date.now();
    const method = config.method?.toUpperCase() || 'GET';
    try {
      const response = await this.axiosInstance.request<T>(config);
      logger.debug('API call completed', {
        apiName: this.apiName,
        endpoint: config.url,
        method,
        status: response.status,
        latencyMs: Date.now() - startTime,
      });
      this.onResponse(response);
      return response;
    } catch (error: unknown) {
      const classified = this.classifyError(error);
      logger.error('API call failed', classified, {
        apiName: this.apiName,
        endpoint: config.url,
        method,
        latencyMs: Date.now() - startTime,
      });
      throw classified;
    }
  }

  /**
   * Map anything the transport throws onto IpApiError
   */
  protected classifyError(error: unknown): AnyIpApiError {
    if (error instanceof IpApiError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      if (error.response) {
        const status = error.response.status;

        if (status === 429) {
          const ttl = readNumericHeader(error.response.headers, 'X-Ttl');
          return new IpApiError(
            ttl !== undefined
              ? `Rate limit exceeded by ${this.apiName}. Reset in ${ttl} seconds`
              : `Rate limit exceeded by ${this.apiName}`,
            { source: 'http', statusCode: status, retryAfterSeconds: ttl, cause: error }
          );
        }

        if (status === 422) {
          return new IpApiError(
            `${this.apiName} rejected the request (more than 100 entries or an invalid body)`,
            { source: 'http', statusCode: status, cause: error }
          );
        }

        return new IpApiError(
          `${this.apiName} responded with HTTP ${status}${
            error.response.statusText ? ` ${error.response.statusText}` : ''
          }`,
          { source: 'http', statusCode: status, cause: error }
        );
      }

      if (
        error.code === 'ECONNABORTED' ||
        error.code === 'ETIMEDOUT' ||
        error.message.includes('timeout')
      ) {
        return new IpApiError(`Request to ${this.apiName} timed out after ${this.timeout} ms`, {
          source: 'transport',
          cause: error,
        });
      }

      return new IpApiError(`Network error: ${error.message}`, {
        source: 'transport',
        cause: error,
      });
    }

    return new IpApiError(`Request failed: ${errorMessage(error)}`, {
      source: 'transport',
      cause: error,
    });
  }

  /**
   * GET request
   */
  async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.request<T>({ ...config, method: 'GET', url });
    return response.data;
  }

  /**
   * POST request
   */
  async post<T = unknown>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<T> {
    const response = await this.request<T>({ ...config, method: 'POST', url, data });
    return response.data;
  }

  getAxiosInstance(): HttpTransport {
    return this.axiosInstance;
  }
}
