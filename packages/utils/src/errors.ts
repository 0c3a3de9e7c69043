/**
 * Custom Error Classes
 * ====================
 * Error kinds raised by the geolocation client.
 *
 * Every client error carries a `kind` discriminant so callers can switch over
 * `IpApiClientError['kind']` like a sum type, or use `instanceof`:
 *
 * - `config`     - bad construction or call parameters, never sent
 * - `invalid_ip` - malformed address or domain from the caller, never sent
 * - `rate_limit` - local request budget exhausted, never sent
 * - `api`        - anything that went wrong once the request was sent
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

export type IpApiErrorKind = 'api' | 'invalid_ip' | 'rate_limit' | 'config';

/**
 * Where an `api` error originated once the request left the client
 */
export type FailureSource = 'remote' | 'http' | 'transport' | 'response';

export interface IpApiErrorOptions<K extends IpApiErrorKind = 'api'> {
  source?: FailureSource;
  statusCode?: number;
  retryAfterSeconds?: number;
  cause?: unknown;
  context?: Record<string, unknown>;
  /** Set by the derived kinds, together with their AppError code and status */
  kind?: K;
  code?: string;
  httpStatus?: number;
}

/**
 * Base error for the geolocation client. Raised directly for failures that
 * happen after a request was sent: a remote `status: "fail"`, an HTTP error
 * status (including the server's own 429), a transport failure or timeout,
 * or an unexpected response shape.
 *
 * `K` is only widened by the derived kinds below; a plain `IpApiError` is
 * always of kind `api`.
 */
export class IpApiError<K extends IpApiErrorKind = 'api'> extends AppError {
  declare readonly kind: K;
  public readonly source?: FailureSource;
  public readonly apiStatusCode?: number;
  public readonly retryAfterSeconds?: number;

  constructor(message: string, options: IpApiErrorOptions<K> = {}) {
    super(
      message,
      options.code ?? 'IP_API_ERROR',
      options.httpStatus ?? 502,
      {
        source: options.source,
        apiStatusCode: options.statusCode,
        ...options.context,
      },
      true,
      options.cause
    );
    Object.defineProperty(this, 'kind', {
      value: options.kind ?? 'api',
      enumerable: true,
    });
    this.source = options.source;
    this.apiStatusCode = options.statusCode;
    this.retryAfterSeconds = options.retryAfterSeconds;
  }
}

/**
 * Malformed IP address or domain supplied by the caller
 */
export class InvalidIpError extends IpApiError<'invalid_ip'> {
  public readonly target: string;
  /** 1-based position of the offending entry in a batch */
  public readonly position?: number;

  constructor(message: string, target: string, position?: number) {
    super(message, {
      kind: 'invalid_ip',
      code: 'INVALID_IP_ERROR',
      httpStatus: 400,
      context: { target, position },
    });
    this.target = target;
    this.position = position;
  }
}

/**
 * Local request budget exhausted; the request was not sent
 */
export class RateLimitError extends IpApiError<'rate_limit'> {
  public readonly retryAfterMs: number;

  constructor(message: string = 'Rate limit exceeded', retryAfterMs: number = 0) {
    super(message, {
      kind: 'rate_limit',
      code: 'RATE_LIMIT_ERROR',
      httpStatus: 429,
      context: { retryAfterMs },
    });
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Invalid construction or call parameters
 */
export class ConfigError extends IpApiError<'config'> {
  public readonly configKey?: string;

  constructor(message: string, configKey?: string) {
    super(message, { kind: 'config', code: 'CONFIG_ERROR', httpStatus: 400, context: { configKey } });
    this.configKey = configKey;
  }
}

/**
 * Union of every error the client raises, discriminated by `kind`
 */
export type IpApiClientError = IpApiError | InvalidIpError | RateLimitError | ConfigError;

/**
 * Any client error, whatever its kind
 */
export type AnyIpApiError = IpApiError<IpApiErrorKind>;

export function isIpApiError(error: unknown): error is IpApiClientError {
  return error instanceof IpApiError;
}

/**
 * Check if error is an operational error (expected errors that should be handled)
 */
export function isOperationalError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
