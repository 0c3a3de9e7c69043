/**
 * ip-api.com client
 * =================
 * Single, batch, DNS and batch DNS lookups against http://ip-api.com, or
 * https://pro.ip-api.com when an API key is supplied.
 */

import type { AxiosResponse } from 'axios';
import dotenv from 'dotenv';
import { z } from 'zod';
import {
  createLogger,
  ConfigError,
  IpApiError,
  getIpApiConfig,
  parseIpApiConfig,
  resolveBaseURL,
  type IpApiConfig,
  type IpApiConfigInput,
  type Language,
} from '@ipgeo/utils';
import {
  BaseApiClient,
  RateLimiter,
  readNumericHeader,
  type HttpTransport,
  type RateLimitState,
  type RateLimiterConfig,
} from './base-client';
import {
  resolveBatchFields,
  resolveFields,
  type FieldName,
  type FieldSelection,
} from './fields';
import { assertDomain, assertLookupTarget } from './validation';

const logger = createLogger('api-clients');

export const BATCH_LIMIT = 100;

/** Free tier: 45 requests per minute */
export const FREE_TIER_RATE_LIMIT: RateLimiterConfig = {
  maxRequests: 45,
  windowMs: 60_000,
};

/** Free tier batch calls: 15 per minute, on top of the shared budget */
export const FREE_TIER_BATCH_RATE_LIMIT: RateLimiterConfig = {
  maxRequests: 15,
  windowMs: 60_000,
};

export const OUTPUT_FORMATS = ['json', 'xml', 'csv', 'line'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];
export type TextFormat = Exclude<OutputFormat, 'json'>;

export type LookupValue = string | number | boolean;
export type LookupResult = Record<string, LookupValue>;

const LookupResultSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));
const BatchResultSchema = z.array(LookupResultSchema);

/**
 * Rate-limit headers of the last response
 */
export interface ResponseMetadata {
  /** Requests left in the server's window (X-Rl) */
  requestsRemaining?: number;
  /** Seconds until the server's window resets (X-Ttl) */
  secondsUntilReset?: number;
}

export interface LookupOptions {
  fields?: FieldSelection;
}

export interface FormatOptions<F extends OutputFormat> extends LookupOptions {
  format: F;
}

export interface IpApiClientConfig extends Omit<IpApiConfigInput, 'lang'> {
  /** One of SUPPORTED_LANGUAGES; anything else is a ConfigError */
  lang?: string;
  /** Local request budget; ignored with an API key unless given explicitly, false disables it */
  rateLimit?: RateLimiterConfig | false;
  /** Budget for batch calls only; follows the same defaults as `rateLimit` */
  batchRateLimit?: RateLimiterConfig | false;
  /** Optional transport for testing */
  axiosInstance?: HttpTransport;
}

interface BatchEntry {
  query: string;
  fields?: string;
  lang: Language;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function pickFields(result: LookupResult, names: readonly FieldName[] | undefined): LookupResult {
  if (!names) return result;
  const picked: LookupResult = {};
  for (const name of names) {
    if (name in result) {
      picked[name] = result[name];
    }
  }
  return picked;
}

export class IpApiClient extends BaseApiClient {
  private readonly apiKey?: string;
  private readonly lang: Language;
  private readonly batchRateLimiter?: RateLimiter;
  private lastResponseMetadata?: ResponseMetadata;

  constructor(config: IpApiClientConfig = {}) {
    const { rateLimit, batchRateLimit, axiosInstance, ...settings } = config;
    const parsed: IpApiConfig = parseIpApiConfig(settings);

    // Pro keys are not limited per minute
    const rateLimiter =
      rateLimit === false
        ? undefined
        : (rateLimit ?? (parsed.apiKey ? undefined : FREE_TIER_RATE_LIMIT));

    super({
      baseURL: resolveBaseURL(parsed),
      apiName: 'ip-api',
      timeout: parsed.timeoutMs,
      rateLimiter,
      axiosInstance,
    });

    this.apiKey = parsed.apiKey;
    this.lang = parsed.lang;

    const batchLimit =
      batchRateLimit === false
        ? undefined
        : (batchRateLimit ??
          (rateLimit === false || parsed.apiKey ? undefined : FREE_TIER_BATCH_RATE_LIMIT));
    if (batchLimit) {
      this.batchRateLimiter = new RateLimiter(batchLimit);
    }
  }

  /**
   * Construct a client, hand it to `fn` and close it afterwards
   */
  static async withClient<T>(
    config: IpApiClientConfig,
    fn: (client: IpApiClient) => Promise<T> | T
  ): Promise<T> {
    return new IpApiClient(config).use(fn);
  }

  isProTier(): boolean {
    return this.apiKey !== undefined;
  }

  getLanguage(): Language {
    return this.lang;
  }

  /**
   * X-Rl / X-Ttl values from the last response, undefined before the first
   */
  getRateLimitInfo(): ResponseMetadata | undefined {
    return this.lastResponseMetadata;
  }

  /**
   * Local window of the batch-only budget
   */
  getBatchRateLimitState(): RateLimitState | undefined {
    return this.batchRateLimiter?.getState();
  }

  protected override onResponse(response: AxiosResponse): void {
    this.lastResponseMetadata = {
      requestsRemaining: readNumericHeader(response.headers, 'X-Rl'),
      secondsUntilReset: readNumericHeader(response.headers, 'X-Ttl'),
    };
  }

  /**
   * Look up one IP address or hostname; the caller's own address when
   * `target` is omitted. JSON results are parsed, other formats come back as
   * the raw response text.
   */
  async lookup(target?: string, options?: LookupOptions & { format?: 'json' }): Promise<LookupResult>;
  async lookup(target: string | undefined, options: FormatOptions<TextFormat>): Promise<string>;
  async lookup(
    target?: string,
    options: LookupOptions & { format?: OutputFormat } = {}
  ): Promise<LookupResult | string> {
    const format = options.format ?? 'json';
    if (!isOutputFormat(format)) {
      throw new ConfigError(
        `Unsupported format: ${String(format)}; expected one of ${OUTPUT_FORMATS.join(', ')}`,
        'format'
      );
    }
    if (target !== undefined) {
      assertLookupTarget(target);
    }
    const fields = options.fields === undefined ? undefined : resolveFields(options.fields);

    const path = target === undefined ? `/${format}` : `/${format}/${target}`;
    const params = this.buildParams(fields?.param);

    if (format !== 'json') {
      const data = await this.get<unknown>(path, { params, responseType: 'text' });
      if (typeof data !== 'string') {
        throw new IpApiError(`Expected ${format} text from ip-api`, { source: 'response' });
      }
      return data;
    }

    const data = await this.get<unknown>(path, { params });
    const result = this.parseResult(data);
    this.assertSuccess(result, target);
    return pickFields(result, fields?.names);
  }

  /**
   * Resolve a domain on the remote side and look up the address it maps to
   */
  async dnsLookup(domain: string, options: LookupOptions = {}): Promise<LookupResult> {
    assertDomain(domain);
    const fields = options.fields === undefined ? undefined : resolveFields(options.fields);

    const data = await this.get<unknown>(`/json/${domain}`, {
      params: this.buildParams(fields?.param),
    });
    const result = this.parseResult(data);
    this.assertSuccess(result, domain);
    return pickFields(result, fields?.names);
  }

  /**
   * Look up to 100 addresses or hostnames in one request. Results keep input
   * order; an entry the remote could not resolve carries `status: "fail"`
   * instead of raising. `status` and `message` are kept on every entry even
   * when `fields` leaves them out.
   */
  async batch(targets: readonly string[], options: LookupOptions = {}): Promise<LookupResult[]> {
    this.assertBatchSize(targets, 'targets');
    targets.forEach((target, index) => assertLookupTarget(target, index + 1));
    return this.sendBatch(targets, options);
  }

  /**
   * Batch variant of dnsLookup
   */
  async batchDns(domains: readonly string[], options: LookupOptions = {}): Promise<LookupResult[]> {
    this.assertBatchSize(domains, 'domains');
    domains.forEach((domain, index) => assertDomain(domain, index + 1));
    return this.sendBatch(domains, options);
  }

  private assertBatchSize(entries: readonly string[], name: string): void {
    if (entries.length === 0) {
      throw new ConfigError(`Batch ${name} cannot be empty`, name);
    }
    if (entries.length > BATCH_LIMIT) {
      throw new ConfigError(
        `Batch limit exceeded: ${entries.length} ${name} (max ${BATCH_LIMIT})`,
        name
      );
    }
  }

  private async sendBatch(
    queries: readonly string[],
    options: LookupOptions
  ): Promise<LookupResult[]> {
    const fields = options.fields === undefined ? undefined : resolveBatchFields(options.fields);

    const body: BatchEntry[] = queries.map((query) => ({
      query,
      ...(fields ? { fields: fields.param } : {}),
      lang: this.lang,
    }));

    const response = await this.request<unknown>(
      { method: 'POST', url: '/batch', data: body, params: this.buildParams() },
      this.batchRateLimiter ? [this.batchRateLimiter] : []
    );
    const data = response.data;

    const parsed = BatchResultSchema.safeParse(data);
    if (!parsed.success) {
      throw new IpApiError('Expected a list of results from the batch endpoint', {
        source: 'response',
        cause: parsed.error,
      });
    }
    if (parsed.data.length !== queries.length) {
      throw new IpApiError(
        `Batch endpoint returned ${parsed.data.length} results for ${queries.length} queries`,
        { source: 'response' }
      );
    }

    const failed = parsed.data.filter((entry) => entry.status === 'fail').length;
    if (failed > 0) {
      logger.warn('Batch entries failed on the remote side', { failed, total: queries.length });
    }

    return parsed.data.map((entry) => pickFields(entry, fields?.names));
  }

  private buildParams(fields?: string): Record<string, string> {
    const params: Record<string, string> = { lang: this.lang };
    if (fields !== undefined) {
      params.fields = fields;
    }
    if (this.apiKey) {
      params.key = this.apiKey;
    }
    return params;
  }

  private parseResult(data: unknown): LookupResult {
    const parsed = LookupResultSchema.safeParse(data);
    if (!parsed.success) {
      throw new IpApiError('Unexpected response body from ip-api', {
        source: 'response',
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private assertSuccess(result: LookupResult, target: string | undefined): void {
    if (result.status !== 'fail') return;

    const message = typeof result.message === 'string' ? result.message : 'Unknown error';
    logger.warn('ip-api lookup failed', { target, reason: message });
    throw new IpApiError(message, {
      source: 'remote',
      context: { target, query: result.query },
    });
  }
}

/**
 * Build a client from IPAPI_* environment variables, loading `.env` first
 */
export function createIpApiClientFromEnv(
  overrides: Pick<IpApiClientConfig, 'rateLimit' | 'batchRateLimit' | 'axiosInstance'> = {}
): IpApiClient {
  dotenv.config();
  return new IpApiClient({ ...getIpApiConfig(), ...overrides });
}
