/**
 * Configuration loading from environment variables
 *
 * Provides the typed ip-api settings and the validation shared with the
 * client constructor.
 */

import { z } from 'zod';
import { ConfigError } from '../errors';

export const SUPPORTED_LANGUAGES = ['en', 'de', 'es', 'pt-BR', 'fr', 'ja', 'zh-CN', 'ru'] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export const DEFAULT_TIMEOUT_MS = 10_000;

export const FREE_BASE_URL = 'http://ip-api.com';
export const PRO_BASE_URL = 'https://pro.ip-api.com';

export const IpApiConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  lang: z.enum(SUPPORTED_LANGUAGES).default('en'),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  baseURL: z.string().url().optional(),
});

export type IpApiConfigInput = z.input<typeof IpApiConfigSchema>;
export type IpApiConfig = z.output<typeof IpApiConfigSchema>;

// Maps schema paths back to the environment variable a user would set
const ENV_KEYS: Record<string, string> = {
  apiKey: 'IPAPI_KEY',
  lang: 'IPAPI_LANG',
  timeoutMs: 'IPAPI_TIMEOUT_MS',
  baseURL: 'IPAPI_BASE_URL',
};

function describeIssue(issue: z.ZodIssue): string {
  const field = issue.path.join('.');
  if (field === 'lang') {
    return `Unsupported language; expected one of ${SUPPORTED_LANGUAGES.join(', ')}`;
  }
  return `Invalid ${field || 'configuration'}: ${issue.message}`;
}

/**
 * Validate client configuration, raising ConfigError on the first problem
 */
export function parseIpApiConfig(input: unknown, keyNames: Record<string, string> = {}): IpApiConfig {
  const result = IpApiConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue.path[0] ?? '');
    throw new ConfigError(describeIssue(issue), keyNames[field] ?? field);
  }
  return result.data;
}

/**
 * Load ip-api configuration from environment variables
 */
export function getIpApiConfig(env: NodeJS.ProcessEnv = process.env): IpApiConfig {
  const { IPAPI_KEY, IPAPI_LANG, IPAPI_TIMEOUT_MS, IPAPI_BASE_URL } = env;

  return parseIpApiConfig(
    {
      apiKey: IPAPI_KEY || undefined,
      lang: IPAPI_LANG || undefined,
      timeoutMs: IPAPI_TIMEOUT_MS ? Number(IPAPI_TIMEOUT_MS) : undefined,
      baseURL: IPAPI_BASE_URL || undefined,
    },
    ENV_KEYS
  );
}

/**
 * Base URL for the tier the credential unlocks
 */
export function resolveBaseURL(config: Pick<IpApiConfig, 'apiKey' | 'baseURL'>): string {
  if (config.baseURL) {
    return config.baseURL;
  }
  return config.apiKey ? PRO_BASE_URL : FREE_BASE_URL;
}
