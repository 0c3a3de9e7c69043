/**
 * @ipgeo/api-clients - ip-api.com client package
 *
 * Public API exports
 */

export * from './base-client';
export * from './fields';
export * from './validation';
export * from './ip-api-client';

// Error kinds callers catch
export {
  IpApiError,
  InvalidIpError,
  RateLimitError,
  ConfigError,
  isIpApiError,
  SUPPORTED_LANGUAGES,
  type IpApiClientError,
  type AnyIpApiError,
  type IpApiErrorKind,
  type FailureSource,
  type Language,
} from '@ipgeo/utils';
