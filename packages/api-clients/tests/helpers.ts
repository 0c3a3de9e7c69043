/**
 * Stand-ins for the axios transport used across the api-clients tests
 */

import { vi } from 'vitest';
import {
  AxiosError,
  AxiosHeaders,
  type AxiosResponse,
  type RawAxiosResponseHeaders,
} from 'axios';
import type { HttpTransport } from '@ipgeo/api-clients/base-client';

export function createMockTransport() {
  const request = vi.fn();
  const transport: HttpTransport = { request };
  return { request, transport };
}

export function okResponse<T>(data: T, headers: RawAxiosResponseHeaders = {}): AxiosResponse<T> {
  return {
    data,
    status: 200,
    statusText: 'OK',
    headers,
    config: { headers: new AxiosHeaders() },
  };
}

export function httpError(
  status: number,
  statusText: string,
  headers: RawAxiosResponseHeaders = {}
): AxiosError {
  return new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
    undefined,
    {},
    {
      data: '',
      status,
      statusText,
      headers,
      config: { headers: new AxiosHeaders() },
    }
  );
}

export function success(query: string, extra: Record<string, string | number | boolean> = {}) {
  return { status: 'success', query, ...extra };
}
