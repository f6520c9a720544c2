import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { HttpFailure } from '../errors.js';

export interface HttpOptions {
  timeoutMs: number;
  /** Replaces the transport, used by tests to stay in process. */
  adapter?: AxiosAdapter;
}

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded;charset=UTF-8';

export function createHttpClient(options: HttpOptions, baseURL?: string): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: options.timeoutMs,
    adapter: options.adapter,
    // Bodies are kept as text; callers decide how to parse them.
    responseType: 'text',
    headers: {
      'User-Agent': 'zoho-daily-log',
    },
  });
}

export function bodyToString(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}

export function toHttpFailure(error: unknown): HttpFailure | undefined {
  if (axios.isAxiosError(error) && error.response) {
    return {
      status: error.response.status,
      statusText: error.response.statusText,
      body: bodyToString(error.response.data),
    };
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
