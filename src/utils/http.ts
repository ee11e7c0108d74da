/**
 * HTTP helpers shared by the model providers and the document store client
 */

import axios, { type AxiosInstance } from 'axios';

/**
 * The slice of an axios instance the clients use. Tests pass a plain object
 * with `vi.fn()` methods in its place.
 */
export type HttpClient = Pick<AxiosInstance, 'get' | 'post' | 'patch'>;

export interface HttpFailure {
  /** HTTP status, or 0 when no response arrived */
  statusCode: number;
  /** Timeouts, connection failures, 5xx and 429 are worth another attempt */
  retryable: boolean;
  message: string;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function createHttpClient(baseURL?: string, headers?: Record<string, string>): HttpClient {
  return axios.create({ baseURL, headers });
}

export function describeHttpFailure(error: unknown): HttpFailure {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;

    if (status === undefined) {
      const timedOut = error.code !== undefined && TIMEOUT_CODES.has(error.code);
      return {
        statusCode: 0,
        retryable: true,
        message: timedOut ? `Request timed out: ${error.message}` : `Connection failed: ${error.message}`,
      };
    }

    return {
      statusCode: status,
      retryable: status === 429 || status >= 500,
      message: `HTTP ${status}${summarizeBody(error.response?.data)}`,
    };
  }

  return {
    statusCode: 0,
    retryable: false,
    message: error instanceof Error ? error.message : String(error),
  };
}

function summarizeBody(data: unknown): string {
  if (data === undefined || data === null || data === '') {
    return '';
  }
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return `: ${text.substring(0, 200)}`;
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}
