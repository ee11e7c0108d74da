import { vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';

/**
 * Stand-in for the axios instance the clients talk through
 */
export function createFakeHttp() {
  const get = vi.fn();
  const post = vi.fn();
  const patch = vi.fn();
  return { http: { get, post, patch }, get, post, patch };
}

export function timeoutError(): AxiosError {
  return new AxiosError('timeout of 100ms exceeded', 'ECONNABORTED');
}

export function connectionError(): AxiosError {
  return new AxiosError('connect ECONNREFUSED 127.0.0.1:11434', 'ECONNREFUSED');
}

export function httpError(status: number, data: unknown = ''): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', undefined, undefined, {
    data,
    status,
    statusText: '',
    headers: {},
    config: { headers: new AxiosHeaders() },
  });
}
