/**
 * Registry HTTP Transport
 * Layer: Infrastructure
 *
 * One shared axios instance per process, pointed at the registry base URL.
 * It holds no per-request state, so concurrent lookups reuse it freely.
 * No retry or caching interceptors: every call is a single attempt.
 *
 * Consumers depend on `HttpClient` (just `get`) rather than the whole
 * AxiosInstance, which keeps the test doubles small.
 */
import axios, { type AxiosInstance } from 'axios';
import { config } from '@core/config';

export type HttpClient = Pick<AxiosInstance, 'get'>;

export function createHttpClient(): AxiosInstance {
  return axios.create({
    baseURL: config.registry.baseUrl,
    timeout: config.registry.timeoutMs,
    headers: {
      Accept: 'application/json',
    },
  });
}
