import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { UpstreamOptions } from '../config/dashboard.config';

export const BUILDER_HTTP_CLIENT = Symbol('BUILDER_HTTP_CLIENT');

// Status handling lives in BuilderTradesClient, so axios never rejects on status.
export function createBuilderHttpClient(
  options: Pick<UpstreamOptions, 'host' | 'timeoutMs'>,
  adapter?: AxiosAdapter,
): AxiosInstance {
  return axios.create({
    baseURL: options.host,
    timeout: options.timeoutMs,
    headers: { Accept: 'application/json' },
    validateStatus: () => true,
    ...(adapter ? { adapter } : {}),
  });
}
