import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { ClientConfig } from '../../config';
import { silentDebugLog, type DebugLog } from '../debug';

export type HttpClientOptions = {
  /** Replaces the network transport; tests use this to answer in-process */
  adapter?: AxiosAdapter;
  debug?: DebugLog;
};

export function createHttpClient(
  config: Pick<ClientConfig, 'apiBaseUrl' | 'timeoutMs'>,
  opts: HttpClientOptions = {},
): AxiosInstance {
  const api = axios.create({
    baseURL: config.apiBaseUrl,
    timeout: config.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    ...(opts.adapter ? { adapter: opts.adapter } : {}),
  });
  const debug = opts.debug ?? silentDebugLog;

  api.interceptors.request.use((req) => {
    debug.log('API', 'request', {
      method: (req.method ?? 'get').toUpperCase(),
      url: req.url,
      hasAuthHeader: Boolean(req.headers.Authorization),
    });
    return req;
  });

  api.interceptors.response.use(
    (res) => {
      debug.log('API', 'response', { status: res.status, url: res.config.url });
      return res;
    },
    (err: unknown) => {
      if (axios.isAxiosError(err)) {
        debug.log('API', 'error', { status: err.response?.status ?? null, code: err.code ?? null, url: err.config?.url });
      }
      return Promise.reject(err);
    },
  );

  return api;
}
