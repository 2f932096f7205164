/**
 * Client configuration
 *
 * Values come from WASTETRACK_* environment variables and can be overridden
 * per client instance. Explicit options always win over the environment.
 */

export type ClientConfig = {
  apiOrigin: string;
  apiVersion: string;
  /** Full base URL every route is resolved against, e.g. http://localhost:8000/api/v1 */
  apiBaseUrl: string;
  timeoutMs: number;
  storagePrefix: string;
  authDebug: boolean;
};

type Env = Record<string, string | undefined>;

const DEFAULT_API_ORIGIN = 'http://localhost:8000';
const DEFAULT_API_VERSION = 'v1';
const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_STORAGE_PREFIX = 'wastetrack';

function flag(env: Env, name: string, fallback = false): boolean {
  const v = env[`WASTETRACK_${name}`];
  if (!v) return fallback;
  const s = String(v).toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'on';
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadClientConfig(env: Env = process.env, overrides: Partial<ClientConfig> = {}): ClientConfig {
  const apiOrigin = (overrides.apiOrigin ?? env.WASTETRACK_API_ORIGIN ?? DEFAULT_API_ORIGIN).replace(/\/+$/, '');
  const apiVersion = overrides.apiVersion ?? env.WASTETRACK_API_VERSION ?? DEFAULT_API_VERSION;

  return {
    apiOrigin,
    apiVersion,
    apiBaseUrl: overrides.apiBaseUrl ?? `${apiOrigin}/api/${apiVersion}`,
    timeoutMs: overrides.timeoutMs ?? positiveInt(env.WASTETRACK_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    storagePrefix: overrides.storagePrefix ?? env.WASTETRACK_STORAGE_PREFIX ?? DEFAULT_STORAGE_PREFIX,
    authDebug: overrides.authDebug ?? flag(env, 'AUTH_DEBUG'),
  };
}
