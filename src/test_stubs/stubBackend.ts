/**
 * In-process stand-in for the backend, plugged in as the axios adapter.
 * Handlers are keyed by "METHOD /path" and may answer asynchronously so tests
 * can hold a response open.
 */

import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';

export type StubReply = { status: number; data?: unknown } | { networkError: true };

export type StubRequest = {
  method: string;
  url: string;
  authorization: string | null;
  body: unknown;
  params: Record<string, unknown>;
};

export type StubHandler = (req: StubRequest) => StubReply | Promise<StubReply>;

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Let every already-queued promise callback run */
export async function flushPromises(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((r) => setImmediate(r));
  }
}

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') return data;
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

function paramsOf(config: InternalAxiosRequestConfig): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const raw: unknown = config.params;
  if (raw && typeof raw === 'object') {
    for (const [k, v] of Object.entries(raw)) {
      if (v !== undefined) out[k] = v;
    }
  }
  return out;
}

export class StubBackend {
  readonly calls: StubRequest[] = [];
  private readonly handlers = new Map<string, StubHandler>();

  on(method: string, url: string, handler: StubHandler | StubReply): this {
    this.handlers.set(`${method.toUpperCase()} ${url}`, typeof handler === 'function' ? handler : () => handler);
    return this;
  }

  count(method: string, url: string): number {
    return this.calls.filter((c) => c.method === method.toUpperCase() && c.url === url).length;
  }

  callsTo(method: string, url: string): StubRequest[] {
    return this.calls.filter((c) => c.method === method.toUpperCase() && c.url === url);
  }

  readonly adapter: AxiosAdapter = async (config) => {
    const auth = config.headers.get('Authorization');
    const req: StubRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      authorization: typeof auth === 'string' ? auth : null,
      body: parseBody(config.data),
      params: paramsOf(config),
    };
    this.calls.push(req);

    const handler = this.handlers.get(`${req.method} ${req.url}`);
    const reply: StubReply = handler ? await handler(req) : { status: 404, data: { detail: 'Not Found' } };

    if ('networkError' in reply) {
      throw new AxiosError('Network Error', AxiosError.ERR_NETWORK, config);
    }

    const response: AxiosResponse = {
      data: reply.data ?? null,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 200 && reply.status < 300) return response;

    throw new AxiosError(
      `Request failed with status code ${reply.status}`,
      reply.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
      config,
      undefined,
      response,
    );
  };
}

export const TEST_USER_WIRE = {
  id: 'user-1',
  email: 'ada@example.com',
  username: 'ada',
  first_name: 'Ada',
  last_name: 'Lovelace',
  role: 'user',
  status: 'active',
  is_active: true,
  is_verified: true,
};

export const TEST_ADMIN_WIRE = {
  ...TEST_USER_WIRE,
  id: 'admin-1',
  email: 'admin@example.com',
  username: 'admin',
  first_name: 'Grace',
  last_name: 'Hopper',
  role: 'admin',
};

export function tokenWire(n: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    access_token: `access-${n}`,
    refresh_token: `refresh-${n}`,
    token_type: 'bearer',
    expires_in: 1800,
    ...extra,
  };
}

export function wasteRecordWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'rec-1',
    user_id: 'user-1',
    waste_type: 'plastic',
    description: null,
    quantity: 10,
    unit: 'kg',
    location: null,
    latitude: null,
    longitude: null,
    address: null,
    image_paths: [],
    status: 'pending',
    environmental_score: 0,
    points_awarded: 0,
    is_validated: false,
    validated_by: null,
    validation_date: null,
    validation_notes: null,
    processor_id: null,
    processing_notes: null,
    created_at: '2024-03-01T10:00:00.000Z',
    collection_date: null,
    processing_date: null,
    completion_date: null,
    updated_at: '2024-03-01T10:00:00.000Z',
    ...overrides,
  };
}
