import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EventEmitter } from 'node:events';
import { createEmitterNotifier, createWasteTrackClient, type SessionEvent } from '@/index';
import { MemoryStorage } from '@/lib/storage';
import { StubBackend, TEST_USER_WIRE, deferred, tokenWire } from '@/test_stubs/stubBackend';

describe('createWasteTrackClient', () => {
  let backend: StubBackend;

  beforeEach(() => {
    backend = new StubBackend();
    backend.on('POST', '/auth/login', { status: 200, data: { ...tokenWire(1), user: TEST_USER_WIRE } });
    jest.spyOn(console, 'info').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('builds its base URL from the environment', () => {
    const client = createWasteTrackClient({ env: { WASTETRACK_API_ORIGIN: 'https://waste.example.test' }, adapter: backend.adapter });
    expect(client.config.apiBaseUrl).toBe('https://waste.example.test/api/v1');
  });

  it('keeps separate instances independent', async () => {
    const a = createWasteTrackClient({ env: {}, storage: new MemoryStorage(), adapter: backend.adapter });
    const b = createWasteTrackClient({ env: {}, storage: new MemoryStorage(), adapter: backend.adapter });

    await a.session.login('ada@example.com', 'test-secret');

    expect(a.session.isAuthenticated()).toBe(true);
    expect(b.session.isAuthenticated()).toBe(false);
  });

  it('restores a session from its storage file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'wastetrack-client-'));
    try {
      const file = join(dir, 'session.json');
      const first = createWasteTrackClient({ env: {}, storageFile: file, adapter: backend.adapter });
      await first.session.login('ada@example.com', 'test-secret');
      first.teardown();

      const gate = deferred<void>();
      backend.on('GET', '/auth/me', async () => {
        await gate.promise;
        return { status: 200, data: TEST_USER_WIRE };
      });
      const second = createWasteTrackClient({ env: {}, storageFile: file, adapter: backend.adapter });
      await second.init();
      expect(second.session.getState()).toMatchObject({ isAuthenticated: true, source: 'cache' });
      gate.resolve();
      await second.session.ready();
      expect(second.session.getState().source).toBe('remote');
      expect(backend.callsTo('GET', '/auth/me')[0]?.authorization).toBe('Bearer access-1');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports backend health', async () => {
    const client = createWasteTrackClient({ env: {}, adapter: backend.adapter });
    backend.on('GET', '/health', { status: 200, data: { status: 'healthy' } });
    await expect(client.checkHealth()).resolves.toBe(true);

    backend.on('GET', '/health', { status: 503 });
    await expect(client.checkHealth()).resolves.toBe(false);
    expect(console.warn).toHaveBeenCalledWith('API Health check failed', { kind: 'server_error', status: 503 });
  });

  it('emits session events through an EventEmitter', async () => {
    const emitter = new EventEmitter();
    const seen: SessionEvent[] = [];
    emitter.on('session:signed_in', (e: SessionEvent) => seen.push(e));
    const client = createWasteTrackClient({
      env: {},
      adapter: backend.adapter,
      notifier: createEmitterNotifier(emitter),
    });

    await client.session.login('ada@example.com', 'test-secret');

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ type: 'session:signed_in', userId: 'user-1', source: 'login' });
  });

  it('logs auth debug lines when enabled, without tokens', async () => {
    const client = createWasteTrackClient({ env: { WASTETRACK_AUTH_DEBUG: '1' }, adapter: backend.adapter });
    await client.session.login('ada@example.com', 'test-secret');

    const info = jest.mocked(console.info);
    expect(info).toHaveBeenCalledWith('[AUTH]', 'TOKENS set', expect.objectContaining({ accessTokenLength: 8 }));
    expect(JSON.stringify(info.mock.calls)).not.toContain('access-1');
  });

  it('keeps auth debug logging to the client that asked for it', async () => {
    createWasteTrackClient({ env: { WASTETRACK_AUTH_DEBUG: '1' }, adapter: backend.adapter });
    const quiet = createWasteTrackClient({ env: {}, adapter: backend.adapter });

    await quiet.session.login('ada@example.com', 'test-secret');

    const debugLines = jest.mocked(console.info).mock.calls.filter(([tag]) => tag === '[AUTH]' || tag === '[API]');
    expect(debugLines).toEqual([]);
  });
});
