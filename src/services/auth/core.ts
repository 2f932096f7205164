/**
 * Core session controller implementation
 *
 * The only writer of the credential store. Login, logout and renewal all go
 * through here; the dispatcher calls back in (through SessionHooks) when a
 * request needs fresh credentials or the session has to end.
 */

import type { RequestDispatcher } from '../../lib/api/dispatcher';
import { API_ROUTES } from '../../lib/api/routes';
import {
  parseLoginResponse,
  parseMessage,
  parseTokenCheck,
  parseTokenPair,
  parseUser,
  toPasswordResetConfirmBody,
  toPasswordResetRequestBody,
  toProfileUpdateBody,
  toRegisterBody,
  type TokenPair,
} from '../../lib/api/types';
import type { CredentialStore } from '../../lib/auth/credentialStore';
import { silentDebugLog, type DebugLog } from '../../lib/debug';
import { ApiError, toApiError, WasteTrackError } from '../../lib/errors';
import { noopNotifier, SessionEventDispatcher, type SessionNotifier } from './events';
import type { IdentityCache } from './identityCache';
import type {
  Credential,
  PasswordResetConfirmation,
  ProfileUpdate,
  RegisterData,
  SessionController,
  SessionState,
  TokenCheck,
  UserIdentity,
} from './types';

export type SessionControllerDeps = {
  dispatcher: RequestDispatcher;
  credentials: CredentialStore;
  identityCache: IdentityCache;
  notifier?: SessionNotifier;
  now?: () => number;
  debug?: DebugLog;
};

function initialState(): SessionState {
  return {
    isAuthenticated: false,
    user: null,
    source: 'missing',
    error: null,
    lastChecked: 0,
    version: 1,
  };
}

export class SessionControllerImpl implements SessionController {
  private state: SessionState = initialState();
  private subscribers: Set<(state: SessionState) => void> = new Set();
  private initialized = false;
  private validation: Promise<void> = Promise.resolve();
  private detach: (() => void) | null = null;

  private readonly dispatcher: RequestDispatcher;
  private readonly credentials: CredentialStore;
  private readonly identityCache: IdentityCache;
  private readonly eventDispatcher: SessionEventDispatcher;
  private readonly now: () => number;
  private readonly debug: DebugLog;

  constructor(deps: SessionControllerDeps) {
    this.dispatcher = deps.dispatcher;
    this.credentials = deps.credentials;
    this.identityCache = deps.identityCache;
    this.now = deps.now ?? Date.now;
    this.debug = deps.debug ?? silentDebugLog;
    this.eventDispatcher = new SessionEventDispatcher(deps.notifier ?? noopNotifier, this.now);

    this.attachHooks();
  }

  getState(): SessionState {
    return { ...this.state };
  }

  getCachedIdentity(): UserIdentity | null {
    return this.identityCache.get();
  }

  subscribe(callback: (state: SessionState) => void): () => void {
    this.subscribers.add(callback);
    return () => {
      this.subscribers.delete(callback);
    };
  }

  isAuthenticated(): boolean {
    return this.credentials.isAuthenticated();
  }

  /** A failed login leaves the session exactly as it was */
  async login(email: string, password: string): Promise<UserIdentity> {
    try {
      const res = await this.dispatcher.execute({
        method: 'POST',
        url: API_ROUTES.AUTH.LOGIN,
        data: { email, password },
        anonymous: true,
        skipRenewal: true,
      });
      const result = parseLoginResponse(res.data);

      this.credentials.set(this.toCredential(result));
      this.identityCache.set(result.user);
      this.setState({
        isAuthenticated: true,
        user: result.user,
        source: 'login',
        error: null,
        lastChecked: this.now(),
      });
      console.info('AUTH Session: Signed in', { userId: result.user.id, role: result.user.role });
      return result.user;
    } catch (error) {
      const failure = toApiError(error);
      console.warn('AUTH Session: Login failed', { kind: failure.kind, status: failure.status });
      throw failure;
    }
  }

  /** Best-effort remote logout, then local cleanup. Never rejects on remote failure. */
  async logout(): Promise<void> {
    if (this.credentials.isAuthenticated()) {
      try {
        await this.dispatcher.execute({ method: 'POST', url: API_ROUTES.AUTH.LOGOUT, skipRenewal: true });
      } catch (error) {
        const failure = toApiError(error);
        console.warn('AUTH Session: Remote logout failed, clearing local session anyway', {
          kind: failure.kind,
          status: failure.status,
        });
      }
    }
    this.clearLocal(null);
    console.info('AUTH Session: Signed out');
  }

  refresh(): Promise<Credential> {
    return this.dispatcher.renew();
  }

  async currentUser(): Promise<UserIdentity | null> {
    if (!this.credentials.isAuthenticated()) return null;

    const epoch = this.credentials.getEpoch();
    try {
      const res = await this.dispatcher.execute({ url: API_ROUTES.AUTH.ME });
      const user = parseUser(res.data);
      // Signed out while the identity request was out
      if (this.credentials.getEpoch() !== epoch || !this.credentials.isAuthenticated()) return null;

      this.identityCache.set(user);
      this.setState({ isAuthenticated: true, user, source: 'remote', error: null, lastChecked: this.now() });
      return user;
    } catch (error) {
      const failure = toApiError(error);
      if (failure.kind !== 'unauthorized') throw failure;
      console.warn('AUTH Session: Identity check rejected, signing out');
      await this.logout();
      return null;
    }
  }

  async register(data: RegisterData): Promise<UserIdentity> {
    const res = await this.dispatcher.execute({
      method: 'POST',
      url: API_ROUTES.AUTH.REGISTER,
      data: toRegisterBody(data),
      anonymous: true,
      skipRenewal: true,
    });
    const user = parseUser(res.data);
    console.info('AUTH Session: Registered account', { userId: user.id });
    return user;
  }

  async updateProfile(update: ProfileUpdate): Promise<UserIdentity> {
    if (!this.credentials.isAuthenticated()) {
      throw new WasteTrackError('unauthorized', 'Sign in to update your profile');
    }
    const body = toProfileUpdateBody(update);
    const epoch = this.credentials.getEpoch();
    const res = await this.dispatcher.execute({ method: 'PUT', url: API_ROUTES.USERS.ME, data: body });
    const user = parseUser(res.data);

    if (this.credentials.getEpoch() === epoch && this.credentials.isAuthenticated()) {
      this.identityCache.set(user);
      this.setState({ user, source: 'remote', lastChecked: this.now() });
    }
    console.info('AUTH Session: Profile updated', { userId: user.id, fields: Object.keys(body) });
    return user;
  }

  /** null when signed out, or when the backend no longer accepts the session */
  async verifyToken(): Promise<TokenCheck | null> {
    if (!this.credentials.isAuthenticated()) return null;
    try {
      const res = await this.dispatcher.execute({ url: API_ROUTES.AUTH.VERIFY_TOKEN });
      return parseTokenCheck(res.data);
    } catch (error) {
      const failure = toApiError(error);
      if (failure.kind === 'unauthorized') return null;
      throw failure;
    }
  }

  async requestPasswordReset(email: string): Promise<string> {
    const res = await this.dispatcher.execute({
      method: 'POST',
      url: API_ROUTES.AUTH.PASSWORD_RESET,
      data: toPasswordResetRequestBody(email),
      anonymous: true,
      skipRenewal: true,
    });
    return parseMessage(res.data);
  }

  async confirmPasswordReset(data: PasswordResetConfirmation): Promise<string> {
    const res = await this.dispatcher.execute({
      method: 'POST',
      url: API_ROUTES.AUTH.PASSWORD_RESET_CONFIRM,
      data: toPasswordResetConfirmBody(data),
      anonymous: true,
      skipRenewal: true,
    });
    return parseMessage(res.data);
  }

  /**
   * Restore the cached session without touching the network, then validate it
   * in the background. Resolves once the cached state is in place.
   */
  async init(): Promise<void> {
    this.attachHooks();
    if (this.initialized) return;
    this.initialized = true;

    if (!this.credentials.isAuthenticated()) {
      this.identityCache.clear();
      this.setState({ isAuthenticated: false, user: null, source: 'missing', lastChecked: this.now() });
      this.validation = Promise.resolve();
      return;
    }

    const cached = this.identityCache.load();
    this.setState({
      isAuthenticated: true,
      user: cached,
      source: cached ? 'cache' : 'missing',
      error: null,
      lastChecked: this.now(),
    });
    this.debug.auth('INIT restored', { hasCachedIdentity: cached !== null });
    this.validation = this.validateInBackground();
  }

  ready(): Promise<void> {
    return this.validation;
  }

  teardown(): void {
    console.info('AUTH Session: Cleaning up');
    this.detach?.();
    this.detach = null;
    this.subscribers.clear();
    this.identityCache.forget();
    this.state = initialState();
    this.initialized = false;
  }

  private attachHooks(): void {
    if (this.detach) return;
    this.detach = this.dispatcher.attachSession({
      renewSession: () => this.performRenewal(),
      expireSession: (reason) => {
        this.endSession(reason);
        return Promise.resolve();
      },
    });
  }

  private async validateInBackground(): Promise<void> {
    try {
      await this.currentUser();
    } catch (error) {
      const failure = toApiError(error);
      console.warn('AUTH Session: Startup validation failed, continuing signed out', { kind: failure.kind });
      await this.logout();
    }
  }

  /**
   * One remote renewal. The dispatcher makes sure only one runs at a time.
   * A result that arrives after the session it belongs to has ended is thrown
   * away, so a logout is never undone by a late renewal.
   */
  private async performRenewal(): Promise<Credential> {
    const credential = this.credentials.get();
    if (!credential) {
      throw new ApiError('unauthorized', 'No refresh token available');
    }
    const epoch = this.credentials.getEpoch();

    let pair: TokenPair;
    try {
      const res = await this.dispatcher.execute({
        method: 'POST',
        url: API_ROUTES.AUTH.REFRESH,
        headers: { Authorization: `Bearer ${credential.refreshToken}` },
        anonymous: true,
        skipRenewal: true,
      });
      pair = parseTokenPair(res.data);
    } catch (error) {
      const failure = toApiError(error);
      if (this.isSameSession(epoch, credential)) {
        console.warn('AUTH Session: Renewal failed, ending session', { kind: failure.kind, status: failure.status });
        this.endSession('renewal_failed');
      }
      if (failure.kind === 'unauthorized') throw failure;
      throw new ApiError('unauthorized', undefined, { status: failure.status, cause: failure });
    }

    if (!this.isSameSession(epoch, credential)) {
      this.debug.auth('RENEWAL discarded', { epochThen: epoch, epochNow: this.credentials.getEpoch() });
      throw new ApiError('unauthorized', 'Session ended while renewing credentials');
    }

    const next = this.toCredential(pair);
    this.credentials.set(next);
    this.setState({ error: null, lastChecked: this.now() });
    this.eventDispatcher.dispatchRenewed();
    console.info('AUTH Session: Credentials renewed');
    return next;
  }

  private isSameSession(epoch: number, credential: Credential): boolean {
    return this.credentials.getEpoch() === epoch && this.credentials.get()?.refreshToken === credential.refreshToken;
  }

  private toCredential(pair: TokenPair): Credential {
    return {
      accessToken: pair.accessToken,
      refreshToken: pair.refreshToken,
      expiresAt: pair.expiresIn !== null ? this.now() + pair.expiresIn * 1000 : null,
    };
  }

  private endSession(reason: string): void {
    if (!this.credentials.isAuthenticated() && !this.state.isAuthenticated) return;
    console.warn('AUTH Session: Session expired', { reason });
    this.clearLocal(reason);
    this.eventDispatcher.dispatchExpired(reason);
  }

  private clearLocal(reason: string | null): void {
    this.credentials.clear();
    this.identityCache.clear();
    this.setState({
      isAuthenticated: false,
      user: null,
      source: 'missing',
      error: reason,
      lastChecked: this.now(),
    });
  }

  private setState(updates: Partial<SessionState>): void {
    const prevState = this.state;
    const merged = { ...prevState, ...updates };
    if (JSON.stringify({ ...merged, lastChecked: 0 }) === JSON.stringify({ ...prevState, lastChecked: 0 })) {
      this.state = merged;
      return;
    }
    this.state = { ...merged, version: prevState.version + 1 };

    this.debug.auth('STATE update', {
      isAuthenticated: this.state.isAuthenticated,
      userId: this.state.user?.id ?? null,
      source: this.state.source,
      version: this.state.version,
    });

    this.eventDispatcher.dispatchStateEvents(prevState, this.state);

    this.subscribers.forEach((callback) => {
      try {
        callback(this.getState());
      } catch (error) {
        console.error('AUTH Session: subscriber error', error);
      }
    });
  }
}
