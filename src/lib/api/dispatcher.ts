/**
 * Request Dispatcher
 *
 * Sends requests with the current access token and recovers from a 401 by
 * renewing the session once and replaying the request once. Renewal is
 * single-flight: however many requests hit a 401 together, the session hooks
 * see one renewSession() call and every waiter shares its outcome.
 */

import type { AxiosInstance, AxiosResponse, Method } from 'axios';
import type { CredentialStore } from '../auth/credentialStore';
import type { Credential, SessionHooks } from '../auth/types';
import { silentDebugLog, type DebugLog } from '../debug';
import { ApiError, toApiError, type WasteTrackError } from '../errors';

export type DispatchRequest = {
  method?: Method;
  url: string;
  data?: unknown;
  params?: Record<string, string | number | boolean | undefined>;
  headers?: Record<string, string>;
  /** Send without attaching the access token */
  anonymous?: boolean;
  /** Surface a 401 as-is instead of renewing; used by the auth endpoints */
  skipRenewal?: boolean;
  signal?: AbortSignal;
};

/** A running renewal and the refresh token it was started with */
type RenewalLatch = {
  promise: Promise<Credential>;
  refreshToken: string | null;
};

export class RequestDispatcher {
  private renewalInFlight: RenewalLatch | null = null;
  private hooks: SessionHooks | null = null;
  private renewalCount = 0;

  constructor(
    private readonly http: AxiosInstance,
    private readonly credentials: CredentialStore,
    private readonly debug: DebugLog = silentDebugLog,
  ) {}

  /**
   * Wire the session layer in. Returns a detach function.
   */
  attachSession(hooks: SessionHooks): () => void {
    this.hooks = hooks;
    return () => {
      if (this.hooks === hooks) this.hooks = null;
    };
  }

  isRenewing(): boolean {
    return this.renewalInFlight !== null;
  }

  /** Number of renewals actually started (joins excluded) */
  getRenewalCount(): number {
    return this.renewalCount;
  }

  async execute<T = unknown>(request: DispatchRequest): Promise<AxiosResponse<T>> {
    const sentWith = request.anonymous ? null : this.credentials.get();
    try {
      return await this.send<T>(request, sentWith?.accessToken ?? null);
    } catch (error) {
      const failure = toApiError(error);
      if (failure.kind !== 'unauthorized' || request.anonymous || request.skipRenewal) {
        throw failure;
      }
      return this.recoverFromUnauthorized<T>(request, sentWith, failure);
    }
  }

  /** execute() and hand back only the response body */
  async requestData<T = unknown>(request: DispatchRequest): Promise<T> {
    const res = await this.execute<T>(request);
    return res.data;
  }

  /**
   * Start a renewal, or join the one already running for the same refresh
   * token. A renewal left over from an ended session is never joined.
   */
  renew(): Promise<Credential> {
    const refreshToken = this.credentials.get()?.refreshToken ?? null;
    if (this.renewalInFlight?.refreshToken === refreshToken) {
      this.debug.auth('RENEWAL join');
      return this.renewalInFlight.promise;
    }

    const hooks = this.hooks;
    if (!hooks) {
      return Promise.reject(new ApiError('unauthorized', 'No session attached to renew credentials'));
    }

    this.renewalCount++;
    this.debug.auth('RENEWAL start', { count: this.renewalCount });
    const inFlight: RenewalLatch = {
      refreshToken,
      promise: hooks.renewSession().finally(() => {
        if (this.renewalInFlight === inFlight) this.renewalInFlight = null;
      }),
    };
    this.renewalInFlight = inFlight;
    return inFlight.promise;
  }

  private async recoverFromUnauthorized<T>(
    request: DispatchRequest,
    sentWith: Credential | null,
    failure: WasteTrackError,
  ): Promise<AxiosResponse<T>> {
    const current = this.credentials.get();
    if (!current || !this.hooks) {
      this.debug.auth('DISPATCH 401 without refresh token', { url: request.url });
      throw failure;
    }

    // The pair was rotated while this request was out: replay with it, no renewal needed
    const credential = current.accessToken !== sentWith?.accessToken ? current : await this.renew();

    try {
      return await this.send<T>(request, credential.accessToken);
    } catch (error) {
      const retryFailure = toApiError(error);
      if (retryFailure.kind === 'unauthorized') {
        console.warn('AUTH Dispatcher: replay rejected after renewal, ending session', { url: request.url });
        await this.hooks?.expireSession('replay_unauthorized');
      }
      throw retryFailure;
    }
  }

  private send<T>(request: DispatchRequest, accessToken: string | null): Promise<AxiosResponse<T>> {
    const headers: Record<string, string> = { ...(request.headers ?? {}) };
    if (accessToken && !request.anonymous) {
      headers.Authorization = `Bearer ${accessToken}`;
    }
    return this.http.request<T>({
      method: request.method ?? 'GET',
      url: request.url,
      data: request.data,
      params: request.params,
      headers,
      signal: request.signal,
    });
  }
}
