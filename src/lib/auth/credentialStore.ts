/**
 * Credential Store
 *
 * Holds the access/refresh pair for one client instance and mirrors it to
 * durable storage. Both tokens are present together or not at all.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { silentDebugLog, type DebugLog } from '../debug';
import { WasteTrackError } from '../errors';
import type { KeyValueStorage } from '../storage';
import type { Credential } from './types';

type CredentialState = {
  credential: Credential | null;
  /** Bumped on every clear so late async work can tell the session it started under is gone */
  epoch: number;
};

export class CredentialStore {
  private readonly store: StoreApi<CredentialState>;
  private readonly keys: { access: string; refresh: string; expiresAt: string };

  constructor(
    private readonly storage: KeyValueStorage,
    prefix = 'wastetrack',
    private readonly debug: DebugLog = silentDebugLog,
  ) {
    this.keys = {
      access: `${prefix}:auth:access`,
      refresh: `${prefix}:auth:refresh`,
      expiresAt: `${prefix}:auth:expires_at`,
    };
    this.store = createStore<CredentialState>()(() => ({ credential: this.rehydrate(), epoch: 0 }));
  }

  get(): Credential | null {
    return this.store.getState().credential;
  }

  isAuthenticated(): boolean {
    return this.store.getState().credential !== null;
  }

  getEpoch(): number {
    return this.store.getState().epoch;
  }

  set(credential: Credential): void {
    if (!credential.accessToken || !credential.refreshToken) {
      throw new WasteTrackError('validation_error', 'A credential needs both an access and a refresh token');
    }
    const next: Credential = { ...credential };

    // Durable copy first: if the write fails the in-memory pair stays as it was
    this.storage.setItem(this.keys.access, next.accessToken);
    this.storage.setItem(this.keys.refresh, next.refreshToken);
    if (next.expiresAt !== null) {
      this.storage.setItem(this.keys.expiresAt, String(next.expiresAt));
    } else {
      this.storage.removeItem(this.keys.expiresAt);
    }

    this.store.setState({ credential: next });
    this.debug.auth('TOKENS set', {
      accessTokenLength: next.accessToken.length,
      refreshTokenLength: next.refreshToken.length,
      expiresAt: next.expiresAt,
    });
  }

  clear(): void {
    this.removeDurable();
    this.store.setState((s) => ({ credential: null, epoch: s.epoch + 1 }));
    this.debug.auth('TOKENS clear', { epoch: this.getEpoch() });
  }

  subscribe(listener: (credential: Credential | null) => void): () => void {
    return this.store.subscribe((state, prev) => {
      if (state.credential !== prev.credential) listener(state.credential);
    });
  }

  private removeDurable(): void {
    this.storage.removeItem(this.keys.access);
    this.storage.removeItem(this.keys.refresh);
    this.storage.removeItem(this.keys.expiresAt);
  }

  private rehydrate(): Credential | null {
    const accessToken = this.storage.getItem(this.keys.access);
    const refreshToken = this.storage.getItem(this.keys.refresh);

    if (!accessToken && !refreshToken) return null;
    if (!accessToken || !refreshToken) {
      console.warn('TOKENS rehydrate: discarding partial credential from storage', {
        hasAccessToken: Boolean(accessToken),
        hasRefreshToken: Boolean(refreshToken),
      });
      this.removeDurable();
      return null;
    }

    const rawExpiry = Number(this.storage.getItem(this.keys.expiresAt));
    return { accessToken, refreshToken, expiresAt: Number.isFinite(rawExpiry) && rawExpiry > 0 ? rawExpiry : null };
  }
}
