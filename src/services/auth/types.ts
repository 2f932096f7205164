/**
 * Type definitions for the session controller
 */

import type {
  LoginResult,
  PasswordResetConfirmation,
  ProfileUpdate,
  RegisterData,
  TokenCheck,
  UserIdentity,
} from '../../lib/api/types';
import type { Credential } from '../../lib/auth/types';

export interface SessionState {
  isAuthenticated: boolean;
  user: UserIdentity | null;
  /** Where `user` came from: a fresh login, the durable cache, or the identity endpoint */
  source: 'login' | 'cache' | 'remote' | 'missing';
  error: string | null;
  lastChecked: number;
  version: number;
}

export interface SessionController {
  // State
  getState(): SessionState;
  subscribe(callback: (state: SessionState) => void): () => void;
  isAuthenticated(): boolean;
  getCachedIdentity(): UserIdentity | null;

  // Actions
  login(email: string, password: string): Promise<UserIdentity>;
  logout(): Promise<void>;
  refresh(): Promise<Credential>;
  currentUser(): Promise<UserIdentity | null>;
  register(data: RegisterData): Promise<UserIdentity>;
  updateProfile(update: ProfileUpdate): Promise<UserIdentity>;
  verifyToken(): Promise<TokenCheck | null>;

  // Password reset (no session needed)
  requestPasswordReset(email: string): Promise<string>;
  confirmPasswordReset(data: PasswordResetConfirmation): Promise<string>;

  // Lifecycle
  init(): Promise<void>;
  ready(): Promise<void>;
  teardown(): void;
}

export type { Credential, LoginResult, PasswordResetConfirmation, ProfileUpdate, RegisterData, TokenCheck, UserIdentity };
