/**
 * WasteTrack client
 *
 * `createWasteTrackClient()` wires one independent client instance: its own
 * credential store, dispatcher, session controller and waste record service.
 * Nothing here is a process-wide singleton, so several clients can live side
 * by side (one per account, or one per test).
 */

import type { AxiosAdapter } from 'axios';
import { loadClientConfig, type ClientConfig } from './config';
import { createHttpClient } from './lib/api/client';
import { RequestDispatcher } from './lib/api/dispatcher';
import { checkBackendHealth } from './lib/api/health';
import { CredentialStore } from './lib/auth/credentialStore';
import { createDebugLog } from './lib/debug';
import { JsonFileStorage, MemoryStorage, type KeyValueStorage } from './lib/storage';
import { IdentityCache } from './services/auth/identityCache';
import { SessionControllerImpl, type SessionNotifier } from './services/session';
import { WasteRecordService } from './services/wasteRecords';
import type { CategoryLookup } from './state/categories';

export type WasteTrackClientOptions = {
  /** Explicit settings; they win over the environment */
  config?: Partial<ClientConfig>;
  env?: Record<string, string | undefined>;
  /** Durable storage; defaults to a JSON file when `storageFile` is given, memory otherwise */
  storage?: KeyValueStorage;
  storageFile?: string;
  adapter?: AxiosAdapter;
  notifier?: SessionNotifier;
  categories?: CategoryLookup;
};

export type WasteTrackClient = {
  config: ClientConfig;
  credentials: CredentialStore;
  dispatcher: RequestDispatcher;
  session: SessionControllerImpl;
  waste: WasteRecordService;
  checkHealth(signal?: AbortSignal): Promise<boolean>;
  init(): Promise<void>;
  teardown(): void;
};

export function createWasteTrackClient(options: WasteTrackClientOptions = {}): WasteTrackClient {
  const config = loadClientConfig(options.env ?? process.env, options.config);
  const debug = createDebugLog(config.authDebug);

  const storage =
    options.storage ?? (options.storageFile ? new JsonFileStorage(options.storageFile) : new MemoryStorage());
  const credentials = new CredentialStore(storage, config.storagePrefix, debug);
  const http = createHttpClient(config, { adapter: options.adapter, debug });
  const dispatcher = new RequestDispatcher(http, credentials, debug);
  const session = new SessionControllerImpl({
    dispatcher,
    credentials,
    identityCache: new IdentityCache(storage, config.storagePrefix),
    notifier: options.notifier,
    debug,
  });
  const waste = new WasteRecordService(dispatcher, session, options.categories);

  return {
    config,
    credentials,
    dispatcher,
    session,
    waste,
    checkHealth: (signal) => checkBackendHealth(dispatcher, signal),
    init: () => session.init(),
    teardown: () => session.teardown(),
  };
}

export { loadClientConfig, type ClientConfig } from './config';
export { createHttpClient } from './lib/api/client';
export { RequestDispatcher, type DispatchRequest } from './lib/api/dispatcher';
export { checkBackendHealth } from './lib/api/health';
export { API_ROUTES } from './lib/api/routes';
export {
  USER_ROLES,
  USER_STATUSES,
  isAdmin,
  type LoginResult,
  type Paginated,
  type PasswordResetConfirmation,
  type ProfileUpdate,
  type RegisterData,
  type TokenCheck,
  type TokenPair,
  type UserIdentity,
  type UserRole,
  type UserStatus,
  type WasteImage,
} from './lib/api/types';
export { CredentialStore } from './lib/auth/credentialStore';
export type { Credential, SessionHooks } from './lib/auth/types';
export { createDebugLog, silentDebugLog, type DebugLog } from './lib/debug';
export {
  AlreadyValidatedError,
  ApiError,
  ERROR_MESSAGES,
  InvalidTransitionError,
  WasteTrackError,
  isUnauthorized,
  toApiError,
  type ErrorKind,
} from './lib/errors';
export { JsonFileStorage, MemoryStorage, type KeyValueStorage } from './lib/storage';
export {
  SessionControllerImpl,
  createEmitterNotifier,
  noopNotifier,
  type SessionController,
  type SessionEvent,
  type SessionNotifier,
  type SessionState,
} from './services/session';
export { WasteRecordService, type WasteListFilters, type ProcessRequest } from './services/wasteRecords';
export { summarizeWastePeriod, type StatisticsPeriod, type WastePeriodSummary } from './services/statistics';
export { createCategoryLookup, getCategory, listCategories, type CategoryLookup } from './state/categories';
export { computeScore, DEFAULT_ENVIRONMENTAL_MULTIPLIER, type WasteScore } from './state/scoring';
export * from './state/wasteLifecycle';
export * from './state/types';
