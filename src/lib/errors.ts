/**
 * Error taxonomy shared by the session layer and the waste record lifecycle
 */

import { isAxiosError } from 'axios';

export type ErrorKind =
  | 'network_error'
  | 'unauthorized'
  | 'forbidden'
  | 'validation_error'
  | 'not_found'
  | 'server_error'
  | 'invalid_transition'
  | 'already_validated'
  | 'unknown';

export const ERROR_MESSAGES: Record<ErrorKind, string> = {
  network_error: 'Network connection failed',
  unauthorized: 'Session expired, please sign in again',
  forbidden: 'You are not allowed to perform this action',
  validation_error: 'Invalid data',
  not_found: 'Resource not found',
  server_error: 'Server error, please try again',
  invalid_transition: 'Invalid status transition',
  already_validated: 'Record has already been validated',
  unknown: 'An unexpected error occurred',
};

export class WasteTrackError extends Error {
  readonly kind: ErrorKind;
  readonly status: number | null;
  readonly details: unknown;

  constructor(kind: ErrorKind, message?: string, opts: { status?: number | null; details?: unknown; cause?: unknown } = {}) {
    super(message ?? ERROR_MESSAGES[kind], opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'WasteTrackError';
    this.kind = kind;
    this.status = opts.status ?? null;
    this.details = opts.details;
  }
}

/** Failure of a remote call, classified by transport outcome and status code */
export class ApiError extends WasteTrackError {
  constructor(kind: ErrorKind, message?: string, opts: { status?: number | null; details?: unknown; cause?: unknown } = {}) {
    super(kind, message, opts);
    this.name = 'ApiError';
  }
}

export class InvalidTransitionError extends WasteTrackError {
  readonly current: string;
  readonly requested: string;
  readonly action: string | null;

  constructor(current: string, requested: string, action?: string) {
    super(
      'invalid_transition',
      action
        ? `Cannot ${action} a waste record in '${current}' status`
        : `Cannot move waste record from '${current}' to '${requested}'`,
    );
    this.name = 'InvalidTransitionError';
    this.current = current;
    this.requested = requested;
    this.action = action ?? null;
  }
}

export class AlreadyValidatedError extends WasteTrackError {
  readonly recordId: string;
  readonly validatedBy: string | null;

  constructor(recordId: string, validatedBy: string | null) {
    super('already_validated', `Waste record ${recordId} was already validated`);
    this.name = 'AlreadyValidatedError';
    this.recordId = recordId;
    this.validatedBy = validatedBy;
  }
}

export function classifyStatus(status: number): ErrorKind {
  if (status === 400 || status === 409 || status === 422) return 'validation_error';
  if (status === 401) return 'unauthorized';
  if (status === 403) return 'forbidden';
  if (status === 404) return 'not_found';
  if (status >= 500) return 'server_error';
  return 'unknown';
}

function serverMessage(data: unknown): string | null {
  if (!data || typeof data !== 'object') return null;
  for (const key of ['detail', 'message']) {
    const value: unknown = Reflect.get(data, key);
    if (typeof value === 'string' && value.trim().length > 0) return value;
  }
  return null;
}

/**
 * Convert anything thrown by the transport into an ApiError.
 * WasteTrackErrors pass through untouched.
 */
export function toApiError(error: unknown): WasteTrackError {
  if (error instanceof WasteTrackError) return error;

  if (isAxiosError(error)) {
    const res = error.response;
    if (res) {
      const kind = classifyStatus(res.status);
      // Auth failures always carry the canonical message; the rest prefer what the server said
      const message = kind === 'unauthorized' ? undefined : serverMessage(res.data) ?? undefined;
      return new ApiError(kind, message, { status: res.status, details: res.data, cause: error });
    }
    if (error.code === 'ERR_CANCELED') {
      return new ApiError('unknown', 'Request cancelled', { cause: error });
    }
    // Request went out (or timed out) and nothing came back
    return new ApiError('network_error', undefined, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ApiError('unknown', message || undefined, { cause: error });
}

export function isUnauthorized(error: unknown): boolean {
  return error instanceof WasteTrackError && error.kind === 'unauthorized';
}
