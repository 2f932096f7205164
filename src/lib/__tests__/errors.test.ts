import { AxiosError, AxiosHeaders } from 'axios';
import {
  AlreadyValidatedError,
  ApiError,
  InvalidTransitionError,
  WasteTrackError,
  classifyStatus,
  isUnauthorized,
  toApiError,
} from '@/lib/errors';

function axiosFailure(status: number, data: unknown = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError('Request failed', AxiosError.ERR_BAD_REQUEST, config, undefined, {
    data,
    status,
    statusText: '',
    headers: {},
    config,
  });
}

describe('classifyStatus', () => {
  it.each<[number, string]>([
    [400, 'validation_error'],
    [409, 'validation_error'],
    [422, 'validation_error'],
    [401, 'unauthorized'],
    [403, 'forbidden'],
    [404, 'not_found'],
    [500, 'server_error'],
    [503, 'server_error'],
    [418, 'unknown'],
    [429, 'unknown'],
  ])('maps %d to %s', (status, kind) => {
    expect(classifyStatus(status)).toBe(kind);
  });
});

describe('toApiError', () => {
  it('passes WasteTrackErrors through untouched', () => {
    const err = new InvalidTransitionError('pending', 'recycled');
    expect(toApiError(err)).toBe(err);
  });

  it('prefers the server detail message', () => {
    const err = toApiError(axiosFailure(422, { detail: 'Quantity must be positive' }));
    expect(err).toBeInstanceOf(ApiError);
    expect(err.kind).toBe('validation_error');
    expect(err.status).toBe(422);
    expect(err.message).toBe('Quantity must be positive');
  });

  it('falls back to the message field, then the canonical text', () => {
    expect(toApiError(axiosFailure(404, { message: 'No such record' })).message).toBe('No such record');
    expect(toApiError(axiosFailure(500, {})).message).toBe('Server error, please try again');
  });

  it('always uses the canonical message for 401', () => {
    const err = toApiError(axiosFailure(401, { detail: 'Token expired' }));
    expect(err.kind).toBe('unauthorized');
    expect(err.message).toBe('Session expired, please sign in again');
    expect(isUnauthorized(err)).toBe(true);
  });

  it('treats a missing response as a network error', () => {
    const err = toApiError(new AxiosError('Network Error', AxiosError.ERR_NETWORK));
    expect(err.kind).toBe('network_error');
    expect(err.status).toBeNull();
  });

  it('reports cancellation as unknown', () => {
    const err = toApiError(new AxiosError('canceled', AxiosError.ERR_CANCELED));
    expect(err.kind).toBe('unknown');
    expect(err.message).toBe('Request cancelled');
  });

  it('wraps arbitrary throwables', () => {
    const err = toApiError(new Error('boom'));
    expect(err.kind).toBe('unknown');
    expect(err.message).toBe('boom');
    expect(err.cause).toBeInstanceOf(Error);
  });
});

describe('domain errors', () => {
  it('names both ends of an invalid transition', () => {
    const err = new InvalidTransitionError('recycled', 'collected');
    expect(err.kind).toBe('invalid_transition');
    expect(err.current).toBe('recycled');
    expect(err.requested).toBe('collected');
    expect(err.message).toBe("Cannot move waste record from 'recycled' to 'collected'");
  });

  it('describes a refused action', () => {
    expect(new InvalidTransitionError('collected', 'pending', 'edit').message).toBe(
      "Cannot edit a waste record in 'collected' status",
    );
  });

  it('carries the validator', () => {
    const err = new AlreadyValidatedError('rec-1', 'admin-1');
    expect(err).toBeInstanceOf(WasteTrackError);
    expect(err.kind).toBe('already_validated');
    expect(err.validatedBy).toBe('admin-1');
    expect(isUnauthorized(err)).toBe(false);
  });
});
