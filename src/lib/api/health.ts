import type { RequestDispatcher } from './dispatcher';
import { API_ROUTES } from './routes';
import { toApiError } from '../errors';

/** Anonymous reachability probe; never throws */
export async function checkBackendHealth(dispatcher: RequestDispatcher, signal?: AbortSignal): Promise<boolean> {
  try {
    await dispatcher.execute({ url: API_ROUTES.HEALTH, anonymous: true, skipRenewal: true, signal });
    return true;
  } catch (error) {
    const failure = toApiError(error);
    console.warn('API Health check failed', { kind: failure.kind, status: failure.status });
    return false;
  }
}
