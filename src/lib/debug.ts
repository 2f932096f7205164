/**
 * Debug channel for one client instance. Only presence and lengths of tokens
 * are ever passed in here.
 */
export type DebugLog = {
  readonly enabled: boolean;
  log(channel: string, event: string, data?: Record<string, unknown>): void;
  auth(event: string, data?: Record<string, unknown>): void;
};

export function createDebugLog(enabled: boolean): DebugLog {
  const log = (channel: string, event: string, data: Record<string, unknown> = {}): void => {
    if (!enabled) return;
    // eslint-disable-next-line no-console
    console.info(`[${channel}]`, event, { ...data, ts: new Date().toISOString() });
  };
  return {
    enabled,
    log,
    auth: (event, data) => log('AUTH', event, data),
  };
}

export const silentDebugLog: DebugLog = createDebugLog(false);
