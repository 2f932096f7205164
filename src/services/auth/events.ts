/**
 * Session event handling and dispatching
 */

import type { EventEmitter } from 'node:events';
import type { SessionState } from './types';

export type SessionEvent =
  | { type: 'session:signed_in'; userId: string; source: SessionState['source']; timestamp: number }
  | { type: 'session:signed_out'; reason: string; timestamp: number }
  | { type: 'session:renewed'; timestamp: number }
  | { type: 'session:expired'; reason: string; timestamp: number };

export type SessionEventType = SessionEvent['type'];

/** Receives session lifecycle events; the client works the same without one */
export interface SessionNotifier {
  notify(event: SessionEvent): void;
}

export const noopNotifier: SessionNotifier = {
  notify() {
    /* no listeners */
  },
};

/** Re-emit every event on `emitter` under its type name */
export function createEmitterNotifier(emitter: EventEmitter): SessionNotifier {
  return {
    notify(event) {
      emitter.emit(event.type, event);
    },
  };
}

export class SessionEventDispatcher {
  constructor(
    private readonly notifier: SessionNotifier,
    private readonly now: () => number = Date.now,
  ) {}

  dispatchStateEvents(prevState: SessionState, newState: SessionState): void {
    if (!prevState.isAuthenticated && newState.isAuthenticated && newState.user) {
      console.info('AUTH Session: Dispatching session:signed_in event');
      this.emit({ type: 'session:signed_in', userId: newState.user.id, source: newState.source, timestamp: this.now() });
    }

    if (prevState.isAuthenticated && !newState.isAuthenticated) {
      console.info('AUTH Session: Dispatching session:signed_out event');
      this.emit({ type: 'session:signed_out', reason: newState.error ?? 'logout', timestamp: this.now() });
    }
  }

  dispatchRenewed(): void {
    this.emit({ type: 'session:renewed', timestamp: this.now() });
  }

  dispatchExpired(reason: string): void {
    this.emit({ type: 'session:expired', reason, timestamp: this.now() });
  }

  private emit(event: SessionEvent): void {
    try {
      this.notifier.notify(event);
    } catch (error) {
      console.warn(`AUTH Session: Failed to dispatch ${event.type} event`, error);
    }
  }
}
