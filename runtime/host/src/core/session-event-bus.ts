/**
 * Session Event Bus - Per-session typed event emitter
 *
 * Each AgentSession owns its own SessionEventBus instance.
 *
 * Subscribers:
 * - Rendering: follows `state:changed` and reads the transcript
 * - Persistence: takes a snapshot on `data:changed`
 */

import { EventEmitter } from 'node:events';
import type { SessionState } from '@tether/state';

export type StateChangeCause =
  | 'send'
  | 'compact'
  | 'cancel'
  | 'permission'
  | 'event'
  | 'failure'
  | 'shutdown';

export interface SessionEventPayloads {
  /** The session state was replaced */
  'state:changed': { state: SessionState; cause: StateChangeCause };
  /** Transcript, tasks or accounting changed; a good time to persist */
  'data:changed': { sessionId: string };
  /** Diagnostics from the bridge */
  debug: { message: string };
}

export type SessionEventType = keyof SessionEventPayloads;

/**
 * Type-safe, per-session event bus
 *
 * Usage:
 * ```typescript
 * const eventBus = new SessionEventBus('session-123');
 *
 * eventBus.on('state:changed', ({ state }) => {
 *   render(state.messages);
 * });
 * ```
 */
export class SessionEventBus extends EventEmitter {
  /** The session this bus belongs to */
  readonly sessionId: string;

  constructor(sessionId: string) {
    super();
    this.sessionId = sessionId;
    this.setMaxListeners(20);
  }

  override emit<K extends SessionEventType>(eventType: K, payload: SessionEventPayloads[K]): boolean {
    return super.emit(eventType, payload);
  }

  override on<K extends SessionEventType>(
    eventType: K,
    listener: (payload: SessionEventPayloads[K]) => void
  ): this {
    return super.on(eventType, listener);
  }

  override once<K extends SessionEventType>(
    eventType: K,
    listener: (payload: SessionEventPayloads[K]) => void
  ): this {
    return super.once(eventType, listener);
  }

  override off<K extends SessionEventType>(
    eventType: K,
    listener: (payload: SessionEventPayloads[K]) => void
  ): this {
    return super.off(eventType, listener);
  }

  override removeAllListeners(eventType?: SessionEventType): this {
    return super.removeAllListeners(eventType);
  }

  /**
   * Destroy the event bus - removes all listeners
   */
  destroy(): void {
    this.removeAllListeners();
  }
}
