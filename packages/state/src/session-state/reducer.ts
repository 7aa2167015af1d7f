/**
 * Session State Reducer
 *
 * A shared, immutable reducer that folds bridge events into session state.
 *
 * Key events:
 * - token / set_text - Stream into the current assistant message
 * - turn_complete / tool_activity - Cross a turn boundary
 * - permission_request - Present (or queue) a permission prompt
 * - result / error - End the in-flight request
 *
 * Returns new state objects (never mutates).
 */

import type { BridgeEvent, BridgeEventType } from '@tether/shared-types';
import { defaultReducerContext, type ReducerContext } from '../utils.js';
import { isInFlight, type SessionState } from './types.js';
import { handleSetText, handleToken, handleTurnComplete } from './handlers/stream-handlers.js';
import { handleToolActivity } from './handlers/tool-handlers.js';
import { handlePermissionRequest } from './handlers/permission-handlers.js';
import { handleError, handleResult } from './handlers/lifecycle-handlers.js';

/**
 * Events that belong to a turn. They are dropped while idle, since they can
 * only come from a request that was already cancelled.
 */
const TURN_CONTENT_EVENTS: ReadonlySet<BridgeEventType> = new Set<BridgeEventType>([
  'token',
  'set_text',
  'turn_complete',
  'tool_activity',
  'permission_request',
]);

/**
 * Reduce a bridge event into new session state.
 *
 * @example
 * ```typescript
 * import { reduceBridgeEvent, createInitialSessionState } from '@tether/state';
 *
 * let state = createInitialSessionState();
 * for (const event of events) {
 *   state = reduceBridgeEvent(state, event);
 * }
 * ```
 */
export function reduceBridgeEvent(
  state: SessionState,
  event: BridgeEvent,
  ctx: ReducerContext = defaultReducerContext
): SessionState {
  if (!isInFlight(state) && TURN_CONTENT_EVENTS.has(event.type)) {
    return state;
  }

  switch (event.type) {
    case 'token':
      return handleToken(state, event, ctx);

    case 'set_text':
      return handleSetText(state, event, ctx);

    case 'turn_complete':
      return handleTurnComplete(state);

    case 'tool_activity':
      return handleToolActivity(state, event, ctx);

    case 'permission_request':
      return handlePermissionRequest(state, event);

    case 'result':
      return handleResult(state, event);

    case 'error':
      return handleError(state, event, ctx);

    // ready, debug and the reserved tool events don't affect session state
    default:
      return state;
  }
}

/**
 * Check if an event changes persisted data (transcript, tasks, accounting)
 */
export function isDataEvent(event: BridgeEvent): boolean {
  return event.type === 'tool_activity' || event.type === 'result';
}
