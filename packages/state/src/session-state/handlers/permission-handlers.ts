/**
 * Permission Handlers
 *
 * At most one request is pending at a time. A request that arrives while
 * another is pending is a sequencing violation on the bridge side; it is
 * queued behind the pending one rather than dropped, and the host flags it.
 */

import type { BridgeEventOf, PermissionRequest } from '@tether/shared-types';
import type { SessionState } from '../types.js';
import { flattenPermissionInput } from '../../permissions.js';

export function handlePermissionRequest(
  state: SessionState,
  event: BridgeEventOf<'permission_request'>
): SessionState {
  const request: PermissionRequest = {
    id: event.requestId,
    toolName: event.toolName,
    inputSummary: flattenPermissionInput(event.input),
  };
  if (event.reason) request.reason = event.reason;
  if (state.turnWorkingDirectory) request.workingDirectory = state.turnWorkingDirectory;

  if (state.pendingPermission) {
    return { ...state, queuedPermissions: [...state.queuedPermissions, request] };
  }
  return { ...state, pendingPermission: request };
}

/**
 * Clear the pending request once answered and present the next queued one.
 * Ids that do not match the pending request leave the state unchanged.
 */
export function resolvePermission(state: SessionState, requestId: string): SessionState {
  if (state.pendingPermission?.id !== requestId) return state;
  const [next, ...rest] = state.queuedPermissions;
  return {
    ...state,
    pendingPermission: next,
    queuedPermissions: rest,
  };
}
