/**
 * Snapshot projection
 *
 * A snapshot is taken between turns. Restoring never resumes an in-flight
 * request: the restored state is idle with no pending permission.
 */

import {
  SESSION_SNAPSHOT_VERSION,
  type SessionSettings,
  type SessionSnapshot,
} from '@tether/shared-types';
import { createInitialSessionState, type SessionState } from './session-state/types.js';

export interface SnapshotIdentity {
  id: string;
  name: string;
  createdAt: number;
}

export function createSnapshot(
  identity: SnapshotIdentity,
  settings: SessionSettings,
  state: SessionState
): SessionSnapshot {
  const snapshot: SessionSnapshot = {
    version: SESSION_SNAPSHOT_VERSION,
    id: identity.id,
    name: identity.name,
    createdAt: identity.createdAt,
    settings: { ...settings },
    messages: state.messages.map((m) => ({ ...m })),
    totalCost: state.totalCost,
    tasks: { ...state.tasks },
  };
  if (state.continuationToken) snapshot.sessionId = state.continuationToken;
  if (state.lastUsage) snapshot.lastUsage = { ...state.lastUsage };
  return snapshot;
}

export function restoreSessionState(snapshot: SessionSnapshot): SessionState {
  return {
    ...createInitialSessionState(),
    messages: snapshot.messages.map((m) => ({ ...m })),
    continuationToken: snapshot.sessionId,
    totalCost: snapshot.totalCost,
    lastUsage: snapshot.lastUsage,
    tasks: { ...snapshot.tasks },
  };
}
