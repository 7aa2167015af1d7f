/**
 * Session State Types
 *
 * State for the session state machine. Owned by exactly one session and
 * only ever replaced through the reducer and command transitions, which
 * return new objects and never mutate.
 *
 * Key design:
 * - The streaming buffer is the source of truth for the current assistant
 *   message; the message text mirrors it so `set_text` can replace it whole
 * - `startsNewAssistantMessage` marks a turn boundary crossed by a tool
 * - Responding and compacting are one `phase` so they cannot both be set
 */

import type {
  Message,
  PermissionRequest,
  TaskTable,
  UsageInfo,
} from '@tether/shared-types';

// ============================================================================
// State Types
// ============================================================================

export type SessionPhase = 'idle' | 'responding' | 'compacting';

export interface SessionState {
  /** Ordered transcript */
  messages: Message[];

  /** Text streamed so far for the current assistant message */
  streamingBuffer: string;

  /** Set after a tool finishes; the next text opens a new assistant message */
  startsNewAssistantMessage: boolean;

  phase: SessionPhase;

  /** Id of the "compacting" system message while compaction runs */
  compactionMessageId?: string;

  /** Directory the in-flight request runs in; scopes permission requests */
  turnWorkingDirectory?: string;

  /** Opaque token that lets the next query resume this conversation */
  continuationToken?: string;

  totalCost: number;
  lastUsage?: UsageInfo;

  tasks: TaskTable;

  /** The one request presented to the user */
  pendingPermission?: PermissionRequest;

  /** Requests that arrived while another was pending, oldest first */
  queuedPermissions: PermissionRequest[];
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createInitialSessionState(): SessionState {
  return {
    messages: [],
    streamingBuffer: '',
    startsNewAssistantMessage: false,
    phase: 'idle',
    totalCost: 0,
    tasks: {},
    queuedPermissions: [],
  };
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Whether a request is in flight (responding or compacting)
 */
export function isInFlight(state: SessionState): boolean {
  return state.phase !== 'idle';
}

export function isCompacting(state: SessionState): boolean {
  return state.phase === 'compacting';
}
