/**
 * @tether/state
 *
 * Pure session state machine for bridge event streams, plus the
 * interpreters that turn raw tool payloads into display data.
 *
 * Nothing here performs I/O; the host drives it.
 */

// Session state
export {
  type SessionPhase,
  type SessionState,
  createInitialSessionState,
  isInFlight,
  isCompacting,
} from './session-state/types.js';
export { reduceBridgeEvent, isDataEvent } from './session-state/reducer.js';
export {
  type RejectionReason,
  type TransitionResult,
  COMPACTION_CANCELLED_TEXT,
  beginQuery,
  beginCompact,
  cancelTurn,
  setTurnWorkingDirectory,
} from './session-state/commands.js';
export { resolvePermission } from './session-state/handlers/permission-handlers.js';
export { failTurn, COMPACTING_TEXT, COMPACTED_TEXT } from './session-state/handlers/lifecycle-handlers.js';
export { CANCELLED_MARKER } from './session-state/transcript.js';

// Tool results
export * from './tool-results/index.js';

// Permissions
export { flattenPermissionInput, describePermission, isOutsideWorkingDirectory } from './permissions.js';

// Snapshots
export { type SnapshotIdentity, createSnapshot, restoreSessionState } from './snapshot.js';

// Utilities
export { type ReducerContext, defaultReducerContext, generateId } from './utils.js';
