/**
 * Bridge Commands (host → bridge)
 *
 * One command per line on the bridge's stdin. Commands are fire-and-forget:
 * only `query` and `compact` produce a response stream, `cancel` and
 * `permission_response` are never acknowledged.
 */

import type { PermissionMode } from '../session/settings.js';

// ============================================================================
// Command Shapes
// ============================================================================

export interface QueryCommand {
  type: 'query';
  prompt: string;
  cwd: string;
  permissionMode: PermissionMode;
  /** Continuation token from a previous result */
  sessionId?: string;
  model?: string;
  systemPrompt?: string;
}

export interface CompactCommand {
  type: 'compact';
  sessionId: string;
  cwd: string;
  permissionMode: PermissionMode;
  model?: string;
  focusInstructions?: string;
}

export interface PermissionResponseCommand {
  type: 'permission_response';
  requestId: string;
  behavior: 'allow' | 'deny';
  message?: string;
}

export interface CancelCommand {
  type: 'cancel';
}

export type BridgeCommand =
  | QueryCommand
  | CompactCommand
  | PermissionResponseCommand
  | CancelCommand;

export type BridgeCommandType = BridgeCommand['type'];

/**
 * Commands that start a response stream and occupy the single in-flight slot
 */
export type RequestCommand = QueryCommand | CompactCommand;

export function isRequestCommand(command: BridgeCommand): command is RequestCommand {
  return command.type === 'query' || command.type === 'compact';
}
