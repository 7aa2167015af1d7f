/**
 * Bridge Events (bridge → host)
 *
 * Every line the bridge writes to stdout is a JSON object tagged by `type`.
 * The set is open: hosts must ignore tags they do not know.
 *
 * Ordering contract: events are consumed in the exact order the bridge
 * wrote them, and the first event of every process must be `ready`.
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Environment variable carrying the per-launch authentication nonce
 */
export const BRIDGE_NONCE_ENV = 'TETHER_BRIDGE_NONCE';

// ============================================================================
// Event Shapes
// ============================================================================

export interface ReadyEvent {
  type: 'ready';
  nonce: string;
}

/** Incremental text delta for the current assistant message */
export interface TokenEvent {
  type: 'token';
  text: string;
}

/** Full-text replacement for the current assistant message */
export interface SetTextEvent {
  type: 'set_text';
  text: string;
}

export interface PermissionRequestEvent {
  type: 'permission_request';
  requestId: string;
  toolName: string;
  input: Record<string, unknown>;
  reason?: string;
}

export interface ToolActivityEvent {
  type: 'tool_activity';
  toolName: string;
  input: Record<string, unknown>;
  /** Raw tool result as produced by the agent SDK; shape depends on the tool */
  result: unknown;
}

/**
 * Token counts as reported on the wire
 */
export interface WireUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheCreationTokens: number;
}

export interface ResultEvent {
  type: 'result';
  text: string;
  /** Continuation token for the next query */
  sessionId?: string;
  usage?: WireUsage;
  costUSD?: number;
  durationMs?: number;
  contextTokens?: number;
}

export interface ErrorEvent {
  type: 'error';
  message: string;
}

/** A tool finished; the next text starts a new assistant message */
export interface TurnCompleteEvent {
  type: 'turn_complete';
}

/** Reserved - decoded but not acted on */
export interface ToolProgressEvent {
  type: 'tool_progress';
}

/** Reserved - decoded but not acted on */
export interface ToolUseSummaryEvent {
  type: 'tool_use_summary';
}

export interface DebugEvent {
  type: 'debug';
  message: string;
}

export type BridgeEvent =
  | ReadyEvent
  | TokenEvent
  | SetTextEvent
  | PermissionRequestEvent
  | ToolActivityEvent
  | ResultEvent
  | ErrorEvent
  | TurnCompleteEvent
  | ToolProgressEvent
  | ToolUseSummaryEvent
  | DebugEvent;

export type BridgeEventType = BridgeEvent['type'];

/**
 * Extract a specific event by its tag
 */
export type BridgeEventOf<K extends BridgeEventType> = Extract<BridgeEvent, { type: K }>;

/**
 * All tags this protocol version understands
 */
export const BRIDGE_EVENT_TYPES = [
  'ready',
  'token',
  'set_text',
  'permission_request',
  'tool_activity',
  'result',
  'error',
  'turn_complete',
  'tool_progress',
  'tool_use_summary',
  'debug',
] as const satisfies readonly BridgeEventType[];

export function isBridgeEventType(type: string): type is BridgeEventType {
  return (BRIDGE_EVENT_TYPES as readonly string[]).includes(type);
}
