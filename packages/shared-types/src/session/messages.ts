/**
 * Transcript Types
 *
 * A session transcript is an ordered list of messages. Tool invocations are
 * their own messages (role `tool`) so they never nest inside assistant prose.
 */

import type { SessionTask } from './tasks.js';

// ============================================================================
// Messages
// ============================================================================

export type MessageRole = 'user' | 'assistant' | 'system' | 'tool';

export const MESSAGE_ROLES = ['user', 'assistant', 'system', 'tool'] as const satisfies readonly MessageRole[];

export interface Message {
  id: string;
  role: MessageRole;
  /** Assistant text changes while its turn streams and is fixed afterwards */
  text: string;
  /** Unix timestamp (ms) */
  timestamp: number;
  /** Present when role is `tool` */
  toolActivity?: ToolActivity;
}

// ============================================================================
// Tool Activity
// ============================================================================

export interface ToolActivity {
  id: string;
  /** Open set - tools unknown to this version still decode */
  toolName: string;
  input: ToolActivityInput;
  result: ToolActivityResult;
}

export interface ToolActivityInput {
  filePath?: string;
  command?: string;
  description?: string;
  oldString?: string;
  newString?: string;
  content?: string;
  pattern?: string;
  path?: string;
  // Task tools
  subject?: string;
  taskId?: string;
  taskStatus?: string;
  activeForm?: string;
  /** Input object as received */
  raw: Record<string, unknown>;
}

export type DiffLineKind = 'addition' | 'removal' | 'context' | 'ellipsis';

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
  lineNumber?: number;
}

/**
 * Display projection of a tool result, tagged by kind.
 * `passthrough` is the fallback for tools without an interpreter.
 */
export type ToolActivityResult =
  | { kind: 'shell'; stdout?: string; stderr?: string; interrupted: boolean }
  | { kind: 'edit'; diffLines: DiffLine[] }
  | { kind: 'file'; content?: string }
  | { kind: 'write' }
  | { kind: 'search'; filenames: string[]; fileCount?: number }
  | { kind: 'task'; task?: SessionTask }
  | { kind: 'task_list'; tasks: SessionTask[] }
  | { kind: 'text'; text: string }
  | { kind: 'passthrough'; raw: unknown };

export type ToolActivityResultKind = ToolActivityResult['kind'];

// ============================================================================
// Usage
// ============================================================================

export interface UsageInfo {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens: number;
  cacheCreationTokens: number;
  costUSD: number;
  durationMs: number;
  /** Size of the conversation context at the last API call */
  contextTokens: number;
}

export function totalInputTokens(usage: UsageInfo): number {
  return usage.inputTokens + usage.cacheReadTokens + usage.cacheCreationTokens;
}
