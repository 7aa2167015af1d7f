/**
 * Event decoder and command encoder
 *
 * Inbound lines are validated per `type` with zod. Unknown types are not
 * errors: the bridge may be newer than the host. A known type whose payload
 * does not validate is dropped. Fields that end a turn (`error.message`,
 * `result.text`) fall back to defaults instead, so a turn always ends.
 */

import { z } from 'zod';
import {
  isBridgeEventType,
  type BridgeCommand,
  type BridgeEvent,
  type BridgeEventType,
  type CompactCommand,
  type PermissionRequestEvent,
  type PermissionResponseCommand,
  type QueryCommand,
  type ResultEvent,
  type WireUsage,
} from '@tether/shared-types';
import { encodeLine } from '../transport/line-transport.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Schemas
// ============================================================================

/** A string field that falls back when missing or not a string */
const stringOr = (fallback: string) =>
  z.unknown().transform((value) => (typeof value === 'string' ? value : fallback));

const optionalNumber = z
  .unknown()
  .transform((value) => (typeof value === 'number' && Number.isFinite(value) ? value : undefined));

const toolInputSchema = z
  .unknown()
  .transform((value): Record<string, unknown> => (isRecord(value) ? value : {}));

const usageSchema = z.unknown().transform((value): WireUsage | undefined => {
  if (!isRecord(value)) return undefined;
  const usage = value;
  const read = (key: string) => {
    const n = usage[key];
    return typeof n === 'number' && Number.isFinite(n) ? n : 0;
  };
  return {
    inputTokens: read('inputTokens'),
    outputTokens: read('outputTokens'),
    cacheReadTokens: read('cacheReadTokens'),
    cacheCreationTokens: read('cacheCreationTokens'),
  };
});

type EventSchema = z.ZodType<BridgeEvent, z.ZodTypeDef, unknown>;

const EVENT_SCHEMAS: Record<BridgeEventType, EventSchema> = {
  ready: z
    .object({ nonce: z.string() })
    .transform((e): BridgeEvent => ({ type: 'ready', nonce: e.nonce })),

  token: z
    .object({ text: z.string() })
    .transform((e): BridgeEvent => ({ type: 'token', text: e.text })),

  set_text: z
    .object({ text: z.string() })
    .transform((e): BridgeEvent => ({ type: 'set_text', text: e.text })),

  permission_request: z
    .object({
      requestId: z.string().min(1),
      toolName: stringOr('Unknown'),
      input: toolInputSchema,
      reason: z.string().optional(),
    })
    .transform((e): BridgeEvent => {
      const event: PermissionRequestEvent = {
        type: 'permission_request',
        requestId: e.requestId,
        toolName: e.toolName,
        input: e.input,
      };
      if (e.reason) event.reason = e.reason;
      return event;
    }),

  tool_activity: z
    .object({
      toolName: stringOr('Unknown'),
      input: toolInputSchema,
      result: z.unknown(),
    })
    .transform((e): BridgeEvent => ({
      type: 'tool_activity',
      toolName: e.toolName,
      input: e.input,
      result: e.result,
    })),

  result: z
    .object({
      text: stringOr(''),
      sessionId: z.unknown().transform((value) => (typeof value === 'string' ? value : undefined)),
      usage: usageSchema,
      costUSD: optionalNumber,
      durationMs: optionalNumber,
      contextTokens: optionalNumber,
    })
    .transform((e): BridgeEvent => {
      const event: ResultEvent = { type: 'result', text: e.text };
      if (e.sessionId !== undefined) event.sessionId = e.sessionId;
      if (e.usage) event.usage = e.usage;
      if (e.costUSD !== undefined) event.costUSD = e.costUSD;
      if (e.durationMs !== undefined) event.durationMs = e.durationMs;
      if (e.contextTokens !== undefined) event.contextTokens = e.contextTokens;
      return event;
    }),

  error: z
    .object({ message: stringOr('Unknown error') })
    .transform((e): BridgeEvent => ({ type: 'error', message: e.message })),

  turn_complete: z.object({}).transform((): BridgeEvent => ({ type: 'turn_complete' })),
  tool_progress: z.object({}).transform((): BridgeEvent => ({ type: 'tool_progress' })),
  tool_use_summary: z.object({}).transform((): BridgeEvent => ({ type: 'tool_use_summary' })),

  debug: z
    .object({ message: stringOr('') })
    .transform((e): BridgeEvent => ({ type: 'debug', message: e.message })),
};

// ============================================================================
// Decoding
// ============================================================================

export type DecodeResult =
  | { status: 'ok'; event: BridgeEvent }
  | { status: 'unknown'; type: string }
  | { status: 'invalid'; type: string; issues: string[] };

/**
 * Decode one parsed JSON value into a bridge event
 */
export function decodeBridgeEvent(value: unknown): DecodeResult {
  if (!isRecord(value) || typeof value.type !== 'string') {
    return { status: 'invalid', type: '', issues: ['missing type'] };
  }

  const type = value.type;
  if (!isBridgeEventType(type)) {
    return { status: 'unknown', type };
  }

  const parsed = EVENT_SCHEMAS[type].safeParse(value);
  if (!parsed.success) {
    return {
      status: 'invalid',
      type,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || type}: ${issue.message}`),
    };
  }
  return { status: 'ok', event: parsed.data };
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode a command as one line. Empty optional strings are omitted.
 */
export function encodeCommand(command: BridgeCommand): string {
  switch (command.type) {
    case 'query': {
      const wire: QueryCommand = {
        type: 'query',
        prompt: command.prompt,
        cwd: command.cwd,
        permissionMode: command.permissionMode,
      };
      if (command.sessionId) wire.sessionId = command.sessionId;
      if (command.model) wire.model = command.model;
      if (command.systemPrompt) wire.systemPrompt = command.systemPrompt;
      return encodeLine(wire);
    }
    case 'compact': {
      const wire: CompactCommand = {
        type: 'compact',
        sessionId: command.sessionId,
        cwd: command.cwd,
        permissionMode: command.permissionMode,
      };
      if (command.model) wire.model = command.model;
      if (command.focusInstructions?.trim()) wire.focusInstructions = command.focusInstructions;
      return encodeLine(wire);
    }
    case 'permission_response': {
      const wire: PermissionResponseCommand = {
        type: 'permission_response',
        requestId: command.requestId,
        behavior: command.behavior,
      };
      if (command.message) wire.message = command.message;
      return encodeLine(wire);
    }
    case 'cancel':
      return encodeLine({ type: 'cancel' });
  }
}
