/**
 * Turn Lifecycle Handlers
 *
 * `result` and `error` both end the in-flight request. A result finalizes
 * the transcript; an error is appended as a system message and leaves any
 * partial text as it was.
 */

import type { BridgeEventOf, UsageInfo } from '@tether/shared-types';
import type { ReducerContext } from '../../utils.js';
import { isCompacting, isInFlight, type SessionState } from '../types.js';
import {
  createMessage,
  removeTrailingEmptyAssistant,
  setLastAssistantText,
  setMessageText,
} from '../transcript.js';

export const COMPACTING_TEXT = 'Compacting conversation…';
export const COMPACTED_TEXT = 'Conversation compacted';

function toUsageInfo(event: BridgeEventOf<'result'>, costUSD: number): UsageInfo | undefined {
  if (!event.usage) return undefined;
  return {
    ...event.usage,
    costUSD,
    durationMs: event.durationMs ?? 0,
    contextTokens: event.contextTokens ?? 0,
  };
}

/**
 * Adopt the continuation token and usage carried by a result
 */
function applyAccounting(state: SessionState, event: BridgeEventOf<'result'>): SessionState {
  const costUSD = event.costUSD ?? 0;
  const usage = toUsageInfo(event, costUSD);
  return {
    ...state,
    continuationToken: event.sessionId ? event.sessionId : state.continuationToken,
    lastUsage: usage ?? state.lastUsage,
    // Cost counts even when the result carries no token usage
    totalCost: state.totalCost + costUSD,
  };
}

/**
 * Handle result event
 * - Ends the request (and compaction, marking its sentinel message)
 * - Adopts continuation token, usage and cost
 * - Finalizes the assistant text from the buffer
 * - Removes a trailing assistant message that never received text
 *
 * A result for a request that was already cancelled only updates accounting.
 */
export function handleResult(
  state: SessionState,
  event: BridgeEventOf<'result'>
): SessionState {
  const accounted = applyAccounting(state, event);
  if (!isInFlight(state)) return accounted;

  let messages = accounted.messages;
  if (isCompacting(state) && state.compactionMessageId) {
    messages = setMessageText(messages, state.compactionMessageId, COMPACTED_TEXT);
  }
  if (state.streamingBuffer) {
    messages = setLastAssistantText(messages, state.streamingBuffer);
  }
  messages = removeTrailingEmptyAssistant(messages);

  return {
    ...accounted,
    messages,
    phase: 'idle',
    compactionMessageId: undefined,
    turnWorkingDirectory: undefined,
    streamingBuffer: '',
    startsNewAssistantMessage: false,
  };
}

/**
 * Handle error event
 * - Ends the request and appends `Error: <message>`
 * - Text streamed before the error stays; an unused placeholder is dropped
 */
export function handleError(
  state: SessionState,
  event: BridgeEventOf<'error'>,
  ctx: ReducerContext
): SessionState {
  return failTurn(state, event.message, ctx);
}

/**
 * End the in-flight request with a visible error.
 * Also the path for supervisor failures (launch, authentication, exit).
 */
export function failTurn(state: SessionState, message: string, ctx: ReducerContext): SessionState {
  return {
    ...state,
    messages: [
      ...removeTrailingEmptyAssistant(state.messages),
      createMessage(ctx, 'system', `Error: ${message}`),
    ],
    phase: 'idle',
    compactionMessageId: undefined,
    turnWorkingDirectory: undefined,
    streamingBuffer: '',
    startsNewAssistantMessage: false,
    pendingPermission: undefined,
    queuedPermissions: [],
  };
}
