/**
 * Streaming Event Handlers
 *
 * Pure functions for `token`, `set_text` and `turn_complete`.
 * All handlers are immutable - they return new state objects.
 */

import type { BridgeEventOf } from '@tether/shared-types';
import type { ReducerContext } from '../../utils.js';
import type { SessionState } from '../types.js';
import { createMessage, isEmptyAssistant, setLastAssistantText } from '../transcript.js';

/**
 * Open a fresh assistant message if a turn boundary was crossed.
 * An empty assistant message at the end of the transcript is reused.
 */
function ensureAssistantMessage(state: SessionState, ctx: ReducerContext): SessionState {
  if (!state.startsNewAssistantMessage) return state;

  const last = state.messages[state.messages.length - 1];
  const messages = isEmptyAssistant(last)
    ? state.messages
    : [...state.messages, createMessage(ctx, 'assistant', '')];

  return {
    ...state,
    messages,
    streamingBuffer: '',
    startsNewAssistantMessage: false,
  };
}

function writeBuffer(state: SessionState, buffer: string): SessionState {
  return {
    ...state,
    streamingBuffer: buffer,
    messages: setLastAssistantText(state.messages, buffer),
  };
}

/**
 * Handle token event
 * - Appends the delta to the streaming buffer
 * - Mirrors the buffer into the current assistant message
 */
export function handleToken(
  state: SessionState,
  event: BridgeEventOf<'token'>,
  ctx: ReducerContext
): SessionState {
  const current = ensureAssistantMessage(state, ctx);
  return writeBuffer(current, current.streamingBuffer + event.text);
}

/**
 * Handle set_text event
 * - Replaces the streaming buffer wholesale
 */
export function handleSetText(
  state: SessionState,
  event: BridgeEventOf<'set_text'>,
  ctx: ReducerContext
): SessionState {
  const current = ensureAssistantMessage(state, ctx);
  return writeBuffer(current, event.text);
}

/**
 * Handle turn_complete event
 * - The next text belongs to a new assistant message
 */
export function handleTurnComplete(state: SessionState): SessionState {
  if (state.startsNewAssistantMessage) return state;
  return { ...state, startsNewAssistantMessage: true };
}
