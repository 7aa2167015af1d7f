/**
 * User-initiated transitions
 *
 * These run when the user acts (send, cancel, compact) rather than in
 * response to a bridge event. Each returns the next state plus whether the
 * action was accepted; a rejected action returns the state it was given.
 */

import { defaultReducerContext, type ReducerContext } from '../utils.js';
import { isCompacting, isInFlight, type SessionState } from './types.js';
import {
  CANCELLED_MARKER,
  createMessage,
  removeTrailingEmptyAssistant,
  setLastAssistantText,
  setMessageText,
} from './transcript.js';
import { COMPACTING_TEXT } from './handlers/lifecycle-handlers.js';

export type RejectionReason = 'busy' | 'empty' | 'no_conversation';

export type TransitionResult =
  | { accepted: true; state: SessionState }
  | { accepted: false; reason: RejectionReason; state: SessionState };

export const COMPACTION_CANCELLED_TEXT = 'Compaction cancelled';

/**
 * Start a query: append the user message and an assistant placeholder.
 */
export function beginQuery(
  state: SessionState,
  text: string,
  workingDirectory?: string,
  ctx: ReducerContext = defaultReducerContext
): TransitionResult {
  if (isInFlight(state)) return { accepted: false, reason: 'busy', state };
  if (text.trim() === '') return { accepted: false, reason: 'empty', state };

  const next: SessionState = {
    ...state,
    messages: [
      ...state.messages,
      createMessage(ctx, 'user', text),
      createMessage(ctx, 'assistant', ''),
    ],
    streamingBuffer: '',
    startsNewAssistantMessage: false,
    phase: 'responding',
    turnWorkingDirectory: workingDirectory,
  };
  return { accepted: true, state: next };
}

/**
 * Start compaction of the current conversation.
 * Needs a continuation token, since there is nothing to compact without one.
 */
export function beginCompact(
  state: SessionState,
  workingDirectory?: string,
  ctx: ReducerContext = defaultReducerContext
): TransitionResult {
  if (isInFlight(state)) return { accepted: false, reason: 'busy', state };
  if (!state.continuationToken) return { accepted: false, reason: 'no_conversation', state };

  const sentinel = createMessage(ctx, 'system', COMPACTING_TEXT);
  const next: SessionState = {
    ...state,
    messages: [...state.messages, sentinel, createMessage(ctx, 'assistant', '')],
    streamingBuffer: '',
    startsNewAssistantMessage: false,
    phase: 'compacting',
    compactionMessageId: sentinel.id,
    turnWorkingDirectory: workingDirectory,
  };
  return { accepted: true, state: next };
}

/**
 * Record the resolved directory the in-flight request runs in, so
 * permission requests are scoped to the directory the agent actually sees.
 */
export function setTurnWorkingDirectory(state: SessionState, workingDirectory: string): SessionState {
  if (!isInFlight(state) || state.turnWorkingDirectory === workingDirectory) return state;
  return { ...state, turnWorkingDirectory: workingDirectory };
}

/**
 * Stop the in-flight request locally. Idempotent: cancelling while idle
 * returns the same state.
 */
export function cancelTurn(state: SessionState): SessionState {
  if (!isInFlight(state)) return state;

  let messages = state.messages;
  if (state.streamingBuffer) {
    messages = setLastAssistantText(messages, state.streamingBuffer + CANCELLED_MARKER);
  } else {
    messages = removeTrailingEmptyAssistant(messages);
  }
  if (isCompacting(state) && state.compactionMessageId) {
    messages = setMessageText(messages, state.compactionMessageId, COMPACTION_CANCELLED_TEXT);
  }

  return {
    ...state,
    messages,
    phase: 'idle',
    streamingBuffer: '',
    startsNewAssistantMessage: false,
    compactionMessageId: undefined,
    turnWorkingDirectory: undefined,
    pendingPermission: undefined,
    queuedPermissions: [],
  };
}
