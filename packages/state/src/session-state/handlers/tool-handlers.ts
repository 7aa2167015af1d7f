/**
 * Tool Activity Handler
 *
 * Each tool invocation becomes its own `tool` message, so tool calls are
 * discrete, orderable transcript entries and never sit inside assistant
 * prose. Task and todo tools also reconcile the task table.
 */

import type { BridgeEventOf } from '@tether/shared-types';
import type { ReducerContext } from '../../utils.js';
import type { SessionState } from '../types.js';
import { interpretToolActivity, reconcileTasks, summarizeToolActivity } from '../../tool-results/index.js';
import { createMessage, removeTrailingEmptyAssistant } from '../transcript.js';

/**
 * Handle tool_activity event
 * - Drops an assistant placeholder that never received text
 * - Appends the interpreted tool message
 * - Marks a turn boundary
 */
export function handleToolActivity(
  state: SessionState,
  event: BridgeEventOf<'tool_activity'>,
  ctx: ReducerContext
): SessionState {
  const activity = interpretToolActivity(ctx.newId(), event.toolName, event.input, event.result);
  const message = createMessage(ctx, 'tool', summarizeToolActivity(activity), activity);

  return {
    ...state,
    messages: [...removeTrailingEmptyAssistant(state.messages), message],
    tasks: reconcileTasks(state.tasks, activity),
    startsNewAssistantMessage: true,
  };
}
