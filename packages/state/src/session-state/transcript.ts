/**
 * Immutable transcript helpers shared by the event handlers and commands.
 */

import type { Message, MessageRole, ToolActivity } from '@tether/shared-types';
import type { ReducerContext } from '../utils.js';

export const CANCELLED_MARKER = '\n\n*[Cancelled]*';

export function createMessage(
  ctx: ReducerContext,
  role: MessageRole,
  text: string,
  toolActivity?: ToolActivity
): Message {
  const message: Message = { id: ctx.newId(), role, text, timestamp: ctx.now() };
  if (toolActivity) message.toolActivity = toolActivity;
  return message;
}

export function isEmptyAssistant(message: Message | undefined): boolean {
  return message !== undefined && message.role === 'assistant' && message.text === '';
}

/**
 * Replace the text of the most recent assistant message. Searches backwards
 * because tool and system messages may follow it.
 */
export function setLastAssistantText(messages: Message[], text: string): Message[] {
  for (let i = messages.length - 1; i >= 0; i--) {
    const message = messages[i];
    if (message?.role !== 'assistant') continue;
    if (message.text === text) return messages;
    const next = [...messages];
    next[i] = { ...message, text };
    return next;
  }
  return messages;
}

/**
 * Drop the last message if it is an assistant message that never received text
 */
export function removeTrailingEmptyAssistant(messages: Message[]): Message[] {
  return isEmptyAssistant(messages[messages.length - 1]) ? messages.slice(0, -1) : messages;
}

export function setMessageText(messages: Message[], id: string, text: string): Message[] {
  const index = messages.findIndex((m) => m.id === id);
  const message = messages[index];
  if (!message) return messages;
  const next = [...messages];
  next[index] = { ...message, text };
  return next;
}
