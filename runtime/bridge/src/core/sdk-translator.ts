/**
 * SDK message translation
 *
 * Turns agent SDK messages into bridge events. Messages are validated
 * loosely: anything that does not match a shape we act on is ignored.
 *
 * Mapping:
 * - stream_event text deltas        -> token
 * - assistant snapshots             -> set_text (text blocks joined by a blank line)
 * - user messages with tool results -> turn_complete + tool_activity
 * - result                          -> result with usage, cost and context size
 */

import { z } from 'zod';
import type { BridgeEvent, ResultEvent } from '@tether/shared-types';

const inputSchema = z.record(z.string(), z.unknown());

const streamEventSchema = z.object({
  type: z.literal('stream_event'),
  event: z.object({
    type: z.string(),
    delta: z.object({ type: z.string(), text: z.string().optional() }).optional(),
  }),
});

const assistantSchema = z.object({
  type: z.literal('assistant'),
  message: z.object({ content: z.array(z.unknown()) }),
});

const userSchema = z.object({
  type: z.literal('user'),
  tool_use_result: z.unknown(),
});

const count = z.number().nullish();

const resultSchema = z.object({
  type: z.literal('result'),
  subtype: z.string().optional(),
  result: z.string().optional(),
  session_id: z.string().optional(),
  total_cost_usd: z.number().optional(),
  duration_ms: z.number().optional(),
  usage: z
    .object({
      input_tokens: count,
      output_tokens: count,
      cache_read_input_tokens: count,
      cache_creation_input_tokens: count,
    })
    .optional(),
});

const sdkMessageSchema = z.discriminatedUnion('type', [streamEventSchema, assistantSchema, userSchema, resultSchema]);

const textBlockSchema = z.object({ type: z.literal('text'), text: z.string() });

const toolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: inputSchema.optional(),
});

type SdkResult = z.infer<typeof resultSchema>;

interface ToolUse {
  id?: string;
  toolName: string;
  input: Record<string, unknown>;
}

export function toResultEvent(message: SdkResult): ResultEvent {
  const usage = message.usage;
  const inputTokens = usage?.input_tokens ?? 0;
  const cacheReadTokens = usage?.cache_read_input_tokens ?? 0;
  const cacheCreationTokens = usage?.cache_creation_input_tokens ?? 0;

  const event: ResultEvent = {
    type: 'result',
    text: message.result ?? '',
    usage: {
      inputTokens,
      outputTokens: usage?.output_tokens ?? 0,
      cacheReadTokens,
      cacheCreationTokens,
    },
    costUSD: message.total_cost_usd ?? 0,
    durationMs: message.duration_ms ?? 0,
    // Every call sends the whole history, so its input is the context size
    contextTokens: inputTokens + cacheReadTokens + cacheCreationTokens,
  };
  if (message.session_id) event.sessionId = message.session_id;
  return event;
}

/**
 * Per-query translator. Pairs tool results with the tool that produced
 * them: the tool seen by the permission callback wins, then tool_use
 * blocks from assistant snapshots in arrival order.
 */
export class SdkTranslator {
  private currentToolUse?: ToolUse;
  private readonly toolUseQueue: ToolUse[] = [];
  private readonly seenToolUseIds = new Set<string>();

  /** Record a tool seen by the permission callback */
  noteToolUse(toolName: string, input: Record<string, unknown>): void {
    this.currentToolUse = { toolName, input };
  }

  translate(message: unknown): BridgeEvent[] {
    const parsed = sdkMessageSchema.safeParse(message);
    if (!parsed.success) return [];

    const sdk = parsed.data;
    switch (sdk.type) {
      case 'stream_event': {
        const { event } = sdk;
        if (event.type === 'content_block_delta' && event.delta?.type === 'text_delta' && event.delta.text) {
          return [{ type: 'token', text: event.delta.text }];
        }
        return [];
      }

      case 'assistant':
        return this.translateAssistant(sdk.message.content);

      case 'user': {
        if (sdk.tool_use_result === undefined) return [];
        const tool = this.takeToolUse();
        return [
          { type: 'turn_complete' },
          {
            type: 'tool_activity',
            toolName: tool?.toolName ?? 'Unknown',
            input: tool?.input ?? {},
            result: sdk.tool_use_result,
          },
        ];
      }

      case 'result':
        return [toResultEvent(sdk)];
    }
  }

  private takeToolUse(): ToolUse | undefined {
    const current = this.currentToolUse;
    this.currentToolUse = undefined;
    if (!current) return this.toolUseQueue.shift();

    // The same call is also queued from its tool_use block
    const queued = this.toolUseQueue.findIndex((tool) => tool.toolName === current.toolName);
    if (queued >= 0) this.toolUseQueue.splice(queued, 1);
    return current;
  }

  private translateAssistant(content: unknown[]): BridgeEvent[] {
    const texts: string[] = [];
    for (const block of content) {
      const toolUse = toolUseBlockSchema.safeParse(block);
      if (toolUse.success) {
        const { id, name, input } = toolUse.data;
        if (!this.seenToolUseIds.has(id)) {
          this.seenToolUseIds.add(id);
          this.toolUseQueue.push({ id, toolName: name, input: input ?? {} });
        }
        continue;
      }
      const text = textBlockSchema.safeParse(block);
      if (text.success) texts.push(text.data.text);
    }
    return texts.length > 0 ? [{ type: 'set_text', text: texts.join('\n\n') }] : [];
  }
}
