import { z } from 'zod';
import { PERMISSION_MODES, type BridgeCommand } from '@tether/shared-types';

const permissionMode = z.enum(PERMISSION_MODES).catch('default');

const commandSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('query'),
    prompt: z.string(),
    cwd: z.string().default(''),
    permissionMode,
    sessionId: z.string().optional(),
    model: z.string().optional(),
    systemPrompt: z.string().optional(),
  }),
  z.object({
    type: z.literal('compact'),
    sessionId: z.string().default(''),
    cwd: z.string().default(''),
    permissionMode,
    model: z.string().optional(),
    focusInstructions: z.string().optional(),
  }),
  z.object({
    type: z.literal('permission_response'),
    requestId: z.string(),
    behavior: z.enum(['allow', 'deny']),
    message: z.string().optional(),
  }),
  z.object({ type: z.literal('cancel') }),
]);

export type ParsedCommand =
  | { ok: true; command: BridgeCommand }
  | { ok: false; reason: string };

/**
 * Parse one stdin line into a command
 */
export function parseCommand(line: string): ParsedCommand {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    return { ok: false, reason: `Malformed JSON from stdin: ${error instanceof Error ? error.message : String(error)}` };
  }

  const parsed = commandSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: `Unrecognized command: ${parsed.error.issues.map((i) => i.message).join('; ')}` };
  }
  return { ok: true, command: parsed.data };
}
