/**
 * ask command - send one prompt and stream the reply
 */

import { resolve } from 'node:path';
import { Command, Option } from 'commander';
import { z } from 'zod';
import {
  PERMISSION_MODES,
  SESSION_SNAPSHOT_VERSION,
  type PermissionRequest,
  type SessionSettings,
  type SessionSnapshot,
} from '@tether/shared-types';
import { loadHostConfig } from '../../config/env.js';
import { createLogger } from '../../config/logger.js';
import { AgentSession, type AgentSessionDeps } from '../../core/agent-session.js';
import { ConfigError, errorMessage } from '../../errors.js';
import { askPermission } from '../lib/permission-prompt.js';
import { TranscriptPrinter, formatCostLine } from '../lib/transcript-printer.js';

const askOptionsSchema = z.object({
  cwd: z.string().min(1),
  model: z.string().min(1).optional(),
  permissionMode: z.enum(PERMISSION_MODES),
  systemPrompt: z.string().default(''),
  resume: z.string().min(1).optional(),
  yes: z.boolean().default(false),
});

export type AskOptions = z.infer<typeof askOptionsSchema>;

export interface AskIo {
  stdin: NodeJS.ReadableStream & { isTTY?: boolean };
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

const log = createLogger({ component: 'cli' });

export function parseAskOptions(raw: unknown): AskOptions {
  const parsed = askOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}

/**
 * Snapshot that carries only a continuation token, for `--resume`
 */
export function resumeSnapshot(token: string, settings: SessionSettings, now: number): SessionSnapshot {
  return {
    version: SESSION_SNAPSHOT_VERSION,
    id: token,
    name: 'Resumed session',
    createdAt: now,
    settings,
    messages: [],
    sessionId: token,
    totalCost: 0,
    tasks: {},
  };
}

/**
 * Run one prompt to completion. Resolves to the process exit code.
 */
export async function runAsk(prompt: string, options: AskOptions, io: AskIo): Promise<number> {
  const config = loadHostConfig();
  const settings: SessionSettings = {
    workingDirectory: resolve(options.cwd),
    permissionMode: options.permissionMode,
    model: options.model,
    customSystemPrompt: options.systemPrompt,
  };
  const deps: AgentSessionDeps = {
    bridgeOptions: {
      nodePath: config.nodePath,
      bridgeScript: config.bridgeScript,
      startupRetryDelayMs: config.startupRetryDelayMs,
      maxConsecutiveMalformedLines: config.maxConsecutiveMalformedLines,
    },
  };

  const session = options.resume
    ? AgentSession.restore(resumeSnapshot(options.resume, settings, Date.now()), deps)
    : AgentSession.create({ settings, name: 'ask' }, deps);

  const printer = new TranscriptPrinter(io.stdout, session.sessionState.messages.length);
  let prompting: string | undefined;

  const answer = async (request: PermissionRequest): Promise<void> => {
    prompting = request.id;
    try {
      const allowed = await askPermission(request, {
        autoApprove: options.yes,
        interactive: io.stdin.isTTY === true,
        input: io.stdin,
        output: io.stderr,
      });
      session.respondToPermission(request.id, allowed);
    } finally {
      if (prompting === request.id) prompting = undefined;
    }
  };

  const done = new Promise<void>((resolveDone) => {
    session.eventBus.on('state:changed', ({ state }) => {
      printer.render(state);
      const pending = state.pendingPermission;
      if (pending && prompting !== pending.id) {
        answer(pending).catch((error: unknown) => {
          log.error({ error: errorMessage(error) }, 'Permission prompt failed');
          session.cancel();
        });
      }
      if (state.phase === 'idle') resolveDone();
    });
  });

  const onInterrupt = (): void => session.cancel();
  process.once('SIGINT', onInterrupt);

  try {
    const sent = await session.send(prompt);
    if (!sent.accepted) {
      io.stderr.write(`Nothing to send (${sent.reason})\n`);
      return 2;
    }
    if (session.isBusy) await done;

    printer.finish();
    io.stderr.write(`${formatCostLine(session.sessionState)}\n`);

    const last = session.sessionState.messages[session.sessionState.messages.length - 1];
    return last?.role === 'system' && last.text.startsWith('Error: ') ? 1 : 0;
  } finally {
    process.off('SIGINT', onInterrupt);
    session.shutdown();
  }
}

export const askCommand = new Command('ask')
  .description('Send a prompt to the agent and stream the reply')
  .argument('<prompt...>', 'Prompt text')
  .option('-C, --cwd <dir>', 'Working directory for the agent', process.cwd())
  .option('-m, --model <model>', 'Model to use')
  .addOption(
    new Option('-p, --permission-mode <mode>', 'Permission mode').choices(PERMISSION_MODES).default('default')
  )
  .option('-s, --system-prompt <text>', 'Extra system prompt text')
  .option('-r, --resume <token>', 'Continue a previous conversation')
  .option('-y, --yes', 'Approve every permission request')
  .action(async (words: string[], raw: unknown) => {
    const options = parseAskOptions(raw);
    process.exitCode = await runAsk(words.join(' '), options, {
      stdin: process.stdin,
      stdout: process.stdout,
      stderr: process.stderr,
    });
  });
