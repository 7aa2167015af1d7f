import { realpath, stat } from 'node:fs/promises';
import type { CanUseTool, Options } from '@anthropic-ai/claude-agent-sdk';
import type { QueryCommand } from '@tether/shared-types';

/**
 * Canonical form of the requested directory, or the fallback when it does
 * not exist or is not a directory.
 */
export async function resolveWorkingDirectory(requested: string, fallback: string): Promise<string> {
  try {
    const real = await realpath(requested || fallback);
    const info = await stat(real);
    return info.isDirectory() ? real : fallback;
  } catch {
    return fallback;
  }
}

export function workingDirectoryPreamble(cwd: string): string {
  return (
    `Your working directory is: ${cwd}\n` +
    'All file paths should be relative to or within this directory unless the user explicitly specifies an absolute path elsewhere.'
  );
}

export function buildSystemPrompt(cwd: string, custom?: string): string {
  const preamble = workingDirectoryPreamble(cwd);
  return custom?.trim() ? `${preamble}\n\n${custom}` : preamble;
}

export interface QueryOptionsArgs {
  command: QueryCommand;
  /** Already canonicalized */
  cwd: string;
  canUseTool: CanUseTool;
  abortController: AbortController;
}

export function buildQueryOptions({ command, cwd, canUseTool, abortController }: QueryOptionsArgs): Options {
  const options: Options = {
    cwd,
    includePartialMessages: true,
    permissionMode: command.permissionMode,
    canUseTool,
    abortController,
    systemPrompt: buildSystemPrompt(cwd, command.systemPrompt),
  };
  if (command.model) options.model = command.model;
  if (command.sessionId) options.resume = command.sessionId;
  return options;
}
