import { createInterface } from 'node:readline/promises';
import type { PermissionRequest } from '@tether/shared-types';
import { describePermission, isOutsideWorkingDirectory } from '@tether/state';

export interface PermissionPromptOptions {
  /** Approve everything without asking */
  autoApprove: boolean;
  /** Whether a user can answer; requests are denied otherwise */
  interactive: boolean;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export function formatPermissionQuestion(request: PermissionRequest): string {
  const scope = isOutsideWorkingDirectory(request) ? ' [outside working directory]' : '';
  const reason = request.reason ? ` (${request.reason})` : '';
  return `Allow ${request.toolName}: ${describePermission(request)}${scope}${reason}? [y/N] `;
}

export function isApproval(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/**
 * Ask the user whether a tool may run
 */
export async function askPermission(request: PermissionRequest, options: PermissionPromptOptions): Promise<boolean> {
  if (options.autoApprove) return true;
  if (!options.interactive) return false;

  const rl = createInterface({ input: options.input, output: options.output, terminal: false });
  try {
    return isApproval(await rl.question(formatPermissionQuestion(request)));
  } finally {
    rl.close();
  }
}
