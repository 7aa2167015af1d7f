/**
 * Permission request helpers
 */

import { isAbsolute, resolve, sep } from 'node:path';
import type { PermissionRequest } from '@tether/shared-types';

/**
 * Flatten a tool input into display strings. Strings are kept as-is,
 * other values are JSON encoded.
 */
export function flattenPermissionInput(input: Record<string, unknown>): Record<string, string> {
  const summary: Record<string, string> = {};
  for (const [key, value] of Object.entries(input)) {
    summary[key] = typeof value === 'string' ? value : (JSON.stringify(value) ?? String(value));
  }
  return summary;
}

/**
 * Human-readable description of what the tool wants to do
 */
export function describePermission(request: PermissionRequest): string {
  const input = request.inputSummary;
  switch (request.toolName) {
    case 'Bash':
      return input.command ?? 'Run a command';
    case 'Edit':
      return `Edit ${input.file_path ?? 'a file'}`;
    case 'Write':
      return `Write to ${input.file_path ?? 'a file'} (${input.contentLength ?? '?'} chars)`;
    case 'Read':
      return `Read ${input.file_path ?? 'a file'}`;
    default:
      return request.toolName;
  }
}

/**
 * Whether the request targets a path outside its working directory.
 *
 * Both paths are normalized so `..` segments cannot escape, relative targets
 * resolve against the working directory, and the containment check keeps
 * the trailing separator so `/project` does not contain `/projectEVIL`.
 */
export function isOutsideWorkingDirectory(request: PermissionRequest): boolean {
  const cwd = request.workingDirectory;
  if (!cwd) return false;

  const target = request.inputSummary.file_path ?? request.inputSummary.path ?? '';
  if (!target) return false;

  const root = resolve(cwd);
  const resolvedTarget = isAbsolute(target) ? resolve(target) : resolve(root, target);
  if (resolvedTarget === root) return false;

  const prefix = root.endsWith(sep) ? root : `${root}${sep}`;
  return !resolvedTarget.startsWith(prefix);
}
