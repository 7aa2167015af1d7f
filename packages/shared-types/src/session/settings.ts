/**
 * Per-session settings, injected when a session is created or restored.
 */

export const PERMISSION_MODES = ['default', 'acceptEdits', 'plan', 'bypassPermissions'] as const;

export type PermissionMode = (typeof PERMISSION_MODES)[number];

export function isPermissionMode(value: unknown): value is PermissionMode {
  return typeof value === 'string' && (PERMISSION_MODES as readonly string[]).includes(value);
}

export interface SessionSettings {
  workingDirectory: string;
  permissionMode: PermissionMode;
  /** Model override; the bridge's default when absent */
  model?: string;
  /** Appended to the bridge's working-directory preamble; ignored when empty */
  customSystemPrompt: string;
}

export function createDefaultSettings(workingDirectory: string): SessionSettings {
  return {
    workingDirectory,
    permissionMode: 'default',
    customSystemPrompt: '',
  };
}
