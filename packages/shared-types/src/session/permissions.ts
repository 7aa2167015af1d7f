/**
 * A tool-use permission request raised by the agent and answered by the user.
 */
export interface PermissionRequest {
  /** Correlation id; the response must carry the same id */
  id: string;
  toolName: string;
  /** Tool input flattened to strings for display */
  inputSummary: Record<string, string>;
  reason?: string;
  /** Directory the request is scoped to */
  workingDirectory?: string;
}
