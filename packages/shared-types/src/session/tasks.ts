/**
 * Session Task Types
 *
 * Tasks are tracked from the agent's task and todo tools. The table is keyed
 * by task id; deleted tasks are removed rather than kept as tombstones.
 */

export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'deleted'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && (TASK_STATUSES as readonly string[]).includes(value);
}

export interface SessionTask {
  /** Task id from the tool payload (e.g. "1", "2") */
  id: string;
  subject: string;
  status: TaskStatus;
  /** Present-continuous label, e.g. "Running tests" */
  activeForm?: string;
  description?: string;
  /** Ids of tasks blocking this one */
  blockedBy?: string[];
}

export type TaskTable = Record<string, SessionTask>;
