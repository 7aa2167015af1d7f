/**
 * Task payload parsing and task-table reconciliation
 *
 * Two tool families touch the task table:
 * - TaskCreate / TaskUpdate / TaskGet carry a single task → upsert or delete
 * - TodoWrite / TodoUpdate / TaskList / TodoRead carry the full list → replace
 */

import type { SessionTask, TaskTable, ToolActivity } from '@tether/shared-types';
import { isTaskStatus } from '@tether/shared-types';
import { isRecord, readNumber, readString, readStringArray } from '../utils.js';

export const SINGLE_TASK_TOOLS: ReadonlySet<string> = new Set(['TaskCreate', 'TaskUpdate', 'TaskGet']);
export const TASK_LIST_TOOLS: ReadonlySet<string> = new Set(['TodoWrite', 'TodoUpdate', 'TaskList', 'TodoRead']);

export function isTaskTool(toolName: string): boolean {
  return SINGLE_TASK_TOOLS.has(toolName) || TASK_LIST_TOOLS.has(toolName);
}

export function fallbackSubject(id: string): string {
  return `Task #${id}`;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a task record. The id is required; the subject falls back to "Task #id".
 */
export function parseSessionTask(dict: Record<string, unknown>): SessionTask | undefined {
  const numericId = readNumber(dict, 'id');
  const id = readString(dict, 'id') ?? (numericId !== undefined ? String(numericId) : undefined) ?? readString(dict, 'taskId');
  if (!id) return undefined;

  const status = dict.status;
  const task: SessionTask = {
    id,
    subject: readString(dict, 'subject') ?? readString(dict, 'title') ?? fallbackSubject(id),
    status: isTaskStatus(status) ? status : 'pending',
  };

  const activeForm = readString(dict, 'activeForm');
  if (activeForm !== undefined) task.activeForm = activeForm;
  const description = readString(dict, 'description');
  if (description !== undefined) task.description = description;
  const blockedBy = readStringArray(dict, 'blockedBy');
  if (blockedBy !== undefined) task.blockedBy = blockedBy;

  return task;
}

/**
 * Parse an item of a todo list. Todo items have no id; their 1-based
 * position is used instead.
 */
export function parseTodoItem(dict: Record<string, unknown>, index: number): SessionTask {
  const status = dict.status;
  const task: SessionTask = {
    id: String(index + 1),
    subject: readString(dict, 'content') ?? `Task ${index + 1}`,
    status: isTaskStatus(status) ? status : 'pending',
  };
  const activeForm = readString(dict, 'activeForm');
  if (activeForm !== undefined) task.activeForm = activeForm;
  return task;
}

export function parseTodoList(items: Record<string, unknown>[]): SessionTask[] {
  return items.map((item, index) => parseTodoItem(item, index));
}

/**
 * Single-task results come either bare or wrapped as `{ task: {...} }`
 */
export function parseTaskResult(dict: Record<string, unknown>): SessionTask | undefined {
  const nested = dict.task;
  return parseSessionTask(isRecord(nested) ? nested : dict);
}

// ============================================================================
// Reconciliation
// ============================================================================

/**
 * Apply a task or todo tool activity to the task table.
 * Returns the same table reference when nothing changes.
 */
export function reconcileTasks(tasks: TaskTable, activity: ToolActivity): TaskTable {
  if (!isTaskTool(activity.toolName)) return tasks;
  if (TASK_LIST_TOOLS.has(activity.toolName)) {
    return activity.result.kind === 'task_list' ? replaceTasks(activity.result.tasks) : tasks;
  }
  if (SINGLE_TASK_TOOLS.has(activity.toolName)) {
    return upsertTask(tasks, activity);
  }
  return tasks;
}

function replaceTasks(list: SessionTask[]): TaskTable {
  const table: TaskTable = {};
  for (const task of list) {
    if (task.status === 'deleted') continue;
    table[task.id] = task;
  }
  return table;
}

function upsertTask(tasks: TaskTable, activity: ToolActivity): TaskTable {
  const { input, result } = activity;
  const fromResult = result.kind === 'task' ? result.task : undefined;
  const id = input.taskId ?? fromResult?.id;
  if (!id) return tasks;

  const existing = tasks[id];
  // TaskUpdate results only echo what changed; the input is the source of truth
  const authoritative = activity.toolName === 'TaskUpdate' ? undefined : fromResult;

  const next: SessionTask = {
    subject: fallbackSubject(id),
    status: 'pending',
    ...existing,
    ...authoritative,
    id,
  };
  if (existing && authoritative?.subject === fallbackSubject(id)) {
    next.subject = existing.subject;
  }

  if (input.subject !== undefined) next.subject = input.subject;
  if (isTaskStatus(input.taskStatus)) next.status = input.taskStatus;
  if (input.activeForm !== undefined) next.activeForm = input.activeForm;
  if (input.description !== undefined && activity.toolName !== 'TaskGet') {
    next.description = input.description;
  }

  if (next.status === 'deleted') {
    if (!existing) return tasks;
    const remaining = { ...tasks };
    delete remaining[id];
    return remaining;
  }
  return { ...tasks, [id]: next };
}
