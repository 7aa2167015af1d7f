/**
 * Tool-Result Interpreters
 *
 * Pure projections from a raw tool payload to a display-ready result.
 * Dispatch is a lookup on the tool name; tools without an entry fall back
 * to `passthrough`, so new tool kinds from the agent degrade to a generic
 * display instead of failing.
 */

import type { ToolActivityInput, ToolActivityResult } from '@tether/shared-types';
import { isRecord, readBoolean, readNumber, readRecordArray, readString, readStringArray } from '../utils.js';
import { diffFromEdit } from './diff.js';
import { parseSessionTask, parseTaskResult, parseTodoList } from './tasks.js';

type ResultInterpreter = (payload: Record<string, unknown>) => ToolActivityResult;

// ============================================================================
// Input
// ============================================================================

export function interpretToolInput(raw: Record<string, unknown>): ToolActivityInput {
  return {
    filePath: readString(raw, 'file_path'),
    command: readString(raw, 'command'),
    description: readString(raw, 'description'),
    oldString: readString(raw, 'old_string'),
    newString: readString(raw, 'new_string'),
    content: readString(raw, 'content'),
    pattern: readString(raw, 'pattern'),
    path: readString(raw, 'path'),
    subject: readString(raw, 'subject'),
    taskId: readString(raw, 'taskId'),
    taskStatus: readString(raw, 'status'),
    activeForm: readString(raw, 'activeForm'),
    raw,
  };
}

// ============================================================================
// Result
// ============================================================================

const interpretShell: ResultInterpreter = (payload) => ({
  kind: 'shell',
  stdout: readString(payload, 'stdout'),
  stderr: readString(payload, 'stderr'),
  interrupted: readBoolean(payload, 'interrupted') ?? false,
});

const interpretEdit: ResultInterpreter = (payload) => {
  const oldString = readString(payload, 'oldString') ?? '';
  const newString = readString(payload, 'newString') ?? '';
  if (!oldString && !newString) return { kind: 'edit', diffLines: [] };
  return { kind: 'edit', diffLines: diffFromEdit(oldString, newString) };
};

const interpretRead: ResultInterpreter = (payload) => {
  const file = payload.file;
  const content = isRecord(file) ? readString(file, 'content') : readString(payload, 'content');
  return { kind: 'file', content };
};

const interpretSearch: ResultInterpreter = (payload) => ({
  kind: 'search',
  filenames: readStringArray(payload, 'filenames') ?? [],
  fileCount: readNumber(payload, 'numFiles'),
});

const interpretTask: ResultInterpreter = (payload) => ({
  kind: 'task',
  task: parseTaskResult(payload),
});

const interpretTodoWrite: ResultInterpreter = (payload) => {
  const todos = readRecordArray(payload.newTodos);
  return todos ? { kind: 'task_list', tasks: parseTodoList(todos) } : { kind: 'passthrough', raw: payload };
};

const interpretTaskList: ResultInterpreter = (payload) => {
  const tasks = readRecordArray(payload.tasks);
  if (tasks) {
    return { kind: 'task_list', tasks: tasks.flatMap((t) => parseSessionTask(t) ?? []) };
  }
  return interpretTodoWrite(payload);
};

const RESULT_INTERPRETERS: ReadonlyMap<string, ResultInterpreter> = new Map([
  ['Bash', interpretShell],
  ['Edit', interpretEdit],
  ['Read', interpretRead],
  ['Write', () => ({ kind: 'write' })],
  ['Glob', interpretSearch],
  ['Grep', interpretSearch],
  ['TaskCreate', interpretTask],
  ['TaskUpdate', interpretTask],
  ['TaskGet', interpretTask],
  ['TodoWrite', interpretTodoWrite],
  ['TodoUpdate', interpretTodoWrite],
  ['TaskList', interpretTaskList],
  ['TodoRead', interpretTaskList],
]);

/**
 * Interpret a raw tool result.
 *
 * - Plain strings become a `text` result regardless of the tool
 * - Task listings may arrive as a bare array
 * - Anything else that is not an object, or any unknown tool, passes through
 */
export function interpretToolResult(toolName: string, raw: unknown): ToolActivityResult {
  if (typeof raw === 'string') {
    return { kind: 'text', text: raw };
  }

  if (Array.isArray(raw) && (toolName === 'TaskList' || toolName === 'TodoRead')) {
    const items = readRecordArray(raw) ?? [];
    return { kind: 'task_list', tasks: items.flatMap((t) => parseSessionTask(t) ?? []) };
  }

  const interpreter = RESULT_INTERPRETERS.get(toolName);
  if (!interpreter || !isRecord(raw)) {
    return { kind: 'passthrough', raw };
  }
  return interpreter(raw);
}
