import type { ToolActivity } from '@tether/shared-types';
import { lastPathComponent } from '../utils.js';
import { countDiffLines } from './diff.js';

const MAX_COMMAND_LENGTH = 80;

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

function fileName(path: string | undefined): string {
  return path ? lastPathComponent(path) : 'file';
}

/**
 * One-line summary of a tool activity, used as the tool message text.
 */
export function summarizeToolActivity(activity: ToolActivity): string {
  const { toolName, input, result } = activity;

  switch (toolName) {
    case 'Bash': {
      const command = input.command ?? 'command';
      return command.length > MAX_COMMAND_LENGTH
        ? `${command.slice(0, MAX_COMMAND_LENGTH - 3)}...`
        : command;
    }
    case 'Edit':
      return `Edit ${fileName(input.filePath)}`;
    case 'Write':
      return `Write ${fileName(input.filePath)}`;
    case 'Read':
      return `Read ${fileName(input.filePath)}`;
    case 'Glob': {
      const count = result.kind === 'search' ? (result.fileCount ?? 0) : 0;
      return `Search ${input.pattern ?? 'files'} — ${plural(count, 'file')}`;
    }
    case 'Grep': {
      const count = result.kind === 'search' ? (result.fileCount ?? 0) : 0;
      return `Grep /${input.pattern ?? 'pattern'}/ — ${plural(count, 'match', 'matches')}`;
    }
    case 'TaskCreate': {
      const subject = input.subject ?? (result.kind === 'task' ? result.task?.subject : undefined) ?? 'task';
      return `Created task: ${subject}`;
    }
    case 'TaskUpdate': {
      const task = result.kind === 'task' ? result.task : undefined;
      const status = input.taskStatus ?? task?.status ?? 'updated';
      return `Task #${input.taskId ?? task?.id ?? '?'} → ${status}`;
    }
    case 'TaskGet': {
      const task = result.kind === 'task' ? result.task : undefined;
      return `Fetched task #${input.taskId ?? task?.id ?? '?'}`;
    }
    case 'TodoWrite': {
      const tasks = result.kind === 'task_list' ? result.tasks : [];
      const active = tasks.find((t) => t.status === 'in_progress');
      return active ? active.subject : `Updated ${plural(tasks.length, 'task')}`;
    }
    case 'TodoUpdate': {
      const count = result.kind === 'task_list' ? result.tasks.length : 0;
      return `Updated ${plural(count, 'task')}`;
    }
    case 'TaskList':
    case 'TodoRead': {
      const count = result.kind === 'task_list' ? result.tasks.length : 0;
      return `Listed ${plural(count, 'task')}`;
    }
    default:
      return toolName;
  }
}

/**
 * Secondary summary line, e.g. "2 added, 1 removed". Undefined when there
 * is nothing worth showing.
 */
export function detailSummary(activity: ToolActivity): string | undefined {
  const { result } = activity;

  if (result.kind === 'edit') {
    const { added, removed } = countDiffLines(result.diffLines);
    const parts: string[] = [];
    if (added > 0) parts.push(`${added} added`);
    if (removed > 0) parts.push(`${removed} removed`);
    return parts.length > 0 ? parts.join(', ') : undefined;
  }

  if (result.kind === 'shell' && result.interrupted) {
    return 'Interrupted';
  }

  return undefined;
}
