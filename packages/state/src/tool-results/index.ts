import type { ToolActivity } from '@tether/shared-types';
import { interpretToolInput, interpretToolResult } from './interpret.js';

export { interpretToolInput, interpretToolResult } from './interpret.js';
export { diffFromEdit, countDiffLines } from './diff.js';
export { summarizeToolActivity, detailSummary } from './summary.js';
export {
  SINGLE_TASK_TOOLS,
  TASK_LIST_TOOLS,
  isTaskTool,
  fallbackSubject,
  parseSessionTask,
  parseTodoItem,
  parseTodoList,
  parseTaskResult,
  reconcileTasks,
} from './tasks.js';

/**
 * Build a tool activity from a raw `tool_activity` payload
 */
export function interpretToolActivity(
  id: string,
  toolName: string,
  input: Record<string, unknown>,
  result: unknown
): ToolActivity {
  return {
    id,
    toolName,
    input: interpretToolInput(input),
    result: interpretToolResult(toolName, result),
  };
}
