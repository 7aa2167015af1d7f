/**
 * Compact tool inputs for permission prompts
 */

const MAX_TEXT_LENGTH = 200;
const MAX_GENERIC_FIELDS = 5;

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function clip(value: unknown): string {
  return text(value).slice(0, MAX_TEXT_LENGTH);
}

/**
 * Reduce a tool input to the fields a user needs to decide on it.
 * Unknown tools keep their first few fields, long strings clipped.
 */
export function summarizeInput(toolName: string, input: Record<string, unknown>): Record<string, unknown> {
  const summary: Record<string, unknown> = {};

  switch (toolName) {
    case 'Bash':
      summary.command = text(input.command);
      if (input.description) summary.description = input.description;
      break;
    case 'Edit':
      summary.file_path = text(input.file_path);
      summary.old_string = clip(input.old_string);
      summary.new_string = clip(input.new_string);
      break;
    case 'Write':
      summary.file_path = text(input.file_path);
      summary.contentLength = typeof input.content === 'string' ? input.content.length : 0;
      break;
    case 'Read':
      summary.file_path = text(input.file_path);
      break;
    case 'Glob':
      summary.pattern = text(input.pattern);
      if (input.path) summary.path = input.path;
      break;
    case 'Grep':
      summary.pattern = text(input.pattern);
      if (input.path) summary.path = input.path;
      if (input.glob) summary.glob = input.glob;
      break;
    default:
      for (const [key, value] of Object.entries(input).slice(0, MAX_GENERIC_FIELDS)) {
        summary[key] = typeof value === 'string' ? value.slice(0, MAX_TEXT_LENGTH) : JSON.stringify(value);
      }
  }

  return summary;
}
