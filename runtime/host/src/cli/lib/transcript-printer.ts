/**
 * Transcript printer - renders session state to a terminal stream
 *
 * Called on every state change. Assistant text is written as it streams,
 * tool and system messages once, each on its own line.
 */

import { totalInputTokens, type Message, type ToolActivity } from '@tether/shared-types';
import { detailSummary, summarizeToolActivity, type SessionState } from '@tether/state';

export interface TextSink {
  write(chunk: string): unknown;
}

export function formatToolLine(activity: ToolActivity): string {
  const detail = detailSummary(activity);
  const summary = summarizeToolActivity(activity);
  return detail ? `→ ${summary} (${detail})` : `→ ${summary}`;
}

export function formatCostLine(state: SessionState): string {
  const cost = `Total cost: $${state.totalCost.toFixed(4)}`;
  const usage = state.lastUsage;
  if (!usage) return cost;
  return `${cost} (${totalInputTokens(usage)} in, ${usage.outputTokens} out)`;
}

export class TranscriptPrinter {
  private readonly out: TextSink;
  private readonly fromIndex: number;
  /** Text already written, by message id */
  private readonly written = new Map<string, string>();
  private atLineStart = true;

  /**
   * @param fromIndex - messages before this index are history and not printed
   */
  constructor(out: TextSink, fromIndex = 0) {
    this.out = out;
    this.fromIndex = fromIndex;
  }

  render(state: SessionState): void {
    for (const message of state.messages.slice(this.fromIndex)) {
      if (message.role === 'user') continue;
      if (message.role === 'assistant') {
        this.renderAssistant(message);
        continue;
      }
      if (this.written.has(message.id)) continue;

      this.writeLine(message.toolActivity ? formatToolLine(message.toolActivity) : message.text);
      this.written.set(message.id, message.text);
    }
  }

  /** End the current line, if any */
  finish(): void {
    if (!this.atLineStart) this.write('\n');
  }

  private renderAssistant(message: Message): void {
    const previous = this.written.get(message.id) ?? '';
    const text = message.text;
    if (text === previous) return;

    if (text.startsWith(previous)) {
      if (previous === '') this.finish();
      this.write(text.slice(previous.length));
    } else {
      // Replaced by set_text; start over on a fresh line
      this.finish();
      this.write(text);
    }
    this.written.set(message.id, text);
  }

  private writeLine(line: string): void {
    this.finish();
    this.write(`${line}\n`);
  }

  private write(chunk: string): void {
    if (!chunk) return;
    this.out.write(chunk);
    this.atLineStart = chunk.endsWith('\n');
  }
}
