import { describe, it, expect } from 'vitest';
import type { Message, ToolActivity } from '@tether/shared-types';
import { createInitialSessionState, type SessionState } from '@tether/state';
import { TranscriptPrinter, formatCostLine, formatToolLine } from './transcript-printer.js';

function message(id: string, role: Message['role'], text: string, toolActivity?: ToolActivity): Message {
  return { id, role, text, timestamp: 1000, toolActivity };
}

function stateWith(...messages: Message[]): SessionState {
  return { ...createInitialSessionState(), messages };
}

const listFiles: ToolActivity = {
  id: 'tool-1',
  toolName: 'Bash',
  input: { command: 'ls', raw: { command: 'ls' } },
  result: { kind: 'shell', stdout: 'a.txt', interrupted: false },
};

function createSink() {
  const chunks: string[] = [];
  return { sink: { write: (chunk: string) => chunks.push(chunk) }, output: () => chunks.join('') };
}

describe('TranscriptPrinter', () => {
  it('streams assistant text and puts tool lines on their own line', () => {
    const { sink, output } = createSink();
    const printer = new TranscriptPrinter(sink);
    const user = message('u1', 'user', 'hi');

    printer.render(stateWith(user, message('a1', 'assistant', '')));
    printer.render(stateWith(user, message('a1', 'assistant', 'Hel')));
    printer.render(stateWith(user, message('a1', 'assistant', 'Hello')));
    printer.render(stateWith(user, message('a1', 'assistant', 'Hello'), message('t1', 'tool', 'ls', listFiles)));
    printer.render(
      stateWith(
        user,
        message('a1', 'assistant', 'Hello'),
        message('t1', 'tool', 'ls', listFiles),
        message('a2', 'assistant', 'done')
      )
    );
    printer.finish();

    expect(output()).toBe('Hello\n→ ls\ndone\n');
  });

  it('rewrites replaced text on a fresh line', () => {
    const { sink, output } = createSink();
    const printer = new TranscriptPrinter(sink);

    printer.render(stateWith(message('a1', 'assistant', 'abc')));
    printer.render(stateWith(message('a1', 'assistant', 'xyz')));

    expect(output()).toBe('abc\nxyz');
  });

  it('skips history before the start index', () => {
    const { sink, output } = createSink();
    const printer = new TranscriptPrinter(sink, 2);
    const history = [message('u0', 'user', 'earlier'), message('a0', 'assistant', 'old reply')];

    printer.render(stateWith(...history, message('u1', 'user', 'now'), message('s1', 'system', 'Error: boom')));

    expect(output()).toBe('Error: boom\n');
  });

  it('prints system messages once', () => {
    const { sink, output } = createSink();
    const printer = new TranscriptPrinter(sink);
    const state = stateWith(message('s1', 'system', 'Conversation compacted'));

    printer.render(state);
    printer.render(state);

    expect(output()).toBe('Conversation compacted\n');
  });
});

describe('formatToolLine', () => {
  it('adds the detail summary when there is one', () => {
    expect(
      formatToolLine({
        id: 'tool-2',
        toolName: 'Edit',
        input: { filePath: '/p/main.ts', raw: {} },
        result: {
          kind: 'edit',
          diffLines: [
            { kind: 'removal', text: 'a', lineNumber: 1 },
            { kind: 'addition', text: 'b', lineNumber: 1 },
          ],
        },
      })
    ).toBe('→ Edit main.ts (1 added, 1 removed)');
    expect(formatToolLine(listFiles)).toBe('→ ls');
  });
});

describe('formatCostLine', () => {
  it('includes token counts when usage is known', () => {
    expect(formatCostLine(createInitialSessionState())).toBe('Total cost: $0.0000');
    expect(
      formatCostLine({
        ...createInitialSessionState(),
        totalCost: 0.0234,
        lastUsage: {
          inputTokens: 10,
          outputTokens: 5,
          cacheReadTokens: 2,
          cacheCreationTokens: 1,
          costUSD: 0.0234,
          durationMs: 900,
          contextTokens: 13,
        },
      })
    ).toBe('Total cost: $0.0234 (13 in, 5 out)');
  });
});
