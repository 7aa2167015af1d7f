import { describe, it, expect } from 'vitest';
import { SdkTranslator } from './sdk-translator.js';

const delta = (text: string) => ({
  type: 'stream_event',
  event: { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text } },
});

const toolUse = (id: string, name: string, input: Record<string, unknown>) => ({ type: 'tool_use', id, name, input });

const assistant = (...content: unknown[]) => ({ type: 'assistant', message: { role: 'assistant', content } });

describe('SdkTranslator', () => {
  it('turns text deltas into tokens and ignores other stream events', () => {
    const translator = new SdkTranslator();
    expect(translator.translate(delta('hi'))).toEqual([{ type: 'token', text: 'hi' }]);
    expect(translator.translate(delta(''))).toEqual([]);
    expect(translator.translate({ type: 'stream_event', event: { type: 'message_start' } })).toEqual([]);
  });

  it('joins assistant text blocks with a blank line', () => {
    const translator = new SdkTranslator();
    expect(
      translator.translate(assistant({ type: 'text', text: 'one' }, toolUse('t1', 'Read', {}), { type: 'text', text: 'two' }))
    ).toEqual([{ type: 'set_text', text: 'one\n\ntwo' }]);
    expect(translator.translate(assistant(toolUse('t2', 'Read', {})))).toEqual([]);
  });

  it('pairs auto-approved tool results with tool_use blocks in order', () => {
    const translator = new SdkTranslator();
    translator.translate(assistant(toolUse('t1', 'Glob', { pattern: '*.ts' })));
    // Snapshots repeat earlier blocks
    translator.translate(assistant(toolUse('t1', 'Glob', { pattern: '*.ts' }), toolUse('t2', 'Read', { file_path: 'a.ts' })));

    expect(translator.translate({ type: 'user', tool_use_result: { numFiles: 1 } })).toEqual([
      { type: 'turn_complete' },
      { type: 'tool_activity', toolName: 'Glob', input: { pattern: '*.ts' }, result: { numFiles: 1 } },
    ]);
    expect(translator.translate({ type: 'user', tool_use_result: 'contents' })).toEqual([
      { type: 'turn_complete' },
      { type: 'tool_activity', toolName: 'Read', input: { file_path: 'a.ts' }, result: 'contents' },
    ]);
    expect(translator.translate({ type: 'user', tool_use_result: 'orphan' })).toEqual([
      { type: 'turn_complete' },
      { type: 'tool_activity', toolName: 'Unknown', input: {}, result: 'orphan' },
    ]);
  });

  it('prefers the tool seen by the permission callback', () => {
    const translator = new SdkTranslator();
    translator.translate(assistant(toolUse('t1', 'Bash', { command: 'ls' }), toolUse('t2', 'Read', { file_path: 'b' })));
    translator.noteToolUse('Bash', { command: 'ls -la' });

    expect(translator.translate({ type: 'user', tool_use_result: 'out' })[1]).toEqual({
      type: 'tool_activity',
      toolName: 'Bash',
      input: { command: 'ls -la' },
      result: 'out',
    });
    expect(translator.translate({ type: 'user', tool_use_result: 'b' })[1]).toEqual({
      type: 'tool_activity',
      toolName: 'Read',
      input: { file_path: 'b' },
      result: 'b',
    });
  });

  it('ignores user messages without a tool result and unknown messages', () => {
    const translator = new SdkTranslator();
    expect(translator.translate({ type: 'user', message: { role: 'user', content: 'hi' } })).toEqual([]);
    expect(translator.translate({ type: 'system', subtype: 'init' })).toEqual([]);
    expect(translator.translate('garbage')).toEqual([]);
  });

  it('maps results with usage and context size', () => {
    const translator = new SdkTranslator();
    expect(
      translator.translate({
        type: 'result',
        subtype: 'success',
        result: 'done',
        session_id: 's1',
        total_cost_usd: 0.05,
        duration_ms: 1500,
        usage: { input_tokens: 10, output_tokens: 4, cache_read_input_tokens: 100, cache_creation_input_tokens: 5 },
      })
    ).toEqual([
      {
        type: 'result',
        text: 'done',
        sessionId: 's1',
        usage: { inputTokens: 10, outputTokens: 4, cacheReadTokens: 100, cacheCreationTokens: 5 },
        costUSD: 0.05,
        durationMs: 1500,
        contextTokens: 115,
      },
    ]);
  });

  it('fills zeros for a result without usage', () => {
    const translator = new SdkTranslator();
    expect(translator.translate({ type: 'result', subtype: 'error_during_execution' })).toEqual([
      {
        type: 'result',
        text: '',
        usage: { inputTokens: 0, outputTokens: 0, cacheReadTokens: 0, cacheCreationTokens: 0 },
        costUSD: 0,
        durationMs: 0,
        contextTokens: 0,
      },
    ]);
  });
});
