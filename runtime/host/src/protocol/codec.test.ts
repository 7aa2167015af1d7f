import { describe, it, expect } from 'vitest';
import { decodeBridgeEvent, encodeCommand } from './codec.js';

describe('decodeBridgeEvent', () => {
  it('decodes known events', () => {
    expect(decodeBridgeEvent({ type: 'token', text: 'hi' })).toEqual({
      status: 'ok',
      event: { type: 'token', text: 'hi' },
    });
    expect(decodeBridgeEvent({ type: 'turn_complete', extra: 1 })).toEqual({
      status: 'ok',
      event: { type: 'turn_complete' },
    });
  });

  it('ignores unknown types', () => {
    expect(decodeBridgeEvent({ type: 'telemetry', data: 1 })).toEqual({ status: 'unknown', type: 'telemetry' });
  });

  it('drops known types with invalid payloads', () => {
    const result = decodeBridgeEvent({ type: 'token', text: 5 });
    expect(result.status).toBe('invalid');
  });

  it('applies defaults', () => {
    expect(decodeBridgeEvent({ type: 'error' })).toEqual({
      status: 'ok',
      event: { type: 'error', message: 'Unknown error' },
    });
    expect(decodeBridgeEvent({ type: 'tool_activity', result: 'ok' })).toEqual({
      status: 'ok',
      event: { type: 'tool_activity', toolName: 'Unknown', input: {}, result: 'ok' },
    });
    expect(decodeBridgeEvent({ type: 'result' })).toEqual({
      status: 'ok',
      event: { type: 'result', text: '' },
    });
  });

  it('decodes a full result', () => {
    const decoded = decodeBridgeEvent({
      type: 'result',
      text: 'done',
      sessionId: 's1',
      usage: { inputTokens: 10, outputTokens: 5, cacheReadTokens: 2 },
      costUSD: 0.25,
      durationMs: 1200,
      contextTokens: 12,
    });
    expect(decoded).toEqual({
      status: 'ok',
      event: {
        type: 'result',
        text: 'done',
        sessionId: 's1',
        usage: { inputTokens: 10, outputTokens: 5, cacheReadTokens: 2, cacheCreationTokens: 0 },
        costUSD: 0.25,
        durationMs: 1200,
        contextTokens: 12,
      },
    });
  });

  it('requires a request id on permission requests', () => {
    expect(decodeBridgeEvent({ type: 'permission_request', toolName: 'Bash' }).status).toBe('invalid');
    expect(
      decodeBridgeEvent({ type: 'permission_request', requestId: 'r1', toolName: 'Bash', input: { command: 'ls' } })
    ).toEqual({
      status: 'ok',
      event: { type: 'permission_request', requestId: 'r1', toolName: 'Bash', input: { command: 'ls' } },
    });
  });

  it('treats values without a type as invalid', () => {
    expect(decodeBridgeEvent([1, 2]).status).toBe('invalid');
  });
});

describe('encodeCommand', () => {
  it('omits empty optional fields', () => {
    expect(
      encodeCommand({ type: 'query', prompt: 'hi', cwd: '/p', permissionMode: 'default', sessionId: '', model: '' })
    ).toBe('{"type":"query","prompt":"hi","cwd":"/p","permissionMode":"default"}\n');
  });

  it('drops blank focus instructions from compact', () => {
    expect(
      encodeCommand({ type: 'compact', sessionId: 's1', cwd: '/p', permissionMode: 'plan', focusInstructions: '  ' })
    ).toBe('{"type":"compact","sessionId":"s1","cwd":"/p","permissionMode":"plan"}\n');
  });

  it('encodes permission responses and cancel', () => {
    expect(encodeCommand({ type: 'permission_response', requestId: 'r1', behavior: 'deny', message: 'no' })).toBe(
      '{"type":"permission_response","requestId":"r1","behavior":"deny","message":"no"}\n'
    );
    expect(encodeCommand({ type: 'cancel' })).toBe('{"type":"cancel"}\n');
  });
});
