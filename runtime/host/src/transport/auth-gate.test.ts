import { describe, it, expect } from 'vitest';
import { AuthGate } from './auth-gate.js';

describe('AuthGate', () => {
  it('opens on a ready with the launch nonce', () => {
    const gate = new AuthGate('nonce-1');
    expect(gate.inspect({ type: 'ready', nonce: 'nonce-1' })).toBe('authenticated');
    expect(gate.isAuthenticated).toBe(true);
    expect(gate.inspect({ type: 'token', text: 'x' })).toBe('forward');
  });

  it('skips values without a type before the handshake', () => {
    const gate = new AuthGate('nonce-1');
    expect(gate.inspect(42)).toBe('skip');
    expect(gate.inspect({ hello: 'world' })).toBe('skip');
    expect(gate.inspect({ type: 'ready', nonce: 'nonce-1' })).toBe('authenticated');
  });

  it('rejects a wrong nonce and stays closed', () => {
    const gate = new AuthGate('nonce-1');
    expect(gate.inspect({ type: 'ready', nonce: 'nonce-2' })).toBe('rejected');
    expect(gate.inspect({ type: 'ready', nonce: 'nonce-1' })).toBe('rejected');
    expect(gate.isAuthenticated).toBe(false);
  });

  it('rejects any other first message', () => {
    const gate = new AuthGate('nonce-1');
    expect(gate.inspect({ type: 'token', text: 'early' })).toBe('rejected');
  });

  it('rejects a missing nonce', () => {
    expect(new AuthGate('nonce-1').inspect({ type: 'ready' })).toBe('rejected');
  });
});
