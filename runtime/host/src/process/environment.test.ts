import { describe, it, expect } from 'vitest';
import { buildBridgeEnvironment } from './environment.js';

describe('buildBridgeEnvironment', () => {
  it('copies only allow-listed variables and adds the nonce', () => {
    const env = buildBridgeEnvironment(
      {
        PATH: '/usr/bin',
        HOME: '/home/dev',
        ANTHROPIC_API_KEY: 'test-key',
        GITHUB_TOKEN: 'test-token',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
        TERM: 'xterm-256color',
      },
      'nonce-1'
    );

    expect(env).toEqual({
      PATH: '/usr/bin',
      HOME: '/home/dev',
      ANTHROPIC_API_KEY: 'test-key',
      TERM: 'dumb',
      NO_COLOR: '1',
      TETHER_BRIDGE_NONCE: 'nonce-1',
    });
  });

  it('works with an empty environment', () => {
    expect(buildBridgeEnvironment({}, 'n')).toEqual({
      TERM: 'dumb',
      NO_COLOR: '1',
      TETHER_BRIDGE_NONCE: 'n',
    });
  });
});
