import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors.js';
import { loadHostConfig } from './env.js';

describe('loadHostConfig', () => {
  it('applies defaults', () => {
    expect(loadHostConfig({ LOG_LEVEL: 'silent' })).toEqual({
      logLevel: 'silent',
      nodePath: undefined,
      bridgeScript: undefined,
      startupRetryDelayMs: 500,
      maxConsecutiveMalformedLines: 0,
    });
  });

  it('reads and coerces overrides', () => {
    const config = loadHostConfig({
      LOG_LEVEL: 'silent',
      TETHER_NODE_PATH: ' /opt/node/bin/node ',
      TETHER_BRIDGE_SCRIPT: '',
      TETHER_STARTUP_RETRY_MS: '250',
      TETHER_MAX_MALFORMED_LINES: '20',
    });
    expect(config.nodePath).toBe('/opt/node/bin/node');
    expect(config.bridgeScript).toBeUndefined();
    expect(config.startupRetryDelayMs).toBe(250);
    expect(config.maxConsecutiveMalformedLines).toBe(20);
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      loadHostConfig({ LOG_LEVEL: 'loud', TETHER_STARTUP_RETRY_MS: '-1' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe('INVALID_CONFIG');
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]?.startsWith('LOG_LEVEL: ')).toBe(true);
      expect(caught.issues[1]?.startsWith('TETHER_STARTUP_RETRY_MS: ')).toBe(true);
    }
  });
});
