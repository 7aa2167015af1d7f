import { describe, it, expect } from 'vitest';
import { createDefaultSettings } from '@tether/shared-types';
import { ConfigError } from '../../errors.js';
import { parseAskOptions, resumeSnapshot } from './ask.js';

describe('parseAskOptions', () => {
  it('fills defaults', () => {
    expect(parseAskOptions({ cwd: '/project', permissionMode: 'default' })).toEqual({
      cwd: '/project',
      permissionMode: 'default',
      systemPrompt: '',
      yes: false,
    });
  });

  it('rejects an unknown permission mode', () => {
    expect(() => parseAskOptions({ cwd: '/project', permissionMode: 'yolo' })).toThrow(ConfigError);
  });
});

describe('resumeSnapshot', () => {
  it('carries the continuation token and no history', () => {
    const settings = createDefaultSettings('/project');
    expect(resumeSnapshot('s1', settings, 1000)).toEqual({
      version: 1,
      id: 's1',
      name: 'Resumed session',
      createdAt: 1000,
      settings,
      messages: [],
      sessionId: 's1',
      totalCost: 0,
      tasks: {},
    });
  });
});
