import { describe, it, expect } from 'vitest';
import { realpath } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { buildQueryOptions, buildSystemPrompt, resolveWorkingDirectory, workingDirectoryPreamble } from './query-options.js';

describe('buildSystemPrompt', () => {
  it('prefixes the working directory preamble', () => {
    expect(workingDirectoryPreamble('/p')).toBe(
      'Your working directory is: /p\n' +
        'All file paths should be relative to or within this directory unless the user explicitly specifies an absolute path elsewhere.'
    );
    expect(buildSystemPrompt('/p', 'Be brief')).toBe(`${workingDirectoryPreamble('/p')}\n\nBe brief`);
    expect(buildSystemPrompt('/p', '   ')).toBe(workingDirectoryPreamble('/p'));
    expect(buildSystemPrompt('/p')).toBe(workingDirectoryPreamble('/p'));
  });
});

describe('resolveWorkingDirectory', () => {
  it('canonicalizes existing directories', async () => {
    const tmp = await realpath(tmpdir());
    expect(await resolveWorkingDirectory(tmpdir(), '/')).toBe(tmp);
  });

  it('falls back for missing paths and files', async () => {
    expect(await resolveWorkingDirectory('/definitely/not/here', '/fallback')).toBe('/fallback');
    expect(await resolveWorkingDirectory(fileURLToPath(import.meta.url), '/fallback')).toBe('/fallback');
  });
});

describe('buildQueryOptions', () => {
  const canUseTool = async () => ({ behavior: 'deny' as const, message: 'no' });

  it('sets resume and model only when given', () => {
    const abortController = new AbortController();
    const options = buildQueryOptions({
      command: { type: 'query', prompt: 'hi', cwd: '/p', permissionMode: 'plan', sessionId: 's1', model: 'test-model' },
      cwd: '/p',
      canUseTool,
      abortController,
    });
    expect(options.cwd).toBe('/p');
    expect(options.permissionMode).toBe('plan');
    expect(options.resume).toBe('s1');
    expect(options.model).toBe('test-model');
    expect(options.includePartialMessages).toBe(true);
    expect(options.abortController).toBe(abortController);

    const bare = buildQueryOptions({
      command: { type: 'query', prompt: 'hi', cwd: '/p', permissionMode: 'default', sessionId: '' },
      cwd: '/p',
      canUseTool,
      abortController,
    });
    expect('resume' in bare).toBe(false);
    expect('model' in bare).toBe(false);
  });
});
