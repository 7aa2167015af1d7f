/**
 * Tests for the bridge process supervisor
 *
 * The child process is an in-process fake: PassThrough pipes on an
 * EventEmitter, so launch, authentication and exit can be scripted.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { realpath } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import type { SpawnOptions } from 'node:child_process';
import { pino } from 'pino';
import type { BridgeEvent } from '@tether/shared-types';
import { BridgeProcess, type BridgeProcessOptions } from './bridge-process.js';
import { FakeChild, until } from '../testing/fake-child.js';
import {
  AuthenticationFailedError,
  BusyError,
  InvalidWorkingDirectoryError,
  LaunchError,
  MalformedOutputError,
  ProcessTerminatedError,
  type TetherError,
} from '../errors.js';

interface Harness {
  bridge: BridgeProcess;
  children: FakeChild[];
  spawnCalls: { command: string; args: string[]; options: SpawnOptions }[];
  events: BridgeEvent[];
  failures: TetherError[];
  debug: string[];
  child: () => FakeChild;
}

function createHarness(overrides: Partial<BridgeProcessOptions> & { failToSpawn?: boolean } = {}): Harness {
  const children: FakeChild[] = [];
  const spawnCalls: Harness['spawnCalls'] = [];
  const { failToSpawn, ...options } = overrides;

  const bridge = new BridgeProcess({
    spawn: (command, args, spawnOptions) => {
      spawnCalls.push({ command, args, options: spawnOptions });
      const child = new FakeChild({ failToSpawn });
      children.push(child);
      return child;
    },
    locateNode: async () => '/usr/bin/node',
    locateScript: async () => '/opt/bridge/main.js',
    createNonce: () => 'nonce-1',
    delay: async () => undefined,
    env: { PATH: '/usr/bin', GITHUB_TOKEN: 'test-token' },
    logger: pino({ level: 'silent' }),
    ...options,
  });

  const events: BridgeEvent[] = [];
  const failures: TetherError[] = [];
  const debug: string[] = [];
  bridge.on('event', (event) => events.push(event));
  bridge.on('failure', (error) => failures.push(error));
  bridge.on('debug', (message) => debug.push(message));

  return {
    bridge,
    children,
    spawnCalls,
    events,
    failures,
    debug,
    child: () => {
      const child = children[children.length - 1];
      if (!child) throw new Error('No child spawned');
      return child;
    },
  };
}

let cwd: string;

beforeEach(async () => {
  cwd = await realpath(tmpdir());
});

function query(prompt = 'hello') {
  return { type: 'query' as const, prompt, cwd, permissionMode: 'default' as const };
}

describe('BridgeProcess', () => {
  it('launches lazily with a sanitized environment and writes the query', async () => {
    const h = createHarness();
    expect(h.bridge.isRunning).toBe(false);

    await h.bridge.send(query());

    expect(h.spawnCalls).toHaveLength(1);
    expect(h.spawnCalls[0]?.command).toBe('/usr/bin/node');
    expect(h.spawnCalls[0]?.args).toEqual(['/opt/bridge/main.js']);
    expect(h.spawnCalls[0]?.options.cwd).toBe('/opt/bridge');
    expect(h.spawnCalls[0]?.options.env).toEqual({
      PATH: '/usr/bin',
      TERM: 'dumb',
      NO_COLOR: '1',
      TETHER_BRIDGE_NONCE: 'nonce-1',
    });

    await until(() => h.child().commands().length === 1);
    expect(h.child().commands()).toEqual([{ type: 'query', prompt: 'hello', cwd, permissionMode: 'default' }]);
    expect(h.bridge.isBusy).toBe(true);
    expect(h.bridge.workingDirectory).toBe(cwd);
  });

  it('forwards events in order after the handshake and frees the slot on result', async () => {
    const h = createHarness();
    await h.bridge.send(query());
    const child = h.child();

    child.emitRaw('starting up\n');
    child.emitLine({ type: 'ready', nonce: 'nonce-1' });
    child.emitLine({ type: 'token', text: 'a' });
    child.emitLine({ type: 'future_event' });
    child.emitLine({ type: 'token', text: 'b' });
    child.emitLine({ type: 'result', text: 'ab', sessionId: 's1' });

    await until(() => h.events.length === 3);
    expect(h.events).toEqual([
      { type: 'token', text: 'a' },
      { type: 'token', text: 'b' },
      { type: 'result', text: 'ab', sessionId: 's1' },
    ]);
    expect(h.bridge.isBusy).toBe(false);
    expect(h.bridge.isAuthenticated).toBe(true);
  });

  it('rejects a second request while one is in flight', async () => {
    const h = createHarness();
    await h.bridge.send(query('first'));

    await expect(h.bridge.send(query('second'))).rejects.toBeInstanceOf(BusyError);
    await until(() => h.child().commands().length === 1);
    expect(h.child().commands()).toHaveLength(1);
  });

  it('kills the process and forwards nothing when the nonce does not match', async () => {
    const h = createHarness();
    await h.bridge.send(query());
    const child = h.child();

    child.emitLine({ type: 'ready', nonce: 'forged' });
    child.emitLine({ type: 'token', text: 'leak' });

    await until(() => h.failures.length === 1);
    expect(h.failures[0]).toBeInstanceOf(AuthenticationFailedError);
    expect(h.events).toEqual([]);
    expect(child.killed).toBe(true);
    expect(h.bridge.isRunning).toBe(false);
    expect(h.bridge.isBusy).toBe(false);
  });

  it('rejects a first message that is not ready', async () => {
    const h = createHarness();
    await h.bridge.send(query());
    h.child().emitLine({ type: 'token', text: 'early' });

    await until(() => h.failures.length === 1);
    expect(h.failures[0]).toBeInstanceOf(AuthenticationFailedError);
    expect(h.events).toEqual([]);
  });

  it('reports an exit during a request', async () => {
    const h = createHarness();
    await h.bridge.send(query());
    h.child().emitLine({ type: 'ready', nonce: 'nonce-1' });
    h.child().exit(1);

    await until(() => h.failures.length === 1);
    expect(h.failures[0]).toBeInstanceOf(ProcessTerminatedError);
    expect(h.failures[0]?.message).toBe('Bridge process exited unexpectedly (code 1)');
    expect(h.bridge.isRunning).toBe(false);
  });

  it('relaunches on the next send after an idle exit', async () => {
    const h = createHarness();
    await h.bridge.send(query());
    const first = h.child();
    first.emitLine({ type: 'ready', nonce: 'nonce-1' });
    first.emitLine({ type: 'result', text: '' });
    await until(() => h.events.length === 1);
    first.exit(0);
    await until(() => !h.bridge.isRunning);

    await h.bridge.send(query('again'));
    expect(h.failures).toEqual([]);
    expect(h.children).toHaveLength(2);
  });

  it('writes cancel and frees the slot immediately', async () => {
    const h = createHarness();
    await h.bridge.send(query());
    h.bridge.cancel();

    expect(h.bridge.isBusy).toBe(false);
    await until(() => h.child().commands().length === 2);
    expect(h.child().commands()[1]).toEqual({ type: 'cancel' });

    h.bridge.cancel();
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(h.child().commands()).toHaveLength(2);
  });

  it('never writes a request cancelled while the bridge is launching', async () => {
    const h = createHarness();
    const sending = h.bridge.send(query('delete everything'));
    h.bridge.cancel();
    await sending;

    expect(h.bridge.isBusy).toBe(false);
    expect(h.bridge.workingDirectory).toBeUndefined();
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(h.child().commands()).toEqual([]);

    await h.bridge.send(query('next'));
    await until(() => h.child().commands().length === 1);
    expect(h.child().commands()).toEqual([{ type: 'query', prompt: 'next', cwd, permissionMode: 'default' }]);
  });

  it('writes only the newer request when one replaces a cancelled launch', async () => {
    const h = createHarness();
    const first = h.bridge.send(query('first'));
    h.bridge.cancel();
    const second = h.bridge.send(query('second'));
    await Promise.all([first, second]);

    expect(h.bridge.isBusy).toBe(true);
    await until(() => h.child().commands().length === 1);
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(h.child().commands()).toEqual([{ type: 'query', prompt: 'second', cwd, permissionMode: 'default' }]);
    expect(h.children).toHaveLength(1);
  });

  it('writes permission responses with a default denial message', async () => {
    const h = createHarness();
    await h.bridge.send(query());
    h.bridge.respondToPermission('r1', true);
    h.bridge.respondToPermission('r2', false);

    await until(() => h.child().commands().length === 3);
    expect(h.child().commands().slice(1)).toEqual([
      { type: 'permission_response', requestId: 'r1', behavior: 'allow' },
      { type: 'permission_response', requestId: 'r2', behavior: 'deny', message: 'User denied permission' },
    ]);
  });

  it('discards output after shutdown', async () => {
    const h = createHarness();
    await h.bridge.send(query());
    const child = h.child();
    child.emitLine({ type: 'ready', nonce: 'nonce-1' });
    child.emitLine({ type: 'token', text: 'buffered' });
    h.bridge.shutdown();

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(h.events).toEqual([]);
    expect(h.failures).toEqual([]);
    expect(child.killed).toBe(true);
    expect(h.bridge.isBusy).toBe(false);
  });

  it('surfaces launch failures and stays idle', async () => {
    const h = createHarness({
      locateScript: async () => {
        throw new LaunchError('Bridge script not found');
      },
    });

    await expect(h.bridge.send(query())).rejects.toBeInstanceOf(LaunchError);
    expect(h.bridge.isBusy).toBe(false);
    expect(h.spawnCalls).toEqual([]);
  });

  it('wraps spawn errors in LaunchError', async () => {
    const h = createHarness({ failToSpawn: true });

    await expect(h.bridge.send(query())).rejects.toThrow('Failed to launch bridge process: spawn ENOENT');
    expect(h.bridge.isRunning).toBe(false);
  });

  it('rejects an invalid working directory without launching', async () => {
    const h = createHarness();

    await expect(h.bridge.send({ ...query(), cwd: '/definitely/not/here' })).rejects.toBeInstanceOf(
      InvalidWorkingDirectoryError
    );
    expect(h.spawnCalls).toEqual([]);
    expect(h.bridge.isBusy).toBe(false);
  });

  it('passes debug events to the debug sink', async () => {
    const h = createHarness();
    await h.bridge.send(query());
    h.child().emitLine({ type: 'ready', nonce: 'nonce-1' });
    h.child().emitLine({ type: 'debug', message: 'sdk started' });

    await until(() => h.debug.length === 1);
    expect(h.debug).toEqual(['sdk started']);
  });

  it('gives up on a process that keeps writing garbage', async () => {
    const h = createHarness({ maxConsecutiveMalformedLines: 2 });
    await h.bridge.send(query());
    h.child().emitLine({ type: 'ready', nonce: 'nonce-1' });
    h.child().emitRaw('oops\nstill oops\nnope\n');

    await until(() => h.failures.length === 1);
    expect(h.failures[0]).toBeInstanceOf(MalformedOutputError);
    expect(h.bridge.isRunning).toBe(false);
  });
});
