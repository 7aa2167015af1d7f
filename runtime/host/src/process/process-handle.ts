import type { SpawnOptions } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { nodeStreamToWebStream } from './stream-converter.js';

/**
 * The parts of a ChildProcess the supervisor relies on.
 * Tests substitute an in-process fake.
 */
export interface ChildProcessLike {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'spawn', listener: () => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcessLike;

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProcessHandle {
  pid?: number;
  stdout: ReadableStream<string>;
  stderr: ReadableStream<string>;
  stdin: {
    /** Best-effort synchronous write; false once stdin is gone */
    writeText: (text: string) => boolean;
    close: () => void;
  };
  /** Resolves when the process exits or fails to start */
  wait: () => Promise<ExitStatus>;
  /** Resolves once spawned, rejects when spawning fails */
  spawned: Promise<void>;
  kill: () => void;
}

function emptyStream(): ReadableStream<string> {
  return new ReadableStream<string>({
    start(controller) {
      controller.close();
    },
  });
}

/**
 * Wrap a spawned child in a handle with Web streams and a line-oriented stdin
 */
export function createProcessHandle(
  child: ChildProcessLike,
  onStdinError: (error: Error) => void
): ProcessHandle {
  const stdin = {
    writeText: (text: string): boolean => {
      const input = child.stdin;
      if (!input || input.destroyed || input.writableEnded) return false;
      input.write(text);
      return true;
    },
    close: (): void => {
      const input = child.stdin;
      if (input && !input.writableEnded) input.end();
    },
  };

  // Writes after the child has gone surface as EPIPE on stdin
  child.stdin?.on('error', onStdinError);

  let settleSpawn: { resolve: () => void; reject: (error: Error) => void } | undefined;
  const spawned = new Promise<void>((resolve, reject) => {
    settleSpawn = { resolve, reject };
  });

  let resolveExit: ((status: ExitStatus) => void) | undefined;
  const waitPromise = new Promise<ExitStatus>((resolve) => {
    resolveExit = resolve;
  });

  child.once('spawn', () => settleSpawn?.resolve());
  child.once('exit', (code, signal) => resolveExit?.({ code, signal }));
  child.on('error', (error) => {
    settleSpawn?.reject(error);
    resolveExit?.({ code: 1, signal: null });
  });

  return {
    pid: child.pid,
    stdout: child.stdout ? nodeStreamToWebStream(child.stdout) : emptyStream(),
    stderr: child.stderr ? nodeStreamToWebStream(child.stderr) : emptyStream(),
    stdin,
    wait: () => waitPromise,
    spawned,
    kill: () => {
      child.kill('SIGTERM');
    },
  };
}
