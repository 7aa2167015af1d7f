/**
 * In-process stand-in for a bridge child process, used by tests.
 *
 * PassThrough pipes on an EventEmitter: tests write the bridge's stdout
 * lines and read back what the host wrote to stdin.
 */

import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';

export type CommandHandler = (command: Record<string, unknown>, child: FakeChild) => void;

export class FakeChild extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  readonly written: string[] = [];
  killed = false;

  private pendingInput = '';
  private handler?: CommandHandler;

  constructor(options: { failToSpawn?: boolean; onCommand?: CommandHandler } = {}) {
    super();
    this.handler = options.onCommand;
    this.stdin.on('data', (chunk: Buffer) => this.receive(chunk.toString('utf8')));
    process.nextTick(() => {
      if (options.failToSpawn) this.emit('error', new Error('spawn ENOENT'));
      else this.emit('spawn');
    });
  }

  emitLine(value: unknown): void {
    if (!this.stdout.writableEnded) this.stdout.write(`${JSON.stringify(value)}\n`);
  }

  emitRaw(text: string): void {
    if (!this.stdout.writableEnded) this.stdout.write(text);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (!this.stdout.writableEnded) this.stdout.end();
    if (!this.stderr.writableEnded) this.stderr.end();
    this.emit('exit', code, signal);
  }

  kill(): boolean {
    this.killed = true;
    this.exit(null, 'SIGTERM');
    return true;
  }

  /** Commands written to stdin so far, parsed */
  commands(): unknown[] {
    return this.written
      .join('')
      .split('\n')
      .filter(Boolean)
      .map((line): unknown => JSON.parse(line));
  }

  private receive(text: string): void {
    this.written.push(text);
    this.pendingInput += text;
    const lines = this.pendingInput.split('\n');
    this.pendingInput = lines.pop() ?? '';
    for (const line of lines) {
      if (!line) continue;
      const parsed: unknown = JSON.parse(line);
      if (this.handler && typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        this.handler(Object.fromEntries(Object.entries(parsed)), this);
      }
    }
  }
}

export async function until(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!check()) {
    if (Date.now() - started > timeoutMs) throw new Error('Timed out waiting for condition');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
