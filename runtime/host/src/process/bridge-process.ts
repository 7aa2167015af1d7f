/**
 * Bridge Process - Supervises one bridge child process
 *
 * Owns launch, the authenticated stdout read loop, command writes and the
 * single in-flight request slot. The process is started lazily and never
 * restarted on its own: after a failure the next `send` launches a fresh one.
 *
 * Events:
 * - `event` - a decoded bridge event from an authenticated process, in order
 * - `failure` - launch, authentication, exit or malformed-output errors
 * - `debug` - diagnostics from the bridge's `debug` events
 */

import { EventEmitter } from 'node:events';
import { randomUUID } from 'node:crypto';
import { spawn as nodeSpawn } from 'node:child_process';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import type { BridgeCommand, BridgeEvent, RequestCommand } from '@tether/shared-types';
import { createLogger } from '../config/logger.js';
import {
  AuthenticationFailedError,
  BusyError,
  LaunchError,
  ProcessTerminatedError,
  TetherError,
  errorMessage,
} from '../errors.js';
import { decodeBridgeEvent, encodeCommand } from '../protocol/codec.js';
import { AuthGate } from '../transport/auth-gate.js';
import { LineFramer } from '../transport/line-framer.js';
import { readJsonLines } from '../transport/line-transport.js';
import { buildBridgeEnvironment } from './environment.js';
import { bridgeLaunchArgs, findBridgeScript, findNodeInterpreter } from './locate.js';
import { createProcessHandle, type ExitStatus, type ProcessHandle, type SpawnFn } from './process-handle.js';
import { canonicalizeDirectory } from './working-directory.js';

export interface BridgeProcessEvents {
  event: (event: BridgeEvent) => void;
  failure: (error: TetherError) => void;
  debug: (message: string) => void;
}

export interface BridgeProcessOptions {
  nodePath?: string;
  bridgeScript?: string;
  startupRetryDelayMs?: number;
  /** 0 = unbounded */
  maxConsecutiveMalformedLines?: number;
  /** Ambient environment the sanitized child environment is drawn from */
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnFn;
  locateNode?: () => Promise<string>;
  locateScript?: () => Promise<string>;
  createNonce?: () => string;
  delay?: (ms: number) => Promise<unknown>;
  logger?: Logger;
}

interface RunningProcess {
  handle: ProcessHandle;
  gate: AuthGate;
  generation: number;
}

const DEFAULT_STARTUP_RETRY_MS = 500;
const DENIED_MESSAGE = 'User denied permission';

export class BridgeProcess extends EventEmitter {
  private readonly options: BridgeProcessOptions;
  private readonly log: Logger;
  private readonly spawnFn: SpawnFn;

  private running?: RunningProcess;
  private starting?: Promise<void>;
  /** Bumped on every launch and shutdown; output from older generations is discarded */
  private generation = 0;
  private inFlight = false;
  /** Bumped by every send, cancel and shutdown; a send that is no longer current never writes */
  private requestSeq = 0;
  private turnDirectory?: string;

  constructor(options: BridgeProcessOptions = {}) {
    super();
    this.options = options;
    this.log = options.logger?.child({ component: 'bridge-process' }) ?? createLogger({ component: 'bridge-process' });
    this.spawnFn = options.spawn ?? nodeSpawn;
  }

  // ==========================================================================
  // Typed events
  // ==========================================================================

  override emit<K extends keyof BridgeProcessEvents>(
    eventType: K,
    ...args: Parameters<BridgeProcessEvents[K]>
  ): boolean {
    return super.emit(eventType, ...args);
  }

  override on<K extends keyof BridgeProcessEvents>(eventType: K, listener: BridgeProcessEvents[K]): this {
    return super.on(eventType, listener);
  }

  override once<K extends keyof BridgeProcessEvents>(eventType: K, listener: BridgeProcessEvents[K]): this {
    return super.once(eventType, listener);
  }

  override off<K extends keyof BridgeProcessEvents>(eventType: K, listener: BridgeProcessEvents[K]): this {
    return super.off(eventType, listener);
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get isRunning(): boolean {
    return this.running !== undefined;
  }

  get isBusy(): boolean {
    return this.inFlight;
  }

  get isAuthenticated(): boolean {
    return this.running?.gate.isAuthenticated ?? false;
  }

  /** Canonical directory of the in-flight request */
  get workingDirectory(): string | undefined {
    return this.turnDirectory;
  }

  get pid(): number | undefined {
    return this.running?.handle.pid;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Launch the bridge. Does nothing while a process is running.
   */
  async start(): Promise<void> {
    if (this.running) return;
    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = undefined;
      });
    }
    return this.starting;
  }

  private async launch(): Promise<void> {
    const nodePath = await (this.options.locateNode ?? (() => findNodeInterpreter({ configuredPath: this.options.nodePath })))();
    const scriptPath = await (this.options.locateScript ?? (() => findBridgeScript({ configuredPath: this.options.bridgeScript })))();

    const nonce = (this.options.createNonce ?? randomUUID)();
    const generation = ++this.generation;
    const args = bridgeLaunchArgs(scriptPath);

    this.log.info({ nodePath, scriptPath }, 'Launching bridge process');

    let handle: ProcessHandle;
    try {
      const child = this.spawnFn(nodePath, args, {
        cwd: dirname(scriptPath),
        env: buildBridgeEnvironment(this.options.env ?? process.env, nonce),
        stdio: ['pipe', 'pipe', 'pipe'],
      });
      handle = createProcessHandle(child, (error) => {
        this.log.debug({ error: error.message }, 'Bridge stdin error');
      });
      await handle.spawned;
    } catch (error) {
      throw new LaunchError(`Failed to launch bridge process: ${errorMessage(error)}`, { cause: error });
    }

    if (generation !== this.generation) {
      // Shut down while launching
      handle.stdin.close();
      handle.kill();
      return;
    }

    const running: RunningProcess = { handle, gate: new AuthGate(nonce), generation };
    this.running = running;
    this.log.info({ pid: handle.pid }, 'Bridge process started');

    const pumped = this.pumpStdout(running);
    this.drainStderr(running).catch((error: unknown) => {
      this.log.debug({ error: errorMessage(error) }, 'Bridge stderr closed with error');
    });
    Promise.all([handle.wait(), pumped])
      .then(([status]) => this.handleExit(running, status))
      .catch((error: unknown) => {
        this.log.error({ error: errorMessage(error) }, 'Bridge exit handling failed');
      });
  }

  /**
   * Stop the process and reset all lifecycle state. Output still buffered
   * from the stopped process is discarded.
   */
  shutdown(): void {
    this.generation++;
    this.requestSeq++;
    this.inFlight = false;
    this.turnDirectory = undefined;

    const running = this.running;
    this.running = undefined;
    if (!running) return;

    this.log.info({ pid: running.handle.pid }, 'Shutting down bridge process');
    running.handle.stdin.close();
    running.handle.kill();
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Send a query or compact request. Launches the bridge if needed.
   *
   * @throws BusyError when a request is already in flight
   * @throws InvalidWorkingDirectoryError when the request's cwd is unusable
   * @throws LaunchError when the bridge cannot be started
   */
  async send(command: RequestCommand): Promise<void> {
    if (this.inFlight) throw new BusyError();
    this.inFlight = true;
    const request = ++this.requestSeq;

    try {
      const cwd = await canonicalizeDirectory(command.cwd);
      if (request !== this.requestSeq) return this.abandon(command);
      const wire: RequestCommand = { ...command, cwd };
      this.turnDirectory = cwd;

      if (!this.running) await this.start();
      if (request !== this.requestSeq) return this.abandon(command);
      if (this.write(wire)) return;

      // A freshly launched process may not be ready for input yet
      await (this.options.delay ?? sleep)(this.options.startupRetryDelayMs ?? DEFAULT_STARTUP_RETRY_MS);
      if (!this.running) await this.start();
      if (request !== this.requestSeq) return this.abandon(command);
      if (this.write(wire)) return;

      throw new LaunchError('Bridge process is not accepting input');
    } catch (error) {
      if (request !== this.requestSeq) {
        this.log.debug({ type: command.type, error: errorMessage(error) }, 'Cancelled request failed before it was written');
        return;
      }
      this.inFlight = false;
      this.turnDirectory = undefined;
      throw error;
    }
  }

  /** The request was cancelled while launching; the slot now belongs to whoever bumped it */
  private abandon(command: RequestCommand): void {
    this.log.debug({ type: command.type }, 'Request cancelled before it was written');
  }

  respondToPermission(requestId: string, allow: boolean, message?: string): boolean {
    return this.write({
      type: 'permission_response',
      requestId,
      behavior: allow ? 'allow' : 'deny',
      message: allow ? message : (message ?? DENIED_MESSAGE),
    });
  }

  /**
   * Ask the bridge to abort the running request. The in-flight slot is
   * released immediately, without waiting for the bridge.
   */
  cancel(): void {
    if (this.inFlight) this.write({ type: 'cancel' });
    this.requestSeq++;
    this.inFlight = false;
    this.turnDirectory = undefined;
  }

  private write(command: BridgeCommand): boolean {
    const running = this.running;
    if (!running) return false;
    const written = running.handle.stdin.writeText(encodeCommand(command));
    if (written) this.log.debug({ type: command.type }, 'Command written');
    return written;
  }

  // ==========================================================================
  // Output
  // ==========================================================================

  private async pumpStdout(running: RunningProcess): Promise<void> {
    const lines = readJsonLines(running.handle.stdout, {
      logger: this.log,
      maxConsecutiveMalformedLines: this.options.maxConsecutiveMalformedLines ?? 0,
    });

    try {
      for await (const value of lines) {
        if (running.generation !== this.generation) return;

        const decision = running.gate.inspect(value);
        if (decision === 'skip') continue;
        if (decision === 'rejected') {
          this.log.warn({ pid: running.handle.pid }, 'Bridge process failed authentication');
          this.shutdown();
          this.emit('failure', new AuthenticationFailedError());
          return;
        }
        if (decision === 'authenticated') {
          this.log.debug({ pid: running.handle.pid }, 'Bridge process authenticated');
          continue;
        }
        this.dispatch(value);
      }
    } catch (error) {
      if (running.generation !== this.generation) return;
      this.log.error({ error: errorMessage(error) }, 'Bridge output failed');
      this.shutdown();
      this.emit(
        'failure',
        error instanceof TetherError ? error : new LaunchError(`Bridge output failed: ${errorMessage(error)}`, { cause: error })
      );
    }
  }

  private dispatch(value: unknown): void {
    const decoded = decodeBridgeEvent(value);
    if (decoded.status === 'unknown') {
      this.log.debug({ type: decoded.type }, 'Ignoring unknown event type');
      return;
    }
    if (decoded.status === 'invalid') {
      this.log.debug({ type: decoded.type, issues: decoded.issues }, 'Dropping invalid event');
      return;
    }

    const event = decoded.event;
    if (event.type === 'result' || event.type === 'error') {
      this.inFlight = false;
      this.turnDirectory = undefined;
    }
    if (event.type === 'debug') {
      this.emit('debug', event.message);
    }
    this.emit('event', event);
  }

  private async drainStderr(running: RunningProcess): Promise<void> {
    const framer = new LineFramer();
    const reader = running.handle.stderr.getReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        if (running.generation !== this.generation) continue;
        for (const line of framer.push(value)) {
          this.log.debug({ line }, 'Bridge stderr');
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  private handleExit(running: RunningProcess, status: ExitStatus): void {
    if (running.generation !== this.generation) return;

    const wasInFlight = this.inFlight;
    this.running = undefined;
    this.inFlight = false;
    this.turnDirectory = undefined;

    if (wasInFlight) {
      this.log.warn({ code: status.code, signal: status.signal }, 'Bridge process exited during a request');
      this.emit('failure', new ProcessTerminatedError(status.code, status.signal));
    } else {
      this.log.info({ code: status.code, signal: status.signal }, 'Bridge process exited');
    }
  }
}
