/**
 * AgentSession - Session coordinator
 *
 * This class coordinates the session components:
 * - SessionState: the pure state machine from @tether/state
 * - SessionEventBus: per-session event emitter
 * - BridgeProcess: the child process that runs agent queries
 *
 * Responsibilities:
 * - Apply caller actions (send, cancel, compact, permission answers)
 * - Fold bridge events into state in arrival order
 * - Turn supervisor failures into visible transcript errors
 * - Produce snapshots for persistence and restore from them
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { BridgeEvent, PermissionRequest, SessionSettings, SessionSnapshot } from '@tether/shared-types';
import {
  beginCompact,
  beginQuery,
  cancelTurn,
  createInitialSessionState,
  createSnapshot,
  defaultReducerContext,
  failTurn,
  isDataEvent,
  isInFlight,
  reduceBridgeEvent,
  resolvePermission,
  restoreSessionState,
  setTurnWorkingDirectory,
  type ReducerContext,
  type RejectionReason,
  type SessionState,
} from '@tether/state';
import { createLogger } from '../config/logger.js';
import { errorMessage, type TetherError } from '../errors.js';
import { BridgeProcess, type BridgeProcessOptions } from '../process/bridge-process.js';
import { canonicalizeDirectory } from '../process/working-directory.js';
import { SessionEventBus, type StateChangeCause } from './session-event-bus.js';

export type SendResult = { accepted: true } | { accepted: false; reason: RejectionReason };

export interface AgentSessionDeps {
  /** Options for the lazily created bridge process */
  bridgeOptions?: BridgeProcessOptions;
  /** Replaces bridge creation entirely */
  createBridge?: () => BridgeProcess;
  ctx?: ReducerContext;
  logger?: Logger;
}

export interface CreateSessionArgs {
  settings: SessionSettings;
  name?: string;
  id?: string;
}

interface SessionIdentity {
  id: string;
  name: string;
  createdAt: number;
}

/**
 * AgentSession class - coordinates session components
 */
export class AgentSession {
  // Core identity
  public readonly id: string;
  public readonly name: string;
  public readonly createdAt: number;

  public readonly eventBus: SessionEventBus;

  private readonly settings: SessionSettings;
  private readonly deps: AgentSessionDeps;
  private readonly ctx: ReducerContext;
  private readonly log: Logger;
  private state: SessionState;

  // Bridge process (lazy - created on first send)
  private bridge?: BridgeProcess;

  /** Bumped by every request, cancel and shutdown */
  private turn = 0;

  static create(args: CreateSessionArgs, deps: AgentSessionDeps = {}): AgentSession {
    const identity: SessionIdentity = {
      id: args.id ?? randomUUID(),
      name: args.name ?? 'New Session',
      createdAt: (deps.ctx ?? defaultReducerContext).now(),
    };
    return new AgentSession(identity, { ...args.settings }, createInitialSessionState(), deps);
  }

  /**
   * Rebuild a session from a snapshot. The bridge is relaunched on the
   * first send; the continuation token carries the conversation over.
   */
  static restore(snapshot: SessionSnapshot, deps: AgentSessionDeps = {}): AgentSession {
    const identity: SessionIdentity = { id: snapshot.id, name: snapshot.name, createdAt: snapshot.createdAt };
    return new AgentSession(identity, { ...snapshot.settings }, restoreSessionState(snapshot), deps);
  }

  private constructor(
    identity: SessionIdentity,
    settings: SessionSettings,
    state: SessionState,
    deps: AgentSessionDeps
  ) {
    this.id = identity.id;
    this.name = identity.name;
    this.createdAt = identity.createdAt;
    this.settings = settings;
    this.state = state;
    this.deps = deps;
    this.ctx = deps.ctx ?? defaultReducerContext;
    const context = { component: 'agent-session', sessionId: identity.id };
    this.log = deps.logger?.child(context) ?? createLogger(context);
    this.eventBus = new SessionEventBus(identity.id);
  }

  // ==========================================================================
  // Read access
  // ==========================================================================

  get sessionState(): SessionState {
    return this.state;
  }

  get sessionSettings(): Readonly<SessionSettings> {
    return this.settings;
  }

  get pendingPermission(): PermissionRequest | undefined {
    return this.state.pendingPermission;
  }

  get isBusy(): boolean {
    return isInFlight(this.state);
  }

  toSnapshot(): SessionSnapshot {
    return createSnapshot({ id: this.id, name: this.name, createdAt: this.createdAt }, this.settings, this.state);
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  /**
   * Send a user message to the agent.
   * Rejected while a request is in flight or for blank text; launch and
   * working-directory failures end the turn with an error message.
   */
  async send(text: string): Promise<SendResult> {
    const transition = beginQuery(this.state, text, this.settings.workingDirectory, this.ctx);
    if (!transition.accepted) return { accepted: false, reason: transition.reason };
    this.setState(transition.state, 'send');

    await this.dispatch('send', {
      type: 'query',
      prompt: text,
      cwd: this.settings.workingDirectory,
      permissionMode: this.settings.permissionMode,
      sessionId: this.state.continuationToken,
      model: this.settings.model,
      systemPrompt: this.settings.customSystemPrompt,
    });
    return { accepted: true };
  }

  /**
   * Summarize the conversation so far to free up context
   */
  async compact(focusInstructions?: string): Promise<SendResult> {
    const transition = beginCompact(this.state, this.settings.workingDirectory, this.ctx);
    if (!transition.accepted) return { accepted: false, reason: transition.reason };
    this.setState(transition.state, 'compact');

    const sessionId = this.state.continuationToken ?? '';
    await this.dispatch('compact', {
      type: 'compact',
      sessionId,
      cwd: this.settings.workingDirectory,
      permissionMode: this.settings.permissionMode,
      model: this.settings.model,
      focusInstructions,
    });
    return { accepted: true };
  }

  /**
   * Stop the in-flight request. Does nothing while idle.
   */
  cancel(): void {
    const next = cancelTurn(this.state);
    if (next === this.state) return;
    this.turn++;
    this.bridge?.cancel();
    this.setState(next, 'cancel');
    this.log.info('Request cancelled');
  }

  /**
   * Answer the pending permission request. Ids that do not match the
   * pending request are ignored and nothing is written.
   */
  respondToPermission(requestId: string, allow: boolean, message?: string): boolean {
    if (this.state.pendingPermission?.id !== requestId) {
      this.log.warn({ requestId, pending: this.state.pendingPermission?.id }, 'Ignoring response to unknown permission request');
      return false;
    }
    this.bridge?.respondToPermission(requestId, allow, message);
    this.setState(resolvePermission(this.state, requestId), 'permission');
    return true;
  }

  /**
   * Stop the bridge and release listeners. The session's data stays
   * readable and can still be snapshotted.
   */
  shutdown(): void {
    this.turn++;
    this.bridge?.shutdown();
    this.bridge = undefined;
    const next = cancelTurn(this.state);
    if (next !== this.state) this.setState(next, 'shutdown');
    this.eventBus.destroy();
  }

  // ==========================================================================
  // Bridge wiring
  // ==========================================================================

  private getBridge(): BridgeProcess {
    if (this.bridge) return this.bridge;

    const bridge = this.deps.createBridge?.() ?? new BridgeProcess({ logger: this.log, ...this.deps.bridgeOptions });
    bridge.on('event', (event) => this.handleBridgeEvent(event));
    bridge.on('failure', (error) => this.handleFailure(error));
    bridge.on('debug', (message) => this.eventBus.emit('debug', { message }));
    this.bridge = bridge;
    return bridge;
  }

  /**
   * Resolve the request's directory, scope the turn to it and hand the
   * request to the bridge. A request cancelled meanwhile is dropped.
   */
  private async dispatch(cause: StateChangeCause, command: Parameters<BridgeProcess['send']>[0]): Promise<void> {
    const turn = ++this.turn;
    try {
      const cwd = await canonicalizeDirectory(command.cwd);
      if (turn !== this.turn) return;
      const scoped = setTurnWorkingDirectory(this.state, cwd);
      if (scoped !== this.state) this.setState(scoped, cause);

      await this.getBridge().send({ ...command, cwd });
    } catch (error) {
      if (turn !== this.turn) {
        this.log.debug({ error: errorMessage(error) }, 'Cancelled request failed');
        return;
      }
      this.log.error({ error: errorMessage(error) }, 'Failed to send request');
      this.setState(failTurn(this.state, errorMessage(error), this.ctx), 'failure');
    }
  }

  private handleBridgeEvent(event: BridgeEvent): void {
    if (event.type === 'permission_request' && this.state.pendingPermission) {
      this.log.warn(
        { requestId: event.requestId, pending: this.state.pendingPermission.id },
        'Permission request arrived while another is pending; queued'
      );
    }

    const next = reduceBridgeEvent(this.state, event, this.ctx);
    if (next !== this.state) this.setState(next, 'event');
    if (isDataEvent(event)) this.eventBus.emit('data:changed', { sessionId: this.id });
  }

  private handleFailure(error: TetherError): void {
    this.log.error({ code: error.code, error: error.message }, 'Bridge failure');
    this.setState(failTurn(this.state, error.message, this.ctx), 'failure');
  }

  private setState(state: SessionState, cause: StateChangeCause): void {
    this.state = state;
    this.eventBus.emit('state:changed', { state, cause });
  }
}
