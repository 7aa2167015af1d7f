/**
 * Bridge session - runs agent queries for the host
 *
 * One query runs at a time. A new query or compaction supersedes the
 * running one: it is aborted, its pending permission requests are
 * denied, and nothing more it produces is emitted.
 */

import { randomUUID } from 'node:crypto';
import type { CanUseTool, Options, PermissionResult } from '@anthropic-ai/claude-agent-sdk';
import type {
  BridgeCommand,
  BridgeEvent,
  CompactCommand,
  PermissionResponseCommand,
  QueryCommand,
} from '@tether/shared-types';
import { errorMessage } from '../shared/output.js';
import { buildQueryOptions, resolveWorkingDirectory } from './query-options.js';
import { SdkTranslator } from './sdk-translator.js';
import { summarizeInput } from './summarize-input.js';

export type RunQuery = (params: { prompt: string; options: Options }) => AsyncIterable<unknown>;

export interface BridgeSessionDeps {
  runQuery: RunQuery;
  emit: (event: BridgeEvent) => void;
  createRequestId?: () => string;
  /** Used when a request's directory cannot be resolved */
  fallbackCwd?: string;
}

interface PendingPermission {
  resolve: (result: PermissionResult) => void;
  input: Record<string, unknown>;
}

interface ActiveQuery {
  abort: AbortController;
  translator: SdkTranslator;
}

export const SUPERSEDED_MESSAGE = 'Cancelled — new query started';
export const CANCELLED_MESSAGE = 'Request cancelled';
export const DENIED_MESSAGE = 'User denied permission';
export const NO_SESSION_MESSAGE = 'Cannot compact without a session ID';

export class BridgeSession {
  private readonly deps: BridgeSessionDeps;
  private readonly pending = new Map<string, PendingPermission>();
  private active?: ActiveQuery;

  constructor(deps: BridgeSessionDeps) {
    this.deps = deps;
  }

  get isRunning(): boolean {
    return this.active !== undefined;
  }

  get pendingPermissionCount(): number {
    return this.pending.size;
  }

  /**
   * Route a command. Query and compact resolve when their stream ends.
   */
  async handle(command: BridgeCommand): Promise<void> {
    switch (command.type) {
      case 'query':
        return this.handleQuery(command);
      case 'compact':
        return this.handleCompact(command);
      case 'permission_response':
        this.handlePermissionResponse(command);
        return;
      case 'cancel':
        this.cancel(CANCELLED_MESSAGE);
        return;
    }
  }

  async handleQuery(command: QueryCommand): Promise<void> {
    this.cancel(SUPERSEDED_MESSAGE);

    const active: ActiveQuery = { abort: new AbortController(), translator: new SdkTranslator() };
    this.active = active;

    const emit = (event: BridgeEvent): void => {
      if (!active.abort.signal.aborted) this.deps.emit(event);
    };

    try {
      const cwd = await resolveWorkingDirectory(command.cwd, this.deps.fallbackCwd ?? process.cwd());
      const options = buildQueryOptions({
        command,
        cwd,
        abortController: active.abort,
        canUseTool: this.createPermissionCallback(active, emit),
      });

      for await (const message of this.deps.runQuery({ prompt: command.prompt, options })) {
        if (active.abort.signal.aborted) break;
        for (const event of active.translator.translate(message)) emit(event);
      }
    } catch (error) {
      emit({ type: 'error', message: errorMessage(error) });
    } finally {
      if (this.active === active) this.active = undefined;
    }
  }

  async handleCompact(command: CompactCommand): Promise<void> {
    if (!command.sessionId) {
      this.deps.emit({ type: 'error', message: NO_SESSION_MESSAGE });
      return;
    }

    const focus = command.focusInstructions?.trim();
    return this.handleQuery({
      type: 'query',
      prompt: focus ? `/compact ${focus}` : '/compact',
      sessionId: command.sessionId,
      cwd: command.cwd,
      permissionMode: command.permissionMode,
      model: command.model,
    });
  }

  handlePermissionResponse(command: PermissionResponseCommand): void {
    const pending = this.pending.get(command.requestId);
    if (!pending) return;
    this.pending.delete(command.requestId);

    if (command.behavior === 'allow') {
      // The original input goes back so the tool keeps its parameters
      pending.resolve({ behavior: 'allow', updatedInput: pending.input });
    } else {
      pending.resolve({ behavior: 'deny', message: command.message || DENIED_MESSAGE });
    }
  }

  /**
   * Abort the running query and deny whatever it is waiting on
   */
  cancel(reason: string = CANCELLED_MESSAGE): void {
    this.active?.abort.abort();
    this.active = undefined;
    this.denyPending(reason);
  }

  private denyPending(message: string): void {
    for (const pending of this.pending.values()) {
      pending.resolve({ behavior: 'deny', message });
    }
    this.pending.clear();
  }

  private createPermissionCallback(active: ActiveQuery, emit: (event: BridgeEvent) => void): CanUseTool {
    return async (toolName, input, options) => {
      if (active.abort.signal.aborted) return { behavior: 'deny', message: CANCELLED_MESSAGE };

      active.translator.noteToolUse(toolName, input);
      const requestId = (this.deps.createRequestId ?? randomUUID)();
      const reason =
        'decisionReason' in options && typeof options.decisionReason === 'string' ? options.decisionReason : undefined;

      const decision = new Promise<PermissionResult>((resolve) => {
        this.pending.set(requestId, { resolve, input });
      });
      emit({ type: 'permission_request', requestId, toolName, input: summarizeInput(toolName, input), reason });
      return decision;
    };
  }
}
