/**
 * @tether/host
 *
 * Launches and supervises the bridge process and drives sessions over it.
 */

// Sessions
export { AgentSession } from './core/agent-session.js';
export type { AgentSessionDeps, CreateSessionArgs, SendResult } from './core/agent-session.js';
export { SessionEventBus } from './core/session-event-bus.js';
export type { SessionEventPayloads, SessionEventType, StateChangeCause } from './core/session-event-bus.js';

// Process supervision
export { BridgeProcess } from './process/bridge-process.js';
export type { BridgeProcessEvents, BridgeProcessOptions } from './process/bridge-process.js';
export { BRIDGE_ENV_ALLOWLIST, buildBridgeEnvironment } from './process/environment.js';
export { findBridgeScript, findNodeInterpreter } from './process/locate.js';
export { canonicalizeDirectory } from './process/working-directory.js';

// Wire protocol
export { decodeBridgeEvent, encodeCommand } from './protocol/codec.js';
export type { DecodeResult } from './protocol/codec.js';
export { LineFramer } from './transport/line-framer.js';
export { readJsonLines, encodeLine } from './transport/line-transport.js';
export { AuthGate } from './transport/auth-gate.js';
export type { GateDecision } from './transport/auth-gate.js';

// Configuration, logging, errors
export { loadHostConfig } from './config/env.js';
export type { HostConfig } from './config/env.js';
export { logger, createLogger } from './config/logger.js';
export * from './errors.js';
