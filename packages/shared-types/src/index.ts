/**
 * @tether/shared-types
 *
 * Wire protocol and session types shared by the host and the bridge.
 */

// Protocol
export * from './protocol/commands.js';
export * from './protocol/events.js';

// Session
export * from './session/messages.js';
export * from './session/tasks.js';
export * from './session/permissions.js';
export * from './session/settings.js';
export * from './session/snapshot.js';
