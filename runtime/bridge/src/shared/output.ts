/**
 * Shared output utilities for the bridge
 *
 * stdout carries the line protocol only: one JSON event per line.
 */

import type { BridgeEvent } from '@tether/shared-types';

/**
 * Emit an event as one JSON line on stdout
 *
 * Uses process.stdout.write directly for unbuffered output in non-TTY environments.
 */
export function emitEvent(event: BridgeEvent): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

/**
 * Emit a diagnostic for the host's debug sink
 */
export function emitDebug(message: string): void {
  emitEvent({ type: 'debug', message });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
