#!/usr/bin/env node
/**
 * tether bridge - entry point
 *
 * Launched by the host with a sanitized environment. Speaks newline
 * delimited JSON: commands on stdin, events on stdout. The first line
 * written is always `ready` echoing the launch nonce.
 */

import { createInterface } from 'node:readline';
import { query } from '@anthropic-ai/claude-agent-sdk';
import { BRIDGE_NONCE_ENV } from '@tether/shared-types';
import { BridgeSession } from './core/bridge-session.js';
import { parseCommand } from './core/command-parser.js';
import { emitDebug, emitEvent, errorMessage } from './shared/output.js';

// Startup handshake: echo the nonce, then drop it from the environment
emitEvent({ type: 'ready', nonce: process.env[BRIDGE_NONCE_ENV] ?? '' });
delete process.env[BRIDGE_NONCE_ENV];

const session = new BridgeSession({
  runQuery: ({ prompt, options }) => query({ prompt, options }),
  emit: emitEvent,
});

const rl = createInterface({ input: process.stdin, terminal: false });

rl.on('line', (line) => {
  if (!line.trim()) return;

  const parsed = parseCommand(line);
  if (!parsed.ok) {
    emitDebug(parsed.reason);
    return;
  }

  session.handle(parsed.command).catch((error: unknown) => {
    emitDebug(`Command ${parsed.command.type} failed: ${errorMessage(error)}`);
  });
});

rl.on('close', () => {
  session.cancel();
  process.exit(0);
});
