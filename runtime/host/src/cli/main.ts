#!/usr/bin/env -S node --import tsx
/**
 * tether CLI - entry point
 *
 * Usage:
 *   tether ask [options] <prompt...>
 *
 * Environment is read from `.env` and the process; see config/env.ts.
 */

import { config } from 'dotenv';
import { Command } from 'commander';
import { askCommand } from './commands/ask.js';
import { isTetherError, errorMessage } from '../errors.js';

config();

const program = new Command();

program
  .name('tether')
  .description('Drive a coding agent through an authenticated bridge process')
  .version('0.1.0');

program.addCommand(askCommand);

program.parseAsync().catch((error: unknown) => {
  process.stderr.write(`${isTetherError(error) ? error.message : `Error: ${errorMessage(error)}`}\n`);
  process.exitCode = 1;
});
