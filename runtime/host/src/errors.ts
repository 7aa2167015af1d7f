/**
 * Host error types
 *
 * Every error the host raises on purpose carries a stable `code` so callers
 * can branch on it without matching messages.
 */

export type TetherErrorCode =
  | 'LAUNCH_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'PROCESS_TERMINATED'
  | 'BUSY'
  | 'INVALID_WORKING_DIRECTORY'
  | 'MALFORMED_OUTPUT'
  | 'INVALID_CONFIG';

export class TetherError extends Error {
  readonly code: TetherErrorCode;

  constructor(code: TetherErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The interpreter or bridge script could not be found, or spawn failed */
export class LaunchError extends TetherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LAUNCH_FAILED', message, options);
  }
}

/** The first message from the bridge was not a `ready` carrying the launch nonce */
export class AuthenticationFailedError extends TetherError {
  constructor(message = 'Bridge process failed authentication') {
    super('AUTHENTICATION_FAILED', message);
  }
}

/** The bridge exited while a request was in flight */
export class ProcessTerminatedError extends TetherError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(exitCode: number | null, signal: NodeJS.Signals | null) {
    const detail = signal ? `signal ${signal}` : `code ${exitCode ?? 'unknown'}`;
    super('PROCESS_TERMINATED', `Bridge process exited unexpectedly (${detail})`);
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

export class BusyError extends TetherError {
  constructor() {
    super('BUSY', 'A request is already in flight');
  }
}

export class InvalidWorkingDirectoryError extends TetherError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('INVALID_WORKING_DIRECTORY', `Invalid working directory "${path}": ${reason}`);
    this.path = path;
  }
}

/** Too many consecutive stdout lines from the bridge were not JSON */
export class MalformedOutputError extends TetherError {
  constructor(count: number) {
    super('MALFORMED_OUTPUT', `Bridge produced ${count} consecutive malformed lines`);
  }
}

export class ConfigError extends TetherError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.issues = issues;
  }
}

export function isTetherError(error: unknown): error is TetherError {
  return error instanceof TetherError;
}

/**
 * Message text for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
