import pino, { type Logger } from 'pino';

function initialLevel(value: string | undefined): string {
  if (value === 'silent') return value;
  return value && value in pino.levels.values ? value : 'info';
}

/**
 * Process-wide logger. Writes JSON to stderr; stdout belongs to the CLI.
 * `loadHostConfig` applies the validated level.
 */
export const logger: Logger = pino(
  {
    name: 'tether',
    level: initialLevel(process.env.LOG_LEVEL),
  },
  pino.destination(2)
);

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
