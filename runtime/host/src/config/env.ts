import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { logger } from './logger.js';

const optionalPath = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const envSchema = z.object({
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Bridge process
  TETHER_NODE_PATH: optionalPath,
  TETHER_BRIDGE_SCRIPT: optionalPath,
  TETHER_STARTUP_RETRY_MS: z.coerce.number().int().nonnegative().default(500),
  TETHER_MAX_MALFORMED_LINES: z.coerce.number().int().nonnegative().default(0),
});

export type Env = z.infer<typeof envSchema>;

export interface HostConfig {
  logLevel: Env['LOG_LEVEL'];
  nodePath?: string;
  bridgeScript?: string;
  startupRetryDelayMs: number;
  /** Consecutive malformed stdout lines tolerated; 0 means unbounded */
  maxConsecutiveMalformedLines: number;
}

/**
 * Validate environment variables into host configuration.
 * Applies the log level to the shared logger.
 */
export function loadHostConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.error({ issues }, 'Invalid environment variables');
    throw new ConfigError(issues);
  }

  const values = parsed.data;
  logger.level = values.LOG_LEVEL;

  return {
    logLevel: values.LOG_LEVEL,
    nodePath: values.TETHER_NODE_PATH,
    bridgeScript: values.TETHER_BRIDGE_SCRIPT,
    startupRetryDelayMs: values.TETHER_STARTUP_RETRY_MS,
    maxConsecutiveMalformedLines: values.TETHER_MAX_MALFORMED_LINES,
  };
}
