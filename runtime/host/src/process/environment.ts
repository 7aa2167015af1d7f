import { BRIDGE_NONCE_ENV } from '@tether/shared-types';

/**
 * Variables copied from the host environment into the bridge's.
 * Everything else (tokens, cloud credentials, editor state) stays behind.
 */
export const BRIDGE_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'TMPDIR',
  'ANTHROPIC_API_KEY',
  'NODE_PATH',
  'NVM_DIR',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
] as const;

/**
 * Build the environment the bridge runs with
 */
export function buildBridgeEnvironment(
  ambient: NodeJS.ProcessEnv,
  nonce: string
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of BRIDGE_ENV_ALLOWLIST) {
    const value = ambient[key];
    if (value !== undefined) env[key] = value;
  }
  env.TERM = 'dumb';
  env.NO_COLOR = '1';
  env[BRIDGE_NONCE_ENV] = nonce;
  return env;
}
