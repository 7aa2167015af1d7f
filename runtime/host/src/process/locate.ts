/**
 * Locating the Node interpreter and the bridge script
 */

import { constants } from 'node:fs';
import { access, readdir } from 'node:fs/promises';
import { delimiter, dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { LaunchError } from '../errors.js';

export const KNOWN_NODE_PATHS = ['/usr/local/bin/node', '/opt/homebrew/bin/node'];
const SYSTEM_NODE_PATH = '/usr/bin/node';

const moduleDir = dirname(fileURLToPath(import.meta.url));

/**
 * Bridge script locations relative to this module: the compiled script,
 * then its TypeScript source.
 */
export const BRIDGE_SCRIPT_CANDIDATES = [
  resolve(moduleDir, '../../../bridge/src/main.js'),
  resolve(moduleDir, '../../../bridge/src/main.ts'),
];

export async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function isReadable(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

function compareVersionsDescending(a: string, b: string): number {
  const parse = (v: string) => v.replace(/^v/, '').split('.').map((part) => Number.parseInt(part, 10) || 0);
  const left = parse(a);
  const right = parse(b);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (right[i] ?? 0) - (left[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Interpreters under ~/.nvm, newest version first
 */
async function nvmNodePaths(home: string | undefined): Promise<string[]> {
  if (!home) return [];
  const versionsDir = join(home, '.nvm', 'versions', 'node');
  try {
    const versions = await readdir(versionsDir);
    return versions.sort(compareVersionsDescending).map((v) => join(versionsDir, v, 'bin', 'node'));
  } catch {
    return [];
  }
}

export interface LocateNodeOptions {
  configuredPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Last resort when nothing else is found */
  fallback?: string;
  probe?: (path: string) => Promise<boolean>;
}

/**
 * Find a Node interpreter: the configured path, well-known install
 * locations, nvm, the system path, then PATH. Falls back to the Node
 * running the host.
 */
export async function findNodeInterpreter(options: LocateNodeOptions = {}): Promise<string> {
  const env = options.env ?? process.env;
  const probe = options.probe ?? isExecutable;

  if (options.configuredPath) {
    if (await probe(options.configuredPath)) return options.configuredPath;
    throw new LaunchError(`Configured Node interpreter not found: ${options.configuredPath}`);
  }

  const candidates = [
    ...KNOWN_NODE_PATHS,
    ...(await nvmNodePaths(env.HOME)),
    SYSTEM_NODE_PATH,
    ...(env.PATH ?? '').split(delimiter).filter(Boolean).map((dir) => join(dir, 'node')),
  ];
  for (const candidate of candidates) {
    if (await probe(candidate)) return candidate;
  }

  const fallback = options.fallback ?? process.execPath;
  if (await probe(fallback)) return fallback;
  throw new LaunchError('Node interpreter not found');
}

export interface LocateScriptOptions {
  configuredPath?: string;
  candidates?: string[];
  probe?: (path: string) => Promise<boolean>;
}

export async function findBridgeScript(options: LocateScriptOptions = {}): Promise<string> {
  const probe = options.probe ?? isReadable;

  if (options.configuredPath) {
    const configured = resolve(options.configuredPath);
    if (await probe(configured)) return configured;
    throw new LaunchError(`Configured bridge script not found: ${configured}`);
  }

  const candidates = options.candidates ?? BRIDGE_SCRIPT_CANDIDATES;
  for (const candidate of candidates) {
    if (await probe(candidate)) return candidate;
  }
  throw new LaunchError(`Bridge script not found (looked in ${candidates.join(', ')})`);
}

/**
 * Interpreter arguments for a script. TypeScript sources run through tsx.
 */
export function bridgeLaunchArgs(scriptPath: string): string[] {
  return scriptPath.endsWith('.ts') ? ['--import', 'tsx', scriptPath] : [scriptPath];
}
