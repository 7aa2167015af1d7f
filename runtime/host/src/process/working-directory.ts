import { realpath, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { InvalidWorkingDirectoryError } from '../errors.js';

/**
 * Resolve a working directory to its canonical absolute path.
 * Symlinks are followed; the result must be an existing directory.
 */
export async function canonicalizeDirectory(path: string): Promise<string> {
  if (path.includes('\0')) {
    throw new InvalidWorkingDirectoryError(path.replaceAll('\0', '\\0'), 'contains a NUL byte');
  }
  if (path.trim() === '') {
    throw new InvalidWorkingDirectoryError(path, 'empty path');
  }

  let canonical: string;
  try {
    canonical = await realpath(resolve(path));
  } catch {
    throw new InvalidWorkingDirectoryError(path, 'does not exist');
  }

  const info = await stat(canonical);
  if (!info.isDirectory()) {
    throw new InvalidWorkingDirectoryError(path, 'not a directory');
  }
  return canonical;
}
