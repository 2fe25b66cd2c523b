/**
 * Path helpers
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { systemErrorCode } from '@servefs/utils';

/**
 * OS-specific path separator
 */
export const pathSeparator = path.sep;

/**
 * True when something (a directory or a file) exists at `target`
 */
export async function directoryExists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * The current user's home directory
 */
export function getHomePath(): string {
  return os.homedir();
}

/**
 * Parent directory of `target`, ignoring one trailing separator
 *
 * @example
 * getParentDir('/path/to/')  // => '/path'
 * getParentDir('/path/to')   // => '/path'
 */
export function getParentDir(target: string, separator: string = pathSeparator): string {
  const trimmed = target.length > 1 && target.endsWith(separator) ? target.slice(0, -separator.length) : target;
  const index = trimmed.lastIndexOf(separator);
  if (index < 0) {
    return '';
  }
  if (index === 0) {
    return separator;
  }
  return trimmed.slice(0, index);
}
