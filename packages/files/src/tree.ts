/**
 * File and directory tree operations
 *
 * All operations are sequential and stop at the first failure. Nothing is
 * rolled back: a failed copyTree leaves whatever was copied before the error.
 */

import { promises as fs, type Stats } from 'fs';
import path from 'path';
import {
  FileOperationError,
  NotADirectoryError,
  NotFoundError,
  systemErrorCode,
} from '@servefs/utils';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Remove a file or directory tree. Missing targets are not an error.
 */
export async function removeFile(target: string): Promise<void> {
  try {
    await fs.rm(target, { recursive: true, force: true });
  } catch (error) {
    throw new FileOperationError(`${target}: delete file`, 'REMOVE_FAILED', {
      path: target,
      cause: messageOf(error),
    });
  }
}

/**
 * Rename (move) `oldPath` to `newPath`, replacing `newPath` if it exists
 */
export async function renameDir(oldPath: string, newPath: string): Promise<void> {
  await fs.rename(oldPath, newPath);
}

/**
 * Copy one file, overwriting the destination
 */
export async function copyFile(source: string, destination: string): Promise<void> {
  try {
    await fs.copyFile(source, destination);
  } catch (error) {
    throw new FileOperationError(`copy file: ${messageOf(error)}`, 'COPY_FAILED', {
      source,
      destination,
      cause: systemErrorCode(error),
    });
  }
}

/**
 * Recursively copy a directory tree, preserving directory permissions
 *
 * @throws NotFoundError when `source` does not exist
 * @throws NotADirectoryError when `source` is not a directory; nothing is created
 */
export async function copyTree(source: string, dest: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(source);
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      throw new NotFoundError('Directory', source);
    }
    throw error;
  }

  if (!stats.isDirectory()) {
    throw new NotADirectoryError(source);
  }

  try {
    await fs.mkdir(dest, { recursive: true, mode: stats.mode & 0o777 });
  } catch (error) {
    throw new FileOperationError(`create directory: ${messageOf(error)}`, 'CREATE_DIR_FAILED', {
      path: dest,
      cause: systemErrorCode(error),
    });
  }

  const entries = await fs.readdir(source, { withFileTypes: true });
  for (const entry of entries) {
    const from = path.join(source, entry.name);
    const to = path.join(dest, entry.name);
    if (entry.isDirectory()) {
      await copyTree(from, to);
    } else {
      await copyFile(from, to);
    }
  }
}
