/**
 * Content Sources
 *
 * A request produces exactly one ContentSource: bytes already in memory, or
 * a file path whose bytes are read only when the response is written.
 */

import { promises as fs } from 'fs';
import {
  ContentUnavailableError,
  NotFoundError,
  systemErrorCode,
} from '@servefs/utils';

export type ContentSource =
  | { kind: 'memory'; bytes: Uint8Array }
  | { kind: 'file'; path: string };

export interface FileStats {
  isFile(): boolean;
  isDirectory(): boolean;
}

/**
 * Filesystem capability used to read content
 */
export interface ContentFileSystem {
  stat(path: string): Promise<FileStats>;
  readFile(path: string): Promise<Uint8Array>;
  realpath(path: string): Promise<string>;
}

export const nodeFileSystem: ContentFileSystem = {
  stat: (path) => fs.stat(path),
  readFile: (path) => fs.readFile(path),
  realpath: (path) => fs.realpath(path),
};

export function memorySource(bytes: Uint8Array): ContentSource {
  return { kind: 'memory', bytes };
}

export function fileSource(path: string): ContentSource {
  return { kind: 'file', path };
}

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Load the bytes of a source
 *
 * @throws ContentUnavailableError when a file source cannot be read
 */
export async function readContentSource(
  source: ContentSource,
  fileSystem: ContentFileSystem = nodeFileSystem
): Promise<Uint8Array> {
  if (source.kind === 'memory') {
    return source.bytes;
  }

  try {
    return await fileSystem.readFile(source.path);
  } catch (error) {
    throw new ContentUnavailableError(source.path, systemErrorCode(error) ?? String(error));
  }
}

/**
 * Check that a path names an existing regular file
 *
 * @throws NotFoundError when the path is missing or is a directory
 * @throws ContentUnavailableError when the path cannot be inspected
 */
export async function assertServableFile(
  path: string,
  fileSystem: ContentFileSystem = nodeFileSystem
): Promise<void> {
  let stats: FileStats;
  try {
    stats = await fileSystem.stat(path);
  } catch (error) {
    const code = systemErrorCode(error);
    if (code !== undefined && MISSING_CODES.has(code)) {
      throw new NotFoundError('File', path);
    }
    throw new ContentUnavailableError(path, code ?? String(error));
  }

  if (stats.isDirectory() || !stats.isFile()) {
    throw new NotFoundError('File', path);
  }
}
