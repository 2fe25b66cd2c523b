/**
 * Zip archive extraction
 */

import { promises as fs } from 'fs';
import path from 'path';
import JSZip from 'jszip';
import {
  FileOperationError,
  InvalidArchiveError,
  NotFoundError,
  systemErrorCode,
} from '@servefs/utils';

const DEFAULT_DIR_MODE = 0o755;
const DEFAULT_FILE_MODE = 0o644;

/**
 * Permission bits recorded for an entry, if the archive was written on Unix
 */
function recordedMode(entry: JSZip.JSZipObject): number | undefined {
  const permissions = entry.unixPermissions;
  if (typeof permissions === 'number') {
    return permissions & 0o777;
  }
  if (typeof permissions === 'string' && /^[0-7]+$/.test(permissions)) {
    return parseInt(permissions, 8) & 0o777;
  }
  return undefined;
}

function entryTarget(archivePath: string, targetDir: string, name: string): string {
  const target = path.resolve(targetDir, name.replace(/\/+$/, ''));
  const rel = path.relative(targetDir, target);
  if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new InvalidArchiveError(archivePath, `entry '${name}' escapes the target directory`);
  }
  return target;
}

async function loadArchive(archivePath: string): Promise<JSZip> {
  let data: Buffer;
  try {
    data = await fs.readFile(archivePath);
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      throw new NotFoundError('Archive', archivePath);
    }
    throw error;
  }

  try {
    return await JSZip.loadAsync(data);
  } catch (error) {
    throw new InvalidArchiveError(archivePath, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Extract a zip archive into `targetDir`, creating it if needed
 *
 * Relative structure and recorded Unix permissions are preserved.
 *
 * @returns Path of the first directory the archive created, or '' if none
 * @throws NotFoundError when the archive does not exist
 * @throws InvalidArchiveError when the archive is corrupt or has an entry outside `targetDir`
 */
export async function extractArchive(archivePath: string, targetDir: string): Promise<string> {
  const zip = await loadArchive(archivePath);
  const root = path.resolve(targetDir);

  try {
    await fs.mkdir(root, { recursive: true, mode: DEFAULT_DIR_MODE });
  } catch (error) {
    throw new FileOperationError(`create directory: ${root}`, 'CREATE_DIR_FAILED', {
      path: root,
      cause: systemErrorCode(error),
    });
  }

  // Validate every entry before writing anything
  const entries = Object.values(zip.files).map((entry) => ({
    entry,
    target: entryTarget(archivePath, root, entry.name),
  }));

  let createdFolder = '';
  for (const { entry, target } of entries) {
    const mode = recordedMode(entry);

    if (entry.dir) {
      await fs.mkdir(target, { recursive: true, mode: mode ?? DEFAULT_DIR_MODE });
      if (createdFolder === '') {
        createdFolder = target;
      }
      continue;
    }

    await fs.mkdir(path.dirname(target), { recursive: true, mode: DEFAULT_DIR_MODE });
    const content = await entry.async('nodebuffer');
    await fs.writeFile(target, content, { mode: mode ?? DEFAULT_FILE_MODE });
    if (mode !== undefined) {
      // writeFile's mode is filtered by the umask
      await fs.chmod(target, mode);
    }
  }

  return createdFolder;
}
