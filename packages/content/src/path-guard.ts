/**
 * Root confinement for directory-relative request paths
 */

import path from 'path';
import { NotFoundError, PathTraversalError, systemErrorCode } from '@servefs/utils';
import { nodeFileSystem, type ContentFileSystem } from './content-source';

function isWithin(root: string, target: string): boolean {
  const rel = path.relative(root, target);
  if (rel === '') {
    return true;
  }
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

async function canonicalize(fileSystem: ContentFileSystem, target: string): Promise<string | null> {
  try {
    return await fileSystem.realpath(target);
  } catch (error) {
    const code = systemErrorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return null;
    }
    throw error;
  }
}

/**
 * Map a request path onto a file beneath `root`
 *
 * The check runs twice: lexically, before any filesystem access, and again
 * on the real paths so a symlink inside the root cannot point outside it.
 *
 * @returns Canonical absolute path of the target
 * @throws PathTraversalError when the target escapes the root
 * @throws NotFoundError when the target or the root does not exist
 */
export async function resolveWithinRoot(
  root: string,
  requestPath: string,
  fileSystem: ContentFileSystem = nodeFileSystem
): Promise<string> {
  if (requestPath.includes('\0')) {
    throw new PathTraversalError(requestPath, root);
  }

  const relative = requestPath.replace(/\\/g, '/').replace(/^\/+/, '');
  const resolvedRoot = path.resolve(root);
  const resolvedTarget = path.resolve(resolvedRoot, relative);

  if (!isWithin(resolvedRoot, resolvedTarget)) {
    throw new PathTraversalError(requestPath, root);
  }

  const realRoot = await canonicalize(fileSystem, resolvedRoot);
  if (realRoot === null) {
    throw new NotFoundError('Root directory', root);
  }

  const realTarget = await canonicalize(fileSystem, resolvedTarget);
  if (realTarget === null) {
    throw new NotFoundError('File', requestPath);
  }

  if (!isWithin(realRoot, realTarget)) {
    throw new PathTraversalError(requestPath, root);
  }

  return realTarget;
}
