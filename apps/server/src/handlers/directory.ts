import type { Handler } from 'hono';
import {
  assertServableFile,
  fileSource,
  nodeFileSystem,
  mimeTypesRegistry,
  resolveMediaType,
  resolveWithinRoot,
} from '@servefs/content';
import { InvalidPathError, NotFoundError } from '@servefs/utils';
import { writeContent, INLINE } from './response-writer';
import { toHttpException } from './http-errors';
import type { HandlerDeps } from './types';

export interface DirHandlerOptions {
  /** Leading part of the request path to drop before mapping onto `root` */
  strippedPrefix?: string;
}

function decodeRequestPath(rawPath: string): string {
  try {
    return decodeURIComponent(rawPath);
  } catch {
    throw new InvalidPathError(rawPath);
  }
}

function stripPrefix(requestPath: string, prefix: string): string {
  if (!prefix) {
    return requestPath;
  }
  if (requestPath !== prefix && !requestPath.startsWith(`${prefix}/`)) {
    throw new NotFoundError('File', requestPath);
  }
  return requestPath.slice(prefix.length);
}

/**
 * Serve any regular file beneath `root`, mapped from the request path
 *
 * The pathname is taken from the raw URL and percent-decoded once, so an
 * encoded "../" is checked like a literal one.
 */
export function dirHandler(root: string, options: DirHandlerOptions = {}, deps: HandlerDeps = {}): Handler {
  const registry = deps.registry ?? mimeTypesRegistry;
  const fileSystem = deps.fileSystem ?? nodeFileSystem;
  const prefix = (options.strippedPrefix ?? '').replace(/\/+$/, '');

  return async (c) => {
    try {
      const requestPath = stripPrefix(decodeRequestPath(new URL(c.req.url).pathname), prefix);
      const target = await resolveWithinRoot(root, requestPath, fileSystem);
      await assertServableFile(target, fileSystem);

      return await writeContent(
        c,
        {
          source: fileSource(target),
          mediaType: resolveMediaType(requestPath, registry),
          disposition: INLINE,
        },
        fileSystem
      );
    } catch (error) {
      throw toHttpException(error);
    }
  };
}
