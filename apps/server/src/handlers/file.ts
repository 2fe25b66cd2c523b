import path from 'path';
import type { Context, Handler } from 'hono';
import {
  assertServableFile,
  fileSource,
  nodeFileSystem,
  mimeTypesRegistry,
  resolveMediaType,
  type ContentFileSystem,
} from '@servefs/content';
import { NotFoundError } from '@servefs/utils';
import { writeContent, attachment, INLINE, type Disposition } from './response-writer';
import { toHttpException } from './http-errors';
import type { HandlerDeps } from './types';

// The request path is never consulted: the same file answers every request.
function fixedFileHandler(file: string, disposition: Disposition, deps: HandlerDeps): Handler {
  if (!file) {
    throw new NotFoundError('Configured file');
  }

  const fileSystem: ContentFileSystem = deps.fileSystem ?? nodeFileSystem;
  const mediaType = resolveMediaType(file, deps.registry ?? mimeTypesRegistry);
  const source = fileSource(file);

  return async (c: Context) => {
    try {
      await assertServableFile(file, fileSystem);
      return await writeContent(c, { source, mediaType, disposition }, fileSystem);
    } catch (error) {
      throw toHttpException(error);
    }
  };
}

/**
 * Serve one icon file inline, whatever path was requested
 */
export function faviconHandler(file: string, deps: HandlerDeps = {}): Handler {
  return fixedFileHandler(file, INLINE, deps);
}

/**
 * Serve one file as a download named after its base name
 */
export function sendFileHandler(file: string, deps: HandlerDeps = {}): Handler {
  return fixedFileHandler(file, attachment(path.basename(file)), deps);
}
