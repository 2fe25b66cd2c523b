/**
 * Common error classes
 *
 * Every failure that crosses a package boundary is one of these. HTTP-facing
 * code maps `code` to a status; nothing below the handlers picks a status.
 */

/**
 * Base error class for servefs packages
 */
export class ServefsError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ServefsError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when configuration or input fails validation
 */
export class ValidationError extends ServefsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a file or directory does not exist
 */
export class NotFoundError extends ServefsError {
  constructor(resource: string, path?: string) {
    const message = path ? `${resource} '${path}' not found` : `${resource} not found`;
    super(message, 'NOT_FOUND', { resource, path });
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when a file exists but cannot be opened or read
 */
export class ContentUnavailableError extends ServefsError {
  constructor(path: string, cause?: string) {
    super(`Content at '${path}' cannot be read${cause ? ` (${cause})` : ''}`, 'CONTENT_UNAVAILABLE', {
      path,
      cause,
    });
    this.name = 'ContentUnavailableError';
  }
}

/**
 * Error thrown when a requested path resolves outside its root directory
 */
export class PathTraversalError extends ServefsError {
  constructor(requestPath: string, root: string) {
    super(`Path '${requestPath}' escapes root '${root}'`, 'PATH_TRAVERSAL', { requestPath, root });
    this.name = 'PathTraversalError';
  }
}

/**
 * Error thrown when a request path cannot be decoded
 */
export class InvalidPathError extends ServefsError {
  constructor(requestPath: string) {
    super(`Malformed request path '${requestPath}'`, 'INVALID_PATH', { requestPath });
    this.name = 'InvalidPathError';
  }
}

/**
 * Error thrown when a directory operation is given something else
 */
export class NotADirectoryError extends ServefsError {
  constructor(path: string) {
    super(`${path}: source is not a directory`, 'NOT_A_DIRECTORY', { path });
    this.name = 'NotADirectoryError';
  }
}

/**
 * Error thrown when an archive cannot be read or contains unsafe entries
 */
export class InvalidArchiveError extends ServefsError {
  constructor(archivePath: string, reason: string) {
    super(`Invalid archive '${archivePath}': ${reason}`, 'INVALID_ARCHIVE', { archivePath, reason });
    this.name = 'InvalidArchiveError';
  }
}

/**
 * Error thrown when a copy, create or remove step fails
 */
export class FileOperationError extends ServefsError {
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'FileOperationError';
  }
}

export function isServefsError(value: unknown): value is ServefsError {
  return value instanceof ServefsError;
}

/**
 * Read the `code` of a Node.js system error (ENOENT, EACCES, ...)
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
