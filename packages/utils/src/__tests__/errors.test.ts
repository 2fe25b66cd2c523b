import { describe, it, expect } from 'vitest';
import {
  ServefsError,
  NotFoundError,
  ContentUnavailableError,
  PathTraversalError,
  InvalidPathError,
  NotADirectoryError,
  InvalidArchiveError,
  FileOperationError,
  ValidationError,
  isServefsError,
  systemErrorCode,
} from '../errors';

describe('errors', () => {
  it('should carry code and details on the base class', () => {
    const error = new ServefsError('boom', 'SOMETHING', { a: 1 });
    expect(error.message).toBe('boom');
    expect(error.code).toBe('SOMETHING');
    expect(error.details).toEqual({ a: 1 });
    expect(error.name).toBe('ServefsError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should format NotFoundError with and without a path', () => {
    expect(new NotFoundError('File', '/srv/a.txt').message).toBe("File '/srv/a.txt' not found");
    expect(new NotFoundError('File').message).toBe('File not found');
    expect(new NotFoundError('File').code).toBe('NOT_FOUND');
  });

  it('should include the cause in ContentUnavailableError', () => {
    const error = new ContentUnavailableError('/srv/secret', 'EACCES');
    expect(error.message).toBe("Content at '/srv/secret' cannot be read (EACCES)");
    expect(error.code).toBe('CONTENT_UNAVAILABLE');
    expect(error.details).toEqual({ path: '/srv/secret', cause: 'EACCES' });
  });

  it('should assign the documented codes', () => {
    expect(new PathTraversalError('../x', '/srv').code).toBe('PATH_TRAVERSAL');
    expect(new InvalidPathError('%E0').code).toBe('INVALID_PATH');
    expect(new NotADirectoryError('/srv/a.txt').code).toBe('NOT_A_DIRECTORY');
    expect(new InvalidArchiveError('a.zip', 'corrupt').code).toBe('INVALID_ARCHIVE');
    expect(new FileOperationError('copy failed', 'COPY_FAILED').code).toBe('COPY_FAILED');
    expect(new ValidationError('bad').code).toBe('VALIDATION_ERROR');
  });

  it('should match NotADirectoryError message format', () => {
    expect(new NotADirectoryError('/srv/a.txt').message).toBe('/srv/a.txt: source is not a directory');
  });

  it('should recognise servefs errors', () => {
    expect(isServefsError(new NotFoundError('File'))).toBe(true);
    expect(isServefsError(new Error('plain'))).toBe(false);
    expect(isServefsError('NOT_FOUND')).toBe(false);
  });

  it('should read system error codes', () => {
    const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });
    expect(systemErrorCode(error)).toBe('ENOENT');
    expect(systemErrorCode(new Error('plain'))).toBeUndefined();
    expect(systemErrorCode({ code: 42 })).toBeUndefined();
    expect(systemErrorCode(null)).toBeUndefined();
  });
});
