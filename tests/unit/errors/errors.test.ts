import { describe, it, expect } from 'vitest';

import {
  ErrorKind,
  isErrorKind,
  isStorageError,
  storageError,
  toStorageError,
  withContext,
} from '@/errors/index.js';

describe('storageError', () => {
  it('should build an error with kind, code and status', () => {
    const error = storageError(ErrorKind.NotFound, 'docs/a.txt', {
      context: { operation: 'stat', path: 'docs/a.txt' },
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.kind).toBe('NotFound');
    expect(error.code).toBe('STORAGE_NOT_FOUND');
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe('Not found: docs/a.txt');
    expect(error.temporary).toBe(false);
    expect(error.context).toEqual({ operation: 'stat', path: 'docs/a.txt' });
  });

  it('should mark RateLimited errors temporary by default', () => {
    expect(storageError(ErrorKind.RateLimited, 'slow down').temporary).toBe(true);
    expect(storageError(ErrorKind.Unexpected, 'boom').temporary).toBe(false);
    expect(storageError(ErrorKind.Unexpected, 'boom', { temporary: true }).temporary).toBe(true);
  });

  it('should keep the backend error as cause', () => {
    const cause = new Error('ECONNRESET');
    const error = storageError(ErrorKind.Unexpected, 'connection reset', { cause });
    expect(error.cause).toBe(cause);
  });
});

describe('error helpers', () => {
  it('should recognize taxonomy errors only', () => {
    expect(isStorageError(storageError(ErrorKind.Closed, 'x'))).toBe(true);
    expect(isStorageError(new Error('plain'))).toBe(false);
    expect(isStorageError({ kind: 'NotFound', temporary: false, context: {} })).toBe(false);
  });

  it('should match error kinds', () => {
    const error = storageError(ErrorKind.Conflict, 'busy');
    expect(isErrorKind(error, ErrorKind.Conflict)).toBe(true);
    expect(isErrorKind(error, ErrorKind.NotFound)).toBe(false);
    expect(isErrorKind('Conflict', ErrorKind.Conflict)).toBe(false);
  });

  it('should wrap foreign errors as Unexpected and pass taxonomy errors through', () => {
    const original = storageError(ErrorKind.PermissionDenied, 'nope');
    expect(toStorageError(original)).toBe(original);

    const wrapped = toStorageError(new TypeError('bad'), { operation: 'read' });
    expect(wrapped.kind).toBe('Unexpected');
    expect(wrapped.message).toBe('Unexpected error: bad');
    expect(wrapped.context).toEqual({ operation: 'read' });
    expect(wrapped.cause).toBeInstanceOf(TypeError);

    expect(toStorageError('text').message).toBe('Unexpected error: text');
  });

  it('should fill only missing context fields', () => {
    const error = storageError(ErrorKind.NotFound, 'x', { context: { path: 'inner/x' } });
    withContext(error, { path: 'outer/x', operation: 'read', scheme: 'memory', to: undefined });
    expect(error.context).toEqual({ path: 'inner/x', operation: 'read', scheme: 'memory' });
  });
});
