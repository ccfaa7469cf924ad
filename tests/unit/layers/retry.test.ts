import { describe, it, expect } from 'vitest';

import { ErrorKind, storageError } from '@/errors/index.js';
import { RetryLayer, isRetryable } from '@/layers/retry.js';
import { Operator } from '@/operator/operator.js';
import { Metadata } from '@/types/metadata.js';

import { asLogger, createMockAccessor, createMockLogger, fileEntry, pagedLister } from '../helpers.js';

const rateLimited = () => storageError(ErrorKind.RateLimited, 'slow down');

describe('RetryLayer', () => {
  it('should succeed on the third attempt after two RateLimited failures', async () => {
    const { accessor } = createMockAccessor({ stat: true });
    accessor.stat
      .mockImplementationOnce(() => {
        throw rateLimited();
      })
      .mockImplementationOnce(() => {
        throw rateLimited();
      })
      .mockImplementationOnce(() => Metadata.file({ contentLength: 7 }));
    const op = new Operator(accessor).layer(new RetryLayer({ maxAttempts: 3, minDelayMs: 0 }));

    const metadata = await op.stat('a.txt');

    expect(metadata.contentLength).toBe(7);
    expect(accessor.stat).toHaveBeenCalledTimes(3);
  });

  it('should rethrow the last error with the attempt count once exhausted', async () => {
    const { accessor } = createMockAccessor({ stat: true });
    accessor.stat.mockImplementation(() => {
      throw rateLimited();
    });
    const op = new Operator(accessor).layer(new RetryLayer({ maxAttempts: 3, minDelayMs: 0 }));

    await expect(op.stat('a.txt')).rejects.toMatchObject({
      kind: 'RateLimited',
      context: { attempts: 3, operation: 'stat', path: 'a.txt' },
    });
    expect(accessor.stat).toHaveBeenCalledTimes(3);
  });

  it('should not retry permanent errors', async () => {
    const { accessor } = createMockAccessor({ read: true });
    const op = new Operator(accessor).layer(new RetryLayer({ minDelayMs: 0 }));

    await expect(op.read('missing.txt')).rejects.toMatchObject({ kind: 'NotFound' });
    expect(accessor.read).toHaveBeenCalledOnce();
  });

  it('should retry temporary errors and log each retry', async () => {
    const { accessor, store } = createMockAccessor({ read: true });
    store.set('a.txt', new Uint8Array([1]));
    accessor.read.mockImplementationOnce(() => {
      throw storageError(ErrorKind.Unexpected, 'socket hang up', { temporary: true });
    });
    const mockLogger = createMockLogger();
    const op = new Operator(accessor).layer(
      new RetryLayer({ minDelayMs: 0, logger: asLogger(mockLogger) })
    );

    await expect(op.read('a.txt')).resolves.toEqual(new Uint8Array([1]));
    expect(mockLogger.warn).toHaveBeenCalledWith(
      { operation: 'read', path: 'a.txt', attempt: 1, delay: 0, kind: 'Unexpected' },
      'Retrying storage operation after temporary error'
    );
  });

  it('should leave writes alone unless non-idempotent retries are enabled', async () => {
    const failOnce = () => {
      const mock = createMockAccessor({ write: true });
      mock.accessor.write.mockImplementationOnce(() => {
        throw rateLimited();
      });
      return mock;
    };

    const plain = failOnce();
    await expect(
      new Operator(plain.accessor).layer(new RetryLayer({ minDelayMs: 0 })).write('a.txt', 'x')
    ).rejects.toMatchObject({ kind: 'RateLimited' });
    expect(plain.accessor.write).toHaveBeenCalledOnce();

    const opted = failOnce();
    await new Operator(opted.accessor)
      .layer(new RetryLayer({ minDelayMs: 0, retryNonIdempotent: true }))
      .write('a.txt', 'x');
    expect(opted.accessor.write).toHaveBeenCalledTimes(2);
    expect(opted.store.has('a.txt')).toBe(true);
  });

  it('should retry page fetches of listers', async () => {
    const raw = pagedLister([[fileEntry('a')]]);
    raw.next.mockImplementationOnce(() => {
      throw rateLimited();
    });
    const { accessor } = createMockAccessor({ list: true });
    accessor.list.mockReturnValueOnce(raw);
    const op = new Operator(accessor).layer(new RetryLayer({ minDelayMs: 0 }));

    const entries = await op.listAll('/');

    expect(entries.map((entry) => entry.path)).toEqual(['a']);
    expect(raw.next).toHaveBeenCalledTimes(3);
  });
});

describe('isRetryable', () => {
  it('should classify error kinds', () => {
    expect(isRetryable(rateLimited())).toBe(true);
    expect(isRetryable(storageError(ErrorKind.Unexpected, 'x', { temporary: true }))).toBe(true);
    expect(isRetryable(storageError(ErrorKind.Unexpected, 'x'))).toBe(false);
    expect(isRetryable(storageError(ErrorKind.InvalidInput, 'x', { temporary: true }))).toBe(false);
    expect(isRetryable(storageError(ErrorKind.Unsupported, 'x', { temporary: true }))).toBe(false);
  });
});
