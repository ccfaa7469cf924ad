import { describe, it, expect, vi } from 'vitest';

import { ErrorKind, storageError } from '@/errors/index.js';
import { ConcurrentLimitLayer } from '@/layers/concurrent-limit.js';
import { LoggingLayer } from '@/layers/logging.js';
import { InMemoryMetrics, MetricsLayer } from '@/layers/metrics.js';
import { ThrottleLayer, TokenBucket } from '@/layers/throttle.js';
import { TimeoutLayer } from '@/layers/timeout.js';
import { Operator } from '@/operator/operator.js';
import { MemoryBackend } from '@/storage/memory-backend.js';
import { Metadata } from '@/types/metadata.js';

import {
  asLogger,
  createMockAccessor,
  createMockLogger,
  fileEntry,
  pagedLister,
} from '../helpers.js';

// ---------------------------------------------------------------------------
// Throttle
// ---------------------------------------------------------------------------

describe('TokenBucket', () => {
  it('should hand out the burst immediately then make callers wait', () => {
    let now = 0;
    const bucket = new TokenBucket(0.5, 1, () => now);

    expect(bucket.reserve()).toBe(0);
    expect(bucket.reserve()).toBe(2);

    now = 4;
    expect(bucket.reserve()).toBe(0);
  });

  it('should not accumulate more tokens than its capacity', () => {
    let now = 0;
    const bucket = new TokenBucket(1, 2, () => now);

    now = 1000;
    expect(bucket.reserve()).toBe(0);
    expect(bucket.reserve()).toBe(0);
    expect(bucket.reserve()).toBe(1);
  });
});

describe('ThrottleLayer', () => {
  it('should forward calls within the burst', async () => {
    const { accessor, store } = createMockAccessor({ read: true });
    store.set('a.txt', new Uint8Array([1]));
    const op = new Operator(accessor).layer(
      new ThrottleLayer({ opsPerSecond: 10, burst: 5, now: () => 0 })
    );

    await op.read('a.txt');
    await op.read('a.txt');
    expect(accessor.read).toHaveBeenCalledTimes(2);
  });

  it('should reject invalid settings', () => {
    expect(() => new ThrottleLayer({ opsPerSecond: 0 })).toThrow('opsPerSecond must be positive');
    expect(() => new ThrottleLayer({ opsPerSecond: 1, burst: 0 })).toThrow(
      'burst must be at least 1'
    );
  });
});

// ---------------------------------------------------------------------------
// Timeout
// ---------------------------------------------------------------------------

describe('TimeoutLayer', () => {
  it('should fail slow async calls with a temporary error', async () => {
    const { accessor } = createMockAccessor({ stat: true });
    accessor.stat.mockImplementationOnce(() => new Promise<Metadata>(() => undefined));
    const op = new Operator(accessor).layer(new TimeoutLayer({ timeoutMs: 20 }));

    await expect(op.stat('slow.txt')).rejects.toMatchObject({
      kind: 'Unexpected',
      temporary: true,
      message: 'Unexpected error: stat timed out after 20ms',
    });
  });

  it('should pass fast and synchronous calls through', async () => {
    const op = new Operator(new MemoryBackend()).layer(new TimeoutLayer({ timeoutMs: 1000 }));
    await op.write('a.txt', 'a');
    expect((await op.stat('a.txt')).contentLength).toBe(1);
    expect(op.blocking().exists('a.txt')).toBe(true);
  });

  it('should abort a writer that opens after the deadline', async () => {
    const { accessor } = createMockAccessor({ write: true });
    const writer = {
      write: vi.fn(() => undefined),
      close: vi.fn(() => Metadata.file()),
      abort: vi.fn(() => undefined),
    };
    let open = (): void => undefined;
    accessor.write.mockImplementationOnce(
      () =>
        new Promise<typeof writer>((resolve) => {
          open = () => resolve(writer);
        })
    );
    const op = new Operator(accessor).layer(new TimeoutLayer({ timeoutMs: 5 }));

    await expect(op.write('late.txt', 'x')).rejects.toThrow('write timed out after 5ms');
    open();

    await vi.waitFor(() => expect(writer.abort).toHaveBeenCalledOnce());
    expect(writer.close).not.toHaveBeenCalled();
    expect(writer.write).not.toHaveBeenCalled();
  });

  it('should close a lister that opens after the deadline', async () => {
    const { accessor } = createMockAccessor({ list: true });
    const lister = pagedLister([[fileEntry('a.txt')]]);
    let open = (): void => undefined;
    accessor.list.mockImplementationOnce(
      () =>
        new Promise<typeof lister>((resolve) => {
          open = () => resolve(lister);
        })
    );
    const op = new Operator(accessor).layer(new TimeoutLayer({ timeoutMs: 5 }));

    await expect(op.list('/')).rejects.toThrow('list timed out after 5ms');
    open();

    await vi.waitFor(() => expect(lister.close).toHaveBeenCalledOnce());
    expect(lister.next).not.toHaveBeenCalled();
  });

  it('should reject a non-positive timeout', () => {
    expect(() => new TimeoutLayer({ timeoutMs: 0 })).toThrow('timeoutMs must be positive');
  });
});

// ---------------------------------------------------------------------------
// Concurrent limit
// ---------------------------------------------------------------------------

describe('ConcurrentLimitLayer', () => {
  it('should keep at most `permits` calls in flight', async () => {
    const { accessor } = createMockAccessor({ stat: true });
    const release: Array<() => void> = [];
    accessor.stat.mockImplementation(
      () =>
        new Promise<Metadata>((resolve) => {
          release.push(() => resolve(Metadata.file({ contentLength: 1 })));
        })
    );
    const op = new Operator(accessor).layer(new ConcurrentLimitLayer({ permits: 1 }));

    const first = op.stat('a.txt');
    const second = op.stat('b.txt');

    await vi.waitFor(() => expect(accessor.stat).toHaveBeenCalledTimes(1));
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(accessor.stat).toHaveBeenCalledTimes(1);

    release[0]?.();
    await first;
    await vi.waitFor(() => expect(accessor.stat).toHaveBeenCalledTimes(2));
    release[1]?.();
    await expect(second).resolves.toBeInstanceOf(Metadata);
  });

  it('should let blocking calls through', () => {
    const op = new Operator(new MemoryBackend())
      .layer(new ConcurrentLimitLayer({ permits: 1 }))
      .blocking();
    op.write('a.txt', 'a');
    expect(op.exists('a.txt')).toBe(true);
  });

  it('should reject invalid permits', () => {
    expect(() => new ConcurrentLimitLayer({ permits: 0 })).toThrow(
      'permits must be a positive integer'
    );
  });
});

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

describe('LoggingLayer', () => {
  it('should log start and finish at debug', async () => {
    const mockLogger = createMockLogger();
    const op = new Operator(new MemoryBackend()).layer(
      new LoggingLayer({ logger: asLogger(mockLogger) })
    );

    await op.createDir('logs/');

    expect(mockLogger.child).toHaveBeenCalledWith({ scheme: 'memory' });
    expect(mockLogger.debug).toHaveBeenCalledWith(
      { operation: 'createDir', path: 'logs/' },
      'Storage operation started'
    );
    const finished = mockLogger.debug.mock.calls.find(([, message]) => message === 'Storage operation finished');
    expect(finished?.[0]).toMatchObject({ operation: 'createDir', path: 'logs/' });
    expect(typeof finished?.[0].durationMs).toBe('number');
  });

  it('should log expected failures at warn', async () => {
    const mockLogger = createMockLogger();
    const op = new Operator(new MemoryBackend()).layer(
      new LoggingLayer({ logger: asLogger(mockLogger) })
    );

    await expect(op.read('missing.txt')).rejects.toMatchObject({ kind: 'NotFound' });

    expect(mockLogger.warn).toHaveBeenCalledOnce();
    expect(mockLogger.warn.mock.calls[0]?.[0]).toMatchObject({
      operation: 'read',
      path: 'missing.txt',
      kind: 'NotFound',
      err: 'Not found: missing.txt',
    });
    expect(mockLogger.error).not.toHaveBeenCalled();
  });

  it('should log unexpected failures at error and normalize them', async () => {
    const { accessor } = createMockAccessor({ stat: true });
    accessor.stat.mockImplementationOnce(() => {
      throw new Error('disk on fire');
    });
    const mockLogger = createMockLogger();
    const op = new Operator(accessor).layer(new LoggingLayer({ logger: asLogger(mockLogger) }));

    await expect(op.stat('a.txt')).rejects.toMatchObject({
      kind: 'Unexpected',
      message: 'Unexpected error: disk on fire',
    });
    expect(mockLogger.error.mock.calls[0]?.[1]).toBe('Storage operation failed');
  });
});

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

describe('MetricsLayer', () => {
  it('should count calls and failures per operation', async () => {
    const recorder = new InMemoryMetrics();
    const op = new Operator(new MemoryBackend()).layer(new MetricsLayer({ recorder }));

    await op.write('a.txt', 'a');
    await op.stat('a.txt');
    await expect(op.stat('b.txt')).rejects.toMatchObject({ kind: 'NotFound' });

    const snapshot = recorder.snapshot();
    expect(snapshot['memory.stat']).toMatchObject({
      count: 2,
      errors: 1,
      errorsByKind: { NotFound: 1 },
    });
    expect(snapshot['memory.write']?.count).toBe(1);
    expect(snapshot['memory.writer.close']?.count).toBe(1);
    expect(Object.keys(snapshot).sort()).toEqual([
      'memory.stat',
      'memory.write',
      'memory.writer.close',
      'memory.writer.write',
    ]);
  });

  it('should expose a default recorder and reset it', async () => {
    const layer = new MetricsLayer();
    const op = new Operator(new MemoryBackend()).layer(layer);
    await op.createDir('d/');

    expect(layer.recorder).toBeInstanceOf(InMemoryMetrics);
    const recorder = layer.recorder;
    if (!(recorder instanceof InMemoryMetrics)) throw new Error('unexpected recorder');
    expect(recorder.snapshot()['memory.createDir']?.count).toBe(1);
    recorder.reset();
    expect(recorder.snapshot()).toEqual({});
  });

  it('should accept custom recorders', async () => {
    const record = vi.fn();
    const { accessor } = createMockAccessor({ delete: true });
    accessor.delete.mockImplementationOnce(() => {
      throw storageError(ErrorKind.PermissionDenied, 'locked');
    });
    const op = new Operator(accessor).layer(new MetricsLayer({ recorder: { record } }));

    await expect(op.delete('a.txt')).rejects.toMatchObject({ kind: 'PermissionDenied' });
    expect(record).toHaveBeenCalledOnce();
    expect(record.mock.calls[0]?.[0]).toMatchObject({
      scheme: 'mock',
      operation: 'delete',
      error: 'PermissionDenied',
    });
  });
});
