import { describe, it, expect, beforeEach } from 'vitest';

import { Operator } from '@/operator/operator.js';
import type { RawLister } from '@/raw/accessor.js';
import { BLOCKING, expectSync } from '@/raw/awaitable.js';
import { MemoryBackend } from '@/storage/memory-backend.js';

import { text } from '../helpers.js';

const nextPaths = (lister: RawLister) =>
  expectSync(lister.next(BLOCKING), 'list')?.map((entry) => entry.path) ?? null;

describe('MemoryBackend', () => {
  let backend: MemoryBackend;
  let op: Operator;

  beforeEach(() => {
    backend = new MemoryBackend();
    op = new Operator(backend);
  });

  describe('objects', () => {
    it('should store data with an md5 etag', async () => {
      const metadata = await op.write('a.txt', 'hello world');

      expect(metadata.contentLength).toBe(11);
      expect(metadata.etag).toBe('"5eb63bbbe01eeed093cb22bb8f5acdc3"');
      expect(text(await op.read('a.txt'))).toBe('hello world');
      expect((await op.stat('a.txt')).etag).toBe(metadata.etag);
    });

    it('should keep write attributes in metadata', async () => {
      await op.write('a.txt', 'x', {
        contentType: 'text/plain',
        cacheControl: 'no-cache',
        userMetadata: { owner: 'ops' },
      });

      const metadata = await op.stat('a.txt');
      expect(metadata.contentType).toBe('text/plain');
      expect(metadata.cacheControl).toBe('no-cache');
      expect(metadata.userMetadata).toEqual({ owner: 'ops' });
    });

    it('should append to existing objects', async () => {
      await op.write('log.txt', 'ab', { contentType: 'text/plain' });
      const metadata = await op.write('log.txt', 'cd', { append: true });

      expect(metadata.contentLength).toBe(4);
      expect(metadata.contentType).toBe('text/plain');
      expect(text(await op.read('log.txt'))).toBe('abcd');
    });

    it('should clamp ranges to the object', async () => {
      await op.write('a.txt', 'hello');

      expect(text(await op.read('a.txt', { range: { start: 3 } }))).toBe('lo');
      expect(text(await op.read('a.txt', { range: { start: 3, end: 100 } }))).toBe('lo');
      expect(await op.read('a.txt', { range: { start: 10 } })).toHaveLength(0);
    });

    it('should refuse to overwrite with ifNotExists', async () => {
      await op.write('a.txt', 'one');

      await expect(op.write('a.txt', 'two', { ifNotExists: true })).rejects.toMatchObject({
        kind: 'ConditionNotMatch',
        message: 'Condition not matched: a.txt already exists',
      });
      expect(text(await op.read('a.txt'))).toBe('one');
    });

    it('should check etag conditions on read', async () => {
      const { etag } = await op.write('a.txt', 'hello world');

      await expect(op.read('a.txt', { ifMatch: '"other"' })).rejects.toMatchObject({
        kind: 'ConditionNotMatch',
      });
      await expect(op.read('a.txt', { ifNoneMatch: etag })).rejects.toMatchObject({
        kind: 'ConditionNotMatch',
      });
      expect(text(await op.read('a.txt', { ifMatch: '*' }))).toBe('hello world');
    });

    it('should reject versioned calls', () => {
      expect(() => backend.read('a.txt', { version: 'v1' })).toThrow(
        'Unsupported: memory backend does not keep versions'
      );
    });

    it('should copy and rename', async () => {
      await op.write('a.txt', 'data');
      await op.copy('a.txt', 'b.txt');
      await op.rename('a.txt', 'c.txt');

      expect(await op.exists('a.txt')).toBe(false);
      expect(text(await op.read('b.txt'))).toBe('data');
      expect(text(await op.read('c.txt'))).toBe('data');
    });

    it('should not presign', async () => {
      await expect(op.presignRead('a.txt', 60)).rejects.toMatchObject({ kind: 'Unsupported' });
    });

    it('should reject writes after close', () => {
      const writer = backend.write('a.txt', {});
      writer.close(BLOCKING);

      expect(() => writer.write(new Uint8Array([1]), BLOCKING)).toThrow(
        'Closed: writer for a.txt is finished'
      );
    });
  });

  describe('directories', () => {
    it('should treat parents of files as directories', async () => {
      await op.write('a/b/c.txt', 'x');

      expect((await op.stat('a/')).isDir()).toBe(true);
      expect((await op.stat('a/b/')).isDir()).toBe(true);
      await expect(op.stat('z/')).rejects.toMatchObject({ kind: 'NotFound' });
    });

    it('should list one level in path order', () => {
      backend.createDir('a/b/');
      backend.write('a/x.txt', {}).close(BLOCKING);
      backend.write('top.txt', {}).close(BLOCKING);

      const lister = backend.list('a/', {});
      expect(nextPaths(lister)).toEqual(['a/b/', 'a/x.txt']);
      expect(nextPaths(lister)).toBeNull();
    });

    it('should list recursively with pages and startAfter', () => {
      backend.createDir('a/b/');
      backend.write('a/x.txt', {}).close(BLOCKING);

      expect(nextPaths(backend.list('/', { recursive: true }))).toEqual([
        'a/',
        'a/b/',
        'a/x.txt',
      ]);

      const paged = backend.list('/', { recursive: true, limit: 1, startAfter: 'a/' });
      expect(nextPaths(paged)).toEqual(['a/b/']);
      expect(nextPaths(paged)).toEqual(['a/x.txt']);
      expect(nextPaths(paged)).toBeNull();
    });

    it('should scope objects to the configured root', async () => {
      const scoped = new Operator(new MemoryBackend({ root: '/tenant' }));
      await scoped.write('a.txt', 'x');

      expect(scoped.info().root).toBe('/tenant/');
      expect((await scoped.listAll('/')).map((entry) => entry.path)).toEqual(['a.txt']);
    });
  });

  describe('blocking', () => {
    it('should serve the blocking operator', () => {
      const blocking = op.blocking();
      blocking.write('a.txt', 'sync');

      expect(text(blocking.read('a.txt'))).toBe('sync');
      expect(blocking.listAll('/').map((entry) => entry.path)).toEqual(['a.txt']);
    });
  });
});
