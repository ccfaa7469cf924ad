import { existsSync } from 'node:fs';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ErrorKind, storageError } from '@/errors/index.js';
import { Operator } from '@/operator/operator.js';
import { FsBackend, translateFsError } from '@/storage/fs-backend.js';

import { text } from '../helpers.js';

function errnoError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

describe('FsBackend', () => {
  let testDir: string;
  let op: Operator;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'stratum-fs-test-'));
    op = new Operator(new FsBackend({ root: testDir }));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('objects', () => {
    it('should write files under the root', async () => {
      const metadata = await op.write('docs/a.txt', 'hello');

      expect(metadata.contentLength).toBe(5);
      expect(await readFile(join(testDir, 'docs', 'a.txt'), 'utf-8')).toBe('hello');
      expect(text(await op.read('docs/a.txt'))).toBe('hello');
    });

    it('should report size and modification time', async () => {
      await writeFile(join(testDir, 'a.txt'), 'abc');

      const metadata = await op.stat('a.txt');
      expect(metadata.isFile()).toBe(true);
      expect(metadata.contentLength).toBe(3);
      expect(metadata.lastModified).toBeInstanceOf(Date);
    });

    it('should read ranges', async () => {
      await op.write('a.txt', 'hello');

      expect(text(await op.read('a.txt', { range: { start: 1, end: 3 } }))).toBe('el');
      expect(text(await op.read('a.txt', { range: { start: 3 } }))).toBe('lo');
    });

    it('should append', async () => {
      await op.write('log.txt', 'ab');
      await op.write('log.txt', 'cd', { append: true });

      expect(await readFile(join(testDir, 'log.txt'), 'utf-8')).toBe('abcd');
    });

    it('should translate missing files to NotFound', async () => {
      await expect(op.stat('missing.txt')).rejects.toMatchObject({
        kind: 'NotFound',
        context: { errno: 'ENOENT', operation: 'stat', path: 'missing.txt' },
      });
    });

    it('should treat deleting a missing file as success', async () => {
      await expect(op.delete('missing.txt')).resolves.toBeUndefined();
    });

    it('should copy and rename into new directories', async () => {
      await op.write('a.txt', 'data');
      await op.copy('a.txt', 'x/b.txt');
      await op.rename('a.txt', 'y/c.txt');

      expect(existsSync(join(testDir, 'a.txt'))).toBe(false);
      expect(text(await op.read('x/b.txt'))).toBe('data');
      expect(text(await op.read('y/c.txt'))).toBe('data');
    });
  });

  describe('staged writes', () => {
    it('should hide in-flight writes until close', async () => {
      const file = await op.open('a.txt', 'w');
      await file.write('partial');
      await file.flush();

      expect(await op.listAll('/')).toEqual([]);
      expect(existsSync(join(testDir, 'a.txt'))).toBe(false);

      await file.close();
      expect((await op.listAll('/')).map((entry) => entry.path)).toEqual(['a.txt']);
      expect(await readFile(join(testDir, 'a.txt'), 'utf-8')).toBe('partial');
    });

    it('should leave nothing behind when a write is aborted', async () => {
      const backend = new FsBackend({ root: testDir });
      const ctx = { blocking: false };
      const writer = await backend.write('a.txt', {}, ctx);
      await writer.write(new TextEncoder().encode('discard me'), ctx);
      await writer.abort(ctx);

      expect(await readdir(testDir)).toEqual([]);
    });
  });

  describe('directories', () => {
    it('should list directories before descending into them', async () => {
      await op.write('a.txt', 'a');
      await op.write('d/x.txt', 'x');
      await op.createDir('e/');

      expect((await op.listAll('/')).map((entry) => entry.path)).toEqual(['a.txt', 'd/', 'e/']);
      expect((await op.listAll('/', { recursive: true })).map((entry) => entry.path)).toEqual([
        'a.txt',
        'd/',
        'e/',
        'd/x.txt',
      ]);
    });

    it('should list a missing directory as empty', async () => {
      expect(await op.listAll('nope/')).toEqual([]);
    });

    it('should refuse to delete a non-empty directory', async () => {
      await op.write('d/x.txt', 'x');

      await expect(op.delete('d/')).rejects.toMatchObject({ kind: 'Conflict' });
    });

    it('should remove a tree', async () => {
      await op.write('d/x.txt', 'x');
      await op.write('d/e/y.txt', 'y');

      await op.removeAll('d/');

      expect(existsSync(join(testDir, 'd'))).toBe(false);
    });
  });

  describe('blocking', () => {
    it('should serve the blocking operator', () => {
      const blocking = op.blocking();
      blocking.write('d/a.txt', 'sync');
      blocking.createDir('e/');

      expect(text(blocking.read('d/a.txt', { range: { start: 1 } }))).toBe('ync');
      expect(blocking.stat('d/a.txt').contentLength).toBe(4);
      expect(blocking.listAll('/').map((entry) => entry.path)).toEqual(['d/', 'e/']);

      blocking.removeAll('d/');
      expect(blocking.exists('d/a.txt')).toBe(false);
    });
  });

  describe('translateFsError', () => {
    it('should map errno codes to kinds', () => {
      expect(translateFsError(errnoError('EACCES'), 'a').kind).toBe('PermissionDenied');
      expect(translateFsError(errnoError('EISDIR'), 'a').kind).toBe('IsADirectory');
      expect(translateFsError(errnoError('EXDEV'), 'a').kind).toBe('Unexpected');
    });

    it('should mark busy resources as temporary', () => {
      const error = translateFsError(errnoError('EBUSY'), 'a');

      expect(error.kind).toBe('Unexpected');
      expect(error.temporary).toBe(true);
      expect(error.context).toMatchObject({ path: 'a', errno: 'EBUSY' });
    });

    it('should pass storage errors through', () => {
      const original = storageError(ErrorKind.NotFound, 'a');
      expect(translateFsError(original, 'b')).toBe(original);
    });
  });
});
