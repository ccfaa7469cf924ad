// Filesystem storage backend.
//
// Maps operator paths onto a directory on the local filesystem. Blocking
// calls go through the synchronous node:fs API, async calls through
// node:fs/promises. Writes land in a staging file that is renamed into place
// on close; appends write to the target directly.

import { randomUUID } from 'node:crypto';
import {
  closeSync,
  copyFileSync,
  fstatSync,
  mkdirSync,
  openSync,
  readdirSync,
  readFileSync,
  readSync,
  renameSync,
  rmdirSync,
  statSync,
  unlinkSync,
  writeSync,
  type Dirent,
  type Stats,
} from 'node:fs';
import {
  copyFile,
  mkdir,
  open,
  readdir,
  readFile,
  rename,
  rmdir,
  stat,
  unlink,
  type FileHandle,
} from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

import { z } from 'zod';

import { ErrorKind, isStorageError, storageError, type StorageError } from '../errors/index.js';
import type {
  Accessor,
  AccessorInfo,
  BatchDeleteResult,
  RawLister,
  RawWriter,
} from '../raw/accessor.js';
import type { Awaitable, CallContext } from '../raw/awaitable.js';
import { isDirPath } from '../raw/path.js';
import { Capability } from '../types/capability.js';
import { Entry } from '../types/entry.js';
import { Metadata } from '../types/metadata.js';
import type {
  DeleteOptions,
  ListOptions,
  PresignedRequest,
  ReadOptions,
  StatOptions,
  WriteOptions,
} from '../types/options.js';
import type { ServiceDefinition } from './types.js';

export const FsConfigSchema = z
  .object({
    /** Directory every operator path is resolved under */
    root: z.string().min(1, 'root is required'),
  })
  .strict();

export type FsConfig = z.infer<typeof FsConfigSchema>;

const DEFAULT_PAGE_SIZE = 1000;

/** Name prefix of in-flight write files; hidden from listings */
const STAGING_PREFIX = '.~write-';

export const FS_CAPABILITY = new Capability({
  stat: true,
  read: true,
  readWithRange: true,
  write: true,
  writeCanEmpty: true,
  writeCanAppend: true,
  writeCanMulti: true,
  createDir: true,
  delete: true,
  copy: true,
  rename: true,
  list: true,
  listWithLimit: true,
  blocking: true,
});

// ---------------------------------------------------------------------------
// errno translation
// ---------------------------------------------------------------------------

const ERRNO_KINDS: Record<string, ErrorKind> = {
  ENOENT: ErrorKind.NotFound,
  EEXIST: ErrorKind.AlreadyExists,
  EACCES: ErrorKind.PermissionDenied,
  EPERM: ErrorKind.PermissionDenied,
  EROFS: ErrorKind.PermissionDenied,
  EISDIR: ErrorKind.IsADirectory,
  ENOTDIR: ErrorKind.NotADirectory,
  ENOTEMPTY: ErrorKind.Conflict,
  EINVAL: ErrorKind.InvalidInput,
  ENAMETOOLONG: ErrorKind.InvalidInput,
};

/** errno codes worth retrying */
const TEMPORARY_CODES = new Set(['EAGAIN', 'EBUSY', 'EMFILE', 'ENFILE', 'EINTR']);

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function translateFsError(error: unknown, path: string): StorageError {
  if (isStorageError(error)) return error;
  const code = errnoCode(error);
  const kind = (code !== undefined ? ERRNO_KINDS[code] : undefined) ?? ErrorKind.Unexpected;
  const message = error instanceof Error ? error.message : String(error);
  return storageError(kind, message, {
    cause: error,
    temporary: code !== undefined && TEMPORARY_CODES.has(code),
    context: { path, ...(code !== undefined && { errno: code }) },
  });
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export class FsBackend implements Accessor {
  private readonly root: string;

  constructor(config: FsConfig) {
    this.root = resolve(config.root);
  }

  info(): AccessorInfo {
    return { scheme: 'fs', root: '/', name: this.root, capability: FS_CAPABILITY };
  }

  createDir(path: string, ctx: CallContext): Awaitable<void> {
    const target = this.resolvePath(path);
    if (ctx.blocking) {
      return this.syncCall(path, () => {
        mkdirSync(target, { recursive: true });
      });
    }
    return this.asyncCall(path, async () => {
      await mkdir(target, { recursive: true });
    });
  }

  stat(path: string, options: StatOptions, ctx: CallContext): Awaitable<Metadata> {
    rejectVersion(options.version, path);
    const target = this.resolvePath(path);
    if (ctx.blocking) {
      return this.syncCall(path, () => toMetadata(statSync(target)));
    }
    return this.asyncCall(path, async () => toMetadata(await stat(target)));
  }

  read(path: string, options: ReadOptions, ctx: CallContext): Awaitable<Uint8Array> {
    rejectVersion(options.version, path);
    const target = this.resolvePath(path);
    const { range } = options;

    if (ctx.blocking) {
      return this.syncCall(path, () => {
        if (range === undefined) return new Uint8Array(readFileSync(target));
        const fd = openSync(target, 'r');
        try {
          const end = Math.min(range.end ?? Infinity, fstatSync(fd).size);
          const buffer = new Uint8Array(Math.max(0, end - range.start));
          const read = readSync(fd, buffer, 0, buffer.length, range.start);
          return buffer.subarray(0, read);
        } finally {
          closeSync(fd);
        }
      });
    }

    return this.asyncCall(path, async () => {
      if (range === undefined) return new Uint8Array(await readFile(target));
      const handle = await open(target, 'r');
      try {
        const end = Math.min(range.end ?? Infinity, (await handle.stat()).size);
        const buffer = new Uint8Array(Math.max(0, end - range.start));
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, range.start);
        return buffer.subarray(0, bytesRead);
      } finally {
        await handle.close();
      }
    });
  }

  write(path: string, options: WriteOptions, ctx: CallContext): Awaitable<RawWriter> {
    const target = this.resolvePath(path);
    const append = options.append === true;
    const staging = append ? target : join(dirname(target), `${STAGING_PREFIX}${randomUUID()}`);
    const flags = append ? 'a' : 'w';

    if (ctx.blocking) {
      return this.syncCall(path, () => {
        mkdirSync(dirname(target), { recursive: true });
        return this.syncWriter(path, openSync(staging, flags), staging, target);
      });
    }
    return this.asyncCall(path, async () => {
      await mkdir(dirname(target), { recursive: true });
      return this.asyncWriter(path, await open(staging, flags), staging, target);
    });
  }

  delete(path: string, options: DeleteOptions, ctx: CallContext): Awaitable<void> {
    rejectVersion(options.version, path);
    const target = this.resolvePath(path);
    const dir = isDirPath(path);
    if (ctx.blocking) {
      return this.syncCall(path, () => (dir ? rmdirSync(target) : unlinkSync(target)));
    }
    return this.asyncCall(path, () => (dir ? rmdir(target) : unlink(target)));
  }

  deleteBatch(paths: string[]): BatchDeleteResult {
    throw storageError(ErrorKind.Unsupported, 'fs backend has no batch delete', {
      context: { path: paths[0], operation: 'deleteBatch' },
    });
  }

  list(path: string, options: ListOptions, ctx: CallContext): Awaitable<RawLister> {
    const target = this.resolvePath(path);
    const pageSize = options.limit ?? DEFAULT_PAGE_SIZE;
    const toLister = (dirents: Dirent[]): RawLister => this.pagedLister(path, dirents, pageSize);

    if (ctx.blocking) {
      return this.syncCall(path, () => {
        try {
          return toLister(readdirSync(target, { withFileTypes: true }));
        } catch (error) {
          // A directory that does not exist lists as empty.
          if (errnoCode(error) === 'ENOENT') return toLister([]);
          throw error;
        }
      });
    }
    return this.asyncCall(path, async () => {
      try {
        return toLister(await readdir(target, { withFileTypes: true }));
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') return toLister([]);
        throw error;
      }
    });
  }

  copy(from: string, to: string, ctx: CallContext): Awaitable<void> {
    const source = this.resolvePath(from);
    const target = this.resolvePath(to);
    if (ctx.blocking) {
      return this.syncCall(from, () => {
        mkdirSync(dirname(target), { recursive: true });
        copyFileSync(source, target);
      });
    }
    return this.asyncCall(from, async () => {
      await mkdir(dirname(target), { recursive: true });
      await copyFile(source, target);
    });
  }

  rename(from: string, to: string, ctx: CallContext): Awaitable<void> {
    const source = this.resolvePath(from);
    const target = this.resolvePath(to);
    if (ctx.blocking) {
      return this.syncCall(from, () => {
        mkdirSync(dirname(target), { recursive: true });
        renameSync(source, target);
      });
    }
    return this.asyncCall(from, async () => {
      await mkdir(dirname(target), { recursive: true });
      await rename(source, target);
    });
  }

  presign(path: string): PresignedRequest {
    throw storageError(ErrorKind.Unsupported, 'fs backend cannot presign requests', {
      context: { path, operation: 'presign' },
    });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private resolvePath(path: string): string {
    return path === '/' ? this.root : join(this.root, path);
  }

  private syncCall<T>(path: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw translateFsError(error, path);
    }
  }

  private asyncCall<T>(path: string, fn: () => Promise<T>): Promise<T> {
    return fn().catch((error: unknown) => {
      throw translateFsError(error, path);
    });
  }

  private pagedLister(path: string, dirents: Dirent[], pageSize: number): RawLister {
    const prefix = path === '/' ? '' : path;
    const entries = dirents
      .filter((dirent) => !dirent.name.startsWith(STAGING_PREFIX))
      .map((dirent) =>
        dirent.isDirectory()
          ? new Entry(`${prefix}${dirent.name}/`, Metadata.dir())
          : new Entry(`${prefix}${dirent.name}`, Metadata.file())
      )
      .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    let offset = 0;
    return {
      next: () => {
        if (offset >= entries.length) return null;
        const page = entries.slice(offset, offset + pageSize);
        offset += page.length;
        return page;
      },
      close: () => {
        offset = entries.length;
      },
    };
  }

  private syncWriter(path: string, fd: number, staging: string, target: string): RawWriter {
    let active = true;
    const release = (): void => {
      if (active) {
        active = false;
        closeSync(fd);
      }
    };
    return {
      write: (chunk) =>
        this.syncCall(path, () => {
          let offset = 0;
          while (offset < chunk.length) {
            offset += writeSync(fd, chunk, offset, chunk.length - offset);
          }
        }),
      close: () =>
        this.syncCall(path, () => {
          release();
          if (staging !== target) renameSync(staging, target);
          return toMetadata(statSync(target));
        }),
      abort: () =>
        this.syncCall(path, () => {
          release();
          if (staging !== target) unlinkSync(staging);
        }),
    };
  }

  private asyncWriter(path: string, handle: FileHandle, staging: string, target: string): RawWriter {
    let active = true;
    const release = async (): Promise<void> => {
      if (active) {
        active = false;
        await handle.close();
      }
    };
    return {
      write: (chunk) =>
        this.asyncCall(path, async () => {
          let offset = 0;
          while (offset < chunk.length) {
            const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
            offset += bytesWritten;
          }
        }),
      close: () =>
        this.asyncCall(path, async () => {
          await release();
          if (staging !== target) await rename(staging, target);
          return toMetadata(await stat(target));
        }),
      abort: () =>
        this.asyncCall(path, async () => {
          await release();
          if (staging !== target) await unlink(staging);
        }),
    };
  }
}

function toMetadata(stats: Stats): Metadata {
  if (stats.isDirectory()) {
    return Metadata.dir({ lastModified: stats.mtime });
  }
  return Metadata.file({ contentLength: stats.size, lastModified: stats.mtime });
}

function rejectVersion(version: string | undefined, path: string): void {
  if (version !== undefined) {
    throw storageError(ErrorKind.Unsupported, 'fs backend does not keep versions', {
      context: { path },
    });
  }
}

export const fsService: ServiceDefinition<FsConfig> = {
  scheme: 'fs',
  schema: FsConfigSchema,
  create: (config) => new FsBackend(config),
};
