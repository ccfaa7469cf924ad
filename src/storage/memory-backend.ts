// In-memory storage backend.
//
// Objects live in a Map keyed by absolute path. Directories are either
// explicit markers (createDir) or implied by the files below them. Every call
// completes synchronously, so this backend serves both operator conventions.

import { createHash } from 'node:crypto';

import { z } from 'zod';

import { ErrorKind, storageError, toStorageError } from '../errors/index.js';
import type {
  Accessor,
  AccessorInfo,
  BatchDeleteResult,
  RawLister,
  RawWriter,
} from '../raw/accessor.js';
import { concat } from '../raw/bytes.js';
import { absolutePath, isDirPath, normalizeRoot, parentPath, relativePath } from '../raw/path.js';
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

export const MemoryConfigSchema = z
  .object({
    root: z.string().optional(),
  })
  .strict();

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;

const DEFAULT_PAGE_SIZE = 1000;

export const MEMORY_CAPABILITY = new Capability({
  stat: true,
  statWithIfMatch: true,
  statWithIfNoneMatch: true,
  read: true,
  readWithRange: true,
  readWithIfMatch: true,
  readWithIfNoneMatch: true,
  readWithIfModifiedSince: true,
  write: true,
  writeCanEmpty: true,
  writeCanAppend: true,
  writeCanMulti: true,
  writeWithContentType: true,
  writeWithCacheControl: true,
  writeWithContentDisposition: true,
  writeWithIfNotExists: true,
  writeWithUserMetadata: true,
  createDir: true,
  delete: true,
  deleteBatch: true,
  copy: true,
  rename: true,
  list: true,
  listWithLimit: true,
  listWithStartAfter: true,
  listWithRecursive: true,
  blocking: true,
  deleteMaxSize: 1000,
});

interface StoredObject {
  data: Uint8Array;
  metadata: Metadata;
}

interface Conditions {
  ifMatch?: string;
  ifNoneMatch?: string;
  ifModifiedSince?: Date;
}

export class MemoryBackend implements Accessor {
  private readonly objects = new Map<string, StoredObject>();
  private readonly dirs = new Set<string>();
  private readonly root: string;

  constructor(config: MemoryConfig = {}) {
    this.root = normalizeRoot(config.root);
  }

  info(): AccessorInfo {
    return { scheme: 'memory', root: this.root, name: '', capability: MEMORY_CAPABILITY };
  }

  createDir(path: string): void {
    let dir = absolutePath(this.root, path);
    while (dir !== this.root && !this.dirs.has(dir)) {
      this.dirs.add(dir);
      dir = parentPath(dir);
    }
  }

  stat(path: string, options: StatOptions): Metadata {
    rejectVersion(options.version, path);
    const abs = absolutePath(this.root, path);
    if (isDirPath(path)) {
      if (abs === this.root || this.dirExists(abs)) return Metadata.dir();
      throw notFound(path);
    }
    const object = this.objects.get(abs);
    if (object === undefined) throw notFound(path);
    checkConditions(object.metadata, options, path);
    return object.metadata;
  }

  read(path: string, options: ReadOptions): Uint8Array {
    rejectVersion(options.version, path);
    const object = this.objects.get(absolutePath(this.root, path));
    if (object === undefined) throw notFound(path);
    checkConditions(object.metadata, options, path);

    const { data } = object;
    const start = Math.min(options.range?.start ?? 0, data.length);
    const end = Math.min(options.range?.end ?? data.length, data.length);
    return data.slice(start, Math.max(start, end));
  }

  write(path: string, options: WriteOptions): RawWriter {
    const abs = absolutePath(this.root, path);
    if (options.ifNotExists === true && this.objects.has(abs)) {
      throw alreadyStored(path);
    }

    let parts: Uint8Array[] = [];
    let finished = false;
    const ensureOpen = (): void => {
      if (finished) {
        throw storageError(ErrorKind.Closed, `writer for ${path} is finished`, {
          context: { path },
        });
      }
    };

    return {
      write: (chunk) => {
        ensureOpen();
        parts.push(chunk.slice());
      },
      close: () => {
        ensureOpen();
        finished = true;
        const previous = this.objects.get(abs);
        if (options.ifNotExists === true && previous !== undefined) {
          throw alreadyStored(path);
        }
        const appended = options.append === true ? previous : undefined;
        const data = concat(appended === undefined ? parts : [appended.data, ...parts]);
        parts = [];

        const metadata = Metadata.file({
          contentLength: data.length,
          lastModified: new Date(),
          etag: etagOf(data),
          contentMd5: createHash('md5').update(data).digest('base64'),
          contentType: options.contentType ?? appended?.metadata.contentType,
          cacheControl: options.cacheControl,
          contentDisposition: options.contentDisposition,
          userMetadata: options.userMetadata,
        });
        this.objects.set(abs, { data, metadata });
        return metadata;
      },
      abort: () => {
        finished = true;
        parts = [];
      },
    };
  }

  delete(path: string, options: DeleteOptions): void {
    rejectVersion(options.version, path);
    const abs = absolutePath(this.root, path);
    if (isDirPath(path)) {
      if (this.dirs.delete(abs) || this.dirExists(abs)) return;
      throw notFound(path);
    }
    if (!this.objects.delete(abs)) throw notFound(path);
  }

  deleteBatch(paths: string[]): BatchDeleteResult {
    const result: BatchDeleteResult = { deleted: [], failed: [] };
    for (const path of paths) {
      try {
        this.delete(path, {});
        result.deleted.push(path);
      } catch (error) {
        result.failed.push({ path, error: toStorageError(error, { path }) });
      }
    }
    return result;
  }

  list(path: string, options: ListOptions): RawLister {
    const dir = absolutePath(this.root, path);
    const { startAfter } = options;
    const entries = this.snapshot(dir, options.recursive === true).filter(
      (entry) => startAfter === undefined || entry.path > startAfter
    );

    const pageSize = options.limit ?? DEFAULT_PAGE_SIZE;
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

  copy(from: string, to: string): void {
    const object = this.objects.get(absolutePath(this.root, from));
    if (object === undefined) throw notFound(from);
    this.objects.set(absolutePath(this.root, to), {
      data: object.data.slice(),
      metadata: object.metadata.with({ lastModified: new Date() }),
    });
  }

  rename(from: string, to: string): void {
    this.copy(from, to);
    this.objects.delete(absolutePath(this.root, from));
  }

  presign(path: string): PresignedRequest {
    throw storageError(ErrorKind.Unsupported, 'memory backend cannot presign requests', {
      context: { path, operation: 'presign' },
    });
  }

  private dirExists(dir: string): boolean {
    if (this.dirs.has(dir)) return true;
    for (const key of this.objects.keys()) {
      if (key.startsWith(dir)) return true;
    }
    for (const key of this.dirs) {
      if (key.startsWith(dir)) return true;
    }
    return false;
  }

  /** Sorted entries below `dir`, one level deep unless `recursive`. */
  private snapshot(dir: string, recursive: boolean): Entry[] {
    const found = new Map<string, Metadata>();
    const addDirs = (key: string): void => {
      let parent = parentPath(key);
      while (parent.length > dir.length && parent.startsWith(dir)) {
        if (!found.has(parent)) found.set(parent, Metadata.dir());
        if (!recursive && parentPath(parent) === dir) break;
        parent = parentPath(parent);
      }
    };

    for (const [key, object] of this.objects) {
      if (!key.startsWith(dir)) continue;
      if (recursive || parentPath(key) === dir) found.set(key, object.metadata);
      addDirs(key);
    }
    for (const key of this.dirs) {
      if (!key.startsWith(dir) || key === dir) continue;
      if (recursive || parentPath(key) === dir) found.set(key, Metadata.dir());
      addDirs(key);
    }

    const entries: Entry[] = [];
    for (const [key, metadata] of found) {
      if (!recursive && parentPath(key) !== dir) continue;
      entries.push(new Entry(relativePath(this.root, key), metadata));
    }
    return entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }
}

function etagOf(data: Uint8Array): string {
  return `"${createHash('md5').update(data).digest('hex')}"`;
}

function checkConditions(metadata: Metadata, conditions: Conditions, path: string): void {
  const { ifMatch, ifNoneMatch, ifModifiedSince } = conditions;
  if (ifMatch !== undefined && ifMatch !== '*' && metadata.etag !== ifMatch) {
    throw conditionFailed(`etag ${metadata.etag ?? '(none)'} does not match ${ifMatch}`, path);
  }
  if (ifNoneMatch !== undefined && (ifNoneMatch === '*' || metadata.etag === ifNoneMatch)) {
    throw conditionFailed(`etag matches ${ifNoneMatch}`, path);
  }
  const modified = metadata.lastModified;
  if (ifModifiedSince !== undefined && modified !== undefined && modified <= ifModifiedSince) {
    throw conditionFailed(`not modified since ${ifModifiedSince.toISOString()}`, path);
  }
}

function rejectVersion(version: string | undefined, path: string): void {
  if (version !== undefined) {
    throw storageError(ErrorKind.Unsupported, 'memory backend does not keep versions', {
      context: { path },
    });
  }
}

function notFound(path: string) {
  return storageError(ErrorKind.NotFound, path, { context: { path } });
}

function conditionFailed(message: string, path: string) {
  return storageError(ErrorKind.ConditionNotMatch, message, { context: { path } });
}

function alreadyStored(path: string) {
  return storageError(ErrorKind.ConditionNotMatch, `${path} already exists`, {
    context: { path },
  });
}

export const memoryService: ServiceDefinition<MemoryConfig> = {
  scheme: 'memory',
  schema: MemoryConfigSchema,
  create: (config) => new MemoryBackend(config),
};
