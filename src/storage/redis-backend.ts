// Redis storage backend.
//
// Each object is one string key holding the raw bytes; directories are
// empty keys ending in "/". Listing walks the keyspace with SCAN. All calls
// go over the network, so the backend is async only.

import type { Redis } from 'ioredis';
import { z } from 'zod';

import { networkErrorCode } from './network.js';
import { createRedisClient, disconnectRedis } from './redis-client.js';
import type { ServiceDefinition } from './types.js';
import { ErrorKind, isStorageError, storageError, type StorageError } from '../errors/index.js';
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
  ListOptions,
  PresignedRequest,
  ReadOptions,
  WriteOptions,
} from '../types/options.js';

const numeric = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((value) => Number(value));

export const RedisConfigSchema = z
  .object({
    /** redis://[user:password@]host[:port][/db] */
    endpoint: z.string().url().optional(),
    host: z.string().min(1).optional(),
    port: numeric.optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    db: numeric.optional(),
    root: z.string().optional(),
    /** Expire written keys after this many seconds */
    ttl: numeric.optional(),
  })
  .strict()
  .refine((config) => config.endpoint !== undefined || config.host !== undefined, {
    message: 'endpoint or host is required',
    path: ['endpoint'],
  });

export type RedisConfig = z.infer<typeof RedisConfigSchema>;

const DEFAULT_SCAN_COUNT = 1000;

export const REDIS_CAPABILITY = new Capability({
  stat: true,
  read: true,
  readWithRange: true,
  write: true,
  writeCanEmpty: true,
  writeCanAppend: true,
  writeCanMulti: true,
  writeWithIfNotExists: true,
  createDir: true,
  delete: true,
  deleteBatch: true,
  copy: true,
  rename: true,
  list: true,
  listWithLimit: true,
  listWithRecursive: true,
  shared: true,
  deleteMaxSize: 1000,
});

// ---------------------------------------------------------------------------
// Reply error translation
// ---------------------------------------------------------------------------

/** Reply prefixes and the kinds they map to. Temporary ones are retryable. */
const REPLY_KINDS: { prefix: string; kind: ErrorKind; temporary?: boolean }[] = [
  { prefix: 'ERR no such key', kind: ErrorKind.NotFound },
  { prefix: 'NOAUTH', kind: ErrorKind.PermissionDenied },
  { prefix: 'WRONGPASS', kind: ErrorKind.PermissionDenied },
  { prefix: 'NOPERM', kind: ErrorKind.PermissionDenied },
  { prefix: 'WRONGTYPE', kind: ErrorKind.Conflict },
  { prefix: 'READONLY', kind: ErrorKind.PermissionDenied },
  { prefix: 'OOM', kind: ErrorKind.Unexpected, temporary: true },
  { prefix: 'BUSY', kind: ErrorKind.Unexpected, temporary: true },
  { prefix: 'LOADING', kind: ErrorKind.Unexpected, temporary: true },
  { prefix: 'TRYAGAIN', kind: ErrorKind.Unexpected, temporary: true },
  { prefix: 'CLUSTERDOWN', kind: ErrorKind.Unexpected, temporary: true },
  { prefix: 'MASTERDOWN', kind: ErrorKind.Unexpected, temporary: true },
];

export function translateRedisError(error: unknown, path: string): StorageError {
  if (isStorageError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && error.name === 'ReplyError') {
    const match = REPLY_KINDS.find((entry) => message.startsWith(entry.prefix));
    return storageError(match?.kind ?? ErrorKind.Unexpected, message, {
      cause: error,
      temporary: match?.temporary,
      context: { path },
    });
  }

  const code = networkErrorCode(error);
  const lostConnection =
    error instanceof Error &&
    (error.name === 'MaxRetriesPerRequestError' || message === 'Connection is closed.');
  return storageError(ErrorKind.Unexpected, message, {
    cause: error,
    temporary: code !== undefined || lostConnection,
    context: { path, ...(code !== undefined && { errno: code }) },
  });
}

/** Escape SCAN MATCH glob characters. */
export function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&');
}

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export class RedisBackend implements Accessor {
  private readonly root: string;
  private readonly ttl: number | undefined;
  private readonly name: string;
  private closed = false;

  constructor(
    private readonly client: Redis,
    options: { root?: string; ttl?: number; name?: string } = {}
  ) {
    this.root = normalizeRoot(options.root);
    this.ttl = options.ttl;
    this.name = options.name ?? '';
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await disconnectRedis(this.client);
  }

  info(): AccessorInfo {
    return { scheme: 'redis', root: this.root, name: this.name, capability: REDIS_CAPABILITY };
  }

  async createDir(path: string): Promise<void> {
    await this.call(path, () => this.client.set(this.key(path), ''));
  }

  async stat(path: string): Promise<Metadata> {
    const key = this.key(path);
    if (isDirPath(path)) {
      if (path === '/' || (await this.call(path, () => this.client.exists(key))) > 0) {
        return Metadata.dir();
      }
      if (await this.hasChildren(key, path)) return Metadata.dir();
      throw notFound(path);
    }

    if ((await this.call(path, () => this.client.exists(key))) === 0) throw notFound(path);
    const length = await this.call(path, () => this.client.strlen(key));
    return Metadata.file({ contentLength: length });
  }

  async read(path: string, options: ReadOptions): Promise<Uint8Array> {
    const key = this.key(path);
    const { range } = options;
    if (range === undefined) {
      const value = await this.call(path, () => this.client.getBuffer(key));
      if (value === null) throw notFound(path);
      return new Uint8Array(value);
    }

    if ((await this.call(path, () => this.client.exists(key))) === 0) throw notFound(path);
    // GETRANGE takes an inclusive end; -1 means the last byte.
    const end = range.end === undefined ? -1 : range.end - 1;
    const value = await this.call(path, () => this.client.getrangeBuffer(key, range.start, end));
    return new Uint8Array(value);
  }

  async write(path: string, options: WriteOptions): Promise<RawWriter> {
    const key = this.key(path);
    let parts: Uint8Array[] = [];

    return {
      write: (chunk) => {
        parts.push(chunk.slice());
      },
      close: async () => {
        const data = Buffer.from(concat(parts));
        parts = [];

        if (options.append === true) {
          const length = await this.call(path, () => this.client.append(key, data));
          return Metadata.file({ contentLength: length });
        }
        if (options.ifNotExists === true) {
          const stored = await this.call(path, () =>
            this.ttl === undefined
              ? this.client.set(key, data, 'NX')
              : this.client.set(key, data, 'EX', this.ttl, 'NX')
          );
          if (stored === null) {
            throw storageError(ErrorKind.ConditionNotMatch, `${path} already exists`, {
              context: { path },
            });
          }
        } else {
          await this.call(path, () =>
            this.ttl === undefined
              ? this.client.set(key, data)
              : this.client.set(key, data, 'EX', this.ttl)
          );
        }
        return Metadata.file({ contentLength: data.length });
      },
      abort: () => {
        parts = [];
      },
    };
  }

  async delete(path: string): Promise<void> {
    const removed = await this.call(path, () => this.client.del(this.key(path)));
    if (removed === 0) throw notFound(path);
  }

  async deleteBatch(paths: string[]): Promise<BatchDeleteResult> {
    if (paths.length === 0) return { deleted: [], failed: [] };
    const first = paths[0] ?? '/';
    await this.call(first, () => this.client.del(...paths.map((path) => this.key(path))));
    // DEL reports a count, not which keys existed; missing keys count as deleted.
    return { deleted: [...paths], failed: [] };
  }

  async list(path: string, options: ListOptions): Promise<RawLister> {
    const prefix = this.key(path);
    const pattern = `${escapeGlob(prefix)}*`;
    const count = options.limit ?? DEFAULT_SCAN_COUNT;
    const recursive = options.recursive === true;
    const dir = absolutePath(this.root, path);
    const seen = new Set<string>();
    let cursor = '0';
    let done = false;

    return {
      next: async () => {
        if (done) return null;
        const [nextCursor, keys] = await this.call(path, () =>
          this.client.scan(cursor, 'MATCH', pattern, 'COUNT', count)
        );
        cursor = nextCursor;
        done = nextCursor === '0';

        const page: Entry[] = [];
        const emit = (absolute: string, metadata: Metadata): void => {
          if (absolute === dir || seen.has(absolute)) return;
          seen.add(absolute);
          page.push(new Entry(relativePath(this.root, absolute), metadata));
        };

        for (const key of keys) {
          const absolute = `/${key}`;
          if (!recursive) {
            const child = directChild(dir, absolute);
            emit(child, isDirPath(child) ? Metadata.dir() : Metadata.file());
            continue;
          }
          // Ancestors between `dir` and the key, outermost first.
          const parents: string[] = [];
          let parent = parentPath(absolute);
          while (parent.length > dir.length) {
            parents.unshift(parent);
            parent = parentPath(parent);
          }
          for (const parent of parents) emit(parent, Metadata.dir());
          emit(absolute, isDirPath(absolute) ? Metadata.dir() : Metadata.file());
        }
        return page;
      },
      close: () => {
        done = true;
      },
    };
  }

  async copy(from: string, to: string): Promise<void> {
    const copied = await this.call(from, () =>
      this.client.copy(this.key(from), this.key(to), 'REPLACE')
    );
    if (copied === 0) throw notFound(from);
  }

  async rename(from: string, to: string): Promise<void> {
    await this.call(from, () => this.client.rename(this.key(from), this.key(to)));
  }

  presign(path: string): PresignedRequest {
    throw storageError(ErrorKind.Unsupported, 'redis backend cannot presign requests', {
      context: { path, operation: 'presign' },
    });
  }

  /** Redis key for a normalized path: the absolute path without its leading "/". */
  private key(path: string): string {
    return absolutePath(this.root, path).slice(1);
  }

  private async hasChildren(prefix: string, path: string): Promise<boolean> {
    let cursor = '0';
    do {
      const [next, keys] = await this.call(path, () =>
        this.client.scan(cursor, 'MATCH', `${escapeGlob(prefix)}*`, 'COUNT', DEFAULT_SCAN_COUNT)
      );
      if (keys.length > 0) return true;
      cursor = next;
    } while (cursor !== '0');
    return false;
  }

  private async call<T>(path: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw translateRedisError(error, path);
    }
  }
}

/** The entry directly below `dir` that contains `absolute`. */
function directChild(dir: string, absolute: string): string {
  const rest = absolute.slice(dir.length);
  const slash = rest.indexOf('/');
  return slash === -1 || slash === rest.length - 1
    ? absolute
    : `${dir}${rest.slice(0, slash + 1)}`;
}

function notFound(path: string) {
  return storageError(ErrorKind.NotFound, path, { context: { path } });
}

function connectionFrom(config: RedisConfig) {
  if (config.endpoint !== undefined) {
    const url = new URL(config.endpoint);
    const db = url.pathname.replace(/^\//, '');
    return {
      host: url.hostname,
      port: url.port === '' ? 6379 : Number(url.port),
      username: url.username === '' ? config.username : decodeURIComponent(url.username),
      password: url.password === '' ? config.password : decodeURIComponent(url.password),
      db: db === '' ? config.db : Number(db),
    };
  }
  return {
    host: config.host ?? '127.0.0.1',
    port: config.port ?? 6379,
    username: config.username,
    password: config.password,
    db: config.db,
  };
}

export const redisService: ServiceDefinition<RedisConfig> = {
  scheme: 'redis',
  schema: RedisConfigSchema,
  create: (config, { logger }) => {
    const connection = connectionFrom(config);
    return new RedisBackend(createRedisClient(connection, logger), {
      root: config.root,
      ttl: config.ttl,
      name: `${connection.host}:${connection.port}`,
    });
  },
};
