import type { Logger } from 'pino';
import { vi } from 'vitest';

import { ErrorKind, storageError } from '@/errors/index.js';
import type { Accessor, AccessorInfo, BatchDeleteResult, RawLister, RawWriter } from '@/raw/accessor.js';
import type { Awaitable, CallContext } from '@/raw/awaitable.js';
import { concat } from '@/raw/bytes.js';
import { Capability, type CapabilityInit } from '@/types/capability.js';
import { Entry } from '@/types/entry.js';
import { Metadata } from '@/types/metadata.js';
import type {
  DeleteOptions,
  ListOptions,
  PresignedRequest,
  ReadOptions,
  StatOptions,
  WriteOptions,
} from '@/types/options.js';

// ---------------------------------------------------------------------------
// Mock logger
// ---------------------------------------------------------------------------

export function createMockLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function asLogger(mock: ReturnType<typeof createMockLogger>): Logger {
  return mock as unknown as Logger;
}

// ---------------------------------------------------------------------------
// Mock accessor
// ---------------------------------------------------------------------------

/**
 * Map-backed accessor with spy methods. Keys are normalized relative paths.
 * Lists one directory level per call, in a single page.
 */
export function createMockAccessor(init: CapabilityInit, scheme = 'mock') {
  const store = new Map<string, Uint8Array>();
  const capability = new Capability(init);

  const notFound = (path: string) => storageError(ErrorKind.NotFound, path, { context: { path } });

  const accessor = {
    info: vi.fn((): AccessorInfo => ({ scheme, root: '/', name: 'mock', capability })),

    createDir: vi.fn((_path: string, _ctx: CallContext): Awaitable<void> => undefined),

    stat: vi.fn((path: string, _options: StatOptions, _ctx: CallContext): Awaitable<Metadata> => {
      const data = store.get(path);
      if (data === undefined) throw notFound(path);
      return Metadata.file({ contentLength: data.length });
    }),

    read: vi.fn((path: string, options: ReadOptions, _ctx: CallContext): Awaitable<Uint8Array> => {
      const data = store.get(path);
      if (data === undefined) throw notFound(path);
      return data.slice(options.range?.start ?? 0, options.range?.end ?? data.length);
    }),

    write: vi.fn((path: string, _options: WriteOptions, _ctx: CallContext): Awaitable<RawWriter> => {
      const parts: Uint8Array[] = [];
      return {
        write: (chunk) => {
          parts.push(chunk.slice());
        },
        // No length reported; the operator fills it in.
        close: () => {
          store.set(path, concat(parts));
          return Metadata.file();
        },
        abort: () => {
          parts.length = 0;
        },
      };
    }),

    delete: vi.fn((path: string, _options: DeleteOptions, _ctx: CallContext): Awaitable<void> => {
      if (!store.delete(path)) throw notFound(path);
    }),

    deleteBatch: vi.fn(
      (paths: string[], _ctx: CallContext): Awaitable<BatchDeleteResult> => ({
        deleted: paths.filter((path) => store.delete(path)),
        failed: [],
      })
    ),

    list: vi.fn((path: string, _options: ListOptions, _ctx: CallContext): Awaitable<RawLister> => {
      const prefix = path === '/' ? '' : path;
      const children = new Map<string, Metadata>();
      for (const [key, data] of store) {
        if (!key.startsWith(prefix)) continue;
        const rest = key.slice(prefix.length);
        const slash = rest.indexOf('/');
        if (slash === -1) {
          children.set(key, Metadata.file({ contentLength: data.length }));
        } else {
          children.set(`${prefix}${rest.slice(0, slash + 1)}`, Metadata.dir());
        }
      }
      const entries = [...children.keys()]
        .sort()
        .map((key) => new Entry(key, children.get(key) ?? Metadata.dir()));
      let done = false;
      return {
        next: () => {
          if (done) return null;
          done = true;
          return entries;
        },
        close: () => {
          done = true;
        },
      };
    }),

    copy: vi.fn((from: string, to: string, _ctx: CallContext): Awaitable<void> => {
      const data = store.get(from);
      if (data === undefined) throw notFound(from);
      store.set(to, data.slice());
    }),

    rename: vi.fn((from: string, to: string, _ctx: CallContext): Awaitable<void> => {
      const data = store.get(from);
      if (data === undefined) throw notFound(from);
      store.set(to, data);
      store.delete(from);
    }),

    presign: vi.fn((path: string): Awaitable<PresignedRequest> => ({
      method: 'GET',
      url: `https://storage.test/${path}?sig=test-signature`,
      headers: {},
    })),
  } satisfies Accessor;

  return { accessor, store };
}

/** Raw lister over fixed pages, with a spy on close. */
export function pagedLister(pages: Entry[][]) {
  let index = 0;
  return {
    next: vi.fn((_ctx: CallContext): Awaitable<Entry[] | null> => pages[index++] ?? null),
    close: vi.fn((_ctx: CallContext): Awaitable<void> => undefined),
  } satisfies RawLister;
}

export function fileEntry(path: string, contentLength = 1): Entry {
  return new Entry(path, Metadata.file({ contentLength }));
}

export const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);
