// IPFS MFS storage backend using the Kubo HTTP API.
//
// Paths map onto the node's Mutable File System (files/* RPCs, default port
// 5001). Uses native fetch; no IPFS client library needed.

import { z } from 'zod';

import { networkErrorCode } from './network.js';
import type { ServiceDefinition } from './types.js';
import { ErrorKind, isStorageError, storageError, type StorageError } from '../errors/index.js';
import type {
  Accessor,
  AccessorInfo,
  BatchDeleteResult,
  RawLister,
  RawWriter,
} from '../raw/accessor.js';
import type { CallContext } from '../raw/awaitable.js';
import { concat } from '../raw/bytes.js';
import { absolutePath, isDirPath, normalizeRoot, relativePath } from '../raw/path.js';
import { Capability } from '../types/capability.js';
import { Entry } from '../types/entry.js';
import { Metadata } from '../types/metadata.js';
import type { PresignedRequest, ReadOptions } from '../types/options.js';

export const IpmfsConfigSchema = z
  .object({
    /** Kubo RPC endpoint (default: http://localhost:5001) */
    endpoint: z.string().url().default('http://localhost:5001'),
    root: z.string().optional(),
  })
  .strict();

export type IpmfsConfig = z.infer<typeof IpmfsConfigSchema>;

export const IPMFS_CAPABILITY = new Capability({
  stat: true,
  read: true,
  readWithRange: true,
  write: true,
  writeCanEmpty: true,
  createDir: true,
  delete: true,
  copy: true,
  rename: true,
  list: true,
  shared: true,
});

// ---------------------------------------------------------------------------
// Error translation
// ---------------------------------------------------------------------------

/** Fragments of Kubo error messages and the kinds they map to. */
const MESSAGE_KINDS: [fragment: string, kind: ErrorKind][] = [
  ['file does not exist', ErrorKind.NotFound],
  ['no link named', ErrorKind.NotFound],
  ['already exists', ErrorKind.AlreadyExists],
  ['directory not empty', ErrorKind.Conflict],
  ['not a directory', ErrorKind.NotADirectory],
  ['is a directory', ErrorKind.IsADirectory],
  ['not a file', ErrorKind.IsADirectory],
];

const STATUS_KINDS: Record<number, ErrorKind> = {
  400: ErrorKind.InvalidInput,
  401: ErrorKind.PermissionDenied,
  403: ErrorKind.PermissionDenied,
  404: ErrorKind.NotFound,
  429: ErrorKind.RateLimited,
};

const TEMPORARY_STATUS_CODES = new Set([502, 503, 504]);

const KuboErrorSchema = z.object({ Message: z.string() });

export function translateKuboError(status: number, body: string, path: string): StorageError {
  let message = body;
  try {
    const parsed = KuboErrorSchema.safeParse(JSON.parse(body));
    if (parsed.success) message = parsed.data.Message;
  } catch {
    // Plain-text body; keep it as the message.
  }
  const lower = message.toLowerCase();
  const byMessage = MESSAGE_KINDS.find(([fragment]) => lower.includes(fragment));
  const kind = byMessage?.[1] ?? STATUS_KINDS[status] ?? ErrorKind.Unexpected;
  return storageError(kind, `IPFS request failed: ${status} ${message}`, {
    temporary: TEMPORARY_STATUS_CODES.has(status),
    context: { path, status },
  });
}

function translateTransportError(error: unknown, path: string): StorageError {
  if (isStorageError(error)) return error;
  if (error instanceof Error && error.name === 'AbortError') {
    return storageError(ErrorKind.Cancelled, 'IPFS request was aborted', {
      cause: error,
      context: { path },
    });
  }
  const code = networkErrorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return storageError(ErrorKind.Unexpected, message, {
    cause: error,
    temporary: code !== undefined,
    context: { path, ...(code !== undefined && { errno: code }) },
  });
}

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const StatResponseSchema = z.object({
  Hash: z.string(),
  Size: z.number(),
  Type: z.enum(['file', 'directory']),
});

const LsResponseSchema = z.object({
  Entries: z
    .array(
      z.object({
        Name: z.string(),
        Type: z.number(),
        Size: z.number(),
        Hash: z.string(),
      })
    )
    .nullable()
    .optional(),
});

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export class IpmfsBackend implements Accessor {
  private readonly apiUrl: string;
  private readonly root: string;

  constructor(config: Partial<IpmfsConfig> = {}) {
    // Strip trailing slash
    this.apiUrl = (config.endpoint ?? 'http://localhost:5001').replace(/\/+$/, '');
    this.root = normalizeRoot(config.root);
  }

  info(): AccessorInfo {
    return { scheme: 'ipmfs', root: this.root, name: this.apiUrl, capability: IPMFS_CAPABILITY };
  }

  async createDir(path: string, ctx: CallContext): Promise<void> {
    await this.command(
      'files/mkdir',
      path,
      [['arg', this.mfsPath(path)], ['parents', 'true']],
      ctx
    );
  }

  async stat(path: string, _options: unknown, ctx: CallContext): Promise<Metadata> {
    const response = await this.rpc('files/stat', path, [['arg', this.mfsPath(path)]], ctx);
    const stat = StatResponseSchema.parse(await response.json());
    if (stat.Type === 'directory') {
      return Metadata.dir({ etag: stat.Hash });
    }
    return Metadata.file({ contentLength: stat.Size, etag: stat.Hash });
  }

  async read(path: string, options: ReadOptions, ctx: CallContext): Promise<Uint8Array> {
    const params: [string, string][] = [['arg', this.mfsPath(path)]];
    const { range } = options;
    if (range !== undefined) {
      params.push(['offset', String(range.start)]);
      if (range.end !== undefined) params.push(['count', String(range.end - range.start)]);
    }
    const response = await this.rpc('files/read', path, params, ctx);
    return new Uint8Array(await response.arrayBuffer());
  }

  async write(path: string): Promise<RawWriter> {
    let parts: Uint8Array[] = [];
    return {
      write: (chunk) => {
        parts.push(chunk.slice());
      },
      close: async (ctx) => {
        const data = concat(parts);
        parts = [];
        // Kubo API: files/write expects multipart/form-data with the file data
        const formData = new FormData();
        formData.append('file', new Blob([new Uint8Array(data)]));
        await this.command(
          'files/write',
          path,
          [
            ['arg', this.mfsPath(path)],
            ['create', 'true'],
            ['parents', 'true'],
            ['truncate', 'true'],
          ],
          ctx,
          formData
        );
        return Metadata.file({ contentLength: data.length });
      },
      abort: () => {
        parts = [];
      },
    };
  }

  async delete(path: string, _options: unknown, ctx: CallContext): Promise<void> {
    const params: [string, string][] = [['arg', this.mfsPath(path)]];
    if (isDirPath(path)) params.push(['recursive', 'true']);
    await this.command('files/rm', path, params, ctx);
  }

  deleteBatch(paths: string[]): BatchDeleteResult {
    throw storageError(ErrorKind.Unsupported, 'ipmfs backend has no batch delete', {
      context: { path: paths[0], operation: 'deleteBatch' },
    });
  }

  async list(path: string): Promise<RawLister> {
    let done = false;
    return {
      next: async (ctx) => {
        if (done) return null;
        done = true;
        let body: unknown;
        try {
          const response = await this.rpc(
            'files/ls',
            path,
            [['arg', this.mfsPath(path)], ['long', 'true']],
            ctx
          );
          body = await response.json();
        } catch (error) {
          // A directory that does not exist lists as empty.
          if (isStorageError(error) && error.kind === ErrorKind.NotFound) return [];
          throw error;
        }
        const dir = absolutePath(this.root, path);
        return (LsResponseSchema.parse(body).Entries ?? []).map((entry) => {
          // Type 1 is a directory in files/ls long output
          if (entry.Type === 1) {
            const child = relativePath(this.root, `${dir}${entry.Name}/`);
            return new Entry(child, Metadata.dir({ etag: entry.Hash }));
          }
          const child = relativePath(this.root, `${dir}${entry.Name}`);
          return new Entry(child, Metadata.file({ contentLength: entry.Size, etag: entry.Hash }));
        });
      },
      close: () => {
        done = true;
      },
    };
  }

  async copy(from: string, to: string, ctx: CallContext): Promise<void> {
    await this.command(
      'files/cp',
      from,
      [['arg', this.mfsPath(from)], ['arg', this.mfsPath(to)], ['parents', 'true']],
      ctx
    );
  }

  async rename(from: string, to: string, ctx: CallContext): Promise<void> {
    await this.command(
      'files/mv',
      from,
      [['arg', this.mfsPath(from)], ['arg', this.mfsPath(to)]],
      ctx
    );
  }

  presign(path: string): PresignedRequest {
    throw storageError(ErrorKind.Unsupported, 'ipmfs backend cannot presign requests', {
      context: { path, operation: 'presign' },
    });
  }

  /** MFS path for a normalized operator path; MFS paths carry no trailing slash. */
  private mfsPath(path: string): string {
    const absolute = absolutePath(this.root, path);
    return absolute.length > 1 && absolute.endsWith('/') ? absolute.slice(0, -1) : absolute;
  }

  /** RPC whose response body carries nothing the caller needs. */
  private async command(
    command: string,
    path: string,
    params: [string, string][],
    ctx: CallContext,
    body?: FormData
  ): Promise<void> {
    const response = await this.rpc(command, path, params, ctx, body);
    await response.body?.cancel();
  }

  /** Kubo API: every RPC is a POST to /api/v0/<command> */
  private async rpc(
    command: string,
    path: string,
    params: [string, string][],
    ctx: CallContext,
    body?: FormData
  ): Promise<Response> {
    const query = params
      .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
      .join('&');
    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}/api/v0/${command}?${query}`, {
        method: 'POST',
        body,
        signal: ctx.signal,
      });
    } catch (error) {
      throw translateTransportError(error, path);
    }

    if (!response.ok) {
      throw translateKuboError(response.status, await response.text(), path);
    }
    return response;
  }
}

export const ipmfsService: ServiceDefinition<IpmfsConfig> = {
  scheme: 'ipmfs',
  schema: IpmfsConfigSchema,
  create: (config) => new IpmfsBackend(config),
};
