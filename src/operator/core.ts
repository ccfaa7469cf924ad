// Operator core: path normalization, capability gating, option validation,
// dispatch through the layer chain and result normalization.
//
// Written once over Awaitable<T>; Operator awaits it, BlockingOperator
// unwraps it synchronously.

import type { Logger } from 'pino';

import { FileCore, DEFAULT_WRITE_BUFFER_SIZE } from './file.js';
import { FlatLister } from './flat-lister.js';
import { ListerCore } from './lister.js';
import {
  ErrorKind,
  isErrorKind,
  storageError,
  toStorageError,
  withContext,
  type ErrorContext,
} from '../errors/index.js';
import type { Accessor, AccessorInfo, RawLister, RawWriter } from '../raw/accessor.js';
import {
  attempt,
  cancelled,
  forEach,
  andThen,
  throwIfAborted,
  type Awaitable,
  type CallContext,
} from '../raw/awaitable.js';
import { concat, toBytes } from '../raw/bytes.js';
import { depth, isDirPath, normalizePath } from '../raw/path.js';
import type { Capability, CapabilityFlag } from '../types/capability.js';
import { Entry } from '../types/entry.js';
import type { Metadata } from '../types/metadata.js';
import {
  DeleteOptionsSchema,
  ListOptionsSchema,
  OpenOptionsSchema,
  parseOptions,
  PresignOptionsSchema,
  ReadOptionsSchema,
  StatOptionsSchema,
  WriteOptionsSchema,
  type DeleteOptions,
  type ListOptions,
  type OpenMode,
  type OpenOptions,
  type PresignOperation,
  type PresignOptions,
  type PresignedRequest,
  type ReadOptions,
  type StatOptions,
  type WriteOptions,
} from '../types/options.js';

const DEFAULT_DELETE_BATCH = 1000;

const PRESIGN_FLAGS: Record<PresignOperation, CapabilityFlag> = {
  read: 'presignRead',
  stat: 'presignStat',
  write: 'presignWrite',
};

export class OperatorCore {
  readonly info: AccessorInfo;
  /** Capability of the layered accessor, before core emulation */
  private readonly native: Capability;
  /** Capability callers see: native plus what the core emulates */
  readonly capability: Capability;

  constructor(
    readonly accessor: Accessor,
    readonly logger: Logger
  ) {
    const info = accessor.info();
    this.native = info.capability;

    const emulated: CapabilityFlag[] = [];
    if (this.native.supports('delete')) emulated.push('deleteBatch');
    if (this.native.supports('list')) emulated.push('listWithRecursive');
    this.capability = this.native.emulate(...emulated);
    this.info = Object.freeze({ ...info, capability: this.capability });
  }

  /** Release the service's connections. Shared by every operator layered over it. */
  async close(): Promise<void> {
    await this.accessor.close?.();
  }

  // ---- Metadata -----------------------------------------------------------

  stat(path: string, options: StatOptions | undefined, ctx: CallContext): Awaitable<Metadata> {
    throwIfAborted(ctx, 'stat');
    const p = normalizePath(path);
    this.require('stat', 'stat', p);
    const opts = parseOptions(StatOptionsSchema, options, 'stat');
    if (opts.ifMatch !== undefined) this.require('statWithIfMatch', 'stat', p);
    if (opts.ifNoneMatch !== undefined) this.require('statWithIfNoneMatch', 'stat', p);

    return andThen(
      this.dispatch('stat', p, () => this.accessor.stat(p, opts, ctx)),
      (metadata) => {
        if (isDirPath(p) && p !== '/' && metadata.isFile()) {
          throw this.error(ErrorKind.NotADirectory, `${p} is a file`, 'stat', p);
        }
        return this.normalizeMetadata(metadata, 'stat', p);
      }
    );
  }

  exists(path: string, ctx: CallContext): Awaitable<boolean> {
    return attempt(
      () => andThen(this.stat(path, {}, ctx), () => true),
      (error) => {
        if (isErrorKind(error, ErrorKind.NotFound)) return false;
        throw error;
      }
    );
  }

  // ---- Read / write -------------------------------------------------------

  read(path: string, options: ReadOptions | undefined, ctx: CallContext): Awaitable<Uint8Array> {
    throwIfAborted(ctx, 'read');
    const p = this.filePath(path, 'read');
    this.require('read', 'read', p);
    const opts = parseOptions(ReadOptionsSchema, options, 'read');
    this.checkReadConditions(opts, 'read', p);

    const { range } = opts;
    if (range !== undefined) {
      this.require('readWithRange', 'read', p);
      if (range.end !== undefined && range.start > range.end) {
        throw this.error(
          ErrorKind.InvalidInput,
          `range start ${range.start} is after end ${range.end}`,
          'read',
          p
        );
      }
      if (range.end === range.start) return new Uint8Array(0);
    }

    return this.dispatch('read', p, () => this.accessor.read(p, opts, ctx));
  }

  write(
    path: string,
    data: Uint8Array | string,
    options: WriteOptions | undefined,
    ctx: CallContext
  ): Awaitable<Metadata> {
    throwIfAborted(ctx, 'write');
    const p = this.filePath(path, 'write');
    this.require('write', 'write', p);
    const opts = this.checkWriteOptions(parseOptions(WriteOptionsSchema, options, 'write'), p);
    const bytes = toBytes(data);

    if (bytes.length === 0 && !this.capability.supports('writeCanEmpty')) {
      throw this.error(ErrorKind.Unsupported, 'service cannot store empty objects', 'write', p);
    }
    const totalMax = this.capability.limit('writeTotalMaxSize');
    if (totalMax !== undefined && bytes.length > totalMax) {
      throw this.error(
        ErrorKind.InvalidInput,
        `payload of ${bytes.length} bytes exceeds the service limit of ${totalMax}`,
        'write',
        p
      );
    }

    const chunks = this.splitChunks(bytes, opts.chunk);
    return andThen(this.openWriter(p, opts, ctx), (writer) =>
      andThen(
        attempt(
          () =>
            andThen(
              forEach(chunks, (chunk) => writer.write(chunk, ctx)),
              () => writer.close(ctx)
            ),
          (error) => this.abortWriter(writer, error, ctx)
        ),
        (metadata) => {
          const filled =
            metadata.contentLength === undefined && !opts.append
              ? metadata.with({ contentLength: bytes.length })
              : metadata;
          return this.normalizeMetadata(filled, 'write', p);
        }
      )
    );
  }

  open(
    path: string,
    mode: OpenMode,
    options: OpenOptions | undefined,
    ctx: CallContext
  ): Awaitable<FileCore> {
    throwIfAborted(ctx, 'open');
    const p = this.filePath(path, 'open');
    this.require(mode === 'r' ? 'read' : 'write', 'open', p);
    const opts = parseOptions(OpenOptionsSchema, options, 'open');
    const { bufferSize, ifMatch, ifNoneMatch, version, ...writeOptions } = opts;

    if (mode === 'r') {
      this.checkReadConditions({ ifMatch, ifNoneMatch }, 'open', p);
      const ranged = this.capability.supports('readWithRange');
      return this.guardCancellation(
        andThen(this.stat(p, { version }, ctx), (metadata) => {
          if (ifMatch !== undefined && metadata.etag !== undefined && metadata.etag !== ifMatch) {
            throw this.error(ErrorKind.ConditionNotMatch, `etag does not match ${ifMatch}`, 'open', p);
          }
          if (ifNoneMatch !== undefined && metadata.etag === ifNoneMatch) {
            throw this.error(ErrorKind.ConditionNotMatch, `etag matches ${ifNoneMatch}`, 'open', p);
          }
          return FileCore.reader(
            p,
            {
              size: metadata.contentLength ?? 0,
              ranged,
              fetch: (start, end, fetchCtx) =>
                this.dispatch('read', p, () =>
                  this.accessor.read(
                    p,
                    ranged ? { range: { start, end }, ifMatch, version } : { ifMatch, version },
                    fetchCtx
                  )
                ),
            },
            this.logger
          );
        }),
        ctx,
        'open',
        (file, releaseCtx) => file.close(releaseCtx)
      );
    }

    const checked = this.checkWriteOptions(writeOptions, p);
    return this.guardCancellation(
      andThen(this.openWriter(p, checked, ctx), (writer) =>
        FileCore.writer(p, writer, bufferSize ?? DEFAULT_WRITE_BUFFER_SIZE, this.logger)
      ),
      ctx,
      'open',
      // Nothing was written yet; committing would replace the object.
      (file, releaseCtx) => file.discard(releaseCtx)
    );
  }

  // ---- Delete -------------------------------------------------------------

  delete(path: string, options: DeleteOptions | undefined, ctx: CallContext): Awaitable<void> {
    throwIfAborted(ctx, 'delete');
    const p = normalizePath(path);
    this.require('delete', 'delete', p);
    const opts = parseOptions(DeleteOptionsSchema, options, 'delete');
    return this.deleteOne(p, opts, ctx);
  }

  /**
   * Delete several paths. Uses the backend's batch delete in chunks of
   * `deleteMaxSize` when available, single deletes otherwise.
   */
  deleteMany(paths: string[], ctx: CallContext): Awaitable<void> {
    throwIfAborted(ctx, 'deleteMany');
    const normalized = paths.map((path) => normalizePath(path));
    this.require('delete', 'deleteMany', normalized[0] ?? '/');
    if (normalized.length === 0) return undefined;

    if (!this.native.supports('deleteBatch')) {
      return forEach(normalized, (p) => this.deleteOne(p, {}, ctx));
    }

    const size = Math.max(1, this.native.limit('deleteMaxSize') ?? DEFAULT_DELETE_BATCH);
    const batches: string[][] = [];
    for (let i = 0; i < normalized.length; i += size) {
      batches.push(normalized.slice(i, i + size));
    }
    return forEach(batches, (batch) =>
      andThen(
        this.dispatch('deleteBatch', batch[0] ?? '/', () => this.accessor.deleteBatch(batch, ctx)),
        (result) => {
          const failure = result.failed.find(
            (item) => !isErrorKind(item.error, ErrorKind.NotFound)
          );
          if (failure !== undefined) {
            throw withContext(toStorageError(failure.error), {
              operation: 'deleteBatch',
              path: failure.path,
              scheme: this.info.scheme,
              failed: result.failed.length,
            });
          }
        }
      )
    );
  }

  /** Delete a file, or a directory and everything below it. */
  removeAll(path: string, ctx: CallContext): Awaitable<void> {
    throwIfAborted(ctx, 'removeAll');
    const p = normalizePath(path);
    if (!isDirPath(p)) {
      return this.delete(p, {}, ctx);
    }
    this.require('delete', 'removeAll', p);
    this.require('list', 'removeAll', p);

    return andThen(this.list(p, { recursive: true }, ctx), (lister) =>
      andThen(lister.drain(ctx), (entries) => {
        const files = entries.filter((entry) => !entry.metadata.isDir()).map((e) => e.path);
        const dirs = entries
          .filter((entry) => entry.metadata.isDir())
          .map((entry) => entry.path)
          .sort((a, b) => depth(b) - depth(a));
        if (p !== '/') dirs.push(p);
        return andThen(this.deleteMany(files, ctx), () =>
          forEach(dirs, (dir) => this.deleteOne(dir, {}, ctx))
        );
      })
    );
  }

  // ---- Directories and listing -------------------------------------------

  createDir(path: string, ctx: CallContext): Awaitable<void> {
    throwIfAborted(ctx, 'createDir');
    const p = normalizePath(path);
    if (!isDirPath(p)) {
      throw this.error(
        ErrorKind.NotADirectory,
        `directory paths must end with "/": ${p}`,
        'createDir',
        p
      );
    }
    this.require('createDir', 'createDir', p);
    return this.dispatch('createDir', p, () => this.accessor.createDir(p, ctx));
  }

  list(path: string, options: ListOptions | undefined, ctx: CallContext): Awaitable<ListerCore> {
    throwIfAborted(ctx, 'list');
    const p = normalizePath(path);
    if (!isDirPath(p)) {
      throw this.error(
        ErrorKind.NotADirectory,
        `list requires a directory path ending with "/": ${p}`,
        'list',
        p
      );
    }
    this.require('list', 'list', p);
    const opts = parseOptions(ListOptionsSchema, options, 'list');
    if (opts.limit !== undefined) this.require('listWithLimit', 'list', p);
    if (opts.startAfter !== undefined) this.require('listWithStartAfter', 'list', p);

    const emulateRecursive = opts.recursive === true && !this.native.supports('listWithRecursive');
    const first = this.dispatch('list', p, () =>
      this.accessor.list(p, emulateRecursive ? { ...opts, recursive: false } : opts, ctx)
    );
    // Subdirectories of an emulated recursive walk are listed in full.
    const openDir = (dir: string, openCtx: CallContext): Awaitable<RawLister> =>
      this.dispatch('list', dir, () =>
        this.accessor.list(dir, { limit: opts.limit, signal: opts.signal }, openCtx)
      );

    const lister = andThen(first, (raw) => {
      const source = emulateRecursive ? new FlatLister(raw, openDir) : raw;
      return new ListerCore(source, (entry) => this.normalizeEntry(entry), this.logger);
    });

    return this.guardCancellation(lister, ctx, 'list', (core, releaseCtx) =>
      core.close(releaseCtx)
    );
  }

  // ---- Copy / rename ------------------------------------------------------

  copy(from: string, to: string, ctx: CallContext): Awaitable<void> {
    return this.transfer('copy', from, to, ctx);
  }

  rename(from: string, to: string, ctx: CallContext): Awaitable<void> {
    return this.transfer('rename', from, to, ctx);
  }

  // ---- Presign ------------------------------------------------------------

  presign(
    path: string,
    operation: PresignOperation,
    options: PresignOptions,
    ctx: CallContext
  ): Awaitable<PresignedRequest> {
    throwIfAborted(ctx, 'presign');
    const p = operation === 'stat' ? normalizePath(path) : this.filePath(path, 'presign');
    this.require('presign', 'presign', p);
    this.require(PRESIGN_FLAGS[operation], 'presign', p);
    const opts = parseOptions(PresignOptionsSchema, options, 'presign');
    return this.dispatch('presign', p, () =>
      this.accessor.presign(p, { operation, expiresIn: opts.expiresIn }, ctx)
    );
  }

  // ---- Health -------------------------------------------------------------

  /** Verify the service is reachable: list the root once, or stat it. */
  check(ctx: CallContext): Awaitable<void> {
    throwIfAborted(ctx, 'check');
    if (this.capability.supports('list')) {
      // A failed page fetch closes the lister before it surfaces.
      return andThen(this.list('/', {}, ctx), (lister) =>
        andThen(lister.next(ctx), () => lister.close(ctx))
      );
    }
    if (this.capability.supports('stat')) {
      return attempt(
        () => andThen(this.stat('/', {}, ctx), () => undefined),
        (error) => {
          if (isErrorKind(error, ErrorKind.NotFound)) return undefined;
          throw error;
        }
      );
    }
    throw this.error(ErrorKind.Unsupported, 'service supports neither list nor stat', 'check', '/');
  }

  // ---- Internals ----------------------------------------------------------

  private transfer(
    operation: 'copy' | 'rename',
    from: string,
    to: string,
    ctx: CallContext
  ): Awaitable<void> {
    throwIfAborted(ctx, operation);
    const source = this.filePath(from, operation);
    const target = this.filePath(to, operation);
    this.require(operation, operation, source);
    if (source === target) {
      throw this.error(
        ErrorKind.InvalidInput,
        `source and target are the same path: ${source}`,
        operation,
        source
      );
    }
    return this.dispatch(
      operation,
      source,
      () =>
        operation === 'copy'
          ? this.accessor.copy(source, target, ctx)
          : this.accessor.rename(source, target, ctx),
      { to: target }
    );
  }

  private deleteOne(p: string, opts: DeleteOptions, ctx: CallContext): Awaitable<void> {
    return attempt(
      () => this.dispatch('delete', p, () => this.accessor.delete(p, opts, ctx)),
      (error) => {
        // Deleting something that is already gone is success.
        if (isErrorKind(error, ErrorKind.NotFound)) return undefined;
        throw error;
      }
    );
  }

  /**
   * Open a backend writer. When the service accepts only one write per
   * stream, chunks are collected and sent as a single write on close.
   */
  private openWriter(p: string, opts: WriteOptions, ctx: CallContext): Awaitable<RawWriter> {
    return andThen(
      this.dispatch('write', p, () => this.accessor.write(p, opts, ctx)),
      (writer): RawWriter => {
        const wrapped = this.normalizingWriter(writer, p);
        return this.capability.supports('writeCanMulti') ? wrapped : coalescing(wrapped);
      }
    );
  }

  private normalizingWriter(writer: RawWriter, p: string): RawWriter {
    return {
      write: (chunk, ctx) => this.dispatch('write', p, () => writer.write(chunk, ctx)),
      close: (ctx) =>
        andThen(
          this.dispatch('write', p, () => writer.close(ctx)),
          (metadata) => this.normalizeMetadata(metadata, 'write', p)
        ),
      abort: (ctx) => this.dispatch('write', p, () => writer.abort(ctx)),
    };
  }

  private abortWriter(writer: RawWriter, error: unknown, ctx: CallContext): Awaitable<never> {
    return andThen(
      attempt(
        () => writer.abort(ctx),
        (abortError) => {
          this.logger.warn({ err: abortError, cause: error }, 'Failed to abort writer');
        }
      ),
      (): never => {
        throw error;
      }
    );
  }

  private splitChunks(bytes: Uint8Array, chunk: number | undefined): Uint8Array[] {
    if (chunk === undefined || bytes.length <= chunk) return [bytes];
    const chunks: Uint8Array[] = [];
    for (let offset = 0; offset < bytes.length; offset += chunk) {
      chunks.push(bytes.subarray(offset, offset + chunk));
    }
    return chunks;
  }

  private checkReadConditions(
    opts: Pick<ReadOptions, 'ifMatch' | 'ifNoneMatch' | 'ifModifiedSince'>,
    operation: string,
    p: string
  ): void {
    if (opts.ifMatch !== undefined) this.require('readWithIfMatch', operation, p);
    if (opts.ifNoneMatch !== undefined) this.require('readWithIfNoneMatch', operation, p);
    if (opts.ifModifiedSince !== undefined) this.require('readWithIfModifiedSince', operation, p);
  }

  private checkWriteOptions(opts: WriteOptions, p: string): WriteOptions {
    this.require('write', 'write', p);
    if (opts.append === true) this.require('writeCanAppend', 'write', p);
    if (opts.contentType !== undefined) this.require('writeWithContentType', 'write', p);
    if (opts.cacheControl !== undefined) this.require('writeWithCacheControl', 'write', p);
    if (opts.contentDisposition !== undefined) {
      this.require('writeWithContentDisposition', 'write', p);
    }
    if (opts.ifNotExists === true) this.require('writeWithIfNotExists', 'write', p);
    if (opts.userMetadata !== undefined) this.require('writeWithUserMetadata', 'write', p);
    if (opts.append === true && opts.ifNotExists === true) {
      throw this.error(
        ErrorKind.InvalidInput,
        'append and ifNotExists cannot be combined',
        'write',
        p
      );
    }
    return opts;
  }

  /** Release a lister or file that resolves after the caller aborted. */
  private guardCancellation<T>(
    value: Awaitable<T>,
    ctx: CallContext,
    operation: string,
    release: (resource: T, releaseCtx: CallContext) => Awaitable<void>
  ): Awaitable<T> {
    return andThen(value, (resource) => {
      if (ctx.signal?.aborted !== true) return resource;
      return andThen(
        attempt(
          () => release(resource, { blocking: ctx.blocking }),
          (closeError) => {
            this.logger.warn({ err: closeError, operation }, 'Failed to release cancelled resource');
          }
        ),
        (): never => {
          throw cancelled(ctx, operation, ctx.signal?.reason);
        }
      );
    });
  }

  private dispatch<T>(
    operation: string,
    path: string,
    fn: () => Awaitable<T>,
    extra: ErrorContext = {}
  ): Awaitable<T> {
    return attempt(fn, (error) => {
      throw withContext(toStorageError(error), {
        operation,
        path,
        scheme: this.info.scheme,
        ...extra,
      });
    });
  }

  private normalizeMetadata(metadata: Metadata, operation: string, p: string): Metadata {
    const length = metadata.contentLength;
    if (length !== undefined && (!Number.isInteger(length) || length < 0)) {
      throw this.error(
        ErrorKind.Unexpected,
        `service reported an invalid content length: ${length}`,
        operation,
        p
      );
    }
    // Directories have no size, whatever the backend reports.
    if (metadata.isDir() && length !== undefined) {
      return metadata.with({ contentLength: undefined });
    }
    return metadata;
  }

  private normalizeEntry(entry: Entry): Entry {
    const metadata = this.normalizeMetadata(entry.metadata, 'list', entry.path);
    const path =
      metadata.isDir() && !isDirPath(entry.path) ? `${entry.path}/` : entry.path;
    return path === entry.path && metadata === entry.metadata ? entry : new Entry(path, metadata);
  }

  private filePath(path: string, operation: string): string {
    const p = normalizePath(path);
    if (isDirPath(p)) {
      throw this.error(ErrorKind.IsADirectory, `${operation} requires a file path: ${p}`, operation, p);
    }
    return p;
  }

  private require(flag: CapabilityFlag, operation: string, p: string): void {
    if (!this.capability.supports(flag)) {
      throw this.error(
        ErrorKind.Unsupported,
        `${operation} needs capability "${flag}" which service ${this.info.scheme} does not provide`,
        operation,
        p
      );
    }
  }

  private error(kind: ErrorKind, message: string, operation: string, path: string) {
    return storageError(kind, message, {
      context: { operation, path, scheme: this.info.scheme },
    });
  }
}

/** Collect chunks and hand them to the backend as one write on close. */
function coalescing(writer: RawWriter): RawWriter {
  let parts: Uint8Array[] = [];
  let total = 0;
  return {
    write: (chunk) => {
      parts.push(chunk);
      total += chunk.length;
    },
    close: (ctx) => {
      const data = concat(parts, total);
      parts = [];
      total = 0;
      return andThen(data.length > 0 ? writer.write(data, ctx) : undefined, () => writer.close(ctx));
    },
    abort: (ctx) => {
      parts = [];
      total = 0;
      return writer.abort(ctx);
    },
  };
}
