// Layer: Accessor -> Accessor.
//
// op.layer(L1).layer(L2) evaluates to L2.wrap(L1.wrap(base)): calls enter L2
// first, results and errors leave L1 first. Any state a layer needs (token
// buckets, semaphores, caches) belongs to the accessor returned by wrap().

import type {
  Accessor,
  AccessorInfo,
  AccessorOperation,
  BatchDeleteResult,
  PresignArgs,
  RawLister,
  RawWriter,
} from './accessor.js';
import { andThen, type Awaitable, type CallContext } from './awaitable.js';
import type { Entry } from '../types/entry.js';
import type { Metadata } from '../types/metadata.js';
import type {
  DeleteOptions,
  ListOptions,
  PresignedRequest,
  ReadOptions,
  StatOptions,
  WriteOptions,
} from '../types/options.js';

export interface Layer {
  readonly name: string;
  wrap(inner: Accessor): Accessor;
}

export type InterceptedOperation =
  | AccessorOperation
  | 'lister.next'
  | 'lister.close'
  | 'writer.write'
  | 'writer.close'
  | 'writer.abort';

export interface Invocation {
  operation: InterceptedOperation;
  path: string;
  /** Target path for copy and rename */
  to?: string;
}

/**
 * Accessor that forwards everything to `inner`.
 *
 * Subclasses override `intercept` to wrap every call (including page fetches
 * and writer chunks) or override individual methods for finer control.
 */
export class LayeredAccessor implements Accessor {
  constructor(protected readonly inner: Accessor) {}

  info(): AccessorInfo {
    return this.inner.info();
  }

  /** Around-advice applied to every forwarded call. Passes through by default. */
  protected intercept<T>(
    _invocation: Invocation,
    _ctx: CallContext,
    next: () => Awaitable<T>
  ): Awaitable<T> {
    return next();
  }

  protected wrapLister(lister: RawLister, path: string): RawLister {
    return {
      next: (ctx: CallContext): Awaitable<Entry[] | null> =>
        this.intercept({ operation: 'lister.next', path }, ctx, () => lister.next(ctx)),
      close: (ctx: CallContext): Awaitable<void> =>
        this.intercept({ operation: 'lister.close', path }, ctx, () => lister.close(ctx)),
    };
  }

  protected wrapWriter(writer: RawWriter, path: string): RawWriter {
    return {
      write: (chunk: Uint8Array, ctx: CallContext): Awaitable<void> =>
        this.intercept({ operation: 'writer.write', path }, ctx, () => writer.write(chunk, ctx)),
      close: (ctx: CallContext): Awaitable<Metadata> =>
        this.intercept({ operation: 'writer.close', path }, ctx, () => writer.close(ctx)),
      abort: (ctx: CallContext): Awaitable<void> =>
        this.intercept({ operation: 'writer.abort', path }, ctx, () => writer.abort(ctx)),
    };
  }

  createDir(path: string, ctx: CallContext): Awaitable<void> {
    return this.intercept({ operation: 'createDir', path }, ctx, () =>
      this.inner.createDir(path, ctx)
    );
  }

  stat(path: string, options: StatOptions, ctx: CallContext): Awaitable<Metadata> {
    return this.intercept({ operation: 'stat', path }, ctx, () =>
      this.inner.stat(path, options, ctx)
    );
  }

  read(path: string, options: ReadOptions, ctx: CallContext): Awaitable<Uint8Array> {
    return this.intercept({ operation: 'read', path }, ctx, () =>
      this.inner.read(path, options, ctx)
    );
  }

  write(path: string, options: WriteOptions, ctx: CallContext): Awaitable<RawWriter> {
    return andThen(
      this.intercept({ operation: 'write', path }, ctx, () => this.inner.write(path, options, ctx)),
      (writer) => this.wrapWriter(writer, path)
    );
  }

  delete(path: string, options: DeleteOptions, ctx: CallContext): Awaitable<void> {
    return this.intercept({ operation: 'delete', path }, ctx, () =>
      this.inner.delete(path, options, ctx)
    );
  }

  deleteBatch(paths: string[], ctx: CallContext): Awaitable<BatchDeleteResult> {
    return this.intercept({ operation: 'deleteBatch', path: paths[0] ?? '/' }, ctx, () =>
      this.inner.deleteBatch(paths, ctx)
    );
  }

  list(path: string, options: ListOptions, ctx: CallContext): Awaitable<RawLister> {
    return andThen(
      this.intercept({ operation: 'list', path }, ctx, () => this.inner.list(path, options, ctx)),
      (lister) => this.wrapLister(lister, path)
    );
  }

  copy(from: string, to: string, ctx: CallContext): Awaitable<void> {
    return this.intercept({ operation: 'copy', path: from, to }, ctx, () =>
      this.inner.copy(from, to, ctx)
    );
  }

  rename(from: string, to: string, ctx: CallContext): Awaitable<void> {
    return this.intercept({ operation: 'rename', path: from, to }, ctx, () =>
      this.inner.rename(from, to, ctx)
    );
  }

  presign(path: string, args: PresignArgs, ctx: CallContext): Awaitable<PresignedRequest> {
    return this.intercept({ operation: 'presign', path }, ctx, () =>
      this.inner.presign(path, args, ctx)
    );
  }

  async close(): Promise<void> {
    await this.inner.close?.();
  }
}

/** Build a layer from a wrapping function. */
export function createLayer(name: string, wrap: (inner: Accessor) => Accessor): Layer {
  return { name, wrap };
}
