// Timeout layer: fail async calls that take too long.
//
// The timed-out call is abandoned, not cancelled. The error is temporary so
// a retry layer below the caller may try again. A writer or lister that
// arrives after the deadline is aborted or closed. Blocking calls pass through.

import type { Logger } from 'pino';

import { ErrorKind, storageError } from '../errors/index.js';
import { silentLogger } from '../logger.js';
import type { Accessor, RawLister, RawWriter } from '../raw/accessor.js';
import { andThen, isPromise, type Awaitable, type CallContext } from '../raw/awaitable.js';
import { LayeredAccessor, type Invocation, type Layer } from '../raw/layer.js';
import type { ListOptions, WriteOptions } from '../types/options.js';

export interface TimeoutOptions {
  timeoutMs: number;
  logger?: Logger;
}

const RELEASE_CONTEXT: CallContext = Object.freeze({ blocking: false });

class TimeoutAccessor extends LayeredAccessor {
  constructor(
    inner: Accessor,
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {
    super(inner);
  }

  override write(path: string, options: WriteOptions, ctx: CallContext): Awaitable<RawWriter> {
    return andThen(
      this.bounded(
        { operation: 'write', path },
        ctx,
        () => this.inner.write(path, options, ctx),
        (writer) => writer.abort(RELEASE_CONTEXT)
      ),
      (writer) => this.wrapWriter(writer, path)
    );
  }

  override list(path: string, options: ListOptions, ctx: CallContext): Awaitable<RawLister> {
    return andThen(
      this.bounded(
        { operation: 'list', path },
        ctx,
        () => this.inner.list(path, options, ctx),
        (lister) => lister.close(RELEASE_CONTEXT)
      ),
      (lister) => this.wrapLister(lister, path)
    );
  }

  protected override intercept<T>(
    invocation: Invocation,
    ctx: CallContext,
    next: () => Awaitable<T>
  ): Awaitable<T> {
    return this.bounded(invocation, ctx, next);
  }

  private bounded<T>(
    invocation: Invocation,
    ctx: CallContext,
    next: () => Awaitable<T>,
    release?: (late: T) => Awaitable<void>
  ): Awaitable<T> {
    if (ctx.blocking) return next();
    const result = next();
    if (!isPromise(result)) return result;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        if (release) this.releaseLate(invocation, result, release);
        reject(
          storageError(
            ErrorKind.Unexpected,
            `${invocation.operation} timed out after ${this.timeoutMs}ms`,
            {
              temporary: true,
              context: { operation: invocation.operation, path: invocation.path },
            }
          )
        );
      }, this.timeoutMs);
    });
    return Promise.race([result, deadline]).finally(() => clearTimeout(timer));
  }

  private releaseLate<T>(
    invocation: Invocation,
    result: Promise<T>,
    release: (late: T) => Awaitable<void>
  ): void {
    const { operation, path } = invocation;
    result
      .then(
        (late) =>
          andThen(release(late), () => {
            this.logger.debug({ operation, path }, 'Released resource opened after timeout');
          }),
        // The abandoned call failed on its own; there is nothing to release.
        () => undefined
      )
      .catch((err: unknown) => {
        this.logger.warn({ err, operation, path }, 'Failed to release resource after timeout');
      });
  }
}

export class TimeoutLayer implements Layer {
  readonly name = 'timeout';

  constructor(private readonly options: TimeoutOptions) {
    if (!(options.timeoutMs > 0)) {
      throw storageError(ErrorKind.InvalidInput, 'timeoutMs must be positive', {
        context: { operation: 'layer' },
      });
    }
  }

  wrap(inner: Accessor): Accessor {
    return new TimeoutAccessor(
      inner,
      this.options.timeoutMs,
      this.options.logger ?? silentLogger()
    );
  }
}
