// Concurrent limit layer: at most N backend calls in flight.
//
// Every forwarded call, including page fetches and writer chunks, takes a
// slot. Blocking calls run to completion before returning and pass through.

import pLimit, { type LimitFunction } from 'p-limit';

import { ErrorKind, storageError } from '../errors/index.js';
import type { Accessor } from '../raw/accessor.js';
import type { Awaitable, CallContext } from '../raw/awaitable.js';
import { LayeredAccessor, type Invocation, type Layer } from '../raw/layer.js';

export interface ConcurrentLimitOptions {
  /** Maximum in-flight calls */
  permits: number;
}

class ConcurrentLimitAccessor extends LayeredAccessor {
  private readonly limit: LimitFunction;

  constructor(inner: Accessor, permits: number) {
    super(inner);
    this.limit = pLimit(permits);
  }

  protected override intercept<T>(
    _invocation: Invocation,
    ctx: CallContext,
    next: () => Awaitable<T>
  ): Awaitable<T> {
    if (ctx.blocking) return next();
    return this.limit(next);
  }
}

export class ConcurrentLimitLayer implements Layer {
  readonly name = 'concurrent-limit';
  private readonly permits: number;

  constructor(options: ConcurrentLimitOptions) {
    if (!Number.isInteger(options.permits) || options.permits < 1) {
      throw storageError(ErrorKind.InvalidInput, 'permits must be a positive integer', {
        context: { operation: 'layer' },
      });
    }
    this.permits = options.permits;
  }

  wrap(inner: Accessor): Accessor {
    return new ConcurrentLimitAccessor(inner, this.permits);
  }
}
