// Throttle layer: token bucket in front of the backend.
//
// Each forwarded call takes one token. Tokens refill at `opsPerSecond` up to
// `burst`. A call arriving at an empty bucket reserves the next token and
// waits for it: with a timer for async calls, by parking the thread for
// blocking ones.

import { ErrorKind, storageError } from '../errors/index.js';
import type { Accessor } from '../raw/accessor.js';
import { sleep, andThen, type Awaitable, type CallContext } from '../raw/awaitable.js';
import { LayeredAccessor, type Invocation, type Layer } from '../raw/layer.js';

export interface ThrottleOptions {
  opsPerSecond: number;
  /** Bucket size (default: opsPerSecond) */
  burst?: number;
  /** Clock in milliseconds; injectable for tests */
  now?: () => number;
}

export class TokenBucket {
  private tokens: number;
  private updatedAt: number;

  constructor(
    private readonly ratePerMs: number,
    private readonly capacity: number,
    private readonly now: () => number
  ) {
    this.tokens = capacity;
    this.updatedAt = now();
  }

  /** Take one token; returns how long the caller must wait for it (ms). */
  reserve(): number {
    const now = this.now();
    this.tokens = Math.min(this.capacity, this.tokens + (now - this.updatedAt) * this.ratePerMs);
    this.updatedAt = now;
    this.tokens -= 1;
    return this.tokens >= 0 ? 0 : Math.ceil(-this.tokens / this.ratePerMs);
  }
}

class ThrottleAccessor extends LayeredAccessor {
  constructor(
    inner: Accessor,
    private readonly bucket: TokenBucket
  ) {
    super(inner);
  }

  protected override intercept<T>(
    _invocation: Invocation,
    ctx: CallContext,
    next: () => Awaitable<T>
  ): Awaitable<T> {
    return andThen(sleep(this.bucket.reserve(), ctx), next);
  }
}

export class ThrottleLayer implements Layer {
  readonly name = 'throttle';

  constructor(private readonly options: ThrottleOptions) {
    if (!(options.opsPerSecond > 0)) {
      throw storageError(ErrorKind.InvalidInput, 'opsPerSecond must be positive', {
        context: { operation: 'layer' },
      });
    }
    if (options.burst !== undefined && options.burst < 1) {
      throw storageError(ErrorKind.InvalidInput, 'burst must be at least 1', {
        context: { operation: 'layer' },
      });
    }
  }

  wrap(inner: Accessor): Accessor {
    const { opsPerSecond, burst, now } = this.options;
    const bucket = new TokenBucket(
      opsPerSecond / 1000,
      burst ?? Math.max(1, opsPerSecond),
      now ?? Date.now
    );
    return new ThrottleAccessor(inner, bucket);
  }
}
