// Retry layer: bounded attempts with exponential backoff.
//
// Retries RateLimited and temporary errors. Validation failures are never
// retried. Writes and renames are retried only when the caller opts in,
// since repeating them may not be safe for every backend.

import type { Logger } from 'pino';

import { ErrorKind, toStorageError, type StorageError } from '../errors/index.js';
import { silentLogger } from '../logger.js';
import type { Accessor } from '../raw/accessor.js';
import { attempt, sleep, andThen, type Awaitable, type CallContext } from '../raw/awaitable.js';
import {
  LayeredAccessor,
  type InterceptedOperation,
  type Invocation,
  type Layer,
} from '../raw/layer.js';

export interface RetryOptions {
  /** Total attempts including the first call (default 4) */
  maxAttempts?: number;
  /** Delay before the first retry (default 100ms) */
  minDelayMs?: number;
  /** Upper bound for any single delay (default 10s) */
  maxDelayMs?: number;
  /** Backoff multiplier (default 2) */
  factor?: number;
  /** Randomize each delay between 50% and 100% of its nominal value */
  jitter?: boolean;
  /** Also retry writes and renames */
  retryNonIdempotent?: boolean;
  logger?: Logger;
}

const NON_IDEMPOTENT: ReadonlySet<InterceptedOperation> = new Set([
  'write',
  'writer.write',
  'writer.close',
  'rename',
]);

const NEVER_RETRIED: ReadonlySet<ErrorKind> = new Set([
  ErrorKind.InvalidInput,
  ErrorKind.Unsupported,
  ErrorKind.Cancelled,
]);

export function isRetryable(error: StorageError): boolean {
  if (NEVER_RETRIED.has(error.kind)) return false;
  return error.kind === ErrorKind.RateLimited || error.temporary;
}

class RetryAccessor extends LayeredAccessor {
  private readonly maxAttempts: number;
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly factor: number;
  private readonly jitter: boolean;
  private readonly retryNonIdempotent: boolean;
  private readonly logger: Logger;

  constructor(inner: Accessor, options: RetryOptions) {
    super(inner);
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 4);
    this.minDelayMs = options.minDelayMs ?? 100;
    this.maxDelayMs = options.maxDelayMs ?? 10_000;
    this.factor = options.factor ?? 2;
    this.jitter = options.jitter ?? false;
    this.retryNonIdempotent = options.retryNonIdempotent ?? false;
    this.logger = options.logger ?? silentLogger();
  }

  protected override intercept<T>(
    invocation: Invocation,
    ctx: CallContext,
    next: () => Awaitable<T>
  ): Awaitable<T> {
    if (NON_IDEMPOTENT.has(invocation.operation) && !this.retryNonIdempotent) {
      return next();
    }

    const run = (tries: number): Awaitable<T> =>
      attempt(next, (error) => {
        const failure = toStorageError(error);
        if (!isRetryable(failure) || tries >= this.maxAttempts) {
          if (tries > 1) failure.context.attempts = tries;
          throw failure;
        }

        const delay = this.delayFor(tries);
        this.logger.warn(
          {
            operation: invocation.operation,
            path: invocation.path,
            attempt: tries,
            delay,
            kind: failure.kind,
          },
          'Retrying storage operation after temporary error'
        );
        return andThen(sleep(delay, ctx), () => run(tries + 1));
      });

    return run(1);
  }

  /** Delay before retry number `tries` (1-based): min * factor^(tries-1), capped. */
  private delayFor(tries: number): number {
    const nominal = Math.min(this.maxDelayMs, this.minDelayMs * this.factor ** (tries - 1));
    return this.jitter ? Math.round(nominal * (0.5 + Math.random() / 2)) : nominal;
  }
}

export class RetryLayer implements Layer {
  readonly name = 'retry';

  constructor(private readonly options: RetryOptions = {}) {}

  wrap(inner: Accessor): Accessor {
    return new RetryAccessor(inner, this.options);
  }
}
