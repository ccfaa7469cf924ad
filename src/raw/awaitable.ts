// Single suspend-point abstraction shared by the async and blocking conventions.
//
// Core logic, layers and services return Awaitable<T>: a plain value when the
// work finished synchronously, a Promise when it had to wait on I/O. The
// helpers below chain such values without introducing a Promise on the
// synchronous path, so a BlockingOperator can unwrap results directly.

import { setTimeout as delay } from 'node:timers/promises';

import { ErrorKind, storageError } from '../errors/index.js';

export type Awaitable<T> = T | Promise<T>;

/** Per-call execution context handed to every accessor method. */
export interface CallContext {
  /** True when the caller cannot suspend; services must complete synchronously. */
  readonly blocking: boolean;
  readonly signal?: AbortSignal;
}

export const BLOCKING: CallContext = Object.freeze({ blocking: true });

export function isPromise<T>(value: Awaitable<T>): value is Promise<T> {
  return value instanceof Promise;
}

/** Continue with `fn` once `value` is available. */
export function andThen<T, U>(value: Awaitable<T>, fn: (resolved: T) => Awaitable<U>): Awaitable<U> {
  return isPromise(value) ? value.then(fn) : fn(value);
}

/** Run `fn`, routing both synchronous throws and rejections into `onError`. */
export function attempt<T>(
  fn: () => Awaitable<T>,
  onError: (error: unknown) => Awaitable<T>
): Awaitable<T> {
  let result: Awaitable<T>;
  try {
    result = fn();
  } catch (error) {
    return onError(error);
  }
  return isPromise(result) ? result.catch(onError) : result;
}

/** Run `cleanup` after `fn` settles, whichever way it settles. */
export function always<T>(fn: () => Awaitable<T>, cleanup: () => Awaitable<void>): Awaitable<T> {
  return andThen(
    attempt<{ ok: true; value: T } | { ok: false; error: unknown }>(
      () => andThen(fn(), (value) => ({ ok: true as const, value })),
      (error) => ({ ok: false as const, error })
    ),
    (outcome) =>
      andThen(cleanup(), () => {
        if (!outcome.ok) throw outcome.error;
        return outcome.value;
      })
  );
}

/** Run each step in order, sequencing through the suspend points. */
export function forEach<T>(items: Iterable<T>, fn: (item: T) => Awaitable<void>): Awaitable<void> {
  const iterator = items[Symbol.iterator]();
  const step = (): Awaitable<void> => {
    for (;;) {
      const next = iterator.next();
      if (next.done) return undefined;
      const result = fn(next.value);
      if (isPromise(result)) {
        return result.then(step);
      }
    }
  };
  return step();
}

/**
 * Unwrap a value in the blocking convention.
 * A pending result means some component could not finish synchronously.
 */
export function expectSync<T>(value: Awaitable<T>, operation: string): T {
  if (isPromise(value)) {
    // The pending work is abandoned; its outcome is not observable by the caller.
    void value.catch(() => undefined);
    throw storageError(
      ErrorKind.InvalidState,
      `${operation} could not complete without suspending; use the async operator`,
      { context: { operation } }
    );
  }
  return value;
}

const sleepCell = new Int32Array(new SharedArrayBuffer(4));

/**
 * Wait `ms` milliseconds in the calling convention: a timer for async calls,
 * a thread park for blocking ones.
 */
export function sleep(ms: number, ctx: CallContext): Awaitable<void> {
  if (ms <= 0) return undefined;
  if (ctx.blocking) {
    Atomics.wait(sleepCell, 0, 0, ms);
    return undefined;
  }
  return delay(ms, undefined, { signal: ctx.signal }).catch((error: unknown) => {
    throw cancelled(ctx, 'sleep', error);
  });
}

/** Fail fast when the caller has already aborted. */
export function throwIfAborted(ctx: CallContext, operation: string): void {
  if (ctx.signal?.aborted) {
    throw cancelled(ctx, operation, ctx.signal.reason);
  }
}

export function cancelled(ctx: CallContext, operation: string, cause: unknown) {
  return storageError(ErrorKind.Cancelled, `${operation} was aborted`, {
    cause: cause ?? ctx.signal?.reason,
    context: { operation },
  });
}
