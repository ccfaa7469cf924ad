// Logging layer: one structured log line per backend call.
//
// Start and finish are logged at debug. Failures are logged at warn, or at
// error for Unexpected, since those point at the backend rather than the
// caller.

import { performance } from 'node:perf_hooks';

import type { Logger } from 'pino';

import { ErrorKind, toStorageError } from '../errors/index.js';
import type { Accessor } from '../raw/accessor.js';
import { attempt, andThen, type Awaitable, type CallContext } from '../raw/awaitable.js';
import { LayeredAccessor, type Invocation, type Layer } from '../raw/layer.js';

export interface LoggingOptions {
  logger: Logger;
}

class LoggingAccessor extends LayeredAccessor {
  private readonly logger: Logger;

  constructor(inner: Accessor, logger: Logger) {
    super(inner);
    const { scheme, name } = inner.info();
    this.logger = logger.child({ scheme, ...(name !== '' && { service: name }) });
  }

  protected override intercept<T>(
    invocation: Invocation,
    ctx: CallContext,
    next: () => Awaitable<T>
  ): Awaitable<T> {
    const logData: Record<string, unknown> = {
      operation: invocation.operation,
      path: invocation.path,
      ...(invocation.to !== undefined && { to: invocation.to }),
      ...(ctx.blocking && { blocking: true }),
    };
    const startedAt = performance.now();
    this.logger.debug(logData, 'Storage operation started');

    return attempt(
      () =>
        andThen(next(), (value) => {
          this.logger.debug(
            { ...logData, durationMs: elapsed(startedAt) },
            'Storage operation finished'
          );
          return value;
        }),
      (error) => {
        const failure = toStorageError(error);
        const failData = {
          ...logData,
          durationMs: elapsed(startedAt),
          kind: failure.kind,
          err: failure.message,
        };
        if (failure.kind === ErrorKind.Unexpected) {
          this.logger.error(failData, 'Storage operation failed');
        } else {
          this.logger.warn(failData, 'Storage operation failed');
        }
        throw failure;
      }
    );
  }
}

function elapsed(startedAt: number): number {
  return Math.round((performance.now() - startedAt) * 1000) / 1000;
}

export class LoggingLayer implements Layer {
  readonly name = 'logging';

  constructor(private readonly options: LoggingOptions) {}

  wrap(inner: Accessor): Accessor {
    return new LoggingAccessor(inner, this.options.logger);
  }
}
