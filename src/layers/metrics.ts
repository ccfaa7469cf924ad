// Metrics layer: per-operation call counts, failures and latency.
//
// Samples go to a MetricsRecorder. The in-memory recorder keeps running
// totals and exposes them as a snapshot; plug in another recorder to export
// them elsewhere.

import { performance } from 'node:perf_hooks';

import { toStorageError, type ErrorKind } from '../errors/index.js';
import type { Accessor } from '../raw/accessor.js';
import { attempt, andThen, type Awaitable, type CallContext } from '../raw/awaitable.js';
import {
  LayeredAccessor,
  type InterceptedOperation,
  type Invocation,
  type Layer,
} from '../raw/layer.js';

export interface MetricSample {
  scheme: string;
  operation: InterceptedOperation;
  durationMs: number;
  /** Error kind when the call failed */
  error?: ErrorKind;
}

export interface MetricsRecorder {
  record(sample: MetricSample): void;
}

export interface OperationMetrics {
  count: number;
  errors: number;
  totalMs: number;
  maxMs: number;
  errorsByKind: Partial<Record<ErrorKind, number>>;
}

export class InMemoryMetrics implements MetricsRecorder {
  private readonly totals = new Map<string, OperationMetrics>();

  record(sample: MetricSample): void {
    const key = `${sample.scheme}.${sample.operation}`;
    const current = this.totals.get(key) ?? {
      count: 0,
      errors: 0,
      totalMs: 0,
      maxMs: 0,
      errorsByKind: {},
    };
    current.count += 1;
    current.totalMs += sample.durationMs;
    current.maxMs = Math.max(current.maxMs, sample.durationMs);
    if (sample.error !== undefined) {
      current.errors += 1;
      current.errorsByKind[sample.error] = (current.errorsByKind[sample.error] ?? 0) + 1;
    }
    this.totals.set(key, current);
  }

  /** Copy of the totals keyed by "<scheme>.<operation>". */
  snapshot(): Record<string, OperationMetrics> {
    const out: Record<string, OperationMetrics> = {};
    for (const [key, value] of this.totals) {
      out[key] = { ...value, errorsByKind: { ...value.errorsByKind } };
    }
    return out;
  }

  reset(): void {
    this.totals.clear();
  }
}

class MetricsAccessor extends LayeredAccessor {
  private readonly scheme: string;

  constructor(
    inner: Accessor,
    private readonly recorder: MetricsRecorder
  ) {
    super(inner);
    this.scheme = inner.info().scheme;
  }

  protected override intercept<T>(
    invocation: Invocation,
    _ctx: CallContext,
    next: () => Awaitable<T>
  ): Awaitable<T> {
    const startedAt = performance.now();
    const sample = (error?: ErrorKind): MetricSample => ({
      scheme: this.scheme,
      operation: invocation.operation,
      durationMs: performance.now() - startedAt,
      ...(error !== undefined && { error }),
    });

    return attempt(
      () =>
        andThen(next(), (value) => {
          this.recorder.record(sample());
          return value;
        }),
      (error) => {
        const failure = toStorageError(error);
        this.recorder.record(sample(failure.kind));
        throw failure;
      }
    );
  }
}

export class MetricsLayer implements Layer {
  readonly name = 'metrics';
  readonly recorder: MetricsRecorder;

  constructor(options: { recorder?: MetricsRecorder } = {}) {
    this.recorder = options.recorder ?? new InMemoryMetrics();
  }

  wrap(inner: Accessor): Accessor {
    return new MetricsAccessor(inner, this.recorder);
  }
}
