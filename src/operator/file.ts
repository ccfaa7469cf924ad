// File handle: a stateful cursor over one stored object.
//
// Read handles fetch byte ranges on demand (or the whole object once when the
// backend cannot serve ranges). Write handles buffer up to `bufferSize` bytes
// and flush to the backend writer when the buffer fills, on flush(), or on
// close(). close() is idempotent; everything else fails with Closed after it.

import type { Logger } from 'pino';

import { ErrorKind, storageError } from '../errors/index.js';
import type { RawWriter } from '../raw/accessor.js';
import {
  attempt,
  BLOCKING,
  expectSync,
  andThen,
  type Awaitable,
  type CallContext,
} from '../raw/awaitable.js';
import { concat, toBytes } from '../raw/bytes.js';
import type { Metadata } from '../types/metadata.js';
import type { OpenMode } from '../types/options.js';

export const DEFAULT_WRITE_BUFFER_SIZE = 8 * 1024 * 1024;
export const DEFAULT_READ_AHEAD = 256 * 1024;

export type SeekWhence = 'start' | 'current' | 'end';

export interface ReadSource {
  /** Known object size from stat at open time */
  size: number;
  /** Whether the backend can serve arbitrary byte ranges */
  ranged: boolean;
  fetch(start: number, end: number, ctx: CallContext): Awaitable<Uint8Array>;
}

type FileState =
  | { mode: 'r'; source: ReadSource; chunk: Uint8Array; chunkStart: number }
  | { mode: 'w'; writer: RawWriter; pending: Uint8Array[]; pendingBytes: number; failed: boolean };

export class FileCore {
  private state: FileState;
  private position = 0;
  private closed = false;
  private result: Metadata | undefined;

  private constructor(
    readonly path: string,
    state: FileState,
    private readonly bufferSize: number,
    private readonly logger: Logger
  ) {
    this.state = state;
  }

  static reader(path: string, source: ReadSource, logger: Logger): FileCore {
    return new FileCore(
      path,
      { mode: 'r', source, chunk: new Uint8Array(0), chunkStart: 0 },
      DEFAULT_READ_AHEAD,
      logger
    );
  }

  static writer(path: string, writer: RawWriter, bufferSize: number, logger: Logger): FileCore {
    return new FileCore(
      path,
      { mode: 'w', writer, pending: [], pendingBytes: 0, failed: false },
      bufferSize,
      logger
    );
  }

  get mode(): OpenMode {
    return this.state.mode;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Metadata reported by the backend once a write handle is closed. */
  get metadata(): Metadata | undefined {
    return this.result;
  }

  tell(): number {
    this.ensureOpen('tell');
    return this.position;
  }

  /** Fill `buffer` from the current position; 0 means end of file. */
  read(buffer: Uint8Array, ctx: CallContext): Awaitable<number> {
    this.ensureOpen('read');
    const state = this.state;
    if (state.mode !== 'r') {
      throw this.error(ErrorKind.InvalidState, 'file is not opened for reading', 'read');
    }

    const { size } = state.source;
    if (this.position >= size || buffer.length === 0) return 0;
    const wanted = Math.min(buffer.length, size - this.position);

    const offset = this.position - state.chunkStart;
    if (offset >= 0 && offset + wanted <= state.chunk.length) {
      buffer.set(state.chunk.subarray(offset, offset + wanted));
      this.position += wanted;
      return wanted;
    }

    const start = state.source.ranged ? this.position : 0;
    const end = state.source.ranged
      ? Math.min(size, this.position + Math.max(wanted, this.bufferSize))
      : size;
    return andThen(state.source.fetch(start, end, ctx), (chunk) => {
      state.chunk = chunk;
      state.chunkStart = start;
      const available = Math.max(0, Math.min(wanted, chunk.length - (this.position - start)));
      buffer.set(chunk.subarray(this.position - start, this.position - start + available));
      this.position += available;
      return available;
    });
  }

  /** Read up to `size` bytes (default: to the end of the file). */
  readBytes(size: number | undefined, ctx: CallContext): Awaitable<Uint8Array> {
    this.ensureOpen('read');
    const state = this.state;
    if (state.mode !== 'r') {
      throw this.error(ErrorKind.InvalidState, 'file is not opened for reading', 'read');
    }
    const remaining = Math.max(0, state.source.size - this.position);
    const length = size === undefined ? remaining : Math.min(size, remaining);
    const out = new Uint8Array(length);

    const fill = (filled: number): Awaitable<Uint8Array> => {
      if (filled >= length) return out;
      return andThen(this.read(out.subarray(filled), ctx), (n) =>
        n === 0 ? out.subarray(0, filled) : fill(filled + n)
      );
    };
    return fill(0);
  }

  write(bytes: Uint8Array, ctx: CallContext): Awaitable<number> {
    this.ensureOpen('write');
    const state = this.state;
    if (state.mode !== 'w') {
      throw this.error(ErrorKind.InvalidState, 'file is not opened for writing', 'write');
    }
    if (state.failed) {
      throw this.error(ErrorKind.InvalidState, 'a previous flush failed', 'write');
    }

    state.pending.push(bytes.slice());
    state.pendingBytes += bytes.length;
    this.position += bytes.length;

    if (state.pendingBytes >= this.bufferSize) {
      return andThen(this.flushPending(state, ctx), () => bytes.length);
    }
    return bytes.length;
  }

  flush(ctx: CallContext): Awaitable<void> {
    this.ensureOpen('flush');
    const state = this.state;
    if (state.mode !== 'w') return undefined;
    return this.flushPending(state, ctx);
  }

  seek(offset: number, whence: SeekWhence): number {
    this.ensureOpen('seek');
    if (!Number.isInteger(offset)) {
      throw this.error(ErrorKind.InvalidInput, 'seek offset must be an integer', 'seek');
    }

    const state = this.state;
    if (state.mode === 'w') {
      if (state.pendingBytes > 0) {
        throw this.error(
          ErrorKind.InvalidState,
          'cannot seek with unflushed data; flush first',
          'seek'
        );
      }
      const target = whence === 'start' ? offset : this.position + offset;
      if (whence === 'end' || target !== this.position) {
        throw this.error(ErrorKind.Unsupported, 'write handles are append-only', 'seek');
      }
      return this.position;
    }

    const base =
      whence === 'start' ? 0 : whence === 'current' ? this.position : state.source.size;
    const target = base + offset;
    if (target < 0) {
      throw this.error(ErrorKind.InvalidInput, `cannot seek before the start (${target})`, 'seek');
    }
    this.position = target;
    return this.position;
  }

  /** Flush, commit and release the backend stream. A second call is a no-op. */
  close(ctx: CallContext): Awaitable<void> {
    if (this.closed) return undefined;
    this.closed = true;

    const state = this.state;
    if (state.mode === 'r') {
      state.chunk = new Uint8Array(0);
      return undefined;
    }

    return attempt(
      () =>
        andThen(
          state.failed ? this.failedClose() : this.flushPending(state, ctx),
          () =>
            andThen(state.writer.close(ctx), (metadata) => {
              this.result = metadata;
            })
        ),
      (error) =>
        andThen(
          attempt(
            () => state.writer.abort(ctx),
            (abortError) => {
              this.logger.warn(
                { err: abortError, path: this.path },
                'Failed to abort writer after close error'
              );
            }
          ),
          (): never => {
            throw error;
          }
        )
    );
  }

  /**
   * Close without committing: buffered data is dropped and the backend
   * writer is aborted. Read handles are simply closed.
   */
  discard(ctx: CallContext): Awaitable<void> {
    if (this.closed) return undefined;
    const state = this.state;
    if (state.mode === 'r') return this.close(ctx);
    this.closed = true;
    state.pending = [];
    state.pendingBytes = 0;
    return state.writer.abort(ctx);
  }

  private flushPending(
    state: Extract<FileState, { mode: 'w' }>,
    ctx: CallContext
  ): Awaitable<void> {
    if (state.pendingBytes === 0) return undefined;
    const chunk = concat(state.pending, state.pendingBytes);
    state.pending = [];
    state.pendingBytes = 0;
    return attempt(
      () => state.writer.write(chunk, ctx),
      (error) => {
        state.failed = true;
        throw error;
      }
    );
  }

  private failedClose(): never {
    throw this.error(
      ErrorKind.InvalidState,
      'a previous flush failed; written data discarded',
      'close'
    );
  }

  private ensureOpen(operation: string): void {
    if (this.closed) {
      throw this.error(ErrorKind.Closed, `file ${this.path} is closed`, operation);
    }
  }

  private error(kind: ErrorKind, message: string, operation: string) {
    return storageError(kind, message, { context: { operation, path: this.path } });
  }
}

/** Async file handle. */
export class File {
  constructor(private readonly core: FileCore) {}

  get path(): string {
    return this.core.path;
  }

  get mode(): OpenMode {
    return this.core.mode;
  }

  get closed(): boolean {
    return this.core.isClosed;
  }

  get metadata(): Metadata | undefined {
    return this.core.metadata;
  }

  async read(buffer: Uint8Array): Promise<number> {
    return this.core.read(buffer, { blocking: false });
  }

  async readBytes(size?: number): Promise<Uint8Array> {
    return this.core.readBytes(size, { blocking: false });
  }

  async write(bytes: Uint8Array | string): Promise<number> {
    return this.core.write(toBytes(bytes), { blocking: false });
  }

  async flush(): Promise<void> {
    return this.core.flush({ blocking: false });
  }

  async seek(offset: number, whence: SeekWhence = 'start'): Promise<number> {
    return this.core.seek(offset, whence);
  }

  tell(): number {
    return this.core.tell();
  }

  async close(): Promise<void> {
    return this.core.close({ blocking: false });
  }
}

/** Blocking file handle over the same core. */
export class BlockingFile {
  constructor(private readonly core: FileCore) {}

  get path(): string {
    return this.core.path;
  }

  get mode(): OpenMode {
    return this.core.mode;
  }

  get closed(): boolean {
    return this.core.isClosed;
  }

  get metadata(): Metadata | undefined {
    return this.core.metadata;
  }

  read(buffer: Uint8Array): number {
    return expectSync(this.core.read(buffer, BLOCKING), 'read');
  }

  readBytes(size?: number): Uint8Array {
    return expectSync(this.core.readBytes(size, BLOCKING), 'read');
  }

  write(bytes: Uint8Array | string): number {
    return expectSync(this.core.write(toBytes(bytes), BLOCKING), 'write');
  }

  flush(): void {
    expectSync(this.core.flush(BLOCKING), 'flush');
  }

  seek(offset: number, whence: SeekWhence = 'start'): number {
    return this.core.seek(offset, whence);
  }

  tell(): number {
    return this.core.tell();
  }

  close(): void {
    expectSync(this.core.close(BLOCKING), 'close');
  }
}
