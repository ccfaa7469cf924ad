// Operator: async entry point for storage operations.
//
// Thin adapter over OperatorCore. Every method resolves through the same
// core as BlockingOperator; the only difference is that results are awaited.

import type { Logger } from 'pino';

import { BlockingOperator } from './blocking-operator.js';
import { OperatorCore } from './core.js';
import { File } from './file.js';
import { Lister } from './lister.js';
import { ErrorKind, storageError } from '../errors/index.js';
import { silentLogger } from '../logger.js';
import type { Accessor, AccessorInfo } from '../raw/accessor.js';
import type { CallContext } from '../raw/awaitable.js';
import type { Layer } from '../raw/layer.js';
import { createAccessor } from '../storage/index.js';
import type { Capability } from '../types/capability.js';
import type { Entry } from '../types/entry.js';
import type { Metadata } from '../types/metadata.js';
import type {
  CallOptions,
  DeleteOptions,
  ListOptions,
  OpenMode,
  OpenOptions,
  PresignedRequest,
  ReadOptions,
  StatOptions,
  WriteOptions,
} from '../types/options.js';

export interface OperatorOptions {
  /** Logger for core diagnostics (defaults to silent) */
  logger?: Logger;
}

export class Operator {
  private readonly core: OperatorCore;

  constructor(accessor: Accessor, options: OperatorOptions = {}) {
    this.core = new OperatorCore(accessor, options.logger ?? silentLogger());
  }

  /**
   * Build an operator for a registered service from a flat string map.
   *
   * @example
   * const op = Operator.fromMap('fs', { root: '/tmp/data' });
   */
  static fromMap(
    scheme: string,
    map: Record<string, string> = {},
    options: OperatorOptions = {}
  ): Operator {
    const logger = options.logger ?? silentLogger();
    return new Operator(createAccessor(scheme, map, { logger }), { logger });
  }

  /** New operator whose calls go through `layer` before reaching this one's stack. */
  layer(layer: Layer): Operator {
    return new Operator(layer.wrap(this.core.accessor), { logger: this.core.logger });
  }

  info(): AccessorInfo {
    return this.core.info;
  }

  capability(): Capability {
    return this.core.capability;
  }

  /** Blocking view over the same layered accessor. */
  blocking(): BlockingOperator {
    if (!this.core.capability.supports('blocking')) {
      throw storageError(
        ErrorKind.Unsupported,
        `service ${this.core.info.scheme} cannot complete calls without suspending`,
        { context: { operation: 'blocking', scheme: this.core.info.scheme } }
      );
    }
    return new BlockingOperator(this.core);
  }

  async stat(path: string, options?: StatOptions): Promise<Metadata> {
    return this.core.stat(path, options, context(options));
  }

  async exists(path: string, options?: CallOptions): Promise<boolean> {
    return this.core.exists(path, context(options));
  }

  async read(path: string, options?: ReadOptions): Promise<Uint8Array> {
    return this.core.read(path, options, context(options));
  }

  async write(path: string, data: Uint8Array | string, options?: WriteOptions): Promise<Metadata> {
    return this.core.write(path, data, options, context(options));
  }

  async delete(path: string, options?: DeleteOptions): Promise<void> {
    return this.core.delete(path, options, context(options));
  }

  async deleteMany(paths: string[], options?: CallOptions): Promise<void> {
    return this.core.deleteMany(paths, context(options));
  }

  async removeAll(path: string, options?: CallOptions): Promise<void> {
    return this.core.removeAll(path, context(options));
  }

  async createDir(path: string, options?: CallOptions): Promise<void> {
    return this.core.createDir(path, context(options));
  }

  async list(path: string, options?: ListOptions): Promise<Lister> {
    return new Lister(await this.core.list(path, options, context(options)));
  }

  /** Collect a whole listing. */
  async listAll(path: string, options?: ListOptions): Promise<Entry[]> {
    const lister = await this.list(path, options);
    return lister.toArray();
  }

  async copy(from: string, to: string, options?: CallOptions): Promise<void> {
    return this.core.copy(from, to, context(options));
  }

  async rename(from: string, to: string, options?: CallOptions): Promise<void> {
    return this.core.rename(from, to, context(options));
  }

  async open(path: string, mode: OpenMode, options?: OpenOptions): Promise<File> {
    return new File(await this.core.open(path, mode, options, context(options)));
  }

  async presignRead(path: string, expiresIn: number): Promise<PresignedRequest> {
    return this.core.presign(path, 'read', { expiresIn }, ASYNC);
  }

  async presignStat(path: string, expiresIn: number): Promise<PresignedRequest> {
    return this.core.presign(path, 'stat', { expiresIn }, ASYNC);
  }

  async presignWrite(path: string, expiresIn: number): Promise<PresignedRequest> {
    return this.core.presign(path, 'write', { expiresIn }, ASYNC);
  }

  async check(options?: CallOptions): Promise<void> {
    return this.core.check(context(options));
  }

  /** Close the underlying service, including for operators layered from this one. */
  async close(): Promise<void> {
    return this.core.close();
  }
}

const ASYNC: CallContext = Object.freeze({ blocking: false });

function context(options: { signal?: AbortSignal } | undefined): CallContext {
  const signal = options?.signal;
  return signal === undefined ? ASYNC : { blocking: false, signal };
}
