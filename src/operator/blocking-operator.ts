// BlockingOperator: the same operations, completed before returning.
//
// Obtained from Operator.blocking(). Calls fail with InvalidState if any
// component of the stack had to suspend.

import type { OperatorCore } from './core.js';
import { BlockingFile } from './file.js';
import { BlockingLister } from './lister.js';
import type { AccessorInfo } from '../raw/accessor.js';
import { BLOCKING, expectSync } from '../raw/awaitable.js';
import type { Capability } from '../types/capability.js';
import type { Entry } from '../types/entry.js';
import type { Metadata } from '../types/metadata.js';
import type {
  DeleteOptions,
  ListOptions,
  OpenMode,
  OpenOptions,
  PresignedRequest,
  ReadOptions,
  StatOptions,
  WriteOptions,
} from '../types/options.js';

export class BlockingOperator {
  constructor(private readonly core: OperatorCore) {}

  info(): AccessorInfo {
    return this.core.info;
  }

  capability(): Capability {
    return this.core.capability;
  }

  stat(path: string, options?: StatOptions): Metadata {
    return expectSync(this.core.stat(path, options, BLOCKING), 'stat');
  }

  exists(path: string): boolean {
    return expectSync(this.core.exists(path, BLOCKING), 'exists');
  }

  read(path: string, options?: ReadOptions): Uint8Array {
    return expectSync(this.core.read(path, options, BLOCKING), 'read');
  }

  write(path: string, data: Uint8Array | string, options?: WriteOptions): Metadata {
    return expectSync(this.core.write(path, data, options, BLOCKING), 'write');
  }

  delete(path: string, options?: DeleteOptions): void {
    expectSync(this.core.delete(path, options, BLOCKING), 'delete');
  }

  deleteMany(paths: string[]): void {
    expectSync(this.core.deleteMany(paths, BLOCKING), 'deleteMany');
  }

  removeAll(path: string): void {
    expectSync(this.core.removeAll(path, BLOCKING), 'removeAll');
  }

  createDir(path: string): void {
    expectSync(this.core.createDir(path, BLOCKING), 'createDir');
  }

  list(path: string, options?: ListOptions): BlockingLister {
    return new BlockingLister(expectSync(this.core.list(path, options, BLOCKING), 'list'));
  }

  listAll(path: string, options?: ListOptions): Entry[] {
    return this.list(path, options).toArray();
  }

  copy(from: string, to: string): void {
    expectSync(this.core.copy(from, to, BLOCKING), 'copy');
  }

  rename(from: string, to: string): void {
    expectSync(this.core.rename(from, to, BLOCKING), 'rename');
  }

  open(path: string, mode: OpenMode, options?: OpenOptions): BlockingFile {
    return new BlockingFile(expectSync(this.core.open(path, mode, options, BLOCKING), 'open'));
  }

  presignRead(path: string, expiresIn: number): PresignedRequest {
    return expectSync(this.core.presign(path, 'read', { expiresIn }, BLOCKING), 'presign');
  }

  presignStat(path: string, expiresIn: number): PresignedRequest {
    return expectSync(this.core.presign(path, 'stat', { expiresIn }, BLOCKING), 'presign');
  }

  presignWrite(path: string, expiresIn: number): PresignedRequest {
    return expectSync(this.core.presign(path, 'write', { expiresIn }, BLOCKING), 'presign');
  }

  check(): void {
    expectSync(this.core.check(BLOCKING), 'check');
  }
}
