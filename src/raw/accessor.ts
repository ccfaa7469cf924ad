// Accessor: the backend engine contract consumed by the core.
//
// Services implement it directly; layers wrap one accessor and return another.
// Every method may finish synchronously or return a Promise (see awaitable.ts);
// when ctx.blocking is set, a service that declared the `blocking` capability
// must finish synchronously. All failures are taxonomy errors.

import type { Awaitable, CallContext } from './awaitable.js';
import type { Capability } from '../types/capability.js';
import type { Entry } from '../types/entry.js';
import type { Metadata } from '../types/metadata.js';
import type {
  DeleteOptions,
  ListOptions,
  PresignOperation,
  PresignedRequest,
  ReadOptions,
  StatOptions,
  WriteOptions,
} from '../types/options.js';

export interface AccessorInfo {
  /** Service scheme, e.g. "memory" or "fs" */
  scheme: string;
  /** Normalized root every path is resolved under */
  root: string;
  /** Service-specific name (bucket, directory, database) */
  name: string;
  capability: Capability;
}

/** Backend pagination cursor. Each call to next() fetches one page. */
export interface RawLister {
  /** Next page of entries, or null once the listing is exhausted. */
  next(ctx: CallContext): Awaitable<Entry[] | null>;
  /** Release backend resources held by the cursor. */
  close(ctx: CallContext): Awaitable<void>;
}

/** One open backend write stream. */
export interface RawWriter {
  write(chunk: Uint8Array, ctx: CallContext): Awaitable<void>;
  /** Commit everything written so far. */
  close(ctx: CallContext): Awaitable<Metadata>;
  /** Discard everything written so far. */
  abort(ctx: CallContext): Awaitable<void>;
}

export interface PresignArgs {
  operation: PresignOperation;
  expiresIn: number;
}

export interface BatchDeleteResult {
  deleted: string[];
  failed: { path: string; error: Error }[];
}

export type AccessorOperation =
  | 'createDir'
  | 'stat'
  | 'read'
  | 'write'
  | 'delete'
  | 'deleteBatch'
  | 'list'
  | 'copy'
  | 'rename'
  | 'presign';

export interface Accessor {
  info(): AccessorInfo;
  createDir(path: string, ctx: CallContext): Awaitable<void>;
  stat(path: string, options: StatOptions, ctx: CallContext): Awaitable<Metadata>;
  read(path: string, options: ReadOptions, ctx: CallContext): Awaitable<Uint8Array>;
  write(path: string, options: WriteOptions, ctx: CallContext): Awaitable<RawWriter>;
  delete(path: string, options: DeleteOptions, ctx: CallContext): Awaitable<void>;
  deleteBatch(paths: string[], ctx: CallContext): Awaitable<BatchDeleteResult>;
  list(path: string, options: ListOptions, ctx: CallContext): Awaitable<RawLister>;
  copy(from: string, to: string, ctx: CallContext): Awaitable<void>;
  rename(from: string, to: string, ctx: CallContext): Awaitable<void>;
  presign(path: string, args: PresignArgs, ctx: CallContext): Awaitable<PresignedRequest>;
  /** Release connections held by the service. Services without any omit it. */
  close?(): Promise<void>;
}
