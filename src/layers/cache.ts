// Read-through cache layer: L1 in-memory Map + optional L2 Redis
//
// Caches stat results and whole-object reads. Conditional and ranged calls
// bypass the cache. Any mutation of a path drops its entries from both
// levels; L2 is consulted only by async calls.

import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';

import { silentLogger } from '../logger.js';
import type { Accessor, BatchDeleteResult } from '../raw/accessor.js';
import { always, andThen, type Awaitable, type CallContext } from '../raw/awaitable.js';
import {
  LayeredAccessor,
  type InterceptedOperation,
  type Invocation,
  type Layer,
} from '../raw/layer.js';
import { Metadata } from '../types/metadata.js';
import type { ReadOptions, StatOptions } from '../types/options.js';

export interface CacheOptions {
  /** Entry lifetime (default 60s) */
  ttlMs?: number;
  /** Maximum L1 entries before eviction (default 10,000) */
  maxEntries?: number;
  /** Objects larger than this are not cached (default 1 MiB) */
  maxObjectSize?: number;
  /** Optional shared second level */
  redis?: Redis;
  /** Prefix for L2 keys (default "stratum:cache:") */
  keyPrefix?: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Metadata serialization for L2
// ---------------------------------------------------------------------------

const MetadataJsonSchema = z.object({
  kind: z.enum(['file', 'dir', 'unknown']),
  contentLength: z.number().int().min(0).optional(),
  lastModified: z.string().optional(),
  etag: z.string().optional(),
  contentType: z.string().optional(),
  contentMd5: z.string().optional(),
  cacheControl: z.string().optional(),
  contentDisposition: z.string().optional(),
  version: z.string().optional(),
  userMetadata: z.record(z.string(), z.string()).optional(),
});

export function serializeMetadata(metadata: Metadata): string {
  return JSON.stringify({ ...metadata.toInit(), lastModified: metadata.lastModified?.toISOString() });
}

export function deserializeMetadata(json: string): Metadata | null {
  const parsed = MetadataJsonSchema.safeParse(JSON.parse(json));
  if (!parsed.success) return null;
  const { lastModified, ...rest } = parsed.data;
  return new Metadata({
    ...rest,
    lastModified: lastModified === undefined ? undefined : new Date(lastModified),
  });
}

// ---------------------------------------------------------------------------
// L1 cache entry
// ---------------------------------------------------------------------------

type Cached = { kind: 'stat'; value: Metadata } | { kind: 'read'; value: Uint8Array };

interface L1Entry {
  value: Cached;
  expiresAt: number;
}

const MUTATIONS: ReadonlySet<InterceptedOperation> = new Set([
  'createDir',
  'delete',
  'copy',
  'rename',
  'writer.close',
]);

// ---------------------------------------------------------------------------
// Cache accessor
// ---------------------------------------------------------------------------

/**
 * Two-level object cache.
 *
 * Read path:  L1 hit -> return | L1 miss -> L2 hit -> warm L1 -> return | miss -> backend
 * Write path: backend result stored in L1 and L2.
 */
class CacheAccessor extends LayeredAccessor {
  private readonly l1 = new Map<string, L1Entry>();
  /** Bumped on every invalidation; results fetched across a bump are not stored. */
  private generation = 0;
  private readonly ttlMs: number;
  private readonly ttlSeconds: number;
  private readonly maxEntries: number;
  private readonly maxObjectSize: number;
  private readonly redis: Redis | undefined;
  private readonly prefix: string;
  private readonly logger: Logger;

  constructor(inner: Accessor, options: CacheOptions) {
    super(inner);
    const { scheme, root, name } = inner.info();
    this.ttlMs = options.ttlMs ?? 60_000;
    this.ttlSeconds = Math.max(1, Math.ceil(this.ttlMs / 1000));
    this.maxEntries = options.maxEntries ?? 10_000;
    this.maxObjectSize = options.maxObjectSize ?? 1024 * 1024;
    this.redis = options.redis;
    this.prefix = `${options.keyPrefix ?? 'stratum:cache:'}${scheme}:${name}:${root}`;
    this.logger = options.logger ?? silentLogger();
  }

  override stat(path: string, options: StatOptions, ctx: CallContext): Awaitable<Metadata> {
    if (options.ifMatch !== undefined || options.ifNoneMatch !== undefined || options.version) {
      return super.stat(path, options, ctx);
    }
    const key = this.key('stat', path);
    const generation = this.generation;
    return andThen(this.lookup(key, 'stat', generation, ctx), (hit) => {
      if (hit?.kind === 'stat') return hit.value;
      return andThen(super.stat(path, options, ctx), (metadata) =>
        andThen(
          this.store(key, { kind: 'stat', value: metadata }, generation, ctx),
          () => metadata
        )
      );
    });
  }

  override read(path: string, options: ReadOptions, ctx: CallContext): Awaitable<Uint8Array> {
    const conditional =
      options.ifMatch !== undefined ||
      options.ifNoneMatch !== undefined ||
      options.ifModifiedSince !== undefined ||
      options.version !== undefined;
    if (options.range !== undefined || conditional) {
      return super.read(path, options, ctx);
    }
    const key = this.key('read', path);
    const generation = this.generation;
    return andThen(this.lookup(key, 'read', generation, ctx), (hit) => {
      if (hit?.kind === 'read') return hit.value.slice();
      return andThen(super.read(path, options, ctx), (data) => {
        if (data.length > this.maxObjectSize) return data;
        return andThen(
          this.store(key, { kind: 'read', value: data.slice() }, generation, ctx),
          () => data
        );
      });
    });
  }

  override deleteBatch(paths: string[], ctx: CallContext): Awaitable<BatchDeleteResult> {
    return always(
      () => super.deleteBatch(paths, ctx),
      () => {
        for (const path of paths) this.invalidate(path);
      }
    );
  }

  protected override intercept<T>(
    invocation: Invocation,
    _ctx: CallContext,
    next: () => Awaitable<T>
  ): Awaitable<T> {
    if (!MUTATIONS.has(invocation.operation)) return next();
    // Drop entries whether or not the mutation succeeded; its outcome may be partial.
    return always(next, () => {
      this.invalidate(invocation.path);
      if (invocation.to !== undefined) this.invalidate(invocation.to);
    });
  }

  private key(kind: Cached['kind'], path: string): string {
    return `${this.prefix}${kind}:${path}`;
  }

  private lookup(
    key: string,
    kind: Cached['kind'],
    generation: number,
    ctx: CallContext
  ): Awaitable<Cached | null> {
    // L1 check
    const l1Entry = this.l1.get(key);
    if (l1Entry) {
      if (Date.now() < l1Entry.expiresAt) {
        this.logger.debug({ key }, 'Storage cache L1 hit');
        return l1Entry.value;
      }
      // Expired - remove stale entry
      this.l1.delete(key);
    }

    const redis = this.redis;
    if (redis === undefined || ctx.blocking) {
      this.logger.debug({ key }, 'Storage cache miss');
      return null;
    }

    // L2 check
    return this.fromL2(redis, key, kind).then((value) => {
      if (value === null) {
        this.logger.debug({ key }, 'Storage cache miss');
        return null;
      }
      this.logger.debug({ key }, 'Storage cache L2 hit');
      // Warm L1
      if (generation === this.generation) {
        this.l1.set(key, { value, expiresAt: Date.now() + this.ttlMs });
        this.evictIfOverCap();
      }
      return value;
    });
  }

  private async fromL2(redis: Redis, key: string, kind: Cached['kind']): Promise<Cached | null> {
    try {
      if (kind === 'read') {
        const raw = await redis.getBuffer(key);
        return raw === null ? null : { kind, value: new Uint8Array(raw) };
      }
      const raw = await redis.get(key);
      const metadata = raw === null ? null : deserializeMetadata(raw);
      return metadata === null ? null : { kind, value: metadata };
    } catch (err) {
      // L2 is an optimization; fall through to the backend.
      this.logger.debug({ err: errorMessage(err), key }, 'Storage cache L2 read failed');
      return null;
    }
  }

  private store(
    key: string,
    value: Cached,
    generation: number,
    ctx: CallContext
  ): Awaitable<void> {
    if (generation !== this.generation) {
      this.logger.debug({ key }, 'Storage cache store skipped after invalidation');
      return undefined;
    }

    // L1 write
    this.l1.set(key, { value, expiresAt: Date.now() + this.ttlMs });
    this.evictIfOverCap();

    const redis = this.redis;
    if (redis === undefined || ctx.blocking) return undefined;

    // L2 write
    const payload = value.kind === 'read' ? Buffer.from(value.value) : serializeMetadata(value.value);
    return redis.set(key, payload, 'EX', this.ttlSeconds).then(
      () => {
        this.logger.debug({ key }, 'Storage cache set');
      },
      (err: unknown) => {
        this.logger.debug({ err: errorMessage(err), key }, 'Storage cache L2 write failed');
      }
    );
  }

  /**
   * Evict the oldest L1 entry (by expiresAt) when the cache exceeds maxEntries.
   */
  private evictIfOverCap(): void {
    if (this.l1.size <= this.maxEntries) return;

    let oldestKey: string | null = null;
    let oldestExpiry = Infinity;
    for (const [key, entry] of this.l1) {
      if (entry.expiresAt < oldestExpiry) {
        oldestExpiry = entry.expiresAt;
        oldestKey = key;
      }
    }
    if (oldestKey) {
      this.l1.delete(oldestKey);
      this.logger.debug(
        { evictedKey: oldestKey, cacheSize: this.l1.size },
        'L1 cache entry evicted (max size)'
      );
    }
  }

  /**
   * Invalidate cached entries for a path from both levels. Directory paths
   * drop every L1 entry below them.
   */
  private invalidate(path: string): void {
    this.generation++;
    const keys = [this.key('stat', path), this.key('read', path)];
    if (path.endsWith('/')) {
      const statPrefix = this.key('stat', path);
      const readPrefix = this.key('read', path);
      for (const key of this.l1.keys()) {
        if (key.startsWith(statPrefix) || key.startsWith(readPrefix)) keys.push(key);
      }
    }
    for (const key of keys) this.l1.delete(key);

    // Fire-and-forget L2 deletion
    this.redis?.del(...keys).catch((err: unknown) => {
      this.logger.debug({ err: errorMessage(err), path }, 'Redis fire-and-forget failed');
    });
    this.logger.debug({ path }, 'Storage cache invalidated');
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class CacheLayer implements Layer {
  readonly name = 'cache';

  constructor(private readonly options: CacheOptions = {}) {}

  wrap(inner: Accessor): Accessor {
    return new CacheAccessor(inner, this.options);
  }
}
