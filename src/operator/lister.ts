// Lister: single-pass cursor over backend pagination.
//
// Created -> Yielding -> Closed. Page fetches are transparent. A failed page
// fetch surfaces once from next() and closes the cursor; after that, and after
// exhaustion, next() keeps returning null.

import type { Logger } from 'pino';

import type { RawLister } from '../raw/accessor.js';
import {
  attempt,
  BLOCKING,
  expectSync,
  isPromise,
  andThen,
  type Awaitable,
  type CallContext,
} from '../raw/awaitable.js';
import type { Entry } from '../types/entry.js';

type ListerState = 'created' | 'yielding' | 'closed';

export class ListerCore {
  private state: ListerState = 'created';
  private buffer: Entry[] = [];
  private previousPage: ReadonlySet<string> = new Set();
  private exhausted = false;

  constructor(
    private readonly raw: RawLister,
    private readonly normalize: (entry: Entry) => Entry,
    private readonly logger: Logger
  ) {}

  get closed(): boolean {
    return this.state === 'closed';
  }

  next(ctx: CallContext): Awaitable<Entry | null> {
    if (this.state === 'closed') return null;

    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      this.state = 'yielding';
      return buffered;
    }

    if (this.exhausted) {
      return andThen(this.close(ctx), () => null);
    }

    return andThen(
      attempt(
        () => this.raw.next(ctx),
        (error) =>
          andThen(this.closeAfterFailure(ctx, error), (): never => {
            throw error;
          })
      ),
      (page): Awaitable<Entry | null> => {
        if (page === null) {
          this.exhausted = true;
        } else {
          this.acceptPage(page);
        }
        return this.next(ctx);
      }
    );
  }

  /** Release the backend cursor. Safe to call any number of times. */
  close(ctx: CallContext): Awaitable<void> {
    if (this.state === 'closed') return undefined;
    this.state = 'closed';
    this.buffer = [];
    return this.raw.close(ctx);
  }

  /** Collect every remaining entry. The cursor is closed afterwards. */
  drain(ctx: CallContext): Awaitable<Entry[]> {
    const entries: Entry[] = [];
    const step = (): Awaitable<Entry[]> => {
      for (;;) {
        const next = this.next(ctx);
        if (isPromise(next)) {
          return next.then((entry) => {
            if (entry === null) return entries;
            entries.push(entry);
            return step();
          });
        }
        if (next === null) return entries;
        entries.push(next);
      }
    };
    return step();
  }

  private acceptPage(page: Entry[]): void {
    const seen = new Set<string>();
    for (const raw of page) {
      const entry = this.normalize(raw);
      // Pagination may repeat entries across a page boundary; yield each once.
      if (this.previousPage.has(entry.path) || seen.has(entry.path)) continue;
      seen.add(entry.path);
      this.buffer.push(entry);
    }
    this.previousPage = seen;
  }

  private closeAfterFailure(ctx: CallContext, error: unknown): Awaitable<void> {
    return attempt(
      () => this.close(ctx),
      (closeError) => {
        this.logger.warn(
          { err: closeError, cause: error },
          'Failed to release lister after page fetch error'
        );
      }
    );
  }
}

/** Async lister. Breaking out of `for await` closes it. */
export class Lister implements AsyncIterable<Entry> {
  constructor(private readonly core: ListerCore) {}

  /** Next entry, or null at the end of the sequence. */
  async next(): Promise<Entry | null> {
    return this.core.next({ blocking: false });
  }

  async close(): Promise<void> {
    return this.core.close({ blocking: false });
  }

  async toArray(): Promise<Entry[]> {
    return this.core.drain({ blocking: false });
  }

  get closed(): boolean {
    return this.core.closed;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Entry> {
    try {
      for (;;) {
        const entry = await this.next();
        if (entry === null) return;
        yield entry;
      }
    } finally {
      await this.close();
    }
  }
}

/** Blocking lister over the same core. */
export class BlockingLister implements Iterable<Entry> {
  constructor(private readonly core: ListerCore) {}

  next(): Entry | null {
    return expectSync(this.core.next(BLOCKING), 'list');
  }

  close(): void {
    expectSync(this.core.close(BLOCKING), 'list');
  }

  toArray(): Entry[] {
    return expectSync(this.core.drain(BLOCKING), 'list');
  }

  get closed(): boolean {
    return this.core.closed;
  }

  *[Symbol.iterator](): Iterator<Entry> {
    try {
      for (;;) {
        const entry = this.next();
        if (entry === null) return;
        yield entry;
      }
    } finally {
      this.close();
    }
  }
}
