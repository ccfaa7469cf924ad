// Recursive listing over a backend that only lists one directory level.
//
// Walks directories depth-first: every directory entry is yielded, then
// listed once the current cursor is exhausted, in the order it was listed.

import type { RawLister } from '../raw/accessor.js';
import { andThen, type Awaitable, type CallContext } from '../raw/awaitable.js';
import type { Entry } from '../types/entry.js';

export class FlatLister implements RawLister {
  private readonly pending: string[];
  /** Directories seen by the active cursor, in listing order */
  private found: string[] = [];
  private active: RawLister | null;

  constructor(
    first: RawLister,
    private readonly openDir: (path: string, ctx: CallContext) => Awaitable<RawLister>
  ) {
    this.active = first;
    this.pending = [];
  }

  next(ctx: CallContext): Awaitable<Entry[] | null> {
    const active = this.active;
    if (active === null) {
      const dir = this.pending.pop();
      if (dir === undefined) return null;
      return andThen(this.openDir(dir, ctx), (lister): Awaitable<Entry[] | null> => {
        this.active = lister;
        return this.next(ctx);
      });
    }

    return andThen(active.next(ctx), (page): Awaitable<Entry[] | null> => {
      if (page === null) {
        this.active = null;
        // Reversed so pop() visits them in listing order.
        this.pending.push(...this.found.reverse());
        this.found = [];
        return andThen(active.close(ctx), () => this.next(ctx));
      }
      for (const entry of page) {
        if (entry.metadata.isDir()) this.found.push(entry.path);
      }
      return page;
    });
  }

  close(ctx: CallContext): Awaitable<void> {
    const active = this.active;
    this.active = null;
    this.pending.length = 0;
    this.found = [];
    return active === null ? undefined : active.close(ctx);
  }
}
