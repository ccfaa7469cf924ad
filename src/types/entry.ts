import type { Metadata } from './metadata.js';
import { basename } from '../raw/path.js';

/** Unit yielded by a listing: a normalized path relative to the root plus its metadata. */
export class Entry {
  constructor(
    readonly path: string,
    readonly metadata: Metadata
  ) {
    Object.freeze(this);
  }

  get name(): string {
    return basename(this.path);
  }
}
