export type EntryKind = 'file' | 'dir' | 'unknown';

export interface MetadataInit {
  kind: EntryKind;
  contentLength?: number;
  lastModified?: Date;
  etag?: string;
  contentType?: string;
  contentMd5?: string;
  cacheControl?: string;
  contentDisposition?: string;
  version?: string;
  userMetadata?: Record<string, string>;
}

/**
 * Immutable description of a stored entry.
 * Returned by stat, write and listings; never a handle on backend state.
 */
export class Metadata {
  readonly kind: EntryKind;
  readonly contentLength: number | undefined;
  readonly etag: string | undefined;
  readonly contentType: string | undefined;
  readonly contentMd5: string | undefined;
  readonly cacheControl: string | undefined;
  readonly contentDisposition: string | undefined;
  readonly version: string | undefined;
  readonly userMetadata: Readonly<Record<string, string>>;
  private readonly lastModifiedMs: number | undefined;

  constructor(init: MetadataInit) {
    this.kind = init.kind;
    this.contentLength = init.contentLength;
    this.lastModifiedMs = init.lastModified?.getTime();
    this.etag = init.etag;
    this.contentType = init.contentType;
    this.contentMd5 = init.contentMd5;
    this.cacheControl = init.cacheControl;
    this.contentDisposition = init.contentDisposition;
    this.version = init.version;
    this.userMetadata = Object.freeze({ ...init.userMetadata });
    Object.freeze(this);
  }

  static file(init: Omit<MetadataInit, 'kind'> = {}): Metadata {
    return new Metadata({ ...init, kind: 'file' });
  }

  static dir(init: Omit<MetadataInit, 'kind' | 'contentLength'> = {}): Metadata {
    return new Metadata({ ...init, kind: 'dir' });
  }

  /** A fresh Date on every access so callers cannot mutate the stored value. */
  get lastModified(): Date | undefined {
    return this.lastModifiedMs === undefined ? undefined : new Date(this.lastModifiedMs);
  }

  isFile(): boolean {
    return this.kind === 'file';
  }

  isDir(): boolean {
    return this.kind === 'dir';
  }

  with(patch: Partial<MetadataInit>): Metadata {
    return new Metadata({ ...this.toInit(), ...patch });
  }

  toInit(): MetadataInit {
    return {
      kind: this.kind,
      contentLength: this.contentLength,
      lastModified: this.lastModified,
      etag: this.etag,
      contentType: this.contentType,
      contentMd5: this.contentMd5,
      cacheControl: this.cacheControl,
      contentDisposition: this.contentDisposition,
      version: this.version,
      userMetadata: { ...this.userMetadata },
    };
  }
}
