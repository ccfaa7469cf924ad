// Content-type guessing from the path extension.
//
// Fills contentType on writes that do not set one (when the service can store
// it) and on file metadata returned by stat and listings.

import type { Accessor, RawLister, RawWriter } from '../raw/accessor.js';
import { andThen, type Awaitable, type CallContext } from '../raw/awaitable.js';
import { LayeredAccessor, type Layer } from '../raw/layer.js';
import { basename } from '../raw/path.js';
import { Entry } from '../types/entry.js';
import type { Metadata } from '../types/metadata.js';
import type { ListOptions, StatOptions, WriteOptions } from '../types/options.js';

const MIME_TYPES: Readonly<Record<string, string>> = {
  txt: 'text/plain',
  md: 'text/markdown',
  csv: 'text/csv',
  html: 'text/html',
  htm: 'text/html',
  css: 'text/css',
  js: 'text/javascript',
  mjs: 'text/javascript',
  json: 'application/json',
  xml: 'application/xml',
  yaml: 'application/yaml',
  yml: 'application/yaml',
  pdf: 'application/pdf',
  zip: 'application/zip',
  gz: 'application/gzip',
  tar: 'application/x-tar',
  wasm: 'application/wasm',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  svg: 'image/svg+xml',
  ico: 'image/x-icon',
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  mp4: 'video/mp4',
  webm: 'video/webm',
};

/** Content type for a path by its extension, or undefined when unknown. */
export function guessMimeType(path: string): string | undefined {
  const name = basename(path);
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) return undefined;
  return MIME_TYPES[name.slice(dot + 1).toLowerCase()];
}

function withGuess(path: string, metadata: Metadata): Metadata {
  if (!metadata.isFile() || metadata.contentType !== undefined) return metadata;
  const contentType = guessMimeType(path);
  return contentType === undefined ? metadata : metadata.with({ contentType });
}

class MimeGuessAccessor extends LayeredAccessor {
  override write(path: string, options: WriteOptions, ctx: CallContext): Awaitable<RawWriter> {
    if (
      options.contentType !== undefined ||
      !this.inner.info().capability.supports('writeWithContentType')
    ) {
      return super.write(path, options, ctx);
    }
    const contentType = guessMimeType(path);
    return super.write(path, contentType === undefined ? options : { ...options, contentType }, ctx);
  }

  override stat(path: string, options: StatOptions, ctx: CallContext): Awaitable<Metadata> {
    return andThen(super.stat(path, options, ctx), (metadata) => withGuess(path, metadata));
  }

  override list(path: string, options: ListOptions, ctx: CallContext): Awaitable<RawLister> {
    return andThen(super.list(path, options, ctx), (lister) => ({
      next: (nextCtx: CallContext) =>
        andThen(lister.next(nextCtx), (page) =>
          page === null
            ? null
            : page.map((entry) => {
                const metadata = withGuess(entry.path, entry.metadata);
                return metadata === entry.metadata ? entry : new Entry(entry.path, metadata);
              })
        ),
      close: (closeCtx: CallContext) => lister.close(closeCtx),
    }));
  }
}

export class MimeGuessLayer implements Layer {
  readonly name = 'mimeGuess';

  wrap(inner: Accessor): Accessor {
    return new MimeGuessAccessor(inner);
  }
}
