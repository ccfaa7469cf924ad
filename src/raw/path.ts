// Path normalization shared by the operator and the services.
//
// Paths are relative to the operator root. Directories end in "/", the root
// itself is "/". Traversal above the root is rejected.

import { ErrorKind, storageError } from '../errors/index.js';

export function normalizePath(input: string): string {
  if (input.includes('\0')) {
    throw storageError(ErrorKind.InvalidInput, 'path must not contain NUL characters', {
      context: { path: input },
    });
  }

  const isDir = input === '' || input.endsWith('/');
  const segments: string[] = [];
  for (const segment of input.split('/')) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      if (segments.length === 0) {
        throw storageError(ErrorKind.InvalidInput, `path escapes the root: ${input}`, {
          context: { path: input },
        });
      }
      segments.pop();
      continue;
    }
    segments.push(segment);
  }

  if (segments.length === 0) return '/';
  const joined = segments.join('/');
  return isDir ? `${joined}/` : joined;
}

/** Normalize a configured root into "/abs/dir/" form. */
export function normalizeRoot(root: string | undefined): string {
  const normalized = normalizePath(root ?? '/');
  if (normalized === '/') return '/';
  return `/${normalized.endsWith('/') ? normalized : `${normalized}/`}`;
}

export function isDirPath(path: string): boolean {
  return path.endsWith('/');
}

/** Absolute backend path for a normalized relative path. */
export function absolutePath(root: string, path: string): string {
  return path === '/' ? root : `${root}${path}`;
}

/** Relative path for an absolute backend path under `root`. */
export function relativePath(root: string, absolute: string): string {
  if (!absolute.startsWith(root)) {
    throw storageError(ErrorKind.Unexpected, `path ${absolute} is outside root ${root}`, {
      context: { path: absolute },
    });
  }
  const rest = absolute.slice(root.length);
  return rest === '' ? '/' : rest;
}

/** Parent directory of a normalized path; the parent of a top-level entry is "/". */
export function parentPath(path: string): string {
  if (path === '/') return '/';
  const trimmed = path.endsWith('/') ? path.slice(0, -1) : path;
  const index = trimmed.lastIndexOf('/');
  return index === -1 ? '/' : trimmed.slice(0, index + 1);
}

/** Last path segment, keeping the trailing slash of directories. */
export function basename(path: string): string {
  if (path === '/') return '/';
  const trimmed = path.endsWith('/') ? path.slice(0, -1) : path;
  const name = trimmed.slice(trimmed.lastIndexOf('/') + 1);
  return path.endsWith('/') ? `${name}/` : name;
}

/** Number of segments; used to order deletions deepest-first. */
export function depth(path: string): number {
  return path === '/' ? 0 : path.split('/').filter(Boolean).length;
}
