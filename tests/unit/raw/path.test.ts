import { describe, it, expect } from 'vitest';

import { isErrorKind } from '@/errors/index.js';
import {
  absolutePath,
  basename,
  depth,
  normalizePath,
  normalizeRoot,
  parentPath,
  relativePath,
} from '@/raw/path.js';

describe('normalizePath', () => {
  it('should strip leading slashes and collapse separators', () => {
    expect(normalizePath('/a.txt')).toBe('a.txt');
    expect(normalizePath('a//b///c.txt')).toBe('a/b/c.txt');
    expect(normalizePath('./a/./b')).toBe('a/b');
  });

  it('should keep the trailing slash of directories', () => {
    expect(normalizePath('/dir/sub/')).toBe('dir/sub/');
    expect(normalizePath('dir//')).toBe('dir/');
  });

  it('should map empty and slash-only paths to the root', () => {
    expect(normalizePath('')).toBe('/');
    expect(normalizePath('/')).toBe('/');
    expect(normalizePath('///')).toBe('/');
  });

  it('should resolve ".." inside the root', () => {
    expect(normalizePath('a/b/../c')).toBe('a/c');
    expect(normalizePath('a/..')).toBe('/');
  });

  it('should reject traversal above the root', () => {
    try {
      normalizePath('../etc/passwd');
      expect.fail('Expected error to be thrown');
    } catch (error) {
      expect(isErrorKind(error, 'InvalidInput')).toBe(true);
    }
  });

  it('should reject NUL characters', () => {
    expect(() => normalizePath('a\0b')).toThrow('path must not contain NUL characters');
  });
});

describe('root and path helpers', () => {
  it('should normalize roots into absolute directory form', () => {
    expect(normalizeRoot(undefined)).toBe('/');
    expect(normalizeRoot('data')).toBe('/data/');
    expect(normalizeRoot('/data/files/')).toBe('/data/files/');
  });

  it('should join and split paths against a root', () => {
    expect(absolutePath('/data/', 'a/b.txt')).toBe('/data/a/b.txt');
    expect(absolutePath('/data/', '/')).toBe('/data/');
    expect(relativePath('/data/', '/data/a/b.txt')).toBe('a/b.txt');
    expect(relativePath('/data/', '/data/')).toBe('/');
  });

  it('should reject absolute paths outside the root', () => {
    expect(() => relativePath('/data/', '/other/x')).toThrow('path /other/x is outside root /data/');
  });

  it('should compute parents, basenames and depth', () => {
    expect(parentPath('/a/b.txt')).toBe('/a/');
    expect(parentPath('/a/')).toBe('/');
    expect(parentPath('a.txt')).toBe('/');
    expect(basename('dir/sub/')).toBe('sub/');
    expect(basename('dir/file.txt')).toBe('file.txt');
    expect(depth('/')).toBe(0);
    expect(depth('a/b/c/')).toBe(3);
  });
});
