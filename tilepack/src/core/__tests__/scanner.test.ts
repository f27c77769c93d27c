import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync } from 'node:fs';
import { join } from 'node:path';
import { listFiles } from '../scanner.js';
import { createTempDir, removeDir, writeLink, writeTree } from '../../test-utils/tile-tree.js';

// Permission bits do not stop root from reading a directory
const isRoot = process.getuid?.() === 0;

describe('listFiles', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('returns sorted relative paths with forward slashes', () => {
    writeTree(root, {
      '1/1/0.png': 'a',
      '0/0/0.png': 'b',
      'readme.txt': 'c',
      'a/b/c/d.png': 'd',
    });

    expect(listFiles(root)).toEqual({
      files: ['0/0/0.png', '1/1/0.png', 'a/b/c/d.png', 'readme.txt'],
      unreadable: [],
    });
  });

  it('returns nothing for an empty directory', () => {
    expect(listFiles(root)).toEqual({ files: [], unreadable: [] });
  });

  it('lists dangling links but does not follow directory links', () => {
    writeTree(root, { '1/0/0.png': 'a' });
    writeLink(root, 'mirror', '1');
    writeLink(root, '1/0/1.png', 'missing.png');

    expect(listFiles(root).files).toEqual(['1/0/0.png', '1/0/1.png']);
  });

  it('reports a missing root as unreadable', () => {
    const listing = listFiles(join(root, 'nope'));

    expect(listing.files).toEqual([]);
    expect(listing.unreadable).toHaveLength(1);
    expect(listing.unreadable[0].path).toBe('.');
    expect(listing.unreadable[0].message).toContain('ENOENT');
  });

  it.skipIf(isRoot)('skips an unreadable subdirectory and keeps listing', () => {
    writeTree(root, { '0/0/0.png': 'a', '1/0/0.png': 'b', '1/1/0.png': 'c' });
    chmodSync(join(root, '1/1'), 0o000);

    try {
      const listing = listFiles(root);

      expect(listing.files).toEqual(['0/0/0.png', '1/0/0.png']);
      expect(listing.unreadable).toHaveLength(1);
      expect(listing.unreadable[0].path).toBe('1/1');
      expect(listing.unreadable[0].message).toContain('EACCES');
    } finally {
      chmodSync(join(root, '1/1'), 0o755);
    }
  });
});
