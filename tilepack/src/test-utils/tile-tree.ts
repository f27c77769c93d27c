/**
 * Helpers for building throwaway tile trees in tests.
 */
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export function createTempDir(prefix = 'tilepack-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write files below root. String contents are written as UTF-8.
 */
export function writeTree(root: string, files: Record<string, string | Buffer>): void {
  for (const [relPath, contents] of Object.entries(files)) {
    const path = join(root, relPath);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, contents);
  }
}

/**
 * Create a symlink at relPath pointing at target (which need not exist).
 */
export function writeLink(root: string, relPath: string, target: string): void {
  const path = join(root, relPath);
  mkdirSync(dirname(path), { recursive: true });
  symlinkSync(target, path);
}

/** Contents used for a tile so each file is distinguishable */
export function tileBytes(relPath: string): string {
  return `tile ${relPath}`;
}

export const WORLD_PYRAMID = ['0/0/0.png', '1/0/0.png', '1/0/1.png', '1/1/0.png', '1/1/1.png'];
