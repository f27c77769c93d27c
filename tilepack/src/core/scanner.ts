/**
 * Recursive directory listing for tile trees.
 */
import { readdirSync, statSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { describeError } from './errors.js';

export interface UnreadableDir {
  /** Path relative to the listed root, `.` for the root itself */
  path: string;
  message: string;
}

export interface FileListing {
  files: string[];
  unreadable: UnreadableDir[];
}

/**
 * Whether a symlink points at a directory. Dangling links count as files so
 * that the import reports them as unreadable.
 */
function isDirectoryLink(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * List every file below root as a `/`-separated path relative to root,
 * sorted. Symbolic links to directories are not followed. Directories that
 * cannot be read are returned in `unreadable` and their contents skipped.
 */
export function listFiles(root: string): FileListing {
  const files: string[] = [];
  const unreadable: UnreadableDir[] = [];
  const pending: string[] = [''];

  while (pending.length > 0) {
    const relDir = pending.pop() ?? '';
    let entries: Dirent[];
    try {
      entries = readdirSync(join(root, relDir), { withFileTypes: true });
    } catch (err) {
      unreadable.push({ path: relDir || '.', message: describeError(err) });
      continue;
    }

    for (const entry of entries) {
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        pending.push(relPath);
      } else if (entry.isSymbolicLink()) {
        if (!isDirectoryLink(join(root, relPath))) files.push(relPath);
      } else if (entry.isFile()) {
        files.push(relPath);
      }
    }
  }

  unreadable.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return { files: files.sort(), unreadable };
}
