import { readdirSync, statSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { STATE_DIRNAME } from '../types.js';

/** Directories never descended into */
const SKIP_DIRS = new Set([
  '.git',
  'node_modules',
  '__pycache__',
  '.venv',
  'venv',
  '.tox',
  '.mypy_cache',
  '.pytest_cache',
  '.ruff_cache',
  '.eggs',
  STATE_DIRNAME,
]);

const SKIP_SUFFIXES = ['.egg-info'];

export function isSkippedDir(name: string): boolean {
  return SKIP_DIRS.has(name) || SKIP_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

/**
 * Recursively list files under `root`, in sorted order, skipping
 * dependency/cache directories. Symlinked files are followed; symlinked
 * directories are not. Unreadable directories are skipped.
 *
 * @param root - Directory to walk
 * @param accept - Optional filter on the file's base name
 * @returns Absolute file paths
 */
export function walkFiles(root: string, accept?: (name: string) => boolean): string[] {
  const results: string[] = [];
  walkInto(root, accept, results);
  return results;
}

function walkInto(dir: string, accept: ((name: string) => boolean) | undefined, out: string[]): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch {
    // Permission denied or removed mid-walk
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (!isSkippedDir(entry.name)) {
        walkInto(fullPath, accept, out);
      }
      continue;
    }

    if (!isFileEntry(entry.isFile(), entry.isSymbolicLink(), fullPath)) continue;
    if (accept && !accept(entry.name)) continue;
    out.push(fullPath);
  }
}

function isFileEntry(isFile: boolean, isSymlink: boolean, fullPath: string): boolean {
  if (isFile) return true;
  if (!isSymlink) return false;
  try {
    return statSync(fullPath).isFile();
  } catch {
    // Dangling symlink
    return false;
  }
}
