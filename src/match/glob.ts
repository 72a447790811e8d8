import { minimatch } from 'minimatch';

/**
 * Match a `/`-separated path against a glob.
 * `*` and `?` stay within one path segment; `**` spans zero or more segments.
 * Dotfiles are matched like any other file. A leading `!` or `#` is literal.
 */
export function globMatch(path: string, pattern: string): boolean {
  return minimatch(path, pattern, { dot: true, nonegate: true, nocomment: true });
}

/**
 * Whether a path satisfies at least one include pattern and no exclude pattern.
 */
export function matchesPatterns(
  path: string,
  includePatterns: readonly string[],
  excludePatterns: readonly string[],
): boolean {
  if (!includePatterns.some((pattern) => globMatch(path, pattern))) return false;
  return !excludePatterns.some((pattern) => globMatch(path, pattern));
}

/**
 * Path of `filePath` relative to `dirPath`, both relative to the same root.
 * Returns null when the file is not under the directory.
 */
export function relativeToDir(filePath: string, dirPath: string): string | null {
  if (dirPath === '' || dirPath === '.') return filePath;

  const prefix = dirPath.endsWith('/') ? dirPath : `${dirPath}/`;
  return filePath.startsWith(prefix) ? filePath.slice(prefix.length) : null;
}
