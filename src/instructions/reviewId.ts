import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ReviewTask } from '../types.js';

/** Longest joined path component before falling back to `{N}_files` */
export const MAX_PATHS_COMPONENT_LENGTH = 100;

/** Hex characters kept from the content digest */
export const CONTENT_HASH_LENGTH = 12;

/** Stands in for the content of a file that cannot be read */
export const MISSING_CONTENT = 'MISSING';

const UNSAFE_CHARS_RE = /[^a-zA-Z0-9\-_.]/g;

/**
 * Deterministic id of a review task: `{rule}--{paths}--{contentHash}`.
 *
 * Same rule name, same files and same file contents always give the same id,
 * so the id can key a pass marker.
 */
export function computeReviewId(task: ReviewTask, projectRoot: string): string {
  const rulePart = sanitizeForId(task.ruleName);
  const pathsPart = pathsComponent(task.filesToReview);
  const hashPart = contentHash(task.filesToReview, projectRoot);
  return `${rulePart}--${pathsPart}--${hashPart}`;
}

/** Replace every character outside `[A-Za-z0-9._-]` with `-` */
export function sanitizeForId(name: string): string {
  return name.replace(UNSAFE_CHARS_RE, '-');
}

/**
 * Paths with `/` replaced by `-`, sorted and joined with `_AND_`;
 * `{N}_files` when that exceeds the length limit.
 */
export function pathsComponent(files: readonly string[]): string {
  const joined = files
    .map((f) => f.replaceAll('/', '-'))
    .sort()
    .join('_AND_');
  return joined.length > MAX_PATHS_COMPONENT_LENGTH ? `${files.length}_files` : joined;
}

/**
 * First 12 hex characters of the SHA-256 of the files' raw bytes,
 * concatenated in sorted path order.
 */
export function contentHash(files: readonly string[], projectRoot: string): string {
  const hash = createHash('sha256');
  for (const file of [...files].sort()) {
    hash.update(readContent(resolve(projectRoot, file)));
  }
  return hash.digest('hex').slice(0, CONTENT_HASH_LENGTH);
}

function readContent(path: string): Buffer | string {
  try {
    return readFileSync(path);
  } catch {
    return MISSING_CONTENT;
  }
}
