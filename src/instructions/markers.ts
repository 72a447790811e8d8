import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { ReviewIdError } from '../errors.js';

const PATH_SEPARATOR_RE = /[\\/]/;

/** Extension of pass marker files */
export const PASSED_MARKER_EXT = '.passed';

/**
 * Zero-byte `{reviewId}.passed` files recording completed reviews.
 * Markers are only ever created, never rewritten or removed here.
 */
export class MarkerStore {
  constructor(readonly dir: string) {}

  markerPath(reviewId: string): string {
    return join(this.dir, `${reviewId}${PASSED_MARKER_EXT}`);
  }

  isPassed(reviewId: string): boolean {
    return existsSync(this.markerPath(reviewId));
  }

  /**
   * Record a review as passed.
   *
   * @returns Confirmation echoing the id
   * @throws {ReviewIdError} For an empty id or one that could escape the marker directory
   */
  markPassed(reviewId: string): string {
    validateReviewId(reviewId);

    mkdirSync(this.dir, { recursive: true });
    writeFileSync(this.markerPath(reviewId), '');

    return `Review '${reviewId}' marked as passed.`;
  }
}

/**
 * Reject empty ids and ids with a path separator. `..` inside a name is allowed:
 * without separators the marker always lands in the marker directory.
 */
export function validateReviewId(reviewId: string): void {
  if (!reviewId.trim()) {
    throw new ReviewIdError('review_id must not be empty.');
  }
  if (PATH_SEPARATOR_RE.test(reviewId) || isAbsolute(reviewId)) {
    throw new ReviewIdError('review_id must not contain path traversal sequences.');
  }
}
