import type { ReviewTask } from '../types.js';

/** Name of the operation the reviewing agent calls after a clean review */
export const MARK_PASSED_TOOL = 'mark_review_as_passed';

/**
 * Build the markdown instruction file for one review task.
 *
 * Files to review and unchanged matching files are `@`-prefixed so the
 * consuming agent loads them; the changeset list is informational only.
 */
export function buildInstructionFile(task: ReviewTask, reviewId: string = ''): string {
  const parts: string[] = [];

  parts.push(`# Review: ${task.ruleName} — ${describeScope(task)}\n`);

  parts.push('## Review Instructions\n');
  parts.push(task.instructions.trim());
  parts.push('');

  parts.push('## Files to Review\n');
  for (const file of task.filesToReview) {
    parts.push(`- @${file}`);
  }
  parts.push('');

  if (task.additionalFiles.length > 0) {
    parts.push('## Unchanged Matching Files\n');
    parts.push(
      'These files match the review patterns but were not changed. ' +
        'They are provided for context.\n',
    );
    for (const file of task.additionalFiles) {
      parts.push(`- @${file}`);
    }
    parts.push('');
  }

  if (task.allChangedFilenames && task.allChangedFilenames.length > 0) {
    parts.push('## All Changed Files\n');
    parts.push(
      'The following files were changed in this changeset ' +
        '(listed for context, not all are subject to this review).\n',
    );
    for (const file of task.allChangedFilenames) {
      parts.push(`- ${file}`);
    }
    parts.push('');
  }

  if (reviewId) {
    parts.push('## After Review\n');
    parts.push(
      `If this review passes with no findings, call the \`${MARK_PASSED_TOOL}\` tool ` +
        `(or run \`review-gate mark-passed ${reviewId}\`) with:\n`,
    );
    parts.push(`- \`review_id\`: \`"${reviewId}"\``);
    parts.push('');
  }

  if (task.sourceLocation) {
    parts.push('---\n');
    parts.push(`This review was requested by the rule at \`${task.sourceLocation}\`.`);
    parts.push('');
  }

  return parts.join('\n');
}

/** The single file under review, or `N files` */
export function describeScope(task: ReviewTask): string {
  const [only] = task.filesToReview;
  if (task.filesToReview.length === 1 && only !== undefined) return only;
  return `${task.filesToReview.length} files`;
}
