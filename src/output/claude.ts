import { posix, relative, sep } from 'node:path';
import type { EmittedTask, ReviewTask } from '../types.js';
import { DEFAULT_AGENT } from '../types.js';

/**
 * Format emitted tasks as parallel task invocations for Claude.
 * Each entry names the task, its persona and the instruction file to load.
 */
export function formatForClaude(emitted: readonly EmittedTask[], projectRoot: string): string {
  if (emitted.length === 0) {
    return 'No review tasks to execute.';
  }

  const lines: string[] = ['Invoke the following list of Tasks in parallel:\n'];

  for (const { task, filePath } of emitted) {
    const rel = relative(projectRoot, filePath).split(sep).join('/');

    lines.push(`Name: "${taskName(task)}"`);
    lines.push(`\tDescription: ${taskDescription(task)}`);
    lines.push(`\tAgent: ${task.agentPersona ?? DEFAULT_AGENT}`);
    lines.push(`\tprompt: "@${rel}"`);
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * `rule review of path` or `rule review of N files`, prefixed with the rule's
 * directory when it comes from a nested rules file (`api/rule review of ...`).
 */
export function taskName(task: ReviewTask): string {
  const scope = ruleScope(task);
  const rule = scope ? `${scope}/${task.ruleName}` : task.ruleName;
  const [only] = task.filesToReview;
  if (task.filesToReview.length === 1 && only !== undefined) {
    return `${rule} review of ${only}`;
  }
  return `${rule} review of ${task.filesToReview.length} files`;
}

/** One-line summary shown alongside the task name */
export function taskDescription(task: ReviewTask): string {
  const count = task.filesToReview.length;
  return `Review ${count} ${count === 1 ? 'file' : 'files'} against the "${task.ruleName}" rule`;
}

/** Directory of the defining rules file, '' for the project root */
function ruleScope(task: ReviewTask): string {
  const colon = task.sourceLocation.lastIndexOf(':');
  const file = colon >= 0 ? task.sourceLocation.slice(0, colon) : task.sourceLocation;
  if (!file || posix.isAbsolute(file)) return '';
  const dir = posix.dirname(file);
  return dir === '.' ? '' : dir;
}
