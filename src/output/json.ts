import { relative, sep } from 'node:path';
import type { EmittedTask } from '../types.js';
import { DEFAULT_AGENT } from '../types.js';

/** JSON shape of one emitted task */
export interface JsonTask {
  readonly reviewId: string;
  readonly rule: string;
  readonly files: readonly string[];
  readonly agent: string;
  readonly instructionFile: string;
  readonly source: string;
}

export function toJsonTasks(emitted: readonly EmittedTask[], projectRoot: string): JsonTask[] {
  return emitted.map(({ task, reviewId, filePath }) => ({
    reviewId,
    rule: task.ruleName,
    files: task.filesToReview,
    agent: task.agentPersona ?? DEFAULT_AGENT,
    instructionFile: relative(projectRoot, filePath).split(sep).join('/'),
    source: task.sourceLocation,
  }));
}

/**
 * Print the emitted tasks as JSON to stdout.
 */
export function printJsonTasks(emitted: readonly EmittedTask[], projectRoot: string): void {
  console.log(JSON.stringify(toJsonTasks(emitted, projectRoot), null, 2));
}
