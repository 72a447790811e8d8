import type { EmittedTask, Platform } from '../types.js';
import { formatForClaude } from './claude.js';

/** Turns emitted tasks into the text a platform's agent acts on */
export type TaskFormatter = (emitted: readonly EmittedTask[], projectRoot: string) => string;

export const FORMATTERS: Record<Platform, TaskFormatter> = {
  claude: formatForClaude,
};

export { formatForClaude, taskName, taskDescription } from './claude.js';
export { printJsonTasks, toJsonTasks } from './json.js';
export type { JsonTask } from './json.js';
export { printDiscoveryWarnings, printError, formatDiscoveryWarnings } from './terminal.js';
