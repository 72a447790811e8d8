import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { ReviewRule, ReviewTask } from '../src/types.js';

/** Temporary project directory populated from a path → content map */
export interface TempProject {
  readonly root: string;
  write(relPath: string, content: string): string;
  cleanup(): void;
}

export function createTempProject(files: Record<string, string> = {}): TempProject {
  const root = mkdtempSync(join(tmpdir(), 'review-gate-'));

  const write = (relPath: string, content: string): string => {
    const fullPath = join(root, relPath);
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
    return fullPath;
  };

  for (const [relPath, content] of Object.entries(files)) {
    write(relPath, content);
  }

  return {
    root,
    write,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export function makeRule(
  overrides: Partial<ReviewRule> & { sourceDir: string },
): ReviewRule {
  return {
    name: 'test-rule',
    description: 'Test rule',
    includePatterns: ['**/*'],
    excludePatterns: [],
    strategy: 'individual',
    instructions: 'Check it.',
    agentPersonas: null,
    includeAllChangedFilenames: false,
    includeUnchangedMatchingFiles: false,
    sourceFile: join(overrides.sourceDir, '.review-rules.yml'),
    sourceLine: 1,
    ...overrides,
  };
}

export function makeTask(overrides: Partial<ReviewTask> = {}): ReviewTask {
  return {
    ruleName: 'test-rule',
    filesToReview: ['src/a.py'],
    instructions: 'Check it.',
    agentPersona: null,
    sourceLocation: '.review-rules.yml:1',
    additionalFiles: [],
    allChangedFilenames: null,
    ...overrides,
  };
}
