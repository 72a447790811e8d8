import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { formatForClaude, taskDescription, taskName } from '../src/output/claude.js';
import { toJsonTasks } from '../src/output/json.js';
import { formatDiscoveryWarnings } from '../src/output/terminal.js';
import type { EmittedTask } from '../src/types.js';
import { makeTask } from './helpers.js';

const ROOT = '/repo';

function emitted(reviewId: string, overrides: Parameters<typeof makeTask>[0] = {}): EmittedTask {
  return {
    task: makeTask(overrides),
    reviewId,
    filePath: join(ROOT, '.review-gate/instructions', `${reviewId}.md`),
  };
}

describe('formatForClaude', () => {
  it('reports when there is nothing to run', () => {
    expect(formatForClaude([], ROOT)).toBe('No review tasks to execute.');
  });

  it('lists each task with persona and instruction file', () => {
    const output = formatForClaude(
      [
        emitted('r1', {
          filesToReview: ['services/api/x.py'],
          sourceLocation: 'services/api/.review-rules.yml:5',
        }),
        emitted('r2', {
          ruleName: 'docs',
          filesToReview: ['a.md', 'b.md'],
          agentPersona: 'tech-writer',
        }),
      ],
      ROOT,
    );

    expect(output).toBe(
      [
        'Invoke the following list of Tasks in parallel:\n',
        'Name: "services/api/test-rule review of services/api/x.py"',
        '\tDescription: Review 1 file against the "test-rule" rule',
        '\tAgent: general-purpose',
        '\tprompt: "@.review-gate/instructions/r1.md"',
        '',
        'Name: "docs review of 2 files"',
        '\tDescription: Review 2 files against the "docs" rule',
        '\tAgent: tech-writer',
        '\tprompt: "@.review-gate/instructions/r2.md"',
        '',
      ].join('\n'),
    );
  });
});

describe('taskName', () => {
  it('leaves root rules unprefixed', () => {
    expect(taskName(makeTask({ sourceLocation: '.review-rules.yml:3' }))).toBe(
      'test-rule review of src/a.py',
    );
  });

  it('leaves rules from outside the root unprefixed', () => {
    expect(taskName(makeTask({ sourceLocation: '/other/.review-rules.yml:3' }))).toBe(
      'test-rule review of src/a.py',
    );
  });
});

describe('taskDescription', () => {
  it('counts files', () => {
    expect(taskDescription(makeTask({ filesToReview: ['a', 'b', 'c'] }))).toBe(
      'Review 3 files against the "test-rule" rule',
    );
  });
});

describe('toJsonTasks', () => {
  it('maps emitted tasks to their JSON shape', () => {
    expect(toJsonTasks([emitted('r1')], ROOT)).toEqual([
      {
        reviewId: 'r1',
        rule: 'test-rule',
        files: ['src/a.py'],
        agent: 'general-purpose',
        instructionFile: '.review-gate/instructions/r1.md',
        source: '.review-rules.yml:1',
      },
    ]);
  });
});

describe('formatDiscoveryWarnings', () => {
  it('renders one bullet per error', () => {
    expect(
      formatDiscoveryWarnings([
        { filePath: 'a/.review-rules.yml', error: 'bad' },
        { filePath: 'b/.review-rules.yml', error: 'worse' },
      ]),
    ).toBe('  - a/.review-rules.yml: bad\n  - b/.review-rules.yml: worse');
  });
});
