import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ReviewIdError, ReviewToolError } from '../src/errors.js';
import { ALL_PASSED_MESSAGE } from '../src/review/pipeline.js';
import { getConfiguredReviews, markReviewAsPassed, runReview } from '../src/tools.js';
import { createTempProject, type TempProject } from './helpers.js';

function rule(name: string, description: string, include: string): string {
  return [
    `${name}:`,
    `  description: ${description}`,
    `  match: { include: ["${include}"] }`,
    '  review: { strategy: individual, instructions: Review it. }',
    '',
  ].join('\n');
}

describe('getConfiguredReviews', () => {
  let project: TempProject;

  afterEach(() => {
    project.cleanup();
  });

  it('lists every rule with its defining file', () => {
    project = createTempProject({
      '.review-rules.yml': rule('docs', 'Docs review', '**/*.md'),
      'api/.review-rules.yml': rule('api', 'API review', '*.py'),
    });

    expect(getConfiguredReviews(project.root)).toEqual([
      { name: 'api', description: 'API review', definingFile: 'api/.review-rules.yml:1' },
      { name: 'docs', description: 'Docs review', definingFile: '.review-rules.yml:1' },
    ]);
  });

  it('filters to rules matching the given files', () => {
    project = createTempProject({
      '.review-rules.yml': rule('docs', 'Docs review', '**/*.md'),
      'api/.review-rules.yml': rule('api', 'API review', '*.py'),
    });

    const reviews = getConfiguredReviews(project.root, ['api/handler.py']);

    expect(reviews.map((r) => r.name)).toEqual(['api']);
  });

  it('lists files that failed to load as PARSE_ERROR entries', () => {
    project = createTempProject({
      '.review-rules.yml': rule('docs', 'Docs review', '**/*.md'),
      'bad/.review-rules.yml': 'rule: [unclosed\n',
    });
    const badFile = join(project.root, 'bad/.review-rules.yml');

    const reviews = getConfiguredReviews(project.root);

    expect(reviews).toHaveLength(2);
    expect(reviews[1]).toMatchObject({ name: `PARSE_ERROR:${badFile}`, definingFile: badFile });
    expect(reviews[1]?.description).toContain('Failed to parse');
  });
});

describe('markReviewAsPassed', () => {
  let project: TempProject;

  afterEach(() => {
    project.cleanup();
  });

  it('writes the marker in the default instructions directory', () => {
    project = createTempProject();

    expect(markReviewAsPassed(project.root, 'docs--a.md--abc')).toBe(
      "Review 'docs--a.md--abc' marked as passed.",
    );
    expect(
      existsSync(join(project.root, '.review-gate/instructions/docs--a.md--abc.passed')),
    ).toBe(true);
  });

  it('rejects path traversal', () => {
    project = createTempProject();
    expect(() => markReviewAsPassed(project.root, '../escape')).toThrow(ReviewIdError);
  });
});

describe('runReview', () => {
  let project: TempProject;

  afterEach(() => {
    project.cleanup();
  });

  it('returns the formatted task list for explicit files', () => {
    project = createTempProject({
      '.review-rules.yml': rule('docs', 'Docs review', '**/*.md'),
      'README.md': '# Hello\n',
    });

    const output = runReview(project.root, 'claude', ['README.md']);

    expect(output.startsWith('Invoke the following list of Tasks in parallel:\n')).toBe(true);
    expect(output).toContain('Name: "docs review of README.md"');
  });

  it('reports that everything passed once the marker exists', () => {
    project = createTempProject({
      '.review-rules.yml': rule('docs', 'Docs review', '**/*.md'),
      'README.md': '# Hello\n',
    });
    const first = runReview(project.root, 'claude', ['README.md']);
    const reviewId = /instructions\/(.+)\.md"/.exec(first)?.[1];
    if (reviewId === undefined) throw new Error('no instruction file in output');

    markReviewAsPassed(project.root, reviewId);

    expect(runReview(project.root, 'claude', ['README.md'])).toBe(ALL_PASSED_MESSAGE);
  });

  it('prepends parse warnings', () => {
    project = createTempProject({
      '.review-rules.yml': rule('docs', 'Docs review', '**/*.md'),
      'bad/.review-rules.yml': 'rule: [unclosed\n',
      'README.md': '# Hello\n',
    });
    const badFile = join(project.root, 'bad/.review-rules.yml');

    const output = runReview(project.root, 'claude', ['README.md']);

    expect(
      output.startsWith(
        `Warning: Some .review-rules.yml files could not be parsed:\n  - ${badFile}: Failed to parse`,
      ),
    ).toBe(true);
    expect(output).toContain('\n\nInvoke the following list of Tasks in parallel:\n');
  });

  it('lists parse errors when no rule could be loaded', () => {
    project = createTempProject({ '.review-rules.yml': 'rule: [unclosed\n' });

    const output = runReview(project.root, 'claude', ['README.md']);

    expect(output.startsWith('No valid .review-rules.yml rules found. Parse errors:\n  - ')).toBe(
      true,
    );
  });

  it('rejects an unsupported platform', () => {
    project = createTempProject();
    expect(() => runReview(project.root, 'vim', [])).toThrow(ReviewToolError);
  });
});
