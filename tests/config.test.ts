import { describe, it, expect, afterEach } from 'vitest';
import { join, resolve } from 'node:path';
import {
  parsePlatform,
  resolveConfig,
  resolveInputMode,
  resolveInstructionsDir,
  resolveProjectRoot,
} from '../src/config.js';
import { createTempProject, type TempProject } from './helpers.js';

describe('resolveConfig', () => {
  afterEach(() => {
    delete process.env['REVIEW_GATE_PATH'];
    delete process.env['REVIEW_GATE_BASE_REF'];
    delete process.env['REVIEW_GATE_INSTRUCTIONS_DIR'];
  });

  it('returns defaults when only the platform is given', () => {
    const config = resolveConfig({ instructionsFor: 'claude' });
    expect(config).toEqual({
      projectRoot: process.cwd(),
      platform: 'claude',
      baseRef: undefined,
      instructionsDir: resolve(process.cwd(), '.review-gate/instructions'),
      jsonOutput: false,
      verbose: false,
    });
  });

  it('requires a platform', () => {
    expect(() => resolveConfig({})).toThrow('No target platform specified. Available: claude');
  });

  it('rejects an unknown platform', () => {
    expect(() => resolveConfig({ instructionsFor: 'vim' })).toThrow(
      "Unsupported platform: 'vim'. Supported platforms: claude",
    );
  });

  it('uses env for the base ref when no arg', () => {
    process.env['REVIEW_GATE_BASE_REF'] = 'origin/develop';
    expect(resolveConfig({ instructionsFor: 'claude' }).baseRef).toBe('origin/develop');
  });

  it('args override env for the base ref', () => {
    process.env['REVIEW_GATE_BASE_REF'] = 'origin/develop';
    expect(resolveConfig({ instructionsFor: 'claude', baseRef: 'main' }).baseRef).toBe('main');
  });

  it('ignores blank env values', () => {
    process.env['REVIEW_GATE_BASE_REF'] = '  ';
    expect(resolveConfig({ instructionsFor: 'claude' }).baseRef).toBeUndefined();
  });

  it('sets json and verbose flags', () => {
    const config = resolveConfig({ instructionsFor: 'claude', json: true, verbose: true });
    expect(config.jsonOutput).toBe(true);
    expect(config.verbose).toBe(true);
  });

  it('resolves a relative instructions dir from env against the root', () => {
    process.env['REVIEW_GATE_INSTRUCTIONS_DIR'] = 'tmp/reviews';
    expect(resolveInstructionsDir('/srv/app')).toBe('/srv/app/tmp/reviews');
  });

  it('keeps an absolute instructions dir from env', () => {
    process.env['REVIEW_GATE_INSTRUCTIONS_DIR'] = '/var/reviews';
    expect(resolveInstructionsDir('/srv/app')).toBe('/var/reviews');
  });
});

describe('parsePlatform', () => {
  it('is case-insensitive', () => {
    expect(parsePlatform(' Claude ')).toBe('claude');
  });

  it('returns null for unknown names', () => {
    expect(parsePlatform('vim')).toBeNull();
  });
});

describe('resolveInputMode', () => {
  it('returns files mode when files are given', () => {
    const mode = resolveInputMode({ files: ['a.py'] }, true);
    expect(mode).toEqual({ type: 'files', files: ['a.py'] });
  });

  it('prefers files over stdin', () => {
    const mode = resolveInputMode({ files: ['a.py'] }, false);
    expect(mode.type).toBe('files');
  });

  it('returns stdin mode when stdin is piped', () => {
    const mode = resolveInputMode({ files: [], baseRef: 'main' }, false);
    expect(mode).toEqual({ type: 'stdin', baseRef: 'main' });
  });

  it('returns git mode on a TTY', () => {
    const mode = resolveInputMode({ baseRef: 'main' }, true);
    expect(mode).toEqual({ type: 'git', baseRef: 'main' });
  });
});

describe('resolveProjectRoot', () => {
  let project: TempProject;

  afterEach(() => {
    delete process.env['REVIEW_GATE_PATH'];
    project.cleanup();
  });

  it('uses --path as the project root', () => {
    project = createTempProject({ 'app/main.py': '' });
    const appDir = join(project.root, 'app');

    const config = resolveConfig({ instructionsFor: 'claude', path: appDir });

    expect(config.projectRoot).toBe(appDir);
    expect(config.instructionsDir).toBe(join(appDir, '.review-gate/instructions'));
  });

  it('uses env for the project root when no arg', () => {
    project = createTempProject();
    process.env['REVIEW_GATE_PATH'] = project.root;
    expect(resolveProjectRoot()).toBe(project.root);
  });

  it('args override env for the project root', () => {
    project = createTempProject({ 'other/x.md': '' });
    process.env['REVIEW_GATE_PATH'] = project.root;
    expect(resolveProjectRoot(join(project.root, 'other'))).toBe(join(project.root, 'other'));
  });

  it('rejects a path that does not exist', () => {
    project = createTempProject();
    const missing = join(project.root, 'missing');
    expect(() => resolveProjectRoot(missing)).toThrow(`Project root is not a directory: ${missing}`);
  });

  it('rejects a path that is a file', () => {
    project = createTempProject({ 'file.txt': 'x' });
    expect(() => resolveProjectRoot(join(project.root, 'file.txt'))).toThrow(
      'Project root is not a directory',
    );
  });
});
