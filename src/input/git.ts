import { execFileSync } from 'node:child_process';
import { GitDiffError, errorMessage } from '../errors.js';

/** Options for listing changed file names */
export interface DiffNamesOptions {
  /** Commit to diff the working tree against; omitted means the index */
  readonly base?: string;
  /** Compare the index against HEAD (`--cached`) */
  readonly staged?: boolean;
}

/**
 * The git operations change detection needs.
 * Every method runs against one repository root and never touches a remote.
 */
export interface GitClient {
  /** Added/copied/modified/renamed paths, relative to the root */
  diffNames(options?: DiffNamesOptions): string[];
  /** Common ancestor of HEAD and `ref` */
  mergeBase(ref: string): string;
  /** Target of a symbolic ref, or null if it is not set */
  symbolicRef(name: string): string | null;
  /** Whether `ref` resolves to a commit */
  verifyRef(ref: string): boolean;
  /** Untracked files not ignored by .gitignore, relative to the root */
  lsFilesOthers(): string[];
}

/**
 * Create a GitClient that shells out to `git` with `cwd` set to the root.
 */
export function createGitClient(repoRoot: string): GitClient {
  const run = (args: readonly string[]): string => runGit(repoRoot, args);

  return {
    diffNames(options: DiffNamesOptions = {}): string[] {
      const args = ['diff', '--name-only', '-z', '--diff-filter=ACMR', '--relative'];
      if (options.staged) args.push('--cached');
      if (options.base != null) args.push(options.base);
      args.push('--');
      return splitNul(run(args));
    },

    mergeBase(ref: string): string {
      try {
        return run(['merge-base', 'HEAD', ref]).trim();
      } catch (err) {
        if (err instanceof GitDiffError) {
          throw new GitDiffError(
            `Failed to find merge-base with '${ref}': ${err.stderr ?? err.message}`,
            err.command,
            err.stderr,
          );
        }
        throw err;
      }
    },

    symbolicRef(name: string): string | null {
      try {
        const target = run(['symbolic-ref', '--quiet', name]).trim();
        return target || null;
      } catch (err) {
        if (err instanceof GitDiffError) return null;
        throw err;
      }
    },

    verifyRef(ref: string): boolean {
      try {
        run(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
        return true;
      } catch (err) {
        if (err instanceof GitDiffError) return false;
        throw err;
      }
    },

    lsFilesOthers(): string[] {
      return splitNul(run(['ls-files', '-z', '--others', '--exclude-standard']));
    },
  };
}

function runGit(cwd: string, args: readonly string[]): string {
  const command = `git ${args.join(' ')}`;
  try {
    return execFileSync('git', [...args], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 10 * 1024 * 1024,
    });
  } catch (err) {
    const stderr = readStderr(err);
    throw new GitDiffError(
      `Command failed: ${command}\n${stderr || errorMessage(err)}`,
      command,
      stderr || undefined,
    );
  }
}

function readStderr(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string') return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8').trim();
  }
  return '';
}

/** `-z` output: NUL-terminated, unquoted paths */
function splitNul(output: string): string[] {
  return output.split('\0').filter(Boolean);
}
