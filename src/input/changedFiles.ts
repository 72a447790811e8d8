import { readFileSync } from 'node:fs';
import { isAbsolute, posix, relative, sep } from 'node:path';
import type { InputMode } from '../types.js';
import { createGitClient, type GitClient } from './git.js';

/** Candidates tried, in order, when the remote's default branch is unknown */
export const BASE_REF_CANDIDATES = ['origin/main', 'origin/master', 'main', 'master'] as const;

const REMOTE_HEAD_REF = 'refs/remotes/origin/HEAD';

/** Options for git-based change detection */
export interface ChangedFilesOptions {
  /** Ref to diff against; auto-detected when omitted */
  readonly baseRef?: string;
  /** Git access; defaults to the `git` CLI at the project root */
  readonly git?: GitClient;
}

/**
 * Detect the base ref to diff against.
 *
 * Uses the remote's default branch (`origin/HEAD`) when it is set and resolves,
 * then the fixed candidate list, then HEAD (uncommitted changes only).
 * A branch based on another feature branch is still compared with the
 * repository's default branch.
 */
export function detectBaseRef(git: GitClient): string {
  const remoteHead = git.symbolicRef(REMOTE_HEAD_REF);
  if (remoteHead) {
    const shortRef = remoteHead.replace(/^refs\/remotes\//, '');
    if (git.verifyRef(shortRef)) {
      return shortRef;
    }
  }

  for (const candidate of BASE_REF_CANDIDATES) {
    if (git.verifyRef(candidate)) {
      return candidate;
    }
  }

  return 'HEAD';
}

/**
 * Changed files of the working tree relative to the base.
 *
 * Union of: changes since the merge-base with the base ref, unstaged changes,
 * staged changes and untracked (not ignored) files. Deleted files are excluded.
 *
 * @returns Sorted, deduplicated paths relative to the project root
 * @throws {GitDiffError} If not a repository, the base ref is invalid, or git fails
 */
export function getChangedFiles(projectRoot: string, options: ChangedFilesOptions = {}): string[] {
  const git = options.git ?? createGitClient(projectRoot);
  const baseRef = options.baseRef ?? detectBaseRef(git);

  // Diff from the common ancestor so changes that only exist on the base branch are left out
  const base = baseRef === 'HEAD' ? 'HEAD' : git.mergeBase(baseRef);

  const files = [
    ...git.diffNames({ base }),
    ...git.diffNames(),
    ...git.diffNames({ staged: true }),
    ...git.lsFilesOthers(),
  ];

  return normalizeFileList(files, projectRoot);
}

/** Dependencies of resolveChangedFiles, replaceable in tests */
export interface ResolveDeps {
  readonly git?: GitClient;
  readonly readStdin?: () => string;
}

/**
 * Resolve the changed-file list for an input mode.
 *
 * Explicit files are used verbatim (git is not run). Piped stdin is one path
 * per line, blank lines ignored; an empty pipe falls back to git.
 */
export function resolveChangedFiles(
  mode: InputMode,
  projectRoot: string,
  deps: ResolveDeps = {},
): string[] {
  switch (mode.type) {
    case 'files':
      return normalizeFileList(mode.files, projectRoot);
    case 'stdin': {
      const piped = parsePathList((deps.readStdin ?? readStdin)());
      if (piped.length > 0) {
        return normalizeFileList(piped, projectRoot);
      }
      return getChangedFiles(projectRoot, { baseRef: mode.baseRef, git: deps.git });
    }
    case 'git':
      return getChangedFiles(projectRoot, { baseRef: mode.baseRef, git: deps.git });
  }
}

/** Split newline-separated paths, ignoring blank lines */
export function parsePathList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Make paths project-relative with `/` separators, then deduplicate and sort.
 * `./a.py` becomes `a.py`; absolute paths under the root are made relative.
 */
export function normalizeFileList(files: readonly string[], projectRoot: string): string[] {
  const normalized = files.map((file) => {
    const rel = isAbsolute(file) ? relative(projectRoot, file) : file;
    const posixPath = posix.normalize(rel.split(sep).join('/'));
    return posixPath.startsWith('./') ? posixPath.slice(2) : posixPath;
  });

  return [...new Set(normalized)].filter((f) => f !== '.' && f !== '').sort();
}

function readStdin(): string {
  try {
    return readFileSync(0, 'utf-8');
  } catch {
    // No readable stdin (closed or not a stream): treat as nothing piped
    return '';
  }
}
