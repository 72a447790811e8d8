import { isAbsolute, relative, sep } from 'node:path';
import { walkFiles } from '../shared/walk.js';
import type { ReviewRule, ReviewTask } from '../types.js';
import { matchesPatterns, relativeToDir } from './glob.js';

/**
 * Match changed files against every rule and group the matches into tasks.
 *
 * Rules are independent: a file can match several rules and appear in
 * several tasks. A rule that matches nothing produces no task.
 *
 * @param changedFiles - Paths relative to the project root
 * @param platform - Key used to pick the rule's agent persona
 */
export function matchFilesToRules(
  changedFiles: readonly string[],
  rules: readonly ReviewRule[],
  projectRoot: string,
  platform: string,
): ReviewTask[] {
  const tasks: ReviewTask[] = [];

  for (const rule of rules) {
    const matched = matchRule(changedFiles, rule, projectRoot);
    if (matched.length === 0) continue;

    const base = {
      ruleName: rule.name,
      instructions: rule.instructions,
      agentPersona: resolveAgentPersona(rule, platform),
      sourceLocation: formatSourceLocation(rule, projectRoot),
      allChangedFilenames: rule.includeAllChangedFilenames ? [...changedFiles] : null,
    };

    switch (rule.strategy) {
      case 'individual':
        for (const file of matched) {
          tasks.push({ ...base, filesToReview: [file], additionalFiles: [] });
        }
        break;

      case 'matches_together':
        tasks.push({
          ...base,
          filesToReview: matched,
          additionalFiles: rule.includeUnchangedMatchingFiles
            ? findUnchangedMatchingFiles(changedFiles, rule, projectRoot)
            : [],
        });
        break;

      case 'all_changed_files':
        // Any match triggers one review of the whole changeset
        tasks.push({ ...base, filesToReview: [...changedFiles], additionalFiles: [] });
        break;
    }
  }

  return tasks;
}

/**
 * Changed files that lie under the rule's directory and match its patterns.
 * Patterns are evaluated against the path relative to the rule's directory.
 */
export function matchRule(
  changedFiles: readonly string[],
  rule: ReviewRule,
  projectRoot: string,
): string[] {
  const sourceRel = ruleDirRelativeToRoot(rule, projectRoot);
  if (sourceRel === null) return [];

  return changedFiles.filter((file) => {
    const relToSource = relativeToDir(file, sourceRel);
    return (
      relToSource !== null &&
      matchesPatterns(relToSource, rule.includePatterns, rule.excludePatterns)
    );
  });
}

/**
 * Files on disk under the rule's directory that match its patterns but are
 * not in the changeset. Independent of git.
 *
 * @returns Sorted paths relative to the project root
 */
export function findUnchangedMatchingFiles(
  changedFiles: readonly string[],
  rule: ReviewRule,
  projectRoot: string,
): string[] {
  const sourceRel = ruleDirRelativeToRoot(rule, projectRoot);
  if (sourceRel === null) return [];

  const changed = new Set(changedFiles);
  const unchanged: string[] = [];

  for (const absolute of walkFiles(rule.sourceDir)) {
    const relToSource = toPosix(relative(rule.sourceDir, absolute));
    if (!matchesPatterns(relToSource, rule.includePatterns, rule.excludePatterns)) continue;

    const relToRoot = sourceRel === '' ? relToSource : `${sourceRel}/${relToSource}`;
    if (!changed.has(relToRoot)) {
      unchanged.push(relToRoot);
    }
  }

  return [...new Set(unchanged)].sort();
}

/** Persona for the platform, or null when the rule names none */
export function resolveAgentPersona(rule: ReviewRule, platform: string): string | null {
  return rule.agentPersonas?.[platform] ?? null;
}

/**
 * `path/to/.review-rules.yml:LINE`, with the path relative to the project root
 * when the rules file is inside it.
 */
export function formatSourceLocation(rule: ReviewRule, projectRoot: string): string {
  const rel = relative(projectRoot, rule.sourceFile);
  const path = rel.startsWith('..') || isAbsolute(rel) ? rule.sourceFile : toPosix(rel);
  return `${path}:${rule.sourceLine}`;
}

/** Rule directory relative to the root ('' for the root), or null if outside it */
function ruleDirRelativeToRoot(rule: ReviewRule, projectRoot: string): string | null {
  const rel = relative(projectRoot, rule.sourceDir);
  if (rel.startsWith('..') || isAbsolute(rel)) return null;
  return toPosix(rel);
}

function toPosix(path: string): string {
  return path.split(sep).join('/');
}
