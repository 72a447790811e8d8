import { resolve } from 'node:path';
import { parsePlatform, resolveInstructionsDir } from './config.js';
import { GitDiffError, ReviewToolError } from './errors.js';
import { MarkerStore } from './instructions/markers.js';
import { formatSourceLocation, matchRule } from './match/matcher.js';
import { FORMATTERS } from './output/index.js';
import { formatDiscoveryWarnings } from './output/terminal.js';
import { loadAllRules } from './rules/discovery.js';
import {
  ALL_PASSED_MESSAGE,
  describeEmptyOutcome,
  runReviewPipeline,
  type PipelineOutcome,
} from './review/pipeline.js';
import type { ConfiguredReview, InputMode } from './types.js';
import { RULES_FILENAME, SUPPORTED_PLATFORMS } from './types.js';

/** Name prefix of entries that stand for a rules file that failed to load */
export const PARSE_ERROR_PREFIX = 'PARSE_ERROR:';

/**
 * List configured review rules.
 *
 * With `onlyRulesMatchingFiles`, only rules whose patterns match at least one
 * of those files are listed (git is not consulted). Files that failed to load
 * are listed as `PARSE_ERROR:<file>` entries instead of raising.
 */
export function getConfiguredReviews(
  projectRoot: string,
  onlyRulesMatchingFiles?: readonly string[],
): ConfiguredReview[] {
  const root = resolve(projectRoot);
  const { rules, errors } = loadAllRules(root);

  const selected =
    onlyRulesMatchingFiles === undefined
      ? rules
      : rules.filter((rule) => matchRule(onlyRulesMatchingFiles, rule, root).length > 0);

  const result: ConfiguredReview[] = selected.map((rule) => ({
    name: rule.name,
    description: rule.description,
    definingFile: formatSourceLocation(rule, root),
  }));

  for (const err of errors) {
    result.push({
      name: `${PARSE_ERROR_PREFIX}${err.filePath}`,
      description: err.error,
      definingFile: err.filePath,
    });
  }

  return result;
}

/**
 * Record a review as passed so later runs skip it.
 *
 * @throws {ReviewIdError} For an empty id or one containing path traversal
 */
export function markReviewAsPassed(
  projectRoot: string,
  reviewId: string,
  instructionsDir: string = resolveInstructionsDir(resolve(projectRoot)),
): string {
  return new MarkerStore(instructionsDir).markPassed(reviewId);
}

/**
 * Run the whole review pipeline and return the formatted output as one string,
 * with rules-file warnings prepended.
 *
 * @param files - Explicit file list; when omitted, changes are detected with git
 * @throws {ReviewToolError} On an unsupported platform, git failure or write failure
 */
export function runReview(
  projectRoot: string,
  platformName: string,
  files?: readonly string[],
): string {
  const platform = parsePlatform(platformName);
  if (platform === null) {
    throw new ReviewToolError(
      `Unsupported platform: '${platformName}'. Supported platforms: ${SUPPORTED_PLATFORMS.join(', ')}`,
    );
  }

  const root = resolve(projectRoot);
  const input: InputMode = files !== undefined ? { type: 'files', files } : { type: 'git' };

  let outcome: PipelineOutcome;
  try {
    outcome = runReviewPipeline({
      projectRoot: root,
      platform,
      input,
      instructionsDir: resolveInstructionsDir(root),
    });
  } catch (err) {
    if (err instanceof GitDiffError) {
      throw new ReviewToolError(`Git error: ${err.message}`, { cause: err });
    }
    throw err;
  }

  const warnings = outcome.discoveryErrors.length
    ? formatDiscoveryWarnings(outcome.discoveryErrors)
    : '';

  if (outcome.kind !== 'tasks') {
    if (outcome.kind === 'no-rules' && warnings) {
      return `No valid ${RULES_FILENAME} rules found. Parse errors:\n${warnings}`;
    }
    return describeEmptyOutcome(outcome);
  }

  const { emitted } = outcome.emission;
  const body = emitted.length > 0 ? FORMATTERS[platform](emitted, root) : ALL_PASSED_MESSAGE;

  return warnings
    ? `Warning: Some ${RULES_FILENAME} files could not be parsed:\n${warnings}\n\n${body}`
    : body;
}
