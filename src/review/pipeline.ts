import { ReviewToolError, errorMessage } from '../errors.js';
import { resolveChangedFiles, type ResolveDeps } from '../input/changedFiles.js';
import { InstructionWriter } from '../instructions/writer.js';
import { matchFilesToRules } from '../match/matcher.js';
import { loadAllRules } from '../rules/discovery.js';
import type {
  DiscoveryError,
  EmissionResult,
  InputMode,
  Platform,
  ReviewTask,
} from '../types.js';
import { RULES_FILENAME } from '../types.js';

/** Inputs of one pipeline run */
export interface PipelineOptions {
  readonly projectRoot: string;
  readonly platform: Platform;
  readonly input: InputMode;
  readonly instructionsDir: string;
  /** Called once the changed-file list is known */
  readonly onChangedFiles?: (files: readonly string[]) => void;
  readonly deps?: ResolveDeps;
}

/** What a pipeline run produced */
export type PipelineOutcome =
  | { readonly kind: 'no-rules'; readonly discoveryErrors: readonly DiscoveryError[] }
  | {
      readonly kind: 'no-changes';
      readonly discoveryErrors: readonly DiscoveryError[];
    }
  | {
      readonly kind: 'no-matches';
      readonly discoveryErrors: readonly DiscoveryError[];
      readonly changedFiles: readonly string[];
    }
  | {
      readonly kind: 'tasks';
      readonly discoveryErrors: readonly DiscoveryError[];
      readonly changedFiles: readonly string[];
      readonly tasks: readonly ReviewTask[];
      readonly emission: EmissionResult;
    };

/**
 * Run discovery → change detection → matching → emission.
 *
 * Rules-file problems are returned as `discoveryErrors`; change detection
 * failures propagate as GitDiffError; write failures become ReviewToolError.
 */
export function runReviewPipeline(options: PipelineOptions): PipelineOutcome {
  const { projectRoot, platform, input, instructionsDir } = options;

  // ─── Stage 1: Discover rules ──────────────────────────────
  const { rules, errors: discoveryErrors } = loadAllRules(projectRoot);
  if (rules.length === 0) {
    return { kind: 'no-rules', discoveryErrors };
  }

  // ─── Stage 2: Changed files ───────────────────────────────
  const changedFiles = resolveChangedFiles(input, projectRoot, options.deps);
  options.onChangedFiles?.(changedFiles);
  if (changedFiles.length === 0) {
    return { kind: 'no-changes', discoveryErrors };
  }

  // ─── Stage 3: Match ───────────────────────────────────────
  const tasks = matchFilesToRules(changedFiles, rules, projectRoot, platform);
  if (tasks.length === 0) {
    return { kind: 'no-matches', discoveryErrors, changedFiles };
  }

  // ─── Stage 4: Emit ────────────────────────────────────────
  let emission: EmissionResult;
  try {
    emission = new InstructionWriter(projectRoot, instructionsDir).writeInstructionFiles(tasks);
  } catch (err) {
    throw new ReviewToolError(`Error writing instruction files: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return { kind: 'tasks', discoveryErrors, changedFiles, tasks, emission };
}

/** Message for each "nothing to do" outcome */
export function describeEmptyOutcome(
  outcome: Exclude<PipelineOutcome, { kind: 'tasks' }>,
): string {
  switch (outcome.kind) {
    case 'no-rules':
      return outcome.discoveryErrors.length > 0
        ? 'No valid review rules found.'
        : `No ${RULES_FILENAME} files found.`;
    case 'no-changes':
      return 'No changed files detected.';
    case 'no-matches':
      return 'No review rules matched the changed files.';
  }
}

/** Printed when every matching task already has a pass marker */
export const ALL_PASSED_MESSAGE = 'All matching reviews have already passed. Nothing to review.';
