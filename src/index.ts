export { runReviewPipeline, describeEmptyOutcome } from './review/pipeline.js';
export type { PipelineOptions, PipelineOutcome } from './review/pipeline.js';
export { getConfiguredReviews, markReviewAsPassed, runReview } from './tools.js';
export { loadAllRules, findRuleFiles, parseRuleFile } from './rules/index.js';
export { getChangedFiles, resolveChangedFiles, createGitClient } from './input/index.js';
export type { GitClient } from './input/index.js';
export { matchFilesToRules, matchRule } from './match/index.js';
export { InstructionWriter, MarkerStore, computeReviewId, buildInstructionFile } from './instructions/index.js';
export { formatForClaude } from './output/index.js';
export { ConfigError, GitDiffError, ReviewToolError, ReviewIdError } from './errors.js';
export * from './types.js';
