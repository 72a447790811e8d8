/** How matched files are grouped into review tasks */
export type ReviewStrategy = 'individual' | 'matches_together' | 'all_changed_files';

/** All available strategies */
export const ALL_STRATEGIES: readonly ReviewStrategy[] = [
  'individual',
  'matches_together',
  'all_changed_files',
] as const;

/** Agent platforms the CLI can format instructions for */
export type Platform = 'claude';

/** All supported platforms */
export const SUPPORTED_PLATFORMS: readonly Platform[] = ['claude'] as const;

// ─── Stage 1: Rules ───────────────────────────────────────

/** A named review rule parsed from a rules file */
export interface ReviewRule {
  readonly name: string;
  readonly description: string;
  readonly includePatterns: readonly string[];
  readonly excludePatterns: readonly string[];
  readonly strategy: ReviewStrategy;
  /** Resolved instruction text (inline or loaded from the referenced file) */
  readonly instructions: string;
  /** Platform name → agent persona */
  readonly agentPersonas: Readonly<Record<string, string>> | null;
  readonly includeAllChangedFilenames: boolean;
  readonly includeUnchangedMatchingFiles: boolean;
  /** Absolute directory of the defining file; patterns are relative to it */
  readonly sourceDir: string;
  /** Absolute path of the defining file */
  readonly sourceFile: string;
  /** 1-based line of the rule's top-level key */
  readonly sourceLine: number;
}

/** A rules file (or a single rule in it) that could not be loaded */
export interface DiscoveryError {
  readonly filePath: string;
  readonly error: string;
}

/** Rules found under a project root, along with the files that failed */
export interface RuleDiscovery {
  readonly rules: readonly ReviewRule[];
  readonly errors: readonly DiscoveryError[];
}

// ─── Stage 2: Matching ────────────────────────────────────

/** One unit of review work handed to an agent */
export interface ReviewTask {
  readonly ruleName: string;
  /** Paths relative to the project root */
  readonly filesToReview: readonly string[];
  readonly instructions: string;
  /** Persona for the target platform, or null for a generic reviewer */
  readonly agentPersona: string | null;
  /** e.g. `services/api/.review-rules.yml:5` */
  readonly sourceLocation: string;
  /** Unchanged files that also match the rule's patterns */
  readonly additionalFiles: readonly string[];
  /** Full changeset, when the rule asks for it */
  readonly allChangedFilenames: readonly string[] | null;
}

// ─── Stage 3: Emission ────────────────────────────────────

/** A task whose instruction file was written */
export interface EmittedTask {
  readonly task: ReviewTask;
  readonly reviewId: string;
  /** Absolute path of the instruction file */
  readonly filePath: string;
}

/** Result of writing instruction files for a set of tasks */
export interface EmissionResult {
  readonly emitted: readonly EmittedTask[];
  /** Tasks skipped because a pass marker already exists */
  readonly skippedCount: number;
}

// ─── Query tools ──────────────────────────────────────────

/** Summary of a configured rule */
export interface ConfiguredReview {
  readonly name: string;
  readonly description: string;
  readonly definingFile: string;
}

// ─── CLI ──────────────────────────────────────────────────

/** CLI configuration after resolving args > env > defaults */
export interface CliConfig {
  readonly projectRoot: string;
  readonly platform: Platform;
  readonly baseRef: string | undefined;
  /** Absolute directory for instruction files and pass markers */
  readonly instructionsDir: string;
  readonly jsonOutput: boolean;
  readonly verbose: boolean;
}

/** Where the changed-file list comes from */
export type InputMode =
  | { readonly type: 'files'; readonly files: readonly string[] }
  | { readonly type: 'stdin'; readonly baseRef?: string }
  | { readonly type: 'git'; readonly baseRef?: string };

/** Name of the rule-definition file looked for in every directory */
export const RULES_FILENAME = '.review-rules.yml';

/** Directory holding state written by this tool */
export const STATE_DIRNAME = '.review-gate';

/** Default instruction/marker directory, relative to the project root */
export const DEFAULT_INSTRUCTIONS_DIR = `${STATE_DIRNAME}/instructions`;

/** Persona used when a rule names none for the target platform */
export const DEFAULT_AGENT = 'general-purpose';
