import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import type { CliConfig, InputMode, Platform } from './types.js';
import { DEFAULT_INSTRUCTIONS_DIR, SUPPORTED_PLATFORMS } from './types.js';

interface RawCliArgs {
  readonly instructionsFor?: string;
  readonly baseRef?: string;
  readonly path?: string;
  readonly files?: readonly string[];
  readonly json?: boolean;
  readonly verbose?: boolean;
}

/**
 * Resolve CLI config from args > env > defaults.
 */
export function resolveConfig(args: RawCliArgs): CliConfig {
  const projectRoot = resolveProjectRoot(args.path);
  const platform = resolvePlatform(args.instructionsFor);
  const baseRef = args.baseRef ?? nonEmptyEnv('REVIEW_GATE_BASE_REF');

  return {
    projectRoot,
    platform,
    baseRef,
    instructionsDir: resolveInstructionsDir(projectRoot),
    jsonOutput: args.json ?? false,
    verbose: args.verbose ?? false,
  };
}

/**
 * Determine where changed files come from.
 * Priority: --files > piped stdin > git diff
 */
export function resolveInputMode(
  args: Pick<RawCliArgs, 'files' | 'baseRef'>,
  stdinIsTTY: boolean,
): InputMode {
  if (args.files && args.files.length > 0) {
    return { type: 'files', files: args.files };
  }
  if (!stdinIsTTY) {
    return { type: 'stdin', baseRef: args.baseRef };
  }
  return { type: 'git', baseRef: args.baseRef };
}

/**
 * Project root from --path, then REVIEW_GATE_PATH, then the working directory.
 * Throws when it is not an existing directory.
 */
export function resolveProjectRoot(argPath?: string): string {
  const root = resolve(argPath ?? nonEmptyEnv('REVIEW_GATE_PATH') ?? process.cwd());
  if (!statSync(root, { throwIfNoEntry: false })?.isDirectory()) {
    throw new Error(`Project root is not a directory: ${root}`);
  }
  return root;
}

/** Instruction/marker directory; relative values are taken from the project root */
export function resolveInstructionsDir(projectRoot: string): string {
  const dir = nonEmptyEnv('REVIEW_GATE_INSTRUCTIONS_DIR') ?? DEFAULT_INSTRUCTIONS_DIR;
  return resolve(projectRoot, dir);
}

/** The supported platform named by `raw`, or null */
export function parsePlatform(raw: string): Platform | null {
  return SUPPORTED_PLATFORMS.find((p) => p === raw.trim().toLowerCase()) ?? null;
}

function resolvePlatform(raw?: string): Platform {
  if (raw == null) {
    throw new Error(`No target platform specified. Available: ${SUPPORTED_PLATFORMS.join(', ')}`);
  }
  const platform = parsePlatform(raw);
  if (platform === null) {
    throw new Error(
      `Unsupported platform: '${raw}'. Supported platforms: ${SUPPORTED_PLATFORMS.join(', ')}`,
    );
  }
  return platform;
}

function nonEmptyEnv(key: string): string | undefined {
  const val = process.env[key];
  if (val == null || val.trim() === '') return undefined;
  return val;
}
