import { Command, Option } from 'commander';
import { createSpinner } from 'nanospinner';
import pc from 'picocolors';
import { resolveConfig, resolveInputMode, resolveProjectRoot } from './config.js';
import { errorMessage } from './errors.js';
import { FORMATTERS } from './output/index.js';
import { printJsonTasks } from './output/json.js';
import { printDiscoveryWarnings, printError } from './output/terminal.js';
import {
  ALL_PASSED_MESSAGE,
  describeEmptyOutcome,
  runReviewPipeline,
  type PipelineOutcome,
} from './review/pipeline.js';
import { getConfiguredReviews, markReviewAsPassed } from './tools.js';
import type { CliConfig } from './types.js';
import { RULES_FILENAME, SUPPORTED_PLATFORMS } from './types.js';

/**
 * Run the review-gate CLI.
 *
 * Commands:
 *   review              rules → changed files → tasks → instruction files → agent prompt
 *   configured-reviews  list rules as JSON
 *   mark-passed <id>    record a review as passed
 */
export async function run(argv: string[]): Promise<void> {
  const program = new Command()
    .name('review-gate')
    .description(`Generate review tasks for changed files from ${RULES_FILENAME} rules`)
    .version('0.1.0');

  program
    .command('review')
    .description(
      'Match changed files against review rules and write instructions for a reviewing agent.\n' +
        'Changed files come from --files, else from paths piped on stdin, else from git.',
    )
    .addOption(
      new Option('--instructions-for <platform>', 'Target agent platform')
        .choices([...SUPPORTED_PLATFORMS])
        .makeOptionMandatory(),
    )
    .option('--base-ref <ref>', 'Git ref to diff against (default: merge-base with main branch)')
    .option('--path <dir>', 'Project root directory (default: current directory)')
    .option('--files <path>', 'File to review instead of git changes (repeatable)', collect, [])
    .option('--json', 'Output tasks as JSON')
    .option('--verbose', 'Show progress and match details on stderr')
    .action((opts: Record<string, unknown>) => {
      process.exitCode = reviewCommand({
        instructionsFor: stringOpt(opts['instructionsFor']),
        baseRef: stringOpt(opts['baseRef']),
        path: stringOpt(opts['path']),
        files: stringListOpt(opts['files']),
        json: opts['json'] === true,
        verbose: opts['verbose'] === true,
      });
    });

  program
    .command('configured-reviews')
    .description('List configured review rules as JSON')
    .option('--path <dir>', 'Project root directory (default: current directory)')
    .option('--files <path>', 'Only rules matching one of these files (repeatable)', collect, [])
    .action((opts: Record<string, unknown>) => {
      const files = stringListOpt(opts['files']);
      try {
        const reviews = getConfiguredReviews(
          resolveProjectRoot(stringOpt(opts['path'])),
          files.length > 0 ? files : undefined,
        );
        console.log(JSON.stringify(reviews, null, 2));
      } catch (err) {
        printError(errorMessage(err));
        process.exitCode = 1;
      }
    });

  program
    .command('mark-passed')
    .description('Mark a review as passed so it is skipped until its files change')
    .argument('<review-id>', 'Review id from the instruction file')
    .option('--path <dir>', 'Project root directory (default: current directory)')
    .action((reviewId: string, opts: Record<string, unknown>) => {
      try {
        console.log(markReviewAsPassed(resolveProjectRoot(stringOpt(opts['path'])), reviewId));
      } catch (err) {
        printError(errorMessage(err));
        process.exitCode = 1;
      }
    });

  await program.parseAsync(argv);
}

interface ReviewArgs {
  readonly instructionsFor?: string;
  readonly baseRef?: string;
  readonly path?: string;
  readonly files: readonly string[];
  readonly json: boolean;
  readonly verbose: boolean;
}

/**
 * The `review` command. Returns the process exit code.
 */
export function reviewCommand(
  args: ReviewArgs,
  stdinIsTTY: boolean = Boolean(process.stdin.isTTY),
): number {
  let config: CliConfig;
  try {
    config = resolveConfig(args);
  } catch (err) {
    printError(errorMessage(err));
    return 1;
  }

  const input = resolveInputMode({ files: args.files, baseRef: config.baseRef }, stdinIsTTY);
  const spinner = config.verbose
    ? createSpinner(`Detecting changes (source: ${input.type})...`, {
        stream: process.stderr,
      }).start()
    : null;

  let outcome: PipelineOutcome;
  try {
    outcome = runReviewPipeline({
      projectRoot: config.projectRoot,
      platform: config.platform,
      input,
      instructionsDir: config.instructionsDir,
      onChangedFiles: (files) => {
        spinner?.success({ text: `${files.length} changed file(s)` });
      },
    });
  } catch (err) {
    if (spinner?.isSpinning()) {
      spinner.error({ text: 'Review failed' });
    }
    printError(errorMessage(err));
    return 1;
  }
  if (spinner?.isSpinning()) {
    spinner.stop();
  }

  printDiscoveryWarnings(outcome.discoveryErrors);

  if (outcome.kind !== 'tasks') {
    if (config.jsonOutput) {
      // stdout stays a JSON document; the reason goes to stderr
      console.error(describeEmptyOutcome(outcome));
      printJsonTasks([], config.projectRoot);
    } else {
      console.log(describeEmptyOutcome(outcome));
    }
    return 0;
  }

  const { emitted, skippedCount } = outcome.emission;

  if (config.verbose) {
    console.error(
      pc.dim(
        `  ${outcome.tasks.length} task(s): ${emitted.length} to review, ${skippedCount} already passed`,
      ),
    );
  }

  if (config.jsonOutput) {
    printJsonTasks(emitted, config.projectRoot);
  } else if (emitted.length === 0) {
    console.log(ALL_PASSED_MESSAGE);
  } else {
    console.log(FORMATTERS[config.platform](emitted, config.projectRoot));
  }

  return 0;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function stringOpt(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function stringListOpt(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
