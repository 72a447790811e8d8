import { readFileSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import type { DiscoveryError, ReviewRule } from '../types.js';
import {
  formatIssue,
  nameSchema,
  ruleSchema,
  rulesDocumentSchema,
  type RawInstructions,
  type RawRule,
} from './schema.js';

/** Rules parsed from one file, plus the rules in it that failed */
export interface ParsedRuleFile {
  readonly rules: readonly ReviewRule[];
  readonly errors: readonly DiscoveryError[];
}

/** A top-level YAML key at column 0 */
const RULE_KEY_RE = /^([a-zA-Z0-9_-]+)\s*:/;

/**
 * Parse a rules file into review rules.
 *
 * Throws ConfigError when the file as a whole is unusable (unreadable, invalid
 * YAML, not a mapping). A single invalid rule is reported in `errors` and the
 * remaining rules of the file are still returned.
 */
export function parseRuleFile(filePath: string): ParsedRuleFile {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Failed to read ${filePath}: ${errorMessage(err)}`, filePath);
  }

  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${filePath}: ${errorMessage(err)}`, filePath);
  }

  // Empty document or comments only
  if (data == null) {
    return { rules: [], errors: [] };
  }

  const document = rulesDocumentSchema.safeParse(data);
  if (!document.success) {
    const details = document.error.issues.map((issue) => formatIssue(issue)).join('; ');
    throw new ConfigError(`Schema validation failed for ${filePath}: ${details}`, filePath);
  }

  const sourceDir = dirname(filePath);
  const lineNumbers = findRuleLineNumbers(text);
  const rules: ReviewRule[] = [];
  const errors: DiscoveryError[] = [];

  for (const [name, value] of Object.entries(document.data)) {
    try {
      rules.push(parseRule(name, value, sourceDir, filePath, lineNumbers.get(name) ?? 1));
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      errors.push({ filePath, error: err.message });
    }
  }

  return { rules, errors };
}

function parseRule(
  name: string,
  value: unknown,
  sourceDir: string,
  sourceFile: string,
  sourceLine: number,
): ReviewRule {
  const nameResult = nameSchema.safeParse(name);
  if (!nameResult.success) {
    const details = nameResult.error.issues.map((i) => `${name}: rule name ${i.message}`);
    throw new ConfigError(
      `Schema validation failed for ${sourceFile}: ${details.join('; ')}`,
      sourceFile,
      name,
    );
  }

  const result = ruleSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => formatIssue(issue, [name]))
      .join('; ');
    throw new ConfigError(
      `Schema validation failed for ${sourceFile}: ${details}`,
      sourceFile,
      name,
    );
  }

  return buildRule(name, result.data, sourceDir, sourceFile, sourceLine);
}

function buildRule(
  name: string,
  raw: RawRule,
  sourceDir: string,
  sourceFile: string,
  sourceLine: number,
): ReviewRule {
  const context = raw.review.additional_context;

  return {
    name,
    description: raw.description,
    includePatterns: raw.match.include,
    excludePatterns: raw.match.exclude ?? [],
    strategy: raw.review.strategy,
    instructions: resolveInstructions(raw.review.instructions, sourceDir, sourceFile, name),
    agentPersonas: raw.review.agent ?? null,
    includeAllChangedFilenames: context?.all_changed_filenames ?? false,
    includeUnchangedMatchingFiles: context?.unchanged_matching_files ?? false,
    sourceDir,
    sourceFile,
    sourceLine,
  };
}

/**
 * Resolve instruction text: inline string, or `{ file }` relative to the rules file.
 */
function resolveInstructions(
  instructions: RawInstructions,
  sourceDir: string,
  sourceFile: string,
  ruleName: string,
): string {
  if (typeof instructions === 'string') {
    return instructions;
  }

  const instructionsPath = resolve(sourceDir, instructions.file);
  if (!existsSync(instructionsPath)) {
    throw new ConfigError(
      `Rule "${ruleName}": instructions file not found: ${instructionsPath}`,
      sourceFile,
      ruleName,
    );
  }

  try {
    return readFileSync(instructionsPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Rule "${ruleName}": failed to read instructions file ${instructionsPath}: ${errorMessage(err)}`,
      sourceFile,
      ruleName,
    );
  }
}

/**
 * Map each top-level key to the 1-based line it appears on.
 */
export function findRuleLineNumbers(text: string): Map<string, number> {
  const result = new Map<string, number>();
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    const match = RULE_KEY_RE.exec(line);
    if (match?.[1] != null && !result.has(match[1])) {
      result.set(match[1], index + 1);
    }
  });

  return result;
}
