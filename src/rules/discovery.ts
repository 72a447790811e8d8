import { relative, sep } from 'node:path';
import { ConfigError } from '../errors.js';
import { walkFiles } from '../shared/walk.js';
import type { DiscoveryError, ReviewRule, RuleDiscovery } from '../types.js';
import { RULES_FILENAME } from '../types.js';
import { parseRuleFile } from './parser.js';

/**
 * Find every rules file under the project root.
 * Sorted by depth (deepest first), then alphabetically within the same depth.
 */
export function findRuleFiles(projectRoot: string): string[] {
  const files = walkFiles(projectRoot, (name) => name === RULES_FILENAME);

  const depth = (file: string) => relative(projectRoot, file).split(sep).length;

  return files.sort((a, b) => depth(b) - depth(a) || (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Discover and parse all rules under the project root.
 *
 * A file that fails to parse is reported in `errors` and does not stop
 * discovery of rules in other files.
 */
export function loadAllRules(projectRoot: string): RuleDiscovery {
  const rules: ReviewRule[] = [];
  const errors: DiscoveryError[] = [];

  for (const filePath of findRuleFiles(projectRoot)) {
    try {
      const parsed = parseRuleFile(filePath);
      rules.push(...parsed.rules);
      errors.push(...parsed.errors);
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      errors.push({ filePath, error: err.message });
    }
  }

  return { rules, errors };
}
