export { findRuleFiles, loadAllRules } from './discovery.js';
export { parseRuleFile, findRuleLineNumbers } from './parser.js';
export type { ParsedRuleFile } from './parser.js';
export { ruleSchema, rulesDocumentSchema, NAME_PATTERN } from './schema.js';
