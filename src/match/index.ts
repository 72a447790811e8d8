export {
  matchFilesToRules,
  matchRule,
  findUnchangedMatchingFiles,
  resolveAgentPersona,
  formatSourceLocation,
} from './matcher.js';
export { globMatch, matchesPatterns, relativeToDir } from './glob.js';
