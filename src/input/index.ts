export {
  getChangedFiles,
  detectBaseRef,
  resolveChangedFiles,
  normalizeFileList,
  parsePathList,
  BASE_REF_CANDIDATES,
} from './changedFiles.js';
export type { ChangedFilesOptions, ResolveDeps } from './changedFiles.js';
export { createGitClient } from './git.js';
export type { GitClient, DiffNamesOptions } from './git.js';
