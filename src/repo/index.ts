export { SourceFileNotFoundError, SourceFileReadError } from './errors.js';
export {
  createGitService,
  defaultGitRunner,
  UNKNOWN,
  type GitRunner,
  type GitService,
} from './git.js';
export {
  languageOf,
  summarizeFiles,
  readSourceFile,
  walkFiles,
  MAX_WALK_FILES,
  type FileSummary,
} from './files.js';
