/**
 * Ref Store - Git operations behind a business-agnostic interface
 *
 * @module git
 */

export type { IGitModule } from './git_module';
export { LocalGitModule } from './local';
export { MemoryGitModule } from './memory';
export type { FileChanges, MemoryGitModuleOptions } from './memory';

export type {
  GitModuleDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
  GetCommitHistoryOptions,
  CommitInfo,
  MergeStrategy,
  MergeOptions,
  MergeResult,
  ConflictSide,
  TagInfo,
  LeasedRefUpdate,
} from './types';

export {
  GitError,
  GitCommandError,
  BranchNotFoundError,
  RefNotFoundError,
  FileNotFoundError,
  MergeConflictError,
  NotFastForwardError,
  MergeNotInProgressError,
  PushRejectedError,
  TagAlreadyExistsError,
} from './errors';
