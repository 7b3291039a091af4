/**
 * Type Definitions for the Ref Store
 *
 * These types define the contracts for Git operations,
 * dependencies, and data structures used throughout the module.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

/**
 * The single seam through which every external tool is invoked
 * (git, the test command, the build, service control, notifications).
 */
export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule
 */
export type GitModuleDependencies = {
  /** Path to the Git repository root (optional, auto-detected if not provided) */
  repoRoot?: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
};

/**
 * Options for retrieving commit history
 */
export type GetCommitHistoryOptions = {
  /** Maximum number of commits to return */
  maxCount?: number;
};

/**
 * Information about a commit in the history
 */
export type CommitInfo = {
  /** Commit hash */
  hash: string;
  /** Commit subject line */
  message: string;
  /** Commit author (name <email>) */
  author: string;
  /** Commit date (ISO 8601) */
  date: string;
};

export type MergeStrategy = 'ff-only' | 'no-ff';

export type MergeOptions = {
  strategy: MergeStrategy;
  /** Merge commit message (no-ff only) */
  message?: string;
};

/**
 * Outcome of a merge that did not stop on conflicts
 */
export type MergeResult = {
  status: 'merged' | 'fast-forward' | 'up-to-date';
  /** Tip of the current branch after the merge */
  commitHash: string;
};

export type ConflictSide = 'ours' | 'theirs';

/**
 * Tag as listed from the repository, peeled to its commit
 */
export type TagInfo = {
  name: string;
  commit: string;
  /** Tagger date for annotated tags, commit date otherwise (ISO 8601) */
  createdAt: string;
  /** Annotation message (empty for lightweight tags) */
  message: string;
};

/**
 * A branch update for an atomic lease-protected push
 */
export type LeasedRefUpdate = {
  branch: string;
  /** Commit the remote branch is expected to point at (empty string = must not exist) */
  expectedRemoteCommit: string;
};
