/**
 * Custom Error Classes for the Ref Store
 *
 * These errors provide typed exceptions for better error handling
 * and diagnostics in the Git module operations.
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly stdout?: string;
  public readonly command?: string;

  constructor(message: string, stderr: string = '', command?: string, stdout?: string) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when a branch does not exist
 */
export class BranchNotFoundError extends GitError {
  public readonly branchName: string;

  constructor(branchName: string) {
    super(`Branch not found: ${branchName}`);
    this.name = 'BranchNotFoundError';
    this.branchName = branchName;
    Object.setPrototypeOf(this, BranchNotFoundError.prototype);
  }
}

/**
 * Error thrown when a ref (branch, tag, remote-tracking ref) cannot be resolved
 */
export class RefNotFoundError extends GitError {
  public readonly ref: string;

  constructor(ref: string) {
    super(`Ref not found: ${ref}`);
    this.name = 'RefNotFoundError';
    this.ref = ref;
    Object.setPrototypeOf(this, RefNotFoundError.prototype);
  }
}

/**
 * Error thrown when a file does not exist in a commit
 */
export class FileNotFoundError extends GitError {
  public readonly filePath: string;
  public readonly commitHash: string;

  constructor(filePath: string, commitHash: string) {
    super(`File not found: ${filePath} in commit ${commitHash}`);
    this.name = 'FileNotFoundError';
    this.filePath = filePath;
    this.commitHash = commitHash;
    Object.setPrototypeOf(this, FileNotFoundError.prototype);
  }
}

/**
 * Error thrown when a merge conflict occurs
 */
export class MergeConflictError extends GitError {
  public readonly conflictedFiles: string[];

  constructor(conflictedFiles: string[]) {
    super(`Merge conflict detected in ${conflictedFiles.length} file(s)`);
    this.name = 'MergeConflictError';
    this.conflictedFiles = conflictedFiles;
    Object.setPrototypeOf(this, MergeConflictError.prototype);
  }
}

/**
 * Error thrown when a --ff-only merge is impossible because the branch diverged
 */
export class NotFastForwardError extends GitError {
  public readonly branchName: string;
  public readonly target: string;

  constructor(branchName: string, target: string) {
    super(`Cannot fast-forward ${branchName} to ${target}: branch has diverged`);
    this.name = 'NotFastForwardError';
    this.branchName = branchName;
    this.target = target;
    Object.setPrototypeOf(this, NotFastForwardError.prototype);
  }
}

/**
 * Error thrown when trying to continue/abort a merge that is not in progress
 */
export class MergeNotInProgressError extends GitError {
  constructor() {
    super('No merge in progress');
    this.name = 'MergeNotInProgressError';
    Object.setPrototypeOf(this, MergeNotInProgressError.prototype);
  }
}

/**
 * Error thrown when the remote refuses a push (stale lease, non-fast-forward)
 */
export class PushRejectedError extends GitError {
  public readonly remote: string;
  public readonly refs: string[];
  public readonly stderr: string;

  constructor(remote: string, refs: string[], stderr: string = '') {
    super(`Push to ${remote} rejected for ${refs.join(', ')}`);
    this.name = 'PushRejectedError';
    this.remote = remote;
    this.refs = refs;
    this.stderr = stderr;
    Object.setPrototypeOf(this, PushRejectedError.prototype);
  }
}

/**
 * Error thrown when trying to create a tag that already exists
 */
export class TagAlreadyExistsError extends GitError {
  public readonly tagName: string;

  constructor(tagName: string) {
    super(`Tag already exists: ${tagName}`);
    this.name = 'TagAlreadyExistsError';
    this.tagName = tagName;
    Object.setPrototypeOf(this, TagAlreadyExistsError.prototype);
  }
}
