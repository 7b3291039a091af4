/**
 * Pipeline error taxonomy.
 *
 * Every SyncError carries the pipeline stage it belongs to and the recovery
 * commands to print, so any halt can tell the operator what to do next.
 */

export type SyncStage =
  | 'preconditions'
  | 'lease'
  | 'fetch'
  | 'backup'
  | 'mirror'
  | 'integration'
  | 'conflicts'
  | 'tests'
  | 'promotion'
  | 'post-promotion'
  | 'rollback';

/**
 * Base error class for all pipeline errors
 */
export class SyncError extends Error {
  public readonly stage: SyncStage;
  public readonly remediation: string[];

  constructor(message: string, stage: SyncStage, remediation: string[] = []) {
    super(message);
    this.name = 'SyncError';
    this.stage = stage;
    this.remediation = remediation;
    Object.setPrototypeOf(this, SyncError.prototype);
  }
}

/**
 * Not a repository, missing remote or missing branch
 */
export class EnvironmentError extends SyncError {
  constructor(message: string, remediation: string[] = []) {
    super(message, 'preconditions', remediation);
    this.name = 'EnvironmentError';
    Object.setPrototypeOf(this, EnvironmentError.prototype);
  }
}

/**
 * Uncommitted changes to tracked files
 */
export class DirtyStateError extends SyncError {
  public readonly changedFiles: string[];

  constructor(changedFiles: string[] = []) {
    super('You have uncommitted changes. Commit or stash them first.', 'preconditions', ['git status', 'git stash']);
    this.name = 'DirtyStateError';
    this.changedFiles = changedFiles;
    Object.setPrototypeOf(this, DirtyStateError.prototype);
  }
}

export class FetchError extends SyncError {
  public readonly remote: string;

  constructor(remote: string, detail: string) {
    super(`Failed to fetch from ${remote}${detail ? `: ${detail}` : ''}`, 'fetch', [`git fetch ${remote}`]);
    this.name = 'FetchError';
    this.remote = remote;
    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

export class TestFailureError extends SyncError {
  public readonly exitCode: number;

  constructor(exitCode: number, remediation: string[] = []) {
    super(`Tests failed with exit code ${exitCode}`, 'tests', remediation);
    this.name = 'TestFailureError';
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, TestFailureError.prototype);
  }
}

/**
 * Rebuild failed or the marker of local modifications is missing from the
 * build output. Reported as a warning; promotion is never reverted for it.
 */
export class BuildVerificationError extends SyncError {
  constructor(message: string, remediation: string[] = []) {
    super(message, 'post-promotion', remediation);
    this.name = 'BuildVerificationError';
    Object.setPrototypeOf(this, BuildVerificationError.prototype);
  }
}

/**
 * Another invocation holds a live session lease
 */
export class LeaseHeldError extends SyncError {
  public readonly owner: string;
  public readonly command: string;
  public readonly expiresAt: string;

  constructor(owner: string, command: string, expiresAt: string, location: string) {
    super(
      `Another forkflow session (${command}, owner ${owner}) holds the lease until ${expiresAt}`,
      'lease',
      [`Wait for it to finish, or remove ${location} if that process is gone`]
    );
    this.name = 'LeaseHeldError';
    this.owner = owner;
    this.command = command;
    this.expiresAt = expiresAt;
    Object.setPrototypeOf(this, LeaseHeldError.prototype);
  }
}

/**
 * A manually edited file still contains conflict markers
 */
export class ConflictMarkersPresentError extends SyncError {
  public readonly filePath: string;
  public readonly lines: number[];

  constructor(filePath: string, lines: number[]) {
    super(`Conflict markers remain in ${filePath} (line${lines.length === 1 ? '' : 's'} ${lines.join(', ')})`, 'conflicts');
    this.name = 'ConflictMarkersPresentError';
    this.filePath = filePath;
    this.lines = lines;
    Object.setPrototypeOf(this, ConflictMarkersPresentError.prototype);
  }
}

export class UnresolvedConflictsError extends SyncError {
  public readonly paths: string[];

  constructor(paths: string[]) {
    super(`${paths.length} conflicting file(s) are still unresolved: ${paths.join(', ')}`, 'conflicts', ['forkflow resolve-conflicts']);
    this.name = 'UnresolvedConflictsError';
    this.paths = paths;
    Object.setPrototypeOf(this, UnresolvedConflictsError.prototype);
  }
}
