/**
 * IGitModule - Ref Store contract
 *
 * Business-agnostic abstraction over the version-control object graph:
 * branches, tags, remotes, merges and the working tree. The pipeline only
 * talks to this interface, so it runs unchanged against the git CLI
 * (LocalGitModule) or an in-process commit graph (MemoryGitModule).
 *
 * @module git_module
 */

import type {
  CommitInfo,
  ConflictSide,
  GetCommitHistoryOptions,
  LeasedRefUpdate,
  MergeOptions,
  MergeResult,
  TagInfo,
} from './types';

export interface IGitModule {
  // ─── Repository ──────────────────────────────────────────────────────
  /** True when the configured root is inside a Git work tree */
  isRepository(): Promise<boolean>;
  getRepoRoot(): Promise<string>;
  /** Absolute path of the .git directory */
  getGitDir(): Promise<string>;
  isRemoteConfigured(remoteName: string): Promise<boolean>;
  getRemoteUrl(remoteName: string): Promise<string | null>;
  /** Tracked-file changes only; untracked files do not count */
  hasUncommittedChanges(): Promise<boolean>;
  fetch(remote: string): Promise<void>;

  // ─── Refs & history ──────────────────────────────────────────────────
  /** Commit hash for a ref, or null when it does not resolve */
  resolveRef(ref: string): Promise<string | null>;
  /** @throws RefNotFoundError */
  getCommitHash(ref: string): Promise<string>;
  branchExists(branchName: string): Promise<boolean>;
  getCurrentBranch(): Promise<string>;
  checkoutBranch(branchName: string): Promise<void>;
  /** True when `ancestor` is reachable from `descendant` (a commit is its own ancestor) */
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  /** Number of commits in from..to */
  countCommits(from: string, to: string): Promise<number>;
  /** Commits in from..to, newest first */
  getCommitHistoryRange(from: string, to: string, options?: GetCommitHistoryOptions): Promise<CommitInfo[]>;
  getCommitParents(commit: string): Promise<string[]>;
  /** Last commit reachable from `ref` that touched `filePath`, or null */
  getLastCommitTouching(ref: string, filePath: string): Promise<CommitInfo | null>;
  getFileContent(commit: string, filePath: string): Promise<string>;

  // ─── Merging ─────────────────────────────────────────────────────────
  /**
   * Merges `source` into the current branch.
   * @throws NotFastForwardError for ff-only merges of diverged branches
   * @throws MergeConflictError when the merge stops on conflicts (merge stays in progress)
   */
  merge(source: string, options: MergeOptions): Promise<MergeResult>;
  isMergeInProgress(): Promise<boolean>;
  mergeAbort(): Promise<void>;
  /** Records the in-progress merge as a commit; returns its hash */
  commitMerge(message?: string): Promise<string>;
  getConflictedFiles(): Promise<string[]>;
  checkoutConflictVersion(filePath: string, side: ConflictSide): Promise<void>;
  /** True when the given side of the conflicted merge has a version of the file */
  hasConflictVersion(filePath: string, side: ConflictSide): Promise<boolean>;
  add(filePaths: string[]): Promise<void>;
  rm(filePaths: string[]): Promise<void>;
  getWorkingDiff(filePath: string): Promise<string>;
  /** Current working tree content of a file, or null when absent */
  readWorkingFile(filePath: string): Promise<string | null>;

  // ─── Rewrites & tags ─────────────────────────────────────────────────
  resetHard(target: string): Promise<void>;
  createTag(tagName: string, target: string, message: string): Promise<void>;
  tagExists(tagName: string): Promise<boolean>;
  /** Tags matching a glob (e.g. "backup/*"), newest first */
  listTags(pattern: string): Promise<TagInfo[]>;

  // ─── Publishing ──────────────────────────────────────────────────────
  /** Plain push of a branch or refspec; rejected non-fast-forward → PushRejectedError */
  push(remote: string, refspec: string): Promise<void>;
  pushTag(remote: string, tagName: string): Promise<void>;
  /**
   * Atomic force push of several branches, each guarded by --force-with-lease.
   * Either every ref is updated or none is.
   * @throws PushRejectedError when any lease is stale
   */
  pushWithLease(remote: string, updates: LeasedRefUpdate[]): Promise<void>;
}
