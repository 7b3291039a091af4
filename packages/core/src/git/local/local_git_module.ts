/**
 * LocalGitModule - Ref Store backed by the git CLI
 *
 * Exposes semantic methods instead of raw Git commands. Every command goes
 * through the injected execCommand, so the module is testable without a
 * real repository.
 *
 * @module git/local
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { IGitModule } from '../git_module';
import type {
  CommitInfo,
  ConflictSide,
  ExecCommand,
  ExecOptions,
  ExecResult,
  GetCommitHistoryOptions,
  GitModuleDependencies,
  LeasedRefUpdate,
  MergeOptions,
  MergeResult,
  TagInfo,
} from '../types';
import {
  BranchNotFoundError,
  FileNotFoundError,
  GitCommandError,
  MergeConflictError,
  MergeNotInProgressError,
  NotFastForwardError,
  PushRejectedError,
  RefNotFoundError,
  TagAlreadyExistsError,
} from '../errors';
import { createLogger } from '../../logger/logger';

const logger = createLogger('[GitModule] ');

/** Field separator for --format output; never appears in subjects or ref names */
const FIELD_SEP = '\x1f';
const LOG_FORMAT = `%H${FIELD_SEP}%s${FIELD_SEP}%an <%ae>${FIELD_SEP}%aI`;

function parseLogLines(stdout: string): CommitInfo[] {
  return stdout
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const [hash, message, author, date] = line.split(FIELD_SEP);
      if (hash === undefined || message === undefined || author === undefined || date === undefined) {
        throw new GitCommandError('Invalid git log output format', line);
      }
      return { hash, message, author, date };
    });
}

function isRejection(output: string): boolean {
  return (
    output.includes('rejected') ||
    output.includes('stale info') ||
    output.includes('non-fast-forward') ||
    output.includes('atomic push failed')
  );
}

/**
 * LocalGitModule class providing low-level Git operations
 *
 * All operations are async and use dependency injection for testability.
 * Errors are transformed into typed exceptions for better handling.
 */
export class LocalGitModule implements IGitModule {
  private repoRoot: string;
  private execCommand: ExecCommand;

  /**
   * @throws Error if execCommand is not provided
   */
  constructor(dependencies: GitModuleDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for LocalGitModule');
    }

    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot || '';
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Ensures that repoRoot is set, auto-detecting it if necessary
   *
   * @throws GitCommandError if not in a Git repository
   */
  private async ensureRepoRoot(): Promise<string> {
    if (!this.repoRoot) {
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel']);
      if (result.exitCode !== 0) {
        throw new GitCommandError('Not in a Git repository', result.stderr);
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd || await this.ensureRepoRoot();
    logger.debug(`git ${args.join(' ')}`);
    return this.execCommand('git', args, { ...options, cwd });
  }

  private async execGitOrThrow(args: string[], failureMessage: string): Promise<ExecResult> {
    const result = await this.execGit(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(failureMessage, result.stderr, `git ${args.join(' ')}`, result.stdout);
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPOSITORY
  // ═══════════════════════════════════════════════════════════════════════

  async isRepository(): Promise<boolean> {
    const cwd = this.repoRoot || process.cwd();
    const result = await this.execCommand('git', ['rev-parse', '--is-inside-work-tree'], { cwd });
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  }

  async getRepoRoot(): Promise<string> {
    return await this.ensureRepoRoot();
  }

  async getGitDir(): Promise<string> {
    const result = await this.execGitOrThrow(['rev-parse', '--absolute-git-dir'], 'Failed to locate .git directory');
    return result.stdout.trim();
  }

  async isRemoteConfigured(remoteName: string): Promise<boolean> {
    const result = await this.execGit(['remote']);
    if (result.exitCode !== 0) {
      return false;
    }
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .includes(remoteName);
  }

  async getRemoteUrl(remoteName: string): Promise<string | null> {
    const result = await this.execGit(['remote', 'get-url', remoteName]);
    if (result.exitCode !== 0) {
      return null;
    }
    return result.stdout.trim() || null;
  }

  /**
   * Checks for modified tracked files (staged or not). Untracked files are ignored,
   * matching `git diff-index --quiet HEAD --`.
   */
  async hasUncommittedChanges(): Promise<boolean> {
    const result = await this.execGitOrThrow(
      ['status', '--porcelain', '--untracked-files=no'],
      'Failed to check for uncommitted changes'
    );
    return result.stdout.trim().length > 0;
  }

  async fetch(remote: string): Promise<void> {
    const result = await this.execGit(['fetch', remote]);

    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to fetch from ${remote}`, result.stderr);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REFS & HISTORY
  // ═══════════════════════════════════════════════════════════════════════

  async resolveRef(ref: string): Promise<string | null> {
    const result = await this.execGit(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
    if (result.exitCode !== 0) {
      return null;
    }
    return result.stdout.trim() || null;
  }

  /**
   * Get commit hash for a given reference (branch, tag, remote-tracking ref, hash)
   *
   * @throws RefNotFoundError if ref does not exist
   *
   * @example
   * const mirrorHash = await git.getCommitHash("pristine-upstream");
   * // => "f6e5d4c3b2a1..."
   */
  async getCommitHash(ref: string): Promise<string> {
    const hash = await this.resolveRef(ref);
    if (!hash) {
      throw new RefNotFoundError(ref);
    }
    logger.debug(`Got commit hash for ${ref}: ${hash.substring(0, 8)}...`);
    return hash;
  }

  async branchExists(branchName: string): Promise<boolean> {
    const result = await this.execGit(['show-ref', '--verify', '--quiet', `refs/heads/${branchName}`]);
    return result.exitCode === 0;
  }

  /**
   * @throws GitCommandError if in detached HEAD state
   */
  async getCurrentBranch(): Promise<string> {
    const result = await this.execGit(['symbolic-ref', '--short', 'HEAD']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to get current branch (detached HEAD?)', result.stderr);
    }

    return result.stdout.trim();
  }

  async checkoutBranch(branchName: string): Promise<void> {
    if (!(await this.branchExists(branchName))) {
      throw new BranchNotFoundError(branchName);
    }

    await this.execGitOrThrow(['checkout', branchName], `Failed to checkout branch ${branchName}`);
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    const result = await this.execGit(['merge-base', '--is-ancestor', ancestor, descendant]);

    if (result.exitCode === 0) return true;
    if (result.exitCode === 1) return false;
    throw new GitCommandError(`Failed to compare ${ancestor} with ${descendant}`, result.stderr);
  }

  async countCommits(from: string, to: string): Promise<number> {
    const result = await this.execGitOrThrow(
      ['rev-list', '--count', `${from}..${to}`],
      `Failed to count commits in ${from}..${to}`
    );
    const count = Number.parseInt(result.stdout.trim(), 10);
    if (Number.isNaN(count)) {
      throw new GitCommandError('Invalid git rev-list output', result.stdout);
    }
    return count;
  }

  /**
   * Retrieves commit history in a specific range
   *
   * @param from - Starting commit (exclusive)
   * @param to - Ending commit (inclusive)
   *
   * @example
   * const commits = await git.getCommitHistoryRange("pristine-upstream", "upstream/main", { maxCount: 10 });
   */
  async getCommitHistoryRange(
    from: string,
    to: string,
    options?: GetCommitHistoryOptions
  ): Promise<CommitInfo[]> {
    const args = ['log', `--format=${LOG_FORMAT}`];
    if (options?.maxCount) {
      args.push(`--max-count=${options.maxCount}`);
    }
    args.push(`${from}..${to}`);

    const result = await this.execGitOrThrow(args, `Failed to get commit history for ${from}..${to}`);
    return parseLogLines(result.stdout);
  }

  async getCommitParents(commit: string): Promise<string[]> {
    const result = await this.execGitOrThrow(
      ['rev-list', '--parents', '-n', '1', commit],
      `Failed to read parents of ${commit}`
    );
    return result.stdout.trim().split(/\s+/).slice(1);
  }

  async getLastCommitTouching(ref: string, filePath: string): Promise<CommitInfo | null> {
    const result = await this.execGit(['log', '-1', `--format=${LOG_FORMAT}`, ref, '--', filePath]);
    if (result.exitCode !== 0) {
      return null;
    }
    return parseLogLines(result.stdout)[0] ?? null;
  }

  /**
   * @throws FileNotFoundError if file doesn't exist in that commit
   */
  async getFileContent(commit: string, filePath: string): Promise<string> {
    const result = await this.execGit(['show', `${commit}:${filePath}`]);

    if (result.exitCode !== 0) {
      if (result.stderr.includes('does not exist') || result.stderr.includes('exists on disk, but not in')) {
        throw new FileNotFoundError(filePath, commit);
      }
      throw new GitCommandError(`Failed to get file content for ${filePath}`, result.stderr);
    }

    return result.stdout;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // MERGING
  // ═══════════════════════════════════════════════════════════════════════

  async merge(source: string, options: MergeOptions): Promise<MergeResult> {
    const args = ['merge', options.strategy === 'ff-only' ? '--ff-only' : '--no-ff'];
    if (options.strategy === 'no-ff') {
      if (options.message) {
        args.push('-m', options.message);
      } else {
        args.push('--no-edit');
      }
    }
    args.push(source);

    const result = await this.execGit(args);
    const output = result.stdout + result.stderr;

    if (result.exitCode !== 0) {
      if (output.includes('CONFLICT') || output.includes('Automatic merge failed') || output.includes('fix conflicts')) {
        const conflictedFiles = await this.getConflictedFiles();
        throw new MergeConflictError(conflictedFiles);
      }
      if (options.strategy === 'ff-only' && output.includes('Not possible to fast-forward')) {
        const branch = await this.getCurrentBranch();
        throw new NotFastForwardError(branch, source);
      }
      throw new GitCommandError(`Failed to merge ${source}`, result.stderr, `git ${args.join(' ')}`, result.stdout);
    }

    const commitHash = await this.getCommitHash('HEAD');
    if (output.includes('Already up to date') || output.includes('Already up-to-date')) {
      return { status: 'up-to-date', commitHash };
    }
    const status = options.strategy === 'ff-only' || output.includes('Fast-forward') ? 'fast-forward' : 'merged';
    return { status, commitHash };
  }

  async isMergeInProgress(): Promise<boolean> {
    const result = await this.execGit(['rev-parse', '-q', '--verify', 'MERGE_HEAD']);
    return result.exitCode === 0;
  }

  async mergeAbort(): Promise<void> {
    if (!(await this.isMergeInProgress())) {
      throw new MergeNotInProgressError();
    }
    await this.execGitOrThrow(['merge', '--abort'], 'Failed to abort merge');
  }

  async commitMerge(message?: string): Promise<string> {
    if (!(await this.isMergeInProgress())) {
      throw new MergeNotInProgressError();
    }

    const args = message ? ['commit', '-m', message] : ['commit', '--no-edit'];
    await this.execGitOrThrow(args, 'Failed to commit merge');

    return this.getCommitHash('HEAD');
  }

  /**
   * Returns the files with unresolved merge conflicts
   *
   * @example
   * const conflicts = await git.getConflictedFiles();
   * // => ["src/config/schema.ts"]
   */
  async getConflictedFiles(): Promise<string[]> {
    const result = await this.execGitOrThrow(
      ['diff', '--name-only', '--diff-filter=U'],
      'Failed to get conflicted files'
    );

    return result.stdout
      .trim()
      .split('\n')
      .filter((line) => line.length > 0);
  }

  async checkoutConflictVersion(filePath: string, side: ConflictSide): Promise<void> {
    await this.execGitOrThrow(
      ['checkout', `--${side}`, '--', filePath],
      `Failed to checkout ${side} version of ${filePath}`
    );
  }

  async hasConflictVersion(filePath: string, side: ConflictSide): Promise<boolean> {
    // Index stage 2 holds "ours", stage 3 holds "theirs"
    const stage = side === 'ours' ? 2 : 3;
    const result = await this.execGit(['rev-parse', '--verify', '--quiet', `:${stage}:${filePath}`]);
    return result.exitCode === 0;
  }

  async add(filePaths: string[]): Promise<void> {
    await this.execGitOrThrow(['add', '--', ...filePaths], 'Failed to add files');
  }

  async rm(filePaths: string[]): Promise<void> {
    await this.execGitOrThrow(['rm', '--quiet', '--', ...filePaths], 'Failed to remove files');
  }

  async getWorkingDiff(filePath: string): Promise<string> {
    const result = await this.execGitOrThrow(['diff', '--', filePath], `Failed to diff ${filePath}`);
    return result.stdout;
  }

  async readWorkingFile(filePath: string): Promise<string | null> {
    const repoRoot = await this.ensureRepoRoot();
    try {
      return await fs.readFile(path.join(repoRoot, filePath), 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REWRITES & TAGS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Resets the current branch to a specific commit, discarding all local changes
   */
  async resetHard(target: string): Promise<void> {
    const result = await this.execGit(['reset', '--hard', target]);

    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to reset --hard to ${target}`, result.stderr);
    }
  }

  /**
   * Creates an annotated tag so the tag carries its own creation date
   *
   * @throws TagAlreadyExistsError
   */
  async createTag(tagName: string, target: string, message: string): Promise<void> {
    if (await this.tagExists(tagName)) {
      throw new TagAlreadyExistsError(tagName);
    }
    await this.execGitOrThrow(['tag', '-a', tagName, '-m', message, target], `Failed to create tag ${tagName}`);
  }

  async tagExists(tagName: string): Promise<boolean> {
    const result = await this.execGit(['show-ref', '--verify', '--quiet', `refs/tags/${tagName}`]);
    return result.exitCode === 0;
  }

  async listTags(pattern: string): Promise<TagInfo[]> {
    const format = ['%(refname)', '%(objectname)', '%(*objectname)', '%(creatordate:iso-strict)', '%(contents:subject)']
      .join(FIELD_SEP);
    // The last --sort key is the primary one
    const result = await this.execGitOrThrow(
      ['for-each-ref', '--sort=-refname', '--sort=-creatordate', `--format=${format}`, `refs/tags/${pattern}`],
      `Failed to list tags matching ${pattern}`
    );

    return result.stdout
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => {
        const [refname = '', objectname = '', peeled = '', createdAt = '', message = ''] = line.split(FIELD_SEP);
        return {
          name: refname.replace(/^refs\/tags\//, ''),
          commit: peeled || objectname,
          createdAt,
          message,
        };
      });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PUBLISHING
  // ═══════════════════════════════════════════════════════════════════════

  async push(remote: string, refspec: string): Promise<void> {
    const result = await this.execGit(['push', remote, refspec]);

    if (result.exitCode !== 0) {
      if (isRejection(result.stdout + result.stderr)) {
        throw new PushRejectedError(remote, [refspec], result.stderr);
      }
      throw new GitCommandError(`Failed to push ${refspec} to ${remote}`, result.stderr);
    }
  }

  async pushTag(remote: string, tagName: string): Promise<void> {
    await this.push(remote, `refs/tags/${tagName}`);
  }

  async pushWithLease(remote: string, updates: LeasedRefUpdate[]): Promise<void> {
    if (updates.length === 0) {
      return;
    }

    const args = ['push', '--atomic'];
    for (const update of updates) {
      args.push(`--force-with-lease=refs/heads/${update.branch}:${update.expectedRemoteCommit}`);
    }
    args.push(remote);
    for (const update of updates) {
      args.push(`refs/heads/${update.branch}:refs/heads/${update.branch}`);
    }

    const result = await this.execGit(args);

    if (result.exitCode !== 0) {
      const branches = updates.map((update) => update.branch);
      if (isRejection(result.stdout + result.stderr)) {
        throw new PushRejectedError(remote, branches, result.stderr);
      }
      throw new GitCommandError(`Failed to push ${branches.join(', ')} to ${remote}`, result.stderr);
    }
  }
}
