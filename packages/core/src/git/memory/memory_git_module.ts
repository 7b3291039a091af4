/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Keeps a real commit graph in memory: every commit carries a full snapshot
 * of its tree, branches and tags are pointers into the graph, and remotes
 * hold their own branch and tag maps that only reach the local repository
 * through fetch. Merges are three-way per file, so conflicts, resolution and
 * lease-protected pushes behave the way they do against a real repository.
 *
 * Test Helpers:
 * - seedCommit(files, message, parents): Create a commit without moving refs
 * - setBranch(name, commit): Create or move a local branch
 * - addRemote(name, url) / setRemoteBranch(remote, branch, commit)
 * - commitOnRemote(remote, branch, files, message): Advance a branch on a remote
 * - commitOnBranch(branch, files, message): Advance a local branch
 * - writeWorkingFile(path, content): Edit the working tree
 * - setFetchFailure(remote, message): Make fetch fail
 * - getRemoteBranch / getRemoteTags: Inspect remote state
 *
 * @module git/memory
 */

import { createHash } from 'crypto';
import picomatch from 'picomatch';
import type { IGitModule } from '../git_module';
import type {
  CommitInfo,
  ConflictSide,
  GetCommitHistoryOptions,
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

type Tree = Map<string, string>;

/** File changes for a commit; null deletes the path */
export type FileChanges = Record<string, string | null>;

interface MemoryCommit {
  hash: string;
  seq: number;
  parents: string[];
  message: string;
  author: string;
  date: string;
  tree: Tree;
}

interface MemoryTag {
  commit: string;
  createdAt: string;
  message: string;
}

interface MemoryRemote {
  url: string;
  branches: Map<string, string>;
  tags: Map<string, MemoryTag>;
  fetchFailure: string | null;
}

interface MergeState {
  sourceName: string;
  originalHead: string;
  mergeHead: string;
  message: string;
  oursTree: Tree;
  theirsTree: Tree;
  unresolved: Set<string>;
}

interface MemoryGitState {
  isRepository: boolean;
  repoRoot: string;
  commits: Map<string, MemoryCommit>;
  branches: Map<string, string>;
  head: string;
  worktree: Tree;
  tags: Map<string, MemoryTag>;
  remotes: Map<string, MemoryRemote>;
  trackingRefs: Map<string, string>;
  merge: MergeState | null;
}

export type MemoryGitModuleOptions = {
  repoRoot?: string;
  /** Clock for commit and tag dates */
  now?: () => Date;
  author?: string;
};

/**
 * MemoryGitModule - In-memory Git for unit tests
 */
export class MemoryGitModule implements IGitModule {
  private state: MemoryGitState;
  private readonly now: () => Date;
  private readonly author: string;
  private seq = 0;

  constructor(options: MemoryGitModuleOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.author = options.author ?? 'Test User <test@example.com>';
    this.state = {
      isRepository: true,
      repoRoot: options.repoRoot ?? '/test/repo',
      commits: new Map(),
      branches: new Map(),
      head: 'main',
      worktree: new Map(),
      tags: new Map(),
      remotes: new Map(),
      trackingRefs: new Map(),
      merge: null,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setIsRepository(value: boolean): void {
    this.state.isRepository = value;
  }

  /**
   * Creates a commit whose tree is the first parent's tree plus `files`.
   * No ref moves.
   */
  seedCommit(files: FileChanges, message: string, parents: string[] = []): string {
    const firstParent = parents[0];
    const base = firstParent ? this.requireCommit(firstParent).tree : new Map<string, string>();
    return this.createCommit(applyChanges(base, files), message, parents);
  }

  setBranch(name: string, commit: string): void {
    this.requireCommit(commit);
    this.state.branches.set(name, commit);
    if (name === this.state.head) {
      this.state.worktree = new Map(this.requireCommit(commit).tree);
    }
  }

  /** Points HEAD at a branch without touching anything else */
  setHead(branchName: string): void {
    this.state.head = branchName;
    const tip = this.state.branches.get(branchName);
    this.state.worktree = tip ? new Map(this.requireCommit(tip).tree) : new Map();
  }

  addRemote(name: string, url: string): void {
    this.state.remotes.set(name, { url, branches: new Map(), tags: new Map(), fetchFailure: null });
  }

  setRemoteBranch(remote: string, branch: string, commit: string): void {
    this.requireCommit(commit);
    this.requireRemote(remote).branches.set(branch, commit);
  }

  /** Commits on top of a remote branch; the local repository sees it after fetch */
  commitOnRemote(remote: string, branch: string, files: FileChanges, message: string): string {
    const target = this.requireRemote(remote);
    const tip = target.branches.get(branch);
    const hash = this.seedCommit(files, message, tip ? [tip] : []);
    target.branches.set(branch, hash);
    return hash;
  }

  commitOnBranch(branch: string, files: FileChanges, message: string): string {
    const tip = this.state.branches.get(branch);
    const hash = this.seedCommit(files, message, tip ? [tip] : []);
    this.setBranch(branch, hash);
    return hash;
  }

  writeWorkingFile(filePath: string, content: string | null): void {
    if (content === null) {
      this.state.worktree.delete(filePath);
    } else {
      this.state.worktree.set(filePath, content);
    }
  }

  setFetchFailure(remote: string, message: string | null): void {
    this.requireRemote(remote).fetchFailure = message;
  }

  getRemoteBranch(remote: string, branch: string): string | undefined {
    return this.requireRemote(remote).branches.get(branch);
  }

  getRemoteTags(remote: string): string[] {
    return [...this.requireRemote(remote).tags.keys()].sort();
  }

  getBranch(name: string): string | undefined {
    return this.state.branches.get(name);
  }

  getCommitMessage(commit: string): string {
    return this.requireCommit(commit).message;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  private createCommit(tree: Tree, message: string, parents: string[]): string {
    this.seq += 1;
    const hash = createHash('sha1')
      .update(`${this.seq}\0${parents.join(' ')}\0${message}`)
      .digest('hex');
    this.state.commits.set(hash, {
      hash,
      seq: this.seq,
      parents,
      message,
      author: this.author,
      date: this.now().toISOString(),
      tree: new Map(tree),
    });
    return hash;
  }

  private requireCommit(hash: string): MemoryCommit {
    const commit = this.state.commits.get(hash);
    if (!commit) {
      throw new RefNotFoundError(hash);
    }
    return commit;
  }

  private requireRemote(name: string): MemoryRemote {
    const remote = this.state.remotes.get(name);
    if (!remote) {
      throw new GitCommandError(`'${name}' does not appear to be a git repository`, `fatal: '${name}' does not appear to be a git repository`);
    }
    return remote;
  }

  private requireRepository(): void {
    if (!this.state.isRepository) {
      throw new GitCommandError('Not in a Git repository', 'fatal: not a git repository');
    }
  }

  private headCommit(): string {
    const tip = this.state.branches.get(this.state.head);
    if (!tip) {
      throw new RefNotFoundError('HEAD');
    }
    return tip;
  }

  private resolve(ref: string): string | null {
    if (ref === 'HEAD') {
      return this.state.branches.get(this.state.head) ?? null;
    }
    if (ref === 'MERGE_HEAD') {
      return this.state.merge?.mergeHead ?? null;
    }
    const candidates: Array<string | undefined> = [
      this.state.branches.get(ref.replace(/^refs\/heads\//, '')),
      this.state.tags.get(ref.replace(/^refs\/tags\//, ''))?.commit,
      this.state.trackingRefs.get(ref.replace(/^refs\/remotes\//, '')),
    ];
    const found = candidates.find((value) => value !== undefined);
    if (found) {
      return found;
    }
    if (/^[0-9a-f]{4,40}$/.test(ref)) {
      const matches = [...this.state.commits.keys()].filter((hash) => hash.startsWith(ref));
      if (matches.length === 1) {
        return matches[0] ?? null;
      }
    }
    return null;
  }

  private resolveOrThrow(ref: string): string {
    const hash = this.resolve(ref);
    if (!hash) {
      throw new RefNotFoundError(ref);
    }
    return hash;
  }

  private ancestors(hash: string): Set<string> {
    const seen = new Set<string>();
    const queue = [hash];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      queue.push(...this.requireCommit(current).parents);
    }
    return seen;
  }

  private mergeBase(ours: string, theirs: string): string | null {
    const theirAncestors = this.ancestors(theirs);
    const seen = new Set<string>();
    const queue = [ours];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      if (theirAncestors.has(current)) return current;
      seen.add(current);
      queue.push(...this.requireCommit(current).parents);
    }
    return null;
  }

  private toCommitInfo(commit: MemoryCommit): CommitInfo {
    return {
      hash: commit.hash,
      message: commit.message.split('\n')[0] ?? '',
      author: commit.author,
      date: commit.date,
    };
  }

  private moveHead(commit: string): void {
    this.state.branches.set(this.state.head, commit);
    this.state.worktree = new Map(this.requireCommit(commit).tree);
  }

  private requireMerge(): MergeState {
    if (!this.state.merge) {
      throw new MergeNotInProgressError();
    }
    return this.state.merge;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPOSITORY
  // ═══════════════════════════════════════════════════════════════════════

  async isRepository(): Promise<boolean> {
    return this.state.isRepository;
  }

  async getRepoRoot(): Promise<string> {
    this.requireRepository();
    return this.state.repoRoot;
  }

  async getGitDir(): Promise<string> {
    this.requireRepository();
    return `${this.state.repoRoot}/.git`;
  }

  async isRemoteConfigured(remoteName: string): Promise<boolean> {
    return this.state.remotes.has(remoteName);
  }

  async getRemoteUrl(remoteName: string): Promise<string | null> {
    return this.state.remotes.get(remoteName)?.url ?? null;
  }

  async hasUncommittedChanges(): Promise<boolean> {
    if (this.state.merge) {
      return true;
    }
    const tip = this.state.branches.get(this.state.head);
    if (!tip) {
      return false;
    }
    const tree = this.requireCommit(tip).tree;
    for (const [filePath, content] of tree) {
      if (this.state.worktree.get(filePath) !== content) {
        return true;
      }
    }
    return false;
  }

  async fetch(remote: string): Promise<void> {
    const target = this.requireRemote(remote);
    if (target.fetchFailure) {
      throw new GitCommandError(`Failed to fetch from ${remote}`, target.fetchFailure);
    }
    for (const [branch, commit] of target.branches) {
      this.state.trackingRefs.set(`${remote}/${branch}`, commit);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REFS & HISTORY
  // ═══════════════════════════════════════════════════════════════════════

  async resolveRef(ref: string): Promise<string | null> {
    return this.resolve(ref);
  }

  async getCommitHash(ref: string): Promise<string> {
    return this.resolveOrThrow(ref);
  }

  async branchExists(branchName: string): Promise<boolean> {
    return this.state.branches.has(branchName);
  }

  async getCurrentBranch(): Promise<string> {
    return this.state.head;
  }

  async checkoutBranch(branchName: string): Promise<void> {
    const tip = this.state.branches.get(branchName);
    if (!tip) {
      throw new BranchNotFoundError(branchName);
    }
    if (this.state.merge) {
      throw new GitCommandError(`Failed to checkout branch ${branchName}`, 'error: you need to resolve your current index first');
    }
    this.state.head = branchName;
    this.state.worktree = new Map(this.requireCommit(tip).tree);
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    return this.ancestors(this.resolveOrThrow(descendant)).has(this.resolveOrThrow(ancestor));
  }

  async countCommits(from: string, to: string): Promise<number> {
    return (await this.getCommitHistoryRange(from, to)).length;
  }

  async getCommitHistoryRange(
    from: string,
    to: string,
    options?: GetCommitHistoryOptions
  ): Promise<CommitInfo[]> {
    const excluded = this.ancestors(this.resolveOrThrow(from));
    const commits = [...this.ancestors(this.resolveOrThrow(to))]
      .filter((hash) => !excluded.has(hash))
      .map((hash) => this.requireCommit(hash))
      .sort((a, b) => b.seq - a.seq)
      .map((commit) => this.toCommitInfo(commit));

    return options?.maxCount ? commits.slice(0, options.maxCount) : commits;
  }

  async getCommitParents(commit: string): Promise<string[]> {
    return [...this.requireCommit(this.resolveOrThrow(commit)).parents];
  }

  async getLastCommitTouching(ref: string, filePath: string): Promise<CommitInfo | null> {
    const tip = this.resolve(ref);
    if (!tip) {
      return null;
    }
    const history = [...this.ancestors(tip)]
      .map((hash) => this.requireCommit(hash))
      .sort((a, b) => b.seq - a.seq);

    for (const commit of history) {
      const firstParent = commit.parents[0];
      const before = firstParent ? this.requireCommit(firstParent).tree.get(filePath) : undefined;
      if (commit.tree.get(filePath) !== before) {
        return this.toCommitInfo(commit);
      }
    }
    return null;
  }

  async getFileContent(commit: string, filePath: string): Promise<string> {
    const hash = this.resolveOrThrow(commit);
    const content = this.requireCommit(hash).tree.get(filePath);
    if (content === undefined) {
      throw new FileNotFoundError(filePath, commit);
    }
    return content;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // MERGING
  // ═══════════════════════════════════════════════════════════════════════

  async merge(source: string, options: MergeOptions): Promise<MergeResult> {
    if (this.state.merge) {
      throw new GitCommandError(`Failed to merge ${source}`, 'fatal: You have not concluded your merge (MERGE_HEAD exists).');
    }
    const ours = this.headCommit();
    const theirs = this.resolveOrThrow(source);

    if (this.ancestors(ours).has(theirs)) {
      return { status: 'up-to-date', commitHash: ours };
    }

    if (options.strategy === 'ff-only') {
      if (!this.ancestors(theirs).has(ours)) {
        throw new NotFastForwardError(this.state.head, source);
      }
      this.moveHead(theirs);
      return { status: 'fast-forward', commitHash: theirs };
    }

    const base = this.mergeBase(ours, theirs);
    const baseTree = base ? this.requireCommit(base).tree : new Map<string, string>();
    const oursTree = this.requireCommit(ours).tree;
    const theirsTree = this.requireCommit(theirs).tree;
    const { tree, conflicts } = threeWayMerge(baseTree, oursTree, theirsTree, source);
    const message = options.message ?? `Merge branch '${source}' into ${this.state.head}`;

    if (conflicts.length > 0) {
      this.state.worktree = tree;
      this.state.merge = {
        sourceName: source,
        originalHead: ours,
        mergeHead: theirs,
        message,
        oursTree,
        theirsTree,
        unresolved: new Set(conflicts),
      };
      throw new MergeConflictError(conflicts);
    }

    const hash = this.createCommit(tree, message, [ours, theirs]);
    this.moveHead(hash);
    return { status: 'merged', commitHash: hash };
  }

  async isMergeInProgress(): Promise<boolean> {
    return this.state.merge !== null;
  }

  async mergeAbort(): Promise<void> {
    const merge = this.requireMerge();
    this.state.merge = null;
    this.moveHead(merge.originalHead);
  }

  async commitMerge(message?: string): Promise<string> {
    const merge = this.requireMerge();
    if (merge.unresolved.size > 0) {
      throw new GitCommandError(
        'Failed to commit merge',
        'error: Committing is not possible because you have unmerged files.'
      );
    }
    const hash = this.createCommit(this.state.worktree, message ?? merge.message, [merge.originalHead, merge.mergeHead]);
    this.state.merge = null;
    this.moveHead(hash);
    return hash;
  }

  async getConflictedFiles(): Promise<string[]> {
    return this.state.merge ? [...this.state.merge.unresolved].sort() : [];
  }

  async checkoutConflictVersion(filePath: string, side: ConflictSide): Promise<void> {
    const merge = this.requireMerge();
    const content = (side === 'ours' ? merge.oursTree : merge.theirsTree).get(filePath);
    if (content === undefined) {
      throw new GitCommandError(
        `Failed to checkout ${side} version of ${filePath}`,
        `error: path '${filePath}' does not have ${side === 'ours' ? 'our' : 'their'} version`
      );
    }
    this.state.worktree.set(filePath, content);
  }

  async hasConflictVersion(filePath: string, side: ConflictSide): Promise<boolean> {
    const merge = this.requireMerge();
    return (side === 'ours' ? merge.oursTree : merge.theirsTree).has(filePath);
  }

  async add(filePaths: string[]): Promise<void> {
    for (const filePath of filePaths) {
      if (!this.state.worktree.has(filePath)) {
        throw new GitCommandError('Failed to add files', `fatal: pathspec '${filePath}' did not match any files`);
      }
      this.state.merge?.unresolved.delete(filePath);
    }
  }

  async rm(filePaths: string[]): Promise<void> {
    for (const filePath of filePaths) {
      this.state.worktree.delete(filePath);
      this.state.merge?.unresolved.delete(filePath);
    }
  }

  async getWorkingDiff(filePath: string): Promise<string> {
    const tip = this.headCommit();
    const before = this.requireCommit(tip).tree.get(filePath);
    const after = this.state.worktree.get(filePath);
    if (before === after) {
      return '';
    }
    const lines = [`--- a/${filePath}`, `+++ b/${filePath}`];
    for (const line of splitLines(before)) lines.push(`-${line}`);
    for (const line of splitLines(after)) lines.push(`+${line}`);
    return `${lines.join('\n')}\n`;
  }

  async readWorkingFile(filePath: string): Promise<string | null> {
    return this.state.worktree.get(filePath) ?? null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REWRITES & TAGS
  // ═══════════════════════════════════════════════════════════════════════

  async resetHard(target: string): Promise<void> {
    const hash = this.resolveOrThrow(target);
    this.state.merge = null;
    this.moveHead(hash);
  }

  async createTag(tagName: string, target: string, message: string): Promise<void> {
    if (this.state.tags.has(tagName)) {
      throw new TagAlreadyExistsError(tagName);
    }
    this.state.tags.set(tagName, {
      commit: this.resolveOrThrow(target),
      createdAt: this.now().toISOString(),
      message,
    });
  }

  async tagExists(tagName: string): Promise<boolean> {
    return this.state.tags.has(tagName);
  }

  async listTags(pattern: string): Promise<TagInfo[]> {
    const isMatch = picomatch(pattern);
    return [...this.state.tags.entries()]
      .filter(([name]) => isMatch(name))
      .map(([name, tag]) => ({ name, ...tag }))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.name.localeCompare(a.name));
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PUBLISHING
  // ═══════════════════════════════════════════════════════════════════════

  async push(remote: string, refspec: string): Promise<void> {
    const target = this.requireRemote(remote);

    if (refspec.startsWith('refs/tags/')) {
      const tagName = refspec.slice('refs/tags/'.length);
      const tag = this.state.tags.get(tagName);
      if (!tag) {
        throw new GitCommandError(`Failed to push ${refspec} to ${remote}`, `error: src refspec ${refspec} does not match any`);
      }
      const existing = target.tags.get(tagName);
      if (existing && existing.commit !== tag.commit) {
        throw new PushRejectedError(remote, [refspec], '! [rejected] (already exists)');
      }
      target.tags.set(tagName, { ...tag });
      return;
    }

    const branch = refspec.replace(/^refs\/heads\//, '');
    const local = this.state.branches.get(branch);
    if (!local) {
      throw new GitCommandError(`Failed to push ${refspec} to ${remote}`, `error: src refspec ${refspec} does not match any`);
    }
    const current = target.branches.get(branch);
    if (current && !this.ancestors(local).has(current)) {
      throw new PushRejectedError(remote, [refspec], '! [rejected] (non-fast-forward)');
    }
    target.branches.set(branch, local);
    this.state.trackingRefs.set(`${remote}/${branch}`, local);
  }

  async pushTag(remote: string, tagName: string): Promise<void> {
    await this.push(remote, `refs/tags/${tagName}`);
  }

  async pushWithLease(remote: string, updates: LeasedRefUpdate[]): Promise<void> {
    const target = this.requireRemote(remote);
    const branches = updates.map((update) => update.branch);

    for (const update of updates) {
      if (!this.state.branches.has(update.branch)) {
        throw new GitCommandError(`Failed to push ${branches.join(', ')} to ${remote}`, `error: src refspec ${update.branch} does not match any`);
      }
      const current = target.branches.get(update.branch) ?? '';
      if (current !== update.expectedRemoteCommit) {
        throw new PushRejectedError(remote, branches, `! [rejected] ${update.branch} (stale info)`);
      }
    }

    for (const update of updates) {
      const local = this.state.branches.get(update.branch);
      if (local) {
        target.branches.set(update.branch, local);
        this.state.trackingRefs.set(`${remote}/${update.branch}`, local);
      }
    }
  }
}

function applyChanges(base: Tree, files: FileChanges): Tree {
  const tree = new Map(base);
  for (const [filePath, content] of Object.entries(files)) {
    if (content === null) {
      tree.delete(filePath);
    } else {
      tree.set(filePath, content);
    }
  }
  return tree;
}

function splitLines(content: string | undefined): string[] {
  if (content === undefined || content === '') return [];
  return content.replace(/\n$/, '').split('\n');
}

function withTrailingNewline(content: string): string {
  return content.endsWith('\n') || content === '' ? content : `${content}\n`;
}

/**
 * Whole-file three-way merge. A path changed on both sides to different
 * contents is a conflict; the working copy gets conflict markers, or the
 * surviving side's content for modify/delete conflicts.
 */
function threeWayMerge(base: Tree, ours: Tree, theirs: Tree, sourceName: string): { tree: Tree; conflicts: string[] } {
  const tree: Tree = new Map();
  const conflicts: string[] = [];
  const paths = new Set([...base.keys(), ...ours.keys(), ...theirs.keys()]);

  for (const filePath of [...paths].sort()) {
    const b = base.get(filePath);
    const o = ours.get(filePath);
    const t = theirs.get(filePath);

    let merged: string | undefined;
    if (o === t) {
      merged = o;
    } else if (o === b) {
      merged = t;
    } else if (t === b) {
      merged = o;
    } else {
      conflicts.push(filePath);
      if (o === undefined || t === undefined) {
        merged = o ?? t;
      } else {
        merged = `<<<<<<< HEAD\n${withTrailingNewline(o)}=======\n${withTrailingNewline(t)}>>>>>>> ${sourceName}\n`;
      }
    }

    if (merged !== undefined) {
      tree.set(filePath, merged);
    }
  }

  return { tree, conflicts };
}
