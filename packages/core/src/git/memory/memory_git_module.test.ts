/**
 * MemoryGitModule Tests
 *
 * The in-memory commit graph stands in for a real repository throughout the
 * pipeline tests, so its semantics are pinned down here.
 */

import { MemoryGitModule } from './memory_git_module';
import {
  BranchNotFoundError,
  FileNotFoundError,
  GitCommandError,
  MergeConflictError,
  MergeNotInProgressError,
  NotFastForwardError,
  PushRejectedError,
  TagAlreadyExistsError,
} from '../errors';

describe('MemoryGitModule', () => {
  let git: MemoryGitModule;
  let root: string;

  beforeEach(() => {
    let tick = 0;
    git = new MemoryGitModule({ now: () => new Date(Date.UTC(2024, 4, 1, 10, 0, tick++)) });
    root = git.seedCommit({ 'README.md': 'hello\n', 'src/app.ts': 'v1\n' }, 'initial');
    git.setBranch('main', root);
    git.setHead('main');
  });

  describe('1. History', () => {
    it('should track ancestry and count commits in a range', async () => {
      const c2 = git.commitOnBranch('main', { 'a.txt': 'a' }, 'feat: a');
      const c3 = git.commitOnBranch('main', { 'b.txt': 'b' }, 'fix: b');

      expect(await git.isAncestor(root, c3)).toBe(true);
      expect(await git.isAncestor(c3, root)).toBe(false);
      expect(await git.isAncestor(c2, c2)).toBe(true);
      expect(await git.countCommits(root, 'main')).toBe(2);

      const history = await git.getCommitHistoryRange(root, 'main');
      expect(history.map((commit) => commit.message)).toEqual(['fix: b', 'feat: a']);
      expect(history[0]?.date).toBe('2024-05-01T10:00:02.000Z');
    });

    it('should find the last commit touching a file', async () => {
      git.commitOnBranch('main', { 'src/app.ts': 'v2\n' }, 'change app');
      git.commitOnBranch('main', { 'other.txt': 'x' }, 'unrelated');

      expect((await git.getLastCommitTouching('main', 'src/app.ts'))?.message).toBe('change app');
      expect(await git.getLastCommitTouching('main', 'missing.txt')).toBeNull();
    });

    it('should read file content per commit', async () => {
      expect(await git.getFileContent(root, 'README.md')).toBe('hello\n');
      await expect(git.getFileContent(root, 'nope')).rejects.toThrow(FileNotFoundError);
    });
  });

  describe('2. Remotes', () => {
    beforeEach(() => {
      git.addRemote('upstream', 'https://example.com/upstream.git');
      git.setRemoteBranch('upstream', 'main', root);
    });

    it('should expose remote branches only after fetch', async () => {
      const next = git.commitOnRemote('upstream', 'main', { 'new.txt': 'n' }, 'feat: new');

      expect(await git.resolveRef('upstream/main')).toBeNull();
      await git.fetch('upstream');
      expect(await git.resolveRef('upstream/main')).toBe(next);
    });

    it('should fail fetch for unknown remotes and injected failures', async () => {
      await expect(git.fetch('nowhere')).rejects.toThrow(GitCommandError);
      git.setFetchFailure('upstream', 'fatal: unable to access');
      await expect(git.fetch('upstream')).rejects.toThrow('Failed to fetch from upstream');
    });
  });

  describe('3. Merging', () => {
    it('should fast-forward with ff-only and refuse diverged branches', async () => {
      const ahead = git.seedCommit({ 'x.txt': 'x' }, 'ahead', [root]);
      const result = await git.merge(ahead, { strategy: 'ff-only' });
      expect(result).toEqual({ status: 'fast-forward', commitHash: ahead });
      expect(await git.readWorkingFile('x.txt')).toBe('x');

      const sibling = git.seedCommit({ 'y.txt': 'y' }, 'sibling', [root]);
      await expect(git.merge(sibling, { strategy: 'ff-only' })).rejects.toThrow(NotFastForwardError);
    });

    it('should report up-to-date when the source is already contained', async () => {
      const result = await git.merge(root, { strategy: 'no-ff' });
      expect(result).toEqual({ status: 'up-to-date', commitHash: root });
    });

    it('should create a two-parent merge commit for clean no-ff merges', async () => {
      const theirs = git.seedCommit({ 'up.txt': 'up' }, 'upstream change', [root]);
      git.commitOnBranch('main', { 'local.txt': 'local' }, 'local change');

      const result = await git.merge(theirs, { strategy: 'no-ff', message: 'Sync: upstream' });

      expect(result.status).toBe('merged');
      expect((await git.getCommitParents(result.commitHash))[1]).toBe(theirs);
      expect(git.getCommitMessage(result.commitHash)).toBe('Sync: upstream');
      expect(await git.readWorkingFile('up.txt')).toBe('up');
      expect(await git.readWorkingFile('local.txt')).toBe('local');
    });

    it('should stop on conflicts with markers in the working tree', async () => {
      const theirs = git.seedCommit({ 'src/app.ts': 'upstream\n' }, 'upstream edit', [root]);
      git.commitOnBranch('main', { 'src/app.ts': 'local\n' }, 'local edit');

      const error = await git.merge(theirs, { strategy: 'no-ff' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MergeConflictError);
      expect(await git.isMergeInProgress()).toBe(true);
      expect(await git.getConflictedFiles()).toEqual(['src/app.ts']);
      expect(await git.readWorkingFile('src/app.ts')).toBe(
        `<<<<<<< HEAD\nlocal\n=======\nupstream\n>>>>>>> ${theirs}\n`
      );
      expect(await git.hasUncommittedChanges()).toBe(true);
    });

    it('should resolve a conflict by checking out a side and committing', async () => {
      const theirs = git.seedCommit({ 'src/app.ts': 'upstream\n' }, 'upstream edit', [root]);
      const localTip = git.commitOnBranch('main', { 'src/app.ts': 'local\n' }, 'local edit');
      await git.merge(theirs, { strategy: 'no-ff', message: 'Sync' }).catch(() => undefined);

      await expect(git.commitMerge()).rejects.toThrow(GitCommandError);

      await git.checkoutConflictVersion('src/app.ts', 'theirs');
      await git.add(['src/app.ts']);
      const merged = await git.commitMerge();

      expect(await git.getCommitParents(merged)).toEqual([localTip, theirs]);
      expect(git.getCommitMessage(merged)).toBe('Sync');
      expect(await git.getFileContent(merged, 'src/app.ts')).toBe('upstream\n');
      expect(await git.isMergeInProgress()).toBe(false);
    });

    it('should treat modify/delete as a conflict with one side missing', async () => {
      const theirs = git.seedCommit({ 'src/app.ts': null }, 'delete app', [root]);
      git.commitOnBranch('main', { 'src/app.ts': 'local\n' }, 'local edit');
      await git.merge(theirs, { strategy: 'no-ff' }).catch(() => undefined);

      expect(await git.hasConflictVersion('src/app.ts', 'ours')).toBe(true);
      expect(await git.hasConflictVersion('src/app.ts', 'theirs')).toBe(false);
      await expect(git.checkoutConflictVersion('src/app.ts', 'theirs')).rejects.toThrow(GitCommandError);

      await git.rm(['src/app.ts']);
      expect(await git.getConflictedFiles()).toEqual([]);
    });

    it('should restore the original head on abort', async () => {
      const theirs = git.seedCommit({ 'src/app.ts': 'upstream\n' }, 'upstream edit', [root]);
      const localTip = git.commitOnBranch('main', { 'src/app.ts': 'local\n' }, 'local edit');
      await git.merge(theirs, { strategy: 'no-ff' }).catch(() => undefined);

      await git.mergeAbort();

      expect(await git.getCommitHash('HEAD')).toBe(localTip);
      expect(await git.readWorkingFile('src/app.ts')).toBe('local\n');
      await expect(git.mergeAbort()).rejects.toThrow(MergeNotInProgressError);
    });
  });

  describe('4. Tags and resets', () => {
    it('should list matching tags newest first', async () => {
      await git.createTag('backup/staging-1', root, 'first');
      await git.createTag('backup/staging-2', root, 'second');
      await git.createTag('emergency/staging-1', root, 'other');

      const tags = await git.listTags('backup/*');

      expect(tags.map((tag) => tag.name)).toEqual(['backup/staging-2', 'backup/staging-1']);
      expect(tags[0]).toEqual({
        name: 'backup/staging-2',
        commit: root,
        createdAt: '2024-05-01T10:00:02.000Z',
        message: 'second',
      });
      await expect(git.createTag('backup/staging-1', root, 'dup')).rejects.toThrow(TagAlreadyExistsError);
    });

    it('should reset the current branch and working tree', async () => {
      git.commitOnBranch('main', { 'src/app.ts': 'v2\n' }, 'v2');
      git.writeWorkingFile('src/app.ts', 'dirty');
      expect(await git.hasUncommittedChanges()).toBe(true);

      await git.resetHard(root);

      expect(await git.getCommitHash('main')).toBe(root);
      expect(await git.readWorkingFile('src/app.ts')).toBe('v1\n');
      expect(await git.hasUncommittedChanges()).toBe(false);
    });

    it('should ignore untracked files when checking for changes', async () => {
      git.writeWorkingFile('scratch.txt', 'untracked');
      expect(await git.hasUncommittedChanges()).toBe(false);
    });

    it('should refuse to checkout unknown branches', async () => {
      await expect(git.checkoutBranch('nope')).rejects.toThrow(BranchNotFoundError);
    });
  });

  describe('5. Publishing', () => {
    beforeEach(() => {
      git.addRemote('origin', 'https://example.com/fork.git');
      git.setRemoteBranch('origin', 'main', root);
    });

    it('should push fast-forwards and reject non-fast-forwards', async () => {
      const next = git.commitOnBranch('main', { 'a.txt': 'a' }, 'a');
      await git.push('origin', 'main');
      expect(git.getRemoteBranch('origin', 'main')).toBe(next);

      await git.resetHard(root);
      await expect(git.push('origin', 'main')).rejects.toThrow(PushRejectedError);
    });

    it('should apply all lease updates or none', async () => {
      git.setBranch('staging', root);
      git.setRemoteBranch('origin', 'staging', root);
      const newMain = git.commitOnBranch('main', { 'a.txt': 'a' }, 'a');

      await expect(
        git.pushWithLease('origin', [
          { branch: 'main', expectedRemoteCommit: root },
          { branch: 'staging', expectedRemoteCommit: 'stale' },
        ])
      ).rejects.toThrow(PushRejectedError);
      expect(git.getRemoteBranch('origin', 'main')).toBe(root);

      await git.pushWithLease('origin', [
        { branch: 'main', expectedRemoteCommit: root },
        { branch: 'staging', expectedRemoteCommit: root },
      ]);
      expect(git.getRemoteBranch('origin', 'main')).toBe(newMain);
      expect(await git.resolveRef('origin/main')).toBe(newMain);
    });

    it('should push tags to the remote', async () => {
      await git.createTag('backup/main-1', root, 'backup');
      await git.pushTag('origin', 'backup/main-1');
      expect(git.getRemoteTags('origin')).toEqual(['backup/main-1']);
    });
  });
});
