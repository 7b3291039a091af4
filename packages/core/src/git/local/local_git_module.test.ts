/**
 * LocalGitModule Tests
 *
 * The git CLI is replaced by a scripted execCommand: each test registers the
 * responses for the exact argument lists it expects and asserts on the
 * commands that were issued.
 */

import { LocalGitModule } from './local_git_module';
import {
  BranchNotFoundError,
  GitCommandError,
  MergeConflictError,
  MergeNotInProgressError,
  NotFastForwardError,
  PushRejectedError,
  RefNotFoundError,
  TagAlreadyExistsError,
} from '../errors';
import type { ExecOptions, ExecResult } from '../types';

type Call = { command: string; args: string[]; options?: ExecOptions };

function ok(stdout = ''): ExecResult {
  return { exitCode: 0, stdout, stderr: '' };
}

function fail(stderr = '', exitCode = 1, stdout = ''): ExecResult {
  return { exitCode, stdout, stderr };
}

function createScriptedGit() {
  const responses = new Map<string, ExecResult[]>();
  const calls: Call[] = [];

  const respond = (args: string[], ...results: ExecResult[]) => {
    responses.set(args.join(' '), results);
  };

  const execCommand = jest.fn(async (command: string, args: string[], options?: ExecOptions) => {
    calls.push({ command, args, options });
    const queue = responses.get(args.join(' '));
    if (!queue || queue.length === 0) {
      return fail(`unexpected command: ${args.join(' ')}`, 128);
    }
    const next = queue.length > 1 ? queue.shift() : queue[0];
    return next ?? fail('', 128);
  });

  const git = new LocalGitModule({ repoRoot: '/repo', execCommand });
  return { git, respond, calls, execCommand };
}

describe('LocalGitModule', () => {
  describe('construction', () => {
    it('should run every command in the repository root', async () => {
      const { git, respond, calls } = createScriptedGit();
      respond(['symbolic-ref', '--short', 'HEAD'], ok('staging\n'));

      expect(await git.getCurrentBranch()).toBe('staging');
      expect(calls[0]).toEqual({
        command: 'git',
        args: ['symbolic-ref', '--short', 'HEAD'],
        options: { cwd: '/repo' },
      });
    });

    it('should auto-detect the repository root when none is given', async () => {
      const execCommand = jest.fn(async (_command: string, args: string[]) => {
        if (args[0] === 'rev-parse' && args[1] === '--show-toplevel') return ok('/detected\n');
        return ok('true\n');
      });
      const git = new LocalGitModule({ execCommand });

      expect(await git.getRepoRoot()).toBe('/detected');
    });
  });

  describe('repository queries', () => {
    it('should report a work tree only when git answers true', async () => {
      const { git, respond } = createScriptedGit();
      respond(['rev-parse', '--is-inside-work-tree'], ok('true\n'));
      expect(await git.isRepository()).toBe(true);

      respond(['rev-parse', '--is-inside-work-tree'], fail('fatal: not a git repository', 128));
      expect(await git.isRepository()).toBe(false);
    });

    it('should list remotes to check configuration', async () => {
      const { git, respond } = createScriptedGit();
      respond(['remote'], ok('origin\nupstream\n'));

      expect(await git.isRemoteConfigured('upstream')).toBe(true);
      expect(await git.isRemoteConfigured('fork')).toBe(false);
    });

    it('should ignore untracked files when checking for changes', async () => {
      const { git, respond, calls } = createScriptedGit();
      respond(['status', '--porcelain', '--untracked-files=no'], ok(''));

      expect(await git.hasUncommittedChanges()).toBe(false);
      expect(calls[0]?.args).toEqual(['status', '--porcelain', '--untracked-files=no']);

      respond(['status', '--porcelain', '--untracked-files=no'], ok(' M src/app.ts\n'));
      expect(await git.hasUncommittedChanges()).toBe(true);
    });

    it('should throw GitCommandError when fetch fails', async () => {
      const { git, respond } = createScriptedGit();
      respond(['fetch', 'upstream'], fail('fatal: unable to access'));

      await expect(git.fetch('upstream')).rejects.toThrow(GitCommandError);
      await expect(git.fetch('upstream')).rejects.toThrow('Failed to fetch from upstream');
    });
  });

  describe('refs and history', () => {
    it('should resolve refs to commits and return null for unknown refs', async () => {
      const { git, respond } = createScriptedGit();
      respond(['rev-parse', '--verify', '--quiet', 'staging^{commit}'], ok('abc123\n'));
      respond(['rev-parse', '--verify', '--quiet', 'missing^{commit}'], fail('', 1));

      expect(await git.resolveRef('staging')).toBe('abc123');
      expect(await git.resolveRef('missing')).toBeNull();
      await expect(git.getCommitHash('missing')).rejects.toThrow(RefNotFoundError);
    });

    it('should map merge-base exit codes to ancestry', async () => {
      const { git, respond } = createScriptedGit();
      respond(['merge-base', '--is-ancestor', 'a', 'b'], ok());
      respond(['merge-base', '--is-ancestor', 'b', 'a'], fail('', 1));
      respond(['merge-base', '--is-ancestor', 'x', 'a'], fail('fatal: Not a valid object name x', 128));

      expect(await git.isAncestor('a', 'b')).toBe(true);
      expect(await git.isAncestor('b', 'a')).toBe(false);
      await expect(git.isAncestor('x', 'a')).rejects.toThrow(GitCommandError);
    });

    it('should count commits in a range', async () => {
      const { git, respond } = createScriptedGit();
      respond(['rev-list', '--count', 'pristine-upstream..upstream/main'], ok('3\n'));

      expect(await git.countCommits('pristine-upstream', 'upstream/main')).toBe(3);
    });

    it('should parse history with subjects containing pipes', async () => {
      const { git, respond } = createScriptedGit();
      const line = ['h1', 'feat: a | b', 'Dev <dev@example.com>', '2024-05-01T10:00:00+00:00'].join('\x1f');
      respond(
        ['log', '--format=%H\x1f%s\x1f%an <%ae>\x1f%aI', '--max-count=10', 'a..b'],
        ok(`${line}\n`)
      );

      const commits = await git.getCommitHistoryRange('a', 'b', { maxCount: 10 });
      expect(commits).toEqual([
        { hash: 'h1', message: 'feat: a | b', author: 'Dev <dev@example.com>', date: '2024-05-01T10:00:00+00:00' },
      ]);
    });

    it('should drop the commit itself from rev-list parents output', async () => {
      const { git, respond } = createScriptedGit();
      respond(['rev-list', '--parents', '-n', '1', 'm1'], ok('m1 p1 p2\n'));

      expect(await git.getCommitParents('m1')).toEqual(['p1', 'p2']);
    });

    it('should refuse to checkout a branch that does not exist', async () => {
      const { git, respond } = createScriptedGit();
      respond(['show-ref', '--verify', '--quiet', 'refs/heads/nope'], fail('', 1));

      await expect(git.checkoutBranch('nope')).rejects.toThrow(BranchNotFoundError);
    });
  });

  describe('merging', () => {
    it('should classify a no-ff merge with a message as merged', async () => {
      const { git, respond, calls } = createScriptedGit();
      respond(['merge', '--no-ff', '-m', 'Sync: upstream', 'pristine-upstream'], ok("Merge made by the 'ort' strategy.\n"));
      respond(['rev-parse', '--verify', '--quiet', 'HEAD^{commit}'], ok('merge1\n'));

      const result = await git.merge('pristine-upstream', { strategy: 'no-ff', message: 'Sync: upstream' });

      expect(result).toEqual({ status: 'merged', commitHash: 'merge1' });
      expect(calls[0]?.args).toEqual(['merge', '--no-ff', '-m', 'Sync: upstream', 'pristine-upstream']);
    });

    it('should report up-to-date merges', async () => {
      const { git, respond } = createScriptedGit();
      respond(['merge', '--ff-only', 'upstream/main'], ok('Already up to date.\n'));
      respond(['rev-parse', '--verify', '--quiet', 'HEAD^{commit}'], ok('tip\n'));

      expect(await git.merge('upstream/main', { strategy: 'ff-only' })).toEqual({
        status: 'up-to-date',
        commitHash: 'tip',
      });
    });

    it('should throw NotFastForwardError when an ff-only merge is impossible', async () => {
      const { git, respond } = createScriptedGit();
      respond(['merge', '--ff-only', 'upstream/main'], fail('fatal: Not possible to fast-forward, aborting.', 128));
      respond(['symbolic-ref', '--short', 'HEAD'], ok('pristine-upstream\n'));

      await expect(git.merge('upstream/main', { strategy: 'ff-only' })).rejects.toThrow(NotFastForwardError);
    });

    it('should throw MergeConflictError listing the conflicted files', async () => {
      const { git, respond } = createScriptedGit();
      respond(
        ['merge', '--no-ff', '--no-edit', 'pristine-upstream'],
        fail('', 1, 'CONFLICT (content): Merge conflict in src/a.ts\nAutomatic merge failed; fix conflicts and then commit the result.\n')
      );
      respond(['diff', '--name-only', '--diff-filter=U'], ok('src/a.ts\nsrc/b.ts\n'));

      const error = await git.merge('pristine-upstream', { strategy: 'no-ff' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MergeConflictError);
      expect(error instanceof MergeConflictError && error.conflictedFiles).toEqual(['src/a.ts', 'src/b.ts']);
    });

    it('should refuse to commit or abort when no merge is in progress', async () => {
      const { git, respond } = createScriptedGit();
      respond(['rev-parse', '-q', '--verify', 'MERGE_HEAD'], fail('', 1));

      await expect(git.commitMerge()).rejects.toThrow(MergeNotInProgressError);
      await expect(git.mergeAbort()).rejects.toThrow(MergeNotInProgressError);
    });

    it('should read conflict sides from index stages', async () => {
      const { git, respond } = createScriptedGit();
      respond(['rev-parse', '--verify', '--quiet', ':2:src/a.ts'], ok('blob\n'));
      respond(['rev-parse', '--verify', '--quiet', ':3:src/a.ts'], fail('', 1));

      expect(await git.hasConflictVersion('src/a.ts', 'ours')).toBe(true);
      expect(await git.hasConflictVersion('src/a.ts', 'theirs')).toBe(false);
    });
  });

  describe('tags', () => {
    it('should create annotated tags and refuse duplicates', async () => {
      const { git, respond, calls } = createScriptedGit();
      respond(['show-ref', '--verify', '--quiet', 'refs/tags/backup/staging-20240501-100000'], fail('', 1), ok());
      respond(['tag', '-a', 'backup/staging-20240501-100000', '-m', 'Backup of staging', 'staging'], ok());

      await git.createTag('backup/staging-20240501-100000', 'staging', 'Backup of staging');
      expect(calls.map((call) => call.args[0])).toEqual(['show-ref', 'tag']);

      await expect(
        git.createTag('backup/staging-20240501-100000', 'staging', 'Backup of staging')
      ).rejects.toThrow(TagAlreadyExistsError);
    });

    it('should list tags newest first, peeling annotated tags', async () => {
      const { git, respond, calls } = createScriptedGit();
      const sep = '\x1f';
      const format = ['%(refname)', '%(objectname)', '%(*objectname)', '%(creatordate:iso-strict)', '%(contents:subject)'].join(sep);
      respond(
        ['for-each-ref', '--sort=-refname', '--sort=-creatordate', `--format=${format}`, 'refs/tags/backup/*'],
        ok(
          [
            ['refs/tags/backup/staging-2', 'tagobj', 'commit2', '2024-05-02T00:00:00+00:00', 'second'].join(sep),
            ['refs/tags/backup/staging-1', 'commit1', '', '2024-05-01T00:00:00+00:00', ''].join(sep),
          ].join('\n') + '\n'
        )
      );

      const tags = await git.listTags('backup/*');

      expect(calls[0]?.args[0]).toBe('for-each-ref');
      expect(tags).toEqual([
        { name: 'backup/staging-2', commit: 'commit2', createdAt: '2024-05-02T00:00:00+00:00', message: 'second' },
        { name: 'backup/staging-1', commit: 'commit1', createdAt: '2024-05-01T00:00:00+00:00', message: '' },
      ]);
    });
  });

  describe('publishing', () => {
    it('should push all branches atomically with one lease per branch', async () => {
      const { git, respond, calls } = createScriptedGit();
      const args = [
        'push',
        '--atomic',
        '--force-with-lease=refs/heads/staging:s1',
        '--force-with-lease=refs/heads/custom/main:p1',
        'origin',
        'refs/heads/staging:refs/heads/staging',
        'refs/heads/custom/main:refs/heads/custom/main',
      ];
      respond(args, ok());

      await git.pushWithLease('origin', [
        { branch: 'staging', expectedRemoteCommit: 's1' },
        { branch: 'custom/main', expectedRemoteCommit: 'p1' },
      ]);

      expect(calls[0]?.args).toEqual(args);
    });

    it('should map a stale lease to PushRejectedError', async () => {
      const { git, respond } = createScriptedGit();
      respond(
        ['push', '--atomic', '--force-with-lease=refs/heads/staging:s1', 'origin', 'refs/heads/staging:refs/heads/staging'],
        fail(' ! [rejected]        staging -> staging (stale info)\nerror: failed to push some refs')
      );

      const error = await git
        .pushWithLease('origin', [{ branch: 'staging', expectedRemoteCommit: 's1' }])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PushRejectedError);
      expect(error instanceof PushRejectedError && error.refs).toEqual(['staging']);
    });

    it('should do nothing for an empty lease push', async () => {
      const { git, execCommand } = createScriptedGit();

      await git.pushWithLease('origin', []);

      expect(execCommand).not.toHaveBeenCalled();
    });

    it('should push tags by full refname', async () => {
      const { git, respond, calls } = createScriptedGit();
      respond(['push', 'origin', 'refs/tags/backup/mirror-1'], ok());

      await git.pushTag('origin', 'backup/mirror-1');

      expect(calls[0]?.args).toEqual(['push', 'origin', 'refs/tags/backup/mirror-1']);
    });
  });
});
